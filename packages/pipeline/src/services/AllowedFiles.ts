import { open, readdir, type FileHandle } from "node:fs/promises";
import { basename, extname, join } from "node:path";
import { normalizeExtension, type AppConfig } from "@bundlemeta/common";

const DEFAULT_ALLOWED_FILENAMES = ["Makefile", "Dockerfile", "docker-compose.yml", "CMakeLists.txt"];
const UTF8_SAMPLE_BYTES = 4096;
const HISTORY_DIR = ".git";

/**
 * Decides which paths count as "code". Only whitelisted extensions and
 * file names are code; everything else is ignored by every metric.
 */
export class AllowedFiles {
  readonly extensions: ReadonlySet<string>;
  readonly filenames: ReadonlySet<string>;

  constructor(extensions: Iterable<string>, filenames: Iterable<string>) {
    this.extensions = new Set(Array.from(extensions, normalizeExtension));
    this.filenames = new Set(filenames);
  }

  /**
   * Extensions come from files.allowedExtensions, falling back to the keys of
   * the tree-sitter extension map.
   */
  static fromConfig(config: AppConfig): AllowedFiles {
    const extensions = config.files.allowedExtensions ?? Object.keys(config.treeSitter.extensionLanguageMap);
    const filenames = config.files.allowedFilenames ?? DEFAULT_ALLOWED_FILENAMES;
    return new AllowedFiles(extensions, filenames);
  }

  isCodePath(filePath: string): boolean {
    if (this.filenames.has(basename(filePath))) return true;
    const ext = extname(filePath).toLowerCase();
    return ext !== "" && this.extensions.has(ext);
  }

  /**
   * Recursively find code files under root, sorted, never entering .git or
   * following symlinks, skipping empty and non-UTF-8 files.
   */
  async findCodeFiles(root: string): Promise<string[]> {
    const files: string[] = [];

    const walk = async (dir: string): Promise<void> => {
      const entries = await readdir(dir, { withFileTypes: true });
      entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

      for (const entry of entries) {
        const fullPath = join(dir, entry.name);
        if (entry.isDirectory()) {
          if (entry.name === HISTORY_DIR) continue;
          await walk(fullPath);
        } else if (entry.isFile() && this.isCodePath(entry.name) && (await isUtf8File(fullPath))) {
          files.push(fullPath);
        }
      }
    };

    await walk(root);
    return files;
  }
}

/** Heuristic text check on the first 4 KiB: non-empty and valid UTF-8 */
export async function isUtf8File(filePath: string): Promise<boolean> {
  let handle: FileHandle | undefined;
  try {
    handle = await open(filePath, "r");
    const buffer = Buffer.alloc(UTF8_SAMPLE_BYTES);
    const { bytesRead } = await handle.read(buffer, 0, UTF8_SAMPLE_BYTES, 0);
    if (bytesRead === 0) return false;
    // stream mode tolerates a multi-byte character cut at the sample boundary
    new TextDecoder("utf-8", { fatal: true }).decode(buffer.subarray(0, bytesRead), { stream: true });
    return true;
  } catch {
    return false;
  } finally {
    await handle?.close();
  }
}
