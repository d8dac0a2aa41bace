import { readdir } from "node:fs/promises";
import { join, resolve } from "node:path";

export const BUNDLE_EXTENSION = ".bundle";

/**
 * All regular *.bundle files under datasetDir, recursively, as absolute
 * paths sorted by path. Symbolic links are not followed.
 */
export async function findBundles(datasetDir: string): Promise<string[]> {
  const bundles: string[] = [];

  const walk = async (dir: string): Promise<void> => {
    const entries = await readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(fullPath);
      } else if (entry.isFile() && entry.name.endsWith(BUNDLE_EXTENSION)) {
        bundles.push(fullPath);
      }
    }
  };

  await walk(resolve(datasetDir));
  return bundles.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}
