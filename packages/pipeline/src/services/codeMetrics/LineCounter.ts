import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import { ToolError } from "@bundlemeta/common";
import { runTool } from "../toolRunner";

export interface LineCountStats {
  nFiles: number;
  blank: number;
  comment: number;
  code: number;
}

export interface LineCountResult {
  summary: LineCountStats;
  /** Per-language stats keyed by the counter's language names */
  languages: Record<string, LineCountStats>;
}

export interface LineCountRequest {
  root: string;
  /** Restrict counting to these files (absolute paths) */
  files?: readonly string[];
  /** Restrict counting to these language names */
  includeLanguages?: readonly string[];
}

/**
 * Counts blank, comment and code lines. Resolves to null when the
 * underlying tool is not installed.
 */
export interface LineCounter {
  count(request: LineCountRequest): Promise<LineCountResult | null>;
}

const ClocStatsSchema = z.object({
  nFiles: z.number().nonnegative().default(0),
  blank: z.number().nonnegative().default(0),
  comment: z.number().nonnegative().default(0),
  code: z.number().nonnegative().default(0),
});

const ClocReportSchema = z.record(z.unknown());

const NON_LANGUAGE_KEYS = new Set(["header", "SUM"]);

export function emptyStats(): LineCountStats {
  return { nFiles: 0, blank: 0, comment: 0, code: 0 };
}

/**
 * Parse `cloc --json` stdout. cloc may print warning lines around the JSON
 * document, so only the outermost {...} fragment is read. Output without
 * any JSON (nothing counted) is an empty result.
 * @throws {ToolError} when the fragment is not a valid report
 */
export function parseClocOutput(text: string): LineCountResult {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start < 0 || end < start) {
    return { summary: emptyStats(), languages: {} };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text.slice(start, end + 1));
  } catch (error) {
    throw new ToolError("cloc", `cloc produced malformed JSON: ${text.slice(0, 200)}`, false, { cause: error });
  }

  const report = ClocReportSchema.safeParse(raw);
  if (!report.success) {
    throw new ToolError("cloc", "cloc report is not a JSON object", false);
  }

  const languages: Record<string, LineCountStats> = {};
  for (const [language, value] of Object.entries(report.data)) {
    if (NON_LANGUAGE_KEYS.has(language)) continue;
    const stats = ClocStatsSchema.safeParse(value);
    if (stats.success) languages[language] = stats.data;
  }

  const sum = ClocStatsSchema.safeParse(report.data.SUM);
  const summary = sum.success ? sum.data : sumStats(Object.values(languages));
  return { summary, languages };
}

function sumStats(stats: LineCountStats[]): LineCountStats {
  return stats.reduce(
    (acc, s) => ({
      nFiles: acc.nFiles + s.nFiles,
      blank: acc.blank + s.blank,
      comment: acc.comment + s.comment,
      code: acc.code + s.code,
    }),
    emptyStats(),
  );
}

/**
 * LineCounter backed by the `cloc` executable. A file list is handed over
 * through a temporary --list-file.
 */
export class ClocLineCounter implements LineCounter {
  constructor(private readonly command = "cloc") {}

  async count(request: LineCountRequest): Promise<LineCountResult | null> {
    const args = ["--json", "--quiet"];
    if (request.includeLanguages && request.includeLanguages.length > 0) {
      args.push(`--include-lang=${request.includeLanguages.join(",")}`);
    }

    let listDir: string | undefined;
    try {
      if (request.files) {
        listDir = await mkdtemp(join(tmpdir(), "bundlemeta-cloc-"));
        const listFile = join(listDir, "files.txt");
        await writeFile(listFile, `${request.files.join("\n")}\n`, "utf8");
        args.push(`--list-file=${listFile}`);
      } else {
        args.push(request.root);
      }

      const stdout = await runTool(this.command, args, { cwd: request.root });
      return parseClocOutput(stdout);
    } catch (error) {
      if (error instanceof ToolError && error.missing) return null;
      throw error;
    } finally {
      if (listDir) await rm(listDir, { recursive: true, force: true });
    }
  }
}
