import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { createLogger, errorMessage } from "@bundlemeta/common";

const log = createLogger("metrics");

const LINE_BREAK = /\r\n|\r|\n/;

/** Split into lines; a trailing line break does not start another line */
export function splitLines(text: string): string[] {
  if (text === "") return [];
  const lines = text.split(LINE_BREAK);
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

/**
 * Total line count of root-level files whose name starts with "README"
 * (case-sensitive).
 */
export async function readmeLineCount(repoRoot: string): Promise<number> {
  const entries = await readdir(repoRoot, { withFileTypes: true });
  let total = 0;
  for (const entry of entries) {
    if (!entry.isFile() || !entry.name.startsWith("README")) continue;
    try {
      total += splitLines(await readFile(join(repoRoot, entry.name), "utf8")).length;
    } catch (error) {
      log.debug(`Unreadable ${entry.name}: ${errorMessage(error)}`);
    }
  }
  return total;
}

/**
 * Running tally for the duplication ratio: 1 - distinct / total over
 * non-blank lines, compared verbatim. Only distinct lines are kept.
 */
export class LineTally {
  private total = 0;
  private readonly distinct = new Set<string>();

  add(text: string): void {
    for (const line of splitLines(text)) {
      if (line.trim() === "") continue;
      this.total += 1;
      this.distinct.add(line);
    }
  }

  ratio(): number {
    return this.total === 0 ? 0 : 1 - this.distinct.size / this.total;
  }
}

export function duplicationRatioOf(texts: Iterable<string>): number {
  const tally = new LineTally();
  for (const text of texts) tally.add(text);
  return tally.ratio();
}

/** Files are read one at a time and folded into the tally as they arrive */
export async function duplicationRatio(files: readonly string[]): Promise<number> {
  const tally = new LineTally();
  for (const file of files) {
    try {
      tally.add(await readFile(file, "utf8"));
    } catch (error) {
      log.debug(`Skipping unreadable ${file}: ${errorMessage(error)}`);
    }
  }
  return tally.ratio();
}
