import { existsSync } from "node:fs";
import { appendFile, mkdir, stat } from "node:fs/promises";
import { dirname } from "node:path";
import { REPO_KEY, createLogger, errorMessage, type CsvValue } from "@bundlemeta/common";
import { formatCsvRow, readCsvTable } from "./csv";

const log = createLogger("writer");

/**
 * Append-only CSV table keyed by repo_name. Appends are queued so rows
 * are written one at a time, in call order.
 */
export class CsvTableWriter<Column extends string> {
  private queue: Promise<void> = Promise.resolve();

  constructor(
    readonly path: string,
    private readonly columns: readonly Column[],
  ) {}

  /**
   * repo_name values already in the table. A missing table is empty; an
   * unreadable or header-less one is treated as empty with a warning.
   */
  async processedKeys(): Promise<Set<string>> {
    if (!existsSync(this.path)) {
      log.info(`${this.path} will be created from scratch`);
      return new Set();
    }

    try {
      const table = await readCsvTable(this.path);
      if (!table.header.includes(REPO_KEY)) {
        log.warn(`${this.path} has no ${REPO_KEY} header; recomputing all entries`);
        return new Set();
      }
      const keys = new Set(table.rows.map((row) => row[REPO_KEY] ?? "").filter((key) => key !== ""));
      log.info(`${this.path} already contains ${keys.size} repositories`);
      return keys;
    } catch (error) {
      log.warn(`Failed to read ${this.path} (${errorMessage(error)}); recomputing all entries`);
      return new Set();
    }
  }

  append(row: Record<Column, CsvValue>): Promise<void> {
    const next = this.queue.then(() => this.write(row));
    this.queue = next.catch(() => undefined);
    return next;
  }

  private async write(row: Record<Column, CsvValue>): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    let content = "";
    if (await this.isEmpty()) content += formatCsvRow(this.columns);
    content += formatCsvRow(this.columns.map((column) => row[column]));
    await appendFile(this.path, content, "utf8");
  }

  private async isEmpty(): Promise<boolean> {
    try {
      return (await stat(this.path)).size === 0;
    } catch {
      return true;
    }
  }
}
