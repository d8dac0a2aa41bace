import { existsSync } from "node:fs";
import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import {
  BundleMetaError,
  METADATA_COLUMNS,
  REPO_KEY,
  TOKENS_COLUMNS,
  createLogger,
} from "@bundlemeta/common";
import { formatCsvRow, readCsvTable, type CsvTable } from "./csv";

const log = createLogger("merge");

const TOKEN_VALUE_COLUMNS = TOKENS_COLUMNS.filter((column) => column !== REPO_KEY);

export const MERGED_COLUMNS: readonly string[] = [...METADATA_COLUMNS, ...TOKEN_VALUE_COLUMNS];

export interface MergeSummary {
  rows: number;
  /** Repositories with metadata but no token row */
  metadataOnly: number;
  /** Repositories with a token row but no metadata */
  tokensOnly: number;
}

export interface MergeResult extends MergeSummary {
  header: readonly string[];
  records: string[][];
}

function indexByKey(table: CsvTable): Map<string, Record<string, string>> {
  const index = new Map<string, Record<string, string>>();
  for (const row of table.rows) {
    const key = row[REPO_KEY];
    if (key && !index.has(key)) index.set(key, row);
  }
  return index;
}

/**
 * Full outer join on repo_name: metadata rows in order, then rows only
 * present in the tokens table. Missing token fields are "0", missing
 * metadata fields empty.
 */
export function mergeTables(metadata: CsvTable, tokens: CsvTable): MergeResult {
  const tokenIndex = indexByKey(tokens);
  const seen = new Set<string>();
  const records: string[][] = [];
  let metadataOnly = 0;

  for (const row of metadata.rows) {
    const key = row[REPO_KEY] ?? "";
    if (seen.has(key)) continue;
    seen.add(key);
    const tokenRow = tokenIndex.get(key);
    if (!tokenRow) metadataOnly += 1;
    records.push([
      ...METADATA_COLUMNS.map((column) => row[column] ?? ""),
      ...TOKEN_VALUE_COLUMNS.map((column) => tokenRow?.[column] || "0"),
    ]);
  }

  let tokensOnly = 0;
  for (const [key, tokenRow] of tokenIndex) {
    if (seen.has(key)) continue;
    tokensOnly += 1;
    records.push([
      ...METADATA_COLUMNS.map((column) => (column === REPO_KEY ? key : "")),
      ...TOKEN_VALUE_COLUMNS.map((column) => tokenRow[column] || "0"),
    ]);
  }

  return { header: MERGED_COLUMNS, rows: records.length, records, metadataOnly, tokensOnly };
}

/**
 * Merge the metadata and tokens tables into outputPath.
 * @throws {BundleMetaError} when an input table does not exist
 */
export async function mergeTableFiles(metadataCsv: string, tokensCsv: string, outputPath: string): Promise<MergeSummary> {
  for (const input of [metadataCsv, tokensCsv]) {
    if (!existsSync(input)) {
      throw new BundleMetaError("INPUT_MISSING", `Input table not found: ${input}`);
    }
  }

  const result = mergeTables(await readCsvTable(metadataCsv), await readCsvTable(tokensCsv));
  const content = [result.header, ...result.records].map((values) => formatCsvRow(values)).join("");
  await mkdir(dirname(outputPath), { recursive: true });
  await writeFile(outputPath, content, "utf8");

  log.info(
    `Merged ${result.rows} repositories into ${outputPath} (${result.metadataOnly} without tokens, ${result.tokensOnly} without metadata)`,
  );
  return { rows: result.rows, metadataOnly: result.metadataOnly, tokensOnly: result.tokensOnly };
}
