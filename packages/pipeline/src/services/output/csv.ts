import { readFile } from "node:fs/promises";
import type { CsvValue } from "@bundlemeta/common";

export function csvEscape(value: CsvValue): string {
  const s = String(value);
  if (/[,"\r\n]/.test(s)) return `"${s.replace(/"/g, '""')}"`;
  return s;
}

export function formatCsvRow(values: readonly CsvValue[]): string {
  return `${values.map(csvEscape).join(",")}\n`;
}

/**
 * Parse CSV text into records of fields. Quoted fields may contain commas,
 * doubled quotes and line breaks. Blank lines are skipped.
 */
export function parseCsv(text: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let field = "";
  let quoted = false;
  let fieldStarted = false;

  const endField = () => {
    record.push(field);
    field = "";
    fieldStarted = false;
  };
  const endRecord = () => {
    endField();
    if (!(record.length === 1 && record[0] === "")) records.push(record);
    record = [];
  };

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (quoted) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          quoted = false;
        }
      } else {
        field += ch;
      }
    } else if (ch === '"' && !fieldStarted) {
      quoted = true;
      fieldStarted = true;
    } else if (ch === ",") {
      endField();
    } else if (ch === "\n" || ch === "\r") {
      if (ch === "\r" && text[i + 1] === "\n") i++;
      endRecord();
    } else {
      field += ch;
      fieldStarted = true;
    }
  }
  if (fieldStarted || field !== "" || record.length > 0) endRecord();
  return records;
}

export interface CsvTable {
  header: string[];
  rows: Record<string, string>[];
}

/** Rows keyed by header name; missing trailing fields read as "" */
export function toTable(records: string[][]): CsvTable {
  const [header = [], ...body] = records;
  const rows = body.map((fields) => {
    const row: Record<string, string> = {};
    header.forEach((column, index) => {
      row[column] = fields[index] ?? "";
    });
    return row;
  });
  return { header, rows };
}

export async function readCsvTable(path: string): Promise<CsvTable> {
  return toTable(parseCsv(await readFile(path, "utf8")));
}
