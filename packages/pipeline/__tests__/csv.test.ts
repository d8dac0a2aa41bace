import { jest } from "@jest/globals";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { csvEscape, formatCsvRow, parseCsv, toTable } from "../src/services/output/csv";
import { CsvTableWriter } from "../src/services/output/CsvTableWriter";

describe("csv", () => {
  test("csvEscape quotes only when needed", () => {
    expect(csvEscape("plain")).toBe("plain");
    expect(csvEscape(1.5)).toBe("1.5");
    expect(csvEscape("a,b")).toBe('"a,b"');
    expect(csvEscape('say "hi"')).toBe('"say ""hi"""');
    expect(csvEscape("line\nbreak")).toBe('"line\nbreak"');
    expect(csvEscape('{"Python":1}')).toBe('"{""Python"":1}"');
  });

  test("formatCsvRow", () => {
    expect(formatCsvRow(["repo", 3, "Go (100%)"])).toBe("repo,3,Go (100%)\n");
  });

  test("parseCsv handles quotes, embedded line breaks and empty fields", () => {
    const text = 'a,b\n"x,1","say ""hi"""\n"multi\nline",\n';
    expect(parseCsv(text)).toEqual([
      ["a", "b"],
      ["x,1", 'say "hi"'],
      ["multi\nline", ""],
    ]);
  });

  test("parseCsv accepts CRLF, skips blank lines and a missing final newline", () => {
    expect(parseCsv("a,b\r\n1,2\r\n\r\n3,4")).toEqual([
      ["a", "b"],
      ["1", "2"],
      ["3", "4"],
    ]);
  });

  test("toTable keys rows by header, padding short rows", () => {
    expect(toTable([["a", "b", "c"], ["1"]])).toEqual({ header: ["a", "b", "c"], rows: [{ a: "1", b: "", c: "" }] });
    expect(toTable([])).toEqual({ header: [], rows: [] });
  });
});

describe("CsvTableWriter", () => {
  let dir: string;
  let csvPath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "bundlemeta-csv-"));
    csvPath = path.join(dir, "out", "table.csv");
    jest.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    jest.restoreAllMocks();
  });

  test("creates the table with a header on first append", async () => {
    const writer = new CsvTableWriter(csvPath, ["repo_name", "count"] as const);
    expect(await writer.processedKeys()).toEqual(new Set());

    await writer.append({ repo_name: "alpha", count: 1 });
    await writer.append({ repo_name: "b,eta", count: 2 });

    expect(fs.readFileSync(csvPath, "utf8")).toBe('repo_name,count\nalpha,1\n"b,eta",2\n');
    expect(await writer.processedKeys()).toEqual(new Set(["alpha", "b,eta"]));
  });

  test("concurrent appends are written one at a time in call order", async () => {
    const writer = new CsvTableWriter(csvPath, ["repo_name", "count"] as const);
    await Promise.all([1, 2, 3, 4].map((n) => writer.append({ repo_name: `r${n}`, count: n })));

    expect(fs.readFileSync(csvPath, "utf8")).toBe("repo_name,count\nr1,1\nr2,2\nr3,3\nr4,4\n");
  });

  test("a header-less table is treated as empty and appended to", async () => {
    const warnSpy = jest.spyOn(console, "warn").mockImplementation(() => {});
    fs.mkdirSync(path.dirname(csvPath), { recursive: true });
    fs.writeFileSync(csvPath, "garbage\n");
    const writer = new CsvTableWriter(csvPath, ["repo_name", "count"] as const);

    expect(await writer.processedKeys()).toEqual(new Set());
    expect(warnSpy).toHaveBeenCalledTimes(1);

    await writer.append({ repo_name: "alpha", count: 1 });
    expect(fs.readFileSync(csvPath, "utf8")).toBe("garbage\nalpha,1\n");
  });
});
