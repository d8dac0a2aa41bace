import { jest } from "@jest/globals";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { createCli } from "../../src/cli";
import { metadataHandler, runMetadata } from "../../src/commands/metadata";
import { runTokens, tokensHandler } from "../../src/commands/tokens";

describe("metadata and tokens commands", () => {
  let dir: string;
  let consoleSpy: jest.SpiedFunction<typeof console.log>;
  let consoleErrorSpy: jest.SpiedFunction<typeof console.error>;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "bundlemeta-cli-"));
    consoleSpy = jest.spyOn(console, "log").mockImplementation(() => {});
    consoleErrorSpy = jest.spyOn(console, "error").mockImplementation(() => {});
    jest.spyOn(console, "warn").mockImplementation(() => {});
    jest.spyOn(process, "exit").mockImplementation((code) => {
      throw new Error(`process.exit(${code})`);
    });
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    jest.restoreAllMocks();
  });

  it("metadata over an empty dataset leaves the table untouched", async () => {
    const outputCsv = path.join(dir, "repo_metadata.csv");

    await runMetadata({
      datasetDir: dir,
      outputCsv,
      config: path.join(dir, "absent.json"),
      skipTreeSitter: true,
    });

    expect(fs.existsSync(outputCsv)).toBe(false);
    expect(consoleSpy).toHaveBeenCalledWith(
      expect.stringContaining(`Metadata: no bundles found, ${outputCsv} left unchanged`),
    );
  });

  it("metadata exits with status 1 for a missing dataset directory", async () => {
    const missing = path.join(dir, "missing");

    await expect(
      metadataHandler({
        datasetDir: missing,
        outputCsv: path.join(dir, "out.csv"),
        skipTreeSitter: false,
      }),
    ).rejects.toThrow("process.exit(1)");

    expect(consoleErrorSpy).toHaveBeenCalledWith(
      expect.stringContaining(`Metadata pass failed: Dataset directory does not exist: ${missing}`),
    );
  });

  it("metadata rejects an invalid config file", async () => {
    const configPath = path.join(dir, "bad.json");
    fs.writeFileSync(configPath, "{ not json");

    await expect(
      runMetadata({ datasetDir: dir, outputCsv: path.join(dir, "out.csv"), config: configPath, skipTreeSitter: true }),
    ).rejects.toThrow(`Invalid config file at ${configPath}`);
  });

  it("tokens over an empty dataset leaves the table untouched", async () => {
    const outputCsv = path.join(dir, "repo_tokens.csv");

    await runTokens({
      datasetDir: dir,
      outputCsv,
      config: path.join(dir, "absent.json"),
      tokenizerId: "not-a-real-encoding",
    });

    expect(fs.existsSync(outputCsv)).toBe(false);
    expect(consoleSpy).toHaveBeenCalledWith(
      expect.stringContaining(`Tokens: no bundles found, ${outputCsv} left unchanged`),
    );
  });

  it("tokens exits with status 1 for a missing dataset directory", async () => {
    const missing = path.join(dir, "missing");

    await expect(
      tokensHandler({ datasetDir: missing, outputCsv: path.join(dir, "t.csv") }),
    ).rejects.toThrow("process.exit(1)");

    expect(consoleErrorSpy).toHaveBeenCalledWith(
      expect.stringContaining(`Tokens pass failed: Dataset directory does not exist: ${missing}`),
    );
  });

  it("command-line flags reach both passes", async () => {
    const metadataCsv = path.join(dir, "meta.csv");
    const tokensCsv = path.join(dir, "tokens.csv");
    const absent = path.join(dir, "absent.json");

    await createCli([
      "metadata",
      dir,
      "--output-csv",
      metadataCsv,
      "--config",
      absent,
      "--skip-tree-sitter",
      "--include-lang",
      "Go,Python",
    ]).parseAsync();
    await createCli(["tokens", dir, "--output-csv", tokensCsv, "--config", absent, "--tokenizer-id", "cl100k_base"]).parseAsync();

    expect(consoleSpy).toHaveBeenCalledWith(
      expect.stringContaining(`Metadata: no bundles found, ${metadataCsv} left unchanged`),
    );
    expect(consoleSpy).toHaveBeenCalledWith(expect.stringContaining(`Tokens: no bundles found, ${tokensCsv} left unchanged`));
  });
});
