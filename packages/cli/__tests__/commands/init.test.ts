import { jest } from "@jest/globals";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { defaultConfigJson, loadConfig } from "@bundlemeta/common";
import { initHandler, writeDefaultConfig } from "../../src/commands/init";

describe("init command", () => {
  let dir: string;
  let configPath: string;
  let consoleSpy: jest.SpiedFunction<typeof console.log>;
  let consoleErrorSpy: jest.SpiedFunction<typeof console.error>;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "bundlemeta-init-"));
    configPath = path.join(dir, "nested", "repo-metadata.config.json");
    consoleSpy = jest.spyOn(console, "log").mockImplementation(() => {});
    consoleErrorSpy = jest.spyOn(console, "error").mockImplementation(() => {});
    jest.spyOn(process, "exit").mockImplementation((code) => {
      throw new Error(`process.exit(${code})`);
    });
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    jest.restoreAllMocks();
  });

  it("writes the default configuration, creating parent directories", async () => {
    await initHandler({ _: ["init"], $0: "bundlemeta", config: configPath, force: false });

    expect(fs.readFileSync(configPath, "utf8")).toBe(defaultConfigJson());
    expect(consoleSpy).toHaveBeenCalledWith(expect.stringContaining(`Config saved to ${configPath}`));
  });

  it("the written file loads back as the default configuration", () => {
    writeDefaultConfig({ config: configPath, force: false });
    expect(loadConfig(configPath).tokens.maxLength).toBe(8192);
    expect(loadConfig(configPath).treeSitter.extensionLanguageMap[".py"]).toBe("python");
  });

  it("refuses to overwrite an existing file without --force", async () => {
    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    fs.writeFileSync(configPath, "{}\n");

    await expect(
      initHandler({ _: ["init"], $0: "bundlemeta", config: configPath, force: false }),
    ).rejects.toThrow("process.exit(1)");

    expect(fs.readFileSync(configPath, "utf8")).toBe("{}\n");
    expect(consoleErrorSpy).toHaveBeenCalledWith(
      expect.stringContaining(`Init failed: ${configPath} already exists; pass --force to overwrite it`),
    );
  });

  it("overwrites with --force", () => {
    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    fs.writeFileSync(configPath, "{}\n");

    expect(writeDefaultConfig({ config: configPath, force: true })).toBe(configPath);
    expect(fs.readFileSync(configPath, "utf8")).toBe(defaultConfigJson());
  });
});
