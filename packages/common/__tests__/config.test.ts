import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import {
  ConfigError,
  defaultConfig,
  defaultConfigJson,
  loadConfig,
  normalizeExtension,
  parseConfig,
  resolveTokenizerId,
} from "../src";

const minimalTreeSitter = {
  extensionLanguageMap: { ".py": "python" },
  langFuncNodeTypes: { python: ["function_definition"] },
};

describe("config", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "bundlemeta-config-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe("defaultConfig", () => {
    test("applies token defaults", () => {
      const config = defaultConfig();
      expect(config.tokens.maxLength).toBe(8192);
      expect(config.tokens.batchSize).toBe(32);
      expect(config.tokens.maxBatchChars).toBe(1_000_000);
      expect(config.tokens.tokenizerId).toBeUndefined();
    });

    test("ships the extension map and the allowed file names", () => {
      const config = defaultConfig();
      expect(config.treeSitter.extensionLanguageMap[".py"]).toBe("python");
      expect(config.treeSitter.extensionLanguageMap[".tsx"]).toBe("tsx");
      expect(config.files.allowedFilenames).toEqual(["Makefile", "Dockerfile", "docker-compose.yml", "CMakeLists.txt"]);
      expect(config.files.allowedExtensions).toBeUndefined();
      expect(config.files.includeLanguages).toEqual([]);
    });

    test("is deeply frozen", () => {
      const config = defaultConfig();
      expect(Object.isFrozen(config)).toBe(true);
      expect(Object.isFrozen(config.treeSitter.extensionLanguageMap)).toBe(true);
      expect(Object.isFrozen(config.treeSitter.langFuncNodeTypes.python)).toBe(true);
    });
  });

  describe("parseConfig", () => {
    test("normalizes extensions to lower case with a leading dot", () => {
      const config = parseConfig({
        files: { allowedExtensions: ["PY", ".Js"] },
        treeSitter: { extensionLanguageMap: { PY: "python" }, langFuncNodeTypes: minimalTreeSitter.langFuncNodeTypes },
      });
      expect(config.files.allowedExtensions).toEqual([".py", ".js"]);
      expect(config.treeSitter.extensionLanguageMap).toEqual({ ".py": "python" });
    });

    test("keeps an explicit tokenizer id and limits", () => {
      const config = parseConfig({
        treeSitter: minimalTreeSitter,
        tokens: { tokenizerId: "cl100k_base", maxLength: 100, batchSize: 4, maxBatchChars: 500 },
      });
      expect(config.tokens).toEqual({ tokenizerId: "cl100k_base", maxLength: 100, batchSize: 4, maxBatchChars: 500 });
    });

    test("rejects an empty extension map", () => {
      const parse = () =>
        parseConfig({ treeSitter: { extensionLanguageMap: {}, langFuncNodeTypes: minimalTreeSitter.langFuncNodeTypes } }, "test.json");
      expect(parse).toThrow(ConfigError);
      expect(parse).toThrow(
        "Invalid configuration in test.json: treeSitter.extensionLanguageMap: extensionLanguageMap must map at least one extension",
      );
    });

    test("rejects a missing treeSitter section", () => {
      expect(() => parseConfig({}, "test.json")).toThrow("Invalid configuration in test.json: treeSitter: Required");
    });

    test("rejects a non-positive batch size", () => {
      expect(() => parseConfig({ treeSitter: minimalTreeSitter, tokens: { batchSize: 0 } })).toThrow(ConfigError);
    });
  });

  describe("loadConfig", () => {
    test("falls back to defaults when the file does not exist", () => {
      const config = loadConfig(path.join(tmpDir, "missing.json"));
      expect(config.tokens.maxLength).toBe(8192);
      expect(config.treeSitter.extensionLanguageMap[".go"]).toBe("go");
    });

    test("reads and validates an existing file", () => {
      const configPath = path.join(tmpDir, "config.json");
      fs.writeFileSync(configPath, JSON.stringify({ treeSitter: minimalTreeSitter, tokens: { tokenizerId: "o200k_base" } }));
      const config = loadConfig(configPath);
      expect(config.tokens.tokenizerId).toBe("o200k_base");
      expect(Object.keys(config.treeSitter.extensionLanguageMap)).toEqual([".py"]);
    });

    test("reports malformed JSON as a ConfigError", () => {
      const configPath = path.join(tmpDir, "broken.json");
      fs.writeFileSync(configPath, "{ not json");
      expect(() => loadConfig(configPath)).toThrow(
        `Invalid config file at ${configPath}. Run 'bundlemeta init --force' to recreate it.`,
      );
    });

    test("reports schema violations with the file path", () => {
      const configPath = path.join(tmpDir, "invalid.json");
      fs.writeFileSync(configPath, JSON.stringify({ treeSitter: { extensionLanguageMap: { ".py": "python" } } }));
      expect(() => loadConfig(configPath)).toThrow(`Invalid configuration in ${configPath}: treeSitter.langFuncNodeTypes: Required`);
    });
  });

  test("defaultConfigJson round-trips through parseConfig", () => {
    const json = defaultConfigJson();
    expect(json.endsWith("}\n")).toBe(true);
    expect(parseConfig(JSON.parse(json))).toEqual(defaultConfig());
  });

  test("normalizeExtension", () => {
    expect(normalizeExtension("PY")).toBe(".py");
    expect(normalizeExtension(" .Rs ")).toBe(".rs");
  });

  describe("resolveTokenizerId", () => {
    const withTokenizer = parseConfig({ treeSitter: minimalTreeSitter, tokens: { tokenizerId: "p50k_base" } });
    const withoutTokenizer = parseConfig({ treeSitter: minimalTreeSitter });

    test("prefers the flag", () => {
      expect(resolveTokenizerId("cl100k_base", withTokenizer, { TOKENIZER_ID: "r50k_base" })).toBe("cl100k_base");
    });

    test("then the config file", () => {
      expect(resolveTokenizerId(undefined, withTokenizer, { TOKENIZER_ID: "r50k_base" })).toBe("p50k_base");
    });

    test("then the environment", () => {
      expect(resolveTokenizerId("  ", withoutTokenizer, { TOKENIZER_ID: " r50k_base " })).toBe("r50k_base");
    });

    test("is undefined when nothing is set", () => {
      expect(resolveTokenizerId(undefined, withoutTokenizer, {})).toBeUndefined();
    });
  });
});
