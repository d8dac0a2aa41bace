/**
 * Configuration management for bundlemeta
 * Handles loading, validation and normalization of the JSON config file
 */

import path from "node:path";
import fs from "node:fs";
import { z } from "zod";
import defaults from "./defaults.json";
import { ConfigError } from "./errors";

export const DEFAULT_CONFIG_FILE = "repo-metadata.config.json";

const nonEmpty = (value: Record<string, unknown>) => Object.keys(value).length > 0;

export const AppConfigSchema = z.object({
  files: z
    .object({
      allowedExtensions: z.array(z.string().trim().min(1)).optional(),
      allowedFilenames: z.array(z.string().trim().min(1)).optional(),
      includeLanguages: z.array(z.string().trim().min(1)).default([]),
    })
    .default({}),
  treeSitter: z.object({
    extensionLanguageMap: z
      .record(z.string().trim().min(1))
      .refine(nonEmpty, "extensionLanguageMap must map at least one extension"),
    langFuncNodeTypes: z
      .record(z.array(z.string().trim().min(1)))
      .refine(nonEmpty, "langFuncNodeTypes must list at least one language"),
  }),
  tokens: z
    .object({
      tokenizerId: z.string().trim().min(1).optional(),
      maxLength: z.number().int().positive().default(8192),
      batchSize: z.number().int().positive().default(32),
      maxBatchChars: z.number().int().positive().default(1_000_000),
    })
    .default({}),
});

type DeepReadonly<T> = T extends (infer U)[]
  ? readonly DeepReadonly<U>[]
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

export type AppConfig = DeepReadonly<z.output<typeof AppConfigSchema>>;

/** ".PY", "py" and ".py" all become ".py" */
export function normalizeExtension(ext: string): string {
  const lower = ext.trim().toLowerCase();
  return lower.startsWith(".") ? lower : `.${lower}`;
}

function deepFreeze(value: unknown): void {
  if (typeof value !== "object" || value === null || Object.isFrozen(value)) return;
  for (const child of Object.values(value)) deepFreeze(child);
  Object.freeze(value);
}

/**
 * Validate a raw config object and return the normalized, frozen config.
 * @throws {ConfigError} when the object does not match the schema
 */
export function parseConfig(raw: unknown, source = "config"): AppConfig {
  const result = AppConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration in ${source}: ${issues}`);
  }

  const parsed = result.data;
  const extensionLanguageMap: Record<string, string> = {};
  for (const [ext, language] of Object.entries(parsed.treeSitter.extensionLanguageMap)) {
    extensionLanguageMap[normalizeExtension(ext)] = language;
  }

  const config: AppConfig = {
    ...parsed,
    files: {
      ...parsed.files,
      allowedExtensions: parsed.files.allowedExtensions?.map(normalizeExtension),
    },
    treeSitter: { ...parsed.treeSitter, extensionLanguageMap },
  };
  deepFreeze(config);
  return config;
}

/** Built-in configuration used when no config file exists */
export function defaultConfig(): AppConfig {
  return parseConfig(defaults, "built-in defaults");
}

/** Pretty-printed default configuration, as written by `bundlemeta init` */
export function defaultConfigJson(): string {
  return `${JSON.stringify(defaults, null, 2)}\n`;
}

export function resolveConfigPath(configFile?: string): string {
  return path.resolve(configFile ?? DEFAULT_CONFIG_FILE);
}

/**
 * Load and validate bundlemeta configuration.
 * A missing file yields the built-in defaults.
 * @throws {ConfigError} if the file exists but cannot be read or is invalid
 */
export function loadConfig(configFile?: string): AppConfig {
  const configPath = resolveConfigPath(configFile);
  if (!fs.existsSync(configPath)) {
    return defaultConfig();
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, "utf8"));
  } catch (error) {
    throw new ConfigError(`Invalid config file at ${configPath}. Run 'bundlemeta init --force' to recreate it.`, {
      cause: error,
    });
  }
  return parseConfig(raw, configPath);
}

/**
 * Tokenizer id precedence: explicit flag, then config file, then $TOKENIZER_ID.
 */
export function resolveTokenizerId(
  flag: string | undefined,
  config: AppConfig,
  env: NodeJS.ProcessEnv = process.env,
): string | undefined {
  const candidates = [flag, config.tokens.tokenizerId, env.TOKENIZER_ID];
  for (const candidate of candidates) {
    const trimmed = candidate?.trim();
    if (trimmed) return trimmed;
  }
  return undefined;
}
