/**
 * Error taxonomy shared by the pipeline and the CLI.
 *
 * Repository-level errors (materialization, empty repository) abort one
 * bundle; measurement-level errors (tools, tokenizer) are converted to
 * sentinel values where they are caught; ConfigError ends the run.
 */

export class BundleMetaError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigError extends BundleMetaError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIG_INVALID", message, options);
  }
}

export class MaterializationError extends BundleMetaError {
  readonly bundlePath: string;

  constructor(bundlePath: string, message: string, options?: { cause?: unknown }) {
    super("MATERIALIZATION_FAILED", message, options);
    this.bundlePath = bundlePath;
  }
}

export class EmptyRepositoryError extends BundleMetaError {
  readonly bundlePath: string;

  constructor(bundlePath: string) {
    super("EMPTY_REPOSITORY", `No resolvable branches in ${bundlePath}`);
    this.bundlePath = bundlePath;
  }
}

export class ToolError extends BundleMetaError {
  readonly tool: string;
  /** True when the executable could not be found at all */
  readonly missing: boolean;

  constructor(tool: string, message: string, missing: boolean, options?: { cause?: unknown }) {
    super(missing ? "TOOL_MISSING" : "TOOL_FAILED", message, options);
    this.tool = tool;
    this.missing = missing;
  }
}

export class TokenizerUnavailableError extends BundleMetaError {
  readonly tokenizerId: string;

  constructor(tokenizerId: string, message: string, options?: { cause?: unknown }) {
    super("TOKENIZER_UNAVAILABLE", message, options);
    this.tokenizerId = tokenizerId;
  }
}

/** Repository-level failures: the bundle gets no row, the run continues */
export function isRepositoryFatal(error: unknown): error is MaterializationError | EmptyRepositoryError {
  return error instanceof MaterializationError || error instanceof EmptyRepositoryError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
