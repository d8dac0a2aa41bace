/**
 * Console logger with a single process-wide level.
 * Level comes from --log-level, or BUNDLEMETA_LOG_LEVEL, default "info".
 */

import chalk from "chalk";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export function isLogLevel(value: string): value is LogLevel {
  const known: readonly string[] = LOG_LEVELS;
  return known.includes(value);
}

function initialLevel(): LogLevel {
  const fromEnv = process.env.BUNDLEMETA_LOG_LEVEL?.toLowerCase();
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : "info";
}

let currentLevel: LogLevel = initialLevel();

/**
 * Set the process-wide level. Unknown names fall back to "info".
 */
export function setLogLevel(level: string): LogLevel {
  const normalized = level.toLowerCase();
  currentLevel = isLogLevel(normalized) ? normalized : "info";
  return currentLevel;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[currentLevel];
}

export function createLogger(scope: string): Logger {
  const prefix = chalk.gray(`[${scope}]`);
  return {
    debug(message) {
      if (enabled("debug")) console.log(`${prefix} ${chalk.gray(message)}`);
    },
    info(message) {
      if (enabled("info")) console.log(`${prefix} ${message}`);
    },
    warn(message) {
      if (enabled("warn")) console.warn(`${prefix} ${chalk.yellow(message)}`);
    },
    error(message) {
      if (enabled("error")) console.error(`${prefix} ${chalk.red(message)}`);
    },
  };
}
