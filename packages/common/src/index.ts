/**
 * @bundlemeta/common
 * Shared configuration, logging, errors and row types for the bundlemeta workspaces.
 */

export * from "./config";
export * from "./errors";
export * from "./logger";
export * from "./types/MetricsRow";
