/**
 * Output row types for the metadata and tokens tables.
 * Column constants fix the CSV column order.
 */

export const LICENSE_TYPES = [
  "MIT",
  "APACHE-2.0",
  "GPL",
  "GPL-3.0",
  "BSD",
  "MPL-2.0",
  "UNLICENSE",
  "UNKNOWN",
] as const;

export type LicenseType = (typeof LICENSE_TYPES)[number];

/** language name -> share of the allowed-file line total */
export type LanguageDistribution = Record<string, number>;

export interface MetadataRow {
  repo_id: string;
  repo_name: string;
  /** JSON-encoded LanguageDistribution */
  languages: string;
  stack: string;
  license_type: LicenseType;
  created_at: string;
  commit_count: number;
  branch_count: number;
  contributors_count: number;
  repo_git_history_mb: number;
  repo_bundle_mb: number;
  repo_worktree_mb: number;
  files: number;
  loc: number;
  raw_loc: number;
  /** 0 means "not measured" */
  avg_func_length: number;
  docstring_ratio: number;
  duplication_ratio: number;
  documentation_cnt: number;
}

export interface TokensRow {
  repo_name: string;
  deepseek_token_count_all_commits: number;
  deepseek_token_count_last_commit: number;
}

export const METADATA_COLUMNS = [
  "repo_id",
  "repo_name",
  "languages",
  "stack",
  "license_type",
  "created_at",
  "commit_count",
  "branch_count",
  "contributors_count",
  "repo_git_history_mb",
  "repo_bundle_mb",
  "repo_worktree_mb",
  "files",
  "loc",
  "raw_loc",
  "avg_func_length",
  "docstring_ratio",
  "duplication_ratio",
  "documentation_cnt",
] as const satisfies readonly (keyof MetadataRow)[];

export const TOKENS_COLUMNS = [
  "repo_name",
  "deepseek_token_count_all_commits",
  "deepseek_token_count_last_commit",
] as const satisfies readonly (keyof TokensRow)[];

/** Values a CSV cell can be written from */
export type CsvValue = string | number;

/** Key column shared by every table */
export const REPO_KEY = "repo_name";
