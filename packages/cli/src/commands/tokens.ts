import type { ArgumentsCamelCase, Argv, CommandModule } from "yargs";
import { existsSync } from "node:fs";
import { resolve } from "node:path";
import { loadConfig, resolveTokenizerId } from "@bundlemeta/common";
import { RepoAnalyzer } from "@bundlemeta/pipeline";
import { exitWithError, printRunSummary } from "../utils/report";

export interface TokensArgs {
  "dataset-dir": string;
  "output-csv": string;
  config: string | undefined;
  "tokenizer-id": string | undefined;
}

export interface TokensOptions {
  datasetDir: string;
  outputCsv: string;
  config?: string;
  tokenizerId?: string;
}

const builder = (yargs: Argv) =>
  yargs
    .positional("dataset-dir", {
      type: "string",
      describe: "Directory searched recursively for *.bundle files",
      demandOption: true,
    })
    .option("output-csv", {
      type: "string",
      describe: "Tokens table to append to",
      default: "repo_tokens.csv",
    })
    .option("config", {
      type: "string",
      describe: "Configuration file (default: repo-metadata.config.json)",
    })
    .option("tokenizer-id", {
      type: "string",
      describe: "Tokenizer encoding, e.g. cl100k_base (falls back to config, then $TOKENIZER_ID)",
    });

export async function runTokens(args: TokensOptions): Promise<void> {
  const datasetDir = resolve(args.datasetDir);
  if (!existsSync(datasetDir)) {
    throw new Error(`Dataset directory does not exist: ${datasetDir}`);
  }

  const config = loadConfig(args.config);
  const outputCsv = resolve(args.outputCsv);
  const analyzer = new RepoAnalyzer({
    config,
    tokenizerId: resolveTokenizerId(args.tokenizerId, config),
  });

  try {
    const summary = await analyzer.runTokensPipeline(datasetDir, outputCsv);
    printRunSummary("Tokens", outputCsv, summary);
  } finally {
    await analyzer.close();
  }
}

export async function tokensHandler(argv: TokensOptions): Promise<void> {
  try {
    await runTokens(argv);
  } catch (error) {
    exitWithError("Tokens pass", error);
  }
}

/**
 * bundlemeta tokens <dataset-dir> - fills the tokens table
 */
export const tokensCommand: CommandModule<{}, TokensArgs> = {
  command: "tokens <dataset-dir>",
  describe: "Count tokens for every bundle under a dataset directory",
  builder,
  handler: (argv: ArgumentsCamelCase<TokensArgs>) => tokensHandler(argv),
};
