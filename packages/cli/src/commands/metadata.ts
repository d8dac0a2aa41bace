import type { ArgumentsCamelCase, Argv, CommandModule } from "yargs";
import { existsSync } from "node:fs";
import { resolve } from "node:path";
import { loadConfig } from "@bundlemeta/common";
import { RepoAnalyzer } from "@bundlemeta/pipeline";
import { exitWithError, parseList, printRunSummary } from "../utils/report";

export interface MetadataArgs {
  "dataset-dir": string;
  "output-csv": string;
  config: string | undefined;
  "skip-tree-sitter": boolean;
  "include-lang": string | undefined;
}

export interface MetadataOptions {
  datasetDir: string;
  outputCsv: string;
  config?: string;
  skipTreeSitter: boolean;
  includeLang?: string;
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
      describe: "Metadata table to append to",
      default: "repo_metadata.csv",
    })
    .option("config", {
      type: "string",
      describe: "Configuration file (default: repo-metadata.config.json)",
    })
    .option("skip-tree-sitter", {
      type: "boolean",
      describe: "Do not estimate average function length",
      default: false,
    })
    .option("include-lang", {
      type: "string",
      describe: "Comma-separated languages for the line counter; overrides files.includeLanguages",
    });

export async function runMetadata(args: MetadataOptions): Promise<void> {
  const datasetDir = resolve(args.datasetDir);
  if (!existsSync(datasetDir)) {
    throw new Error(`Dataset directory does not exist: ${datasetDir}`);
  }

  const config = loadConfig(args.config);
  const outputCsv = resolve(args.outputCsv);
  const analyzer = new RepoAnalyzer({
    config,
    grammarProvider: args.skipTreeSitter ? null : undefined,
    includeLanguages: parseList(args.includeLang),
  });

  try {
    const summary = await analyzer.runMetadataPipeline(datasetDir, outputCsv);
    printRunSummary("Metadata", outputCsv, summary);
  } finally {
    await analyzer.close();
  }
}

export async function metadataHandler(argv: MetadataOptions): Promise<void> {
  try {
    await runMetadata(argv);
  } catch (error) {
    exitWithError("Metadata pass", error);
  }
}

/**
 * bundlemeta metadata <dataset-dir> - fills the metadata table
 */
export const metadataCommand: CommandModule<{}, MetadataArgs> = {
  command: "metadata <dataset-dir>",
  describe: "Compute repository metadata for every bundle under a dataset directory",
  builder,
  handler: (argv: ArgumentsCamelCase<MetadataArgs>) => metadataHandler(argv),
};
