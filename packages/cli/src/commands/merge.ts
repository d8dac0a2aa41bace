import type { ArgumentsCamelCase, Argv, CommandModule } from "yargs";
import chalk from "chalk";
import { resolve } from "node:path";
import { mergeTableFiles } from "@bundlemeta/pipeline";
import { exitWithError } from "../utils/report";

export interface MergeArgs {
  "metadata-csv": string;
  "tokens-csv": string;
  "output-csv": string;
}

export interface MergeOptions {
  metadataCsv: string;
  tokensCsv: string;
  outputCsv: string;
}

const builder = (yargs: Argv) =>
  yargs
    .positional("metadata-csv", {
      type: "string",
      describe: "Metadata table",
      demandOption: true,
    })
    .positional("tokens-csv", {
      type: "string",
      describe: "Tokens table",
      demandOption: true,
    })
    .option("output-csv", {
      type: "string",
      describe: "Merged table to write",
      default: "repo_metadata_with_tokens.csv",
    });

export async function runMerge(args: MergeOptions): Promise<void> {
  const outputCsv = resolve(args.outputCsv);
  const summary = await mergeTableFiles(resolve(args.metadataCsv), resolve(args.tokensCsv), outputCsv);
  console.log(chalk.green(`Merged ${summary.rows} repositories -> ${outputCsv}`));
}

export async function mergeHandler(argv: MergeOptions): Promise<void> {
  try {
    await runMerge(argv);
  } catch (error) {
    exitWithError("Merge", error);
  }
}

/**
 * bundlemeta merge <metadata-csv> <tokens-csv> - joins both tables on repo_name
 */
export const mergeCommand: CommandModule<{}, MergeArgs> = {
  command: "merge <metadata-csv> <tokens-csv>",
  describe: "Join the metadata and tokens tables on repo_name",
  builder,
  handler: (argv: ArgumentsCamelCase<MergeArgs>) => mergeHandler(argv),
};
