import yargs from "yargs";
import { LOG_LEVELS, getLogLevel, setLogLevel } from "@bundlemeta/common";
import { initCommand } from "./commands/init";
import { mergeCommand } from "./commands/merge";
import { metadataCommand } from "./commands/metadata";
import { tokensCommand } from "./commands/tokens";

export function createCli(args: string[]) {
  return yargs(args)
    .scriptName("bundlemeta")
    .usage("$0 <cmd> [args]")
    .option("log-level", {
      type: "string",
      choices: LOG_LEVELS,
      describe: "Minimum level of log messages (also $BUNDLEMETA_LOG_LEVEL)",
      default: getLogLevel(),
      global: true,
    })
    .middleware((argv) => {
      setLogLevel(argv["log-level"]);
    })
    .command(metadataCommand)
    .command(tokensCommand)
    .command(mergeCommand)
    .command(initCommand)
    .demandCommand(1, "Please specify a command.")
    .help()
    .version()
    .strict();
}
