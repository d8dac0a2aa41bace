import type { ArgumentsCamelCase, Argv, CommandModule } from "yargs";
import chalk from "chalk";
import fs from "node:fs";
import path from "node:path";
import { DEFAULT_CONFIG_FILE, defaultConfigJson, resolveConfigPath } from "@bundlemeta/common";
import { exitWithError } from "../utils/report";

export interface InitArgs {
  config: string;
  force: boolean;
}

const builder = (yargs: Argv) =>
  yargs
    .option("config", {
      type: "string",
      describe: "Where to write the configuration file",
      default: DEFAULT_CONFIG_FILE,
    })
    .option("force", {
      type: "boolean",
      describe: "Overwrite an existing configuration file",
      default: false,
    });

/**
 * Write the built-in configuration to disk.
 * @returns the absolute path written
 */
export function writeDefaultConfig(args: InitArgs): string {
  const configPath = resolveConfigPath(args.config);
  if (fs.existsSync(configPath) && !args.force) {
    throw new Error(`${configPath} already exists; pass --force to overwrite it`);
  }
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, defaultConfigJson(), "utf8");
  return configPath;
}

export async function initHandler(argv: ArgumentsCamelCase<InitArgs>): Promise<void> {
  try {
    const configPath = writeDefaultConfig(argv);
    console.log(chalk.green(`Config saved to ${configPath}`));
  } catch (error) {
    exitWithError("Init", error);
  }
}

export const initCommand: CommandModule<{}, InitArgs> = {
  command: "init",
  describe: "Write the default configuration file",
  builder,
  handler: initHandler,
};
