import chalk from "chalk";
import { errorMessage } from "@bundlemeta/common";
import type { RunSummary } from "@bundlemeta/pipeline";

/** Print a command failure and exit with status 1 */
export function exitWithError(label: string, error: unknown): never {
  console.error(chalk.red(`${label} failed: ${errorMessage(error)}`));
  process.exit(1);
}

export function printRunSummary(label: string, outputCsv: string, summary: RunSummary): void {
  if (summary.found === 0) {
    console.log(chalk.yellow(`${label}: no bundles found, ${outputCsv} left unchanged`));
    return;
  }
  console.log(
    chalk.green(
      `${label}: ${summary.processed} written, ${summary.skipped} already present, ${summary.failed} failed (${summary.found} bundles) -> ${outputCsv}`,
    ),
  );
}

/** "go, python" -> ["go", "python"]; blank input yields undefined */
export function parseList(value: string | undefined): string[] | undefined {
  const items = (value ?? "")
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item !== "");
  return items.length > 0 ? items : undefined;
}
