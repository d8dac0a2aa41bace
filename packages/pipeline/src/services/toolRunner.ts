import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { ToolError } from "@bundlemeta/common";

const execFileAsync = promisify(execFile);

const MAX_OUTPUT_BYTES = 256 * 1024 * 1024;

export interface RunToolOptions {
  cwd?: string;
}

function isMissingExecutable(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}

/**
 * Run an external tool and return its stdout.
 * @throws {ToolError} when the tool is missing or exits non-zero
 */
export async function runTool(command: string, args: string[], options: RunToolOptions = {}): Promise<string> {
  try {
    const { stdout } = await execFileAsync(command, args, {
      cwd: options.cwd,
      maxBuffer: MAX_OUTPUT_BYTES,
      encoding: "utf8",
    });
    return stdout;
  } catch (error) {
    const missing = isMissingExecutable(error);
    const reason = missing
      ? `${command} is not available on PATH`
      : `${command} ${args.join(" ")} failed: ${error instanceof Error ? error.message : String(error)}`;
    throw new ToolError(command, reason, missing, { cause: error });
  }
}

/** Parse the leading kilobyte count of `du -sk` output */
export function parseDiskUsageKb(output: string): number {
  const first = output.trim().split(/\s+/)[0];
  const kb = first ? Number.parseInt(first, 10) : Number.NaN;
  return Number.isFinite(kb) ? kb : 0;
}

/** Disk usage of a path in kilobytes, via `du -sk` */
export async function diskUsageKb(target: string): Promise<number> {
  return parseDiskUsageKb(await runTool("du", ["-sk", target]));
}
