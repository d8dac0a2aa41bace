import { stat } from "node:fs/promises";
import { join } from "node:path";
import { createLogger, errorMessage } from "@bundlemeta/common";
import type { MaterializedRepository } from "./RepositoryMaterializer";
import { diskUsageKb } from "./toolRunner";

const log = createLogger("size");

export interface SizeStats {
  bundleMb: number;
  gitHistoryMb: number;
  worktreeMb: number;
}

export function roundMb(value: number): number {
  return Math.round(value * 1000) / 1000;
}

export async function bundleSizeMb(bundlePath: string): Promise<number> {
  try {
    const { size } = await stat(bundlePath);
    return roundMb(size / (1024 * 1024));
  } catch (error) {
    log.debug(`Unable to stat bundle ${bundlePath}: ${errorMessage(error)}`);
    return 0;
  }
}

/**
 * Sizes are disk usage (du), so filesystem block size and compression
 * affect them. History is measured right after cloning; the working tree is
 * the whole copy minus .git, both measured after checkout.
 */
export async function inspectSizes(repo: MaterializedRepository): Promise<SizeStats> {
  const bundleMb = await bundleSizeMb(repo.bundlePath);

  let worktreeKb = 0;
  try {
    const totalKb = await diskUsageKb(repo.root);
    const gitKb = await diskUsageKb(join(repo.root, ".git"));
    worktreeKb = Math.max(totalKb - gitKb, 0);
  } catch (error) {
    log.warn(`${repo.repoName}: disk usage unavailable, worktree size recorded as 0 (${errorMessage(error)})`);
  }

  return {
    bundleMb,
    gitHistoryMb: roundMb(repo.historyKb / 1024),
    worktreeMb: roundMb(worktreeKb / 1024),
  };
}
