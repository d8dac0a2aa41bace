import { createLogger, errorMessage } from "@bundlemeta/common";
import type { MaterializedRepository } from "./RepositoryMaterializer";

const log = createLogger("history");

export interface HistoryStats {
  createdAt: string;
  commitCount: number;
  branchCount: number;
  contributorsCount: number;
}

/**
 * Distinct "name <email>" keys. Case and whitespace variants count as
 * different authors.
 */
export function countDistinctAuthors(logOutput: string): number {
  const authors = new Set<string>();
  for (const line of logOutput.split("\n")) {
    if (line.trim()) authors.add(line);
  }
  return authors.size;
}

/** First non-empty line of `git log --reverse` output */
export function firstLine(output: string): string {
  return output.split("\n").find((line) => line.trim() !== "")?.trim() ?? "";
}

async function query<T>(repo: MaterializedRepository, field: string, fallback: T, run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (error) {
    log.warn(`${repo.repoName}: could not read ${field} (${errorMessage(error)})`);
    return fallback;
  }
}

/**
 * Creation date and commit count follow the selected branch; branch count
 * and contributors cover the whole repository.
 */
export async function inspectHistory(repo: MaterializedRepository): Promise<HistoryStats> {
  const ref = repo.selectedBranch.ref;

  const createdAt = await query(repo, "created_at", "", async () =>
    firstLine(await repo.git.raw(["log", "--reverse", "--format=%aI", ref])),
  );

  const commitCount = await query(repo, "commit_count", 0, async () => {
    const count = Number.parseInt((await repo.git.raw(["rev-list", "--count", ref])).trim(), 10);
    return Number.isFinite(count) ? count : 0;
  });

  const contributorsCount = await query(repo, "contributors_count", 0, async () =>
    countDistinctAuthors(await repo.git.raw(["log", "--all", "--format=%an <%ae>"])),
  );

  return {
    createdAt,
    commitCount,
    branchCount: repo.branches.length,
    contributorsCount,
  };
}
