import { existsSync } from "node:fs";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { basename, join } from "node:path";
import { simpleGit, type SimpleGit } from "simple-git";
import {
  EmptyRepositoryError,
  MaterializationError,
  createLogger,
  errorMessage,
} from "@bundlemeta/common";
import { diskUsageKb } from "./toolRunner";

const log = createLogger("materializer");

const BRANCH_REF_FORMAT = "%(refname)%09%(symref)%09%(committerdate:raw)";

export interface BranchRef {
  /** Full ref, e.g. refs/remotes/origin/main */
  ref: string;
  /** Branch name without the refs/heads/ or refs/remotes/<remote>/ prefix */
  name: string;
  remote: boolean;
  /** Committer timestamp of the branch tip, seconds since epoch */
  timestamp: number;
}

export interface MaterializedRepository {
  bundlePath: string;
  repoName: string;
  root: string;
  git: SimpleGit;
  selectedBranch: BranchRef;
  /** Local and remote branch heads as enumerated right after cloning */
  branches: readonly BranchRef[];
  /** Disk usage of .git right after cloning, before our checkout */
  historyKb: number;
  cleanup: () => Promise<void>;
}

export interface MaterializerOptions {
  /** Parent directory for temporary clones (default: OS temp dir) */
  tempRoot?: string;
}

export function repoNameFromBundle(bundlePath: string): string {
  return basename(bundlePath, ".bundle");
}

/**
 * Parse `git for-each-ref` output in BRANCH_REF_FORMAT.
 * Symbolic refs such as origin/HEAD are dropped.
 */
export function parseBranchRefs(output: string): BranchRef[] {
  const branches: BranchRef[] = [];
  for (const line of output.split("\n")) {
    if (!line.trim()) continue;
    const [ref = "", symref = "", rawDate = ""] = line.split("\t");
    if (symref) continue;

    let name: string;
    let remote: boolean;
    if (ref.startsWith("refs/heads/")) {
      name = ref.slice("refs/heads/".length);
      remote = false;
    } else if (ref.startsWith("refs/remotes/")) {
      const rest = ref.slice("refs/remotes/".length);
      const slash = rest.indexOf("/");
      if (slash < 0) continue;
      name = rest.slice(slash + 1);
      remote = true;
    } else {
      continue;
    }

    const timestamp = Number.parseInt(rawDate.trim().split(/\s+/)[0] ?? "", 10);
    if (!name || !Number.isFinite(timestamp)) continue;
    branches.push({ ref, name, remote, timestamp });
  }
  return branches;
}

/**
 * The branch whose tip commit is the most recent; the first one enumerated
 * wins a tie.
 */
export function selectBranch(branches: readonly BranchRef[]): BranchRef | undefined {
  let selected: BranchRef | undefined;
  for (const branch of branches) {
    if (!selected || branch.timestamp > selected.timestamp) {
      selected = branch;
    }
  }
  return selected;
}

const PASSTHROUGH_ENV = ["PATH", "HOME", "USERPROFILE", "SYSTEMROOT", "TMPDIR", "TEMP", "TMP", "LANG", "LC_ALL"];

/**
 * Environment for git child processes. simple-git refuses editor, pager and
 * credential-helper variables, so only the ones git needs to run are passed on.
 */
export function cloneEnv(source: NodeJS.ProcessEnv = process.env): Record<string, string> {
  const env: Record<string, string> = {};
  for (const key of PASSTHROUGH_ENV) {
    const value = source[key];
    if (value !== undefined) env[key] = value;
  }
  env.GIT_LFS_SKIP_SMUDGE = "1";
  env.GIT_TERMINAL_PROMPT = "0";
  return env;
}

/**
 * Turns a bundle into a branch-selected working copy in a private temporary
 * directory. Callers must release it with cleanup(), or use withRepository().
 */
export class RepositoryMaterializer {
  private readonly tempRoot: string;

  constructor(options: MaterializerOptions = {}) {
    this.tempRoot = options.tempRoot ?? tmpdir();
  }

  async materialize(bundlePath: string): Promise<MaterializedRepository> {
    const repoName = repoNameFromBundle(bundlePath);
    const tempDir = await mkdtemp(join(this.tempRoot, "bundlemeta-"));
    const cleanup = () => rm(tempDir, { recursive: true, force: true });

    try {
      return await this.cloneAndSelect(bundlePath, repoName, join(tempDir, repoName), cleanup);
    } catch (error) {
      await cleanup();
      throw error;
    }
  }

  /**
   * Scoped acquisition: the working copy is removed however fn finishes.
   */
  async withRepository<T>(bundlePath: string, fn: (repo: MaterializedRepository) => Promise<T>): Promise<T> {
    const repo = await this.materialize(bundlePath);
    try {
      return await fn(repo);
    } finally {
      await repo.cleanup();
    }
  }

  private async cloneAndSelect(
    bundlePath: string,
    repoName: string,
    root: string,
    cleanup: () => Promise<void>,
  ): Promise<MaterializedRepository> {
    const env = cloneEnv();

    try {
      await simpleGit().env(env).clone(bundlePath, root, ["--no-recurse-submodules", "--quiet"]);
    } catch (error) {
      throw new MaterializationError(bundlePath, `Failed to clone ${bundlePath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    if (!existsSync(root)) {
      throw new MaterializationError(bundlePath, `Clone of ${bundlePath} produced no working copy`);
    }
    log.debug(`Cloned ${basename(bundlePath)} into ${root}`);

    const git = simpleGit({ baseDir: root }).env(env);

    let historyKb = 0;
    try {
      historyKb = await diskUsageKb(join(root, ".git"));
    } catch (error) {
      log.warn(`${repoName}: could not measure history store, repo_git_history_mb recorded as 0 (${errorMessage(error)})`);
    }

    let branches: BranchRef[] = [];
    try {
      branches = parseBranchRefs(await git.raw(["for-each-ref", `--format=${BRANCH_REF_FORMAT}`, "refs/heads", "refs/remotes"]));
    } catch (error) {
      log.debug(`Could not enumerate branches of ${repoName}: ${errorMessage(error)}`);
    }

    const selectedBranch = selectBranch(branches);
    if (!selectedBranch) {
      throw new EmptyRepositoryError(bundlePath);
    }

    try {
      await git.raw(["checkout", "--quiet", "--force", "-B", selectedBranch.name, selectedBranch.ref]);
    } catch (error) {
      throw new MaterializationError(
        bundlePath,
        `Failed to check out ${selectedBranch.ref} in ${repoName}: ${errorMessage(error)}`,
        { cause: error },
      );
    }
    log.debug(`Selected ${selectedBranch.ref} for ${repoName}`);

    return { bundlePath, repoName, root, git, selectedBranch, branches, historyKb, cleanup };
  }
}
