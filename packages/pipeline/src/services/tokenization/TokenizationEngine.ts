import { readFile } from "node:fs/promises";
import { createLogger, errorMessage, type AppConfig } from "@bundlemeta/common";
import type { AllowedFiles } from "../AllowedFiles";
import type { MaterializedRepository } from "../RepositoryMaterializer";
import { extractAddedLines } from "./addedLines";
import { BatchBuilder, chunkLines, type BatchLimits } from "./batching";
import { TiktokenResolver, type TokenCounter, type TokenizerResolver } from "./TokenCounter";

const log = createLogger("tokens");

export interface TokenCounts {
  /** Tokens of every allowed file at the branch tip */
  snapshot: number;
  /** Tokens of the lines added by the branch's last commit */
  lastCommitAdded: number;
}

export interface TokenizationOptions {
  tokenizerId?: string;
  resolver?: TokenizerResolver;
}

/**
 * Counts tokens for one run. The tokenizer is resolved once, on first use;
 * without one every count is 0.
 */
export class TokenizationEngine {
  private readonly tokenizerId: string | undefined;
  private readonly resolver: TokenizerResolver;
  private readonly maxLength: number;
  private readonly limits: BatchLimits;
  private counter: Promise<TokenCounter | null> | undefined;

  constructor(config: AppConfig, options: TokenizationOptions = {}) {
    this.tokenizerId = options.tokenizerId;
    this.resolver = options.resolver ?? new TiktokenResolver();
    this.maxLength = config.tokens.maxLength;
    this.limits = { batchSize: config.tokens.batchSize, maxBatchChars: config.tokens.maxBatchChars };
  }

  /** The run's token counter, or null when token counting is disabled */
  tokenCounter(): Promise<TokenCounter | null> {
    this.counter ??= this.resolveCounter();
    return this.counter;
  }

  async isAvailable(): Promise<boolean> {
    return (await this.tokenCounter()) !== null;
  }

  async count(repo: MaterializedRepository, allowedFiles: AllowedFiles, codeFiles: readonly string[]): Promise<TokenCounts> {
    const counter = await this.tokenCounter();
    if (!counter) return { snapshot: 0, lastCommitAdded: 0 };

    let lastCommitAdded = 0;
    try {
      const diff = await repo.git.raw([
        "show",
        "--format=",
        "--unified=0",
        "--no-color",
        "--diff-merges=first-parent",
        repo.selectedBranch.ref,
      ]);
      lastCommitAdded = await this.countAddedLines(counter, extractAddedLines(diff, allowedFiles));
    } catch (error) {
      log.warn(`${repo.repoName}: last-commit tokens unavailable (${errorMessage(error)})`);
    }

    let snapshot = 0;
    try {
      snapshot = await this.countChunks(counter, readFiles(codeFiles));
    } catch (error) {
      log.warn(`${repo.repoName}: snapshot tokens unavailable (${errorMessage(error)})`);
    }

    return { snapshot, lastCommitAdded };
  }

  countAddedLines(counter: TokenCounter, lines: readonly string[]): Promise<number> {
    return this.countChunks(counter, chunkLines(lines, this.maxLength));
  }

  /** Batch chunks under the configured limits and sum their token counts */
  async countChunks(counter: TokenCounter, chunks: Iterable<string> | AsyncIterable<string>): Promise<number> {
    const builder = new BatchBuilder(this.limits);
    let total = 0;
    for await (const chunk of chunks) {
      const completed = builder.push(chunk);
      if (completed) total += await this.countBatch(counter, completed);
    }
    const last = builder.flush();
    if (last) total += await this.countBatch(counter, last);
    return total;
  }

  async close(): Promise<void> {
    const pending = this.counter;
    this.counter = undefined;
    const counter = await pending;
    counter?.close();
  }

  private async countBatch(counter: TokenCounter, batch: string[]): Promise<number> {
    const counts = await counter.countBatch(batch);
    let total = 0;
    for (const n of counts) {
      if (n > this.maxLength) {
        log.debug(`Oversized unit of ${n} tokens (limit ${this.maxLength})`);
      }
      total += n;
    }
    return total;
  }

  private async resolveCounter(): Promise<TokenCounter | null> {
    if (!this.tokenizerId) {
      log.info("No tokenizer id configured; token counts will be 0");
      return null;
    }
    try {
      const counter = await this.resolver.resolve(this.tokenizerId);
      log.info(`Using tokenizer ${counter.id}`);
      return counter;
    } catch (error) {
      log.warn(`Tokenizer ${this.tokenizerId} unavailable; token counts will be 0 (${errorMessage(error)})`);
      return null;
    }
  }
}

async function* readFiles(files: readonly string[]): AsyncGenerator<string> {
  for (const file of files) {
    let text: string;
    try {
      text = await readFile(file, "utf8");
    } catch (error) {
      log.debug(`Skipping unreadable ${file}: ${errorMessage(error)}`);
      continue;
    }
    if (text) yield text;
  }
}
