import { randomUUID } from "node:crypto";
import { existsSync, statSync } from "node:fs";
import {
  BundleMetaError,
  METADATA_COLUMNS,
  TOKENS_COLUMNS,
  createLogger,
  errorMessage,
  isRepositoryFatal,
  type AppConfig,
  type MetadataRow,
  type TokensRow,
} from "@bundlemeta/common";
import { AllowedFiles } from "./AllowedFiles";
import { findBundles } from "./bundleScanner";
import { CodeMetricsCollector } from "./codeMetrics/CodeMetricsCollector";
import type { LineCounter } from "./codeMetrics/LineCounter";
import { estimateAvgFunctionLength } from "./functionLength/functionLength";
import { TreeSitterGrammarProvider, type GrammarProvider } from "./functionLength/GrammarProvider";
import { inspectHistory } from "./historyInspector";
import { detectLicense } from "./licenseDetector";
import { CsvTableWriter } from "./output/CsvTableWriter";
import { RepositoryMaterializer, repoNameFromBundle } from "./RepositoryMaterializer";
import { inspectSizes } from "./sizeInspector";
import { TokenizationEngine } from "./tokenization/TokenizationEngine";
import type { TokenizerResolver } from "./tokenization/TokenCounter";

const log = createLogger("analyzer");

export type MetadataMeasurements = Omit<MetadataRow, "repo_id">;

export interface RunSummary {
  found: number;
  processed: number;
  skipped: number;
  failed: number;
}

export interface RepoAnalyzerOptions {
  config: AppConfig;
  materializer?: RepositoryMaterializer;
  lineCounter?: LineCounter;
  /** null disables the function length estimator */
  grammarProvider?: GrammarProvider | null;
  /** Overrides files.includeLanguages */
  includeLanguages?: readonly string[];
  tokenizerId?: string;
  tokenizerResolver?: TokenizerResolver;
}

/**
 * Per-bundle measurements and the two table-filling passes.
 */
export class RepoAnalyzer {
  private readonly config: AppConfig;
  private readonly materializer: RepositoryMaterializer;
  private readonly allowedFiles: AllowedFiles;
  private readonly codeMetrics: CodeMetricsCollector;
  private readonly grammarProvider: GrammarProvider | null;
  private readonly tokens: TokenizationEngine;

  constructor(options: RepoAnalyzerOptions) {
    this.config = options.config;
    this.materializer = options.materializer ?? new RepositoryMaterializer();
    this.allowedFiles = AllowedFiles.fromConfig(options.config);
    this.codeMetrics = new CodeMetricsCollector({
      lineCounter: options.lineCounter,
      includeLanguages: options.includeLanguages ?? options.config.files.includeLanguages,
    });
    this.grammarProvider =
      options.grammarProvider === undefined ? new TreeSitterGrammarProvider() : options.grammarProvider;
    this.tokens = new TokenizationEngine(options.config, {
      tokenizerId: options.tokenizerId,
      resolver: options.tokenizerResolver,
    });
  }

  /**
   * @throws {MaterializationError | EmptyRepositoryError} when the bundle
   * cannot be turned into a working copy
   */
  async analyzeRepoMetadata(bundlePath: string): Promise<MetadataMeasurements> {
    log.debug(`Processing metadata for ${repoNameFromBundle(bundlePath)}`);

    return this.materializer.withRepository(bundlePath, async (repo) => {
      const history = await inspectHistory(repo);
      const sizes = await inspectSizes(repo);
      const license = await detectLicense(repo.root);
      const codeFiles = await this.allowedFiles.findCodeFiles(repo.root);
      const metrics = await this.codeMetrics.collect(repo.repoName, repo.root, codeFiles);
      const avgFuncLength = await estimateAvgFunctionLength(codeFiles, this.config, this.grammarProvider);

      return {
        repo_name: repo.repoName,
        languages: metrics.languages,
        stack: metrics.stack,
        license_type: license,
        created_at: history.createdAt,
        commit_count: history.commitCount,
        branch_count: history.branchCount,
        contributors_count: history.contributorsCount,
        repo_git_history_mb: sizes.gitHistoryMb,
        repo_bundle_mb: sizes.bundleMb,
        repo_worktree_mb: sizes.worktreeMb,
        files: metrics.files,
        loc: metrics.loc,
        raw_loc: metrics.rawLoc,
        avg_func_length: avgFuncLength,
        docstring_ratio: metrics.docstringRatio,
        duplication_ratio: metrics.duplicationRatio,
        documentation_cnt: metrics.documentationCnt,
      };
    });
  }

  /**
   * Token counts for one bundle. Without a tokenizer the bundle is not
   * materialized and both counts are 0.
   */
  async analyzeRepoTokens(bundlePath: string): Promise<TokensRow> {
    const repoName = repoNameFromBundle(bundlePath);
    if (!(await this.tokens.isAvailable())) {
      log.debug(`Tokenizer unavailable; skipping token stats for ${repoName}`);
      return { repo_name: repoName, deepseek_token_count_all_commits: 0, deepseek_token_count_last_commit: 0 };
    }

    return this.materializer.withRepository(bundlePath, async (repo) => {
      const codeFiles = await this.allowedFiles.findCodeFiles(repo.root);
      const counts = await this.tokens.count(repo, this.allowedFiles, codeFiles);
      return {
        repo_name: repo.repoName,
        deepseek_token_count_all_commits: counts.lastCommitAdded,
        deepseek_token_count_last_commit: counts.snapshot,
      };
    });
  }

  async runMetadataPipeline(datasetDir: string, csvPath: string): Promise<RunSummary> {
    const writer = new CsvTableWriter(csvPath, METADATA_COLUMNS);
    return this.processBundles("Metadata", datasetDir, writer, async (bundlePath) => ({
      repo_id: randomUUID(),
      ...(await this.analyzeRepoMetadata(bundlePath)),
    }));
  }

  async runTokensPipeline(datasetDir: string, csvPath: string): Promise<RunSummary> {
    const writer = new CsvTableWriter(csvPath, TOKENS_COLUMNS);
    if (!(await this.tokens.isAvailable())) {
      log.warn("Tokenizer is not available; token stats will be zeros");
    }
    return this.processBundles("Tokens", datasetDir, writer, (bundlePath) => this.analyzeRepoTokens(bundlePath));
  }

  /** Release the tokenizer */
  close(): Promise<void> {
    return this.tokens.close();
  }

  private async processBundles<Column extends string>(
    label: string,
    datasetDir: string,
    writer: CsvTableWriter<Column>,
    analyze: (bundlePath: string) => Promise<Record<Column, string | number>>,
  ): Promise<RunSummary> {
    if (!existsSync(datasetDir) || !statSync(datasetDir).isDirectory()) {
      throw new BundleMetaError("INPUT_MISSING", `Dataset directory not found: ${datasetDir}`);
    }

    const bundles = await findBundles(datasetDir);
    const summary: RunSummary = { found: bundles.length, processed: 0, skipped: 0, failed: 0 };
    log.info(`Found ${bundles.length} bundle files under ${datasetDir}`);
    if (bundles.length === 0) {
      log.warn(`No *.bundle files found under ${datasetDir}; nothing to process`);
      return summary;
    }

    const processed = await writer.processedKeys();
    for (const [index, bundlePath] of bundles.entries()) {
      const repoName = repoNameFromBundle(bundlePath);
      if (processed.has(repoName)) {
        log.debug(`Skipping ${repoName} (already processed)`);
        summary.skipped += 1;
        continue;
      }

      log.info(`${label} [${index + 1}/${bundles.length}] ${repoName}`);
      let row: Record<Column, string | number>;
      try {
        row = await analyze(bundlePath);
      } catch (error) {
        summary.failed += 1;
        if (isRepositoryFatal(error)) {
          log.error(`Skipping ${repoName}: ${error.message}`);
        } else {
          log.error(`Skipping ${repoName}: unexpected failure (${errorMessage(error)})`);
        }
        continue;
      }

      await writer.append(row);
      processed.add(repoName);
      summary.processed += 1;
    }

    log.info(
      `${label} pipeline finished: ${summary.processed} processed, ${summary.skipped} skipped, ${summary.failed} failed`,
    );
    return summary;
  }
}
