import { createLogger, errorMessage } from "@bundlemeta/common";
import { docstringRatio, languageDistribution, renderStack } from "./languageStats";
import { ClocLineCounter, type LineCounter, type LineCountResult } from "./LineCounter";
import { duplicationRatio, readmeLineCount } from "./textMetrics";

const log = createLogger("metrics");

export interface CodeMetrics {
  files: number;
  loc: number;
  rawLoc: number;
  /** JSON-encoded language distribution, "" when not measured */
  languages: string;
  stack: string;
  docstringRatio: number;
  duplicationRatio: number;
  documentationCnt: number;
}

export interface CodeMetricsOptions {
  lineCounter?: LineCounter;
  /** Language allowlist passed to the line counter for the restricted run */
  includeLanguages?: readonly string[];
}

export class CodeMetricsCollector {
  private readonly lineCounter: LineCounter;
  private readonly includeLanguages: readonly string[];

  constructor(options: CodeMetricsOptions = {}) {
    this.lineCounter = options.lineCounter ?? new ClocLineCounter();
    this.includeLanguages = options.includeLanguages ?? [];
  }

  /**
   * @param root working copy root
   * @param codeFiles the allowed file set, absolute paths
   */
  async collect(repoName: string, root: string, codeFiles: readonly string[]): Promise<CodeMetrics> {
    const metrics: CodeMetrics = {
      files: 0,
      loc: 0,
      rawLoc: 0,
      languages: "",
      stack: "",
      docstringRatio: 0,
      duplicationRatio: 0,
      documentationCnt: 0,
    };

    try {
      metrics.documentationCnt = await readmeLineCount(root);
    } catch (error) {
      log.warn(`${repoName}: documentation_cnt unavailable (${errorMessage(error)})`);
    }

    metrics.duplicationRatio = await duplicationRatio(codeFiles);

    try {
      const unfiltered = await this.lineCounter.count({ root });
      if (!unfiltered) {
        log.warn(`${repoName}: line counter unavailable, line metrics recorded as 0`);
        return metrics;
      }
      metrics.rawLoc = unfiltered.summary.code + unfiltered.summary.comment;

      if (codeFiles.length === 0) {
        metrics.languages = "{}";
        return metrics;
      }

      const restricted = await this.lineCounter.count({
        root,
        files: codeFiles,
        includeLanguages: this.includeLanguages,
      });
      if (!restricted) {
        log.warn(`${repoName}: line counter unavailable, line metrics recorded as 0`);
        return metrics;
      }
      applyRestricted(metrics, restricted);
    } catch (error) {
      log.warn(`${repoName}: line counting failed, line metrics recorded as 0 (${errorMessage(error)})`);
      metrics.rawLoc = 0;
    }

    return metrics;
  }
}

function applyRestricted(metrics: CodeMetrics, result: LineCountResult): void {
  const distribution = languageDistribution(result.languages);
  metrics.files = result.summary.nFiles;
  metrics.loc = result.summary.code + result.summary.comment;
  metrics.docstringRatio = docstringRatio(result.summary);
  metrics.languages = JSON.stringify(distribution);
  metrics.stack = renderStack(distribution);
}
