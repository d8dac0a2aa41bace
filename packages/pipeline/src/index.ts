/**
 * @bundlemeta/pipeline main entry point
 * Materializes Git bundles and measures each repository
 */

export { RepoAnalyzer } from "./services/RepoAnalyzer";
export { RepositoryMaterializer, parseBranchRefs, selectBranch, repoNameFromBundle } from "./services/RepositoryMaterializer";
export { AllowedFiles, isUtf8File } from "./services/AllowedFiles";
export { findBundles } from "./services/bundleScanner";
export { inspectHistory, countDistinctAuthors } from "./services/historyInspector";
export { inspectSizes, bundleSizeMb } from "./services/sizeInspector";
export { detectLicense, classifyLicense } from "./services/licenseDetector";
export { CodeMetricsCollector } from "./services/codeMetrics/CodeMetricsCollector";
export { ClocLineCounter, parseClocOutput } from "./services/codeMetrics/LineCounter";
export { languageDistribution, renderStack, docstringRatio } from "./services/codeMetrics/languageStats";
export { duplicationRatio, readmeLineCount } from "./services/codeMetrics/textMetrics";
export { TreeSitterGrammarProvider } from "./services/functionLength/GrammarProvider";
export { estimateAvgFunctionLength } from "./services/functionLength/functionLength";
export { TokenizationEngine } from "./services/tokenization/TokenizationEngine";
export { TiktokenResolver, TIKTOKEN_ENCODINGS } from "./services/tokenization/TokenCounter";
export { extractAddedLines } from "./services/tokenization/addedLines";
export { chunkLines, packBatches } from "./services/tokenization/batching";
export { CsvTableWriter } from "./services/output/CsvTableWriter";
export { mergeTableFiles, mergeTables, MERGED_COLUMNS } from "./services/output/tableMerger";
export { parseCsv, readCsvTable, csvEscape } from "./services/output/csv";

export type { RepoAnalyzerOptions, RunSummary, MetadataMeasurements } from "./services/RepoAnalyzer";
export type { BranchRef, MaterializedRepository, MaterializerOptions } from "./services/RepositoryMaterializer";
export type { HistoryStats } from "./services/historyInspector";
export type { SizeStats } from "./services/sizeInspector";
export type { CodeMetrics, CodeMetricsOptions } from "./services/codeMetrics/CodeMetricsCollector";
export type { LineCounter, LineCountRequest, LineCountResult, LineCountStats } from "./services/codeMetrics/LineCounter";
export type { GrammarProvider, SyntaxParser, SyntaxNodeLike } from "./services/functionLength/GrammarProvider";
export type { TokenCounter, TokenizerResolver } from "./services/tokenization/TokenCounter";
export type { TokenCounts } from "./services/tokenization/TokenizationEngine";
export type { MergeSummary } from "./services/output/tableMerger";
export type { CsvTable } from "./services/output/csv";
