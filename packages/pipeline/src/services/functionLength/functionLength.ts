import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import { createLogger, errorMessage, type AppConfig } from "@bundlemeta/common";
import type { GrammarProvider, SyntaxNodeLike } from "./GrammarProvider";

const log = createLogger("tree-sitter");

export interface FunctionSpanTotals {
  functions: number;
  lines: number;
}

/** Depth-first walk summing the row span of every node of the given types */
export function collectFunctionSpans(root: SyntaxNodeLike, nodeTypes: ReadonlySet<string>): FunctionSpanTotals {
  const totals: FunctionSpanTotals = { functions: 0, lines: 0 };
  const stack: SyntaxNodeLike[] = [root];
  let node = stack.pop();
  while (node) {
    if (nodeTypes.has(node.type)) {
      totals.functions += 1;
      totals.lines += node.endPosition.row - node.startPosition.row + 1;
    }
    for (const child of node.children) stack.push(child);
    node = stack.pop();
  }
  return totals;
}

/**
 * Mean line span of function-like nodes across the allowed files.
 * 0 means not measured: no provider, no grammar or no functions.
 */
export async function estimateAvgFunctionLength(
  files: readonly string[],
  config: AppConfig,
  provider: GrammarProvider | null,
): Promise<number> {
  if (!provider) return 0;

  const { extensionLanguageMap, langFuncNodeTypes } = config.treeSitter;
  const nodeTypeSets = new Map<string, ReadonlySet<string>>();
  let functions = 0;
  let lines = 0;

  for (const file of files) {
    const language = extensionLanguageMap[extname(file).toLowerCase()];
    if (!language) continue;

    let nodeTypes = nodeTypeSets.get(language);
    if (!nodeTypes) {
      nodeTypes = new Set(langFuncNodeTypes[language] ?? []);
      nodeTypeSets.set(language, nodeTypes);
    }
    if (nodeTypes.size === 0) continue;

    const parser = await provider.parserFor(language);
    if (!parser) continue;

    try {
      const text = await readFile(file, "utf8");
      if (text.trim() === "") continue;
      const totals = collectFunctionSpans(parser.parse(text), nodeTypes);
      functions += totals.functions;
      lines += totals.lines;
    } catch (error) {
      log.debug(`Skipping ${file}: ${errorMessage(error)}`);
    }
  }

  return functions === 0 ? 0 : lines / functions;
}
