import type Parser from "tree-sitter";
import { createLogger, errorMessage } from "@bundlemeta/common";

const log = createLogger("tree-sitter");

/** Minimal view of a syntax tree node */
export interface SyntaxNodeLike {
  type: string;
  startPosition: { row: number };
  endPosition: { row: number };
  children: readonly SyntaxNodeLike[];
}

export interface SyntaxParser {
  /** Parse source text and return the root node */
  parse(text: string): SyntaxNodeLike;
}

/**
 * language name -> parser, or null when no grammar is available.
 */
export interface GrammarProvider {
  parserFor(language: string): Promise<SyntaxParser | null>;
}

export interface GrammarDefinition {
  moduleName: string;
  /** Named export holding the grammar, for packages shipping several */
  exportName?: string;
}

export const GRAMMAR_DEFINITIONS: Readonly<Record<string, GrammarDefinition>> = {
  javascript: { moduleName: "tree-sitter-javascript" },
  typescript: { moduleName: "tree-sitter-typescript", exportName: "typescript" },
  tsx: { moduleName: "tree-sitter-typescript", exportName: "tsx" },
  python: { moduleName: "tree-sitter-python" },
  go: { moduleName: "tree-sitter-go" },
  rust: { moduleName: "tree-sitter-rust" },
  java: { moduleName: "tree-sitter-java" },
};

const PARSE_CHUNK_CHARS = 4096;

function property(value: unknown, key: string): unknown {
  if ((typeof value === "object" || typeof value === "function") && value !== null && key in value) {
    return Reflect.get(value, key);
  }
  return undefined;
}

/** Grammar object out of a loaded module, looking through an interop default */
export function extractLanguage(mod: unknown, exportName?: string): unknown {
  const base = property(mod, "default") ?? mod;
  if (!exportName) return base;
  return property(mod, exportName) ?? property(base, exportName);
}

class TreeSitterParser implements SyntaxParser {
  constructor(private readonly parser: Parser) {}

  parse(text: string): SyntaxNodeLike {
    // chunked input; whole strings over 32 KiB are rejected by the binding
    const tree = this.parser.parse((index: number) =>
      index < text.length ? text.slice(index, index + PARSE_CHUNK_CHARS) : null,
    );
    return tree.rootNode;
  }
}

/**
 * Loads tree-sitter and grammar packages on first use. A grammar that
 * fails to load is logged once and remembered as unavailable.
 */
export class TreeSitterGrammarProvider implements GrammarProvider {
  private readonly cache = new Map<string, Promise<SyntaxParser | null>>();

  constructor(private readonly definitions: Readonly<Record<string, GrammarDefinition>> = GRAMMAR_DEFINITIONS) {}

  parserFor(language: string): Promise<SyntaxParser | null> {
    let pending = this.cache.get(language);
    if (!pending) {
      pending = this.load(language);
      this.cache.set(language, pending);
    }
    return pending;
  }

  private async load(language: string): Promise<SyntaxParser | null> {
    const definition = this.definitions[language];
    if (!definition) {
      log.debug(`No grammar registered for ${language}`);
      return null;
    }

    try {
      const moduleName: string = definition.moduleName;
      const mod: unknown = await import(moduleName);
      const grammar = extractLanguage(mod, definition.exportName);
      if (grammar === undefined) {
        log.warn(`Grammar ${definition.moduleName} has no ${definition.exportName ?? "default"} export`);
        return null;
      }
      const { default: TreeSitter } = await import("tree-sitter");
      const parser = new TreeSitter();
      parser.setLanguage(grammar);
      log.debug(`Loaded grammar for ${language}`);
      return new TreeSitterParser(parser);
    } catch (error) {
      log.warn(`Grammar for ${language} unavailable: ${errorMessage(error)}`);
      return null;
    }
  }
}
