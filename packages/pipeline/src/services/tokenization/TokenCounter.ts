import { get_encoding, type Tiktoken, type TiktokenEncoding } from "tiktoken";
import { TokenizerUnavailableError, errorMessage } from "@bundlemeta/common";

/**
 * Counts tokens of each chunk in a batch, without special tokens and
 * without truncation.
 */
export interface TokenCounter {
  readonly id: string;
  countBatch(chunks: readonly string[]): Promise<number[]>;
  /** Release native resources */
  close(): void;
}

/** Tokenizer identifier -> TokenCounter */
export interface TokenizerResolver {
  /** @throws {TokenizerUnavailableError} for unknown or unloadable identifiers */
  resolve(tokenizerId: string): Promise<TokenCounter>;
}

export const TIKTOKEN_ENCODINGS = [
  "gpt2",
  "r50k_base",
  "p50k_base",
  "p50k_edit",
  "cl100k_base",
  "o200k_base",
] as const satisfies readonly TiktokenEncoding[];

export function isTiktokenEncoding(value: string): value is (typeof TIKTOKEN_ENCODINGS)[number] {
  const known: readonly string[] = TIKTOKEN_ENCODINGS;
  return known.includes(value);
}

class TiktokenCounter implements TokenCounter {
  constructor(
    readonly id: string,
    private readonly encoding: Tiktoken,
  ) {}

  async countBatch(chunks: readonly string[]): Promise<number[]> {
    return chunks.map((chunk) => this.encoding.encode_ordinary(chunk).length);
  }

  close(): void {
    this.encoding.free();
  }
}

/**
 * Resolves identifiers naming a tiktoken encoding (cl100k_base, o200k_base, ...).
 */
export class TiktokenResolver implements TokenizerResolver {
  async resolve(tokenizerId: string): Promise<TokenCounter> {
    if (!isTiktokenEncoding(tokenizerId)) {
      throw new TokenizerUnavailableError(
        tokenizerId,
        `Unknown tokenizer "${tokenizerId}"; expected one of ${TIKTOKEN_ENCODINGS.join(", ")}`,
      );
    }
    try {
      return new TiktokenCounter(tokenizerId, get_encoding(tokenizerId));
    } catch (error) {
      throw new TokenizerUnavailableError(tokenizerId, `Failed to load tokenizer ${tokenizerId}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}
