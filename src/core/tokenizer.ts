import type { Word } from "./types.js";

/**
 * Turns text into a deduplicated vocabulary.
 *
 * Contract notes:
 * - deterministic, no side effects
 * - the same instance must serve indexing and querying so both sides share a vocabulary
 */
export interface Tokenizer {
  tokenize(text: string): Set<Word>;
  /** Number of whitespace-delimited tokens in the raw text. */
  countWords(text: string): number;
}
