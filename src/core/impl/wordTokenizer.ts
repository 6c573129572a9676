import type { Word } from "../types.js";
import type { Tokenizer } from "../tokenizer.js";

const MIN_WORD_LENGTH = 3;

// letters, combining marks, digits and underscore in any script
const WORD_RUN_RE = /[\p{L}\p{M}\p{N}_]+/gu;
const ASCII_WORD_RE = /^[a-z]+$/;

/**
 * ASCII word tokenizer:
 * - lowercases the whole input first
 * - splits into runs of word characters (any script, digits, underscore)
 * - keeps only runs made entirely of a-z and at least 3 characters long
 *
 * "café", "abc123def" and "foo_bar" yield nothing; they are never cut into fragments.
 */
export class WordTokenizer implements Tokenizer {
  tokenize(text: string): Set<Word> {
    const words = new Set<Word>();

    for (const [run] of text.toLowerCase().matchAll(WORD_RUN_RE)) {
      if (run.length >= MIN_WORD_LENGTH && ASCII_WORD_RE.test(run)) words.add(run);
    }

    return words;
  }

  countWords(text: string): number {
    let count = 0;
    for (const part of text.split(/\s+/)) {
      if (part.length) count++;
    }
    return count;
  }
}
