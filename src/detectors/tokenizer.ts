/**
 * Heuristic token counter
 *
 * Approximates a subword tokenizer without a vocabulary: letter runs cost
 * one token per four characters, digit runs one per three, and every other
 * non-space character is a token of its own.
 */

import type { Tokenizer } from './types.js';

const CHARS_PER_WORD_TOKEN = 4;
const CHARS_PER_DIGIT_TOKEN = 3;

export class HeuristicTokenizer implements Tokenizer {
  count(text: string): number {
    let tokens = 0;
    for (const match of text.matchAll(/\p{L}+|\p{N}+|[^\s\p{L}\p{N}]/gu)) {
      const run = match[0];
      if (/^\p{L}/u.test(run)) {
        tokens += Math.ceil(run.length / CHARS_PER_WORD_TOKEN);
      } else if (/^\p{N}/u.test(run)) {
        tokens += Math.ceil(run.length / CHARS_PER_DIGIT_TOKEN);
      } else {
        tokens += 1;
      }
    }
    return tokens;
  }
}
