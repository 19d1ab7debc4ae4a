/**
 * Refusal phrase detector
 */

import { loadLexicon, RefusalLexiconSchema, type RefusalLexicon } from './lexicons.js';
import type { RefusalDetector, RefusalVerdict } from './types.js';

export interface PhraseRefusalDetectorOptions {
  lexiconDir?: string;
  lexicon?: RefusalLexicon;
}

/**
 * Lowercase and straighten typographic apostrophes and quotes
 */
export function normalizeForPhrases(text: string): string {
  return text.toLowerCase().replace(/[‘’ʼ]/g, "'").replace(/\s+/g, ' ');
}

/**
 * Detects canned refusals by phrase lookup; the score is the weight of the
 * strongest phrase found
 */
export class PhraseRefusalDetector implements RefusalDetector {
  private readonly phrases: Array<{ phrase: string; weight: number }>;

  constructor(options: PhraseRefusalDetectorOptions = {}) {
    const lexicon = options.lexicon ?? loadLexicon('refusals', RefusalLexiconSchema, options.lexiconDir);
    this.phrases = Object.entries(lexicon.phrases).map(([phrase, weight]) => ({
      phrase: normalizeForPhrases(phrase),
      weight,
    }));
  }

  detect(text: string): RefusalVerdict {
    const normalized = normalizeForPhrases(text);
    let score = 0;
    const phrases: string[] = [];

    for (const { phrase, weight } of this.phrases) {
      if (normalized.includes(phrase)) {
        phrases.push(phrase);
        score = Math.max(score, weight);
      }
    }

    return { score, phrases };
  }
}
