/**
 * Term-frequency cosine similarity
 */

import { loadLexicon, StopwordLexiconSchema } from './lexicons.js';
import type { SimilarityScorer } from './types.js';

export interface CosineSimilarityScorerOptions {
  lexiconDir?: string;
  stopwords?: readonly string[];
}

/**
 * Lowercased content terms with stopwords and single characters removed.
 * A trailing plural "s" is dropped so "capitals" and "capital" agree.
 */
export function contentTerms(text: string, stopwords: ReadonlySet<string>): string[] {
  const words = text.toLowerCase().match(/[a-z0-9]+/g) ?? [];
  return words
    .filter((w) => w.length > 1 && !stopwords.has(w))
    .map((w) => (w.length > 3 && w.endsWith('s') && !w.endsWith('ss') ? w.slice(0, -1) : w));
}

function frequencies(terms: string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const term of terms) {
    counts.set(term, (counts.get(term) ?? 0) + 1);
  }
  return counts;
}

function norm(vector: Map<string, number>): number {
  let sum = 0;
  for (const value of vector.values()) {
    sum += value * value;
  }
  return Math.sqrt(sum);
}

export class CosineSimilarityScorer implements SimilarityScorer {
  private readonly stopwords: ReadonlySet<string>;

  constructor(options: CosineSimilarityScorerOptions = {}) {
    const words = options.stopwords ?? loadLexicon('stopwords', StopwordLexiconSchema, options.lexiconDir).words;
    this.stopwords = new Set(words.map((w) => w.toLowerCase()));
  }

  similarity(a: string, b: string): number | null {
    const left = frequencies(contentTerms(a, this.stopwords));
    const right = frequencies(contentTerms(b, this.stopwords));
    if (left.size === 0 || right.size === 0) {
      return null;
    }

    let dot = 0;
    for (const [term, count] of left) {
      dot += count * (right.get(term) ?? 0);
    }
    return Math.min(1, dot / (norm(left) * norm(right)));
  }
}
