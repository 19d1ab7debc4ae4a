/**
 * Weighted term matching shared by the lexical classifiers
 */

import type { TermHit } from './types.js';

export interface CompiledTerm {
  term: string;
  weight: number;
  regex: RegExp;
}

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Whole-word, case-insensitive pattern for a term. Inner whitespace matches
 * any run of whitespace; a plural suffix is allowed.
 */
export function termPattern(term: string): RegExp {
  const body = term.trim().split(/\s+/).map(escapeRegex).join('\\s+');
  return new RegExp(`\\b${body}(?:s|es)?\\b`, 'i');
}

export function compileTerms(entries: Record<string, number>): CompiledTerm[] {
  return Object.entries(entries).map(([term, weight]) => ({
    term,
    weight,
    regex: termPattern(term),
  }));
}

/**
 * Terms present in the text, each reported once
 */
export function matchTerms(text: string, terms: readonly CompiledTerm[]): TermHit[] {
  return terms.filter((t) => t.regex.test(text)).map((t) => ({ term: t.term, weight: t.weight }));
}

/**
 * Combine independent evidence weights: 1 - Π(1 - w)
 */
export function combineWeights(weights: readonly number[]): number {
  const miss = weights.reduce((acc, w) => acc * (1 - Math.min(1, Math.max(0, w))), 1);
  return 1 - miss;
}
