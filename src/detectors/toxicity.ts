/**
 * Lexicon-based toxicity classifier
 */

import { loadLexicon, ToxicityLexiconSchema, type ToxicityLexicon } from './lexicons.js';
import { combineWeights, compileTerms, matchTerms, type CompiledTerm } from './terms.js';
import type { ToxicityClassifier, ToxicityVerdict } from './types.js';

export interface LexiconToxicityClassifierOptions {
  lexiconDir?: string;
  lexicon?: ToxicityLexicon;
}

/**
 * Scores text by the weighted toxic terms it contains; several weak terms
 * add up to a strong score
 */
export class LexiconToxicityClassifier implements ToxicityClassifier {
  private readonly terms: CompiledTerm[];

  constructor(options: LexiconToxicityClassifierOptions = {}) {
    const lexicon = options.lexicon ?? loadLexicon('toxicity', ToxicityLexiconSchema, options.lexiconDir);
    this.terms = compileTerms(lexicon.terms);
  }

  classify(text: string): ToxicityVerdict {
    const terms = matchTerms(text, this.terms);
    return { score: combineWeights(terms.map((t) => t.weight)), terms };
  }
}
