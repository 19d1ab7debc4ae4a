/**
 * Detectors
 * Heuristic capability providers behind the built-in scanners
 */

import type { InjectionCategories } from '../config/schema.js';
import { SignatureCodeDetector } from './code.js';
import { PatternEntityRecognizer } from './entities.js';
import { PatternInjectionClassifier } from './injection.js';
import { PhraseRefusalDetector } from './refusal.js';
import { CosineSimilarityScorer } from './similarity.js';
import { HeuristicTokenizer } from './tokenizer.js';
import { KeywordTopicClassifier } from './topics.js';
import { LexiconToxicityClassifier } from './toxicity.js';
import type { DetectorProviders } from './types.js';

export * from './types.js';
export * from './lexicons.js';
export { termPattern, compileTerms, matchTerms, combineWeights, type CompiledTerm } from './terms.js';
export { PatternInjectionClassifier, extractDecodedContent, type PatternInjectionClassifierOptions } from './injection.js';
export {
  PatternEntityRecognizer,
  luhnCheck,
  isValidSsn,
  resolveOverlaps,
  matchEmails,
  matchPhones,
  matchCreditCards,
  matchSsns,
  matchIpAddresses,
  matchPersons,
} from './entities.js';
export { LexiconToxicityClassifier, type LexiconToxicityClassifierOptions } from './toxicity.js';
export { KeywordTopicClassifier, type KeywordTopicClassifierOptions } from './topics.js';
export { PhraseRefusalDetector, normalizeForPhrases, type PhraseRefusalDetectorOptions } from './refusal.js';
export { CosineSimilarityScorer, contentTerms, type CosineSimilarityScorerOptions } from './similarity.js';
export { HeuristicTokenizer } from './tokenizer.js';
export { SignatureCodeDetector, HEURISTIC_DETECTION_THRESHOLD, type SignatureCodeDetectorOptions } from './code.js';

export interface DefaultProvidersOptions {
  /** Injection categories to enable */
  injectionCategories?: Partial<InjectionCategories>;
  /** Lexicon directory override */
  lexiconDir?: string;
}

/**
 * Build the heuristic providers.
 *
 * @throws LexiconLoadError if a lexicon cannot be loaded
 */
export function createDefaultProviders(options: DefaultProvidersOptions = {}): DetectorProviders {
  const { lexiconDir } = options;
  return {
    injection: new PatternInjectionClassifier({ categories: options.injectionCategories, lexiconDir }),
    toxicity: new LexiconToxicityClassifier({ lexiconDir }),
    topics: new KeywordTopicClassifier({ lexiconDir }),
    refusal: new PhraseRefusalDetector({ lexiconDir }),
    similarity: new CosineSimilarityScorer({ lexiconDir }),
    tokenizer: new HeuristicTokenizer(),
    entities: new PatternEntityRecognizer(),
    code: new SignatureCodeDetector({ lexiconDir }),
  };
}
