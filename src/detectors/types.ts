/**
 * Detector Types
 * Capability interfaces the scanners are built on. Each has a heuristic
 * default in this directory; hosts can supply model-backed versions.
 */

import type { EntityType } from '../config/schema.js';

export type MaybePromise<T> = T | Promise<T>;

// =============================================================================
// INJECTION
// =============================================================================

export type InjectionCategory =
  | 'instruction-override'
  | 'system-leak'
  | 'jailbreak'
  | 'encoded-payload';

export interface InjectionMatch {
  category: InjectionCategory;
  /** Matched text */
  match: string;
  confidence: number;
  description: string;
  /** True when found inside decoded base64, hex, unicode or URL content */
  decoded: boolean;
}

export interface InjectionVerdict {
  /** Highest match confidence, 0 when nothing matched */
  confidence: number;
  matches: InjectionMatch[];
}

export interface InjectionClassifier {
  classify(text: string): MaybePromise<InjectionVerdict>;
}

// =============================================================================
// LEXICAL CLASSIFIERS
// =============================================================================

/**
 * A weighted term found in the text
 */
export interface TermHit {
  term: string;
  weight: number;
}

export interface ToxicityVerdict {
  score: number;
  terms: TermHit[];
}

export interface ToxicityClassifier {
  classify(text: string): MaybePromise<ToxicityVerdict>;
}

/**
 * Topic to score, with optional extra keywords
 */
export interface TopicQuery {
  name: string;
  keywords?: Record<string, number>;
}

export interface TopicScore {
  topic: string;
  score: number;
  terms: TermHit[];
}

export interface TopicClassifier {
  /** Whether the classifier can score this topic without extra keywords */
  knows(topic: string): boolean;
  classify(text: string, topics: TopicQuery[]): MaybePromise<TopicScore[]>;
}

export interface RefusalVerdict {
  /** Highest phrase weight, 0 when no phrase matched */
  score: number;
  phrases: string[];
}

export interface RefusalDetector {
  detect(text: string): MaybePromise<RefusalVerdict>;
}

export interface SimilarityScorer {
  /**
   * Similarity of two texts in [0, 1], or null when either text has
   * nothing to compare
   */
  similarity(a: string, b: string): MaybePromise<number | null>;
}

export interface Tokenizer {
  count(text: string): number;
}

// =============================================================================
// ENTITIES / CODE
// =============================================================================

/**
 * A sensitive span in the text
 */
export interface EntitySpan {
  type: EntityType;
  value: string;
  start: number;
  end: number;
  confidence: number;
}

export interface EntityRecognizer {
  /**
   * Non-overlapping spans of the requested types, ordered by position
   */
  recognize(text: string, types: readonly EntityType[]): EntitySpan[];
}

export interface CodeDetection {
  language: string;
  confidence: number;
  /** fence: tagged code fence; heuristic: signature patterns */
  source: 'fence' | 'heuristic';
}

export interface CodeDetector {
  /** Language names this detector recognizes */
  languages(): string[];
  detect(text: string): CodeDetection[];
}

/**
 * Every capability the built-in scanners draw on
 */
export interface DetectorProviders {
  injection: InjectionClassifier;
  toxicity: ToxicityClassifier;
  topics: TopicClassifier;
  refusal: RefusalDetector;
  similarity: SimilarityScorer;
  tokenizer: Tokenizer;
  entities: EntityRecognizer;
  code: CodeDetector;
}
