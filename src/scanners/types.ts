/**
 * Scanner contract
 * Type definitions shared by every inbound and outbound scanner
 */

import type { ScannerMode } from '../config/schema.js';
import type { Vault } from '../vault/vault.js';

export type { ScannerMode };

/**
 * Direction a scanner set applies to
 * - inbound: user message before generation
 * - outbound: model output before delivery
 */
export type ScanDirection = 'inbound' | 'outbound';

/**
 * Non-fatal signal surfaced in the scan result
 */
export interface ScanWarning {
  /** Kind of warning */
  kind: 'vault-miss';
  /** Scanner that raised it */
  scanner: string;
  /** Human-readable description */
  message: string;
  /** Placeholder that could not be resolved (vault-miss) */
  placeholder?: string;
}

/**
 * Context handed to a scanner together with the text
 */
export interface ScanContext {
  direction: ScanDirection;
  /**
   * Text the current text is judged against: the original, pre-scan user
   * prompt on the outbound side
   */
  priorText?: string;
  /** Placeholder vault of the current session */
  vault: Vault;
}

/**
 * What a scanner returns for one piece of text
 */
export interface ScannerOutput {
  /** Text after this scanner (unchanged for pure checks) */
  text: string;
  /** Verdict of this scanner alone */
  valid: boolean;
  /** Risk score in [0, 1] */
  score: number;
  /** Inspectable detail (matched terms, similarity, counts) */
  details?: Record<string, unknown>;
  warnings?: ScanWarning[];
}

/**
 * A pluggable unit of text inspection or transformation
 */
export interface Scanner {
  /** Stable name used in reports and block notices */
  readonly name: string;
  /** Directions this scanner can be placed in */
  readonly directions: readonly ScanDirection[];
  /** Whether an invalid result blocks or is only reported */
  readonly mode: ScannerMode;
  /**
   * Names of scanners that must come after this one when they share a set
   */
  readonly runsBefore?: readonly string[];

  scan(text: string, context: ScanContext): ScannerOutput | Promise<ScannerOutput>;
}

/**
 * A scanner failed internally. Contained by the pipeline runner, which
 * records the scanner as invalid with score 1.
 */
export class ScannerFault extends Error {
  constructor(
    public readonly scanner: string,
    message: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'ScannerFault';
  }
}

/**
 * Names of the built-in scanners
 */
export const SCANNER_NAMES = {
  anonymize: 'Anonymize',
  promptInjection: 'PromptInjection',
  tokenLimit: 'TokenLimit',
  toxicity: 'Toxicity',
  banSubstrings: 'BanSubstrings',
  banTopics: 'BanTopics',
  deanonymize: 'Deanonymize',
  noRefusal: 'NoRefusal',
  relevance: 'Relevance',
  sensitive: 'Sensitive',
  code: 'Code',
} as const;

/**
 * Clamp a value into [0, 1]; non-finite values become 0
 */
export function clampScore(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.min(1, Math.max(0, value));
}

/**
 * Round a score for reporting
 */
export function roundScore(value: number): number {
  return Math.round(value * 1000) / 1000;
}
