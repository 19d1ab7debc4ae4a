/**
 * Relevance Scanner
 * Rejects responses that have drifted away from what the user asked
 */

import type { RelevanceConfig } from '../../config/schema.js';
import type { SimilarityScorer } from '../../detectors/types.js';
import {
  clampScore,
  SCANNER_NAMES,
  type ScanContext,
  type ScanDirection,
  type Scanner,
  type ScannerMode,
  type ScannerOutput,
} from '../types.js';

export class RelevanceScanner implements Scanner {
  readonly name = SCANNER_NAMES.relevance;
  readonly directions: readonly ScanDirection[] = ['outbound'];
  readonly mode: ScannerMode;
  private readonly threshold: number;

  constructor(
    config: Pick<RelevanceConfig, 'threshold' | 'mode'>,
    private readonly scorer: SimilarityScorer
  ) {
    this.threshold = config.threshold;
    this.mode = config.mode;
  }

  async scan(text: string, context: ScanContext): Promise<ScannerOutput> {
    const prompt = context.priorText;
    if (prompt === undefined || prompt.trim() === '') {
      return { text, valid: true, score: 0, details: { skipped: true, reason: 'no prompt' } };
    }

    const similarity = await this.scorer.similarity(text, prompt);
    if (similarity === null) {
      return { text, valid: true, score: 0, details: { skipped: true, reason: 'nothing to compare' } };
    }

    const bounded = clampScore(similarity);
    return {
      text,
      valid: bounded >= this.threshold,
      score: 1 - bounded,
      details: { similarity: bounded, threshold: this.threshold },
    };
  }
}
