/**
 * Toxicity Scanner
 */

import type { ToxicityConfig } from '../../config/schema.js';
import type { ToxicityClassifier } from '../../detectors/types.js';
import { clampScore, SCANNER_NAMES, type ScanDirection, type Scanner, type ScannerMode, type ScannerOutput } from '../types.js';

export class ToxicityScanner implements Scanner {
  readonly name = SCANNER_NAMES.toxicity;
  readonly directions: readonly ScanDirection[] = ['inbound'];
  readonly mode: ScannerMode;
  private readonly threshold: number;

  constructor(
    config: Pick<ToxicityConfig, 'threshold' | 'mode'>,
    private readonly classifier: ToxicityClassifier
  ) {
    this.threshold = config.threshold;
    this.mode = config.mode;
  }

  async scan(text: string): Promise<ScannerOutput> {
    const verdict = await this.classifier.classify(text);
    const score = clampScore(verdict.score);

    return {
      text,
      valid: score < this.threshold,
      score,
      details: { threshold: this.threshold, terms: verdict.terms.map((t) => t.term) },
    };
  }
}
