/**
 * NoRefusal Scanner
 * Quality gate against canned refusals and non-answers
 */

import type { NoRefusalConfig } from '../../config/schema.js';
import type { RefusalDetector } from '../../detectors/types.js';
import { clampScore, SCANNER_NAMES, type ScanDirection, type Scanner, type ScannerMode, type ScannerOutput } from '../types.js';

export class NoRefusalScanner implements Scanner {
  readonly name = SCANNER_NAMES.noRefusal;
  readonly directions: readonly ScanDirection[] = ['outbound'];
  readonly mode: ScannerMode;
  private readonly threshold: number;

  constructor(
    config: Pick<NoRefusalConfig, 'threshold' | 'mode'>,
    private readonly detector: RefusalDetector
  ) {
    this.threshold = config.threshold;
    this.mode = config.mode;
  }

  async scan(text: string): Promise<ScannerOutput> {
    const verdict = await this.detector.detect(text);
    const score = clampScore(verdict.score);

    return {
      text,
      valid: score < this.threshold,
      score,
      details: { threshold: this.threshold, phrases: verdict.phrases },
    };
  }
}
