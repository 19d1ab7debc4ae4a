/**
 * PromptInjection Scanner
 * Rejects prompts that try to override or extract the system instructions
 */

import type { PromptInjectionConfig } from '../../config/schema.js';
import type { InjectionClassifier } from '../../detectors/types.js';
import { clampScore, SCANNER_NAMES, type ScanDirection, type Scanner, type ScannerMode, type ScannerOutput } from '../types.js';

export class PromptInjectionScanner implements Scanner {
  readonly name = SCANNER_NAMES.promptInjection;
  readonly directions: readonly ScanDirection[] = ['inbound'];
  readonly mode: ScannerMode;
  private readonly threshold: number;

  constructor(
    config: Pick<PromptInjectionConfig, 'threshold' | 'mode'>,
    private readonly classifier: InjectionClassifier
  ) {
    this.threshold = config.threshold;
    this.mode = config.mode;
  }

  async scan(text: string): Promise<ScannerOutput> {
    const verdict = await this.classifier.classify(text);
    const confidence = clampScore(verdict.confidence);

    return {
      text,
      valid: confidence < this.threshold,
      score: confidence,
      details: {
        threshold: this.threshold,
        categories: Array.from(new Set(verdict.matches.map((m) => m.category))),
        matches: verdict.matches.length,
      },
    };
  }
}
