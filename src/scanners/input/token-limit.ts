/**
 * TokenLimit Scanner
 */

import type { TokenLimitConfig } from '../../config/schema.js';
import type { Tokenizer } from '../../detectors/types.js';
import { SCANNER_NAMES, type ScanDirection, type Scanner, type ScannerMode, type ScannerOutput } from '../types.js';

/**
 * Rejects prompts longer than the configured token budget. The text is never
 * modified, so running it twice gives the same result.
 */
export class TokenLimitScanner implements Scanner {
  readonly name = SCANNER_NAMES.tokenLimit;
  readonly directions: readonly ScanDirection[] = ['inbound'];
  readonly mode: ScannerMode;
  private readonly limit: number;

  constructor(
    config: Pick<TokenLimitConfig, 'limit' | 'mode'>,
    private readonly tokenizer: Tokenizer
  ) {
    this.limit = config.limit;
    this.mode = config.mode;
  }

  scan(text: string): ScannerOutput {
    const tokens = this.tokenizer.count(text);
    return {
      text,
      valid: tokens <= this.limit,
      score: Math.min(1, tokens / this.limit),
      details: { tokens, limit: this.limit },
    };
  }
}
