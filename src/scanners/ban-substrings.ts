/**
 * BanSubstrings Scanner
 * Flags banned terms in either direction. Monitor-only by default.
 */

import type { BanSubstringsConfig } from '../config/schema.js';
import { SCANNER_NAMES, type ScanDirection, type Scanner, type ScannerMode, type ScannerOutput } from './types.js';

const REDACTION = '[REDACT]';

interface CompiledSubstring {
  value: string;
  source: string;
}

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export class BanSubstringsScanner implements Scanner {
  readonly name = SCANNER_NAMES.banSubstrings;
  readonly directions: readonly ScanDirection[] = ['inbound', 'outbound'];
  readonly mode: ScannerMode;

  private readonly substrings: CompiledSubstring[];
  private readonly flags: string;
  private readonly containsAll: boolean;
  private readonly redact: boolean;

  constructor(config: Pick<BanSubstringsConfig, 'substrings' | 'caseSensitive' | 'matchType' | 'containsAll' | 'redact' | 'mode'>) {
    this.mode = config.mode;
    this.containsAll = config.containsAll;
    this.redact = config.redact;
    this.flags = config.caseSensitive ? 'u' : 'iu';
    this.substrings = config.substrings.map((value) => {
      const escaped = escapeRegex(value);
      return {
        value,
        source: config.matchType === 'word' ? `(?<![\\p{L}\\p{N}_])${escaped}(?![\\p{L}\\p{N}_])` : escaped,
      };
    });
  }

  scan(text: string): ScannerOutput {
    const matched = this.substrings.filter((s) => new RegExp(s.source, this.flags).test(text));
    const fired = matched.length > 0 && (!this.containsAll || matched.length === this.substrings.length);

    if (!fired) {
      return { text, valid: true, score: 0, details: { matched: matched.map((s) => s.value) } };
    }

    let output = text;
    if (this.redact) {
      for (const substring of matched) {
        output = output.replace(new RegExp(substring.source, `g${this.flags}`), REDACTION);
      }
    }

    return {
      text: output,
      valid: false,
      score: 1,
      details: { matched: matched.map((s) => s.value) },
    };
  }
}
