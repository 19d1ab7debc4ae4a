/**
 * Sensitive Scanner
 * Flags personal data in the response that the user did not supply
 */

import type { EntityType, SensitiveConfig } from '../../config/schema.js';
import type { EntityRecognizer } from '../../detectors/types.js';
import {
  SCANNER_NAMES,
  type ScanContext,
  type ScanDirection,
  type Scanner,
  type ScannerMode,
  type ScannerOutput,
} from '../types.js';

const REDACTION = '[REDACTED]';

export class SensitiveScanner implements Scanner {
  readonly name = SCANNER_NAMES.sensitive;
  readonly directions: readonly ScanDirection[] = ['outbound'];
  readonly mode: ScannerMode;
  private readonly entityTypes: readonly EntityType[];
  private readonly redact: boolean;

  constructor(
    config: Pick<SensitiveConfig, 'entityTypes' | 'redact' | 'mode'>,
    private readonly recognizer: EntityRecognizer
  ) {
    this.entityTypes = config.entityTypes;
    this.redact = config.redact;
    this.mode = config.mode;
  }

  scan(text: string, context: ScanContext): ScannerOutput {
    const prompt = (context.priorText ?? '').toLowerCase();
    const leaks = this.recognizer
      .recognize(text, this.entityTypes)
      .filter((span) => !prompt.includes(span.value.toLowerCase()));

    if (leaks.length === 0) {
      return { text, valid: true, score: 0, details: { leaks: [] } };
    }

    let output = text;
    if (this.redact) {
      output = '';
      let cursor = 0;
      for (const leak of leaks) {
        output += text.slice(cursor, leak.start) + REDACTION;
        cursor = leak.end;
      }
      output += text.slice(cursor);
    }

    return {
      text: output,
      valid: false,
      score: Math.max(...leaks.map((l) => l.confidence)),
      details: { leaks: leaks.map((l) => l.type) },
    };
  }
}
