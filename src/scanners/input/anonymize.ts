/**
 * Anonymize Scanner
 * Replaces personal data in the prompt with vault placeholders before any
 * other inbound scanner or the generator sees it
 */

import type { AnonymizeConfig, EntityType } from '../../config/schema.js';
import type { EntityRecognizer } from '../../detectors/types.js';
import {
  SCANNER_NAMES,
  type ScanContext,
  type ScanDirection,
  type Scanner,
  type ScannerMode,
  type ScannerOutput,
} from '../types.js';

export class AnonymizeScanner implements Scanner {
  readonly name = SCANNER_NAMES.anonymize;
  readonly directions: readonly ScanDirection[] = ['inbound'];
  /** Never invalid; the mode has no effect */
  readonly mode: ScannerMode = 'block';
  readonly runsBefore = [
    SCANNER_NAMES.promptInjection,
    SCANNER_NAMES.tokenLimit,
    SCANNER_NAMES.toxicity,
    SCANNER_NAMES.banSubstrings,
    SCANNER_NAMES.banTopics,
  ];

  private readonly entityTypes: readonly EntityType[];

  constructor(
    config: Pick<AnonymizeConfig, 'entityTypes'>,
    private readonly recognizer: EntityRecognizer
  ) {
    this.entityTypes = config.entityTypes;
  }

  scan(text: string, context: ScanContext): ScannerOutput {
    const spans = this.recognizer.recognize(text, this.entityTypes);
    if (spans.length === 0) {
      return { text, valid: true, score: 0, details: { entities: [] } };
    }

    // Placeholders typed by the user stay literal; never issue one of them
    const isTaken = (candidate: string): boolean => text.includes(candidate);
    const entities: Array<{ type: EntityType; placeholder: string }> = [];
    let output = '';
    let cursor = 0;
    let redacted = 0;

    for (const span of spans) {
      const placeholder = context.vault.reserve(span.value, span.type, isTaken);
      output += text.slice(cursor, span.start) + placeholder;
      cursor = span.end;
      redacted += span.end - span.start;
      entities.push({ type: span.type, placeholder });
    }
    output += text.slice(cursor);

    return {
      text: output,
      valid: true,
      score: redacted / text.length,
      details: { entities },
    };
  }
}
