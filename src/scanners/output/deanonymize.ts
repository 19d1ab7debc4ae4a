/**
 * Deanonymize Scanner
 * Restores vault placeholders in the response to their original values.
 * Placeholder-shaped text the user typed is left as written.
 */

import { PLACEHOLDER_PATTERN } from '../../vault/vault.js';
import {
  SCANNER_NAMES,
  type ScanContext,
  type ScanDirection,
  type Scanner,
  type ScannerMode,
  type ScannerOutput,
  type ScanWarning,
} from '../types.js';

export class DeanonymizeScanner implements Scanner {
  readonly name = SCANNER_NAMES.deanonymize;
  readonly directions: readonly ScanDirection[] = ['outbound'];
  /** Never invalid; the mode has no effect */
  readonly mode: ScannerMode = 'block';
  readonly runsBefore = [
    SCANNER_NAMES.sensitive,
    SCANNER_NAMES.relevance,
    SCANNER_NAMES.noRefusal,
    SCANNER_NAMES.code,
    SCANNER_NAMES.banSubstrings,
  ];

  scan(text: string, context: ScanContext): ScannerOutput {
    const warnings: ScanWarning[] = [];
    const typed = new Set(context.priorText?.match(new RegExp(PLACEHOLDER_PATTERN.source, 'g')) ?? []);
    let restored = 0;
    let literal = 0;

    const output = text.replace(new RegExp(PLACEHOLDER_PATTERN.source, 'g'), (placeholder) => {
      if (typed.has(placeholder)) {
        literal += 1;
        return placeholder;
      }
      const original = context.vault.resolve(placeholder);
      if (original === undefined) {
        warnings.push({
          kind: 'vault-miss',
          scanner: this.name,
          message: `No vault entry for ${placeholder}`,
          placeholder,
        });
        return placeholder;
      }
      restored += 1;
      return original;
    });

    return {
      text: output,
      valid: true,
      score: 0,
      details: { restored, missing: warnings.length, literal },
      warnings,
    };
  }
}
