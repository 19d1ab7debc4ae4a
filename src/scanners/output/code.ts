/**
 * Code Scanner
 * Reports code in the configured languages. Monitor-only by default.
 */

import { ConfigurationError } from '../../config/errors.js';
import type { CodeConfig } from '../../config/schema.js';
import type { CodeDetector } from '../../detectors/types.js';
import { SCANNER_NAMES, type ScanDirection, type Scanner, type ScannerMode, type ScannerOutput } from '../types.js';

export class CodeScanner implements Scanner {
  readonly name = SCANNER_NAMES.code;
  readonly directions: readonly ScanDirection[] = ['outbound'];
  readonly mode: ScannerMode;
  private readonly languages: Set<string>;

  /**
   * @throws ConfigurationError for a language the detector does not know
   */
  constructor(
    config: Pick<CodeConfig, 'languages' | 'mode'>,
    private readonly detector: CodeDetector
  ) {
    this.mode = config.mode;

    const known = new Map(detector.languages().map((name) => [name.toLowerCase(), name]));
    this.languages = new Set(
      config.languages.map((language) => {
        const name = known.get(language.toLowerCase());
        if (name === undefined) {
          throw new ConfigurationError(`Unknown code language "${language}"`);
        }
        return name;
      })
    );
  }

  scan(text: string): ScannerOutput {
    const detections = this.detector.detect(text);
    const hits = detections.filter((d) => this.languages.has(d.language));

    return {
      text,
      valid: hits.length === 0,
      score: hits.reduce((max, d) => Math.max(max, d.confidence), 0),
      details: {
        languages: hits.map((d) => d.language),
        detected: detections.map((d) => d.language),
      },
    };
  }
}
