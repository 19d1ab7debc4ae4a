/**
 * Pipeline Runner
 *
 * Runs a scanner set over one piece of text. Scanners compose on text (each
 * sees the previous scanner's output), every scanner runs even after one has
 * rejected the text, and the direction is blocked if any blocking-mode
 * scanner is invalid. A scanner that throws or breaks its contract counts as
 * invalid with score 1.
 */

import type { Logger } from '../utils/logger.js';
import { createNoOpLogger } from '../utils/logger.js';
import type { Vault } from '../vault/vault.js';
import {
  roundScore,
  ScannerFault,
  type ScanDirection,
  type Scanner,
  type ScannerMode,
  type ScannerOutput,
  type ScanWarning,
} from '../scanners/types.js';
import type { ScannerSet } from './scanner-set.js';

// =============================================================================
// TYPES
// =============================================================================

export type ScanVerdict = 'pass' | 'block';

/**
 * Outcome of one scanner within a run
 */
export interface ScanRecord {
  scanner: string;
  valid: boolean;
  score: number;
  mode: ScannerMode;
  durationMs: number;
  details?: Record<string, unknown>;
  /** Fault message when the scanner failed internally */
  error?: string;
}

export interface ScanResult {
  direction: ScanDirection;
  /** Text after the last scanner */
  text: string;
  verdict: ScanVerdict;
  /** Invalid blocking-mode scanners, in run order */
  triggered: string[];
  /** Invalid monitor-mode scanners, in run order */
  monitored: string[];
  records: ScanRecord[];
  warnings: ScanWarning[];
  durationMs: number;
}

export interface RunOptions {
  /** Original user prompt, for scanners that compare against it */
  priorText?: string;
  vault: Vault;
}

// =============================================================================
// CONTRACT CHECK
// =============================================================================

/**
 * Reject output that breaks the scanner contract
 *
 * @throws ScannerFault
 */
export function checkOutput(scanner: string, output: ScannerOutput): ScannerOutput {
  if (typeof output.text !== 'string') {
    throw new ScannerFault(scanner, 'returned non-string text');
  }
  if (typeof output.valid !== 'boolean') {
    throw new ScannerFault(scanner, 'returned a non-boolean verdict');
  }
  if (!Number.isFinite(output.score) || output.score < 0 || output.score > 1) {
    throw new ScannerFault(scanner, `returned score ${output.score} outside [0, 1]`);
  }
  return output;
}

// =============================================================================
// RUNNER
// =============================================================================

export class PipelineRunner {
  private readonly sets: Record<ScanDirection, ScannerSet>;
  private readonly logger: Logger;

  constructor(sets: { inbound: ScannerSet; outbound: ScannerSet }, logger?: Logger) {
    this.sets = sets;
    this.logger = logger ?? createNoOpLogger();
  }

  async run(direction: ScanDirection, text: string, options: RunOptions): Promise<ScanResult> {
    const startTime = Date.now();
    const set = this.sets[direction];
    const records: ScanRecord[] = [];
    const warnings: ScanWarning[] = [];
    const triggered: string[] = [];
    const monitored: string[] = [];
    let current = text;

    this.logger.debug(`[Pipeline] Running ${direction} set: scanners=${set.names().join(',')}`);

    for (const scanner of set.scanners) {
      const record = await this.runScanner(scanner, current, direction, options);

      if (record.output) {
        current = record.output.text;
        for (const warning of record.output.warnings ?? []) {
          this.logger.warn(`[Pipeline] ${warning.kind}: scanner=${warning.scanner}, ${warning.message}`);
          warnings.push(warning);
        }
      }

      if (!record.entry.valid) {
        (scanner.mode === 'monitor' ? monitored : triggered).push(scanner.name);
        this.logger.info(
          `[Pipeline] Invalid: scanner=${scanner.name}, mode=${scanner.mode}, score=${record.entry.score}`
        );
      } else {
        this.logger.debug(`[Pipeline] Valid: scanner=${scanner.name}, score=${record.entry.score}`);
      }
      records.push(record.entry);
    }

    const verdict: ScanVerdict = triggered.length > 0 ? 'block' : 'pass';
    const durationMs = Date.now() - startTime;
    this.logger.info(
      `[Pipeline] ${direction} verdict=${verdict}, triggered=[${triggered.join(', ')}], monitored=[${monitored.join(', ')}], duration=${durationMs}ms`
    );

    return { direction, text: current, verdict, triggered, monitored, records, warnings, durationMs };
  }

  private async runScanner(
    scanner: Scanner,
    text: string,
    direction: ScanDirection,
    options: RunOptions
  ): Promise<{ entry: ScanRecord; output?: ScannerOutput }> {
    const startTime = Date.now();
    try {
      const output = checkOutput(
        scanner.name,
        await scanner.scan(text, { direction, priorText: options.priorText, vault: options.vault })
      );
      return {
        entry: {
          scanner: scanner.name,
          valid: output.valid,
          score: roundScore(output.score),
          mode: scanner.mode,
          durationMs: Date.now() - startTime,
          details: output.details,
        },
        output,
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`[Pipeline] Scanner fault: scanner=${scanner.name}, error=${message}`, error);
      return {
        entry: {
          scanner: scanner.name,
          valid: false,
          score: 1,
          mode: scanner.mode,
          durationMs: Date.now() - startTime,
          error: message,
        },
      };
    }
  }
}
