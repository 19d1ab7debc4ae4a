/**
 * Scanner Set
 * Ordered, validated list of scanners for one direction
 */

import { ConfigurationError } from '../config/errors.js';
import type { ScanDirection, Scanner } from '../scanners/types.js';

export interface ScannerSetOptions {
  /**
   * Check runsBefore constraints (default true). Turning this off lets a
   * set run scanners in an order that changes their verdicts.
   */
  enforceOrder?: boolean;
}

export class ScannerSet {
  readonly direction: ScanDirection;
  readonly scanners: readonly Scanner[];

  /**
   * @throws ConfigurationError on duplicate names, a scanner placed in a
   *   direction it does not support, or a violated ordering constraint
   */
  constructor(direction: ScanDirection, scanners: readonly Scanner[], options: ScannerSetOptions = {}) {
    this.direction = direction;
    this.scanners = [...scanners];

    const positions = new Map<string, number>();
    this.scanners.forEach((scanner, index) => {
      if (positions.has(scanner.name)) {
        throw new ConfigurationError(`Duplicate scanner "${scanner.name}" in ${direction} set`);
      }
      if (!scanner.directions.includes(direction)) {
        throw new ConfigurationError(`Scanner "${scanner.name}" cannot run in the ${direction} direction`);
      }
      positions.set(scanner.name, index);
    });

    if (options.enforceOrder ?? true) {
      this.scanners.forEach((scanner, index) => {
        for (const later of scanner.runsBefore ?? []) {
          const position = positions.get(later);
          if (position !== undefined && position < index) {
            throw new ConfigurationError(`Scanner "${scanner.name}" must run before "${later}" in ${direction} set`);
          }
        }
      });
    }
  }

  names(): string[] {
    return this.scanners.map((s) => s.name);
  }

  get size(): number {
    return this.scanners.length;
  }
}
