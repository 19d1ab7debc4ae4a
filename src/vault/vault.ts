/**
 * Vault
 * Reversible store mapping placeholder tokens to the sensitive values they
 * replaced.
 */

import type { Logger } from '../utils/logger.js';
import { createNoOpLogger } from '../utils/logger.js';

/**
 * Matches every placeholder the vault can emit: [REDACTED_<CATEGORY>_<n>]
 */
export const PLACEHOLDER_PATTERN = /\[REDACTED_([A-Z][A-Z_]*?)_(\d+)\]/g;

/** Session used when a caller does not name one */
export const DEFAULT_SESSION_ID = 'default';

/**
 * Build the placeholder text for a category and sequence number
 */
export function formatPlaceholder(category: string, sequence: number): string {
  return `[REDACTED_${normalizeCategory(category)}_${sequence}]`;
}

function normalizeCategory(category: string): string {
  const normalized = category.toUpperCase().replace(/[^A-Z]+/g, '_').replace(/^_+|_+$/g, '');
  return normalized || 'VALUE';
}

/**
 * Placeholder store for one logical session.
 *
 * Reservation is stable: the same value in the same category maps to the
 * same placeholder until clear(), unless that placeholder is taken in the
 * current message, in which case the value gets a fresh alias. Every method runs synchronously, so on the
 * Node.js event loop each call completes without interleaving with another
 * request.
 */
export class Vault {
  private readonly byPlaceholder = new Map<string, string>();
  private readonly byValue = new Map<string, string>();
  private readonly counters = new Map<string, number>();
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createNoOpLogger();
  }

  /**
   * Reserve a placeholder for a sensitive value.
   *
   * @param original - The value being redacted
   * @param category - Entity category used in the placeholder (EMAIL, PHONE, ...)
   * @param isTaken - Rejects candidates that must not be used, such as
   *   placeholder-shaped text already present in the message
   */
  reserve(original: string, category: string, isTaken?: (candidate: string) => boolean): string {
    const key = `${normalizeCategory(category)}\u0000${original}`;
    const existing = this.byValue.get(key);
    if (existing !== undefined && !(isTaken?.(existing) ?? false)) {
      return existing;
    }

    const normalized = normalizeCategory(category);
    let sequence = this.counters.get(normalized) ?? 0;
    let placeholder: string;
    do {
      sequence += 1;
      placeholder = formatPlaceholder(normalized, sequence);
    } while (this.byPlaceholder.has(placeholder) || (isTaken?.(placeholder) ?? false));

    this.counters.set(normalized, sequence);
    this.byPlaceholder.set(placeholder, original);
    if (existing === undefined) {
      this.byValue.set(key, placeholder);
      this.logger.debug(`[Vault] Reserved ${placeholder}`);
    } else {
      this.logger.debug(`[Vault] Reserved ${placeholder} as alias of ${existing}`);
    }
    return placeholder;
  }

  /**
   * Look up the original value of a placeholder.
   * Returns undefined for placeholders this vault never issued.
   */
  resolve(placeholder: string): string | undefined {
    return this.byPlaceholder.get(placeholder);
  }

  has(placeholder: string): boolean {
    return this.byPlaceholder.has(placeholder);
  }

  /**
   * Number of stored placeholders
   */
  size(): number {
    return this.byPlaceholder.size;
  }

  /**
   * Drop every entry and reset the placeholder counters
   */
  clear(): void {
    const count = this.byPlaceholder.size;
    this.byPlaceholder.clear();
    this.byValue.clear();
    this.counters.clear();
    this.logger.debug(`[Vault] Cleared ${count} entries`);
  }
}

/**
 * One vault per conversation. Ending a session clears its vault and drops it.
 */
export class VaultRegistry {
  private readonly vaults = new Map<string, Vault>();
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createNoOpLogger();
  }

  get(sessionId: string = DEFAULT_SESSION_ID): Vault {
    let vault = this.vaults.get(sessionId);
    if (!vault) {
      vault = new Vault(this.logger);
      this.vaults.set(sessionId, vault);
    }
    return vault;
  }

  /**
   * End a session. Returns false when the session had no vault.
   */
  end(sessionId: string = DEFAULT_SESSION_ID): boolean {
    const vault = this.vaults.get(sessionId);
    if (!vault) {
      return false;
    }
    vault.clear();
    this.vaults.delete(sessionId);
    this.logger.info(`[Vault] Session ended: ${sessionId}`);
    return true;
  }

  /**
   * Ids of sessions that currently hold a vault
   */
  sessions(): string[] {
    return Array.from(this.vaults.keys());
  }
}
