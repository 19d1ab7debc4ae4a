import { describe, it, expect } from 'vitest';
import { Vault, VaultRegistry, formatPlaceholder, PLACEHOLDER_PATTERN } from './index.js';

describe('Vault', () => {
  describe('reserve', () => {
    it('issues numbered placeholders per category', () => {
      const vault = new Vault();

      expect(vault.reserve('a@b.com', 'EMAIL')).toBe('[REDACTED_EMAIL_1]');
      expect(vault.reserve('c@d.org', 'EMAIL')).toBe('[REDACTED_EMAIL_2]');
      expect(vault.reserve('555-123-4567', 'PHONE')).toBe('[REDACTED_PHONE_1]');
    });

    it('returns the same placeholder for a repeated value', () => {
      const vault = new Vault();

      const first = vault.reserve('a@b.com', 'EMAIL');
      const second = vault.reserve('a@b.com', 'EMAIL');

      expect(second).toBe(first);
      expect(vault.size()).toBe(1);
    });

    it('keeps categories apart for the same value', () => {
      const vault = new Vault();

      expect(vault.reserve('4111', 'SSN')).toBe('[REDACTED_SSN_1]');
      expect(vault.reserve('4111', 'PHONE')).toBe('[REDACTED_PHONE_1]');
    });

    it('skips candidates rejected by isTaken', () => {
      const vault = new Vault();
      const message = 'literal [REDACTED_EMAIL_1] text';

      const placeholder = vault.reserve('a@b.com', 'EMAIL', (candidate) => message.includes(candidate));

      expect(placeholder).toBe('[REDACTED_EMAIL_2]');
      expect(vault.resolve('[REDACTED_EMAIL_1]')).toBeUndefined();
    });

    it('issues an alias when the stable placeholder is taken', () => {
      const vault = new Vault();
      vault.reserve('a@b.com', 'EMAIL');
      const message = 'Is [REDACTED_EMAIL_1] the same as a@b.com?';

      const alias = vault.reserve('a@b.com', 'EMAIL', (candidate) => message.includes(candidate));

      expect(alias).toBe('[REDACTED_EMAIL_2]');
      expect(vault.resolve('[REDACTED_EMAIL_1]')).toBe('a@b.com');
      expect(vault.resolve('[REDACTED_EMAIL_2]')).toBe('a@b.com');
      expect(vault.reserve('a@b.com', 'EMAIL')).toBe('[REDACTED_EMAIL_1]');
      expect(vault.reserve('c@d.org', 'EMAIL')).toBe('[REDACTED_EMAIL_3]');
    });

    it('normalizes category names', () => {
      expect(formatPlaceholder('credit-card', 3)).toBe('[REDACTED_CREDIT_CARD_3]');
      expect(formatPlaceholder('', 1)).toBe('[REDACTED_VALUE_1]');
    });
  });

  describe('resolve', () => {
    it('returns the original value', () => {
      const vault = new Vault();
      const placeholder = vault.reserve('Jane Doe', 'PERSON');

      expect(vault.resolve(placeholder)).toBe('Jane Doe');
      expect(vault.has(placeholder)).toBe(true);
    });

    it('returns undefined for unknown placeholders', () => {
      const vault = new Vault();

      expect(vault.resolve('[REDACTED_EMAIL_9]')).toBeUndefined();
    });
  });

  describe('clear', () => {
    it('drops entries and restarts numbering', () => {
      const vault = new Vault();
      vault.reserve('a@b.com', 'EMAIL');
      vault.clear();

      expect(vault.size()).toBe(0);
      expect(vault.resolve('[REDACTED_EMAIL_1]')).toBeUndefined();
      expect(vault.reserve('z@y.net', 'EMAIL')).toBe('[REDACTED_EMAIL_1]');
    });
  });

  describe('PLACEHOLDER_PATTERN', () => {
    it('matches multi-word categories', () => {
      const found = Array.from('x [REDACTED_CREDIT_CARD_12] y [REDACTED_IP_ADDRESS_1]'.matchAll(PLACEHOLDER_PATTERN));

      expect(found.map((m) => m[0])).toEqual(['[REDACTED_CREDIT_CARD_12]', '[REDACTED_IP_ADDRESS_1]']);
      expect(found[0]?.[1]).toBe('CREDIT_CARD');
    });
  });
});

describe('VaultRegistry', () => {
  it('gives each session its own vault', () => {
    const registry = new VaultRegistry();

    const alice = registry.get('alice');
    const bob = registry.get('bob');
    alice.reserve('a@b.com', 'EMAIL');

    expect(registry.get('alice')).toBe(alice);
    expect(bob.size()).toBe(0);
    expect(registry.sessions()).toEqual(['alice', 'bob']);
  });

  it('clears and drops a vault when its session ends', () => {
    const registry = new VaultRegistry();
    const vault = registry.get('alice');
    vault.reserve('a@b.com', 'EMAIL');

    expect(registry.end('alice')).toBe(true);
    expect(vault.size()).toBe(0);
    expect(registry.sessions()).toEqual([]);
    expect(registry.end('alice')).toBe(false);
  });

  it('uses the default session when none is named', () => {
    const registry = new VaultRegistry();

    expect(registry.get()).toBe(registry.get('default'));
  });
});
