/**
 * Entity Recognizer
 * Finds personal data spans: emails, phone numbers, card numbers, SSNs,
 * IP addresses and person names
 */

import type { EntityType } from '../config/schema.js';
import type { EntityRecognizer, EntitySpan } from './types.js';

const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g;

/**
 * SSN pattern: xxx-xx-xxxx
 */
const SSN_PATTERN = /\b(\d{3})-(\d{2})-(\d{4})\b/g;

/**
 * Card numbers: 4-4-4-4, Amex 4-6-5, or 13-19 continuous digits
 */
const CREDIT_CARD_PATTERNS = [
  /\b\d{4}[\s-]?\d{4}[\s-]?\d{4}[\s-]?\d{4}\b/g,
  /\b\d{4}[\s-]?\d{6}[\s-]?\d{5}\b/g,
  /\b\d{13,19}\b/g,
];

/**
 * North American style numbers with an optional +1 prefix
 */
const PHONE_PATTERN = /(?:\+?1[-.\s]?)?(?:\(\d{3}\)\s?|\b\d{3}[-.\s])\d{3}[-.\s]\d{4}\b/g;

const IPV4_OCTET = '(?:25[0-5]|2[0-4]\\d|1\\d\\d|[1-9]?\\d)';
const IPV4_PATTERN = new RegExp(`\\b(?:${IPV4_OCTET}\\.){3}${IPV4_OCTET}\\b`, 'g');

const NAME = '([A-Z][a-z]+(?:\\s+[A-Z][a-z]+)?)';

/**
 * Person names introduced by an honorific or a self-introduction.
 * Only the name itself (capture group 1) is reported.
 */
const PERSON_PATTERNS: Array<{ pattern: RegExp; confidence: number }> = [
  { pattern: new RegExp(`\\b(?:Mr|Mrs|Ms|Miss|Dr|Prof)\\.?\\s+${NAME}`, 'g'), confidence: 0.7 },
  {
    pattern: new RegExp(`\\b(?:[Mm]y name is|[Mm]y name's|[Cc]all me|I am called)\\s+${NAME}`, 'g'),
    confidence: 0.75,
  },
];

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Luhn algorithm for credit card validation
 * @param cardNumber The card number (separators are ignored)
 */
export function luhnCheck(cardNumber: string): boolean {
  const digits = cardNumber.replace(/\D/g, '');

  if (digits.length < 13 || digits.length > 19) {
    return false;
  }

  let sum = 0;
  let doubled = false;
  for (let i = digits.length - 1; i >= 0; i--) {
    let digit = parseInt(digits[i], 10);
    if (doubled) {
      digit *= 2;
      if (digit > 9) digit -= 9;
    }
    sum += digit;
    doubled = !doubled;
  }

  return sum % 10 === 0;
}

/**
 * SSN plausibility: area not 000, 666 or 900+, group not 00, serial not 0000
 */
export function isValidSsn(area: string, group: string, serial: string): boolean {
  const areaNum = parseInt(area, 10);
  if (areaNum === 0 || areaNum === 666 || areaNum >= 900) {
    return false;
  }
  return parseInt(group, 10) !== 0 && parseInt(serial, 10) !== 0;
}

function isRepeatedDigit(digits: string): boolean {
  return /^(\d)\1+$/.test(digits);
}

// =============================================================================
// MATCHERS
// =============================================================================

function span(type: EntityType, match: RegExpMatchArray, confidence: number, value = match[0]): EntitySpan {
  const offset = match[0].lastIndexOf(value);
  const start = (match.index ?? 0) + Math.max(0, offset);
  return { type, value, start, end: start + value.length, confidence };
}

export function matchEmails(text: string): EntitySpan[] {
  return Array.from(text.matchAll(EMAIL_PATTERN), (m) => span('EMAIL', m, 0.95));
}

export function matchSsns(text: string): EntitySpan[] {
  return Array.from(text.matchAll(SSN_PATTERN))
    .filter((m) => isValidSsn(m[1], m[2], m[3]))
    .map((m) => span('SSN', m, 0.9));
}

export function matchCreditCards(text: string): EntitySpan[] {
  const spans: EntitySpan[] = [];
  for (const pattern of CREDIT_CARD_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      const digits = match[0].replace(/\D/g, '');
      if (isRepeatedDigit(digits) || !luhnCheck(digits)) continue;
      spans.push(span('CREDIT_CARD', match, 0.95));
    }
  }
  return spans;
}

export function matchPhones(text: string): EntitySpan[] {
  return Array.from(text.matchAll(PHONE_PATTERN), (m) => span('PHONE', m, 0.8));
}

export function matchIpAddresses(text: string): EntitySpan[] {
  return Array.from(text.matchAll(IPV4_PATTERN), (m) => span('IP_ADDRESS', m, 0.85));
}

export function matchPersons(text: string): EntitySpan[] {
  const spans: EntitySpan[] = [];
  for (const { pattern, confidence } of PERSON_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      spans.push(span('PERSON', match, confidence, match[1]));
    }
  }
  return spans;
}

const MATCHERS: Record<EntityType, (text: string) => EntitySpan[]> = {
  EMAIL: matchEmails,
  PHONE: matchPhones,
  CREDIT_CARD: matchCreditCards,
  SSN: matchSsns,
  IP_ADDRESS: matchIpAddresses,
  PERSON: matchPersons,
};

/**
 * Keep the earliest span at each position, longer spans first, and drop
 * any span that overlaps one already kept
 */
export function resolveOverlaps(spans: EntitySpan[]): EntitySpan[] {
  const ordered = [...spans].sort((a, b) => a.start - b.start || b.end - b.start - (a.end - a.start));
  const kept: EntitySpan[] = [];
  for (const candidate of ordered) {
    const last = kept[kept.length - 1];
    if (last && candidate.start < last.end) continue;
    kept.push(candidate);
  }
  return kept;
}

/**
 * Regex and checksum based recognizer
 */
export class PatternEntityRecognizer implements EntityRecognizer {
  recognize(text: string, types: readonly EntityType[]): EntitySpan[] {
    const spans = types.flatMap((type) => MATCHERS[type](text));
    return resolveOverlaps(spans);
  }
}
