/**
 * Prompt Injection Classifier
 *
 * Pattern-based default for the PromptInjection scanner. Patterns come from
 * rules/lexicons/injection.yaml; confidence is the highest confidence of any
 * match, including matches inside decoded base64, hex, unicode and URL
 * encoded content.
 */

import type { InjectionCategories } from '../config/schema.js';
import { compilePattern, InjectionLexiconSchema, loadLexicon, type InjectionLexicon } from './lexicons.js';
import type { InjectionCategory, InjectionClassifier, InjectionMatch, InjectionVerdict } from './types.js';

/**
 * Maximum recursion depth for encoded payload scanning
 */
const MAX_DECODE_DEPTH = 3;

const PRINTABLE = /^[\x20-\x7E\s]+$/;

interface CompiledPattern {
  category: InjectionCategory;
  regex: RegExp;
  confidence: number;
  description: string;
}

const CATEGORY_TOGGLES: Record<InjectionCategory, keyof InjectionCategories> = {
  'instruction-override': 'instructionOverride',
  'system-leak': 'systemLeak',
  jailbreak: 'jailbreak',
  'encoded-payload': 'encodedPayload',
};

const CATEGORY_ORDER: InjectionCategory[] = [
  'instruction-override',
  'system-leak',
  'jailbreak',
  'encoded-payload',
];

const ALL_CATEGORIES: InjectionCategories = {
  instructionOverride: true,
  systemLeak: true,
  jailbreak: true,
  encodedPayload: true,
};

// =============================================================================
// DECODING
// =============================================================================

function printableOrNull(decoded: string): string | null {
  return PRINTABLE.test(decoded) ? decoded : null;
}

function decodeBase64(value: string): string | null {
  let normalized = value;
  while (normalized.length % 4 !== 0) {
    normalized += '=';
  }
  try {
    return printableOrNull(atob(normalized));
  } catch {
    return null;
  }
}

function decodeEscapes(value: string, pattern: RegExp): string {
  return value.replace(pattern, (_, hex: string) => String.fromCharCode(parseInt(hex, 16)));
}

function decodeUrl(value: string): string | null {
  try {
    return printableOrNull(decodeURIComponent(value));
  } catch {
    return null;
  }
}

/**
 * Decoded forms of every encoded run found in the text
 */
export function extractDecodedContent(text: string): string[] {
  const decoded: string[] = [];

  for (const match of text.matchAll(/[A-Za-z0-9+/]{20,}={0,2}/g)) {
    const value = decodeBase64(match[0]);
    if (value) decoded.push(value);
  }
  for (const match of text.matchAll(/(?:\\x[0-9a-fA-F]{2}){4,}/g)) {
    const value = printableOrNull(decodeEscapes(match[0], /\\x([0-9a-fA-F]{2})/g));
    if (value) decoded.push(value);
  }
  for (const match of text.matchAll(/(?:\\u[0-9a-fA-F]{4}){4,}/g)) {
    const value = printableOrNull(decodeEscapes(match[0], /\\u([0-9a-fA-F]{4})/g));
    if (value) decoded.push(value);
  }
  for (const match of text.matchAll(/(?:%[0-9a-fA-F]{2}){4,}/g)) {
    const value = decodeUrl(match[0]);
    if (value) decoded.push(value);
  }

  return decoded;
}

// =============================================================================
// CLASSIFIER
// =============================================================================

export interface PatternInjectionClassifierOptions {
  /** Category toggles; every category is enabled by default */
  categories?: Partial<InjectionCategories>;
  /** Lexicon directory override */
  lexiconDir?: string;
  /** Preloaded lexicon (skips the file read) */
  lexicon?: InjectionLexicon;
}

export class PatternInjectionClassifier implements InjectionClassifier {
  private readonly patterns: CompiledPattern[];
  private readonly categories: InjectionCategories;

  constructor(options: PatternInjectionClassifierOptions = {}) {
    this.categories = { ...ALL_CATEGORIES, ...options.categories };
    const lexicon = options.lexicon ?? loadLexicon('injection', InjectionLexiconSchema, options.lexiconDir);

    this.patterns = [];
    for (const category of CATEGORY_ORDER) {
      for (const entry of lexicon[category]) {
        this.patterns.push({
          category,
          regex: compilePattern(entry.pattern, 'gim', 'injection', options.lexiconDir),
          confidence: entry.confidence,
          description: entry.description,
        });
      }
    }
  }

  classify(text: string): InjectionVerdict {
    const matches: InjectionMatch[] = [];
    this.collect(text, false, matches);

    if (this.categories.encodedPayload) {
      this.scanDecoded(text, matches, 0);
    }

    const confidence = matches.reduce((max, m) => Math.max(max, m.confidence), 0);
    return { confidence, matches };
  }

  private enabled(category: InjectionCategory): boolean {
    return this.categories[CATEGORY_TOGGLES[category]];
  }

  private collect(text: string, decoded: boolean, matches: InjectionMatch[]): void {
    for (const pattern of this.patterns) {
      if (!this.enabled(pattern.category)) continue;
      // Encoded-payload signatures only make sense on the raw text
      if (decoded && pattern.category === 'encoded-payload') continue;

      for (const match of text.matchAll(pattern.regex)) {
        matches.push({
          category: pattern.category,
          match: match[0],
          confidence: pattern.confidence,
          description: pattern.description,
          decoded,
        });
      }
    }
  }

  private scanDecoded(text: string, matches: InjectionMatch[], depth: number): void {
    if (depth >= MAX_DECODE_DEPTH) return;

    for (const decoded of extractDecodedContent(text)) {
      this.collect(decoded, true, matches);
      this.scanDecoded(decoded, matches, depth + 1);
    }
  }
}
