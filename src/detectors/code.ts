/**
 * Code language detector
 *
 * Recognizes code in two ways: a fenced block whose tag names a language,
 * and per-language signature patterns from rules/lexicons/code.yaml.
 */

import { CodeLexiconSchema, compilePattern, loadLexicon, type CodeLexicon } from './lexicons.js';
import { combineWeights } from './terms.js';
import type { CodeDetection, CodeDetector } from './types.js';

/** Combined signature weight at which a language counts as present */
export const HEURISTIC_DETECTION_THRESHOLD = 0.5;

const FENCE_PATTERN = /```[ \t]*([^\s`]*)[^\n]*\n[\s\S]*?```/g;

interface LanguageSignature {
  name: string;
  aliases: Set<string>;
  patterns: Array<{ regex: RegExp; weight: number }>;
}

export interface SignatureCodeDetectorOptions {
  lexiconDir?: string;
  lexicon?: CodeLexicon;
}

export class SignatureCodeDetector implements CodeDetector {
  private readonly signatures: LanguageSignature[];

  constructor(options: SignatureCodeDetectorOptions = {}) {
    const lexicon = options.lexicon ?? loadLexicon('code', CodeLexiconSchema, options.lexiconDir);

    this.signatures = Object.entries(lexicon.languages).map(([name, language]) => ({
      name,
      aliases: new Set([name.toLowerCase(), ...language.aliases.map((a) => a.toLowerCase())]),
      patterns: language.patterns.map((p) => ({
        regex: compilePattern(p.pattern, 'm', 'code', options.lexiconDir),
        weight: p.weight,
      })),
    }));
  }

  languages(): string[] {
    return this.signatures.map((s) => s.name);
  }

  /**
   * Languages found in the text, strongest first
   */
  detect(text: string): CodeDetection[] {
    const found = new Map<string, CodeDetection>();

    for (const match of text.matchAll(FENCE_PATTERN)) {
      const tag = match[1].toLowerCase();
      const signature = tag ? this.signatures.find((s) => s.aliases.has(tag)) : undefined;
      if (signature) {
        found.set(signature.name, { language: signature.name, confidence: 1, source: 'fence' });
      }
    }

    for (const signature of this.signatures) {
      if (found.has(signature.name)) continue;

      const weights = signature.patterns.filter((p) => p.regex.test(text)).map((p) => p.weight);
      const confidence = combineWeights(weights);
      if (confidence >= HEURISTIC_DETECTION_THRESHOLD) {
        found.set(signature.name, { language: signature.name, confidence, source: 'heuristic' });
      }
    }

    return Array.from(found.values()).sort((a, b) => b.confidence - a.confidence);
  }
}
