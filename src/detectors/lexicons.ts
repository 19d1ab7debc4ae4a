/**
 * Lexicon Loading
 *
 * Word lists, phrase weights and pattern tables used by the heuristic
 * detectors live as YAML under rules/lexicons/. Each file is validated with
 * its own Zod schema when it is loaded.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { resolveRulesDir } from '../config/template-loader.js';

// =============================================================================
// ERRORS
// =============================================================================

/**
 * A lexicon file is missing, unreadable or malformed.
 *
 * Unlike a ConfigurationError this does not reflect a mistake in the
 * operator's configuration; the gateway treats it as a failed detector
 * dependency.
 */
export class LexiconLoadError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'LexiconLoadError';
  }
}

// =============================================================================
// SCHEMAS
// =============================================================================

const WeightSchema = z.number().min(0).max(1);

/** term → weight */
export const WeightedTermsSchema = z.record(z.string().min(1), WeightSchema);
export type WeightedTerms = z.infer<typeof WeightedTermsSchema>;

export const InjectionPatternSchema = z.object({
  pattern: z.string().min(1),
  confidence: WeightSchema,
  description: z.string(),
});
export type InjectionPatternEntry = z.infer<typeof InjectionPatternSchema>;

export const InjectionLexiconSchema = z.object({
  'instruction-override': z.array(InjectionPatternSchema),
  'system-leak': z.array(InjectionPatternSchema),
  jailbreak: z.array(InjectionPatternSchema),
  'encoded-payload': z.array(InjectionPatternSchema),
});
export type InjectionLexicon = z.infer<typeof InjectionLexiconSchema>;

export const ToxicityLexiconSchema = z.object({
  terms: WeightedTermsSchema,
});
export type ToxicityLexicon = z.infer<typeof ToxicityLexiconSchema>;

export const TopicLexiconSchema = z.object({
  topics: z.record(z.string().min(1), WeightedTermsSchema),
});
export type TopicLexicon = z.infer<typeof TopicLexiconSchema>;

export const RefusalLexiconSchema = z.object({
  phrases: WeightedTermsSchema,
});
export type RefusalLexicon = z.infer<typeof RefusalLexiconSchema>;

export const StopwordLexiconSchema = z.object({
  words: z.array(z.string().min(1)),
});
export type StopwordLexicon = z.infer<typeof StopwordLexiconSchema>;

export const CodeLanguageSchema = z.object({
  aliases: z.array(z.string().min(1)).default(() => []),
  patterns: z.array(z.object({ pattern: z.string().min(1), weight: WeightSchema })),
});

export const CodeLexiconSchema = z.object({
  languages: z.record(z.string().min(1), CodeLanguageSchema),
});
export type CodeLexicon = z.infer<typeof CodeLexiconSchema>;

/**
 * Lexicon file names
 */
export type LexiconName = 'injection' | 'toxicity' | 'topics' | 'refusals' | 'stopwords' | 'code';

// =============================================================================
// LOADING
// =============================================================================

/**
 * Default lexicon directory shipped with the package
 */
export function resolveLexiconDir(): string {
  return path.join(resolveRulesDir(), 'lexicons');
}

/**
 * Load and validate a lexicon.
 *
 * @param name - Lexicon file name without extension
 * @param schema - Schema the document must satisfy
 * @param dir - Directory to read from (defaults to rules/lexicons)
 * @throws LexiconLoadError if the file cannot be read, parsed or validated
 */
export function loadLexicon<T>(name: LexiconName, schema: z.ZodType<T>, dir: string = resolveLexiconDir()): T {
  const filePath = path.join(dir, `${name}.yaml`);

  let document: unknown;
  try {
    document = parseYaml(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new LexiconLoadError(
      `Failed to load lexicon ${name}: ${message}`,
      filePath,
      error instanceof Error ? error : undefined
    );
  }

  const result = schema.safeParse(document);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.map(String).join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new LexiconLoadError(`Invalid lexicon ${name}: ${issues}`, filePath);
  }

  return result.data;
}

/**
 * Compile a regular expression source taken from a lexicon
 *
 * @throws LexiconLoadError if the source is not a valid expression
 */
export function compilePattern(
  source: string,
  flags: string,
  lexicon: LexiconName,
  dir: string = resolveLexiconDir()
): RegExp {
  try {
    return new RegExp(source, flags);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new LexiconLoadError(
      `Invalid pattern in lexicon ${lexicon}: ${message}`,
      path.join(dir, `${lexicon}.yaml`)
    );
  }
}
