/**
 * promptgate Configuration Schema
 * Zod schemas and TypeScript types for the gateway configuration
 */

import { z } from 'zod';

// =============================================================================
// ENUMS
// =============================================================================

/**
 * How an invalid scanner result is treated by the aggregate verdict
 * - block: an invalid result blocks the direction
 * - monitor: an invalid result is reported but never blocks
 */
export const ScannerModeSchema = z.enum(['block', 'monitor']);
export type ScannerMode = z.infer<typeof ScannerModeSchema>;

/**
 * Log levels for the gateway
 */
export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Categories of sensitive spans recognized by Anonymize and Sensitive
 */
export const EntityTypeSchema = z.enum([
  'EMAIL',
  'PHONE',
  'CREDIT_CARD',
  'SSN',
  'IP_ADDRESS',
  'PERSON',
]);
export type EntityType = z.infer<typeof EntityTypeSchema>;

/**
 * Substring matching strategy
 * - str: plain containment
 * - word: containment on word boundaries only
 */
export const MatchTypeSchema = z.enum(['str', 'word']);
export type MatchType = z.infer<typeof MatchTypeSchema>;

const ThresholdSchema = z.number().min(0).max(1);

const ALL_ENTITY_TYPES: EntityType[] = [
  'EMAIL',
  'PHONE',
  'CREDIT_CARD',
  'SSN',
  'IP_ADDRESS',
  'PERSON',
];

const DEFAULT_BANNED_SUBSTRINGS = ['password', 'admin', 'root', 'sudo'];

// =============================================================================
// GLOBAL / GENERATOR CONFIGURATION
// =============================================================================

/**
 * Global gateway settings
 */
export const GlobalConfigSchema = z.object({
  /** Whether scanning is enabled; false runs the gateway unprotected */
  enabled: z.boolean().default(true),
  /** Log level for the gateway */
  logLevel: LogLevelSchema.default('info'),
}).prefault({});
export type GlobalConfig = z.infer<typeof GlobalConfigSchema>;

/**
 * Parameters passed to the generator on every call
 */
export const GeneratorConfigSchema = z.object({
  /** Maximum number of tokens to generate */
  maxTokens: z.number().int().positive().default(256),
  /** Sampling temperature */
  temperature: z.number().min(0).max(2).default(0.7),
  /** Generator call timeout in milliseconds (0 disables the timeout) */
  timeoutMs: z.number().int().nonnegative().default(120_000),
}).prefault({});
export type GeneratorConfig = z.infer<typeof GeneratorConfigSchema>;

// =============================================================================
// INBOUND SCANNERS
// =============================================================================

export const AnonymizeConfigSchema = z.object({
  enabled: z.boolean().default(true),
  /** Entity categories replaced by vault placeholders */
  entityTypes: z.array(EntityTypeSchema).default(() => [...ALL_ENTITY_TYPES]),
}).prefault({});
export type AnonymizeConfig = z.infer<typeof AnonymizeConfigSchema>;

/**
 * Injection classifier category toggles
 */
export const InjectionCategoriesSchema = z.object({
  /** Detect instruction override attempts */
  instructionOverride: z.boolean().default(true),
  /** Detect system prompt leak attempts */
  systemLeak: z.boolean().default(true),
  /** Detect jailbreak patterns */
  jailbreak: z.boolean().default(true),
  /** Detect encoded payloads */
  encodedPayload: z.boolean().default(true),
}).prefault({});
export type InjectionCategories = z.infer<typeof InjectionCategoriesSchema>;

export const PromptInjectionConfigSchema = z.object({
  enabled: z.boolean().default(true),
  mode: ScannerModeSchema.default('block'),
  /** Classifier confidence at or above which the prompt is rejected */
  threshold: ThresholdSchema.default(0.9),
  categories: InjectionCategoriesSchema,
}).prefault({});
export type PromptInjectionConfig = z.infer<typeof PromptInjectionConfigSchema>;

export const TokenLimitConfigSchema = z.object({
  enabled: z.boolean().default(true),
  mode: ScannerModeSchema.default('block'),
  /** Maximum number of prompt tokens */
  limit: z.number().int().positive().default(2048),
}).prefault({});
export type TokenLimitConfig = z.infer<typeof TokenLimitConfigSchema>;

export const ToxicityConfigSchema = z.object({
  enabled: z.boolean().default(true),
  mode: ScannerModeSchema.default('block'),
  threshold: ThresholdSchema.default(0.5),
}).prefault({});
export type ToxicityConfig = z.infer<typeof ToxicityConfigSchema>;

export const BanSubstringsConfigSchema = z.object({
  enabled: z.boolean().default(true),
  mode: ScannerModeSchema.default('monitor'),
  substrings: z.array(z.string().min(1)).default(() => [...DEFAULT_BANNED_SUBSTRINGS]),
  caseSensitive: z.boolean().default(false),
  matchType: MatchTypeSchema.default('str'),
  /** Require every substring to be present before the check fires */
  containsAll: z.boolean().default(false),
  /** Replace matches with [REDACT] in the scanned text */
  redact: z.boolean().default(false),
}).prefault({});
export type BanSubstringsConfig = z.infer<typeof BanSubstringsConfigSchema>;

/**
 * A banned topic: either a bare name or a name with its own threshold
 * and extra keywords for the topic classifier
 */
export const BannedTopicSchema = z.union([
  z.string().min(1),
  z.object({
    name: z.string().min(1),
    threshold: ThresholdSchema.optional(),
    keywords: z.record(z.string(), ThresholdSchema).optional(),
  }),
]);
export type BannedTopic = z.infer<typeof BannedTopicSchema>;

export const BanTopicsConfigSchema = z.object({
  enabled: z.boolean().default(true),
  mode: ScannerModeSchema.default('block'),
  /** Threshold for topics that do not set their own */
  threshold: ThresholdSchema.default(0.8),
  topics: z.array(BannedTopicSchema).default(() => ['violence', 'illegal_activities']),
}).prefault({});
export type BanTopicsConfig = z.infer<typeof BanTopicsConfigSchema>;

export const InboundConfigSchema = z.object({
  anonymize: AnonymizeConfigSchema,
  promptInjection: PromptInjectionConfigSchema,
  tokenLimit: TokenLimitConfigSchema,
  toxicity: ToxicityConfigSchema,
  banSubstrings: BanSubstringsConfigSchema,
  banTopics: BanTopicsConfigSchema,
}).prefault({});
export type InboundConfig = z.infer<typeof InboundConfigSchema>;

// =============================================================================
// OUTBOUND SCANNERS
// =============================================================================

export const DeanonymizeConfigSchema = z.object({
  enabled: z.boolean().default(true),
}).prefault({});
export type DeanonymizeConfig = z.infer<typeof DeanonymizeConfigSchema>;

export const NoRefusalConfigSchema = z.object({
  enabled: z.boolean().default(true),
  mode: ScannerModeSchema.default('block'),
  threshold: ThresholdSchema.default(0.75),
}).prefault({});
export type NoRefusalConfig = z.infer<typeof NoRefusalConfigSchema>;

export const RelevanceConfigSchema = z.object({
  enabled: z.boolean().default(true),
  mode: ScannerModeSchema.default('block'),
  /** Minimum similarity between response and prompt */
  threshold: ThresholdSchema.default(0.5),
}).prefault({});
export type RelevanceConfig = z.infer<typeof RelevanceConfigSchema>;

export const SensitiveConfigSchema = z.object({
  enabled: z.boolean().default(true),
  mode: ScannerModeSchema.default('block'),
  entityTypes: z.array(EntityTypeSchema).default(() => [...ALL_ENTITY_TYPES]),
  /** Replace leaked values with [REDACTED] */
  redact: z.boolean().default(false),
}).prefault({});
export type SensitiveConfig = z.infer<typeof SensitiveConfigSchema>;

export const CodeConfigSchema = z.object({
  enabled: z.boolean().default(true),
  mode: ScannerModeSchema.default('monitor'),
  languages: z.array(z.string().min(1)).default(() => ['Python', 'JavaScript', 'PHP']),
}).prefault({});
export type CodeConfig = z.infer<typeof CodeConfigSchema>;

export const OutboundConfigSchema = z.object({
  deanonymize: DeanonymizeConfigSchema,
  noRefusal: NoRefusalConfigSchema,
  relevance: RelevanceConfigSchema,
  sensitive: SensitiveConfigSchema,
  code: CodeConfigSchema,
  banSubstrings: BanSubstringsConfigSchema,
}).prefault({});
export type OutboundConfig = z.infer<typeof OutboundConfigSchema>;

// =============================================================================
// ROOT CONFIGURATION
// =============================================================================

/**
 * Root configuration schema for promptgate.yaml
 */
export const GatewayConfigSchema = z.object({
  /** Configuration version */
  version: z.string().default('1.0'),
  /** Template inheritance - list of builtin or custom templates to extend */
  extends: z.array(z.string()).optional(),
  global: GlobalConfigSchema,
  generator: GeneratorConfigSchema,
  inbound: InboundConfigSchema,
  outbound: OutboundConfigSchema,
}).prefault({});

/**
 * Main configuration type for the gateway
 */
export type GatewayConfig = z.infer<typeof GatewayConfigSchema>;

/**
 * Partial configuration type (for merging with defaults)
 */
export type PartialGatewayConfig = z.input<typeof GatewayConfigSchema>;
