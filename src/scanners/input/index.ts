/**
 * Inbound scanners
 */

export { AnonymizeScanner } from './anonymize.js';
export { PromptInjectionScanner } from './prompt-injection.js';
export { TokenLimitScanner } from './token-limit.js';
export { ToxicityScanner } from './toxicity.js';
export { BanTopicsScanner } from './ban-topics.js';
