/**
 * Outbound scanners
 */

export { DeanonymizeScanner } from './deanonymize.js';
export { NoRefusalScanner } from './no-refusal.js';
export { RelevanceScanner } from './relevance.js';
export { SensitiveScanner } from './sensitive.js';
export { CodeScanner } from './code.js';
