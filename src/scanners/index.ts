/**
 * Scanners
 */

export * from './types.js';
export * from './input/index.js';
export * from './output/index.js';
export { BanSubstringsScanner } from './ban-substrings.js';
