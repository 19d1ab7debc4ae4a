/**
 * promptgate - Content-security gateway for local language models
 * Scans prompts before generation and responses before delivery
 */

// =============================================================================
// VERSION & CONSTANTS
// =============================================================================

export const VERSION = '0.1.0';

// =============================================================================
// GATEWAY
// =============================================================================

export * from './gateway/index.js';

// =============================================================================
// PIPELINE & SCANNERS
// =============================================================================

export * from './pipeline/index.js';
export * from './scanners/index.js';
export * from './detectors/index.js';

// =============================================================================
// GENERATION
// =============================================================================

export * from './generator/index.js';

// =============================================================================
// VAULT, CONFIG & LOGGING
// =============================================================================

export * from './vault/index.js';
export * from './config/index.js';
export { createLogger, createNoOpLogger, type Logger, type LogSink, type LoggerOptions } from './utils/logger.js';
