/**
 * Generator
 */

export { GenerationError, type GenerateOptions, type Generator, type GenerationFailure } from './types.js';
export { generateWithTimeout } from './timeout.js';
export {
  CompletionGenerator,
  MockCompletionEngine,
  formatInstruction,
  formatAlternateInstruction,
  SAMPLING_DEFAULTS,
  STOP_SEQUENCES,
  MIN_COMPLETION_LENGTH,
  FALLBACK_RESPONSE,
  type CompletionEngine,
  type CompletionRequest,
} from './completion.js';
export { StaticGenerator, type StaticResponse } from './static.js';
