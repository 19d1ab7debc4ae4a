/**
 * Completion Generator
 *
 * Adapts a raw text-completion engine (a local instruction-tuned model) to
 * the Generator contract: chat template, sampling parameters, echo removal
 * and a single retry for near-empty completions.
 */

import type { Logger } from '../utils/logger.js';
import { createNoOpLogger } from '../utils/logger.js';
import { GenerationError, type GenerateOptions, type Generator } from './types.js';

// ============================================================================
// Types
// ============================================================================

export interface CompletionRequest {
  maxTokens: number;
  temperature: number;
  topP: number;
  topK: number;
  repeatPenalty: number;
  stop: string[];
  signal?: AbortSignal;
}

/**
 * Raw completion backend
 */
export interface CompletionEngine {
  complete(prompt: string, request: CompletionRequest): Promise<string>;
  /** Whether the model weights are loaded */
  isLoaded(): boolean;
}

// ============================================================================
// Constants
// ============================================================================

export const SAMPLING_DEFAULTS = {
  topP: 0.9,
  topK: 20,
  repeatPenalty: 1.05,
} as const;

export const STOP_SEQUENCES = ['[INST]', '</s>', '<s>'];

/** Completions shorter than this are retried once with the alternate template */
export const MIN_COMPLETION_LENGTH = 10;

export const FALLBACK_RESPONSE =
  'I understand your question. Let me provide a response based on my training data.';

export function formatInstruction(prompt: string): string {
  return `[INST] ${prompt} [/INST]`;
}

export function formatAlternateInstruction(prompt: string): string {
  return `<s>[INST] ${prompt} [/INST]`;
}

// ============================================================================
// Generator
// ============================================================================

export class CompletionGenerator implements Generator {
  private readonly engine: CompletionEngine;
  private readonly logger: Logger;

  constructor(engine: CompletionEngine, logger?: Logger) {
    this.engine = engine;
    this.logger = logger ?? createNoOpLogger();
  }

  isReady(): boolean {
    return this.engine.isLoaded();
  }

  async generate(prompt: string, options: GenerateOptions): Promise<string> {
    if (!this.engine.isLoaded()) {
      throw new GenerationError('Completion engine is not loaded', 'unavailable');
    }

    let text = await this.complete(formatInstruction(prompt), options);

    if (text.length < MIN_COMPLETION_LENGTH) {
      this.logger.debug(`[Generator] Short completion (${text.length} chars), retrying with alternate template`);
      text = await this.complete(formatAlternateInstruction(prompt), options);
    }

    if (!text) {
      this.logger.warn('[Generator] Empty completion, using fallback response');
      return FALLBACK_RESPONSE;
    }
    return text;
  }

  private async complete(formatted: string, options: GenerateOptions): Promise<string> {
    let raw: string;
    try {
      raw = await this.engine.complete(formatted, {
        maxTokens: options.maxTokens,
        temperature: options.temperature,
        ...SAMPLING_DEFAULTS,
        stop: [...STOP_SEQUENCES],
        signal: options.signal,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`[Generator] Completion failed: ${message}`);
      throw new GenerationError(`Completion failed: ${message}`, 'failed', error);
    }

    const text = raw.trim();
    return text.startsWith(formatted) ? text.slice(formatted.length).trim() : text;
  }
}

// ============================================================================
// Mock engine
// ============================================================================

/**
 * Scripted completion engine for testing.
 * Returns the queued completions in order, repeating the last one.
 */
export class MockCompletionEngine implements CompletionEngine {
  readonly requests: Array<{ prompt: string; request: CompletionRequest }> = [];
  private loaded: boolean;
  private completions: string[];
  private failure: Error | null = null;

  constructor(completions: string[] = [], options?: { loaded?: boolean }) {
    this.completions = [...completions];
    this.loaded = options?.loaded ?? true;
  }

  isLoaded(): boolean {
    return this.loaded;
  }

  setLoaded(loaded: boolean): void {
    this.loaded = loaded;
  }

  /**
   * Make every following call reject with this error
   */
  failWith(error: Error): void {
    this.failure = error;
  }

  async complete(prompt: string, request: CompletionRequest): Promise<string> {
    this.requests.push({ prompt, request });
    if (this.failure) {
      throw this.failure;
    }
    const next = this.completions.length > 1 ? this.completions.shift() : this.completions[0];
    return next ?? '';
  }
}
