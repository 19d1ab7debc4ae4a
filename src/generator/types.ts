/**
 * Generator contract
 */

export interface GenerateOptions {
  /** Maximum number of tokens to generate */
  maxTokens: number;
  /** Sampling temperature */
  temperature: number;
  /** Aborted when the caller stops waiting */
  signal?: AbortSignal;
}

/**
 * Produces a response for a (sanitized) prompt
 */
export interface Generator {
  generate(prompt: string, options: GenerateOptions): Promise<string>;
  /** Whether the generator can take requests */
  isReady(): boolean;
}

export type GenerationFailure = 'unavailable' | 'timeout' | 'failed';

/**
 * The generator could not produce a response
 */
export class GenerationError extends Error {
  constructor(
    message: string,
    public readonly reason: GenerationFailure,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'GenerationError';
  }
}
