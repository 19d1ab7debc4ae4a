/**
 * Generator call with a deadline
 */

import { GenerationError, type GenerateOptions, type Generator } from './types.js';

/**
 * Call the generator, failing with GenerationError once timeoutMs has passed.
 * The signal handed to the generator is aborted on timeout. A timeout of 0
 * waits indefinitely.
 *
 * @throws GenerationError on timeout or when the generator fails
 */
export async function generateWithTimeout(
  generator: Generator,
  prompt: string,
  options: Omit<GenerateOptions, 'signal'>,
  timeoutMs: number
): Promise<string> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const pending: Array<Promise<string>> = [generator.generate(prompt, { ...options, signal: controller.signal })];
  if (timeoutMs > 0) {
    pending.push(
      new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
          reject(new GenerationError(`Generation timed out after ${timeoutMs}ms`, 'timeout'));
          controller.abort();
        }, timeoutMs);
      })
    );
  }

  try {
    return await Promise.race(pending);
  } catch (error) {
    if (error instanceof GenerationError) {
      throw error;
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new GenerationError(`Generation failed: ${message}`, 'failed', error);
  } finally {
    clearTimeout(timer);
  }
}
