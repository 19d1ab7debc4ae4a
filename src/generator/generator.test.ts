/**
 * Generator tests
 */

import { describe, it, expect } from 'vitest';
import {
  CompletionGenerator,
  MockCompletionEngine,
  StaticGenerator,
  GenerationError,
  generateWithTimeout,
  FALLBACK_RESPONSE,
  type Generator,
} from './index.js';

const OPTIONS = { maxTokens: 256, temperature: 0.7 };

// ============================================================================
// CompletionGenerator
// ============================================================================

describe('CompletionGenerator', () => {
  it('should wrap the prompt in the chat template with sampling parameters', async () => {
    const engine = new MockCompletionEngine(['Paris is the capital of France.']);
    const generator = new CompletionGenerator(engine);

    const text = await generator.generate('Capital of France?', OPTIONS);

    expect(text).toBe('Paris is the capital of France.');
    expect(engine.requests).toHaveLength(1);
    expect(engine.requests[0].prompt).toBe('[INST] Capital of France? [/INST]');
    expect(engine.requests[0].request).toMatchObject({
      maxTokens: 256,
      temperature: 0.7,
      topP: 0.9,
      topK: 20,
      repeatPenalty: 1.05,
      stop: ['[INST]', '</s>', '<s>'],
    });
  });

  it('should strip an echoed prompt', async () => {
    const engine = new MockCompletionEngine(['[INST] Hi there [/INST] Hello! How can I help?']);
    const generator = new CompletionGenerator(engine);

    expect(await generator.generate('Hi there', OPTIONS)).toBe('Hello! How can I help?');
  });

  it('should retry short completions with the alternate template', async () => {
    const engine = new MockCompletionEngine(['ok', 'A longer second answer']);
    const generator = new CompletionGenerator(engine);

    const text = await generator.generate('q', OPTIONS);

    expect(text).toBe('A longer second answer');
    expect(engine.requests.map((r) => r.prompt)).toEqual(['[INST] q [/INST]', '<s>[INST] q [/INST]']);
  });

  it('should keep a short retry result', async () => {
    const generator = new CompletionGenerator(new MockCompletionEngine(['short']));

    expect(await generator.generate('q', OPTIONS)).toBe('short');
  });

  it('should fall back to a fixed sentence when both attempts are empty', async () => {
    const generator = new CompletionGenerator(new MockCompletionEngine(['   ']));

    expect(await generator.generate('q', OPTIONS)).toBe(FALLBACK_RESPONSE);
  });

  it('should turn engine errors into GenerationError', async () => {
    const engine = new MockCompletionEngine(['unused']);
    engine.failWith(new Error('model crashed'));
    const generator = new CompletionGenerator(engine);

    await expect(generator.generate('q', OPTIONS)).rejects.toMatchObject({
      name: 'GenerationError',
      reason: 'failed',
    });
  });

  it('should refuse requests until the engine is loaded', async () => {
    const engine = new MockCompletionEngine(['Hello there friend'], { loaded: false });
    const generator = new CompletionGenerator(engine);

    expect(generator.isReady()).toBe(false);
    await expect(generator.generate('q', OPTIONS)).rejects.toBeInstanceOf(GenerationError);
    expect(engine.requests).toHaveLength(0);

    engine.setLoaded(true);
    expect(await generator.generate('q', OPTIONS)).toBe('Hello there friend');
  });
});

// ============================================================================
// generateWithTimeout
// ============================================================================

describe('generateWithTimeout', () => {
  it('should return the generated text', async () => {
    expect(await generateWithTimeout(new StaticGenerator('hello'), 'x', OPTIONS, 1000)).toBe('hello');
  });

  it('should wait indefinitely when the timeout is 0', async () => {
    expect(await generateWithTimeout(new StaticGenerator('hello'), 'x', OPTIONS, 0)).toBe('hello');
  });

  it('should time out and abort the generator', async () => {
    let aborted = false;
    const hanging: Generator = {
      isReady: () => true,
      generate: (_prompt, options) =>
        new Promise<string>((_, reject) => {
          options.signal?.addEventListener('abort', () => {
            aborted = true;
            reject(new Error('aborted'));
          });
        }),
    };

    await expect(generateWithTimeout(hanging, 'x', OPTIONS, 20)).rejects.toMatchObject({
      name: 'GenerationError',
      reason: 'timeout',
    });
    expect(aborted).toBe(true);
  });

  it('should wrap generator failures', async () => {
    const failing = new StaticGenerator(() => {
      throw new Error('backend down');
    });

    await expect(generateWithTimeout(failing, 'x', OPTIONS, 1000)).rejects.toMatchObject({
      name: 'GenerationError',
      reason: 'failed',
      message: 'Generation failed: backend down',
    });
  });
});

// ============================================================================
// StaticGenerator
// ============================================================================

describe('StaticGenerator', () => {
  it('should play scripted responses and repeat the last one', async () => {
    const generator = new StaticGenerator(['a', 'b']);

    expect(await generator.generate('1', OPTIONS)).toBe('a');
    expect(await generator.generate('2', OPTIONS)).toBe('b');
    expect(await generator.generate('3', OPTIONS)).toBe('b');
    expect(generator.prompts).toEqual(['1', '2', '3']);
    expect(generator.callCount).toBe(3);
  });

  it('should compute responses from the prompt', async () => {
    const generator = new StaticGenerator((prompt) => `echo: ${prompt}`);

    expect(await generator.generate('hi', OPTIONS)).toBe('echo: hi');
  });
});
