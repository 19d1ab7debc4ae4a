/**
 * Static Generator
 * Scripted in-process generator for tests and demos
 */

import type { GenerateOptions, Generator } from './types.js';

export type StaticResponse = string | string[] | ((prompt: string) => string | Promise<string>);

export class StaticGenerator implements Generator {
  /** Prompts received, in order */
  readonly prompts: string[] = [];
  private readonly responses: StaticResponse;
  private ready: boolean;
  private index = 0;

  constructor(responses: StaticResponse, options?: { ready?: boolean }) {
    this.responses = responses;
    this.ready = options?.ready ?? true;
  }

  isReady(): boolean {
    return this.ready;
  }

  setReady(ready: boolean): void {
    this.ready = ready;
  }

  get callCount(): number {
    return this.prompts.length;
  }

  async generate(prompt: string, _options: GenerateOptions): Promise<string> {
    this.prompts.push(prompt);

    if (typeof this.responses === 'function') {
      return this.responses(prompt);
    }
    if (typeof this.responses === 'string') {
      return this.responses;
    }

    const response = this.responses[Math.min(this.index, this.responses.length - 1)] ?? '';
    this.index += 1;
    return response;
  }
}
