/**
 * Configuration error types
 */

import type { z } from 'zod';

/**
 * Base class for every configuration problem detected while building a gateway.
 * A gateway that hits one never starts accepting requests.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Error thrown when configuration validation fails
 */
export class ConfigValidationError extends ConfigurationError {
  constructor(
    message: string,
    public readonly errors: Array<{ path: string; message: string }>
  ) {
    super(message);
    this.name = 'ConfigValidationError';
  }

  /**
   * Create a ConfigValidationError from a ZodError
   */
  static fromZodError(zodError: z.ZodError): ConfigValidationError {
    const errors = zodError.issues.map((issue) => ({
      path: issue.path.map(String).join('.'),
      message: issue.message,
    }));
    const message = `Configuration validation failed:\n${errors
      .map((e) => `  - ${e.path || '(root)'}: ${e.message}`)
      .join('\n')}`;
    return new ConfigValidationError(message, errors);
  }
}

/**
 * Error thrown when a configuration or template file cannot be loaded
 */
export class ConfigLoadError extends ConfigurationError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'ConfigLoadError';
  }
}
