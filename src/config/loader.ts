/**
 * promptgate Configuration Loader
 * YAML file loading and validation utilities
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { parse as parseYaml } from 'yaml';
import { GatewayConfigSchema, type GatewayConfig, type PartialGatewayConfig } from './schema.js';
import { getDefaultConfig } from './defaults.js';
import { ConfigLoadError, ConfigValidationError } from './errors.js';
import { loadTemplates, deepMergeConfigs, isPlainObject } from './template-loader.js';
import { createLogger, type Logger } from '../utils/logger.js';

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Validates a configuration object using the Zod schema.
 *
 * @param config - Unknown configuration object to validate
 * @returns Validated configuration with every default applied
 * @throws ConfigValidationError if validation fails
 */
export function validateConfig(config: unknown): GatewayConfig {
  const result = GatewayConfigSchema.safeParse(config);

  if (!result.success) {
    throw ConfigValidationError.fromZodError(result.error);
  }

  return result.data;
}

/**
 * Checks if a configuration object is valid without throwing.
 */
export function isValidConfig(
  config: unknown
): { valid: true; config: GatewayConfig } | { valid: false; errors: Array<{ path: string; message: string }> } {
  const result = GatewayConfigSchema.safeParse(config);

  if (result.success) {
    return { valid: true, config: result.data };
  }

  return {
    valid: false,
    errors: result.error.issues.map((issue) => ({
      path: issue.path.map(String).join('.'),
      message: issue.message,
    })),
  };
}

// =============================================================================
// FILE LOADING
// =============================================================================

/**
 * Standard config file names to look for
 */
const CONFIG_FILE_NAMES = ['promptgate.yaml', 'promptgate.yml', '.promptgate.yaml', '.promptgate.yml'];

/**
 * Reads and parses a YAML configuration file.
 *
 * @throws ConfigLoadError if file cannot be read or parsed
 */
function readYamlFile(filePath: string): unknown {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new ConfigLoadError(`Configuration file not found: ${filePath}`, filePath, error);
    }
    throw new ConfigLoadError(
      'Failed to read configuration file',
      filePath,
      error instanceof Error ? error : undefined
    );
  }

  try {
    return parseYaml(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigLoadError(
      `Failed to parse YAML file: ${message}`,
      filePath,
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * Finds a configuration file in the specified directory or its parents.
 *
 * @returns Path to found config file, or null if not found
 */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  let currentDir = path.resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = path.join(currentDir, fileName);
      if (fs.existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = path.dirname(currentDir);
    if (parent === currentDir) {
      return null;
    }
    currentDir = parent;
  }
}

/**
 * Resolves `extends` templates and validates the merged document.
 * An empty document yields the default configuration.
 */
function resolveDocument(document: unknown, log: Logger, source: string): GatewayConfig {
  if (document === null || document === undefined) {
    log.warn(`[Config] ${source} is empty, using defaults`);
    return getDefaultConfig();
  }

  if (!isPlainObject(document)) {
    return validateConfig(document);
  }

  const templates = document.extends;
  if (Array.isArray(templates) && templates.length > 0) {
    const names = templates.filter((name): name is string => typeof name === 'string');
    log.info(`[Config] Found extends field with ${names.length} templates`);

    // Templates first, then the document itself (document overrides templates)
    const templateConfig = loadTemplates(names, log);
    const merged: Record<string, unknown> = deepMergeConfigs(templateConfig, document);
    delete merged.extends;
    log.debug('[Config] Merged template config with user config');

    return validateConfig(merged);
  }

  log.debug('[Config] No extends field, validating config directly');
  return validateConfig(document);
}

/**
 * Loads configuration from a YAML file with template inheritance support.
 *
 * If no path is provided, searches for a config file from the working
 * directory upwards. If none is found, returns the default configuration.
 *
 * @throws ConfigLoadError if the file doesn't exist or can't be parsed
 * @throws ConfigValidationError if the configuration is invalid
 */
export function loadConfig(configPath?: string, logger?: Logger): GatewayConfig {
  const log = logger ?? createLogger(null, null);

  const foundPath = configPath ? path.resolve(configPath) : findConfigFile();

  if (!foundPath) {
    log.debug('[Config] No config file found, using defaults');
    return getDefaultConfig();
  }

  log.info(`[Config] Loading config from: ${foundPath}`);
  return resolveDocument(readYamlFile(foundPath), log, 'Config file');
}

/**
 * Loads configuration from a YAML string with template inheritance support.
 *
 * @throws ConfigLoadError if the YAML cannot be parsed
 * @throws ConfigValidationError if the configuration is invalid
 */
export function loadConfigFromString(yamlContent: string, logger?: Logger): GatewayConfig {
  const log = logger ?? createLogger(null, null);

  log.debug('[Config] Loading config from string');
  let document: unknown;
  try {
    document = parseYaml(yamlContent);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigLoadError(
      `Failed to parse YAML string: ${message}`,
      '<string>',
      error instanceof Error ? error : undefined
    );
  }
  return resolveDocument(document, log, 'Config string');
}

/**
 * Merges configuration sources in order (later sources win) and validates
 * the result.
 */
export function mergeConfigs(...sources: PartialGatewayConfig[]): GatewayConfig {
  const merged = sources.reduce<Record<string, unknown>>(
    (acc, source) => (isPlainObject(source) ? deepMerge(acc, source) : acc),
    {}
  );

  return validateConfig(merged);
}

/**
 * Deep merges two objects. Source values override target values, arrays
 * included.
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}
