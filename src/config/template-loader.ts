/**
 * Template Loading and Merging System
 *
 * Handles resolution of builtin templates, loading YAML files,
 * and deep merging of configuration objects with special array handling.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { parse as parseYaml } from 'yaml';
import { ConfigLoadError } from './errors.js';
import type { Logger } from '../utils/logger.js';

/** Template metadata fields that are documentation only */
const TEMPLATE_METADATA_FIELDS = ['name', 'description', 'version'];

/**
 * Resolves the rules/ directory shipped with the package.
 * src/config/ (Vitest) and dist/config/ (build) sit at the same depth.
 */
export function resolveRulesDir(): string {
  const currentDir = path.dirname(fileURLToPath(import.meta.url));
  return path.join(currentDir, '../../rules');
}

/**
 * Resolves builtin template names to file paths
 */
export class TemplateResolver {
  private builtinPath: string;
  private logger: Logger;

  constructor(logger: Logger, builtinPath: string = path.join(resolveRulesDir(), 'builtin')) {
    this.logger = logger;
    this.builtinPath = builtinPath;
  }

  /**
   * Resolve template name to file path
   * "builtin/strict" → "/path/to/rules/builtin/strict.yaml"
   */
  resolveTemplatePath(templateName: string): string {
    this.logger.debug(`[Template] Resolving template: ${templateName}`);

    if (templateName.startsWith('builtin/')) {
      const name = templateName.slice('builtin/'.length);
      const filePath = path.join(this.builtinPath, `${name}.yaml`);

      if (!fs.existsSync(filePath)) {
        this.logger.error(`[Template] Template not found: ${templateName} at ${filePath}`);
        throw new ConfigLoadError(`Built-in template not found: ${templateName}`, filePath);
      }

      return filePath;
    }

    return path.resolve(templateName);
  }

  /**
   * Load a single template file
   */
  loadTemplate(templateName: string): Record<string, unknown> {
    const filePath = this.resolveTemplatePath(templateName);

    let parsed: unknown;
    try {
      parsed = parseYaml(fs.readFileSync(filePath, 'utf-8'));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`[Template] Failed to load template ${templateName}: ${message}`);
      throw new ConfigLoadError(
        `Failed to load template ${templateName}: ${message}`,
        filePath,
        error instanceof Error ? error : undefined
      );
    }

    if (parsed === null || parsed === undefined) {
      return {};
    }
    if (!isPlainObject(parsed)) {
      throw new ConfigLoadError(`Template ${templateName} is not a mapping`, filePath);
    }

    const template = { ...parsed };
    for (const field of TEMPLATE_METADATA_FIELDS) {
      delete template[field];
    }

    this.logger.info(`[Template] Loaded template: ${templateName}`);
    return template;
  }
}

/**
 * Concatenate arrays and drop duplicates, preserving first-seen order
 */
function mergeArrays(target: unknown[], source: unknown[]): unknown[] {
  return Array.from(new Set([...target, ...source]));
}

/**
 * Deep merge two configs, with special handling for arrays
 */
export function deepMergeConfigs(
  target: Record<string, unknown> = {},
  source: Record<string, unknown> = {}
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key];

    if (Array.isArray(sourceValue) && Array.isArray(targetValue)) {
      result[key] = mergeArrays(targetValue, sourceValue);
    } else if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMergeConfigs(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

/**
 * Check if value is a plain object (not array, not null)
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load and merge multiple templates in order
 */
export function loadTemplates(templateNames: string[], logger: Logger): Record<string, unknown> {
  logger.info(`[Template] Loading ${templateNames.length} templates: ${templateNames.join(', ')}`);
  const resolver = new TemplateResolver(logger);
  let merged: Record<string, unknown> = {};

  for (const templateName of templateNames) {
    merged = deepMergeConfigs(merged, resolver.loadTemplate(templateName));
    logger.debug(`[Template] Merged template ${templateName} into config`);
  }

  return merged;
}
