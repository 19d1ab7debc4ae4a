/**
 * Gateway configuration
 *
 * @module config
 */

export * from './schema.js';
export { getDefaultConfig } from './defaults.js';
export { ConfigurationError, ConfigValidationError, ConfigLoadError } from './errors.js';
export {
  validateConfig,
  isValidConfig,
  findConfigFile,
  loadConfig,
  loadConfigFromString,
  mergeConfigs,
} from './loader.js';
export {
  TemplateResolver,
  deepMergeConfigs,
  loadTemplates,
  resolveRulesDir,
} from './template-loader.js';
