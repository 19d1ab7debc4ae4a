/**
 * Default gateway configuration
 */

import { GatewayConfigSchema, type GatewayConfig } from './schema.js';

/**
 * Generate the default configuration.
 * Every schema field carries its own default, so parsing an empty
 * document yields the full configuration.
 */
export function getDefaultConfig(): GatewayConfig {
  return GatewayConfigSchema.parse({});
}
