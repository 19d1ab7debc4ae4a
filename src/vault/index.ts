/**
 * Placeholder vault
 *
 * @module vault
 */

export {
  Vault,
  VaultRegistry,
  PLACEHOLDER_PATTERN,
  DEFAULT_SESSION_ID,
  formatPlaceholder,
} from './vault.js';
