/**
 * Scanner set factory
 * Builds the inbound and outbound sets from configuration, in canonical order
 */

import type { GatewayConfig } from '../config/schema.js';
import type { DetectorProviders } from '../detectors/types.js';
import { BanSubstringsScanner } from '../scanners/ban-substrings.js';
import {
  AnonymizeScanner,
  BanTopicsScanner,
  PromptInjectionScanner,
  TokenLimitScanner,
  ToxicityScanner,
} from '../scanners/input/index.js';
import {
  CodeScanner,
  DeanonymizeScanner,
  NoRefusalScanner,
  RelevanceScanner,
  SensitiveScanner,
} from '../scanners/output/index.js';
import type { Scanner } from '../scanners/types.js';
import { ScannerSet, type ScannerSetOptions } from './scanner-set.js';

export interface ScannerSets {
  inbound: ScannerSet;
  outbound: ScannerSet;
}

/**
 * Inbound scanners enabled in the configuration
 */
export function buildInboundScanners(config: GatewayConfig, providers: DetectorProviders): Scanner[] {
  const inbound = config.inbound;
  const scanners: Scanner[] = [];

  if (inbound.anonymize.enabled) {
    scanners.push(new AnonymizeScanner(inbound.anonymize, providers.entities));
  }
  if (inbound.promptInjection.enabled) {
    scanners.push(new PromptInjectionScanner(inbound.promptInjection, providers.injection));
  }
  if (inbound.tokenLimit.enabled) {
    scanners.push(new TokenLimitScanner(inbound.tokenLimit, providers.tokenizer));
  }
  if (inbound.toxicity.enabled) {
    scanners.push(new ToxicityScanner(inbound.toxicity, providers.toxicity));
  }
  if (inbound.banSubstrings.enabled) {
    scanners.push(new BanSubstringsScanner(inbound.banSubstrings));
  }
  if (inbound.banTopics.enabled) {
    scanners.push(new BanTopicsScanner(inbound.banTopics, providers.topics));
  }

  return scanners;
}

/**
 * Outbound scanners enabled in the configuration
 */
export function buildOutboundScanners(config: GatewayConfig, providers: DetectorProviders): Scanner[] {
  const outbound = config.outbound;
  const scanners: Scanner[] = [];

  if (outbound.deanonymize.enabled) {
    scanners.push(new DeanonymizeScanner());
  }
  if (outbound.noRefusal.enabled) {
    scanners.push(new NoRefusalScanner(outbound.noRefusal, providers.refusal));
  }
  if (outbound.relevance.enabled) {
    scanners.push(new RelevanceScanner(outbound.relevance, providers.similarity));
  }
  if (outbound.sensitive.enabled) {
    scanners.push(new SensitiveScanner(outbound.sensitive, providers.entities));
  }
  if (outbound.code.enabled) {
    scanners.push(new CodeScanner(outbound.code, providers.code));
  }
  if (outbound.banSubstrings.enabled) {
    scanners.push(new BanSubstringsScanner(outbound.banSubstrings));
  }

  return scanners;
}

/**
 * Build both scanner sets.
 *
 * @throws ConfigurationError for an invalid scanner configuration
 */
export function buildScannerSets(
  config: GatewayConfig,
  providers: DetectorProviders,
  options: ScannerSetOptions = {}
): ScannerSets {
  return {
    inbound: new ScannerSet('inbound', buildInboundScanners(config, providers), options),
    outbound: new ScannerSet('outbound', buildOutboundScanners(config, providers), options),
  };
}
