/**
 * Gateway types
 */

import type { GatewayConfig, PartialGatewayConfig } from '../config/schema.js';
import type { DetectorProviders } from '../detectors/types.js';
import type { Generator } from '../generator/types.js';
import type { ScannerSets } from '../pipeline/factory.js';
import type { ScanResult } from '../pipeline/runner.js';
import type { ScanDirection } from '../scanners/types.js';
import type { Logger, LogSink } from '../utils/logger.js';

/**
 * Request lifecycle states
 * RECEIVED → INBOUND_SCANNED → (BLOCKED | GENERATING) → OUTBOUND_SCANNED → (BLOCKED | DELIVERED)
 * plus REJECTED (empty message) and FAILED (generation error)
 */
export type GatewayState =
  | 'RECEIVED'
  | 'INBOUND_SCANNED'
  | 'GENERATING'
  | 'OUTBOUND_SCANNED'
  | 'BLOCKED'
  | 'DELIVERED'
  | 'REJECTED'
  | 'FAILED';

export type TerminalState = Extract<GatewayState, 'BLOCKED' | 'DELIVERED' | 'REJECTED' | 'FAILED'>;

export type UnprotectedReason = 'disabled' | 'initialization-failed';

export interface GatewayStatus {
  /** Whether scanning is active */
  protected: boolean;
  /** Whether the generator can take requests */
  ready: boolean;
  mode: 'protected' | 'unprotected';
  /** Why protection is off */
  reason?: UnprotectedReason;
}

export interface GatewayOutcome {
  state: TerminalState;
  /** Text returned to the caller */
  response: string;
  /** States visited, in order */
  states: GatewayState[];
  sessionId: string;
  /** False when the request bypassed scanning */
  protected: boolean;
  inbound?: ScanResult;
  outbound?: ScanResult;
  blocked?: { stage: ScanDirection; scanners: string[] };
  /** Internal failure detail; never part of the response */
  error?: string;
}

export interface MessageOptions {
  /** Conversation the message belongs to (placeholder vault scope) */
  sessionId?: string;
}

export interface GatewayOptions {
  /** Generator invoked between the two pipelines */
  generator: Generator;
  /** Configuration; validated and completed with defaults */
  config?: PartialGatewayConfig | GatewayConfig;
  /** Capability overrides for the built-in scanners */
  providers?: Partial<DetectorProviders>;
  /** Prebuilt scanner sets, used instead of building them from config */
  scannerSets?: ScannerSets;
  /** Check scanner ordering constraints (default true) */
  enforceOrder?: boolean;
  /** Lexicon directory override */
  lexiconDir?: string;
  logger?: Logger;
  /** Host log sink, used when no logger is given */
  logSink?: LogSink;
}
