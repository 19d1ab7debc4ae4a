/**
 * Gateway
 *
 * Wraps a generator with inbound and outbound scanning. Each request moves
 * through RECEIVED → INBOUND_SCANNED → GENERATING → OUTBOUND_SCANNED →
 * DELIVERED, or stops at BLOCKED after either scan.
 */

import { ConfigurationError } from '../config/errors.js';
import { validateConfig } from '../config/loader.js';
import type { GatewayConfig } from '../config/schema.js';
import { createDefaultProviders } from '../detectors/index.js';
import { generateWithTimeout } from '../generator/timeout.js';
import { GenerationError, type Generator } from '../generator/types.js';
import { buildScannerSets } from '../pipeline/factory.js';
import { PipelineRunner } from '../pipeline/runner.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { DEFAULT_SESSION_ID, VaultRegistry } from '../vault/vault.js';
import { blockNotice, EMPTY_MESSAGE_RESPONSE, GENERATION_FAILURE_RESPONSE } from './messages.js';
import type {
  GatewayOptions,
  GatewayOutcome,
  GatewayState,
  GatewayStatus,
  MessageOptions,
  UnprotectedReason,
} from './types.js';

type GenerationAttempt = { ok: true; text: string } | { ok: false; error: string };

export class Gateway {
  readonly config: GatewayConfig;
  private readonly generator: Generator;
  private readonly logger: Logger;
  private readonly vaults: VaultRegistry;
  private readonly runner: PipelineRunner | null;
  private readonly unprotectedReason?: UnprotectedReason;

  /**
   * @throws ConfigurationError when the configuration or a scanner setting is invalid
   */
  constructor(options: GatewayOptions) {
    this.config = validateConfig(options.config ?? {});
    this.generator = options.generator;
    this.logger =
      options.logger ?? createLogger(options.logSink ?? null, { logLevel: this.config.global.logLevel });
    this.vaults = new VaultRegistry(this.logger);

    if (!this.config.global.enabled) {
      this.runner = null;
      this.unprotectedReason = 'disabled';
      this.logger.warn('[Gateway] Scanning disabled by configuration, running UNPROTECTED');
      return;
    }

    let runner: PipelineRunner | null = null;
    try {
      const sets =
        options.scannerSets ??
        buildScannerSets(
          this.config,
          {
            ...createDefaultProviders({
              injectionCategories: this.config.inbound.promptInjection.categories,
              lexiconDir: options.lexiconDir,
            }),
            ...options.providers,
          },
          { enforceOrder: options.enforceOrder }
        );
      runner = new PipelineRunner(sets, this.logger);
      this.logger.info(
        `[Gateway] Protected: inbound=[${sets.inbound.names().join(', ')}], outbound=[${sets.outbound.names().join(', ')}]`
      );
    } catch (error) {
      if (error instanceof ConfigurationError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`[Gateway] Scanner initialization failed, running UNPROTECTED: ${message}`, error);
      this.unprotectedReason = 'initialization-failed';
    }
    this.runner = runner;
  }

  /**
   * Handle one user message and return only the text for the caller
   */
  async handleMessage(text: string, options: MessageOptions = {}): Promise<{ response: string }> {
    const outcome = await this.process(text, options);
    return { response: outcome.response };
  }

  /**
   * Handle one user message and return the full outcome
   */
  async process(text: string, options: MessageOptions = {}): Promise<GatewayOutcome> {
    const sessionId = options.sessionId ?? DEFAULT_SESSION_ID;
    const states: GatewayState[] = ['RECEIVED'];
    const isProtected = this.runner !== null;

    if (text.trim() === '') {
      states.push('REJECTED');
      return { state: 'REJECTED', response: EMPTY_MESSAGE_RESPONSE, states, sessionId, protected: isProtected };
    }

    if (!this.runner) {
      this.logger.warn(`[Gateway] UNPROTECTED (${this.unprotectedReason}): message passed to the generator unscanned`);
      states.push('GENERATING');
      const generated = await this.generate(text);
      if (!generated.ok) {
        states.push('FAILED');
        return {
          state: 'FAILED',
          response: GENERATION_FAILURE_RESPONSE,
          states,
          sessionId,
          protected: false,
          error: generated.error,
        };
      }
      states.push('DELIVERED');
      return { state: 'DELIVERED', response: generated.text, states, sessionId, protected: false };
    }

    const vault = this.vaults.get(sessionId);

    const inbound = await this.runner.run('inbound', text, { vault });
    states.push('INBOUND_SCANNED');
    if (inbound.verdict === 'block') {
      states.push('BLOCKED');
      this.logger.warn(`[Gateway] Input blocked: session=${sessionId}, scanners=${inbound.triggered.join(', ')}`);
      return {
        state: 'BLOCKED',
        response: blockNotice('inbound', inbound.triggered),
        states,
        sessionId,
        protected: true,
        inbound,
        blocked: { stage: 'inbound', scanners: inbound.triggered },
      };
    }

    states.push('GENERATING');
    const generated = await this.generate(inbound.text);
    if (!generated.ok) {
      states.push('FAILED');
      return {
        state: 'FAILED',
        response: GENERATION_FAILURE_RESPONSE,
        states,
        sessionId,
        protected: true,
        inbound,
        error: generated.error,
      };
    }

    const outbound = await this.runner.run('outbound', generated.text, { vault, priorText: text });
    states.push('OUTBOUND_SCANNED');
    if (outbound.verdict === 'block') {
      states.push('BLOCKED');
      this.logger.warn(`[Gateway] Response blocked: session=${sessionId}, scanners=${outbound.triggered.join(', ')}`);
      return {
        state: 'BLOCKED',
        response: blockNotice('outbound', outbound.triggered),
        states,
        sessionId,
        protected: true,
        inbound,
        outbound,
        blocked: { stage: 'outbound', scanners: outbound.triggered },
      };
    }

    states.push('DELIVERED');
    this.logger.info(`[Gateway] Delivered: session=${sessionId}`);
    return { state: 'DELIVERED', response: outbound.text, states, sessionId, protected: true, inbound, outbound };
  }

  getStatus(): GatewayStatus {
    const ready = this.generator.isReady();
    if (!this.runner) {
      return { protected: false, ready, mode: 'unprotected', reason: this.unprotectedReason };
    }
    return { protected: true, ready, mode: 'protected' };
  }

  /**
   * Close a conversation and forget its placeholders
   */
  endSession(sessionId: string = DEFAULT_SESSION_ID): boolean {
    return this.vaults.end(sessionId);
  }

  private async generate(prompt: string): Promise<GenerationAttempt> {
    const { maxTokens, temperature, timeoutMs } = this.config.generator;
    try {
      if (!this.generator.isReady()) {
        throw new GenerationError('Generator is not ready', 'unavailable');
      }
      const text = await generateWithTimeout(this.generator, prompt, { maxTokens, temperature }, timeoutMs);
      return { ok: true, text };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`[Gateway] Generation failed: ${message}`, error);
      return { ok: false, error: message };
    }
  }
}

/**
 * Create a gateway
 *
 * @throws ConfigurationError when the configuration or a scanner setting is invalid
 */
export function createGateway(options: GatewayOptions): Gateway {
  return new Gateway(options);
}
