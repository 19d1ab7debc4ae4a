/**
 * Gateway
 */

export { Gateway, createGateway } from './gateway.js';
export { blockNotice, EMPTY_MESSAGE_RESPONSE, GENERATION_FAILURE_RESPONSE } from './messages.js';
export type {
  GatewayOptions,
  GatewayOutcome,
  GatewayState,
  GatewayStatus,
  MessageOptions,
  TerminalState,
  UnprotectedReason,
} from './types.js';
