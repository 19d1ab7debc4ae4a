/**
 * User-visible gateway responses
 */

import type { ScanDirection } from '../scanners/types.js';

export const EMPTY_MESSAGE_RESPONSE = 'Please provide a message.';

export const GENERATION_FAILURE_RESPONSE = '⚠️ Unable to generate a response right now. Please try again later.';

/**
 * Notice returned when a direction is blocked, naming the scanners that fired
 */
export function blockNotice(stage: ScanDirection, scanners: readonly string[]): string {
  const subject = stage === 'inbound' ? 'Input' : 'Response';
  return `⚠️ ${subject} blocked for security reasons. Detected issues: ${scanners.join(', ')}`;
}
