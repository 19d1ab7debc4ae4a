/**
 * Pipeline
 */

export { ScannerSet, type ScannerSetOptions } from './scanner-set.js';
export {
  PipelineRunner,
  checkOutput,
  type ScanRecord,
  type ScanResult,
  type ScanVerdict,
  type RunOptions,
} from './runner.js';
export { buildScannerSets, buildInboundScanners, buildOutboundScanners, type ScannerSets } from './factory.js';
