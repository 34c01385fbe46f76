// ═══════════════════════════════════════════════════════════════════════════════
// CDN-SIEVE — Library Entry Point
// ═══════════════════════════════════════════════════════════════════════════════

export * from './address/index.js';
export * from './ranges/index.js';
export * from './providers/index.js';
export * from './pipeline/index.js';
export * from './cli/index.js';
export {
  type ProgressReporter,
  type ProgressStream,
  SpinnerReporter,
  createProgressReporter,
  formatCounters,
  noopReporter,
} from './observability/index.js';
export { type SieveConfig, VERSION, loadConfig, reloadConfig } from './config/index.js';
export { SieveErrorCode, sieveError, type SieveError, type SieveResult, type AsyncSieveResult } from './types/errors.js';
export { type Result, type AsyncResult, ok, err } from './types/result.js';
