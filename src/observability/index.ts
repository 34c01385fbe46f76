// ═══════════════════════════════════════════════════════════════════════════════
// OBSERVABILITY — Barrel Export
// ═══════════════════════════════════════════════════════════════════════════════

export {
  type LogLevel,
  type LoggerConfig,
  type LoggerOptions,
  type ILogger,
  LOG_LEVELS,
  configureLogger,
  getLoggerConfig,
  getLogger,
  resetLogger,
} from './logging/index.js';

export {
  type ProgressStream,
  type ProgressReporter,
  SPINNER_FRAMES,
  SPINNER_INTERVAL_MS,
  formatCounters,
  SpinnerReporter,
  noopReporter,
  createProgressReporter,
} from './progress.js';
