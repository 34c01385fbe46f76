// ═══════════════════════════════════════════════════════════════════════════════
// STRUCTURED LOGGER — Leveled Logging to stderr with Component Context
// ═══════════════════════════════════════════════════════════════════════════════
//
// stdout carries the tool's results, so every log line goes to stderr:
// - JSON lines when stderr is not a terminal
// - Pretty single-line output for terminals
// - Component-based child loggers
//
// Usage:
//   import { getLogger } from './observability/logging/index.js';
//
//   const logger = getLogger({ component: 'ranges' });
//   logger.info('Loaded cache', { ranges: 1234 });
//
// ═══════════════════════════════════════════════════════════════════════════════

import { loadConfig, type LogLevelName } from '../../config/index.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Log levels in order of severity.
 */
export type LogLevel = LogLevelName;

/**
 * Numeric log level values (Pino-compatible).
 */
export const LOG_LEVELS: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
};

/**
 * Logger configuration options.
 */
export interface LoggerConfig {
  /** Minimum log level */
  level: LogLevel;

  /** Human-readable output instead of JSON lines */
  pretty: boolean;

  /** Include an ISO timestamp */
  timestamp: boolean;

  /** Where lines are written (stderr unless overridden) */
  write: (line: string) => void;
}

/**
 * Options for creating a child logger.
 */
export interface LoggerOptions {
  /** Component name */
  component?: string;

  /** Additional context */
  context?: Record<string, unknown>;
}

export interface ILogger {
  trace(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error | unknown, context?: Record<string, unknown>): void;
  fatal(message: string, error?: Error | unknown, context?: Record<string, unknown>): void;

  /** Create a child logger with additional context */
  child(options: LoggerOptions): ILogger;

  /** Check if a level is enabled */
  isLevelEnabled(level: LogLevel): boolean;
}

// ─────────────────────────────────────────────────────────────────────────────────
// CONFIGURATION
// ─────────────────────────────────────────────────────────────────────────────────

function defaultConfig(): LoggerConfig {
  const { logging } = loadConfig();
  return {
    level: logging.level,
    pretty: logging.pretty,
    timestamp: true,
    write: (line) => {
      process.stderr.write(line + '\n');
    },
  };
}

let globalConfig: LoggerConfig | null = null;

function currentConfig(): LoggerConfig {
  if (!globalConfig) {
    globalConfig = defaultConfig();
  }
  return globalConfig;
}

/**
 * Configure the global logger settings.
 * Takes effect for loggers that already exist.
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
  globalConfig = { ...currentConfig(), ...config };
}

/**
 * Get the current logger configuration.
 */
export function getLoggerConfig(): LoggerConfig {
  return { ...currentConfig() };
}

// ─────────────────────────────────────────────────────────────────────────────────
// FORMATTERS
// ─────────────────────────────────────────────────────────────────────────────────

function formatError(error: Error | unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      errorName: error.name,
      errorMessage: error.message,
      errorStack: error.stack?.split('\n').slice(0, 10).join('\n'),
      ...(error.cause ? { errorCause: String(error.cause) } : {}),
    };
  }

  if (typeof error === 'string') {
    return { errorMessage: error };
  }

  return { errorMessage: String(error) };
}

function formatLogEntry(
  level: LogLevel,
  message: string,
  context: Record<string, unknown>,
  component: string | undefined,
  config: LoggerConfig
): Record<string, unknown> {
  return {
    level,
    levelNum: LOG_LEVELS[level],
    time: config.timestamp ? new Date().toISOString() : undefined,
    msg: message,
    ...(component ? { component } : {}),
    ...context,
  };
}

const COLORS: Record<LogLevel, string> = {
  trace: '\x1b[90m',  // Gray
  debug: '\x1b[36m',  // Cyan
  info: '\x1b[32m',   // Green
  warn: '\x1b[33m',   // Yellow
  error: '\x1b[31m',  // Red
  fatal: '\x1b[35m',  // Magenta
};
const RESET = '\x1b[0m';
const DIM = '\x1b[2m';

const STANDARD_FIELDS = new Set(['level', 'levelNum', 'time', 'msg', 'component']);

function prettyPrint(
  level: LogLevel,
  entry: Record<string, unknown>
): string {
  const time = typeof entry.time === 'string' ? entry.time.split('T')[1]?.replace('Z', '') ?? '' : '';
  const componentStr = typeof entry.component === 'string' ? `[${entry.component}] ` : '';
  const levelStr = level.toUpperCase().padEnd(5);

  const contextFields: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(entry)) {
    if (!STANDARD_FIELDS.has(key) && value !== undefined) {
      contextFields[key] = value;
    }
  }

  const contextStr = Object.keys(contextFields).length > 0
    ? ` ${DIM}${JSON.stringify(contextFields)}${RESET}`
    : '';

  return `${DIM}${time}${RESET} ${COLORS[level]}${levelStr}${RESET} ${componentStr}${String(entry.msg)}${contextStr}`;
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOGGER IMPLEMENTATION
// ─────────────────────────────────────────────────────────────────────────────────

function createLoggerImpl(options: LoggerOptions = {}): ILogger {
  const { component, context: baseContext = {} } = options;

  const emit = (level: LogLevel, message: string, context: Record<string, unknown>): void => {
    const config = currentConfig();
    if (LOG_LEVELS[level] < LOG_LEVELS[config.level]) {
      return;
    }

    const entry = formatLogEntry(level, message, { ...baseContext, ...context }, component, config);
    config.write(config.pretty ? prettyPrint(level, entry) : JSON.stringify(entry));
  };

  const emitWithError = (
    level: LogLevel,
    message: string,
    error: Error | unknown,
    context: Record<string, unknown> = {}
  ): void => {
    const errorContext = error !== undefined ? formatError(error) : {};
    emit(level, message, { ...context, ...errorContext });
  };

  return {
    trace: (message, context = {}) => emit('trace', message, context),
    debug: (message, context = {}) => emit('debug', message, context),
    info: (message, context = {}) => emit('info', message, context),
    warn: (message, context = {}) => emit('warn', message, context),
    error: (message, error, context) => emitWithError('error', message, error, context),
    fatal: (message, error, context) => emitWithError('fatal', message, error, context),

    child: (childOptions: LoggerOptions): ILogger => {
      return createLoggerImpl({
        component: childOptions.component ?? component,
        context: { ...baseContext, ...childOptions.context },
      });
    },

    isLevelEnabled: (level: LogLevel): boolean => {
      return LOG_LEVELS[level] >= LOG_LEVELS[currentConfig().level];
    },
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// PUBLIC API
// ─────────────────────────────────────────────────────────────────────────────────

let rootLogger: ILogger | null = null;

/**
 * Get the root logger or create a child logger.
 */
export function getLogger(options?: LoggerOptions): ILogger {
  if (!rootLogger) {
    rootLogger = createLoggerImpl();
  }

  if (options) {
    return rootLogger.child(options);
  }

  return rootLogger;
}

/**
 * Reset the root logger and its configuration (for testing).
 */
export function resetLogger(): void {
  rootLogger = null;
  globalConfig = null;
}
