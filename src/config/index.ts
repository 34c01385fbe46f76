// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG MODULE — Environment Config for Cache, Fetching, Pipeline and Logging
// ═══════════════════════════════════════════════════════════════════════════════

import os from 'node:os';
import path from 'node:path';

export const VERSION = '1.0.0';

// ─────────────────────────────────────────────────────────────────────────────────
// ENVIRONMENT HELPERS
// ─────────────────────────────────────────────────────────────────────────────────

function envBool(key: string, defaultValue: boolean = false): boolean {
  const value = process.env[key]?.toLowerCase();
  if (value === undefined) return defaultValue;
  return value === 'true' || value === '1' || value === 'yes';
}

function envNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function envString(key: string, defaultValue: string): string {
  const value = process.env[key];
  return value === undefined || value === '' ? defaultValue : value;
}

// ─────────────────────────────────────────────────────────────────────────────────
// CACHE CONFIG
// ─────────────────────────────────────────────────────────────────────────────────

export interface CacheConfig {
  /** Newline-separated range literal file */
  path: string;
}

export function defaultCachePath(): string {
  return path.join(os.homedir(), '.config', 'cdn-sieve.cache');
}

export function loadCacheConfig(): CacheConfig {
  return {
    path: envString('CDN_SIEVE_CACHE_PATH', defaultCachePath()),
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// FETCH CONFIG
// ─────────────────────────────────────────────────────────────────────────────────

export interface FetchConfig {
  /** Per-request timeout */
  timeoutMs: number;

  /** Retries after the first attempt */
  retries: number;

  userAgent: string;
}

export function loadFetchConfig(): FetchConfig {
  return {
    timeoutMs: envNumber('CDN_SIEVE_FETCH_TIMEOUT_MS', 15000),
    retries: Math.max(0, envNumber('CDN_SIEVE_FETCH_RETRIES', 2)),
    userAgent: envString('CDN_SIEVE_USER_AGENT', `cdn-sieve/${VERSION}`),
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// PIPELINE CONFIG
// ─────────────────────────────────────────────────────────────────────────────────

export interface PipelineConfig {
  /** Queue capacity = workers × queueFactor */
  queueFactor: number;
}

export function loadPipelineConfig(): PipelineConfig {
  return {
    queueFactor: Math.max(1, envNumber('CDN_SIEVE_QUEUE_FACTOR', 1)),
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOGGING CONFIG
// ─────────────────────────────────────────────────────────────────────────────────

export type LogLevelName = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

const LOG_LEVEL_NAMES: readonly LogLevelName[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

function isLogLevelName(value: string): value is LogLevelName {
  return (LOG_LEVEL_NAMES as readonly string[]).includes(value);
}

export interface LoggingConfig {
  level: LogLevelName;
  pretty: boolean;
}

export function loadLoggingConfig(): LoggingConfig {
  const level = envString('LOG_LEVEL', 'warn').toLowerCase();

  return {
    level: isLogLevelName(level) ? level : 'warn',
    pretty: envBool('LOG_PRETTY', process.stderr.isTTY === true),
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// COMBINED CONFIG
// ─────────────────────────────────────────────────────────────────────────────────

export interface SieveConfig {
  cache: CacheConfig;
  fetch: FetchConfig;
  pipeline: PipelineConfig;
  logging: LoggingConfig;
}

let cachedConfig: SieveConfig | null = null;

export function loadConfig(): SieveConfig {
  if (cachedConfig) return cachedConfig;

  cachedConfig = {
    cache: loadCacheConfig(),
    fetch: loadFetchConfig(),
    pipeline: loadPipelineConfig(),
    logging: loadLoggingConfig(),
  };

  return cachedConfig;
}

export function reloadConfig(): SieveConfig {
  cachedConfig = null;
  return loadConfig();
}
