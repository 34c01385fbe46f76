// ═══════════════════════════════════════════════════════════════════════════════
// SIEVE ERRORS — Typed Error Values for Fallible Operations
// ═══════════════════════════════════════════════════════════════════════════════

import type { AsyncResult, Result } from './result.js';

/**
 * Error codes.
 */
export const SieveErrorCode = {
  // Startup
  INVALID_OPTIONS: 'INVALID_OPTIONS',
  RANGE_ACQUISITION_FAILED: 'RANGE_ACQUISITION_FAILED',
  INPUT_OPEN_FAILED: 'INPUT_OPEN_FAILED',
  OUTPUT_OPEN_FAILED: 'OUTPUT_OPEN_FAILED',

  // Best-effort cache
  CACHE_READ_FAILED: 'CACHE_READ_FAILED',
  CACHE_WRITE_FAILED: 'CACHE_WRITE_FAILED',

  // Run
  PIPELINE_FAILED: 'PIPELINE_FAILED',
} as const;

export type SieveErrorCode = typeof SieveErrorCode[keyof typeof SieveErrorCode];

/**
 * Error value carried by every fallible operation.
 *
 * `operation` names the step that failed (e.g. `loadRanges`); the top-level
 * handler prints it instead of inspecting the call stack.
 */
export interface SieveError {
  readonly code: SieveErrorCode;
  readonly operation: string;
  readonly message: string;
  readonly cause?: Error;
}

export function sieveError(
  code: SieveErrorCode,
  operation: string,
  message: string,
  cause?: Error
): SieveError {
  return { code, operation, message, cause };
}

export type SieveResult<T> = Result<T, SieveError>;

export type AsyncSieveResult<T> = AsyncResult<T, SieveError>;
