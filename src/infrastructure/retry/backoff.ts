// ═══════════════════════════════════════════════════════════════════════════════
// BACKOFF — Exponential Backoff with Full Jitter
// ═══════════════════════════════════════════════════════════════════════════════
//
// Delays are drawn uniformly from [0, min(initial * 2^(attempt-1), max)) so the
// parallel provider fetches spread their retries out.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { BackoffOptions } from './types.js';

/**
 * Delay before retrying after the given failed attempt (1-based).
 */
export function backoffDelay(
  attempt: number,
  options: BackoffOptions,
  random: () => number = Math.random
): number {
  const ceiling = Math.min(options.initialDelayMs * Math.pow(2, attempt - 1), options.maxDelayMs);
  return Math.floor(random() * ceiling);
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Format delay for logging.
 */
export function formatDelay(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  return `${(ms / 1000).toFixed(1)}s`;
}
