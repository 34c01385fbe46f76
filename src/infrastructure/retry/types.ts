// ═══════════════════════════════════════════════════════════════════════════════
// RETRY TYPES — Options, Events and the Exhaustion Error
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// CONFIGURATION
// ─────────────────────────────────────────────────────────────────────────────────

export interface BackoffOptions {
  /** Ceiling of the first retry delay in ms */
  readonly initialDelayMs: number;

  /** Upper bound of any retry delay in ms */
  readonly maxDelayMs: number;
}

export interface RetryOptions extends BackoffOptions {
  /** Retries after the first attempt */
  readonly retries: number;

  /** Decides whether a failed attempt is worth repeating */
  readonly isRetryable: (error: unknown) => boolean;

  /** Called before each retry */
  readonly onRetry?: (event: RetryEvent) => void;

  /** Injected for tests */
  readonly sleep?: (ms: number) => Promise<void>;
  readonly random?: () => number;
}

export const DEFAULT_BACKOFF: BackoffOptions = {
  initialDelayMs: 500,
  maxDelayMs: 5000,
};

// ─────────────────────────────────────────────────────────────────────────────────
// EVENTS
// ─────────────────────────────────────────────────────────────────────────────────

export interface RetryEvent {
  /** Attempt that just failed (1-based) */
  readonly attempt: number;

  readonly retries: number;

  readonly error: Error;

  /** Delay before the next attempt in ms */
  readonly delayMs: number;
}

// ─────────────────────────────────────────────────────────────────────────────────
// ERRORS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Thrown when every attempt failed with a retryable error.
 */
export class RetryExhaustedError extends Error {
  readonly name = 'RetryExhaustedError';

  constructor(
    readonly attempts: number,
    error: Error
  ) {
    super(`Retry exhausted after ${attempts} attempts: ${error.message}`, { cause: error });
  }
}
