// ═══════════════════════════════════════════════════════════════════════════════
// RETRY MODULE INDEX — Retry Policy Exports
// ═══════════════════════════════════════════════════════════════════════════════

export {
  type BackoffOptions,
  type RetryOptions,
  type RetryEvent,
  DEFAULT_BACKOFF,
  RetryExhaustedError,
} from './types.js';

export { backoffDelay, sleep, formatDelay } from './backoff.js';

export { RetryPolicy, createRetryPolicy } from './policy.js';
