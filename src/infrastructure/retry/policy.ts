// ═══════════════════════════════════════════════════════════════════════════════
// RETRY POLICY — Repeating an Async Operation with Backoff
// ═══════════════════════════════════════════════════════════════════════════════
//
// A non-retryable failure is rethrown as is. Running out of retries throws
// RetryExhaustedError with the last failure as its cause.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { backoffDelay, formatDelay, sleep } from './backoff.js';
import { RetryExhaustedError, type RetryOptions } from './types.js';
import { getLogger } from '../../observability/logging/index.js';
import { toError } from '../../types/result.js';

const logger = getLogger({ component: 'retry' });

export class RetryPolicy {
  constructor(private readonly options: RetryOptions) {}

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    const { retries, isRetryable, onRetry } = this.options;
    const wait = this.options.sleep ?? sleep;

    for (let attempt = 1; ; attempt++) {
      try {
        return await fn();
      } catch (error) {
        if (!isRetryable(error)) {
          logger.debug('Non-retryable error', { attempt, error: toError(error).message });
          throw error;
        }

        const cause = toError(error);
        if (attempt > retries) {
          logger.warn('Retry exhausted', { attempts: attempt, error: cause.message });
          throw new RetryExhaustedError(attempt, cause);
        }

        const delayMs = backoffDelay(attempt, this.options, this.options.random);
        logger.debug('Retrying', { attempt, retries, error: cause.message, delay: formatDelay(delayMs) });
        onRetry?.({ attempt, retries, error: cause, delayMs });

        await wait(delayMs);
      }
    }
  }
}

export function createRetryPolicy(options: RetryOptions): RetryPolicy {
  return new RetryPolicy(options);
}
