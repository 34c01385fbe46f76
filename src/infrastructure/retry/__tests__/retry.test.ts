// ═══════════════════════════════════════════════════════════════════════════════
// RETRY TESTS — Backoff Calculation and Policy Execution
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, vi } from 'vitest';
import {
  DEFAULT_BACKOFF,
  RetryExhaustedError,
  backoffDelay,
  createRetryPolicy,
  formatDelay,
  type RetryEvent,
} from '../index.js';

const noSleep = async (_ms: number): Promise<void> => undefined;
const alwaysRetry = (): boolean => true;

// ─────────────────────────────────────────────────────────────────────────────────
// BACKOFF
// ─────────────────────────────────────────────────────────────────────────────────

describe('backoffDelay', () => {
  it('should double the ceiling per attempt and cap it', () => {
    const top = (): number => 0.999;

    expect([1, 2, 3, 4, 5].map(attempt => backoffDelay(attempt, DEFAULT_BACKOFF, top)))
      .toEqual([499, 999, 1998, 3996, 4995]);
  });

  it('should draw from zero upward', () => {
    expect(backoffDelay(3, DEFAULT_BACKOFF, () => 0)).toBe(0);
    expect(backoffDelay(2, DEFAULT_BACKOFF, () => 0.5)).toBe(500);
  });

  it('should stay within the ceiling with the default random source', () => {
    for (let i = 0; i < 20; i++) {
      const delay = backoffDelay(2, DEFAULT_BACKOFF);
      expect(delay).toBeGreaterThanOrEqual(0);
      expect(delay).toBeLessThan(1000);
    }
  });

  it('should format delays for logs', () => {
    expect(formatDelay(250)).toBe('250ms');
    expect(formatDelay(1500)).toBe('1.5s');
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// POLICY
// ─────────────────────────────────────────────────────────────────────────────────

describe('RetryPolicy', () => {
  it('should return the value once an attempt succeeds', async () => {
    const fn = vi.fn()
      .mockRejectedValueOnce(new Error('socket hang up'))
      .mockRejectedValueOnce(new Error('socket hang up'))
      .mockResolvedValueOnce('ranges');
    const sleep = vi.fn(noSleep);
    const policy = createRetryPolicy({ ...DEFAULT_BACKOFF, retries: 2, isRetryable: alwaysRetry, sleep });

    await expect(policy.execute(fn)).resolves.toBe('ranges');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it('should give up after the configured retries', async () => {
    const cause = new Error('timeout');
    const fn = vi.fn().mockRejectedValue(cause);
    const policy = createRetryPolicy({ ...DEFAULT_BACKOFF, retries: 2, isRetryable: alwaysRetry, sleep: noSleep });

    const failure = await policy.execute(fn).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(RetryExhaustedError);
    if (failure instanceof RetryExhaustedError) {
      expect(failure.attempts).toBe(3);
      expect(failure.cause).toBe(cause);
      expect(failure.message).toBe('Retry exhausted after 3 attempts: timeout');
    }
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('should rethrow non-retryable errors untouched', async () => {
    const cause = new Error('HTTP 404');
    const fn = vi.fn().mockRejectedValue(cause);
    const policy = createRetryPolicy({ ...DEFAULT_BACKOFF, retries: 2, isRetryable: () => false, sleep: noSleep });

    await expect(policy.execute(fn)).rejects.toBe(cause);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should report each retry with its delay', async () => {
    const events: RetryEvent[] = [];
    const fn = vi.fn().mockRejectedValue(new Error('HTTP 503'));
    const policy = createRetryPolicy({
      initialDelayMs: 100,
      maxDelayMs: 1000,
      retries: 2,
      isRetryable: alwaysRetry,
      sleep: noSleep,
      random: () => 0.5,
      onRetry: event => events.push(event),
    });

    await expect(policy.execute(fn)).rejects.toBeInstanceOf(RetryExhaustedError);
    expect(events.map(event => [event.attempt, event.delayMs])).toEqual([[1, 50], [2, 100]]);
  });

  it('should make a single attempt when retries are disabled', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('ECONNRESET'));
    const policy = createRetryPolicy({ ...DEFAULT_BACKOFF, retries: 0, isRetryable: alwaysRetry, sleep: noSleep });

    await expect(policy.execute(fn)).rejects.toBeInstanceOf(RetryExhaustedError);
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
