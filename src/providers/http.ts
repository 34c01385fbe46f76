// ═══════════════════════════════════════════════════════════════════════════════
// PROVIDER HTTP CLIENT — Timed, Retried Requests for Published Range Lists
// ═══════════════════════════════════════════════════════════════════════════════
//
// - Per-request timeout via AbortSignal.timeout
// - Retry with backoff on network errors, 429 and 5xx
// - Non-2xx responses become HttpError carrying the status
// - JSON bodies are validated with zod after the retry loop, so a schema
//   mismatch is reported once and never retried
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { z } from 'zod';

import { loadFetchConfig, type FetchConfig } from '../config/index.js';
import {
  DEFAULT_BACKOFF,
  createRetryPolicy,
  type RetryOptions,
  type RetryPolicy,
} from '../infrastructure/retry/index.js';
import { getLogger } from '../observability/logging/index.js';

const logger = getLogger({ component: 'http' });

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

/** Any zod schema producing T, whatever its input shape */
export type JsonSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export interface HttpClient {
  getText(url: string): Promise<string>;
  getJson<T>(url: string, schema: JsonSchema<T>): Promise<T>;
  postForm<T>(url: string, form: Record<string, string>, schema: JsonSchema<T>): Promise<T>;
}

export interface HttpClientOptions {
  readonly fetch?: FetchFn;
  /** Overrides for the retry policy (tests inject `sleep`) */
  readonly retry?: Partial<Omit<RetryOptions, 'isRetryable'>>;
}

/**
 * Non-2xx response.
 */
export class HttpError extends Error {
  readonly name = 'HttpError';

  constructor(
    readonly url: string,
    readonly status: number
  ) {
    super(`HTTP ${status} from ${url}`);
  }
}

/**
 * Network failures, timeouts, 429 and 5xx are retried. Other statuses are not.
 */
export function isRetryableHttpError(error: unknown): boolean {
  if (error instanceof HttpError) {
    return error.status === 429 || error.status >= 500;
  }
  return true;
}

// ─────────────────────────────────────────────────────────────────────────────────
// CLIENT
// ─────────────────────────────────────────────────────────────────────────────────

export class FetchHttpClient implements HttpClient {
  private readonly fetchFn: FetchFn;
  private readonly retry: RetryPolicy;

  constructor(
    private readonly config: FetchConfig = loadFetchConfig(),
    options: HttpClientOptions = {}
  ) {
    this.fetchFn = options.fetch ?? ((input, init) => globalThis.fetch(input, init));
    this.retry = createRetryPolicy({
      ...DEFAULT_BACKOFF,
      retries: config.retries,
      onRetry: event => {
        logger.warn('Request failed, retrying', {
          attempt: event.attempt,
          delayMs: event.delayMs,
          error: event.error.message,
        });
      },
      ...options.retry,
      isRetryable: isRetryableHttpError,
    });
  }

  async getText(url: string): Promise<string> {
    return this.request(url, { method: 'GET' });
  }

  async getJson<T>(url: string, schema: JsonSchema<T>): Promise<T> {
    const body = await this.request(url, { method: 'GET', accept: 'application/json' });
    return schema.parse(JSON.parse(body));
  }

  async postForm<T>(url: string, form: Record<string, string>, schema: JsonSchema<T>): Promise<T> {
    const body = await this.request(url, {
      method: 'POST',
      accept: 'application/json',
      body: new URLSearchParams(form).toString(),
    });
    return schema.parse(JSON.parse(body));
  }

  private async request(
    url: string,
    options: { method: 'GET' | 'POST'; accept?: string; body?: string }
  ): Promise<string> {
    const headers: Record<string, string> = {
      'User-Agent': this.config.userAgent,
      'Accept': options.accept ?? '*/*',
    };
    if (options.body !== undefined) {
      headers['Content-Type'] = 'application/x-www-form-urlencoded';
    }

    return this.retry.execute(async () => {
      const startTime = Date.now();
      const response = await this.fetchFn(url, {
        method: options.method,
        headers,
        body: options.body,
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });

      if (!response.ok) {
        throw new HttpError(url, response.status);
      }

      const text = await response.text();
      logger.debug('Fetched', { url, status: response.status, bytes: text.length, ms: Date.now() - startTime });
      return text;
    });
  }
}

export function createHttpClient(
  config?: FetchConfig,
  options?: HttpClientOptions
): HttpClient {
  return new FetchHttpClient(config, options);
}
