// ═══════════════════════════════════════════════════════════════════════════════
// PROVIDERS — Concurrent Range Acquisition
// ═══════════════════════════════════════════════════════════════════════════════

import { formatRange, parseCidr } from '../address/index.js';
import { getLogger } from '../observability/logging/index.js';
import { ok, err, tryCatchAsync } from '../types/result.js';
import { SieveErrorCode, sieveError, type AsyncSieveResult } from '../types/errors.js';
import { cloudflareProvider } from './cloudflare.js';
import { cloudfrontProvider } from './cloudfront.js';
import { fastlyProvider } from './fastly.js';
import type { HttpClient } from './http.js';
import { incapsulaProvider } from './incapsula.js';
import { createStaticProvider } from './static.js';
import type { RangeProvider } from './types.js';

const logger = getLogger({ component: 'providers' });

export function defaultProviders(): RangeProvider[] {
  return [
    cloudflareProvider,
    fastlyProvider,
    cloudfrontProvider,
    incapsulaProvider,
    createStaticProvider(),
  ];
}

/**
 * Query every provider concurrently and return the canonical literals.
 *
 * Any provider failure fails the whole acquisition; a partial list would
 * let that provider's addresses through as non-CDN.
 */
export async function acquireRanges(
  providers: readonly RangeProvider[],
  client: HttpClient
): AsyncSieveResult<string[]> {
  const results = await Promise.all(
    providers.map(async provider => ({
      provider,
      result: await tryCatchAsync(() => provider.fetchRanges(client)),
    }))
  );

  const literals: string[] = [];

  for (const { provider, result } of results) {
    if (!result.ok) {
      return err(sieveError(
        SieveErrorCode.RANGE_ACQUISITION_FAILED,
        'acquireRanges',
        `${provider.name}: ${result.error.message}`,
        result.error
      ));
    }

    let dropped = 0;
    for (const literal of result.value) {
      const range = parseCidr(literal.trim());
      if (range) {
        literals.push(formatRange(range));
      } else {
        dropped++;
      }
    }

    if (dropped > 0) {
      logger.warn('Dropped malformed ranges', { provider: provider.name, dropped });
    }
    logger.debug('Provider ranges', { provider: provider.name, ranges: result.value.length - dropped });
  }

  return ok(literals);
}

export type { RangeProvider } from './types.js';
export {
  type FetchFn,
  type HttpClient,
  type HttpClientOptions,
  type JsonSchema,
  HttpError,
  FetchHttpClient,
  createHttpClient,
  isRetryableHttpError,
} from './http.js';
export { cloudflareProvider, parseLineList, CLOUDFLARE_URLS } from './cloudflare.js';
export { fastlyProvider, FastlyResponseSchema, FASTLY_URL } from './fastly.js';
export { cloudfrontProvider, CloudFrontResponseSchema, CLOUDFRONT_URL } from './cloudfront.js';
export { incapsulaProvider, IncapsulaResponseSchema, INCAPSULA_URL } from './incapsula.js';
export { createStaticProvider, StaticRangesSchema, STATIC_RANGES_PATH } from './static.js';
