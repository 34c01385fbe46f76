// ═══════════════════════════════════════════════════════════════════════════════
// RANGE LOADER — Cache First, Providers on Miss
// ═══════════════════════════════════════════════════════════════════════════════

import { ok } from '../types/result.js';
import type { AsyncSieveResult } from '../types/errors.js';
import { getLogger } from '../observability/logging/index.js';
import type { RangeCache } from './cache.js';
import { RangeSet } from './range-set.js';

const logger = getLogger({ component: 'range-loader' });

export interface LoadRangeOptions {
  /** Ignore any cached list and fetch from the providers */
  readonly skipCache: boolean;
}

export interface LoadRangeDeps {
  readonly cache: RangeCache;
  /** Fetches range literals from every provider */
  readonly acquire: () => AsyncSieveResult<string[]>;
}

/**
 * Build a RangeSet from the cache file. A missing or unreadable file, or one
 * holding no valid literal, is a miss (null).
 */
export async function tryLoadCache(cache: RangeCache): Promise<RangeSet | null> {
  const literals = await cache.load();
  if (!literals.ok) {
    logger.debug('Range cache miss', { path: cache.filePath, reason: literals.error.message });
    return null;
  }

  const rangeSet = RangeSet.fromLiterals(literals.value);
  if (rangeSet.size === 0) {
    logger.debug('Range cache holds no valid ranges', { path: cache.filePath });
    return null;
  }

  logger.info('Loaded ranges from cache', { path: cache.filePath, ranges: rangeSet.size });
  return rangeSet;
}

/**
 * Produce the RangeSet for a run.
 *
 * On a cache miss (or with skipCache) the providers are queried and the fresh
 * list is written back. A failed write is logged and does not fail the run.
 */
export async function loadRangeSet(
  options: LoadRangeOptions,
  deps: LoadRangeDeps
): AsyncSieveResult<RangeSet> {
  if (!options.skipCache) {
    const cached = await tryLoadCache(deps.cache);
    if (cached) {
      return ok(cached);
    }
  }

  const acquired = await deps.acquire();
  if (!acquired.ok) {
    return acquired;
  }

  const rangeSet = RangeSet.fromLiterals(acquired.value);
  logger.info('Acquired ranges from providers', { ranges: rangeSet.size });

  const persisted = await deps.cache.persist(rangeSet.toLiterals());
  if (!persisted.ok) {
    logger.warn('Could not update range cache', {
      path: deps.cache.filePath,
      error: persisted.error.message,
    });
  }

  return ok(rangeSet);
}
