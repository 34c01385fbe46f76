// ═══════════════════════════════════════════════════════════════════════════════
// RANGE SET — Immutable CDN Range Collection with Interval Index
// ═══════════════════════════════════════════════════════════════════════════════
//
// Built once before the pipeline starts and shared read-only by every worker.
//
// Lookup is O(log n) per family: ranges are sorted by their first address and
// paired with the running maximum of their last address. For an address A,
// the last range starting at or before A is found by binary search; A is
// covered iff the running maximum at that position reaches A. Overlapping and
// duplicate ranges need no special handling.
//
// ═══════════════════════════════════════════════════════════════════════════════

import {
  formatRange,
  parseCidr,
  type Address,
  type AddressFamily,
  type AddressRange,
} from '../address/index.js';
import { getLogger } from '../observability/logging/index.js';

const logger = getLogger({ component: 'range-set' });

// ─────────────────────────────────────────────────────────────────────────────────
// INTERVAL INDEX
// ─────────────────────────────────────────────────────────────────────────────────

interface FamilyIndex {
  /** First address of each range, ascending */
  readonly starts: readonly bigint[];
  /** maxEnds[i] = max(last) over ranges 0..i */
  readonly maxEnds: readonly bigint[];
}

function buildIndex(ranges: readonly AddressRange[]): FamilyIndex {
  const sorted = [...ranges].sort((a, b) => (a.first < b.first ? -1 : a.first > b.first ? 1 : 0));
  const starts: bigint[] = [];
  const maxEnds: bigint[] = [];

  let runningMax = -1n;
  for (const range of sorted) {
    if (range.last > runningMax) {
      runningMax = range.last;
    }
    starts.push(range.first);
    maxEnds.push(runningMax);
  }

  return { starts, maxEnds };
}

/**
 * Index of the last start <= value, or -1.
 */
function findLastStartAtOrBefore(starts: readonly bigint[], value: bigint): number {
  let low = 0;
  let high = starts.length - 1;
  let found = -1;

  while (low <= high) {
    const mid = (low + high) >>> 1;
    const start = starts[mid];
    if (start !== undefined && start <= value) {
      found = mid;
      low = mid + 1;
    } else {
      high = mid - 1;
    }
  }

  return found;
}

// ─────────────────────────────────────────────────────────────────────────────────
// RANGE SET
// ─────────────────────────────────────────────────────────────────────────────────

export class RangeSet {
  private readonly ranges: readonly AddressRange[];
  private readonly indexes: Record<AddressFamily, FamilyIndex>;

  constructor(ranges: Iterable<AddressRange>) {
    this.ranges = Object.freeze([...ranges]);
    this.indexes = {
      4: buildIndex(this.ranges.filter(range => range.family === 4)),
      6: buildIndex(this.ranges.filter(range => range.family === 6)),
    };
  }

  /**
   * Build a set from range literals. Malformed literals are dropped.
   */
  static fromLiterals(literals: Iterable<string>): RangeSet {
    const ranges: AddressRange[] = [];
    let dropped = 0;

    for (const literal of literals) {
      const range = parseCidr(literal.trim());
      if (range) {
        ranges.push(range);
      } else if (literal.trim() !== '') {
        dropped++;
      }
    }

    if (dropped > 0) {
      logger.debug('Dropped malformed range literals', { dropped, kept: ranges.length });
    }

    return new RangeSet(ranges);
  }

  /**
   * True iff the address falls inside at least one range of its family.
   */
  contains(address: Address): boolean {
    const { starts, maxEnds } = this.indexes[address.family];
    const position = findLastStartAtOrBefore(starts, address.value);
    if (position < 0) {
      return false;
    }
    const maxEnd = maxEnds[position];
    return maxEnd !== undefined && maxEnd >= address.value;
  }

  get size(): number {
    return this.ranges.length;
  }

  /**
   * Ranges in load order.
   */
  toArray(): readonly AddressRange[] {
    return this.ranges;
  }

  /**
   * Canonical literals in load order, as written to the cache.
   */
  toLiterals(): string[] {
    return this.ranges.map(formatRange);
  }
}
