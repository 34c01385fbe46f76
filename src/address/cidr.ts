// ═══════════════════════════════════════════════════════════════════════════════
// CIDR — Prefix Parsing, Membership and Streaming Expansion
// ═══════════════════════════════════════════════════════════════════════════════

import {
  ADDRESS_BITS,
  createAddress,
  formatAddress,
  parseAddress,
  type Address,
  type AddressFamily,
} from './address.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * An address prefix. The network address is always masked, so
 * `203.0.113.9/24` is held as `203.0.113.0/24`.
 */
export interface AddressRange {
  readonly family: AddressFamily;
  readonly prefixLength: number;
  /** First address in the range (the network address) */
  readonly first: bigint;
  /** Last address in the range (inclusive) */
  readonly last: bigint;
}

const PREFIX_DIGITS = /^\d{1,3}$/;

// ─────────────────────────────────────────────────────────────────────────────────
// PARSING
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Host mask for a prefix: the low (bits - prefix) bits set.
 */
function hostMask(family: AddressFamily, prefixLength: number): bigint {
  return (1n << BigInt(ADDRESS_BITS[family] - prefixLength)) - 1n;
}

export function createRange(address: Address, prefixLength: number): AddressRange {
  const mask = hostMask(address.family, prefixLength);
  const first = address.value & ~mask;
  return {
    family: address.family,
    prefixLength,
    first,
    last: first | mask,
  };
}

/**
 * Parse `<address>/<prefixLength>`. Returns null for anything else,
 * including a prefix length out of range for the address family.
 */
export function parseCidr(input: string): AddressRange | null {
  const slash = input.indexOf('/');
  if (slash <= 0 || slash !== input.lastIndexOf('/')) {
    return null;
  }

  const prefixText = input.slice(slash + 1);
  if (!PREFIX_DIGITS.test(prefixText)) {
    return null;
  }

  const address = parseAddress(input.slice(0, slash));
  if (!address) {
    return null;
  }

  // An IPv4-mapped IPv6 prefix is rebased onto the IPv4 space
  const prefixLength = address.family === 4 && input.includes(':')
    ? parseInt(prefixText, 10) - 96
    : parseInt(prefixText, 10);

  if (prefixLength < 0 || prefixLength > ADDRESS_BITS[address.family]) {
    return null;
  }

  return createRange(address, prefixLength);
}

/**
 * Canonical range literal, e.g. `203.0.113.0/24`.
 */
export function formatRange(range: AddressRange): string {
  return `${formatAddress(range.family, range.first)}/${range.prefixLength}`;
}

// ─────────────────────────────────────────────────────────────────────────────────
// MEMBERSHIP
// ─────────────────────────────────────────────────────────────────────────────────

export function rangeContains(range: AddressRange, address: Address): boolean {
  return range.family === address.family &&
    address.value >= range.first &&
    address.value <= range.last;
}

/**
 * Number of addresses in the range, network and broadcast included.
 */
export function rangeSize(range: AddressRange): bigint {
  return range.last - range.first + 1n;
}

// ─────────────────────────────────────────────────────────────────────────────────
// EXPANSION
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Lazily yield every address in the range, network and broadcast included.
 *
 * Never materializes the address list: a /8 or a large IPv6 block is
 * produced one address at a time as the consumer pulls.
 */
export function* expandRange(range: AddressRange): Generator<Address, void, undefined> {
  for (let value = range.first; value <= range.last; value++) {
    yield createAddress(range.family, value);
  }
}
