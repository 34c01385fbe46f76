// ═══════════════════════════════════════════════════════════════════════════════
// ADDRESS — Literal IPv4/IPv6 Parsing and Canonical Formatting
// ═══════════════════════════════════════════════════════════════════════════════
//
// Addresses are carried as bigints so that both families share one range
// arithmetic. Parsing is strict:
// - IPv4: four decimal octets, no leading zeros, no shorthand forms
// - IPv6: RFC 4291 text forms, no zone identifier, no brackets; an embedded
//   IPv4 tail follows the IPv4 rule
// - IPv4-mapped IPv6 (::ffff:a.b.c.d) canonicalizes to the IPv4 address
//
// ═══════════════════════════════════════════════════════════════════════════════

import ipaddr from 'ipaddr.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export type AddressFamily = 4 | 6;

export interface Address {
  readonly family: AddressFamily;
  /** Numeric value, 32 bits for IPv4 and 128 bits for IPv6 */
  readonly value: bigint;
  /** Canonical text form */
  readonly text: string;
}

/** Address width in bits per family */
export const ADDRESS_BITS: Record<AddressFamily, number> = {
  4: 32,
  6: 128,
};

const DOTTED_QUAD = /^(25[0-5]|2[0-4]\d|1\d\d|[1-9]?\d)(\.(25[0-5]|2[0-4]\d|1\d\d|[1-9]?\d)){3}$/;

// ─────────────────────────────────────────────────────────────────────────────────
// CONVERSION
// ─────────────────────────────────────────────────────────────────────────────────

function bytesToBigInt(bytes: readonly number[]): bigint {
  let value = 0n;
  for (const byte of bytes) {
    value = (value << 8n) | BigInt(byte);
  }
  return value;
}

function bigIntToBytes(value: bigint, family: AddressFamily): number[] {
  const length = ADDRESS_BITS[family] / 8;
  const bytes = new Array<number>(length);
  let rest = value;
  for (let i = length - 1; i >= 0; i--) {
    bytes[i] = Number(rest & 0xffn);
    rest >>= 8n;
  }
  return bytes;
}

/**
 * Format a numeric address in canonical text form.
 */
export function formatAddress(family: AddressFamily, value: bigint): string {
  if (family === 4) {
    return [
      (value >> 24n) & 0xffn,
      (value >> 16n) & 0xffn,
      (value >> 8n) & 0xffn,
      value & 0xffn,
    ].join('.');
  }
  return ipaddr.fromByteArray(bigIntToBytes(value, family)).toString();
}

export function createAddress(family: AddressFamily, value: bigint): Address {
  return { family, value, text: formatAddress(family, value) };
}

// ─────────────────────────────────────────────────────────────────────────────────
// PARSING
// ─────────────────────────────────────────────────────────────────────────────────

export function isIPv4Literal(input: string): boolean {
  return DOTTED_QUAD.test(input);
}

export function isIPv6Literal(input: string): boolean {
  if (!input.includes(':') || input.includes('%') || input.includes('[')) {
    return false;
  }
  // ipaddr.js accepts hex and zero-padded octets in an embedded IPv4 tail
  if (input.includes('.') && !DOTTED_QUAD.test(input.slice(input.lastIndexOf(':') + 1))) {
    return false;
  }
  return ipaddr.IPv6.isValid(input);
}

/**
 * Parse a literal address. Returns null when the input is not exactly one
 * IPv4 or IPv6 address.
 */
export function parseAddress(input: string): Address | null {
  if (isIPv4Literal(input)) {
    return createAddress(4, bytesToBigInt(ipaddr.IPv4.parse(input).toByteArray()));
  }

  if (isIPv6Literal(input)) {
    const ipv6 = ipaddr.IPv6.parse(input);
    if (ipv6.isIPv4MappedAddress()) {
      return createAddress(4, bytesToBigInt(ipv6.toIPv4Address().toByteArray()));
    }
    return createAddress(6, bytesToBigInt(ipv6.toByteArray()));
  }

  return null;
}
