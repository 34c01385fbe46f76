// ═══════════════════════════════════════════════════════════════════════════════
// ADDRESS MODULE INDEX
// ═══════════════════════════════════════════════════════════════════════════════

export {
  type AddressFamily,
  type Address,
  ADDRESS_BITS,
  createAddress,
  formatAddress,
  isIPv4Literal,
  isIPv6Literal,
  parseAddress,
} from './address.js';

export {
  type AddressRange,
  createRange,
  parseCidr,
  formatRange,
  rangeContains,
  rangeSize,
  expandRange,
} from './cidr.js';
