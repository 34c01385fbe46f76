// ═══════════════════════════════════════════════════════════════════════════════
// PROVIDER TYPES
// ═══════════════════════════════════════════════════════════════════════════════

import type { HttpClient } from './http.js';

/**
 * A source of published CDN / proxy ranges.
 */
export interface RangeProvider {
  readonly name: string;

  /** Range literals as published; may include malformed entries */
  fetchRanges(client: HttpClient): Promise<string[]>;
}
