// ═══════════════════════════════════════════════════════════════════════════════
// FASTLY — Public IP List
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';

import type { HttpClient } from './http.js';
import type { RangeProvider } from './types.js';

export const FASTLY_URL = 'https://api.fastly.com/public-ip-list';

export const FastlyResponseSchema = z.object({
  addresses: z.array(z.string()),
  ipv6_addresses: z.array(z.string()).default([]),
});

export const fastlyProvider: RangeProvider = {
  name: 'fastly',

  async fetchRanges(client: HttpClient): Promise<string[]> {
    const body = await client.getJson(FASTLY_URL, FastlyResponseSchema);
    return [...body.addresses, ...body.ipv6_addresses];
  },
};
