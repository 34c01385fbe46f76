// ═══════════════════════════════════════════════════════════════════════════════
// INCAPSULA — Integration API Range List
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';

import type { HttpClient } from './http.js';
import type { RangeProvider } from './types.js';

export const INCAPSULA_URL = 'https://my.incapsula.com/api/integration/v1/ips';

export const IncapsulaResponseSchema = z.object({
  ipRanges: z.array(z.string()),
  ipv6Ranges: z.array(z.string()).default([]),
});

export const incapsulaProvider: RangeProvider = {
  name: 'incapsula',

  async fetchRanges(client: HttpClient): Promise<string[]> {
    const body = await client.postForm(INCAPSULA_URL, { resp_format: 'json' }, IncapsulaResponseSchema);
    return [...body.ipRanges, ...body.ipv6Ranges];
  },
};
