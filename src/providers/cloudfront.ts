// ═══════════════════════════════════════════════════════════════════════════════
// CLOUDFRONT — Global and Regional Edge Lists
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';

import type { HttpClient } from './http.js';
import type { RangeProvider } from './types.js';

export const CLOUDFRONT_URL = 'https://d7uri8nf7uskq.cloudfront.net/tools/list-cloudfront-ips';

export const CloudFrontResponseSchema = z.object({
  CLOUDFRONT_GLOBAL_IP_LIST: z.array(z.string()),
  CLOUDFRONT_REGIONAL_EDGE_IP_LIST: z.array(z.string()).default([]),
});

export const cloudfrontProvider: RangeProvider = {
  name: 'cloudfront',

  async fetchRanges(client: HttpClient): Promise<string[]> {
    const body = await client.getJson(CLOUDFRONT_URL, CloudFrontResponseSchema);
    return [...body.CLOUDFRONT_GLOBAL_IP_LIST, ...body.CLOUDFRONT_REGIONAL_EDGE_IP_LIST];
  },
};
