// ═══════════════════════════════════════════════════════════════════════════════
// CLOUDFLARE — Plain-Text Range Lists
// ═══════════════════════════════════════════════════════════════════════════════

import type { HttpClient } from './http.js';
import type { RangeProvider } from './types.js';

export const CLOUDFLARE_URLS = [
  'https://www.cloudflare.com/ips-v4',
  'https://www.cloudflare.com/ips-v6',
] as const;

/**
 * One literal per line; blank lines ignored.
 */
export function parseLineList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line !== '');
}

export const cloudflareProvider: RangeProvider = {
  name: 'cloudflare',

  async fetchRanges(client: HttpClient): Promise<string[]> {
    const lists = await Promise.all(CLOUDFLARE_URLS.map(url => client.getText(url)));
    return lists.flatMap(parseLineList);
  },
};
