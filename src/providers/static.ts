// ═══════════════════════════════════════════════════════════════════════════════
// STATIC RANGES — Bundled Lists for Providers Without a Public Endpoint
// ═══════════════════════════════════════════════════════════════════════════════

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

import type { RangeProvider } from './types.js';

export const STATIC_RANGES_PATH = fileURLToPath(
  new URL('../../data/static-ranges.json', import.meta.url)
);

/** Provider name → range literals */
export const StaticRangesSchema = z.record(z.array(z.string()));

export function createStaticProvider(filePath: string = STATIC_RANGES_PATH): RangeProvider {
  return {
    name: 'static',

    async fetchRanges(): Promise<string[]> {
      const lists = StaticRangesSchema.parse(JSON.parse(await readFile(filePath, 'utf8')));
      return Object.values(lists).flat();
    },
  };
}
