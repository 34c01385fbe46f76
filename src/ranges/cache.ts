// ═══════════════════════════════════════════════════════════════════════════════
// RANGE CACHE — Best-Effort Local Copy of the Provider Range List
// ═══════════════════════════════════════════════════════════════════════════════
//
// File format: newline-separated range literals, no header, no trailing newline.
// Lines are returned as-is; RangeSet.fromLiterals drops the malformed ones.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { map, mapErr, tryCatchAsync } from '../types/result.js';
import { SieveErrorCode, sieveError, type AsyncSieveResult } from '../types/errors.js';

export class RangeCache {
  constructor(readonly filePath: string) {}

  /**
   * Read the cached literals. An absent or unreadable file is an error value.
   */
  async load(): AsyncSieveResult<string[]> {
    const content = await tryCatchAsync(() => readFile(this.filePath, 'utf8'));

    return mapErr(
      map(content, text => text.split(/\r?\n/)),
      cause => sieveError(
        SieveErrorCode.CACHE_READ_FAILED,
        'loadCache',
        `Cannot read range cache ${this.filePath}: ${cause.message}`,
        cause
      )
    );
  }

  async persist(literals: readonly string[]): AsyncSieveResult<void> {
    const written = await tryCatchAsync(async () => {
      await mkdir(path.dirname(this.filePath), { recursive: true });
      await writeFile(this.filePath, literals.join('\n'), { encoding: 'utf8', mode: 0o664 });
    });

    return mapErr(written, cause => sieveError(
      SieveErrorCode.CACHE_WRITE_FAILED,
      'persistCache',
      `Cannot write range cache ${this.filePath}: ${cause.message}`,
      cause
    ));
  }
}
