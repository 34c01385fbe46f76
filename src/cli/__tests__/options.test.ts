// ═══════════════════════════════════════════════════════════════════════════════
// CLI OPTION TESTS
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect } from 'vitest';
import { SieveErrorCode } from '../../types/errors.js';
import { parseOptions } from '../options.js';

describe('parseOptions', () => {
  it('should apply defaults', () => {
    const result = parseOptions([]);

    expect(result.ok).toBe(true);
    expect(result.value).toEqual({
      threads: 1,
      input: '-',
      output: '-',
      raw: false,
      skipCache: false,
      ipv6: false,
      cache: undefined,
      verbose: false,
      help: false,
    });
  });

  it('should read short flags', () => {
    const result = parseOptions(['-t', '8', '-r', '-s', '-k', '-c', '/tmp/ranges.cache', '-i', 'in.txt', '-o', 'out.txt']);

    expect(result.value).toMatchObject({
      threads: 8,
      input: 'in.txt',
      output: 'out.txt',
      raw: true,
      skipCache: true,
      ipv6: true,
      cache: '/tmp/ranges.cache',
    });
  });

  it('should read long flags', () => {
    const result = parseOptions(['--threads=16', '--skip-cache', '--ipv6', '--verbose']);

    expect(result.value).toMatchObject({ threads: 16, skipCache: true, ipv6: true, verbose: true });
  });

  it('should reject out-of-range worker counts', () => {
    for (const threads of ['0', '1025', 'abc', '1.5', '-2']) {
      const result = parseOptions([`--threads=${threads}`]);
      expect(result.ok).toBe(false);
      expect(result.error?.code).toBe(SieveErrorCode.INVALID_OPTIONS);
    }
  });

  it('should reject unknown flags and positionals', () => {
    expect(parseOptions(['--bogus']).ok).toBe(false);
    expect(parseOptions(['stray']).ok).toBe(false);
  });

  it('should reject an empty input path', () => {
    const result = parseOptions(['-i', '']);
    expect(result.ok).toBe(false);
    expect(result.error?.message).toBe('--input: must not be empty');
  });
});
