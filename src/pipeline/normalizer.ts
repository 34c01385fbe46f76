// ═══════════════════════════════════════════════════════════════════════════════
// INPUT NORMALIZER — Lines to Classification Tasks
// ═══════════════════════════════════════════════════════════════════════════════
//
// Per line:
//   1. trim, skip blank
//   2. `http…` lines are reduced to their URL host
//   3. tokens containing ':' are dropped unless IPv6 is enabled
//   4. literal address → one task
//   5. CIDR block → one task per address, lazily
//   6. anything else (hostnames included) → dropped, no DNS lookups
//
// ═══════════════════════════════════════════════════════════════════════════════

import { expandRange, parseAddress, parseCidr } from '../address/index.js';
import type { ClassificationTask } from './types.js';

export interface NormalizeOptions {
  readonly includeIPv6: boolean;
}

/**
 * Host of a URL line with IPv6 brackets removed, or the line itself when it
 * does not parse as a URL. Numeric hosts such as `0x7f.1` come back as the
 * dotted quad the URL parser resolves them to.
 */
export function extractToken(line: string): string {
  if (!line.startsWith('http')) {
    return line;
  }
  try {
    const host = new URL(line).hostname;
    return host.startsWith('[') && host.endsWith(']') ? host.slice(1, -1) : host;
  } catch {
    // Not a URL; classify the line as written
    return line;
  }
}

/**
 * Tasks for one input line. CIDR blocks are expanded as the caller pulls.
 */
export function* normalizeLine(
  line: string,
  options: NormalizeOptions
): Generator<ClassificationTask, void, undefined> {
  const rawText = line.trim();
  if (rawText === '') {
    return;
  }

  const token = extractToken(rawText);
  if (!options.includeIPv6 && token.includes(':')) {
    return;
  }

  const address = parseAddress(token);
  if (address) {
    yield { rawText, resolvedAddress: address.text };
    return;
  }

  const range = parseCidr(token);
  if (range) {
    for (const member of expandRange(range)) {
      yield { rawText, resolvedAddress: member.text };
    }
  }
}

export interface NormalizedLines {
  /** Tasks across all lines, in input order */
  readonly tasks: AsyncGenerator<ClassificationTask, void, undefined>;
  /** Non-empty lines consumed so far */
  lineCount(): number;
}

export function normalizeLines(
  lines: AsyncIterable<string> | Iterable<string>,
  options: NormalizeOptions
): NormalizedLines {
  let count = 0;

  async function* generate(): AsyncGenerator<ClassificationTask, void, undefined> {
    for await (const line of lines) {
      if (line.trim() === '') {
        continue;
      }
      count++;
      yield* normalizeLine(line, options);
    }
  }

  return {
    tasks: generate(),
    lineCount: () => count,
  };
}
