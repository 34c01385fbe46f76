// ═══════════════════════════════════════════════════════════════════════════════
// CLI OPTIONS — Flag Parsing and Validation
// ═══════════════════════════════════════════════════════════════════════════════

import { parseArgs } from 'node:util';
import { z } from 'zod';

import { err, ok, toError } from '../types/result.js';
import { SieveErrorCode, sieveError, type SieveResult } from '../types/errors.js';

export const MAX_THREADS = 1024;

export const USAGE = `Usage: cdn-sieve [options]

Reads addresses, CIDR blocks and URLs, and prints the addresses that are
not served by a known CDN or proxy provider.

Options:
  -t, --threads <n>     Number of workers, 1-${MAX_THREADS} (default: 1)
  -i, --input <file>    Input file, "-" for stdin (default: -)
  -o, --output <file>   Output file, "-" for stdout (default: -)
  -r, --raw             Print the original input line instead of the address
  -s, --skip-cache      Ignore the range cache and fetch fresh ranges
  -k, --ipv6            Also check IPv6
  -c, --cache <file>    Range cache file (default: ~/.config/cdn-sieve.cache)
  -v, --verbose         Debug logging
  -h, --help            Print this help
`;

const OPTION_SPEC = {
  threads: { type: 'string', short: 't', default: '1' },
  input: { type: 'string', short: 'i', default: '-' },
  output: { type: 'string', short: 'o', default: '-' },
  raw: { type: 'boolean', short: 'r', default: false },
  'skip-cache': { type: 'boolean', short: 's', default: false },
  ipv6: { type: 'boolean', short: 'k', default: false },
  cache: { type: 'string', short: 'c' },
  verbose: { type: 'boolean', short: 'v', default: false },
  help: { type: 'boolean', short: 'h', default: false },
} as const;

export const CliOptionsSchema = z.object({
  threads: z
    .string()
    .regex(/^\d+$/, 'must be a whole number')
    .transform(Number)
    .pipe(z.number().int().min(1).max(MAX_THREADS)),
  input: z.string().min(1, 'must not be empty'),
  output: z.string().min(1, 'must not be empty'),
  raw: z.boolean(),
  skipCache: z.boolean(),
  ipv6: z.boolean(),
  cache: z.string().min(1, 'must not be empty').optional(),
  verbose: z.boolean(),
  help: z.boolean(),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

export function parseOptions(argv: readonly string[]): SieveResult<CliOptions> {
  let values: Record<string, string | boolean | undefined>;
  try {
    ({ values } = parseArgs({
      args: [...argv],
      options: OPTION_SPEC,
      strict: true,
      allowPositionals: false,
    }));
  } catch (error) {
    const cause = toError(error);
    return err(sieveError(SieveErrorCode.INVALID_OPTIONS, 'parseOptions', cause.message, cause));
  }

  const parsed = CliOptionsSchema.safeParse({
    threads: values['threads'],
    input: values['input'],
    output: values['output'],
    raw: values['raw'],
    skipCache: values['skip-cache'],
    ipv6: values['ipv6'],
    cache: values['cache'],
    verbose: values['verbose'],
    help: values['help'],
  });

  if (!parsed.success) {
    const message = parsed.error.issues
      .map(issue => `--${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    return err(sieveError(SieveErrorCode.INVALID_OPTIONS, 'parseOptions', message, parsed.error));
  }

  return ok(parsed.data);
}
