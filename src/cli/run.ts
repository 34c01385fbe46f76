// ═══════════════════════════════════════════════════════════════════════════════
// CLI RUN — Wiring Options, Ranges, Streams and the Pipeline
// ═══════════════════════════════════════════════════════════════════════════════
//
// Exit codes: 0 success, 1 fatal startup or pipeline error, 2 invalid options.
//
// Order matters: ranges are loaded and the input is opened before the output,
// so a failed startup never creates or truncates the output file.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { Readable, Writable } from 'node:stream';

import { loadConfig, type SieveConfig } from '../config/index.js';
import { configureLogger, getLogger } from '../observability/logging/index.js';
import {
  createProgressReporter,
  formatCounters,
  type ProgressReporter,
  type ProgressStream,
} from '../observability/progress.js';
import { runPipeline } from '../pipeline/index.js';
import { acquireRanges, createHttpClient, defaultProviders } from '../providers/index.js';
import { RangeCache, loadRangeSet } from '../ranges/index.js';
import { SieveErrorCode, sieveError, type AsyncSieveResult, type SieveError } from '../types/errors.js';
import { tryCatchAsync } from '../types/result.js';
import { openInput, openOutput } from './io.js';
import { USAGE, parseOptions } from './options.js';

export const ExitCode = {
  SUCCESS: 0,
  FATAL: 1,
  USAGE: 2,
} as const;

export type ExitCode = typeof ExitCode[keyof typeof ExitCode];

export interface RunIO {
  readonly stdin: Readable;
  readonly stdout: Writable;
  /** Logs, usage errors and the progress spinner */
  readonly stderr: ProgressStream;
  readonly config?: SieveConfig;
  /** Replaces the provider fetch (tests) */
  readonly acquire?: () => AsyncSieveResult<string[]>;
}

const logger = getLogger({ component: 'cli' });

/**
 * Stop the progress display and log the failure under its operation name.
 */
export function reportFatal(error: SieveError, progress: ProgressReporter): ExitCode {
  progress.abort();
  logger.fatal(`[${error.operation.toUpperCase()}] ${error.message}`, error.cause, { code: error.code });
  return ExitCode.FATAL;
}

export async function run(argv: readonly string[], io: RunIO): Promise<ExitCode> {
  const options = parseOptions(argv);
  if (!options.ok) {
    io.stderr.write(`${options.error.message}\n\n${USAGE}`);
    return ExitCode.USAGE;
  }
  if (options.value.help) {
    io.stdout.write(USAGE);
    return ExitCode.SUCCESS;
  }

  const { threads, input, output, raw, skipCache, ipv6, cache, verbose } = options.value;
  const config = io.config ?? loadConfig();

  configureLogger({
    write: line => {
      io.stderr.write(line + '\n');
    },
  });
  if (verbose) {
    configureLogger({ level: 'debug' });
  }

  const progress = createProgressReporter(io.stderr);
  progress.start('Loading CDN ranges...');

  const rangeSet = await loadRangeSet(
    { skipCache },
    {
      cache: new RangeCache(cache ?? config.cache.path),
      acquire: io.acquire ?? (() => acquireRanges(defaultProviders(), createHttpClient(config.fetch))),
    }
  );
  if (!rangeSet.ok) {
    return reportFatal(rangeSet.error, progress);
  }

  progress.start('Loading input...');

  const source = await openInput(input, io.stdin);
  if (!source.ok) {
    return reportFatal(source.error, progress);
  }

  const sink = await openOutput(output, io.stdout);
  if (!sink.ok) {
    source.value.close();
    return reportFatal(sink.error, progress);
  }

  const completed = await tryCatchAsync(async () => {
    try {
      return await runPipeline(
        source.value.lines,
        {
          rangeSet: rangeSet.value,
          sink: sink.value,
          observer: counters => progress.update(counters),
        },
        {
          threads,
          queueCapacity: threads * config.pipeline.queueFactor,
          outputMode: raw ? 'raw' : 'canonical',
          includeIPv6: ipv6,
        }
      );
    } finally {
      source.value.close();
      await sink.value.close();
    }
  });

  if (!completed.ok) {
    return reportFatal(
      sieveError(SieveErrorCode.PIPELINE_FAILED, 'runPipeline', completed.error.message, completed.error),
      progress
    );
  }

  progress.stop(formatCounters(completed.value));
  logger.info('Done', { ...completed.value });
  return ExitCode.SUCCESS;
}
