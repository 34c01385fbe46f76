// ═══════════════════════════════════════════════════════════════════════════════
// DISPATCHER — One Producer, T Workers, One Bounded Queue
// ═══════════════════════════════════════════════════════════════════════════════
//
// The producer walks the normalized input and pushes tasks; each worker pops,
// classifies and records. Workers are async loops on the event loop, so output
// order follows completion order, not input order.
//
// The queue is always closed when the producer stops, so workers drain and
// exit even when the input fails. A worker failure closes it too, which stops
// the producer instead of leaving it blocked on a full queue.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger } from '../observability/logging/index.js';
import type { RangeSet } from '../ranges/index.js';
import { toError } from '../types/result.js';
import { Aggregator } from './aggregator.js';
import { classifyTask } from './classifier.js';
import { normalizeLines } from './normalizer.js';
import { BoundedQueue } from './queue.js';
import type { Sink } from './sink.js';
import type {
  ClassificationTask,
  OutputMode,
  PipelineSummary,
  ProgressObserver,
} from './types.js';

const logger = getLogger({ component: 'dispatcher' });

export interface PipelineDeps {
  readonly rangeSet: RangeSet;
  readonly sink: Sink;
  readonly observer?: ProgressObserver;
}

export interface PipelineOptions {
  /** Worker count, at least 1 */
  readonly threads: number;
  /** Defaults to the worker count */
  readonly queueCapacity?: number;
  readonly outputMode: OutputMode;
  readonly includeIPv6: boolean;
}

export async function runPipeline(
  lines: AsyncIterable<string> | Iterable<string>,
  deps: PipelineDeps,
  options: PipelineOptions
): Promise<PipelineSummary> {
  if (!Number.isInteger(options.threads) || options.threads < 1) {
    throw new RangeError(`Worker count must be a positive integer, got ${options.threads}`);
  }

  const startTime = Date.now();
  const queue = new BoundedQueue<ClassificationTask>(options.queueCapacity ?? options.threads);
  const aggregator = new Aggregator(deps.sink, options.outputMode, deps.observer);
  const normalized = normalizeLines(lines, { includeIPv6: options.includeIPv6 });
  let tasks = 0;

  const produce = async (): Promise<void> => {
    try {
      for await (const task of normalized.tasks) {
        await queue.push(task);
        tasks++;
      }
    } finally {
      queue.close();
    }
  };

  const work = async (): Promise<void> => {
    try {
      for await (const task of queue) {
        await aggregator.record(task, classifyTask(task, deps.rangeSet));
      }
    } catch (error) {
      queue.close();
      throw error;
    }
  };

  logger.debug('Starting pipeline', {
    threads: options.threads,
    queueCapacity: queue.capacity,
    outputMode: options.outputMode,
  });

  const workers = Array.from({ length: options.threads }, () => work());
  const [producer, ...finished] = await Promise.allSettled([produce(), ...workers]);

  // A worker failure is the root cause of the producer's QueueClosedError
  for (const outcome of [...finished, producer]) {
    if (outcome?.status === 'rejected') {
      throw toError(outcome.reason);
    }
  }

  const counters = aggregator.snapshot();
  const summary: PipelineSummary = {
    lines: normalized.lineCount(),
    tasks,
    ...counters,
    durationMs: Date.now() - startTime,
  };

  logger.info('Pipeline finished', { ...summary });
  return summary;
}
