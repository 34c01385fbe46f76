// ═══════════════════════════════════════════════════════════════════════════════
// AGGREGATOR — Counters and Output under One Lock
// ═══════════════════════════════════════════════════════════════════════════════
//
// A verdict increments exactly one counter. For NO_MATCH the sink write and
// the increment happen in the same critical section, so the written lines
// and `valid` always agree and lines never interleave.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger } from '../observability/logging/index.js';
import { Mutex } from './mutex.js';
import type { Sink } from './sink.js';
import {
  Verdict,
  type ClassificationTask,
  type Counters,
  type OutputMode,
  type ProgressObserver,
} from './types.js';

const logger = getLogger({ component: 'aggregator' });

export function formatOutputLine(task: ClassificationTask, mode: OutputMode): string {
  return mode === 'raw' ? task.rawText : task.resolvedAddress ?? task.rawText;
}

export class Aggregator {
  private readonly counters: Counters = { valid: 0, invalid: 0, matched: 0 };
  private readonly mutex = new Mutex();

  constructor(
    private readonly sink: Sink,
    private readonly outputMode: OutputMode,
    private readonly observer?: ProgressObserver
  ) {}

  async record(task: ClassificationTask, verdict: Verdict): Promise<void> {
    const snapshot = await this.mutex.runExclusive(async () => {
      switch (verdict) {
        case Verdict.INVALID:
          this.counters.invalid++;
          break;
        case Verdict.MATCHES_RANGE:
          this.counters.matched++;
          break;
        case Verdict.NO_MATCH:
          await this.sink.writeLine(formatOutputLine(task, this.outputMode));
          this.counters.valid++;
          break;
      }
      return this.snapshot();
    });

    this.notify(snapshot);
  }

  snapshot(): Counters {
    return { ...this.counters };
  }

  private notify(counters: Counters): void {
    if (!this.observer) return;
    try {
      this.observer(counters);
    } catch (error) {
      logger.warn('Progress observer failed', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
