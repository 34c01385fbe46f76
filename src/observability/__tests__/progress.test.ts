// ═══════════════════════════════════════════════════════════════════════════════
// PROGRESS TESTS
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  SpinnerReporter,
  createProgressReporter,
  formatCounters,
  noopReporter,
} from '../progress.js';

function createStream(isTTY: boolean) {
  const writes: string[] = [];
  return {
    writes,
    stream: {
      isTTY,
      write: (chunk: string) => {
        writes.push(chunk);
        return true;
      },
    },
  };
}

describe('SpinnerReporter', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should redraw the label every 100ms', () => {
    const { writes, stream } = createStream(true);
    const reporter = new SpinnerReporter(stream);

    reporter.start('Loading CDN ranges...');
    vi.advanceTimersByTime(100);
    reporter.update({ valid: 1, invalid: 2, matched: 3 });
    vi.advanceTimersByTime(100);

    expect(writes).toEqual([
      '\r\x1b[K⣾ Loading CDN ranges...',
      '\r\x1b[K⣽ Loading CDN ranges...',
      '\r\x1b[K⣻ [ VALID: 1 | INVALID: 2 | CDN: 3 ]',
    ]);
  });

  it('should print the final label and stop redrawing', () => {
    const { writes, stream } = createStream(true);
    const reporter = new SpinnerReporter(stream);

    reporter.start('Working');
    reporter.stop('[ VALID: 4 | INVALID: 0 | CDN: 1 ]');
    vi.advanceTimersByTime(500);

    expect(writes).toEqual([
      '\r\x1b[K⣾ Working',
      '\r\x1b[K[✔] [ VALID: 4 | INVALID: 0 | CDN: 1 ]\n',
    ]);
  });

  it('should clear the line on abort', () => {
    const { writes, stream } = createStream(true);
    const reporter = new SpinnerReporter(stream);

    reporter.start('Working');
    reporter.abort();

    expect(writes.at(-1)).toBe('\r\x1b[K');
  });
});

describe('createProgressReporter', () => {
  it('should only draw on terminals', () => {
    expect(createProgressReporter(createStream(false).stream)).toBe(noopReporter);
    expect(createProgressReporter(createStream(true).stream)).toBeInstanceOf(SpinnerReporter);
  });

  it('should format counters', () => {
    expect(formatCounters({ valid: 10, invalid: 0, matched: 7 })).toBe('[ VALID: 10 | INVALID: 0 | CDN: 7 ]');
  });
});
