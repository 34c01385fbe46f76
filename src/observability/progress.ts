// ═══════════════════════════════════════════════════════════════════════════════
// PROGRESS — Terminal Spinner with Running Counters
// ═══════════════════════════════════════════════════════════════════════════════
//
// Drawn on stderr only, and only when it is a terminal. Piped runs get the
// no-op reporter so nothing but results and logs reach the streams.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { Counters } from '../pipeline/types.js';

export const SPINNER_FRAMES = ['⣾', '⣽', '⣻', '⢿', '⡿', '⣟', '⣯', '⣷'] as const;
export const SPINNER_INTERVAL_MS = 100;

const CLEAR_LINE = '\r\x1b[K';

export interface ProgressStream {
  write(chunk: string): boolean;
  isTTY?: boolean;
}

export interface ProgressReporter {
  start(label: string): void;
  /** Replace the label with the counter summary */
  update(counters: Readonly<Counters>): void;
  /** Stop redrawing and print the final label with a check mark */
  stop(finalLabel?: string): void;
  /** Stop redrawing and clear the line */
  abort(): void;
}

export function formatCounters(counters: Readonly<Counters>): string {
  return `[ VALID: ${counters.valid} | INVALID: ${counters.invalid} | CDN: ${counters.matched} ]`;
}

export class SpinnerReporter implements ProgressReporter {
  private label = '';
  private frame = 0;
  private timer: NodeJS.Timeout | null = null;

  constructor(private readonly stream: ProgressStream) {}

  start(label: string): void {
    this.label = label;
    if (this.timer) return;

    this.render();
    this.timer = setInterval(() => this.render(), SPINNER_INTERVAL_MS);
    this.timer.unref();
  }

  update(counters: Readonly<Counters>): void {
    this.label = formatCounters(counters);
  }

  stop(finalLabel?: string): void {
    if (!this.timer) return;

    clearInterval(this.timer);
    this.timer = null;
    this.stream.write(`${CLEAR_LINE}[✔] ${finalLabel ?? this.label}\n`);
  }

  abort(): void {
    if (!this.timer) return;

    clearInterval(this.timer);
    this.timer = null;
    this.stream.write(CLEAR_LINE);
  }

  private render(): void {
    const frame = SPINNER_FRAMES[this.frame % SPINNER_FRAMES.length];
    this.frame++;
    this.stream.write(`${CLEAR_LINE}${frame} ${this.label}`);
  }
}

export const noopReporter: ProgressReporter = {
  start: () => undefined,
  update: () => undefined,
  stop: () => undefined,
  abort: () => undefined,
};

export function createProgressReporter(stream: ProgressStream): ProgressReporter {
  return stream.isTTY === true ? new SpinnerReporter(stream) : noopReporter;
}
