// ═══════════════════════════════════════════════════════════════════════════════
// PIPELINE TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * One unit of classification work.
 */
export interface ClassificationTask {
  /** Trimmed input line the task came from; shared by every address of a CIDR */
  readonly rawText: string;
  /** Canonical address text; absent when the line yielded no address */
  readonly resolvedAddress?: string;
}

export const Verdict = {
  INVALID: 'INVALID',
  MATCHES_RANGE: 'MATCHES_RANGE',
  NO_MATCH: 'NO_MATCH',
} as const;

export type Verdict = typeof Verdict[keyof typeof Verdict];

export interface Counters {
  /** NO_MATCH verdicts (written to the sink) */
  valid: number;
  /** INVALID verdicts */
  invalid: number;
  /** MATCHES_RANGE verdicts (filtered out) */
  matched: number;
}

/**
 * `canonical` writes the resolved address, `raw` the original line.
 */
export type OutputMode = 'canonical' | 'raw';

export type ProgressObserver = (counters: Readonly<Counters>) => void;

export interface PipelineSummary {
  /** Non-empty input lines read */
  readonly lines: number;
  /** Tasks dispatched to workers */
  readonly tasks: number;
  readonly valid: number;
  readonly invalid: number;
  readonly matched: number;
  readonly durationMs: number;
}
