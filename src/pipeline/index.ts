// ═══════════════════════════════════════════════════════════════════════════════
// PIPELINE MODULE INDEX
// ═══════════════════════════════════════════════════════════════════════════════

export {
  type ClassificationTask,
  Verdict,
  type Counters,
  type OutputMode,
  type ProgressObserver,
  type PipelineSummary,
} from './types.js';

export {
  type NormalizeOptions,
  type NormalizedLines,
  extractToken,
  normalizeLine,
  normalizeLines,
} from './normalizer.js';

export { classify, classifyTask } from './classifier.js';
export { BoundedQueue, QueueClosedError, type QueuePop } from './queue.js';
export { Mutex } from './mutex.js';
export { type Sink, type StreamSinkOptions, SinkClosedError, createStreamSink } from './sink.js';
export { Aggregator, formatOutputLine } from './aggregator.js';
export { type PipelineDeps, type PipelineOptions, runPipeline } from './dispatcher.js';
