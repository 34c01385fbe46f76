// ═══════════════════════════════════════════════════════════════════════════════
// RANGES MODULE INDEX
// ═══════════════════════════════════════════════════════════════════════════════

export { RangeSet } from './range-set.js';
export { RangeCache } from './cache.js';
export {
  type LoadRangeOptions,
  type LoadRangeDeps,
  tryLoadCache,
  loadRangeSet,
} from './loader.js';
