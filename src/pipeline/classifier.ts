// ═══════════════════════════════════════════════════════════════════════════════
// CLASSIFIER — Verdict for One Task
// ═══════════════════════════════════════════════════════════════════════════════

import { parseAddress, type Address } from '../address/index.js';
import type { RangeSet } from '../ranges/index.js';
import { Verdict, type ClassificationTask } from './types.js';

export function classify(address: Address, rangeSet: RangeSet): Verdict {
  return rangeSet.contains(address) ? Verdict.MATCHES_RANGE : Verdict.NO_MATCH;
}

/**
 * INVALID when the task carries no parseable address; the range set is not
 * consulted in that case.
 */
export function classifyTask(task: ClassificationTask, rangeSet: RangeSet): Verdict {
  const address = task.resolvedAddress === undefined ? null : parseAddress(task.resolvedAddress);
  if (!address) {
    return Verdict.INVALID;
  }
  return classify(address, rangeSet);
}
