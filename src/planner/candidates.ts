import { PLANNER_LIMITS } from '../config.js';
import type { VideoCatalog } from './catalog.js';
import type { UsageLedger } from './ledger.js';
import type { ReusePolicy, SourceVideo } from './types.js';

export type FilterMode = 'strict' | 'relaxed';

export interface CandidateQuery {
  currentDuration: number;
  targetDurationMin: number;
  targetDurationMax: number;
  mode: FilterMode;
}

/**
 * Videos eligible as the next member of a record, in catalog order.
 *
 * strict:  remainingMin <= duration <= remainingMax
 * relaxed: duration <= remainingMax (lower bound dropped)
 *
 * Both modes apply the reuse policy. An empty result is a normal outcome.
 */
export function findCandidates(
  catalog: VideoCatalog,
  ledger: UsageLedger,
  policy: ReusePolicy,
  query: CandidateQuery,
): SourceVideo[] {
  const remainingMin = query.targetDurationMin - query.currentDuration;
  const remainingMax = query.targetDurationMax - query.currentDuration;
  const lower = query.mode === 'strict' ? remainingMin : Number.NEGATIVE_INFINITY;

  return catalog
    .inDurationRange(lower, remainingMax)
    .filter(v => ledger.allows(v.id, policy));
}

/** Relaxation only applies while the record is still far below the minimum. */
export function canRelax(currentDuration: number, targetDurationMin: number): boolean {
  return currentDuration < targetDurationMin * PLANNER_LIMITS.relaxThresholdRatio;
}
