import type { SeededRandom } from '../utils/random.js';
import type { UsageLedger } from './ledger.js';
import type { ReuseMode, SourceVideo } from './types.js';

export interface SelectionContext {
  mode: ReuseMode;
  ledger: UsageLedger;
  random: SeededRandom;
  currentDuration: number;
  targetDurationMax: number;
}

/**
 * balanced: ascending usage count, ties keep catalog order (Array#sort is stable).
 * random:   shuffled with the run's stream.
 * The input array is not modified.
 */
export function orderCandidates(
  eligible: readonly SourceVideo[],
  mode: ReuseMode,
  ledger: UsageLedger,
  random: SeededRandom,
): SourceVideo[] {
  const ordered = [...eligible];
  if (mode === 'balanced') {
    return ordered.sort((a, b) => ledger.count(a.id) - ledger.count(b.id));
  }
  return random.shuffle(ordered);
}

/**
 * Pick the next member. Falls back to the first candidate (in the same order)
 * that still fits under targetDurationMax; null when nothing fits.
 */
export function pickCandidate(
  eligible: readonly SourceVideo[],
  ctx: SelectionContext,
): SourceVideo | null {
  const ordered = orderCandidates(eligible, ctx.mode, ctx.ledger, ctx.random);
  const first = ordered[0];
  if (!first) return null;

  const fits = (v: SourceVideo) => ctx.currentDuration + v.duration <= ctx.targetDurationMax;
  if (fits(first)) return first;
  return ordered.find(fits) ?? null;
}
