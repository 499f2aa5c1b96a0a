import type { ReusePolicy } from './types.js';

/**
 * Per-video usage counts for one planning run.
 *
 * Counts only grow. The builder increments a video the moment it is appended to
 * an in-progress record, so a record that is later discarded still leaves its
 * increments behind and steers later records toward less-used videos.
 */
export class UsageLedger {
  private readonly counts = new Map<string, number>();

  /** Usage ceiling for a run: `totalTargetRecords × maxUsageRatio`, not rounded. */
  static maxAllowed(totalTargetRecords: number, maxUsageRatio: number): number {
    return totalTargetRecords * maxUsageRatio;
  }

  static policyFor(allowReuse: boolean, totalTargetRecords: number, maxUsageRatio: number): ReusePolicy {
    return { allowReuse, ceiling: UsageLedger.maxAllowed(totalTargetRecords, maxUsageRatio) };
  }

  count(videoId: string): number {
    return this.counts.get(videoId) ?? 0;
  }

  increment(videoId: string): number {
    const next = this.count(videoId) + 1;
    this.counts.set(videoId, next);
    return next;
  }

  /** Whether the reuse policy still admits this video. */
  allows(videoId: string, policy: ReusePolicy): boolean {
    const used = this.count(videoId);
    if (!policy.allowReuse) return used === 0;
    return policy.ceiling <= 0 || used < policy.ceiling;
  }

  /** Ids in first-use order. */
  snapshot(): Record<string, number> {
    return Object.fromEntries(this.counts);
  }

  get totalIncrements(): number {
    let total = 0;
    for (const n of this.counts.values()) total += n;
    return total;
  }
}
