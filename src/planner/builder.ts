/**
 * Concatenation builder — assembles one record at a time and drives the batch.
 *
 * Per record: ACCUMULATING → SATISFIED | ABANDONED.
 *   1. Draw the target member count from [minVideosPerConcat, maxVideosPerConcat].
 *   2. Ask the filter for strict candidates; fall back to relaxed only while the
 *      record is below half the minimum duration.
 *   3. Let the strategy pick one, commit it (boundary + ledger increment).
 *   4. Stop at the target count, when nothing is eligible or fits, or when the
 *      attempt budget runs out.
 *   5. Emit only if the duration window and member-count bounds hold.
 *
 * Records are resolved strictly in order: later records see every ledger
 * increment made by earlier ones, discarded attempts included.
 */
import { PLANNER_LIMITS } from '../config.js';
import { createLogger } from '../utils/logger.js';
import { SeededRandom } from '../utils/random.js';
import type { VideoCatalog } from './catalog.js';
import { canRelax, findCandidates } from './candidates.js';
import { UsageLedger } from './ledger.js';
import { createRecord } from './records.js';
import { pickCandidate } from './strategy.js';
import type {
  AbandonReason,
  ConcatenationRecord,
  PlannerOptions,
  ReusePolicy,
  SourceVideo,
} from './types.js';

const log = createLogger('Planner');

// ── Types ─────────────────────────────────────────────────────────────────────

export interface SatisfiedRecord {
  state: 'satisfied';
  index: number;
  attempts: number;
  record: ConcatenationRecord;
}

export interface AbandonedRecord {
  state: 'abandoned';
  index: number;
  attempts: number;
  reason: AbandonReason;
  targetVideoCount: number;
  members: readonly string[];
  currentDuration: number;
}

export type AssemblyOutcome = SatisfiedRecord | AbandonedRecord;

export interface PlanResult {
  requested: number;
  catalogSize: number;
  records: ConcatenationRecord[];
  discarded: AbandonedRecord[];
  /** Final usage counts, discarded attempts included. */
  usage: Record<string, number>;
}

export interface BuilderDeps {
  ledger?: UsageLedger;
  random?: SeededRandom;
}

// ── Builder ───────────────────────────────────────────────────────────────────

export class ConcatenationBuilder {
  readonly ledger: UsageLedger;
  readonly random: SeededRandom;
  private readonly catalog: VideoCatalog;
  private readonly policy: ReusePolicy;

  constructor(catalog: VideoCatalog, private readonly options: PlannerOptions, deps: BuilderDeps = {}) {
    this.random = deps.random ?? new SeededRandom(options.seed);
    this.ledger = deps.ledger ?? new UsageLedger();
    this.catalog = options.shuffleCatalog ? catalog.shuffled(this.random) : catalog;
    this.policy = UsageLedger.policyFor(options.allowReuse, options.totalConcats, options.maxUsageRatio);
  }

  /** Run the per-record state machine for attempt `index`. */
  assembleRecord(index: number): AssemblyOutcome {
    const o = this.options;
    const targetVideoCount = this.random.int(o.minVideosPerConcat, o.maxVideosPerConcat);
    const members: SourceVideo[] = [];
    let currentDuration = 0;
    let attempts = 0;
    let stoppedBy: AbandonReason | null = null;

    while (members.length < targetVideoCount) {
      if (attempts >= PLANNER_LIMITS.maxAttemptsPerRecord) {
        stoppedBy = 'attempts_exhausted';
        break;
      }
      attempts++;

      const query = {
        currentDuration,
        targetDurationMin: o.targetDurationMin,
        targetDurationMax: o.targetDurationMax,
      };
      let eligible = findCandidates(this.catalog, this.ledger, this.policy, { ...query, mode: 'strict' });
      if (eligible.length === 0 && canRelax(currentDuration, o.targetDurationMin)) {
        eligible = findCandidates(this.catalog, this.ledger, this.policy, { ...query, mode: 'relaxed' });
      }
      if (eligible.length === 0) {
        stoppedBy = 'no_candidates';
        break;
      }

      const chosen = pickCandidate(eligible, {
        mode:              o.reuseMode,
        ledger:            this.ledger,
        random:            this.random,
        currentDuration,
        targetDurationMax: o.targetDurationMax,
      });
      if (!chosen) {
        stoppedBy = 'no_fitting_candidate';
        break;
      }

      members.push(chosen);
      currentDuration += chosen.duration;
      this.ledger.increment(chosen.id);
    }

    const belowDuration = currentDuration < o.targetDurationMin;
    const belowCount = members.length < o.minVideosPerConcat;
    if (belowDuration || belowCount) {
      return {
        state: 'abandoned',
        index,
        attempts,
        reason: stoppedBy ?? (belowDuration ? 'below_min_duration' : 'below_min_videos'),
        targetVideoCount,
        members: members.map(m => m.id),
        currentDuration,
      };
    }

    return { state: 'satisfied', index, attempts, record: createRecord(index, members) };
  }

  /** Make `totalConcats` attempts; discarded attempts leave gaps, not failures. */
  buildAll(): PlanResult {
    const total = this.options.totalConcats;
    log.info('generating video concatenations', {
      requested: total,
      catalogSize: this.catalog.size,
      reuseMode: this.options.reuseMode,
      allowReuse: this.options.allowReuse,
      usageCeiling: this.policy.ceiling,
    });

    const records: ConcatenationRecord[] = [];
    const discarded: AbandonedRecord[] = [];

    for (let i = 0; i < total; i++) {
      const outcome = this.assembleRecord(i);
      if (outcome.state === 'satisfied') {
        records.push(outcome.record);
      } else {
        discarded.push(outcome);
        log.warn('no videos selected for concat, skipping', {
          index: i,
          reason: outcome.reason,
          members: outcome.members.length,
          duration: outcome.currentDuration,
        });
      }

      if ((i + 1) % PLANNER_LIMITS.progressEvery === 0) {
        log.info(`generated ${i + 1}/${total} concatenations`, { emitted: records.length });
      }
    }

    log.info(`generated ${records.length} of ${total} requested concatenations`, {
      discarded: discarded.length,
      videoUses: this.ledger.totalIncrements,
    });
    return {
      requested: total,
      catalogSize: this.catalog.size,
      records,
      discarded,
      usage: this.ledger.snapshot(),
    };
  }
}

/** Convenience wrapper: fresh ledger and random stream seeded from the options. */
export function planConcatenations(catalog: VideoCatalog, options: PlannerOptions): PlanResult {
  return new ConcatenationBuilder(catalog, options).buildAll();
}
