import type { ReuseMode } from '../config.js';

export type { ReuseMode };

export interface SourceVideo {
  readonly id: string;
  /** Seconds, always > 0. */
  readonly duration: number;
  /** Opaque to the planner. */
  readonly path: string;
}

export interface Boundary {
  readonly videoId: string;
  readonly startTime: number;
  readonly endTime: number;
}

export interface ConcatenationRecord {
  /** `concat_<attempt index>`; gaps in the sequence are discarded attempts. */
  readonly recordId: string;
  /** File name the concatenated clip is rendered to. */
  readonly concatVideo: string;
  readonly totalDuration: number;
  readonly boundaries: readonly Boundary[];
  readonly videos: readonly string[];
}

export interface PlannerOptions {
  totalConcats: number;
  minVideosPerConcat: number;
  maxVideosPerConcat: number;
  targetDurationMin: number;
  targetDurationMax: number;
  allowReuse: boolean;
  reuseMode: ReuseMode;
  /** Per-video usage ceiling as a multiple of totalConcats; <= 0 disables the cap. */
  maxUsageRatio: number;
  seed: number;
  shuffleCatalog: boolean;
}

export interface ReusePolicy {
  allowReuse: boolean;
  /** Real-valued usage ceiling; <= 0 means uncapped. */
  ceiling: number;
}

export type AbandonReason =
  | 'no_candidates'
  | 'no_fitting_candidate'
  | 'attempts_exhausted'
  | 'below_min_duration'
  | 'below_min_videos';
