/**
 * Corpus statistics over cleaned annotations (and, when available, the
 * planner's usage ledger), plus the plain-text report written next to them.
 */
import type { ConcatenationRecord } from '../planner/types.js';
import type { ConcatAnnotation } from './annotator.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface Distribution {
  count: number;
  total: number;
  mean: number;
  min: number;
  max: number;
  median: number;
  /** Population standard deviation. */
  std: number;
}

export interface Bucket {
  label: string;
  count: number;
  /** Share of all records, 0–100. */
  percent: number;
}

export interface AnnotationStats {
  records: number;
  recordDurations: Distribution;
  segmentDurations: Distribution;
  segmentsPerRecord: Distribution;
  /** Segment count → number of records with exactly that many segments, ascending. */
  segmentHistogram: Array<{ segments: number; records: number }>;
  durationBuckets: Bucket[];
  segmentCountBuckets: Bucket[];
}

export interface UsageSummary {
  distinctVideos: number;
  totalUses: number;
  min: number;
  max: number;
  mean: number;
}

// ── Helpers ───────────────────────────────────────────────────────────────────

export function summarizeValues(values: readonly number[]): Distribution {
  if (values.length === 0) return { count: 0, total: 0, mean: 0, min: 0, max: 0, median: 0, std: 0 };

  const sorted = [...values].sort((a, b) => a - b);
  const total = sorted.reduce((sum, v) => sum + v, 0);
  const mean = total / sorted.length;
  const mid = Math.floor(sorted.length / 2);
  const median = sorted.length % 2 === 1
    ? sorted[mid] ?? 0
    : ((sorted[mid - 1] ?? 0) + (sorted[mid] ?? 0)) / 2;
  const variance = sorted.reduce((sum, v) => sum + (v - mean) ** 2, 0) / sorted.length;

  return {
    count: sorted.length,
    total,
    mean,
    min: sorted[0] ?? 0,
    max: sorted[sorted.length - 1] ?? 0,
    median,
    std: Math.sqrt(variance),
  };
}

interface BucketEdge {
  label: string;
  from: number;
  /** Exclusive upper bound. */
  below: number;
}

/** Values outside every `[from, below)` range are left uncounted. */
function bucketize(values: readonly number[], edges: readonly BucketEdge[]): Bucket[] {
  const counts = edges.map(() => 0);
  for (const value of values) {
    const slot = edges.findIndex(edge => value >= edge.from && value < edge.below);
    if (slot >= 0) counts[slot] = (counts[slot] ?? 0) + 1;
  }
  return edges.map((edge, i) => {
    const count = counts[i] ?? 0;
    return { label: edge.label, count, percent: values.length ? (count / values.length) * 100 : 0 };
  });
}

const DURATION_EDGES: BucketEdge[] = [
  ...Array.from({ length: 8 }, (_, i) => ({ label: `${i * 30}-${(i + 1) * 30}s`, from: i * 30, below: (i + 1) * 30 })),
  { label: '240s+', from: 240, below: Infinity },
];

const SEGMENT_COUNT_EDGES: BucketEdge[] = [
  ...Array.from({ length: 9 }, (_, i) => ({ label: String(i + 1), from: i + 1, below: i + 2 })),
  { label: '10+', from: 10, below: Infinity },
];

// ── Public API ─────────────────────────────────────────────────────────────────

export function analyzeAnnotations(annotations: readonly ConcatAnnotation[]): AnnotationStats {
  const recordDurations: number[] = [];
  const segmentCounts: number[] = [];
  const segmentDurations: number[] = [];

  for (const annotation of annotations) {
    const last = annotation.data[annotation.data.length - 1];
    recordDurations.push(last ? last.end : 0);
    segmentCounts.push(annotation.data.length);
    for (const seg of annotation.data) segmentDurations.push(seg.end - seg.start);
  }

  const histogram = new Map<number, number>();
  for (const n of segmentCounts) histogram.set(n, (histogram.get(n) ?? 0) + 1);

  return {
    records: annotations.length,
    recordDurations: summarizeValues(recordDurations),
    segmentDurations: summarizeValues(segmentDurations),
    segmentsPerRecord: summarizeValues(segmentCounts),
    segmentHistogram: [...histogram.entries()]
      .sort(([a], [b]) => a - b)
      .map(([segments, records]) => ({ segments, records })),
    durationBuckets: bucketize(recordDurations, DURATION_EDGES),
    segmentCountBuckets: bucketize(segmentCounts, SEGMENT_COUNT_EDGES),
  };
}

export function summarizeUsage(snapshot: Readonly<Record<string, number>>): UsageSummary {
  const counts = Object.values(snapshot).filter(n => n > 0);
  if (counts.length === 0) return { distinctVideos: 0, totalUses: 0, min: 0, max: 0, mean: 0 };
  const totalUses = counts.reduce((sum, n) => sum + n, 0);
  return {
    distinctVideos: counts.length,
    totalUses,
    min: Math.min(...counts),
    max: Math.max(...counts),
    mean: totalUses / counts.length,
  };
}

/** Usage counts implied by a saved plan (emitted records only). */
export function usageFromPlan(plan: readonly ConcatenationRecord[]): Record<string, number> {
  const usage: Record<string, number> = {};
  for (const record of plan) {
    for (const id of record.videos) usage[id] = (usage[id] ?? 0) + 1;
  }
  return usage;
}

function formatDistribution(d: Distribution, unit: string): string[] {
  return [
    `Mean:   ${d.mean.toFixed(2)}${unit}`,
    `Min:    ${d.min.toFixed(2)}${unit}`,
    `Max:    ${d.max.toFixed(2)}${unit}`,
    `Median: ${d.median.toFixed(2)}${unit}`,
    `Std:    ${d.std.toFixed(2)}${unit}`,
  ];
}

function formatBuckets(buckets: readonly Bucket[]): string[] {
  return buckets.map(b => `${b.label.padEnd(8)}: ${String(b.count).padStart(4)} (${b.percent.toFixed(2).padStart(5)}%)`);
}

export function formatStatsReport(stats: AnnotationStats, usage?: UsageSummary): string {
  const pct = (n: number) => (stats.records ? (n / stats.records) * 100 : 0).toFixed(2);
  const lines = [
    `Concatenated videos: ${stats.records}`,
    '',
    '=== Record duration ===',
    `Total:  ${stats.recordDurations.total.toFixed(2)}s (${(stats.recordDurations.total / 3600).toFixed(2)}h)`,
    ...formatDistribution(stats.recordDurations, 's'),
    '',
    '=== Segments per record ===',
    ...stats.segmentHistogram.map(h => `${h.segments} segments: ${h.records} (${pct(h.records)}%)`),
    `Mean:   ${stats.segmentsPerRecord.mean.toFixed(2)}`,
    `Min:    ${stats.segmentsPerRecord.min}`,
    `Max:    ${stats.segmentsPerRecord.max}`,
    '',
    '=== Segment duration ===',
    ...formatDistribution(stats.segmentDurations, 's'),
    '',
    '=== Record duration buckets ===',
    ...formatBuckets(stats.durationBuckets),
    '',
    '=== Segment count buckets ===',
    ...formatBuckets(stats.segmentCountBuckets),
  ];

  if (usage) {
    lines.push(
      '',
      '=== Source video usage ===',
      `Distinct videos: ${usage.distinctVideos}`,
      `Total uses:      ${usage.totalUses}`,
      `Min/Max/Mean:    ${usage.min}/${usage.max}/${usage.mean.toFixed(2)}`,
    );
  }
  return lines.join('\n') + '\n';
}
