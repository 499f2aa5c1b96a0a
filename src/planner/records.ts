/**
 * Concatenation records: boundary arithmetic and the on-disk plan format
 * (`concat_metadata.json`, snake_case, read back by the annotation stages).
 */
import { z } from 'zod';
import { readJsonFile, writeJsonFile } from '../utils/files.js';
import type { Boundary, ConcatenationRecord, SourceVideo } from './types.js';

export function recordIdFor(index: number): string {
  return `concat_${String(index).padStart(5, '0')}`;
}

/** Lay the videos end to end starting at 0. */
export function buildBoundaries(videos: readonly SourceVideo[]): Boundary[] {
  const boundaries: Boundary[] = [];
  let cursor = 0;
  for (const video of videos) {
    const endTime = cursor + video.duration;
    boundaries.push({ videoId: video.id, startTime: cursor, endTime });
    cursor = endTime;
  }
  return boundaries;
}

export function createRecord(index: number, videos: readonly SourceVideo[]): ConcatenationRecord {
  const boundaries = buildBoundaries(videos);
  const recordId = recordIdFor(index);
  return {
    recordId,
    concatVideo:   `${recordId}.mp4`,
    totalDuration: boundaries[boundaries.length - 1]?.endTime ?? 0,
    boundaries,
    videos:        videos.map(v => v.id),
  };
}

// ── Plan file ─────────────────────────────────────────────────────────────────

const PlanEntrySchema = z.object({
  concat_video:   z.string().min(1),
  total_duration: z.number(),
  boundaries: z.array(z.object({
    video_id:   z.string(),
    start_time: z.number(),
    end_time:   z.number(),
  })),
  videos: z.array(z.string()),
});

export const PlanFileSchema = z.array(PlanEntrySchema);

export type PlanEntry = z.infer<typeof PlanEntrySchema>;

export function toPlanEntry(record: ConcatenationRecord): PlanEntry {
  return {
    concat_video:   record.concatVideo,
    total_duration: record.totalDuration,
    boundaries: record.boundaries.map(b => ({
      video_id:   b.videoId,
      start_time: b.startTime,
      end_time:   b.endTime,
    })),
    videos: [...record.videos],
  };
}

export function fromPlanEntry(entry: PlanEntry): ConcatenationRecord {
  return {
    recordId:      entry.concat_video.replace(/\.mp4$/, ''),
    concatVideo:   entry.concat_video,
    totalDuration: entry.total_duration,
    boundaries: entry.boundaries.map(b => ({
      videoId:   b.video_id,
      startTime: b.start_time,
      endTime:   b.end_time,
    })),
    videos: entry.videos,
  };
}

export function savePlan(filePath: string, records: readonly ConcatenationRecord[]): void {
  writeJsonFile(filePath, records.map(toPlanEntry));
}

export function loadPlan(filePath: string): ConcatenationRecord[] {
  return readJsonFile(filePath, PlanFileSchema).map(fromPlanEntry);
}
