/**
 * Source video catalog — the immutable pool the planner draws from.
 *
 * Accepts both the sampler/metadata-generator entry shape
 * (`video_name`, `duration_sec`, `video_path`) and plain `{ id, duration, path }`.
 * Bad entries are skipped with a warning; a catalog with nothing usable is fatal.
 */
import { z } from 'zod';
import { createLogger } from '../utils/logger.js';
import { EmptyCatalogError, InvalidInputError } from '../utils/errors.js';
import { parseJson, readTextFile } from '../utils/files.js';
import type { SeededRandom } from '../utils/random.js';
import type { SourceVideo } from './types.js';

const log = createLogger('Catalog');

// ── Entry schema ──────────────────────────────────────────────────────────────

const MetadataEntrySchema = z
  .object({
    video_name:   z.string().min(1),
    duration_sec: z.number(),
    video_path:   z.string(),
  })
  .transform(e => ({ id: e.video_name, duration: e.duration_sec, path: e.video_path }));

const PlainEntrySchema = z.object({
  id:       z.string().min(1),
  duration: z.number(),
  path:     z.string(),
});

const EntrySchema = z
  .union([MetadataEntrySchema, PlainEntrySchema])
  .refine(v => Number.isFinite(v.duration) && v.duration > 0, {
    message: 'duration must be a positive number',
  });

interface IndexedVideo {
  video: SourceVideo;
  order: number;
}

// ── Catalog ───────────────────────────────────────────────────────────────────

export class VideoCatalog {
  private readonly videos: readonly SourceVideo[];
  /** Ascending by duration, ties by catalog order. */
  private readonly byDuration: readonly IndexedVideo[];

  private constructor(videos: readonly SourceVideo[]) {
    this.videos = videos;
    this.byDuration = videos
      .map((video, order) => ({ video, order }))
      .sort((a, b) => a.video.duration - b.video.duration || a.order - b.order);
  }

  /** Read and validate a catalog file. */
  static load(filePath: string): VideoCatalog {
    log.info('loading video information', { filePath });
    const catalog = VideoCatalog.fromJson(parseJson(readTextFile(filePath), filePath), filePath);
    log.info('loaded videos', { count: catalog.size });
    return catalog;
  }

  /** Validate already-parsed JSON (an array of entries). */
  static fromJson(data: unknown, source = 'catalog'): VideoCatalog {
    if (!Array.isArray(data)) {
      throw new InvalidInputError(`${source} must be a JSON array of video entries`);
    }

    const videos: SourceVideo[] = [];
    const seen = new Set<string>();
    data.forEach((raw, index) => {
      const parsed = EntrySchema.safeParse(raw);
      if (!parsed.success) {
        log.warn('skipping invalid entry', { source, index, issue: parsed.error.issues[0]?.message });
        return;
      }
      if (seen.has(parsed.data.id)) {
        log.warn('skipping duplicate video id', { source, index, id: parsed.data.id });
        return;
      }
      seen.add(parsed.data.id);
      videos.push(Object.freeze({ ...parsed.data }));
    });

    return VideoCatalog.fromVideos(videos);
  }

  static fromVideos(videos: readonly SourceVideo[]): VideoCatalog {
    if (videos.length === 0) throw new EmptyCatalogError();
    return new VideoCatalog([...videos]);
  }

  get size(): number {
    return this.videos.length;
  }

  list(): readonly SourceVideo[] {
    return this.videos;
  }

  /** Videos with `min <= duration <= max`, in catalog order. */
  inDurationRange(min: number, max: number): SourceVideo[] {
    if (max < min) return [];
    const hits: IndexedVideo[] = [];
    for (let i = this.lowerBound(min); i < this.byDuration.length; i++) {
      const entry = this.byDuration[i];
      if (!entry || entry.video.duration > max) break;
      hits.push(entry);
    }
    return hits.sort((a, b) => a.order - b.order).map(h => h.video);
  }

  /** Same videos in an order drawn from the run's random stream. */
  shuffled(random: SeededRandom): VideoCatalog {
    return new VideoCatalog(random.shuffle([...this.videos]));
  }

  /** First index in byDuration whose duration is >= min. */
  private lowerBound(min: number): number {
    let lo = 0;
    let hi = this.byDuration.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      const entry = this.byDuration[mid];
      if (entry && entry.video.duration < min) lo = mid + 1;
      else hi = mid;
    }
    return lo;
  }
}
