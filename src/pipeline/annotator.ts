/**
 * Annotation assembly — maps each planned record onto per-segment summaries
 * taken from the source videos' descriptions, optionally rewriting every
 * segment after the first so it reads as a continuation of the previous one.
 */
import * as path from 'path';
import { z } from 'zod';
import { RETRY_POLICY } from '../config.js';
import { generateCompletion } from '../ai/claude.js';
import type { ConcatenationRecord } from '../planner/types.js';
import { ConfigError, InvalidInputError, errorMessage } from '../utils/errors.js';
import { parseJson, readJsonFile, readJsonLines, readTextFile, writeJsonFile } from '../utils/files.js';
import { createLogger } from '../utils/logger.js';
import { runWithConcurrency } from '../utils/pool.js';
import { NonRetryableError, withRetry } from '../utils/retry.js';

const log = createLogger('Annotator');

// ── Annotation file ───────────────────────────────────────────────────────────

const SegmentSchema = z.object({
  video_id: z.string(),
  start:    z.number(),
  end:      z.number(),
  summary:  z.string(),
});

const AnnotationSchema = z.object({
  video: z.string(),
  data:  z.array(SegmentSchema),
});

export const AnnotationFileSchema = z.array(AnnotationSchema);

export type AnnotatedSegment = z.infer<typeof SegmentSchema>;
export type ConcatAnnotation = z.infer<typeof AnnotationSchema>;

export function loadAnnotations(filePath: string): ConcatAnnotation[] {
  return readJsonFile(filePath, AnnotationFileSchema);
}

export function saveAnnotations(filePath: string, annotations: readonly ConcatAnnotation[]): void {
  writeJsonFile(filePath, annotations);
}

// ── Source descriptions ───────────────────────────────────────────────────────

const TurnSchema = z.object({ from: z.string(), value: z.string() });

const JsonlRowSchema = z.object({
  video: z.string(),
  conversations: z.array(TurnSchema),
});

const JsonItemSchema = z.object({
  video_name: z.string().optional(),
  video_id:   z.string().optional(),
  conversations: z.array(TurnSchema).optional(),
  data: z.array(z.object({ summary: z.string() })).optional(),
});

const stripMp4 = (name: string): string => name.replace('.mp4', '');

function firstModelTurn(turns: ReadonlyArray<z.infer<typeof TurnSchema>>): string | undefined {
  return turns.find(t => t.from === 'gpt')?.value;
}

/**
 * Read per-video descriptions. `.jsonl` rows carry a `video` name and a
 * conversation; `.json` holds an array keyed by `video_name` or `video_id`
 * with either a conversation or `data[].summary` segments.
 */
export function loadVideoDescriptions(filePath: string): Map<string, string> {
  const descriptions = new Map<string, string>();

  if (path.extname(filePath).toLowerCase() === '.jsonl') {
    readJsonLines(filePath).forEach((row, i) => {
      const parsed = JsonlRowSchema.safeParse(row);
      if (!parsed.success) throw new InvalidInputError(`${filePath}: row ${i + 1} is not a description`, parsed.error);
      const summary = firstModelTurn(parsed.data.conversations);
      if (summary !== undefined) descriptions.set(stripMp4(parsed.data.video), summary);
    });
  } else {
    const data = parseJson(readTextFile(filePath), filePath);
    const parsed = z.array(JsonItemSchema).safeParse(data);
    if (!parsed.success) throw new InvalidInputError(`${filePath} is not a description array`, parsed.error);

    for (const item of parsed.data) {
      const id = stripMp4(item.video_name ?? item.video_id ?? '');
      if (item.conversations) {
        const summary = firstModelTurn(item.conversations);
        if (summary !== undefined) descriptions.set(id, summary);
      } else if (item.data) {
        descriptions.set(id, item.data.map(d => d.summary).join(' '));
      }
    }
  }

  log.info('loaded video descriptions', { count: descriptions.size, source: filePath });
  return descriptions;
}

// ── Transition writer ─────────────────────────────────────────────────────────

export type TransitionWriter = (previousSummary: string, currentSummary: string) => Promise<string>;

const TRANSITION_SYSTEM_PROMPT =
  'You write captions for videos stitched together from several clips. ' +
  'Reply with the caption only.';

export function transitionPrompt(previousSummary: string, currentSummary: string): string {
  return [
    'The previous clip in a stitched video was described as:',
    `"${previousSummary}"`,
    '',
    'The clip that follows it is described as:',
    `"${currentSummary}"`,
    '',
    'Rewrite the second description so it reads as a natural continuation of the first.',
    'Keep every fact from the second description and add nothing that is not in it.',
  ].join('\n');
}

/** LLM-backed writer. ConfigError (no key) is never retried. */
export function createTransitionWriter(): TransitionWriter {
  return async (previousSummary, currentSummary) => {
    const res = await withRetry(
      () => generateCompletion(transitionPrompt(previousSummary, currentSummary), TRANSITION_SYSTEM_PROMPT, 400),
      {
        maxAttempts: RETRY_POLICY.maxRetries,
        baseDelayMs: RETRY_POLICY.retryWaitMs,
        label: 'transition',
        isRetryable: err => !(err instanceof NonRetryableError) && !(err instanceof ConfigError),
      },
    );
    return res.text || currentSummary;
  };
}

// ── Assembly ──────────────────────────────────────────────────────────────────

export interface AnnotateOptions {
  writeTransition?: TransitionWriter;
  workers?: number;
}

async function annotateRecord(
  record: ConcatenationRecord,
  descriptions: ReadonlyMap<string, string>,
  writeTransition: TransitionWriter | undefined,
): Promise<ConcatAnnotation> {
  const data: AnnotatedSegment[] = [];

  for (const [i, boundary] of record.boundaries.entries()) {
    let summary = descriptions.get(boundary.videoId) ?? '';
    const previous = i > 0 ? record.boundaries[i - 1] : undefined;
    const previousSummary = previous ? descriptions.get(previous.videoId) ?? '' : '';

    if (previous && writeTransition && previousSummary && summary) {
      try {
        summary = await writeTransition(previousSummary, summary);
      } catch (err) {
        log.warn('transition failed, keeping source summary', {
          record: record.recordId,
          segment: i,
          error: errorMessage(err),
        });
      }
    }

    data.push({ video_id: boundary.videoId, start: boundary.startTime, end: boundary.endTime, summary });
  }

  return { video: record.recordId, data };
}

export async function buildConcatAnnotations(
  plan: readonly ConcatenationRecord[],
  descriptions: ReadonlyMap<string, string>,
  opts: AnnotateOptions = {},
): Promise<ConcatAnnotation[]> {
  const missing = new Set<string>();
  for (const record of plan) {
    for (const id of record.videos) if (!descriptions.has(id)) missing.add(id);
  }
  if (missing.size > 0) log.warn('videos without a description', { count: missing.size });

  const tasks = plan.map(record => () => annotateRecord(record, descriptions, opts.writeTransition));
  const annotations = await runWithConcurrency(tasks, opts.workers ?? 1, (done, total) => {
    if (done % 100 === 0 || done === total) log.info(`annotated ${done}/${total} records`);
  });

  log.info('annotation complete', { records: annotations.length, transitions: Boolean(opts.writeTransition) });
  return annotations;
}
