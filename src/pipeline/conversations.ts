/**
 * Streaming-style training conversations.
 *
 * Every sampled second of every segment becomes one `<image>` turn. The model
 * stays `<|silent|>` until a segment's last frame, where it answers with that
 * segment's summary. The final segment is answered only after the
 * `<|END_OF_STREAMING|>` marker.
 */
import { z } from 'zod';
import type { ConcatenationRecord } from '../planner/types.js';
import { readJsonFile, writeJsonFile } from '../utils/files.js';
import { createLogger } from '../utils/logger.js';
import type { ConcatAnnotation } from './annotator.js';

const log = createLogger('Conversations');

export const IMAGE_TOKEN = '<image>';
export const SILENT_TOKEN = '<|silent|>';
export const RESPONSE_TOKEN = '<|response|>';
export const END_OF_STREAMING_TOKEN = '<|END_OF_STREAMING|>';

const TurnSchema = z.object({
  from:  z.enum(['human', 'gpt']),
  value: z.string(),
});

const ConversationSchema = z.object({
  video:         z.string(),
  images:        z.array(z.string()),
  conversations: z.array(TurnSchema),
});

export type ConversationTurn = z.infer<typeof TurnSchema>;
export type TrainConversation = z.infer<typeof ConversationSchema>;

export function frameImagePath(videoId: string, frameIndex: number): string {
  return `${videoId}/frame_${String(frameIndex).padStart(5, '0')}.jpg`;
}

const human = (value: string): ConversationTurn => ({ from: 'human', value });
const gpt = (value: string): ConversationTurn => ({ from: 'gpt', value });

/**
 * Summary per boundary, paired by position. A video may appear twice in one
 * record, so ids are only used when the annotation does not line up with the
 * record; the first segment for an id wins.
 */
function summariesFor(record: ConcatenationRecord, annotation: ConcatAnnotation | undefined): Array<string | undefined> {
  const data = annotation?.data ?? [];
  const aligned = data.length === record.boundaries.length
    && data.every((seg, i) => seg.video_id === record.boundaries[i]?.videoId);
  if (aligned) return data.map(seg => seg.summary);

  const byId = new Map<string, string>();
  for (const seg of data) {
    if (!byId.has(seg.video_id)) byId.set(seg.video_id, seg.summary);
  }
  return record.boundaries.map(b => byId.get(b.videoId));
}

export function buildConversation(
  record: ConcatenationRecord,
  annotation: ConcatAnnotation | undefined,
  prompt: string,
): TrainConversation {
  const summaries = summariesFor(record, annotation);
  const images: string[] = [];
  const conversations: ConversationTurn[] = [human(prompt)];
  const lastIndex = record.boundaries.length - 1;

  record.boundaries.forEach((boundary, i) => {
    const summary = summaries[i];
    const lastFrame = Math.floor(boundary.endTime - boundary.startTime);

    for (let frame = 0; frame <= lastFrame; frame++) {
      images.push(frameImagePath(boundary.videoId, frame));
      conversations.push(human(IMAGE_TOKEN));
      conversations.push(
        frame === lastFrame && summary && i < lastIndex
          ? gpt(`${RESPONSE_TOKEN} ${summary}`)
          : gpt(SILENT_TOKEN),
      );
    }
  });

  const last = record.boundaries[lastIndex];
  if (last) {
    images.push(frameImagePath(last.videoId, Math.floor(last.endTime - last.startTime)));
    conversations.push(human(IMAGE_TOKEN), human(END_OF_STREAMING_TOKEN));
    const summary = summaries[lastIndex];
    if (summary) conversations.push(gpt(`${RESPONSE_TOKEN} ${summary}`));
  }

  return { video: record.concatVideo, images, conversations };
}

/** One conversation per plan record, matched to its annotation by record id. */
export function buildTrainConversations(
  plan: readonly ConcatenationRecord[],
  annotations: readonly ConcatAnnotation[],
  prompt: string,
): TrainConversation[] {
  const byRecord = new Map(annotations.map(a => [a.video, a] as const));
  const result = plan.map(record => buildConversation(record, byRecord.get(record.recordId), prompt));
  log.info('built training conversations', { count: result.length });
  return result;
}

export function saveConversations(filePath: string, conversations: readonly TrainConversation[]): void {
  writeJsonFile(filePath, conversations);
}

export function loadConversations(filePath: string): TrainConversation[] {
  return readJsonFile(filePath, z.array(ConversationSchema));
}
