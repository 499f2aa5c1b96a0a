import { createRecord } from '../planner/records.js';
import type { ConcatAnnotation } from './annotator.js';
import { buildConversation, buildTrainConversations, frameImagePath } from './conversations.js';

const record = createRecord(0, [
  { id: 'a', duration: 2, path: 'a.mp4' },
  { id: 'b', duration: 1, path: 'b.mp4' },
]);

const annotation: ConcatAnnotation = {
  video: 'concat_00000',
  data: [
    { video_id: 'a', start: 0, end: 2, summary: 'A door opens.' },
    { video_id: 'b', start: 2, end: 3, summary: 'A dog walks in.' },
  ],
};

describe('frameImagePath', () => {
  it('uses the per-video zero-padded frame name', () => {
    expect(frameImagePath('clip_7', 12)).toBe('clip_7/frame_00012.jpg');
  });
});

describe('buildConversation', () => {
  it('streams one image per second and answers each segment on its last frame', () => {
    const conversation = buildConversation(record, annotation, 'Describe the video.');

    expect(conversation.video).toBe('concat_00000.mp4');
    expect(conversation.images).toEqual([
      'a/frame_00000.jpg',
      'a/frame_00001.jpg',
      'a/frame_00002.jpg',
      'b/frame_00000.jpg',
      'b/frame_00001.jpg',
      'b/frame_00001.jpg',
    ]);
    expect(conversation.conversations).toEqual([
      { from: 'human', value: 'Describe the video.' },
      { from: 'human', value: '<image>' },
      { from: 'gpt', value: '<|silent|>' },
      { from: 'human', value: '<image>' },
      { from: 'gpt', value: '<|silent|>' },
      { from: 'human', value: '<image>' },
      { from: 'gpt', value: '<|response|> A door opens.' },
      { from: 'human', value: '<image>' },
      { from: 'gpt', value: '<|silent|>' },
      { from: 'human', value: '<image>' },
      { from: 'gpt', value: '<|silent|>' },
      { from: 'human', value: '<image>' },
      { from: 'human', value: '<|END_OF_STREAMING|>' },
      { from: 'gpt', value: '<|response|> A dog walks in.' },
    ]);
  });

  it('stays silent and skips the final answer without an annotation', () => {
    const conversation = buildConversation(record, undefined, 'Describe the video.');
    const answers = conversation.conversations.filter(t => t.from === 'gpt').map(t => t.value);
    expect(answers).toEqual(Array.from({ length: 5 }, () => '<|silent|>'));
    expect(conversation.conversations[conversation.conversations.length - 1])
      .toEqual({ from: 'human', value: '<|END_OF_STREAMING|>' });
  });
});

describe('buildConversation with a repeated video', () => {
  const repeated = createRecord(1, [
    { id: 'a', duration: 1, path: 'a.mp4' },
    { id: 'b', duration: 1, path: 'b.mp4' },
    { id: 'a', duration: 1, path: 'a.mp4' },
  ]);

  const responses = (ann: ConcatAnnotation) => buildConversation(repeated, ann, 'Describe the video.')
    .conversations.filter(t => t.value.startsWith('<|response|>')).map(t => t.value);

  it('answers each segment with the summary at its own position', () => {
    expect(responses({
      video: 'concat_00001',
      data: [
        { video_id: 'a', start: 0, end: 1, summary: 'A raw' },
        { video_id: 'b', start: 1, end: 2, summary: 'after previous: B raw' },
        { video_id: 'a', start: 2, end: 3, summary: 'after previous: A raw' },
      ],
    })).toEqual([
      '<|response|> A raw',
      '<|response|> after previous: B raw',
      '<|response|> after previous: A raw',
    ]);
  });

  it('falls back to the first summary per id when the annotation does not line up', () => {
    expect(responses({
      video: 'concat_00001',
      data: [
        { video_id: 'b', start: 0, end: 1, summary: 'B only' },
        { video_id: 'a', start: 1, end: 2, summary: 'A first' },
      ],
    })).toEqual([
      '<|response|> A first',
      '<|response|> B only',
      '<|response|> A first',
    ]);
  });
});

describe('buildTrainConversations', () => {
  it('matches annotations to plan records by id', () => {
    const other = createRecord(5, [{ id: 'c', duration: 1, path: 'c.mp4' }]);
    const result = buildTrainConversations([record, other], [annotation], 'Describe the video.');
    expect(result.map(c => c.video)).toEqual(['concat_00000.mp4', 'concat_00005.mp4']);
    expect(result[1]?.conversations.some(t => t.value.startsWith('<|response|>'))).toBe(false);
  });
});
