import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { generateCompletion } from '../ai/claude.js';
import { createRecord } from '../planner/records.js';
import { ConfigError, InvalidInputError } from '../utils/errors.js';
import {
  buildConcatAnnotations,
  createTransitionWriter,
  loadAnnotations,
  loadVideoDescriptions,
  saveAnnotations,
  transitionPrompt,
} from './annotator.js';

vi.mock('../ai/claude.js', () => ({ generateCompletion: vi.fn() }));

const completion = vi.mocked(generateCompletion);

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'concat-annotator-'));
  completion.mockReset();
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

function write(name: string, content: string): string {
  const file = path.join(dir, name);
  fs.writeFileSync(file, content);
  return file;
}

describe('loadVideoDescriptions', () => {
  it('reads the first model turn of each JSONL row', () => {
    const file = write('desc.jsonl', [
      JSON.stringify({ video: 'v1.mp4', conversations: [{ from: 'human', value: 'q' }, { from: 'gpt', value: 'A dog runs.' }] }),
      '',
      JSON.stringify({ video: 'v2.mp4', conversations: [{ from: 'human', value: 'q' }] }),
    ].join('\n'));
    expect(loadVideoDescriptions(file)).toEqual(new Map([['v1', 'A dog runs.']]));
  });

  it('reads conversation or segment summaries from a JSON array', () => {
    const file = write('desc.json', JSON.stringify([
      { video_name: 'v3.mp4', conversations: [{ from: 'gpt', value: 'Rain.' }] },
      { video_id: 'v4', data: [{ summary: 'One.' }, { summary: 'Two.' }] },
    ]));
    expect(loadVideoDescriptions(file)).toEqual(new Map([['v3', 'Rain.'], ['v4', 'One. Two.']]));
  });

  it('rejects a JSONL row without a conversation', () => {
    const file = write('desc.jsonl', JSON.stringify({ video: 'v1.mp4' }));
    expect(() => loadVideoDescriptions(file)).toThrow(InvalidInputError);
  });

  it('rejects a JSON file that is not an array', () => {
    const file = write('desc.json', '{"video_name":"v1"}');
    expect(() => loadVideoDescriptions(file)).toThrow(InvalidInputError);
  });
});

describe('buildConcatAnnotations', () => {
  const record = createRecord(0, [
    { id: 'v1', duration: 10, path: 'v1.mp4' },
    { id: 'v2', duration: 5, path: 'v2.mp4' },
    { id: 'v3', duration: 4, path: 'v3.mp4' },
  ]);
  const descriptions = new Map([['v1', 'A'], ['v2', 'B']]);

  it('copies boundaries and summaries without a transition writer', async () => {
    const [annotation] = await buildConcatAnnotations([record], descriptions);
    expect(annotation).toEqual({
      video: 'concat_00000',
      data: [
        { video_id: 'v1', start: 0, end: 10, summary: 'A' },
        { video_id: 'v2', start: 10, end: 15, summary: 'B' },
        { video_id: 'v3', start: 15, end: 19, summary: '' },
      ],
    });
  });

  it('rewrites follow-on segments only when both summaries exist', async () => {
    const writeTransition = vi.fn(async (prev: string, cur: string) => `${prev} -> ${cur}`);
    const [annotation] = await buildConcatAnnotations([record], descriptions, { writeTransition });
    expect(annotation?.data.map(d => d.summary)).toEqual(['A', 'A -> B', '']);
    expect(writeTransition).toHaveBeenCalledTimes(1);
  });

  it('keeps the source summary when the writer fails', async () => {
    const writeTransition = vi.fn(async () => { throw new Error('llm down'); });
    const [annotation] = await buildConcatAnnotations([record], descriptions, { writeTransition });
    expect(annotation?.data[1]?.summary).toBe('B');
  });

  it('keeps plan order with several workers', async () => {
    const plan = [0, 1, 2, 3].map(i => createRecord(i, [{ id: 'v1', duration: 1 + i, path: 'v1.mp4' }]));
    const result = await buildConcatAnnotations(plan, descriptions, { workers: 3 });
    expect(result.map(a => a.video)).toEqual(['concat_00000', 'concat_00001', 'concat_00002', 'concat_00003']);
  });
});

describe('annotation file', () => {
  it('saves and loads annotations', () => {
    const file = path.join(dir, 'annotations.json');
    const annotations = [{ video: 'concat_00001', data: [{ video_id: 'v1', start: 0, end: 3, summary: 'Hi.' }] }];
    saveAnnotations(file, annotations);
    expect(loadAnnotations(file)).toEqual(annotations);
  });

  it('rejects a malformed annotation file', () => {
    const file = write('annotations.json', '[{"video":"concat_00001"}]');
    expect(() => loadAnnotations(file)).toThrow(InvalidInputError);
  });
});

describe('createTransitionWriter', () => {
  it('asks the LLM with both descriptions and returns its text', async () => {
    completion.mockResolvedValue({ text: 'Then a car passes.', provider: 'anthropic', inputTokens: 10, outputTokens: 5 });
    const writer = createTransitionWriter();
    await expect(writer('A cat sleeps.', 'A car passes.')).resolves.toBe('Then a car passes.');
    expect(completion.mock.calls[0]?.[0]).toBe(transitionPrompt('A cat sleeps.', 'A car passes.'));
  });

  it('falls back to the current summary on an empty reply', async () => {
    completion.mockResolvedValue({ text: '', provider: 'openai', inputTokens: 1, outputTokens: 0 });
    await expect(createTransitionWriter()('A.', 'B.')).resolves.toBe('B.');
  });

  it('does not retry a missing API key', async () => {
    completion.mockRejectedValue(new ConfigError('ANTHROPIC_API_KEY is not set'));
    await expect(createTransitionWriter()('A.', 'B.')).rejects.toBeInstanceOf(ConfigError);
    expect(completion).toHaveBeenCalledTimes(1);
  });
});
