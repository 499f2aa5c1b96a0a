import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { EmptyCatalogError, InvalidInputError } from '../utils/errors.js';
import { SeededRandom } from '../utils/random.js';
import { VideoCatalog } from './catalog.js';

const entry = (video_name: string, duration_sec: number) => ({
  video_name,
  duration_sec,
  video_path: `/videos/${video_name}.mp4`,
});

describe('VideoCatalog.fromJson', () => {
  it('accepts the metadata entry shape', () => {
    const catalog = VideoCatalog.fromJson([entry('clip_a', 12.5)]);
    expect(catalog.list()).toEqual([{ id: 'clip_a', duration: 12.5, path: '/videos/clip_a.mp4' }]);
  });

  it('accepts plain { id, duration, path } entries', () => {
    const catalog = VideoCatalog.fromJson([{ id: 'x', duration: 3, path: 'x.mp4' }]);
    expect(catalog.list()).toEqual([{ id: 'x', duration: 3, path: 'x.mp4' }]);
  });

  it('skips entries with a missing, zero, negative or non-numeric duration', () => {
    const catalog = VideoCatalog.fromJson([
      entry('ok', 5),
      entry('zero', 0),
      entry('negative', -2),
      { video_name: 'text', duration_sec: '7', video_path: 't.mp4' },
      { video_name: 'missing', video_path: 'm.mp4' },
    ]);
    expect(catalog.list().map(v => v.id)).toEqual(['ok']);
  });

  it('keeps the first of duplicate ids', () => {
    const catalog = VideoCatalog.fromJson([entry('dup', 5), entry('dup', 9)]);
    expect(catalog.size).toBe(1);
    expect(catalog.list()[0]?.duration).toBe(5);
  });

  it('rejects anything that is not an array', () => {
    expect(() => VideoCatalog.fromJson({ videos: [] })).toThrow(InvalidInputError);
  });

  it('fails with EmptyCatalogError when nothing is usable', () => {
    expect(() => VideoCatalog.fromJson([entry('zero', 0)])).toThrow(EmptyCatalogError);
    expect(() => VideoCatalog.fromJson([])).toThrow(EmptyCatalogError);
  });

  it('freezes entries', () => {
    const catalog = VideoCatalog.fromJson([entry('a', 4)]);
    expect(Object.isFrozen(catalog.list()[0])).toBe(true);
  });
});

describe('VideoCatalog.load', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'concat-catalog-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reads a catalog file', () => {
    const file = path.join(dir, 'video_metadata.json');
    fs.writeFileSync(file, JSON.stringify([entry('a', 4), entry('b', 6)]));
    expect(VideoCatalog.load(file).size).toBe(2);
  });

  it('rejects an empty file as invalid input', () => {
    const file = path.join(dir, 'video_metadata.json');
    fs.writeFileSync(file, '');
    expect(() => VideoCatalog.load(file)).toThrow(InvalidInputError);
  });
});

describe('VideoCatalog.inDurationRange', () => {
  const catalog = VideoCatalog.fromJson([
    entry('long', 40),
    entry('short', 10),
    entry('mid', 15),
    entry('also_short', 10),
  ]);

  it('returns videos inside the inclusive range in catalog order', () => {
    expect(catalog.inDurationRange(10, 15).map(v => v.id)).toEqual(['short', 'mid', 'also_short']);
  });

  it('supports an open lower bound', () => {
    expect(catalog.inDurationRange(Number.NEGATIVE_INFINITY, 12).map(v => v.id)).toEqual(['short', 'also_short']);
  });

  it('returns nothing for an inverted range', () => {
    expect(catalog.inDurationRange(20, 5)).toEqual([]);
  });
});

describe('VideoCatalog.shuffled', () => {
  it('keeps the same videos', () => {
    const catalog = VideoCatalog.fromJson(['a', 'b', 'c', 'd'].map(id => entry(id, 5)));
    const shuffled = catalog.shuffled(new SeededRandom(1));
    expect(shuffled.list().map(v => v.id).sort()).toEqual(['a', 'b', 'c', 'd']);
    expect(catalog.list().map(v => v.id)).toEqual(['a', 'b', 'c', 'd']);
  });
});
