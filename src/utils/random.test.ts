import { SeededRandom } from './random.js';

describe('SeededRandom', () => {
  it('repeats the same stream for the same seed', () => {
    const a = new SeededRandom(42);
    const b = new SeededRandom(42);
    const first = Array.from({ length: 5 }, () => a.next());
    const second = Array.from({ length: 5 }, () => b.next());
    expect(first).toEqual(second);
  });

  it('diverges for different seeds', () => {
    const a = new SeededRandom(1);
    const b = new SeededRandom(2);
    expect(a.next()).not.toBe(b.next());
  });

  it('next() stays in [0, 1)', () => {
    const r = new SeededRandom(7);
    for (let i = 0; i < 1000; i++) {
      const v = r.next();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });

  it('int() covers both bounds and nothing outside them', () => {
    const r = new SeededRandom(3);
    const seen = new Set<number>();
    for (let i = 0; i < 500; i++) seen.add(r.int(2, 4));
    expect([...seen].sort()).toEqual([2, 3, 4]);
  });

  it('int() with min === max always returns that value', () => {
    const r = new SeededRandom(9);
    expect(r.int(5, 5)).toBe(5);
  });

  it('int() rejects an inverted or fractional range', () => {
    const r = new SeededRandom(9);
    expect(() => r.int(4, 2)).toThrow(RangeError);
    expect(() => r.int(1.5, 3)).toThrow(RangeError);
  });

  it('shuffle() permutes in place and returns the same array', () => {
    const items = ['a', 'b', 'c', 'd', 'e', 'f'];
    const result = new SeededRandom(11).shuffle(items);
    expect(result).toBe(items);
    expect([...result].sort()).toEqual(['a', 'b', 'c', 'd', 'e', 'f']);
  });

  it('shuffle() is reproducible for a fixed seed', () => {
    const a = new SeededRandom(5).shuffle([1, 2, 3, 4, 5, 6, 7, 8]);
    const b = new SeededRandom(5).shuffle([1, 2, 3, 4, 5, 6, 7, 8]);
    expect(a).toEqual(b);
  });
});
