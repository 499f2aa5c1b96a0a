import { VideoCatalog } from './catalog.js';
import { canRelax, findCandidates } from './candidates.js';
import { UsageLedger } from './ledger.js';

const catalog = VideoCatalog.fromVideos([
  { id: 'A', duration: 10, path: 'A.mp4' },
  { id: 'B', duration: 15, path: 'B.mp4' },
  { id: 'C', duration: 40, path: 'C.mp4' },
]);

const reuse = UsageLedger.policyFor(true, 10, 2);
const noReuse = UsageLedger.policyFor(false, 10, 2);
const window = { targetDurationMin: 20, targetDurationMax: 30 };
const ids = (videos: Array<{ id: string }>) => videos.map(v => v.id);

describe('findCandidates', () => {
  it('strict mode needs a video that alone lands in the remaining window', () => {
    const found = findCandidates(catalog, new UsageLedger(), reuse, { ...window, currentDuration: 0, mode: 'strict' });
    expect(found).toEqual([]);
  });

  it('relaxed mode drops the lower bound only', () => {
    const found = findCandidates(catalog, new UsageLedger(), reuse, { ...window, currentDuration: 0, mode: 'relaxed' });
    expect(ids(found)).toEqual(['A', 'B']);
  });

  it('strict mode narrows with the current duration', () => {
    const found = findCandidates(catalog, new UsageLedger(), reuse, { ...window, currentDuration: 10, mode: 'strict' });
    expect(ids(found)).toEqual(['A', 'B']);
  });

  it('never offers a video longer than the remaining maximum', () => {
    const found = findCandidates(catalog, new UsageLedger(), reuse, {
      targetDurationMin: 0,
      targetDurationMax: 39,
      currentDuration: 0,
      mode: 'relaxed',
    });
    expect(ids(found)).not.toContain('C');
  });

  it('applies the reuse policy', () => {
    const ledger = new UsageLedger();
    ledger.increment('A');
    const found = findCandidates(catalog, ledger, noReuse, { ...window, currentDuration: 0, mode: 'relaxed' });
    expect(ids(found)).toEqual(['B']);
  });
});

describe('canRelax', () => {
  it('holds only below half the minimum duration', () => {
    expect(canRelax(0, 20)).toBe(true);
    expect(canRelax(9.9, 20)).toBe(true);
    expect(canRelax(10, 20)).toBe(false);
    expect(canRelax(15, 20)).toBe(false);
  });
});
