import { SeededRandom } from '../utils/random.js';
import { UsageLedger } from './ledger.js';
import { orderCandidates, pickCandidate, type SelectionContext } from './strategy.js';
import type { SourceVideo } from './types.js';

const video = (id: string, duration: number): SourceVideo => ({ id, duration, path: `${id}.mp4` });

function context(overrides: Partial<SelectionContext> = {}): SelectionContext {
  return {
    mode: 'balanced',
    ledger: new UsageLedger(),
    random: new SeededRandom(1),
    currentDuration: 0,
    targetDurationMax: 30,
    ...overrides,
  };
}

describe('orderCandidates', () => {
  it('balanced mode sorts by usage and keeps catalog order on ties', () => {
    const ledger = new UsageLedger();
    ledger.increment('a');
    ledger.increment('a');
    ledger.increment('c');
    const eligible = [video('a', 5), video('b', 5), video('c', 5), video('d', 5)];
    const ordered = orderCandidates(eligible, 'balanced', ledger, new SeededRandom(1));
    expect(ordered.map(v => v.id)).toEqual(['b', 'd', 'c', 'a']);
  });

  it('random mode returns a permutation without touching the input', () => {
    const eligible = [video('a', 5), video('b', 5), video('c', 5)];
    const ordered = orderCandidates(eligible, 'random', new UsageLedger(), new SeededRandom(3));
    expect(ordered.map(v => v.id).sort()).toEqual(['a', 'b', 'c']);
    expect(eligible.map(v => v.id)).toEqual(['a', 'b', 'c']);
  });
});

describe('pickCandidate', () => {
  it('takes the first ordered candidate when it fits', () => {
    expect(pickCandidate([video('a', 10), video('b', 5)], context())?.id).toBe('a');
  });

  it('falls back to the first candidate that fits under the maximum', () => {
    const chosen = pickCandidate([video('big', 25), video('small', 5)], context({ currentDuration: 10 }));
    expect(chosen?.id).toBe('small');
  });

  it('returns null when nothing fits', () => {
    expect(pickCandidate([video('big', 25)], context({ currentDuration: 10 }))).toBeNull();
  });

  it('returns null for no candidates', () => {
    expect(pickCandidate([], context())).toBeNull();
  });
});
