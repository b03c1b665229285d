import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import {
  advance,
  describePattern,
  initializeGenerator,
  isExhausted,
  preview,
  restoreState,
  serializeState,
  totalCombinations,
} from './generator';
import { ConfigError, StateMismatchError } from './errors';
import { GeneratorState } from './types';

const NUM_RUNS = Number(process.env.FC_NUM_RUNS ?? '100');

function enumerate(state: GeneratorState): { codes: string[]; state: GeneratorState } {
  const codes: string[] = [];
  let cursor = state;
  for (;;) {
    const step = advance(cursor);
    if (step.done) return { codes, state: step.state };
    codes.push(step.code);
    cursor = step.state;
  }
}

function advanceTimes(state: GeneratorState, n: number): GeneratorState {
  let cursor = state;
  for (let i = 0; i < n; i++) {
    const step = advance(cursor);
    if (step.done) break;
    cursor = step.state;
  }
  return cursor;
}

describe('initializeGenerator', () => {
  it('treats every digit and lowercase letter as mutable by default', () => {
    const state = initializeGenerator('X-1a');

    expect(state.positions).toEqual([
      { index: 2, charClass: 'digit' },
      { index: 3, charClass: 'lower' },
    ]);
    expect(state.current).toBe('X-1a');
    expect(state.produced).toBe(0n);
    expect(state.total).toBe(260n);
  });

  it('sorts and de-duplicates explicit positions', () => {
    const state = initializeGenerator('ab12', [3, 2, 3]);
    expect(state.positions.map(p => p.index)).toEqual([2, 3]);
    expect(state.total).toBe(100n);
  });

  it('rejects a base with nothing to vary', () => {
    expect(() => initializeGenerator('AB-CD')).toThrow(ConfigError);
  });

  it('rejects explicit positions that are out of range or fixed', () => {
    expect(() => initializeGenerator('ab12', [4])).toThrow(
      'position 4 is outside the base code (length 4)'
    );
    expect(() => initializeGenerator('Xb1', [0])).toThrow("position 0 holds 'X'");
  });
});

describe('advance', () => {
  it('turns the rightmost position fastest', () => {
    const step = advance(initializeGenerator('ab12'));
    expect(step.done).toBe(false);
    if (!step.done) {
      expect(step.code).toBe('ab13');
      expect(step.state.produced).toBe(1n);
    }
  });

  it('carries into the next position on wrap', () => {
    expect(preview(initializeGenerator('ab19'), 1)).toEqual(['ab20']);
    expect(preview(initializeGenerator('az99'), 1)).toEqual(['ba00']);
  });

  it('wraps to the first symbols when the carry passes the leftmost position', () => {
    expect(preview(initializeGenerator('zz99'), 2)).toEqual(['aa00', 'aa01']);
  });

  it('never mutates the state it is given', () => {
    const state = initializeGenerator('ab12');
    const copy = { ...state, positions: [...state.positions] };
    advance(state);
    expect(state).toEqual(copy);
  });

  it('visits the whole space once and ends with the base itself', () => {
    const { codes } = enumerate(initializeGenerator('ab12', [2, 3]));

    expect(codes).toHaveLength(100);
    expect(new Set(codes).size).toBe(100);
    expect(codes[0]).toBe('ab13');
    expect(codes[86]).toBe('ab99');
    expect(codes[87]).toBe('ab00');
    expect(codes[99]).toBe('ab12');
  });

  it('keeps fixed characters in place', () => {
    const { codes } = enumerate(initializeGenerator('X-1a'));
    expect(codes).toHaveLength(260);
    expect(codes.every(code => /^X-\d[a-z]$/.test(code))).toBe(true);
  });

  it('keeps returning exhausted once the space is used up', () => {
    const { state } = enumerate(initializeGenerator('ab12', [3]));

    expect(isExhausted(state)).toBe(true);
    const first = advance(state);
    const second = advance(first.state);
    expect(first).toEqual({ done: true, state });
    expect(second).toEqual({ done: true, state });
  });
});

describe('totalCombinations', () => {
  it('multiplies radices without losing precision', () => {
    const state = initializeGenerator('f00d'.repeat(8));
    expect(state.total).toBe(67600n ** 8n);
    expect(state.total > BigInt(Number.MAX_SAFE_INTEGER)).toBe(true);
    expect(totalCombinations([])).toBe(1n);
  });
});

describe('describePattern', () => {
  it('reports position counts and progress', () => {
    const state = advanceTimes(initializeGenerator('ab12'), 5);
    expect(describePattern(state)).toEqual({
      pattern: 'ab12',
      totalLength: 4,
      mutablePositions: 4,
      digitPositions: 2,
      letterPositions: 2,
      totalCombinations: 67600n,
      produced: 5n,
      remaining: 67595n,
    });
  });
});

describe('preview', () => {
  it('stops at the end of the enumeration', () => {
    expect(preview(initializeGenerator('ab12', [3]), 20)).toHaveLength(10);
  });
});

describe('serializeState / restoreState', () => {
  it('writes bigints as decimal strings', () => {
    const state = advanceTimes(initializeGenerator('ab12', [2, 3]), 7);
    const snapshot = serializeState(state, new Date('2026-01-02T03:04:05.000Z'));

    expect(snapshot).toEqual({
      version: 1,
      base: 'ab12',
      positions: [
        { index: 2, charClass: 'digit' },
        { index: 3, charClass: 'digit' },
      ],
      current: 'ab19',
      produced: '7',
      total: '100',
      updatedAt: '2026-01-02T03:04:05.000Z',
    });
  });

  it('restores an exhausted state', () => {
    const { state } = enumerate(initializeGenerator('ab12', [3]));
    const restored = restoreState(serializeState(state));
    expect(restored.produced).toBe(10n);
    expect(advance(restored).done).toBe(true);
  });

  it('rejects malformed snapshots', () => {
    expect(() => restoreState({ version: 2 })).toThrow(StateMismatchError);
    expect(() => restoreState('nonsense')).toThrow(StateMismatchError);
  });

  it('rejects snapshots whose code disagrees with the ordinal', () => {
    const snapshot = serializeState(advanceTimes(initializeGenerator('ab12', [2, 3]), 7));
    expect(() => restoreState({ ...snapshot, produced: '8' })).toThrow(
      "Saved code 'ab19' is not candidate #8 of base 'ab12'"
    );
  });

  it('rejects snapshots that changed a fixed position', () => {
    const snapshot = serializeState(initializeGenerator('ab12', [2, 3]));
    expect(() => restoreState({ ...snapshot, current: 'ac12' })).toThrow(
      "Saved code 'ac12' changed fixed position 1 of base 'ab12'"
    );
  });

  it('rejects snapshots with a wrong total', () => {
    const snapshot = serializeState(initializeGenerator('ab12', [2, 3]));
    expect(() => restoreState({ ...snapshot, total: '1000' })).toThrow(StateMismatchError);
  });
});

describe('enumeration properties', () => {
  const symbol = fc.constantFrom(...'0123456789abcdefghijklmnopqrstuvwxyz-XY');
  const smallBase = fc
    .array(symbol, { minLength: 1, maxLength: 4 })
    .map(chars => chars.join(''))
    .filter(base => /[0-9a-z]/.test(base));

  function smallState(base: string): GeneratorState {
    const state = initializeGenerator(base);
    fc.pre(state.total <= 2000n);
    return state;
  }

  it('produces exactly the product of radices, all distinct, ending at the base', () => {
    fc.assert(
      fc.property(smallBase, base => {
        const state = smallState(base);
        const { codes } = enumerate(state);

        expect(BigInt(codes.length)).toBe(state.total);
        expect(new Set(codes).size).toBe(codes.length);
        expect(codes[codes.length - 1]).toBe(base);
        for (const code of codes) {
          expect(code).toHaveLength(base.length);
        }
      }),
      { numRuns: NUM_RUNS }
    );
  });

  it('resumes from a snapshot exactly where an uninterrupted run would continue', () => {
    fc.assert(
      fc.property(smallBase, fc.double({ min: 0, max: 1, noNaN: true }), (base, fraction) => {
        const state = smallState(base);
        const all = enumerate(state).codes;
        const n = Math.floor(fraction * all.length);

        const snapshot = JSON.parse(JSON.stringify(serializeState(advanceTimes(state, n))));
        const resumed = enumerate(restoreState(snapshot)).codes;

        expect(resumed).toEqual(all.slice(n));
      }),
      { numRuns: NUM_RUNS }
    );
  });
});
