/**
 * Candidate code generator - a mixed-radix odometer over the mutable
 * positions of a base code.
 *
 * Enumeration is cyclic: it starts at the base's successor, wraps from the
 * last symbols back to the first, and ends with the base itself. Every
 * combination is produced exactly once.
 */

import { z } from 'zod';
import { ConfigError, StateMismatchError } from './errors';
import {
  AdvanceResult,
  CharClass,
  GeneratorSnapshot,
  GeneratorState,
  MutablePosition,
  PatternInfo,
} from './types';

const ALPHABETS: Record<CharClass, string> = {
  digit: '0123456789',
  lower: 'abcdefghijklmnopqrstuvwxyz',
};

export function charClassOf(char: string): CharClass | null {
  if (char >= '0' && char <= '9') return 'digit';
  if (char >= 'a' && char <= 'z') return 'lower';
  return null;
}

export function radixOf(charClass: CharClass): number {
  return ALPHABETS[charClass].length;
}

export function totalCombinations(positions: readonly MutablePosition[]): bigint {
  return positions.reduce((total, pos) => total * BigInt(radixOf(pos.charClass)), 1n);
}

/**
 * Partition a base code into fixed and mutable positions.
 * Without an explicit list, every digit and lowercase letter is mutable.
 */
export function initializeGenerator(base: string, indices?: readonly number[]): GeneratorState {
  const positions: MutablePosition[] = [];
  const issues: string[] = [];

  const candidates = indices
    ? Array.from(new Set(indices)).sort((a, b) => a - b)
    : Array.from(base, (_, i) => i);

  for (const index of candidates) {
    if (!Number.isInteger(index) || index < 0 || index >= base.length) {
      issues.push(`position ${index} is outside the base code (length ${base.length})`);
      continue;
    }
    const charClass = charClassOf(base[index]);
    if (charClass) {
      positions.push({ index, charClass });
    } else if (indices) {
      issues.push(`position ${index} holds '${base[index]}', which is not a digit or lowercase letter`);
    }
  }

  if (issues.length > 0) {
    throw new ConfigError('Invalid mutable positions', issues);
  }
  if (positions.length === 0) {
    throw new ConfigError('Base code must contain at least one digit (0-9) or lowercase letter (a-z)');
  }

  return {
    base,
    positions,
    current: base,
    produced: 0n,
    total: totalCombinations(positions),
  };
}

/**
 * Step the odometer once. Pure: the given state is never mutated.
 */
export function advance(state: GeneratorState): AdvanceResult {
  if (state.produced >= state.total) {
    return { done: true, state };
  }

  const chars = Array.from(state.current);

  // Rightmost position turns fastest; a carry out of the leftmost one wraps
  for (let p = state.positions.length - 1; p >= 0; p--) {
    const { index, charClass } = state.positions[p];
    const alphabet = ALPHABETS[charClass];
    const next = alphabet.indexOf(chars[index]) + 1;

    if (next < alphabet.length) {
      chars[index] = alphabet[next];
      break;
    }
    chars[index] = alphabet[0];
  }

  const code = chars.join('');
  return {
    done: false,
    code,
    state: { ...state, current: code, produced: state.produced + 1n },
  };
}

export function remaining(state: GeneratorState): bigint {
  return state.total - state.produced;
}

export function isExhausted(state: GeneratorState): boolean {
  return state.produced >= state.total;
}

/**
 * Peek at the next `count` candidates without touching the given state
 */
export function preview(state: GeneratorState, count: number): string[] {
  const codes: string[] = [];
  let cursor = state;
  while (codes.length < count) {
    const step = advance(cursor);
    if (step.done) break;
    codes.push(step.code);
    cursor = step.state;
  }
  return codes;
}

export function describePattern(state: GeneratorState): PatternInfo {
  const digitPositions = state.positions.filter(p => p.charClass === 'digit').length;
  return {
    pattern: state.base,
    totalLength: state.base.length,
    mutablePositions: state.positions.length,
    digitPositions,
    letterPositions: state.positions.length - digitPositions,
    totalCombinations: state.total,
    produced: state.produced,
    remaining: remaining(state),
  };
}

export function serializeState(state: GeneratorState, now: Date = new Date()): GeneratorSnapshot {
  return {
    version: 1,
    base: state.base,
    positions: state.positions.map(p => ({ ...p })),
    current: state.current,
    produced: state.produced.toString(),
    total: state.total.toString(),
    updatedAt: now.toISOString(),
  };
}

const decimal = z.string().regex(/^\d+$/, 'must be a non-negative decimal integer');

export const snapshotSchema = z.object({
  version: z.literal(1),
  base: z.string().min(1),
  positions: z
    .array(
      z.object({
        index: z.number().int().nonnegative(),
        charClass: z.enum(['digit', 'lower']),
      })
    )
    .min(1),
  current: z.string(),
  produced: decimal,
  total: decimal,
  updatedAt: z.string(),
});

/**
 * Rebuild a generator state from a snapshot, checking it is internally consistent
 */
export function restoreState(input: unknown): GeneratorState {
  const parsed = snapshotSchema.safeParse(input);
  if (!parsed.success) {
    throw new StateMismatchError(
      `Saved state is malformed: ${parsed.error.issues.map(i => `${i.path.join('.') || '(root)'} ${i.message}`).join('; ')}`
    );
  }
  const snapshot = parsed.data;
  const { base, current, positions } = snapshot;

  if (current.length !== base.length) {
    throw new StateMismatchError(`Saved code '${current}' does not match the length of base '${base}'`);
  }

  let previous = -1;
  const mutable = new Set<number>();
  for (const { index, charClass } of positions) {
    if (index <= previous || index >= base.length) {
      throw new StateMismatchError(`Saved positions must be ascending indices inside the base code`);
    }
    previous = index;
    mutable.add(index);
    if (charClassOf(base[index]) !== charClass || charClassOf(current[index]) !== charClass) {
      throw new StateMismatchError(`Saved position ${index} does not hold a ${charClass} character`);
    }
  }
  for (let i = 0; i < base.length; i++) {
    if (!mutable.has(i) && base[i] !== current[i]) {
      throw new StateMismatchError(`Saved code '${current}' changed fixed position ${i} of base '${base}'`);
    }
  }

  const total = totalCombinations(positions);
  const produced = BigInt(snapshot.produced);
  if (BigInt(snapshot.total) !== total) {
    throw new StateMismatchError(`Saved total ${snapshot.total} does not match the positions (expected ${total})`);
  }
  if (produced > total) {
    throw new StateMismatchError(`Saved ordinal ${produced} is past the end of the enumeration (${total})`);
  }
  // The last candidate is the base itself, so compare modulo the cycle length
  if (ordinalOf(base, current, positions, total) !== produced % total) {
    throw new StateMismatchError(`Saved code '${current}' is not candidate #${produced} of base '${base}'`);
  }

  return {
    base,
    positions: positions.map(p => ({ ...p })),
    current,
    produced,
    total,
  };
}

/**
 * Mixed-radix value of the mutable positions of `code`
 */
function counterValue(code: string, positions: readonly MutablePosition[]): bigint {
  return positions.reduce(
    (value, { index, charClass }) =>
      value * BigInt(radixOf(charClass)) + BigInt(ALPHABETS[charClass].indexOf(code[index])),
    0n
  );
}

/**
 * Number of advances that lead from `base` to `current`, in the cyclic order
 */
function ordinalOf(
  base: string,
  current: string,
  positions: readonly MutablePosition[],
  total: bigint
): bigint {
  return (counterValue(current, positions) - counterValue(base, positions) + total) % total;
}
