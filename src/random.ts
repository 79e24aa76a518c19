import type { Random } from './types';

function assertRange(min: number, max: number): void {
  if (!Number.isInteger(min) || !Number.isInteger(max)) {
    throw new RangeError(`random range bounds must be integers, got [${min}, ${max}]`);
  }
  if (min > max) {
    throw new RangeError(`random range is empty: [${min}, ${max}]`);
  }
}

/** Builds a Random from any source of uniform floats in [0, 1). */
function fromUniform(next: () => number): Random {
  return {
    int(min: number, max: number): number {
      assertRange(min, max);
      return min + Math.floor(next() * (max - min + 1));
    },
  };
}

export const mathRandom: Random = fromUniform(Math.random);

/**
 * Deterministic Random for reproducible runs (mulberry32).
 * The same seed always replays the same sequence.
 * @param seed - Any integer; only the low 32 bits are used.
 */
export function seededRandom(seed: number): Random {
  let state = seed >>> 0;
  return fromUniform(() => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  });
}

/**
 * Picks one item uniformly at random.
 * Throws a RangeError on an empty list.
 */
export function pick<T>(random: Random, items: readonly T[]): T {
  if (items.length === 0) throw new RangeError('cannot pick from an empty list');
  return items[random.int(0, items.length - 1)];
}
