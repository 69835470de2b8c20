/**
 * packages/testkit/src/rng.ts — Seeded PRNG for property tests.
 *
 * mulberry32: 32-bit state, full period, identical sequence on every platform
 * for the same seed. Not for anything but tests.
 */

export type Rng = Readonly<{
  /** Float in [0, 1). */
  next: () => number;
  /** Integer in [min, max], both inclusive. */
  int: (min: number, max: number) => number;
  bool: (probability?: number) => boolean;
  pick: <T>(items: readonly T[]) => T;
  /** Fisher-Yates shuffle into a new array. */
  shuffle: <T>(items: readonly T[]) => T[];
}>;

export function createRng(seed: number): Rng {
  let state = seed >>> 0;

  function next(): number {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  function int(min: number, max: number): number {
    if (!Number.isInteger(min) || !Number.isInteger(max) || max < min) {
      throw new RangeError(`createRng.int: invalid range [${String(min)}, ${String(max)}]`);
    }
    return min + Math.floor(next() * (max - min + 1));
  }

  return Object.freeze({
    next,
    int,
    bool: (probability = 0.5) => next() < probability,
    pick<T>(items: readonly T[]): T {
      const item = items[int(0, items.length - 1)];
      if (item === undefined) throw new RangeError("createRng.pick: empty list");
      return item;
    },
    shuffle<T>(items: readonly T[]): T[] {
      const out = items.slice();
      for (let i = out.length - 1; i > 0; i--) {
        const j = int(0, i);
        const a = out[i];
        const b = out[j];
        if (a === undefined || b === undefined) continue;
        out[i] = b;
        out[j] = a;
      }
      return out;
    },
  });
}
