/**
 * packages/core/src/diff/sequence.ts — Sequence helpers for child-list planning.
 */

/**
 * Mark the members of one longest strictly increasing subsequence of `seq`.
 * Patience sorting with predecessor links: O(n log n).
 */
export function longestIncreasingSubsequence(seq: readonly number[]): boolean[] {
  const n = seq.length;
  const member = new Array<boolean>(n).fill(false);
  if (n === 0) return member;

  // tails[k] = index into seq of the smallest tail of an increasing run of length k+1
  const tails: number[] = [];
  const prev = new Array<number>(n).fill(-1);

  for (let i = 0; i < n; i++) {
    const value = seq[i] ?? 0;
    let lo = 0;
    let hi = tails.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      const tailValue = seq[tails[mid] ?? 0] ?? 0;
      if (tailValue < value) lo = mid + 1;
      else hi = mid;
    }
    if (lo > 0) prev[i] = tails[lo - 1] ?? -1;
    tails[lo] = i;
  }

  let cursor = tails[tails.length - 1] ?? -1;
  while (cursor !== -1) {
    member[cursor] = true;
    cursor = prev[cursor] ?? -1;
  }
  return member;
}

/**
 * Fenwick (binary indexed) tree over 0/1 occupancy, used to turn coordinates
 * into live child indices while a child list is rearranged.
 */
export class FenwickTree {
  private readonly tree: Int32Array;

  constructor(readonly size: number) {
    this.tree = new Int32Array(size + 1);
  }

  add(coord: number, delta: number): void {
    for (let i = coord + 1; i <= this.size; i += i & -i) {
      this.tree[i] = (this.tree[i] ?? 0) + delta;
    }
  }

  /** Sum of occupancy over coordinates strictly below `coord`. */
  countBelow(coord: number): number {
    let sum = 0;
    for (let i = coord; i > 0; i -= i & -i) sum += this.tree[i] ?? 0;
    return sum;
  }
}
