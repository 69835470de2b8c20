/**
 * packages/core/src/diff/children.ts — Sibling matching and child-list planning.
 *
 * Why: Keyed children must survive reordering as moves, not as a
 * remove/insert pair, and the plan has to stay near-linear for long lists.
 *
 * Matching rules:
 *   - Keyed children match by key, regardless of position
 *   - Unkeyed children match the unkeyed old child at the same index
 *   - A repeated key is honoured only on its first occurrence; later
 *     occurrences are treated as unkeyed (positional)
 *
 * Planning:
 *   - Unmatched old children are removed, highest index first
 *   - Survivors on a longest increasing subsequence (by new index) stay put
 *   - Every other survivor moves once; unmatched new children are inserted
 *   - Moves and inserts run in ascending final index; a Fenwick tree maps
 *     precomputed coordinates to live indices, so the pass is O(n log n)
 */

import { nodeKey } from "../node/inspect.js";
import type { Key, Node, ViewNode } from "../node/types.js";
import type { Patch, Path } from "./patch.js";
import { FenwickTree, longestIncreasingSubsequence } from "./sequence.js";

export type DuplicateKeyReport = Readonly<{
  key: Key;
  side: "old" | "new";
  firstIndex: number;
  duplicateIndex: number;
}>;

/** Result of matching one sibling list. `-1` marks an unmatched slot. */
export type ChildMatch = Readonly<{
  newToOld: Int32Array;
  oldToNew: Int32Array;
  duplicates: readonly DuplicateKeyReport[];
}>;

type KeyIndex = Readonly<{
  /** key -> index of its first occurrence */
  byKey: Map<Key, number>;
  /** true when the child participates in keyed matching */
  keyed: boolean[];
}>;

function indexKeys(
  children: readonly ViewNode[],
  side: "old" | "new",
  duplicates: DuplicateKeyReport[],
): KeyIndex {
  const byKey = new Map<Key, number>();
  const keyed = new Array<boolean>(children.length).fill(false);
  for (let i = 0; i < children.length; i++) {
    const child = children[i];
    if (child === undefined) continue;
    const key = nodeKey(child);
    if (key === undefined) continue;
    const first = byKey.get(key);
    if (first !== undefined) {
      duplicates.push({ key, side, firstIndex: first, duplicateIndex: i });
      continue;
    }
    byKey.set(key, i);
    keyed[i] = true;
  }
  return { byKey, keyed };
}

/** Match two sibling lists. Component children match by key or position, like host nodes. */
export function matchChildren(prev: readonly ViewNode[], next: readonly ViewNode[]): ChildMatch {
  const duplicates: DuplicateKeyReport[] = [];
  const oldIndex = indexKeys(prev, "old", duplicates);
  const newIndex = indexKeys(next, "new", duplicates);

  const newToOld = new Int32Array(next.length).fill(-1);
  const oldToNew = new Int32Array(prev.length).fill(-1);

  for (let j = 0; j < next.length; j++) {
    const child = next[j];
    if (child === undefined) continue;

    if (newIndex.keyed[j] === true) {
      const key = nodeKey(child);
      const i = key === undefined ? undefined : oldIndex.byKey.get(key);
      if (i !== undefined) {
        newToOld[j] = i;
        oldToNew[i] = j;
      }
      continue;
    }

    if (j < prev.length && oldIndex.keyed[j] === false && oldToNew[j] === -1) {
      newToOld[j] = j;
      oldToNew[j] = j;
    }
  }

  return { newToOld, oldToNew, duplicates };
}

/** Emit the structural patches (remove, move, insert) for one child list. */
export function planChildList(
  path: Path,
  next: readonly Node[],
  match: ChildMatch,
  out: Patch[],
): void {
  const { newToOld, oldToNew } = match;

  for (let i = oldToNew.length - 1; i >= 0; i--) {
    if (oldToNew[i] === -1) out.push({ kind: "removeChildAt", path, index: i });
  }

  // Survivors in old order; seq[r] is the final index of survivor r.
  const seq: number[] = [];
  const rankOfNew = new Int32Array(next.length).fill(-1);
  for (let i = 0; i < oldToNew.length; i++) {
    const j = oldToNew[i] ?? -1;
    if (j === -1) continue;
    rankOfNew[j] = seq.length;
    seq.push(j);
  }

  const stays = longestIncreasingSubsequence(seq);
  const placedCount = next.length - countTrue(stays);
  if (placedCount === 0) return;

  // Every placed child lands in the block right after its nearest preceding
  // stationary survivor (or in the leading block). Size the blocks first.
  const blockSize = new Int32Array(seq.length + 1);
  let anchor = -1;
  for (let j = 0; j < next.length; j++) {
    const r = rankOfNew[j] ?? -1;
    if (r !== -1 && stays[r] === true) {
      anchor = r;
      continue;
    }
    blockSize[anchor + 1] = (blockSize[anchor + 1] ?? 0) + 1;
  }

  // Coordinates: [lead block] then, per survivor, its slot and (if stationary) its block.
  const itemCoord = new Int32Array(seq.length);
  const blockStart = new Int32Array(seq.length + 1);
  let cursor = blockSize[0] ?? 0;
  for (let r = 0; r < seq.length; r++) {
    itemCoord[r] = cursor++;
    blockStart[r + 1] = cursor;
    if (stays[r] === true) cursor += blockSize[r + 1] ?? 0;
  }

  const live = new FenwickTree(cursor);
  for (let r = 0; r < seq.length; r++) live.add(itemCoord[r] ?? 0, 1);

  const blockFill = new Int32Array(seq.length + 1);
  anchor = -1;
  for (let j = 0; j < next.length; j++) {
    const r = rankOfNew[j] ?? -1;
    if (r !== -1 && stays[r] === true) {
      anchor = r;
      continue;
    }

    const block = anchor + 1;
    const offset = blockFill[block] ?? 0;
    blockFill[block] = offset + 1;
    const target = (blockStart[block] ?? 0) + offset;

    if ((newToOld[j] ?? -1) === -1) {
      const node = next[j];
      if (node !== undefined) {
        out.push({ kind: "insertChildAt", path, index: live.countBelow(target), node });
      }
      live.add(target, 1);
      continue;
    }

    const source = itemCoord[r] ?? 0;
    const from = live.countBelow(source);
    live.add(source, -1);
    const to = live.countBelow(target);
    live.add(target, 1);
    if (from !== to) out.push({ kind: "moveChild", path, from, to });
  }
}

function countTrue(flags: readonly boolean[]): number {
  let n = 0;
  for (const flag of flags) if (flag) n++;
  return n;
}
