/**
 * packages/core/src/diff/patch.ts — Patch representation.
 *
 * A patch list is ordered. Every `path` is a list of child indices starting at
 * the container; the mounted root sits at `[0]`. Indices are only valid
 * against the state produced by all preceding patches in the same list:
 *
 *   - a parent's own patches precede its descendants' patches
 *   - child-list removals run in descending index order
 *   - moves and insertions run in ascending final index order
 *   - descendants are visited in ascending final index order
 */

import type { EventHandler, Node } from "../node/types.js";

export type Path = readonly number[];

/** The container-relative path of a mounted root. */
export const ROOT_PATH: Path = Object.freeze([0]);

export type Patch =
  | Readonly<{ kind: "replaceNode"; path: Path; node: Node }>
  | Readonly<{ kind: "updateText"; path: Path; value: string }>
  | Readonly<{ kind: "setAttribute"; path: Path; name: string; value: string }>
  | Readonly<{ kind: "removeAttribute"; path: Path; name: string }>
  | Readonly<{ kind: "insertChildAt"; path: Path; index: number; node: Node }>
  | Readonly<{ kind: "removeChildAt"; path: Path; index: number }>
  /** Remove the child at `from`, then insert it at `to` in the shortened list. */
  | Readonly<{ kind: "moveChild"; path: Path; from: number; to: number }>
  /** `handler === null` unbinds the event. */
  | Readonly<{ kind: "updateEventBinding"; path: Path; name: string; handler: EventHandler | null }>;

export type PatchKind = Patch["kind"];

export type PatchSummary = Readonly<Record<PatchKind, number>>;

export function summarizePatches(patches: readonly Patch[]): PatchSummary {
  const counts: Record<PatchKind, number> = {
    replaceNode: 0,
    updateText: 0,
    setAttribute: 0,
    removeAttribute: 0,
    insertChildAt: 0,
    removeChildAt: 0,
    moveChild: 0,
    updateEventBinding: 0,
  };
  for (const patch of patches) counts[patch.kind]++;
  return Object.freeze(counts);
}

export function formatPath(path: Path): string {
  return path.length === 0 ? "/" : `/${path.join("/")}`;
}

/** One-line description used in warnings and failure details. */
export function formatPatch(patch: Patch): string {
  const at = formatPath(patch.path);
  switch (patch.kind) {
    case "replaceNode":
      return `replaceNode ${at} (${patch.node.kind})`;
    case "updateText":
      return `updateText ${at} ${JSON.stringify(patch.value)}`;
    case "setAttribute":
      return `setAttribute ${at} ${patch.name}=${JSON.stringify(patch.value)}`;
    case "removeAttribute":
      return `removeAttribute ${at} ${patch.name}`;
    case "insertChildAt":
      return `insertChildAt ${at} @${String(patch.index)} (${patch.node.kind})`;
    case "removeChildAt":
      return `removeChildAt ${at} @${String(patch.index)}`;
    case "moveChild":
      return `moveChild ${at} ${String(patch.from)}->${String(patch.to)}`;
    case "updateEventBinding":
      return `updateEventBinding ${at} ${patch.name}${patch.handler === null ? " (unbind)" : ""}`;
  }
}
