/**
 * packages/core/src/diff/diff.ts — Diff engine.
 *
 * Why: Computes the ordered patch list that turns one host tree into another.
 * The function is pure and total: structural mismatches degrade to a single
 * `replaceNode` instead of failing, and duplicate keys are resolved by policy
 * (first occurrence wins) and only reported.
 *
 * Equality is never used as a shortcut: a render always gets a full diff pass.
 */

import { describeNode } from "../node/inspect.js";
import type { Attributes, EventBindings, Node } from "../node/types.js";
import { matchChildren, planChildList } from "./children.js";
import { type Patch, type Path, ROOT_PATH, formatPath } from "./patch.js";

/** Non-fatal findings reported while diffing. */
export type DiffDiagnostic = Readonly<{
  code: "LOOM_DUPLICATE_KEY";
  path: Path;
  detail: string;
}>;

export type DiffOptions = Readonly<{
  /** Container-relative path of `prev`. Defaults to the mounted-root path `[0]`. */
  basePath?: Path;
  onDiagnostic?: (diagnostic: DiffDiagnostic) => void;
}>;

type DiffContext = Readonly<{
  out: Patch[];
  onDiagnostic: ((diagnostic: DiffDiagnostic) => void) | undefined;
}>;

export function diff(prev: Node, next: Node, opts: DiffOptions = {}): Patch[] {
  const ctx: DiffContext = { out: [], onDiagnostic: opts.onDiagnostic };
  diffNode(ctx, opts.basePath ?? ROOT_PATH, prev, next);
  return ctx.out;
}

function diffNode(ctx: DiffContext, path: Path, prev: Node, next: Node): void {
  if (prev === next) return;

  if (prev.kind === "text") {
    if (next.kind !== "text") {
      ctx.out.push({ kind: "replaceNode", path, node: next });
    } else if (prev.value !== next.value) {
      ctx.out.push({ kind: "updateText", path, value: next.value });
    }
    return;
  }

  if (prev.kind === "fragment") {
    if (next.kind !== "fragment") {
      ctx.out.push({ kind: "replaceNode", path, node: next });
      return;
    }
    diffChildren(ctx, path, prev.children, next.children);
    return;
  }

  if (next.kind !== "element" || next.tag !== prev.tag) {
    ctx.out.push({ kind: "replaceNode", path, node: next });
    return;
  }

  diffAttributes(ctx, path, prev.attributes, next.attributes);
  diffEvents(ctx, path, prev.events, next.events);
  diffChildren(ctx, path, prev.children, next.children);
}

function diffAttributes(ctx: DiffContext, path: Path, prev: Attributes, next: Attributes): void {
  if (prev === next) return;
  for (const name of Object.keys(next)) {
    const value = next[name];
    if (value === undefined) continue;
    if (!Object.hasOwn(prev, name) || prev[name] !== value) {
      ctx.out.push({ kind: "setAttribute", path, name, value });
    }
  }
  for (const name of Object.keys(prev)) {
    if (!Object.hasOwn(next, name)) ctx.out.push({ kind: "removeAttribute", path, name });
  }
}

function diffEvents(ctx: DiffContext, path: Path, prev: EventBindings, next: EventBindings): void {
  if (prev === next) return;
  for (const name of Object.keys(next)) {
    const handler = next[name];
    if (handler === undefined) continue;
    if (prev[name] !== handler) {
      ctx.out.push({ kind: "updateEventBinding", path, name, handler });
    }
  }
  for (const name of Object.keys(prev)) {
    if (!Object.hasOwn(next, name)) {
      ctx.out.push({ kind: "updateEventBinding", path, name, handler: null });
    }
  }
}

function diffChildren(
  ctx: DiffContext,
  path: Path,
  prev: readonly Node[],
  next: readonly Node[],
): void {
  if (prev === next) return;
  if (prev.length === 0 && next.length === 0) return;

  const match = matchChildren(prev, next);
  if (match.duplicates.length > 0 && ctx.onDiagnostic !== undefined) {
    for (const dup of match.duplicates) {
      const list = dup.side === "old" ? prev : next;
      const child = list[dup.duplicateIndex];
      ctx.onDiagnostic({
        code: "LOOM_DUPLICATE_KEY",
        path,
        detail: `Duplicate key "${String(dup.key)}" among ${dup.side} children of ${formatPath(path)} (child indices ${String(dup.firstIndex)} and ${String(dup.duplicateIndex)}${child === undefined ? "" : `, ${describeNode(child)}`}); the later child is matched by position.`,
      });
    }
  }

  planChildList(path, next, match, ctx.out);

  for (let j = 0; j < next.length; j++) {
    const i = match.newToOld[j] ?? -1;
    if (i === -1) continue;
    const prevChild = prev[i];
    const nextChild = next[j];
    if (prevChild === undefined || nextChild === undefined) continue;
    diffNode(ctx, [...path, j], prevChild, nextChild);
  }
}
