/**
 * packages/core/src/runtime/reconcile.ts — Component expansion and instance matching.
 *
 * Why: A render returns a view tree that may embed component nodes. Expansion
 * renders each embedded component and splices its host output in place,
 * producing the host subtree the diff engine compares. Along the way every
 * component node is matched against the instances of the previous render so
 * state survives re-renders.
 *
 * Matching rules:
 *   - Each component node gets a slot ID from its position in the owner's
 *     output: `k:<key>` for the first sibling with a key, `i:<index>` otherwise
 *   - A slot reuses the previous instance when the definition is the same
 *   - Previous instances whose slot disappeared (or changed definition) are
 *     collected for unmount
 *   - Reused children always re-render with the new props
 *
 * A render that throws is recorded as a failure; the instance keeps its
 * previous output (an empty fragment on first render) and its children.
 */

import type { Path } from "../diff/patch.js";
import { type LoomErrorCode, type LoomFailure, describeThrown, isLoomError } from "../errors.js";
import { fragment } from "../node/create.js";
import { nodeKey } from "../node/inspect.js";
import type { ComponentNode, Key, Node, ViewNode } from "../node/types.js";
import { type Store, componentSubscriber } from "../store/store.js";
import type { InstanceId } from "./instance.js";
import type { ComponentInstance, InstanceRegistry } from "./instances.js";
import { createRenderContext } from "./hooks.js";

/** Slot segment: keyed (`k:"a"`, `k:1`) or indexed (`i:0`). */
export type SlotSegment = `k:${string}` | `i:${number}`;

export type ReconcileEnv = Readonly<{
  store: Store;
  registry: InstanceRegistry;
  allocate: () => InstanceId;
}>;

/** A failure plus the parent it should be offered to. */
export type PendingFailure = Readonly<{
  failure: LoomFailure;
  parent: InstanceId | null;
}>;

/** Everything one top-level render produced, in the order it happened. */
export type RenderPass = {
  /** Instances rendered (or whose render was attempted), parent before child. */
  rendered: ComponentInstance[];
  /** Roots of subtrees that no longer appear; unmounted after apply. */
  removed: InstanceId[];
  /** Instances whose effects run after apply, child before parent. */
  effects: ComponentInstance[];
  failures: PendingFailure[];
};

export function createRenderPass(): RenderPass {
  return { rendered: [], removed: [], effects: [], failures: [] };
}

/** Compute the slot segment for a child: keyed if its key is first among siblings. */
export function slotSegment(key: Key | undefined, index: number, seen: Set<Key>): SlotSegment {
  if (key === undefined || seen.has(key)) return `i:${index}`;
  seen.add(key);
  return `k:${JSON.stringify(key)}`;
}

function joinSlot(parent: string, segment: SlotSegment): string {
  return parent.length === 0 ? segment : `${parent}/${segment}`;
}

/** A keyed component lends its key to an unkeyed output root. */
export function applyComponentKey(node: Node, key: Key | undefined): Node {
  if (key === undefined || node.kind === "text" || node.key !== undefined) return node;
  return Object.freeze({ ...node, key });
}

function failureCode(err: unknown): LoomErrorCode {
  if (isLoomError(err) && (err.code === "LOOM_HOOK_ORDER" || err.code === "LOOM_WRITE_AFTER_UNMOUNT")) {
    return err.code;
  }
  return "LOOM_RENDER_THROW";
}

export function renderFailure(
  instance: ComponentInstance,
  phase: LoomFailure["phase"],
  code: LoomErrorCode,
  err: unknown,
): PendingFailure {
  return {
    failure: Object.freeze({
      code,
      phase,
      instanceId: instance.id,
      component: instance.definition.name,
      detail: describeThrown(err),
      cause: err,
    }),
    parent: instance.parent,
  };
}

/**
 * Render `instance` and expand its output. Does not touch `instance.output`;
 * the caller decides how the result is committed.
 */
export function renderInstance(
  env: ReconcileEnv,
  pass: RenderPass,
  instance: ComponentInstance,
): Node {
  const { store, registry } = env;
  if (instance.lifecycle === "mounted") instance.lifecycle = "updating";
  pass.rendered.push(instance);

  const savedProvided = instance.provided;
  const savedHandler = instance.errorHandler;
  registry.beginRender(instance.id);

  let view: ViewNode;
  try {
    const ctx = createRenderContext(instance, env);
    view = store.track(componentSubscriber(instance.id), () => instance.node.invoke(ctx));
    registry.endRender(instance.id);
  } catch (err: unknown) {
    instance.provided = savedProvided;
    instance.errorHandler = savedHandler;
    instance.pendingEffects = [];
    instance.pendingCleanups = [];
    pass.failures.push(renderFailure(instance, "render", failureCode(err), err));
    return instance.output ?? applyComponentKey(fragment(), instance.node.key);
  }

  const prevChildren = instance.children;
  const nextChildren = new Map<string, InstanceId>();
  const expanded = expandNode(env, pass, instance, view, "", [], prevChildren, nextChildren);

  for (const [slot, childId] of prevChildren) {
    if (nextChildren.get(slot) !== childId) pass.removed.push(childId);
  }
  instance.children = nextChildren;
  pass.effects.push(instance);
  return applyComponentKey(expanded, instance.node.key);
}

function expandNode(
  env: ReconcileEnv,
  pass: RenderPass,
  owner: ComponentInstance,
  view: ViewNode,
  slot: string,
  path: Path,
  prev: ReadonlyMap<string, InstanceId>,
  next: Map<string, InstanceId>,
): Node {
  switch (view.kind) {
    case "text":
      return view;
    case "component":
      return expandComponent(env, pass, owner, view, slot, path, prev, next);
    case "fragment": {
      const children = expandChildren(env, pass, owner, view.children, slot, path, prev, next);
      const base = { kind: "fragment" as const, children };
      return Object.freeze(view.key === undefined ? base : { ...base, key: view.key });
    }
    case "element": {
      const children = expandChildren(env, pass, owner, view.children, slot, path, prev, next);
      const base = {
        kind: "element" as const,
        tag: view.tag,
        attributes: view.attributes,
        events: view.events,
        children,
      };
      return Object.freeze(view.key === undefined ? base : { ...base, key: view.key });
    }
  }
}

function expandChildren(
  env: ReconcileEnv,
  pass: RenderPass,
  owner: ComponentInstance,
  views: readonly ViewNode[],
  slot: string,
  path: Path,
  prev: ReadonlyMap<string, InstanceId>,
  next: Map<string, InstanceId>,
): readonly Node[] {
  const seen = new Set<Key>();
  const out: Node[] = [];
  for (let i = 0; i < views.length; i++) {
    const view = views[i];
    if (view === undefined) continue;
    const segment = slotSegment(nodeKey(view), i, seen);
    out.push(expandNode(env, pass, owner, view, joinSlot(slot, segment), [...path, i], prev, next));
  }
  return Object.freeze(out);
}

function expandComponent(
  env: ReconcileEnv,
  pass: RenderPass,
  owner: ComponentInstance,
  node: ComponentNode,
  slot: string,
  path: Path,
  prev: ReadonlyMap<string, InstanceId>,
  next: Map<string, InstanceId>,
): Node {
  const { registry } = env;
  const prevId = prev.get(slot);
  let child = prevId === undefined ? undefined : registry.get(prevId);
  if (child !== undefined && child.definition !== node.definition) child = undefined;

  if (child === undefined) {
    child = registry.create({
      id: env.allocate(),
      node,
      parent: owner.id,
      depth: owner.depth + 1,
      relativePath: Object.freeze(path.slice()),
    });
  } else {
    child.node = node;
    child.relativePath = Object.freeze(path.slice());
  }
  next.set(slot, child.id);

  const output = renderInstance(env, pass, child);
  child.output = output;
  return output;
}
