/**
 * packages/core/src/runtime/instances.ts — Component instance registry.
 *
 * Why: Holds per-instance state for components created with defineComponent:
 * hook slots, effects, provided context values, the error handler, the
 * retained host subtree and the position of the instance in its parent's
 * output. Tracks render order for hook call validation.
 *
 * Instance lifecycle:
 *   - Created `unmounted` when a component node first appears in a render
 *   - `mounted` once its first output has been committed
 *   - `updating` while it re-renders, then `mounted` again
 *   - `unmounted` when a parent render no longer matches it; effects are
 *     cleaned up in reverse declaration order
 */

import { LoomError, type LoomFailure } from "../errors.js";
import type { Path } from "../diff/patch.js";
import type { ComponentIdentity, ComponentNode, Node } from "../node/types.js";
import type { InstanceId } from "./instance.js";

export type Lifecycle = "unmounted" | "mounted" | "updating";

/** Effect cleanup function returned by effect callbacks. */
export type EffectCleanup = () => void;

/** Stored effect state for useEffect. */
export type EffectState = {
  deps: readonly unknown[] | undefined;
  cleanup: EffectCleanup | undefined;
  effect: () => undefined | EffectCleanup;
  /** True while this effect is waiting for the post-apply run. */
  pending: boolean;
};

export type RefState<T = unknown> = { current: T };

type UnknownCallback = (...args: never[]) => unknown;

/** Per-hook-index state storage. */
export type HookState =
  | { kind: "signal"; signal: unknown }
  | { kind: "derived"; signal: unknown; compute: RefState<() => unknown> }
  /** useState/useReducer: `dispatch` is stable, `reducer` is refreshed every render. */
  | { kind: "state"; signal: unknown; dispatch: unknown; reducer: RefState<unknown> }
  | { kind: "ref"; ref: RefState }
  | { kind: "effect"; effect: EffectState }
  | { kind: "memo"; deps: readonly unknown[] | undefined; value: unknown }
  | { kind: "callback"; deps: readonly unknown[] | undefined; callback: UnknownCallback };

/** Returns false to pass the failure on to the next boundary up. */
export type ErrorHandler = (failure: LoomFailure) => boolean | undefined;

export type ComponentInstance = {
  readonly id: InstanceId;
  readonly definition: ComponentIdentity;
  /** Parent instance, or null for the root instance. */
  readonly parent: InstanceId | null;
  readonly depth: number;
  /** Latest component node; its `invoke` carries the latest props. */
  node: ComponentNode;
  lifecycle: Lifecycle;
  /** Host-index path of this instance's output inside its parent's output. */
  relativePath: Path;
  /** Retained host subtree; null until the first render. */
  output: Node | null;
  /** Child instances by slot ID (`k:`/`i:` segments joined by `/`). */
  children: Map<string, InstanceId>;
  /** Set when applying this instance's patches failed; next render replaces it whole. */
  desynced: boolean;
  hooks: HookState[];
  hookIndex: number;
  /** Hook count of the previous successful render. */
  expectedHookCount: number | null;
  pendingEffects: EffectState[];
  pendingCleanups: EffectCleanup[];
  provided: Map<symbol, unknown>;
  errorHandler: ErrorHandler | null;
};

export type CreateInstanceInput = Readonly<{
  id: InstanceId;
  node: ComponentNode;
  parent: InstanceId | null;
  depth: number;
  relativePath: Path;
}>;

export type InstanceRegistry = Readonly<{
  get: (id: InstanceId) => ComponentInstance | undefined;
  /** Throws LOOM_INVALID_STATE when the ID is taken. */
  create: (input: CreateInstanceInput) => ComponentInstance;
  /** Remove the instance from the registry. Cleanups are run by the caller. */
  delete: (id: InstanceId) => boolean;
  /** Reset hook bookkeeping for a new render pass. */
  beginRender: (id: InstanceId) => void;
  /** Validate hook count after a render that completed. */
  endRender: (id: InstanceId) => void;
  /** Descendants of `id` in unmount order: deepest first, siblings by ID. */
  descendants: (id: InstanceId) => readonly ComponentInstance[];
  size: () => number;
  ids: () => readonly InstanceId[];
}>;

export function createInstanceRegistry(): InstanceRegistry {
  const instances = new Map<InstanceId, ComponentInstance>();

  function lookup(id: InstanceId): ComponentInstance {
    const instance = instances.get(id);
    if (!instance) {
      throw new LoomError("LOOM_INVALID_STATE", `instance ${String(id)} is not registered`);
    }
    return instance;
  }

  return Object.freeze({
    get: (id: InstanceId) => instances.get(id),

    create(input: CreateInstanceInput): ComponentInstance {
      if (instances.has(input.id)) {
        throw new LoomError("LOOM_INVALID_STATE", `instance ${String(input.id)} already exists`);
      }
      const instance: ComponentInstance = {
        id: input.id,
        definition: input.node.definition,
        parent: input.parent,
        depth: input.depth,
        node: input.node,
        lifecycle: "unmounted",
        relativePath: input.relativePath,
        output: null,
        children: new Map(),
        desynced: false,
        hooks: [],
        hookIndex: 0,
        expectedHookCount: null,
        pendingEffects: [],
        pendingCleanups: [],
        provided: new Map(),
        errorHandler: null,
      };
      instances.set(input.id, instance);
      return instance;
    },

    delete: (id: InstanceId) => instances.delete(id),

    beginRender(id: InstanceId): void {
      const instance = lookup(id);
      instance.hookIndex = 0;
      instance.pendingEffects = [];
      instance.pendingCleanups = [];
      instance.errorHandler = null;
      instance.provided = new Map();
    },

    endRender(id: InstanceId): void {
      const instance = lookup(id);
      const used = instance.hookIndex;
      if (instance.expectedHookCount === null) {
        instance.expectedHookCount = used;
      } else if (used !== instance.expectedHookCount) {
        throw new LoomError(
          "LOOM_HOOK_ORDER",
          `<${instance.definition.name}> (instance ${String(id)}) rendered ${String(used)} hooks, expected ${String(instance.expectedHookCount)}. Hint: hooks must not be called conditionally.`,
        );
      }
    },

    descendants(id: InstanceId): readonly ComponentInstance[] {
      const out: ComponentInstance[] = [];
      const visit = (parent: ComponentInstance): void => {
        const childIds = Array.from(parent.children.values()).sort((a, b) => a - b);
        for (const childId of childIds) {
          const child = instances.get(childId);
          if (!child) continue;
          visit(child);
          out.push(child);
        }
      };
      visit(lookup(id));
      return out;
    },

    size: () => instances.size,
    ids: () => Object.freeze(Array.from(instances.keys())),
  });
}

/** Absolute container-relative path of an instance's output. */
export function absolutePath(
  registry: InstanceRegistry,
  instance: ComponentInstance,
  rootPath: Path,
): Path {
  const segments: Path[] = [];
  let cursor: ComponentInstance | undefined = instance;
  while (cursor !== undefined) {
    segments.push(cursor.relativePath);
    cursor = cursor.parent === null ? undefined : registry.get(cursor.parent);
  }
  const out: number[] = [...rootPath];
  for (let i = segments.length - 1; i >= 0; i--) {
    const segment = segments[i];
    if (segment !== undefined) out.push(...segment);
  }
  return Object.freeze(out);
}

/** Compare dependency arrays. Missing deps never compare equal. */
export function depsEqual(
  prev: readonly unknown[] | undefined,
  next: readonly unknown[] | undefined,
): boolean {
  if (prev === undefined || next === undefined) return false;
  if (prev.length !== next.length) return false;
  for (let i = 0; i < prev.length; i++) {
    if (!Object.is(prev[i], next[i])) return false;
  }
  return true;
}
