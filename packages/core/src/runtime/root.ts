/**
 * packages/core/src/runtime/root.ts — Root: store, scheduler, instances and surface wiring.
 *
 * Why: A root owns everything one mounted view needs. `render(view)` stores
 * the view in a Signal read by the root instance, so the first mount and
 * every later update take the same path: a write marks instances dirty, the
 * scheduler batches them, and `flush()` renders each dirty instance once,
 * parent before child, diffs its new subtree against the retained one and
 * applies the patches to the surface.
 *
 * Failure handling:
 *   - Render, apply and effect failures never stop the pass
 *   - After the pass each failure is offered to the nearest ancestor with an
 *     error handler; the rest are thrown together as LOOM_FLUSH_FAILED
 *   - An instance whose patches failed is desynced: its next render, the
 *     next render of any ancestor, or a render of any descendant replaces
 *     its whole subtree
 */

import { diff } from "../diff/diff.js";
import { type Patch, ROOT_PATH } from "../diff/patch.js";
import { LoomError, type LoomFailure, LoomFlushError, describeThrown } from "../errors.js";
import { fragment } from "../node/create.js";
import { replaceNodeAt } from "../node/inspect.js";
import type { Node, ViewNode } from "../node/types.js";
import { type SchedulerState, TurnScheduler } from "../scheduler/turnScheduler.js";
import { type Signal, type Store, createStore } from "../store/store.js";
import { type HostTree, createHostTree } from "../surface/hostTree.js";
import { component, defineComponent } from "./component.js";
import { type RootConfig, resolveRootConfig } from "./config.js";
import { runAllCleanups, runPendingCleanups, runPendingEffects } from "./hooks.js";
import { type InstanceId, createInstanceIdAllocator } from "./instance.js";
import {
  type ComponentInstance,
  type InstanceRegistry,
  type Lifecycle,
  absolutePath,
  createInstanceRegistry,
} from "./instances.js";
import {
  type PendingFailure,
  type ReconcileEnv,
  type RenderPass,
  createRenderPass,
  renderFailure,
  renderInstance,
} from "./reconcile.js";

export type RootState = SchedulerState | "unmounted";

/** What one `flush()` did. */
export type FlushResult = Readonly<{
  /** Instances rendered, in render order. */
  rendered: readonly InstanceId[];
  /** Patches applied (or attempted), in application order. */
  patches: readonly Patch[];
  /** Failures taken by an error handler. */
  handled: readonly LoomFailure[];
}>;

export type InstanceSnapshot = Readonly<{
  id: InstanceId;
  name: string;
  parent: InstanceId | null;
  depth: number;
  path: readonly number[];
  lifecycle: Lifecycle;
  desynced: boolean;
}>;

export type RootSnapshot = Readonly<{
  state: RootState;
  /** Retained host tree, as last committed. */
  tree: Node | null;
  instances: readonly InstanceSnapshot[];
  /** Live Signals in the root's store. */
  signals: number;
}>;

export type Root = Readonly<{
  /** Store for application Signals; components read them with `ctx.read`. */
  store: Store;
  /** Set the root view. Takes effect on the next flush. */
  render: (view: ViewNode) => void;
  flush: () => FlushResult;
  unmount: () => void;
  readonly state: RootState;
  inspect: () => RootSnapshot;
}>;

type RootProps = Readonly<{ view: Signal<ViewNode> }>;

const RootView = defineComponent<RootProps>({
  name: "Root",
  render: (props, ctx) => ctx.read(props.view),
});

const EMPTY_FLUSH: FlushResult = Object.freeze({
  rendered: Object.freeze([]),
  patches: Object.freeze([]),
  handled: Object.freeze([]),
});

export function createRoot<H>(config: RootConfig<H>): Root {
  const cfg = resolveRootConfig(config);
  const host: HostTree<H> = createHostTree(cfg.surface, cfg.container);
  const registry: InstanceRegistry = createInstanceRegistry();
  const ids = createInstanceIdAllocator();
  const warned = new Set<string>();

  const scheduler = new TurnScheduler({
    ...(cfg.scheduleFlush === undefined ? {} : { scheduleFlush: cfg.scheduleFlush }),
    compare: (a, b) => {
      const da = registry.get(a)?.depth ?? Number.MAX_SAFE_INTEGER;
      const db = registry.get(b)?.depth ?? Number.MAX_SAFE_INTEGER;
      return da !== db ? da - db : a - b;
    },
  });

  const store = createStore({
    onDirty: (id) => {
      if (registry.get(id) !== undefined) scheduler.markDirty(id);
    },
  });

  const env: ReconcileEnv = { store, registry, allocate: ids.allocate };
  const view = store.signal<ViewNode>("root.view", fragment());
  let rootInstance: ComponentInstance | null = null;
  let unmounted = false;

  function warnOnce(area: string, message: string): void {
    if (!cfg.devMode) return;
    const line = `[loom][${area}] ${message}`;
    if (warned.has(line)) return;
    warned.add(line);
    cfg.warn(line);
  }

  function reportCleanupError(instance: ComponentInstance): (err: unknown) => void {
    return (err) => {
      cfg.warn(
        `[loom][effects] cleanup of <${instance.definition.name}> (instance ${String(instance.id)}) threw: ${describeThrown(err)}`,
      );
    };
  }

  function assertLive(op: string): void {
    if (unmounted) {
      throw new LoomError("LOOM_INVALID_STATE", `${op}: root is unmounted`);
    }
  }

  function unmountInstance(instance: ComponentInstance): void {
    for (const item of [...registry.descendants(instance.id), instance]) {
      runAllCleanups(item, reportCleanupError(item));
      store.release(item.id);
      scheduler.cancel(item.id);
      item.lifecycle = "unmounted";
      registry.delete(item.id);
    }
  }

  function subtreeDesynced(instance: ComponentInstance): boolean {
    if (instance.desynced) return true;
    return registry.descendants(instance.id).some((d) => d.desynced);
  }

  function markSynced(instance: ComponentInstance): void {
    instance.desynced = false;
    for (const d of registry.descendants(instance.id)) d.desynced = false;
  }

  /** Carry a committed subtree up into every ancestor's retained output. */
  function propagateOutput(instance: ComponentInstance, output: Node): void {
    instance.output = output;
    let child = instance;
    let sub = output;
    while (child.parent !== null) {
      const parent = registry.get(child.parent);
      if (parent === undefined || parent.output === null) return;
      parent.output = replaceNodeAt(parent.output, child.relativePath, sub);
      sub = parent.output;
      child = parent;
    }
  }

  function planPatches(instance: ComponentInstance, prev: Node | null, next: Node, desynced: boolean): Patch[] {
    if (instance.parent === null && host.root() === undefined) {
      return [{ kind: "insertChildAt", path: [], index: 0, node: next }];
    }
    const path = absolutePath(registry, instance, ROOT_PATH);
    if (prev === null || desynced) return [{ kind: "replaceNode", path, node: next }];
    return diff(prev, next, {
      basePath: path,
      onDiagnostic: (d) => warnOnce("diff", `${d.code}: ${d.detail}`),
    });
  }

  function runEffects(pass: RenderPass): void {
    for (const instance of pass.effects) {
      if (registry.get(instance.id) !== instance) continue;
      const cleanups = instance.pendingCleanups;
      const effects = instance.pendingEffects;
      instance.pendingCleanups = [];
      instance.pendingEffects = [];
      runPendingCleanups(cleanups, reportCleanupError(instance));
      try {
        runPendingEffects(effects);
      } catch (err: unknown) {
        pass.failures.push(renderFailure(instance, "effect", "LOOM_RENDER_THROW", err));
      }
    }
  }

  /** Highest ancestor left desynced by an earlier flush, if any. */
  function desyncedAncestor(instance: ComponentInstance): ComponentInstance | undefined {
    let found: ComponentInstance | undefined;
    let cursor = instance.parent === null ? undefined : registry.get(instance.parent);
    while (cursor !== undefined) {
      if (cursor.desynced) found = cursor;
      cursor = cursor.parent === null ? undefined : registry.get(cursor.parent);
    }
    return found;
  }

  /** Apply `planned` on behalf of `instance`. Returns false after recording a failure. */
  function applyFor(
    instance: ComponentInstance,
    planned: readonly Patch[],
    patches: Patch[],
    failures: PendingFailure[],
  ): boolean {
    patches.push(...planned);
    const result = host.apply(planned);
    if (result.ok) {
      markSynced(instance);
      return true;
    }
    instance.desynced = true;
    const failure = result.failure;
    failures.push({
      failure: Object.freeze({
        code: failure.code,
        phase: "apply",
        instanceId: instance.id,
        component: instance.definition.name,
        detail: failure.detail,
        ...(failure.cause === undefined ? {} : { cause: failure.cause }),
      }),
      parent: instance.parent,
    });
    return false;
  }

  /**
   * A desynced ancestor's surface nodes no longer match its retained output,
   * so paths below it cannot be trusted. Replace its subtree with what it
   * last committed before anything underneath is diffed.
   */
  function healAncestor(instance: ComponentInstance, patches: Patch[], failures: PendingFailure[]): boolean {
    const ancestor = desyncedAncestor(instance);
    if (ancestor === undefined || ancestor.output === null) return true;
    const path = absolutePath(registry, ancestor, ROOT_PATH);
    return applyFor(ancestor, [{ kind: "replaceNode", path, node: ancestor.output }], patches, failures);
  }

  function renderDirty(
    instance: ComponentInstance,
    done: Set<InstanceId>,
    patches: Patch[],
    failures: PendingFailure[],
  ): readonly InstanceId[] {
    const pass = createRenderPass();
    const healed = healAncestor(instance, patches, failures);
    const prev = instance.output;
    const desynced = subtreeDesynced(instance);
    const next = renderInstance(env, pass, instance);

    // Unhealed: the output is retained and the ancestor's next heal carries it.
    if (healed) {
      const planned = planPatches(instance, prev, next, desynced);
      if (planned.length > 0) applyFor(instance, planned, patches, failures);
      else if (desynced) markSynced(instance);
    }
    propagateOutput(instance, next);

    for (const id of pass.removed) {
      const removed = registry.get(id);
      if (removed !== undefined) unmountInstance(removed);
    }
    for (const rendered of pass.rendered) {
      done.add(rendered.id);
      if (registry.get(rendered.id) === rendered) rendered.lifecycle = "mounted";
    }
    runEffects(pass);
    failures.push(...pass.failures);
    return pass.rendered.map((r) => r.id);
  }

  /** Offer each failure to the nearest ancestor handler. Returns the handled ones. */
  function dispatchFailures(pending: readonly PendingFailure[], unhandled: LoomFailure[]): LoomFailure[] {
    const handled: LoomFailure[] = [];
    for (const { failure, parent } of pending) {
      let cursor = parent === null ? undefined : registry.get(parent);
      let taken = false;
      while (cursor !== undefined && !taken) {
        const handler = cursor.errorHandler;
        if (handler !== null) {
          try {
            taken = handler(failure) !== false;
          } catch (err: unknown) {
            unhandled.push(renderFailure(cursor, "handler", "LOOM_RENDER_THROW", err).failure);
          }
        }
        if (!taken) cursor = cursor.parent === null ? undefined : registry.get(cursor.parent);
      }
      if (taken) handled.push(failure);
      else unhandled.push(failure);
    }
    return handled;
  }

  function flush(): FlushResult {
    assertLive("flush");
    const rendered: InstanceId[] = [];
    const patches: Patch[] = [];
    const pending: PendingFailure[] = [];
    const unhandled: LoomFailure[] = [];
    let handled: LoomFailure[] = [];

    const ran = scheduler.flush((batch) => {
      const done = new Set<InstanceId>();
      for (const id of batch) {
        // Checked at dequeue: an earlier render this pass may have unmounted or rendered it.
        const instance = registry.get(id);
        if (instance === undefined || done.has(id)) continue;
        rendered.push(...renderDirty(instance, done, patches, pending));
      }
      handled = dispatchFailures(pending, unhandled);
    });
    if (!ran) return EMPTY_FLUSH;

    if (unhandled.length > 0) throw new LoomFlushError(unhandled, cfg.maxFailuresReported);
    return Object.freeze({
      rendered: Object.freeze(rendered),
      patches: Object.freeze(patches),
      handled: Object.freeze(handled),
    });
  }

  return Object.freeze({
    store,

    render(next: ViewNode): void {
      assertLive("render");
      if (rootInstance === null) {
        rootInstance = registry.create({
          id: ids.allocate(),
          node: component(RootView, { view }),
          parent: null,
          depth: 0,
          relativePath: Object.freeze([]),
        });
        scheduler.markDirty(rootInstance.id);
      }
      store.write(view, next);
    },

    flush,

    unmount(): void {
      if (unmounted) return;
      if (scheduler.isFlushing) {
        throw new LoomError("LOOM_INVALID_STATE", "unmount: called during a flush");
      }
      unmounted = true;
      if (rootInstance !== null) unmountInstance(rootInstance);
      rootInstance = null;
      if (host.root() === undefined) return;
      const result = host.apply([{ kind: "removeChildAt", path: [], index: 0 }]);
      if (!result.ok) {
        throw new LoomError("LOOM_SURFACE_FAILURE", `unmount: ${result.failure.detail}`, {
          cause: result.failure.cause,
        });
      }
    },

    get state(): RootState {
      return unmounted ? "unmounted" : scheduler.state;
    },

    inspect(): RootSnapshot {
      const instances = registry
        .ids()
        .slice()
        .sort((a, b) => a - b)
        .flatMap((id) => {
          const instance = registry.get(id);
          if (instance === undefined) return [];
          return [
            Object.freeze({
              id,
              name: instance.definition.name,
              parent: instance.parent,
              depth: instance.depth,
              path: absolutePath(registry, instance, ROOT_PATH),
              lifecycle: instance.lifecycle,
              desynced: instance.desynced,
            }),
          ];
        });
      return Object.freeze({
        state: unmounted ? "unmounted" : scheduler.state,
        tree: rootInstance?.output ?? null,
        instances: Object.freeze(instances),
        signals: store.size(),
      });
    },
  });
}
