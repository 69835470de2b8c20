/**
 * packages/core/src/runtime/hooks.ts — Render context and hook implementations.
 *
 * Why: A render function receives a context bound to its instance. Hooks
 * store their state in the instance's hook slots, indexed by call order, so
 * the order must be identical on every render of the same instance.
 *
 * State hooks are backed by Signals owned by the instance: reading one during
 * render subscribes the instance, writing it marks the instance dirty, and
 * unmount releases it (later writes throw LOOM_WRITE_AFTER_UNMOUNT).
 */

import { LoomError } from "../errors.js";
import type { Signal, Store } from "../store/store.js";
import type { Context } from "./context.js";
import type { InstanceId } from "./instance.js";
import {
  type ComponentInstance,
  type EffectCleanup,
  type EffectState,
  type ErrorHandler,
  type HookState,
  type InstanceRegistry,
  type RefState,
  depsEqual,
} from "./instances.js";

type UnknownCallback = (...args: never[]) => unknown;

export type StateSetter<T> = (next: T | ((prev: T) => T)) => void;

export type SignalHookOptions<T> = Readonly<{
  name?: string;
  equals?: (prev: T, next: T) => boolean;
}>;

export type RenderContext = Readonly<{
  instanceId: InstanceId;
  store: Store;
  /** Read a Signal and subscribe this instance to it. */
  read: <T>(signal: Signal<T>) => T;
  /** Signal owned by this instance, created on first render. */
  useSignal: <T>(initial: T | (() => T), opts?: SignalHookOptions<T>) => Signal<T>;
  /** Derived cell owned by this instance. Recomputes when a Signal it read changes. */
  useDerived: <T>(compute: () => T, opts?: SignalHookOptions<T>) => Signal<T>;
  useState: <T>(initial: T | (() => T)) => readonly [T, StateSetter<T>];
  useReducer: <S, A>(
    reducer: (state: S, action: A) => S,
    initial: S | (() => S),
  ) => readonly [S, (action: A) => void];
  useRef: <T>(initial: T) => RefState<T>;
  /** Runs after this render's patches were applied. */
  useEffect: (effect: () => void | EffectCleanup, deps?: readonly unknown[]) => void;
  useMemo: <T>(factory: () => T, deps?: readonly unknown[]) => T;
  useCallback: <T extends UnknownCallback>(callback: T, deps?: readonly unknown[]) => T;
  /** Value provided by the nearest ancestor, or the context default. */
  useContext: <T>(context: Context<T>) => T;
  /** Provide `value` to every descendant of this instance. */
  provide: <T>(context: Context<T>, value: T) => void;
  /** Handle failures of descendants. Return false to pass a failure further up. */
  useErrorHandler: (handler: ErrorHandler) => void;
}>;

export type RenderEnv = Readonly<{
  store: Store;
  registry: InstanceRegistry;
}>;

function isKind<K extends HookState["kind"]>(
  hook: HookState,
  kind: K,
): hook is Extract<HookState, { kind: K }> {
  return hook.kind === kind;
}

function resolveInitial<T>(initial: T | (() => T)): T {
  return typeof initial === "function" ? (initial as () => T)() : initial;
}

/**
 * Create the render context for one render pass of `instance`.
 * The caller brackets the render with `registry.beginRender/endRender`.
 */
export function createRenderContext(instance: ComponentInstance, env: RenderEnv): RenderContext {
  const { store, registry } = env;

  function hookName(index: number, name: string | undefined): string {
    return name ?? `${instance.definition.name}#${String(instance.id)}:${String(index)}`;
  }

  function orderError(detail: string): LoomError {
    return new LoomError(
      "LOOM_HOOK_ORDER",
      `<${instance.definition.name}> (instance ${String(instance.id)}): ${detail}. Hint: hooks must be called in the same order on every render.`,
    );
  }

  /** Claim the next hook slot; `existing` is undefined on first use. */
  function take<K extends HookState["kind"]>(
    kind: K,
  ): { index: number; existing: Extract<HookState, { kind: K }> | undefined } {
    const index = instance.hookIndex;
    instance.hookIndex++;
    const existing = instance.hooks[index];
    if (existing === undefined) {
      if (instance.expectedHookCount !== null && index >= instance.expectedHookCount) {
        throw orderError(`rendered more hooks than the previous render while reading ${kind}`);
      }
      return { index, existing: undefined };
    }
    if (!isKind(existing, kind)) {
      throw orderError(`hook ${String(index)} was ${existing.kind}, now ${kind}`);
    }
    return { index, existing };
  }

  function useReducer<S, A>(
    reducer: (state: S, action: A) => S,
    initial: S | (() => S),
  ): readonly [S, (action: A) => void] {
    const { index, existing } = take("state");
    if (existing !== undefined) {
      existing.reducer.current = reducer;
      return [store.read(existing.signal as Signal<S>), existing.dispatch as (action: A) => void];
    }

    const signal = store.signal(hookName(index, undefined), resolveInitial(initial), {
      owner: instance.id,
    });
    const latest: RefState<(state: S, action: A) => S> = { current: reducer };
    const dispatch = (action: A): void => {
      store.update(signal, (prev: S) => latest.current(prev, action));
    };
    instance.hooks[index] = { kind: "state", signal, dispatch, reducer: latest };
    return [store.read(signal), dispatch];
  }

  return Object.freeze({
    instanceId: instance.id,
    store,
    read: <T>(signal: Signal<T>) => store.read(signal),

    useSignal<T>(initial: T | (() => T), opts: SignalHookOptions<T> = {}): Signal<T> {
      const { index, existing } = take("signal");
      if (existing !== undefined) return existing.signal as Signal<T>;
      const signal = store.signal(hookName(index, opts.name), resolveInitial(initial), {
        owner: instance.id,
        ...(opts.equals === undefined ? {} : { equals: opts.equals }),
      });
      instance.hooks[index] = { kind: "signal", signal };
      return signal;
    },

    useDerived<T>(compute: () => T, opts: SignalHookOptions<T> = {}): Signal<T> {
      const { index, existing } = take("derived");
      if (existing !== undefined) {
        existing.compute.current = compute;
        return existing.signal as Signal<T>;
      }
      const latest: RefState<() => T> = { current: compute };
      const signal = store.derived(hookName(index, opts.name), () => latest.current(), {
        owner: instance.id,
        ...(opts.equals === undefined ? {} : { equals: opts.equals }),
      });
      instance.hooks[index] = { kind: "derived", signal, compute: latest };
      return signal;
    },

    useState<T>(initial: T | (() => T)): readonly [T, StateSetter<T>] {
      return useReducer<T, T | ((prev: T) => T)>(
        (prev, next) => (typeof next === "function" ? (next as (p: T) => T)(prev) : next),
        initial,
      );
    },

    useReducer,

    useRef<T>(initial: T): RefState<T> {
      const { index, existing } = take("ref");
      if (existing !== undefined) return existing.ref as RefState<T>;
      const ref: RefState<T> = { current: initial };
      instance.hooks[index] = { kind: "ref", ref };
      return ref;
    },

    useEffect(effect: () => void | EffectCleanup, deps?: readonly unknown[]): void {
      const { index, existing } = take("effect");
      const normalized = (): undefined | EffectCleanup => {
        const result = effect();
        return typeof result === "function" ? result : undefined;
      };

      if (existing === undefined) {
        const state: EffectState = { deps, cleanup: undefined, effect: normalized, pending: true };
        instance.hooks[index] = { kind: "effect", effect: state };
        instance.pendingEffects.push(state);
        return;
      }

      const prev = existing.effect;
      if (depsEqual(prev.deps, deps) && !prev.pending) return;
      // Deps changed, or the previous run never happened: clean up, then run again.
      // The old cleanup stays on the slot until it has run, so an unmount in between still runs it.
      if (prev.cleanup) instance.pendingCleanups.push(prev.cleanup);
      const state: EffectState = { deps, cleanup: prev.cleanup, effect: normalized, pending: true };
      instance.hooks[index] = { kind: "effect", effect: state };
      instance.pendingEffects.push(state);
    },

    useMemo<T>(factory: () => T, deps?: readonly unknown[]): T {
      const { index, existing } = take("memo");
      if (existing !== undefined && depsEqual(existing.deps, deps)) return existing.value as T;
      const value = factory();
      instance.hooks[index] = { kind: "memo", deps, value };
      return value;
    },

    useCallback<T extends UnknownCallback>(callback: T, deps?: readonly unknown[]): T {
      const { index, existing } = take("callback");
      if (existing !== undefined && depsEqual(existing.deps, deps)) return existing.callback as T;
      instance.hooks[index] = { kind: "callback", deps, callback };
      return callback;
    },

    useContext<T>(context: Context<T>): T {
      let cursor = instance.parent === null ? undefined : registry.get(instance.parent);
      while (cursor !== undefined) {
        if (cursor.provided.has(context.id)) return cursor.provided.get(context.id) as T;
        cursor = cursor.parent === null ? undefined : registry.get(cursor.parent);
      }
      return context.defaultValue;
    },

    provide<T>(context: Context<T>, value: T): void {
      instance.provided.set(context.id, value);
    },

    useErrorHandler(handler: ErrorHandler): void {
      instance.errorHandler = handler;
    },
  });
}

/** Run cleanups collected during a render, before the render's new effects. */
export function runPendingCleanups(
  cleanups: readonly EffectCleanup[],
  onError: (err: unknown) => void,
): void {
  for (const cleanup of cleanups) {
    try {
      cleanup();
    } catch (err: unknown) {
      onError(err);
    }
  }
}

/** Run effects scheduled by a render. Stops at the first throwing effect. */
export function runPendingEffects(effects: readonly EffectState[]): void {
  for (const state of effects) {
    state.pending = false;
    state.cleanup = undefined;
    state.cleanup = state.effect();
  }
}

/** Run every effect cleanup of an unmounting instance, in reverse declaration order. */
export function runAllCleanups(instance: ComponentInstance, onError: (err: unknown) => void): void {
  for (let i = instance.hooks.length - 1; i >= 0; i--) {
    const hook = instance.hooks[i];
    if (!hook || hook.kind !== "effect" || !hook.effect.cleanup) continue;
    const cleanup = hook.effect.cleanup;
    hook.effect.cleanup = undefined;
    try {
      cleanup();
    } catch (err: unknown) {
      onError(err);
    }
  }
}
