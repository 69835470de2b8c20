/**
 * packages/core/src/store/store.ts — Reactive store.
 *
 * Why: Components re-render because Signals they read were written. The store
 * owns every Signal of one root in an index-addressed arena and records who
 * read what, so a write knows exactly which components to mark dirty.
 *
 * Rules:
 *   - A read inside `track()` subscribes the tracked subscriber
 *   - Starting a new tracked scope drops the subscriber's previous dependencies
 *   - A write bumps the version, marks every subscriber dirty and clears the
 *     subscriber set; the next render re-subscribes
 *   - Derived cells recompute lazily and forward staleness to their readers
 *   - Writing a released Signal throws LOOM_WRITE_AFTER_UNMOUNT
 */

import { LoomError } from "../errors.js";
import type { InstanceId } from "../runtime/instance.js";

export type SignalId = number;

/** Subscriber identity: a component instance or a derived cell. */
export type SubscriberKey = `c:${number}` | `d:${number}`;

export function componentSubscriber(instanceId: InstanceId): SubscriberKey {
  return `c:${instanceId}`;
}

const CELL: unique symbol = Symbol("loom.signal.cell");

/** Handle to a Signal. Only the store that created it can read or write it. */
export interface Signal<T> {
  readonly id: SignalId;
  readonly name: string;
  readonly [CELL]: Cell<T>;
}

export type SignalOptions<T> = Readonly<{
  /** Instance that owns the Signal; `release(owner)` retires it. */
  owner?: InstanceId;
  /** Write is a no-op when this returns true. Defaults to `Object.is`. */
  equals?: (prev: T, next: T) => boolean;
}>;

export type SignalUpdater<T> = (prev: T) => T;

type Equality<T> = { same(prev: T, next: T): boolean };

const OBJECT_IS: Equality<unknown> = { same: (prev, next) => Object.is(prev, next) };

class Cell<T> {
  version = 0;
  released = false;
  /** Derived cells only: value must be recomputed before the next read. */
  stale = false;
  readonly subscribers = new Set<SubscriberKey>();

  constructor(
    readonly storeId: number,
    readonly id: SignalId,
    readonly name: string,
    readonly owner: InstanceId | null,
    public value: T,
    readonly compute: (() => T) | null,
    readonly equality: Equality<T>,
  ) {}
}

export type StoreOptions = Readonly<{
  /** Called once per write for every subscribed component instance. */
  onDirty?: (instanceId: InstanceId) => void;
}>;

export type Store = Readonly<{
  signal: <T>(name: string, initial: T, opts?: SignalOptions<T>) => Signal<T>;
  derived: <T>(name: string, compute: () => T, opts?: SignalOptions<T>) => Signal<T>;
  /** Read and subscribe the active tracked scope, if any. */
  read: <T>(signal: Signal<T>) => T;
  /** Read without subscribing. */
  peek: <T>(signal: Signal<T>) => T;
  /** Store `next` as is, functions included. Returns true when the value changed. */
  write: <T>(signal: Signal<T>, next: T) => boolean;
  /** Write `fn(current)`. Returns true when the value changed. */
  update: <T>(signal: Signal<T>, fn: SignalUpdater<T>) => boolean;
  version: <T>(signal: Signal<T>) => number;
  /** Run `fn` as `subscriber`, replacing its previous dependencies. */
  track: <R>(subscriber: SubscriberKey, fn: () => R) => R;
  /** Run `fn` with no active subscriber. */
  untracked: <R>(fn: () => R) => R;
  /** Retire every Signal owned by `owner` and drop its own subscriptions. */
  release: (owner: InstanceId) => void;
  /** Drop `subscriber` from every Signal it currently depends on. */
  unsubscribe: (subscriber: SubscriberKey) => void;
  isReleased: <T>(signal: Signal<T>) => boolean;
  subscriberCount: <T>(signal: Signal<T>) => number;
  /** Number of live (not released) Signals. */
  size: () => number;
}>;

let nextStoreId = 1;

export function createStore(opts: StoreOptions = {}): Store {
  const storeId = nextStoreId++;
  const onDirty = opts.onDirty;

  // Arena: index = SignalId. Released slots become undefined.
  const cells: (Cell<unknown> | undefined)[] = [];
  const owned = new Map<InstanceId, Set<SignalId>>();
  const dependencies = new Map<SubscriberKey, Set<SignalId>>();
  const scope: (SubscriberKey | null)[] = [];

  function cellOf<T>(signal: Signal<T>): Cell<T> {
    const cell = signal[CELL];
    if (cell.storeId !== storeId) {
      throw new LoomError(
        "LOOM_INVALID_STATE",
        `signal "${signal.name}" (id=${String(signal.id)}) belongs to another store`,
      );
    }
    return cell;
  }

  function writable<T>(signal: Signal<T>): Cell<T> {
    const cell = cellOf(signal);
    if (cell.released) {
      throw new LoomError(
        "LOOM_WRITE_AFTER_UNMOUNT",
        `write to signal "${cell.name}" (id=${String(cell.id)}) after its owner instance ${String(cell.owner)} unmounted. Hint: a stale setter or handle outlived its component.`,
      );
    }
    if (cell.compute !== null) {
      throw new LoomError(
        "LOOM_INVALID_STATE",
        `signal "${cell.name}" (id=${String(cell.id)}) is derived and cannot be written`,
      );
    }
    return cell;
  }

  function commit<T>(cell: Cell<T>, value: T): boolean {
    if (cell.equality.same(cell.value, value)) return false;
    cell.value = value;
    cell.version++;
    notify(cell);
    return true;
  }

  function register<T>(cell: Cell<T>): Signal<T> {
    cells[cell.id] = cell;
    if (cell.owner !== null) {
      let set = owned.get(cell.owner);
      if (!set) {
        set = new Set();
        owned.set(cell.owner, set);
      }
      set.add(cell.id);
    }
    return Object.freeze({ id: cell.id, name: cell.name, [CELL]: cell });
  }

  function equalityOf<T>(o: SignalOptions<T>): Equality<T> {
    const equals = o.equals;
    return equals === undefined ? OBJECT_IS : { same: (prev, next) => equals(prev, next) };
  }

  function unsubscribe(subscriber: SubscriberKey): void {
    const deps = dependencies.get(subscriber);
    if (!deps) return;
    for (const id of deps) cells[id]?.subscribers.delete(subscriber);
    dependencies.delete(subscriber);
  }

  function subscribe(cell: Cell<unknown>): void {
    const subscriber = scope[scope.length - 1];
    if (subscriber === undefined || subscriber === null || cell.released) return;
    cell.subscribers.add(subscriber);
    let deps = dependencies.get(subscriber);
    if (!deps) {
      deps = new Set();
      dependencies.set(subscriber, deps);
    }
    deps.add(cell.id);
  }

  function track<R>(subscriber: SubscriberKey | null, fn: () => R): R {
    if (subscriber !== null) unsubscribe(subscriber);
    scope.push(subscriber);
    try {
      return fn();
    } finally {
      scope.pop();
    }
  }

  function refresh<T>(cell: Cell<T>): void {
    if (cell.compute === null || !cell.stale || cell.released) return;
    const compute = cell.compute;
    const next = track(`d:${cell.id}`, compute);
    cell.stale = false;
    if (!cell.equality.same(cell.value, next)) cell.value = next;
  }

  // Iterative so long derived chains cannot exhaust the stack.
  function notify(start: Cell<unknown>): void {
    const queue: Cell<unknown>[] = [start];
    while (queue.length > 0) {
      const cell = queue.shift();
      if (cell === undefined) break;
      const subscribers = Array.from(cell.subscribers);
      cell.subscribers.clear();
      for (const subscriber of subscribers) {
        const id = Number(subscriber.slice(2));
        dependencies.get(subscriber)?.delete(cell.id);
        if (subscriber.startsWith("c:")) {
          onDirty?.(id);
          continue;
        }
        const dependent = cells[id];
        if (dependent === undefined || dependent.stale) continue;
        dependent.stale = true;
        dependent.version++;
        queue.push(dependent);
      }
    }
  }

  function release(owner: InstanceId): void {
    unsubscribe(componentSubscriber(owner));
    const ids = owned.get(owner);
    if (!ids) return;
    owned.delete(owner);
    for (const id of ids) {
      const cell = cells[id];
      if (cell === undefined) continue;
      cell.released = true;
      cell.subscribers.clear();
      unsubscribe(`d:${id}`);
      cells[id] = undefined;
    }
  }

  return Object.freeze({
    signal<T>(name: string, initial: T, o: SignalOptions<T> = {}): Signal<T> {
      const id = cells.length;
      return register(new Cell(storeId, id, name, o.owner ?? null, initial, null, equalityOf(o)));
    },

    derived<T>(name: string, compute: () => T, o: SignalOptions<T> = {}): Signal<T> {
      // Reserve the slot first: the initial computation subscribes as `d:<id>`.
      const id = cells.length;
      cells.push(undefined);
      const initial = track(`d:${id}`, compute);
      return register(new Cell(storeId, id, name, o.owner ?? null, initial, compute, equalityOf(o)));
    },

    read<T>(signal: Signal<T>): T {
      const cell = cellOf(signal);
      refresh(cell);
      subscribe(cell);
      return cell.value;
    },

    peek<T>(signal: Signal<T>): T {
      const cell = cellOf(signal);
      refresh(cell);
      return cell.value;
    },

    write: <T>(signal: Signal<T>, next: T) => commit(writable(signal), next),

    update<T>(signal: Signal<T>, fn: SignalUpdater<T>): boolean {
      const cell = writable(signal);
      return commit(cell, fn(cell.value));
    },

    version: <T>(signal: Signal<T>) => cellOf(signal).version,
    track: <R>(subscriber: SubscriberKey, fn: () => R) => track(subscriber, fn),
    untracked: <R>(fn: () => R) => track(null, fn),
    release,
    unsubscribe,
    isReleased: <T>(signal: Signal<T>) => cellOf(signal).released,
    subscriberCount: <T>(signal: Signal<T>) => cellOf(signal).subscribers.size,
    size: () => cells.reduce((n, cell) => (cell === undefined ? n : n + 1), 0),
  });
}
