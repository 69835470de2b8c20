/**
 * packages/core/src/scheduler/turnScheduler.ts — Dirty-set batching.
 *
 * Why: Many Signal writes between two host ticks must collapse into one
 * render per component. The scheduler owns the dirty set and the
 * `idle → pending → flushing → idle` state machine; the root supplies the
 * work done for each batch.
 *
 * Rules:
 *   - A mark while idle moves to pending and asks the host for a flush once
 *   - Marks while pending coalesce; marks while flushing land in the next batch
 *   - A batch is handed out sorted by the root's order (parent before child)
 *   - `flush` while flushing is a re-entrant call and throws
 *   - `flush` with nothing pending is a no-op
 */

import { LoomError } from "../errors.js";
import type { InstanceId } from "../runtime/instance.js";

export type SchedulerState = "idle" | "pending" | "flushing";

export type TurnSchedulerOptions = Readonly<{
  /** Host hook: called once each time work becomes pending. */
  scheduleFlush?: () => void;
  /** Batch order. Must be deterministic. Defaults to ascending instance ID. */
  compare?: (a: InstanceId, b: InstanceId) => number;
}>;

const ASCENDING = (a: InstanceId, b: InstanceId): number => a - b;

export class TurnScheduler {
  private dirty = new Set<InstanceId>();
  private current: SchedulerState = "idle";
  private readonly scheduleFlush: (() => void) | undefined;
  private readonly compare: (a: InstanceId, b: InstanceId) => number;

  constructor(opts: TurnSchedulerOptions = {}) {
    this.scheduleFlush = opts.scheduleFlush;
    this.compare = opts.compare ?? ASCENDING;
  }

  get state(): SchedulerState {
    return this.current;
  }

  get isFlushing(): boolean {
    return this.current === "flushing";
  }

  /** Number of instances waiting for the next batch. */
  get size(): number {
    return this.dirty.size;
  }

  markDirty(id: InstanceId): void {
    this.dirty.add(id);
    if (this.current !== "idle") return;
    this.current = "pending";
    this.scheduleFlush?.();
  }

  isDirty(id: InstanceId): boolean {
    return this.dirty.has(id);
  }

  /** Drop a pending mark (the instance unmounted before its turn). */
  cancel(id: InstanceId): void {
    this.dirty.delete(id);
    if (this.current === "pending" && this.dirty.size === 0) this.current = "idle";
  }

  /**
   * Hand the current batch to `run`. Returns false when there was nothing to do.
   * Marks made inside `run` are kept for the next flush.
   */
  flush(run: (batch: readonly InstanceId[]) => void): boolean {
    if (this.current === "flushing") {
      throw new LoomError(
        "LOOM_REENTRANT_FLUSH",
        "flush: called while a flush is running. Hint: writes during a flush are picked up by the next flush automatically.",
      );
    }
    if (this.dirty.size === 0) {
      this.current = "idle";
      return false;
    }

    const batch = Array.from(this.dirty).sort(this.compare);
    this.dirty = new Set();
    this.current = "flushing";
    try {
      run(Object.freeze(batch));
    } finally {
      if (this.dirty.size > 0) {
        this.current = "pending";
        this.scheduleFlush?.();
      } else {
        this.current = "idle";
      }
    }
    return true;
  }
}

export function createScheduler(opts: TurnSchedulerOptions = {}): TurnScheduler {
  return new TurnScheduler(opts);
}
