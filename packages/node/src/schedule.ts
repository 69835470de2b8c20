/**
 * packages/node/src/schedule.ts — Flush scheduling on the Node.js event loop.
 *
 * `microtask` flushes before the current macrotask yields, so every write
 * made synchronously in one tick lands in one flush. `immediate` waits for
 * the check phase, letting pending I/O callbacks add their writes first.
 */

export type FlushMode = "microtask" | "immediate" | "manual";

export type FlushTask = () => void;

/** Returns a function that queues `task` at most once until it has run. */
export function createFlushQueue(mode: FlushMode, task: FlushTask): () => void {
  if (mode === "manual") return () => {};
  let queued = false;
  const run = (): void => {
    queued = false;
    task();
  };
  return () => {
    if (queued) return;
    queued = true;
    if (mode === "microtask") queueMicrotask(run);
    else setImmediate(run);
  };
}
