import {
  LoomError,
  type Root,
  type RootConfig,
  type ViewNode,
  createRoot,
} from "@loomui/core";
import { readDevMode, type ProcessEnv } from "./env.js";
import { type FlushMode, createFlushQueue } from "./schedule.js";
import { createStringSurface, type StringHandle } from "./surface/stringSurface.js";

export { readDevMode, type ProcessEnv } from "./env.js";
export { createFlushQueue, type FlushMode, type FlushTask } from "./schedule.js";
export {
  createStringSurface,
  type StringHandle,
  type StringSurface,
} from "./surface/stringSurface.js";
export { escapeAttribute, escapeText, renderToString } from "./surface/html.js";

export type NodeRootConfig<H> = Readonly<
  Omit<RootConfig<H>, "scheduleFlush"> & {
    /** When flushes run. Defaults to "microtask". */
    flushMode?: FlushMode;
    /**
     * Receives errors thrown by scheduled flushes. Without it they are thrown
     * from the scheduled callback and surface as uncaught exceptions.
     */
    onFlushError?: (err: unknown) => void;
    /** Environment read for dev mode when `devMode` is not set. Defaults to `process.env`. */
    env?: ProcessEnv;
  }
>;

const FLUSH_MODES: readonly FlushMode[] = ["microtask", "immediate", "manual"];

/** Create a root whose flushes are scheduled on the Node.js event loop. */
export function createNodeRoot<H>(config: NodeRootConfig<H>): Root {
  const mode = config.flushMode ?? "microtask";
  if (!FLUSH_MODES.includes(mode)) {
    throw new LoomError(
      "LOOM_INVALID_CONFIG",
      `createNodeRoot: flushMode must be one of ${FLUSH_MODES.join(", ")} (got ${JSON.stringify(mode)})`,
    );
  }
  const onFlushError = config.onFlushError;

  let root: Root | null = null;
  const schedule = createFlushQueue(mode, () => {
    if (root === null || root.state !== "pending") return;
    if (onFlushError === undefined) {
      root.flush();
      return;
    }
    try {
      root.flush();
    } catch (err: unknown) {
      onFlushError(err);
    }
  });

  const created = createRoot<H>({
    surface: config.surface,
    container: config.container,
    scheduleFlush: schedule,
    devMode: config.devMode ?? readDevMode(config.env),
    ...(config.warn === undefined ? {} : { warn: config.warn }),
    ...(config.maxFailuresReported === undefined
      ? {}
      : { maxFailuresReported: config.maxFailuresReported }),
  });
  root = created;
  return created;
}

/**
 * Render a view (components included) once on a string surface and return
 * the HTML. Effects run; the root is unmounted before returning or throwing.
 */
export function renderViewToString(view: ViewNode): string {
  const surface = createStringSurface();
  const container: StringHandle = surface.createContainer();
  const root = createRoot({ surface, container, devMode: false });
  try {
    root.render(view);
    root.flush();
    return surface.serialize(container);
  } finally {
    root.unmount();
  }
}
