/**
 * packages/core/src/runtime/config.ts — Root configuration and dev diagnostics.
 *
 * The core stays runtime-agnostic: NODE_ENV is read through `globalThis` when a
 * `process` object happens to exist, and warnings go to an injectable sink.
 */

import { LoomError } from "../errors.js";
import type { TargetSurface } from "../surface/types.js";

export type WarnSink = (message: string) => void;

export type RootConfig<H> = Readonly<{
  surface: TargetSurface<H>;
  /** Handle the mounted root is inserted into, at index 0. */
  container: H;
  /** Host hook: called once whenever work becomes pending. The host calls `flush()` later. */
  scheduleFlush?: () => void;
  /** Enables duplicate-key warnings. Defaults to `NODE_ENV !== "production"`. */
  devMode?: boolean;
  warn?: WarnSink;
  /** Failures listed in a LOOM_FLUSH_FAILED message. All are kept on `failures`. */
  maxFailuresReported?: number;
}>;

export type ResolvedRootConfig<H> = Readonly<{
  surface: TargetSurface<H>;
  container: H;
  scheduleFlush: (() => void) | undefined;
  devMode: boolean;
  warn: WarnSink;
  maxFailuresReported: number;
}>;

export const DEFAULT_MAX_FAILURES_REPORTED = 10;

const NODE_ENV =
  (globalThis as { process?: { env?: { NODE_ENV?: string } } }).process?.env?.NODE_ENV ??
  "development";
export const DEV_MODE = NODE_ENV !== "production";

/** Default sink. Silent when the host has no console. */
export function warnDev(message: string): void {
  const c = (globalThis as { console?: { warn?: (msg: string) => void } }).console;
  c?.warn?.(message);
}

const SURFACE_METHODS = [
  "createElement",
  "createText",
  "createFragment",
  "setText",
  "setAttribute",
  "removeAttribute",
  "insertChild",
  "removeChild",
  "moveChild",
  "bindEvent",
] as const;

function invalid(detail: string): LoomError {
  return new LoomError("LOOM_INVALID_CONFIG", `createRoot: ${detail}`);
}

function normalizePositiveInt(name: string, value: number | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  if (!Number.isInteger(value) || value < 1) {
    throw invalid(`${name} must be a positive integer (got ${String(value)})`);
  }
  return value;
}

export function resolveRootConfig<H>(config: RootConfig<H>): ResolvedRootConfig<H> {
  const surface: unknown = config.surface;
  if (typeof surface !== "object" || surface === null) {
    throw invalid("surface must be an object implementing TargetSurface");
  }
  for (const method of SURFACE_METHODS) {
    if (typeof config.surface[method] !== "function") {
      throw invalid(`surface.${method} must be a function`);
    }
  }
  if (config.container === undefined || config.container === null) {
    throw invalid("container handle is required");
  }
  if (config.scheduleFlush !== undefined && typeof config.scheduleFlush !== "function") {
    throw invalid("scheduleFlush must be a function");
  }
  if (config.warn !== undefined && typeof config.warn !== "function") {
    throw invalid("warn must be a function");
  }
  if (config.devMode !== undefined && typeof config.devMode !== "boolean") {
    throw invalid("devMode must be a boolean");
  }

  return Object.freeze({
    surface: config.surface,
    container: config.container,
    scheduleFlush: config.scheduleFlush,
    devMode: config.devMode ?? DEV_MODE,
    warn: config.warn ?? warnDev,
    maxFailuresReported: normalizePositiveInt(
      "maxFailuresReported",
      config.maxFailuresReported,
      DEFAULT_MAX_FAILURES_REPORTED,
    ),
  });
}
