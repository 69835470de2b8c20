/**
 * Error codes and the error class surfaced by Loom.
 */

// =============================================================================
// LoomErrorCode Union
// =============================================================================

/**
 * Deterministic error codes for all runtime violations.
 * These are surfaced as LoomError instances (or as warnings, for duplicate keys).
 */
export type LoomErrorCode =
  | "LOOM_DUPLICATE_KEY"
  | "LOOM_SURFACE_FAILURE"
  | "LOOM_WRITE_AFTER_UNMOUNT"
  | "LOOM_RENDER_THROW"
  | "LOOM_REENTRANT_FLUSH"
  | "LOOM_HOOK_ORDER"
  | "LOOM_INVALID_PATCH"
  | "LOOM_INVALID_STATE"
  | "LOOM_INVALID_CONFIG"
  | "LOOM_FLUSH_FAILED";

// =============================================================================
// LoomError Class
// =============================================================================

/**
 * Error class for all deterministic runtime violations.
 * The `code` property identifies the specific violation.
 */
export class LoomError extends Error {
  override readonly name: string = "LoomError";
  readonly code: LoomErrorCode;

  constructor(code: LoomErrorCode, message?: string, options?: { cause?: unknown }) {
    super(message ?? code, options);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LoomError);
    }
  }
}

export function isLoomError(value: unknown): value is LoomError {
  return value instanceof LoomError;
}

/** Render an unknown thrown value into a single-line detail string. */
export function describeThrown(value: unknown): string {
  if (value instanceof Error) return `${value.name}: ${value.message}`;
  if (typeof value === "string") return value;
  try {
    return String(value);
  } catch {
    return "[unprintable value]";
  }
}

// =============================================================================
// Flush failures
// =============================================================================

/** Where in a flush a failure happened. */
export type FailurePhase = "render" | "apply" | "effect" | "handler";

/** One component-scoped failure collected during a flush. */
export type LoomFailure = Readonly<{
  code: LoomErrorCode;
  phase: FailurePhase;
  instanceId: number;
  /** Component name of the failing instance. */
  component: string;
  detail: string;
  cause?: unknown;
}>;

export function formatFailure(failure: LoomFailure): string {
  return `${failure.code} in <${failure.component}> (instance ${String(failure.instanceId)}, ${failure.phase}): ${failure.detail}`;
}

/**
 * Thrown by `flush()` when failures were left unhandled by every error
 * boundary. The flush itself completed for every still-valid component.
 */
export class LoomFlushError extends LoomError {
  override readonly name: string = "LoomFlushError";
  readonly failures: readonly LoomFailure[];

  constructor(failures: readonly LoomFailure[], maxReported: number) {
    const shown = failures.slice(0, maxReported).map(formatFailure);
    const hidden = failures.length - shown.length;
    const lines = hidden > 0 ? [...shown, `... and ${String(hidden)} more`] : shown;
    super(
      "LOOM_FLUSH_FAILED",
      `flush: ${String(failures.length)} unhandled failure(s)\n  ${lines.join("\n  ")}`,
      { cause: failures[0]?.cause },
    );
    this.failures = Object.freeze(failures.slice());
  }
}
