/**
 * @loomui/core
 *
 * Runtime-agnostic TypeScript core for Loom.
 * This package MUST NOT use Node-specific APIs (Buffer, worker_threads, node:* imports).
 */

// =============================================================================
// Errors
// =============================================================================

export {
  LoomError,
  LoomFlushError,
  describeThrown,
  formatFailure,
  isLoomError,
  type FailurePhase,
  type LoomErrorCode,
  type LoomFailure,
} from "./errors.js";

// =============================================================================
// Node model
// =============================================================================

export type {
  Attributes,
  ChildInput,
  ComponentIdentity,
  ComponentNode,
  ElementNode,
  EventBindings,
  EventHandler,
  FragmentNode,
  Key,
  Node,
  NodeKind,
  TextNode,
  ViewNode,
} from "./node/types.js";
export { element, fragment, text, type ElementProps, type HostChildInput } from "./node/create.js";
export {
  countNodes,
  describeNode,
  nodeAt,
  nodeKey,
  nodesEqual,
  replaceNodeAt,
} from "./node/inspect.js";

// =============================================================================
// Diff + patches
// =============================================================================

export { diff, type DiffDiagnostic, type DiffOptions } from "./diff/diff.js";
export {
  ROOT_PATH,
  formatPatch,
  formatPath,
  summarizePatches,
  type Patch,
  type PatchKind,
  type PatchSummary,
  type Path,
} from "./diff/patch.js";
export {
  matchChildren,
  type ChildMatch,
  type DuplicateKeyReport,
} from "./diff/children.js";

// =============================================================================
// Target surface
// =============================================================================

export type { SurfaceOp, TargetSurface } from "./surface/types.js";
export {
  applyPatches,
  createHostTree,
  type ApplyFailure,
  type ApplyResult,
  type HostTree,
} from "./surface/hostTree.js";

// =============================================================================
// Store + scheduler
// =============================================================================

export {
  componentSubscriber,
  createStore,
  type Signal,
  type SignalId,
  type SignalOptions,
  type SignalUpdater,
  type Store,
  type StoreOptions,
  type SubscriberKey,
} from "./store/store.js";
export {
  TurnScheduler,
  createScheduler,
  type SchedulerState,
  type TurnSchedulerOptions,
} from "./scheduler/turnScheduler.js";

// =============================================================================
// Component runtime
// =============================================================================

export type { InstanceId } from "./runtime/instance.js";
export {
  component,
  defineComponent,
  type ComponentDefinition,
  type RenderFn,
} from "./runtime/component.js";
export { createContext, type Context } from "./runtime/context.js";
export type {
  RenderContext,
  SignalHookOptions,
  StateSetter,
} from "./runtime/hooks.js";
export type {
  EffectCleanup,
  ErrorHandler,
  Lifecycle,
  RefState,
} from "./runtime/instances.js";
export { ErrorBoundary, type ErrorBoundaryProps } from "./runtime/errorBoundary.js";
export {
  DEFAULT_MAX_FAILURES_REPORTED,
  type RootConfig,
  type WarnSink,
} from "./runtime/config.js";
export {
  createRoot,
  type FlushResult,
  type InstanceSnapshot,
  type Root,
  type RootSnapshot,
  type RootState,
} from "./runtime/root.js";
