/**
 * packages/core/src/runtime/errorBoundary.ts — Built-in error boundary component.
 *
 * Catches failures of its descendants and renders `fallback` from the next
 * flush on. `reset()` renders `children` again.
 */

import type { LoomFailure } from "../errors.js";
import type { ViewNode } from "../node/types.js";
import { defineComponent } from "./component.js";

export type ErrorBoundaryProps = Readonly<{
  children: ViewNode;
  fallback: (failure: LoomFailure, reset: () => void) => ViewNode;
}>;

export const ErrorBoundary = defineComponent<ErrorBoundaryProps>({
  name: "ErrorBoundary",
  render: (props, ctx) => {
    const [failure, setFailure] = ctx.useState<LoomFailure | null>(null);
    ctx.useErrorHandler((next) => {
      // First failure wins until reset.
      setFailure((prev) => prev ?? next);
      return true;
    });
    if (failure === null) return props.children;
    return props.fallback(failure, () => setFailure(null));
  },
});
