/**
 * packages/core/src/surface/types.ts — Target surface capability.
 *
 * The core never assumes what the surface is: a live UI tree, a headless
 * string builder or a test double all implement the same primitives. Each
 * primitive must either fully succeed or throw without mutating.
 */

import type { EventHandler } from "../node/types.js";

export interface TargetSurface<H> {
  createElement(tag: string): H;
  createText(value: string): H;
  createFragment(): H;
  setText(handle: H, value: string): void;
  setAttribute(handle: H, name: string, value: string): void;
  removeAttribute(handle: H, name: string): void;
  insertChild(parent: H, index: number, child: H): void;
  removeChild(parent: H, index: number): void;
  /** Remove the child at `from`, then insert it at `to` in the shortened list. */
  moveChild(parent: H, from: number, to: number): void;
  /** `handler === null` unbinds. */
  bindEvent(handle: H, name: string, handler: EventHandler | null): void;
}

export type SurfaceOp = keyof TargetSurface<unknown>;
