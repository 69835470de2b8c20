/**
 * packages/core/src/node/types.ts — Node model.
 *
 * Why: A rendered frame is described by an immutable tree. Host nodes
 * (element, text, fragment) are what the diff engine compares and what a
 * target surface materializes. View nodes additionally admit component nodes,
 * which the runtime expands into host subtrees before diffing.
 */

import type { RenderContext } from "../runtime/hooks.js";

/** Stable sibling identity used by keyed child matching. */
export type Key = string | number;

/** Opaque event handler handle. Compared by identity only. */
export type EventHandler = (event: unknown) => void;

export type Attributes = Readonly<Record<string, string>>;
export type EventBindings = Readonly<Record<string, EventHandler>>;

export interface ElementNode<C = Node> {
  readonly kind: "element";
  readonly tag: string;
  readonly attributes: Attributes;
  readonly events: EventBindings;
  readonly children: readonly C[];
  readonly key?: Key;
}

export type TextNode = Readonly<{
  kind: "text";
  value: string;
}>;

export interface FragmentNode<C = Node> {
  readonly kind: "fragment";
  readonly children: readonly C[];
  readonly key?: Key;
}

/** Host node: the only shapes the diff engine and surfaces ever see. */
export type Node = ElementNode<Node> | TextNode | FragmentNode<Node>;

/** Identity of a component definition as seen from the node model. */
export type ComponentIdentity = Readonly<{ name: string }>;

/**
 * Component node: a definition plus the props it will be rendered with.
 * `invoke` closes over the typed props so the runtime never needs to know P.
 */
export type ComponentNode = Readonly<{
  kind: "component";
  definition: ComponentIdentity;
  props: unknown;
  key?: Key;
  invoke: (ctx: RenderContext) => ViewNode;
}>;

/** Render output: host nodes that may embed components at any depth. */
export type ViewNode = ElementNode<ViewNode> | TextNode | FragmentNode<ViewNode> | ComponentNode;

export type NodeKind = ViewNode["kind"];

/** Child values accepted by constructors before normalization. */
export type ChildInput = ViewNode | string | number | boolean | null | undefined | readonly ChildInput[];
