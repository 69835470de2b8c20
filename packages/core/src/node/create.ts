/**
 * packages/core/src/node/create.ts — Node constructors.
 *
 * Construction is the only public way to build nodes. Every constructor
 * returns frozen objects; a render pass always builds a fresh tree.
 */

import type {
  Attributes,
  ChildInput,
  ElementNode,
  EventBindings,
  EventHandler,
  FragmentNode,
  Key,
  Node,
  TextNode,
  ViewNode,
} from "./types.js";

/** Child values accepted where the result must stay a host tree. */
export type HostChildInput =
  | Node
  | string
  | number
  | boolean
  | null
  | undefined
  | readonly HostChildInput[];

export type ElementProps = Readonly<{
  attributes?: Readonly<Record<string, string>>;
  events?: Readonly<Record<string, EventHandler>>;
  key?: Key;
}>;

const EMPTY_ATTRIBUTES: Attributes = Object.freeze({});
const EMPTY_EVENTS: EventBindings = Object.freeze({});
const EMPTY_CHILDREN: readonly never[] = Object.freeze([]);

function pushChild(out: ViewNode[], child: ChildInput): void {
  if (child === null || child === undefined || typeof child === "boolean") return;
  if (typeof child === "string") {
    out.push(text(child));
    return;
  }
  if (typeof child === "number") {
    out.push(text(String(child)));
    return;
  }
  if (Array.isArray(child)) {
    for (const nested of child) pushChild(out, nested);
    return;
  }
  if (isViewNode(child)) out.push(child);
}

function isViewNode(value: ChildInput): value is ViewNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function normalizeChildren(children: readonly ChildInput[] | undefined): readonly ViewNode[] {
  if (children === undefined || children.length === 0) return EMPTY_CHILDREN;
  const out: ViewNode[] = [];
  for (const child of children) pushChild(out, child);
  return Object.freeze(out);
}

function freezeRecord<T>(record: Readonly<Record<string, T>> | undefined, empty: Readonly<Record<string, T>>) {
  if (record === undefined) return empty;
  const keys = Object.keys(record);
  if (keys.length === 0) return empty;
  const copy: Record<string, T> = {};
  for (const key of keys) {
    const value = record[key];
    if (value !== undefined) copy[key] = value;
  }
  return Object.freeze(copy);
}

export function text(value: string | number): TextNode {
  return Object.freeze({ kind: "text", value: typeof value === "number" ? String(value) : value });
}

export function element(
  tag: string,
  props?: ElementProps,
  children?: readonly HostChildInput[],
): ElementNode<Node>;
export function element(
  tag: string,
  props?: ElementProps,
  children?: readonly ChildInput[],
): ElementNode<ViewNode>;
export function element(
  tag: string,
  props: ElementProps = {},
  children?: readonly ChildInput[],
): ElementNode<ViewNode> {
  const base = {
    kind: "element" as const,
    tag,
    attributes: freezeRecord(props.attributes, EMPTY_ATTRIBUTES),
    events: freezeRecord(props.events, EMPTY_EVENTS),
    children: normalizeChildren(children),
  };
  return Object.freeze(props.key === undefined ? base : { ...base, key: props.key });
}

export function fragment(children?: readonly HostChildInput[], key?: Key): FragmentNode<Node>;
export function fragment(children?: readonly ChildInput[], key?: Key): FragmentNode<ViewNode>;
export function fragment(children?: readonly ChildInput[], key?: Key): FragmentNode<ViewNode> {
  const base = { kind: "fragment" as const, children: normalizeChildren(children) };
  return Object.freeze(key === undefined ? base : { ...base, key });
}
