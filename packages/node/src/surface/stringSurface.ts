/**
 * packages/node/src/surface/stringSurface.ts — Headless HTML string surface.
 *
 * Why: Lets a root render on a server or in a script with no live UI tree.
 * Handles are retained nodes; `serialize` turns any of them into HTML at any
 * point. Event bindings are kept (so `dispatch` works in tests and scripts)
 * but never serialized.
 */

import type { EventHandler, TargetSurface } from "@loomui/core";
import {
  assertAttributeName,
  assertChildrenAllowed,
  assertTagName,
  escapeText,
  isVoidElement,
  openTag,
} from "./html.js";

type HandleKind = "element" | "text" | "fragment" | "container";

export type StringHandle = {
  readonly kind: HandleKind;
  readonly tag: string;
  value: string;
  readonly attributes: Map<string, string>;
  readonly events: Map<string, EventHandler>;
  readonly children: StringHandle[];
  attached: boolean;
};

export type StringSurface = TargetSurface<StringHandle> &
  Readonly<{
    createContainer: () => StringHandle;
    serialize: (handle: StringHandle) => string;
    dispatch: (handle: StringHandle, name: string, event?: unknown) => boolean;
  }>;

function make(kind: HandleKind, tag: string, value: string): StringHandle {
  return {
    kind,
    tag,
    value,
    attributes: new Map(),
    events: new Map(),
    children: [],
    attached: false,
  };
}

function requireParent(handle: StringHandle, op: string): void {
  if (handle.kind === "text") throw new TypeError(`${op}: text handles have no children`);
}

function requireElement(handle: StringHandle, op: string): void {
  if (handle.kind !== "element") throw new TypeError(`${op}: not an element handle`);
}

function requireIndex(op: string, index: number, upper: number): void {
  if (!Number.isInteger(index) || index < 0 || index > upper) {
    throw new RangeError(`${op}: index ${String(index)} out of range 0..${String(upper)}`);
  }
}

function serialize(handle: StringHandle): string {
  switch (handle.kind) {
    case "text":
      return escapeText(handle.value);
    case "fragment":
    case "container":
      return handle.children.map(serialize).join("");
    case "element": {
      const open = openTag(handle.tag, handle.attributes);
      if (isVoidElement(handle.tag)) return open;
      return `${open}${handle.children.map(serialize).join("")}</${handle.tag}>`;
    }
  }
}

export function createStringSurface(): StringSurface {
  return Object.freeze({
    createContainer: () => make("container", "", ""),

    createElement(tag: string): StringHandle {
      assertTagName(tag);
      return make("element", tag, "");
    },
    createText: (value: string) => make("text", "", value),
    createFragment: () => make("fragment", "", ""),

    setText(handle: StringHandle, value: string): void {
      if (handle.kind !== "text") throw new TypeError("setText: not a text handle");
      handle.value = value;
    },

    setAttribute(handle: StringHandle, name: string, value: string): void {
      requireElement(handle, "setAttribute");
      assertAttributeName(name);
      handle.attributes.set(name, value);
    },

    removeAttribute(handle: StringHandle, name: string): void {
      requireElement(handle, "removeAttribute");
      handle.attributes.delete(name);
    },

    insertChild(parent: StringHandle, index: number, child: StringHandle): void {
      requireParent(parent, "insertChild");
      if (parent.kind === "element") assertChildrenAllowed(parent.tag);
      requireIndex("insertChild", index, parent.children.length);
      if (child.attached) throw new Error("insertChild: child is already attached");
      parent.children.splice(index, 0, child);
      child.attached = true;
    },

    removeChild(parent: StringHandle, index: number): void {
      requireParent(parent, "removeChild");
      requireIndex("removeChild", index, parent.children.length - 1);
      const [removed] = parent.children.splice(index, 1);
      if (removed !== undefined) removed.attached = false;
    },

    moveChild(parent: StringHandle, from: number, to: number): void {
      requireParent(parent, "moveChild");
      requireIndex("moveChild", from, parent.children.length - 1);
      requireIndex("moveChild", to, parent.children.length - 1);
      const [moved] = parent.children.splice(from, 1);
      if (moved !== undefined) parent.children.splice(to, 0, moved);
    },

    bindEvent(handle: StringHandle, name: string, handler: EventHandler | null): void {
      requireElement(handle, "bindEvent");
      if (handler === null) handle.events.delete(name);
      else handle.events.set(name, handler);
    },

    serialize,

    dispatch(handle: StringHandle, name: string, event?: unknown): boolean {
      const handler = handle.events.get(name);
      if (handler === undefined) return false;
      handler(event);
      return true;
    },
  });
}
