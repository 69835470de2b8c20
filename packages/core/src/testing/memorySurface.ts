/**
 * packages/core/src/testing/memorySurface.ts — In-memory target surface.
 *
 * Why: Patch application and the component runtime are tested against a
 * surface that can be inspected after the fact: every handle is a plain
 * object, every primitive call is logged, and any primitive can be told to
 * fail on its next call(s).
 *
 * Each primitive validates before mutating, so a throwing primitive never
 * leaves a partial change behind.
 */

import { element, fragment, text } from "../node/create.js";
import type { EventHandler, Node } from "../node/types.js";
import type { SurfaceOp, TargetSurface } from "../surface/types.js";

export type MemoryHandleKind = "element" | "text" | "fragment" | "container";

export type MemoryHandle = {
  readonly id: number;
  readonly kind: MemoryHandleKind;
  readonly tag: string;
  value: string;
  readonly attributes: Map<string, string>;
  readonly events: Map<string, EventHandler>;
  readonly children: MemoryHandle[];
  parent: MemoryHandle | null;
};

export type SurfaceLogEntry = Readonly<{
  op: SurfaceOp;
  /** Arguments as a stable one-line string, handles as `#<id>`. */
  args: string;
}>;

export type MemorySurface = TargetSurface<MemoryHandle> &
  Readonly<{
    /** A detached container to mount roots into. Not logged. */
    createContainer: () => MemoryHandle;
    /** Rebuild a node tree from a handle. Keys do not exist on the surface. */
    toNode: (handle: MemoryHandle) => Node;
    /** The first child of a container, as a node tree. */
    rootNode: (container: MemoryHandle) => Node | undefined;
    /** Invoke the handler bound for `name`. Returns false when none is bound. */
    dispatch: (handle: MemoryHandle, name: string, event?: unknown) => boolean;
    /** Make the next `times` calls of `op` throw. */
    failOn: (op: SurfaceOp, times?: number) => void;
    log: () => readonly SurfaceLogEntry[];
    clearLog: () => void;
  }>;

export class InjectedSurfaceFailure extends Error {
  override readonly name = "InjectedSurfaceFailure";
  constructor(readonly op: SurfaceOp) {
    super(`injected failure in ${op}`);
  }
}

export function createMemorySurface(): MemorySurface {
  let nextId = 1;
  const entries: SurfaceLogEntry[] = [];
  const faults = new Map<SurfaceOp, number>();

  function make(kind: MemoryHandleKind, tag: string, value: string): MemoryHandle {
    return {
      id: nextId++,
      kind,
      tag,
      value,
      attributes: new Map(),
      events: new Map(),
      children: [],
      parent: null,
    };
  }

  function enter(op: SurfaceOp, args: string): void {
    const remaining = faults.get(op) ?? 0;
    if (remaining > 0) {
      if (remaining === 1) faults.delete(op);
      else faults.set(op, remaining - 1);
      throw new InjectedSurfaceFailure(op);
    }
    entries.push(Object.freeze({ op, args }));
  }

  function ref(handle: MemoryHandle): string {
    return `#${String(handle.id)}`;
  }

  function requireKind(handle: MemoryHandle, op: string, kinds: readonly MemoryHandleKind[]): void {
    if (!kinds.includes(handle.kind)) {
      throw new TypeError(`${op}: ${ref(handle)} is a ${handle.kind} handle`);
    }
  }

  function requireIndex(op: string, index: number, upper: number): void {
    if (!Number.isInteger(index) || index < 0 || index > upper) {
      throw new RangeError(`${op}: index ${String(index)} out of range 0..${String(upper)}`);
    }
  }

  const PARENT_KINDS: readonly MemoryHandleKind[] = ["element", "fragment", "container"];

  function toNode(handle: MemoryHandle): Node {
    switch (handle.kind) {
      case "text":
        return text(handle.value);
      case "fragment":
      case "container":
        return fragment(handle.children.map(toNode));
      case "element":
        return element(
          handle.tag,
          {
            attributes: Object.fromEntries(handle.attributes),
            events: Object.fromEntries(handle.events),
          },
          handle.children.map(toNode),
        );
    }
  }

  return Object.freeze({
    createContainer: () => make("container", "", ""),

    createElement(tag: string): MemoryHandle {
      enter("createElement", tag);
      return make("element", tag, "");
    },

    createText(value: string): MemoryHandle {
      enter("createText", JSON.stringify(value));
      return make("text", "", value);
    },

    createFragment(): MemoryHandle {
      enter("createFragment", "");
      return make("fragment", "", "");
    },

    setText(handle: MemoryHandle, value: string): void {
      requireKind(handle, "setText", ["text"]);
      enter("setText", `${ref(handle)} ${JSON.stringify(value)}`);
      handle.value = value;
    },

    setAttribute(handle: MemoryHandle, name: string, value: string): void {
      requireKind(handle, "setAttribute", ["element"]);
      enter("setAttribute", `${ref(handle)} ${name}=${JSON.stringify(value)}`);
      handle.attributes.set(name, value);
    },

    removeAttribute(handle: MemoryHandle, name: string): void {
      requireKind(handle, "removeAttribute", ["element"]);
      enter("removeAttribute", `${ref(handle)} ${name}`);
      handle.attributes.delete(name);
    },

    insertChild(parent: MemoryHandle, index: number, child: MemoryHandle): void {
      requireKind(parent, "insertChild", PARENT_KINDS);
      requireIndex("insertChild", index, parent.children.length);
      if (child.parent !== null) {
        throw new Error(`insertChild: ${ref(child)} is already attached to ${ref(child.parent)}`);
      }
      enter("insertChild", `${ref(parent)} ${String(index)} ${ref(child)}`);
      parent.children.splice(index, 0, child);
      child.parent = parent;
    },

    removeChild(parent: MemoryHandle, index: number): void {
      requireKind(parent, "removeChild", PARENT_KINDS);
      requireIndex("removeChild", index, parent.children.length - 1);
      enter("removeChild", `${ref(parent)} ${String(index)}`);
      const [removed] = parent.children.splice(index, 1);
      if (removed !== undefined) removed.parent = null;
    },

    moveChild(parent: MemoryHandle, from: number, to: number): void {
      requireKind(parent, "moveChild", PARENT_KINDS);
      requireIndex("moveChild", from, parent.children.length - 1);
      requireIndex("moveChild", to, parent.children.length - 1);
      enter("moveChild", `${ref(parent)} ${String(from)}->${String(to)}`);
      const [moved] = parent.children.splice(from, 1);
      if (moved !== undefined) parent.children.splice(to, 0, moved);
    },

    bindEvent(handle: MemoryHandle, name: string, handler: EventHandler | null): void {
      requireKind(handle, "bindEvent", ["element"]);
      enter("bindEvent", `${ref(handle)} ${name}${handler === null ? " (unbind)" : ""}`);
      if (handler === null) handle.events.delete(name);
      else handle.events.set(name, handler);
    },

    toNode,
    rootNode: (container: MemoryHandle) => {
      const root = container.children[0];
      return root === undefined ? undefined : toNode(root);
    },

    dispatch(handle: MemoryHandle, name: string, event?: unknown): boolean {
      const handler = handle.events.get(name);
      if (handler === undefined) return false;
      handler(event);
      return true;
    },

    failOn(op: SurfaceOp, times = 1): void {
      faults.set(op, (faults.get(op) ?? 0) + times);
    },

    log: () => Object.freeze(entries.slice()),
    clearLog: () => {
      entries.length = 0;
    },
  });
}

/** Copy of `node` without keys, for comparing against `toNode` output. */
export function stripKeys(node: Node): Node {
  switch (node.kind) {
    case "text":
      return node;
    case "fragment":
      return fragment(node.children.map(stripKeys));
    case "element":
      return element(
        node.tag,
        { attributes: node.attributes, events: node.events },
        node.children.map(stripKeys),
      );
  }
}
