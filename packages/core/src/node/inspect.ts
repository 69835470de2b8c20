/**
 * packages/core/src/node/inspect.ts — Read-only helpers over host nodes.
 *
 * Structural equality exists for tests and hosts; the runtime never uses it to
 * skip a diff pass.
 */

import type { Key, Node, ViewNode } from "./types.js";

export function nodeKey(node: ViewNode): Key | undefined {
  return node.kind === "text" ? undefined : node.key;
}

function recordsEqual<T>(a: Readonly<Record<string, T>>, b: Readonly<Record<string, T>>): boolean {
  if (a === b) return true;
  const aKeys = Object.keys(a);
  if (aKeys.length !== Object.keys(b).length) return false;
  for (const key of aKeys) {
    if (!Object.hasOwn(b, key) || a[key] !== b[key]) return false;
  }
  return true;
}

function childrenEqual(a: readonly Node[], b: readonly Node[]): boolean {
  if (a === b) return true;
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    const x = a[i];
    const y = b[i];
    if (x === undefined || y === undefined || !nodesEqual(x, y)) return false;
  }
  return true;
}

/** Structural equality. Event handlers compare by identity. */
export function nodesEqual(a: Node, b: Node): boolean {
  if (a === b) return true;
  switch (a.kind) {
    case "text":
      return b.kind === "text" && a.value === b.value;
    case "fragment":
      return b.kind === "fragment" && a.key === b.key && childrenEqual(a.children, b.children);
    case "element":
      return (
        b.kind === "element" &&
        a.tag === b.tag &&
        a.key === b.key &&
        recordsEqual(a.attributes, b.attributes) &&
        recordsEqual(a.events, b.events) &&
        childrenEqual(a.children, b.children)
      );
  }
}

/** Stable one-token label: `li[key=2]`, `#text`, `#fragment`, `<Counter>`. */
export function describeNode(node: ViewNode): string {
  switch (node.kind) {
    case "text":
      return "#text";
    case "fragment":
      return node.key === undefined ? "#fragment" : `#fragment[key=${String(node.key)}]`;
    case "component":
      return node.key === undefined
        ? `<${node.definition.name}>`
        : `<${node.definition.name}>[key=${String(node.key)}]`;
    case "element":
      return node.key === undefined ? node.tag : `${node.tag}[key=${String(node.key)}]`;
  }
}

export function countNodes(node: Node): number {
  if (node.kind === "text") return 1;
  let total = 1;
  for (const child of node.children) total += countNodes(child);
  return total;
}

/** Immutable lookup by child-index path relative to `node`. */
export function nodeAt(node: Node, path: readonly number[]): Node | undefined {
  let cursor: Node = node;
  for (const index of path) {
    if (cursor.kind === "text") return undefined;
    const next: Node | undefined = cursor.children[index];
    if (next === undefined) return undefined;
    cursor = next;
  }
  return cursor;
}

/**
 * Return a copy of `node` with the subtree at `path` replaced by `replacement`.
 * Only the spine along `path` is copied; siblings are shared.
 */
export function replaceNodeAt(node: Node, path: readonly number[], replacement: Node): Node {
  if (path.length === 0) return replacement;
  if (node.kind === "text") return node;
  const [head, ...rest] = path;
  if (head === undefined) return replacement;
  const child = node.children[head];
  if (child === undefined) return node;
  const nextChild = replaceNodeAt(child, rest, replacement);
  if (nextChild === child) return node;
  const children = node.children.slice();
  children[head] = nextChild;
  return Object.freeze({ ...node, children: Object.freeze(children) });
}
