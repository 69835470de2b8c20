/**
 * packages/node/src/surface/html.ts — HTML escaping and serialization of node trees.
 */

import type { Node } from "@loomui/core";

/** Elements serialized without a closing tag. They take no children. */
const VOID_ELEMENTS: ReadonlySet<string> = new Set([
  "area",
  "base",
  "br",
  "col",
  "embed",
  "hr",
  "img",
  "input",
  "link",
  "meta",
  "source",
  "track",
  "wbr",
]);

const TAG_NAME = /^[A-Za-z][A-Za-z0-9-]*$/;
const ATTRIBUTE_NAME = /^[A-Za-z_:][A-Za-z0-9_.:-]*$/;

export function escapeText(value: string): string {
  return value.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

export function escapeAttribute(value: string): string {
  return escapeText(value).replace(/"/g, "&quot;");
}

export function isVoidElement(tag: string): boolean {
  return VOID_ELEMENTS.has(tag.toLowerCase());
}

export function assertTagName(tag: string): void {
  if (!TAG_NAME.test(tag)) throw new TypeError(`invalid tag name ${JSON.stringify(tag)}`);
}

export function assertAttributeName(name: string): void {
  if (!ATTRIBUTE_NAME.test(name)) {
    throw new TypeError(`invalid attribute name ${JSON.stringify(name)}`);
  }
}

export function assertChildrenAllowed(tag: string): void {
  if (isVoidElement(tag)) throw new TypeError(`<${tag}> is a void element and cannot have children`);
}

export function openTag(tag: string, attributes: Iterable<readonly [string, string]>): string {
  let out = `<${tag}`;
  for (const [name, value] of attributes) out += ` ${name}="${escapeAttribute(value)}"`;
  return `${out}>`;
}

/** Serialize a host tree. Keys and event bindings are not part of the markup. */
export function renderToString(node: Node): string {
  switch (node.kind) {
    case "text":
      return escapeText(node.value);
    case "fragment":
      return node.children.map(renderToString).join("");
    case "element": {
      assertTagName(node.tag);
      const names = Object.keys(node.attributes);
      for (const name of names) assertAttributeName(name);
      const open = openTag(
        node.tag,
        names.flatMap((name) => {
          const value = node.attributes[name];
          return value === undefined ? [] : [[name, value] as const];
        }),
      );
      if (isVoidElement(node.tag)) {
        if (node.children.length > 0) assertChildrenAllowed(node.tag);
        return open;
      }
      return `${open}${node.children.map(renderToString).join("")}</${node.tag}>`;
    }
  }
}
