/**
 * packages/core/src/surface/hostTree.ts — Patch application against a target surface.
 *
 * Why: Patches address nodes by child-index paths. The host tree keeps a
 * mirror of surface handles so a path resolves without ever querying the
 * surface, and so the mirror records exactly the primitives that succeeded.
 *
 * Application rules:
 *   - Patches run strictly in list order
 *   - The first failing primitive (or unresolvable path) aborts the rest of
 *     the list; the failure is returned, never skipped
 *   - The mirror only reflects primitives that completed
 */

import { type Patch, type Path, formatPatch, formatPath } from "../diff/patch.js";
import { describeThrown } from "../errors.js";
import type { Node } from "../node/types.js";
import type { TargetSurface } from "./types.js";

type MirrorKind = Node["kind"] | "container";

type MirrorNode<H> = {
  kind: MirrorKind;
  handle: H;
  children: MirrorNode<H>[];
};

export type ApplyFailure = Readonly<{
  code: "LOOM_SURFACE_FAILURE" | "LOOM_INVALID_PATCH";
  detail: string;
  /** Index of the patch that failed. */
  patchIndex: number;
  /** Number of patches fully applied before the failure. */
  applied: number;
  cause?: unknown;
}>;

export type ApplyResult =
  | Readonly<{ ok: true; applied: number }>
  | Readonly<{ ok: false; failure: ApplyFailure }>;

export type HostTree<H> = Readonly<{
  surface: TargetSurface<H>;
  container: H;
  /** Handle of the node at `path`, if the mirror has one. */
  handleAt: (path: Path) => H | undefined;
  /** Handle of the mounted root (`[0]`), if any. */
  root: () => H | undefined;
  /** Materialize a detached subtree on the surface. */
  build: (node: Node) => H;
  apply: (patches: readonly Patch[]) => ApplyResult;
}>;

class InvalidPatch extends Error {}

/** Create a host tree whose container is the handle every path starts from. */
export function createHostTree<H>(surface: TargetSurface<H>, container: H): HostTree<H> {
  const rootMirror: MirrorNode<H> = { kind: "container", handle: container, children: [] };

  function resolve(path: Path): MirrorNode<H> {
    let cursor = rootMirror;
    for (const index of path) {
      const next = cursor.children[index];
      if (next === undefined) {
        throw new InvalidPatch(`no node at index ${String(index)} of ${formatPath(path)}`);
      }
      cursor = next;
    }
    return cursor;
  }

  function requireParent(target: MirrorNode<H>, patch: Patch): void {
    if (target.kind === "text") {
      throw new InvalidPatch(`${formatPatch(patch)}: target is a text node`);
    }
  }

  function requireElement(target: MirrorNode<H>, patch: Patch): void {
    if (target.kind !== "element") {
      throw new InvalidPatch(`${formatPatch(patch)}: target is not an element`);
    }
  }

  function requireIndex(index: number, upper: number, patch: Patch): void {
    if (!Number.isInteger(index) || index < 0 || index > upper) {
      throw new InvalidPatch(`${formatPatch(patch)}: index out of range 0..${String(upper)}`);
    }
  }

  function materialize(node: Node): MirrorNode<H> {
    switch (node.kind) {
      case "text":
        return { kind: "text", handle: surface.createText(node.value), children: [] };
      case "fragment": {
        const handle = surface.createFragment();
        const mirror: MirrorNode<H> = { kind: "fragment", handle, children: [] };
        appendChildren(mirror, node.children);
        return mirror;
      }
      case "element": {
        const handle = surface.createElement(node.tag);
        for (const name of Object.keys(node.attributes)) {
          const value = node.attributes[name];
          if (value !== undefined) surface.setAttribute(handle, name, value);
        }
        for (const name of Object.keys(node.events)) {
          const handler = node.events[name];
          if (handler !== undefined) surface.bindEvent(handle, name, handler);
        }
        const mirror: MirrorNode<H> = { kind: "element", handle, children: [] };
        appendChildren(mirror, node.children);
        return mirror;
      }
    }
  }

  function appendChildren(parent: MirrorNode<H>, children: readonly Node[]): void {
    for (const child of children) {
      const built = materialize(child);
      surface.insertChild(parent.handle, parent.children.length, built.handle);
      parent.children.push(built);
    }
  }

  function applyOne(patch: Patch): void {
    switch (patch.kind) {
      case "replaceNode": {
        const index = patch.path[patch.path.length - 1];
        if (index === undefined) {
          throw new InvalidPatch(`${formatPatch(patch)}: cannot replace the container`);
        }
        const parent = resolve(patch.path.slice(0, -1));
        if (parent.children[index] === undefined) {
          throw new InvalidPatch(`${formatPatch(patch)}: no node to replace`);
        }
        const built = materialize(patch.node);
        // Insert before removing: a failed replace leaves the old node in place.
        surface.insertChild(parent.handle, index, built.handle);
        try {
          surface.removeChild(parent.handle, index + 1);
        } catch (err: unknown) {
          try {
            surface.removeChild(parent.handle, index);
          } catch (rollbackErr: unknown) {
            // Both nodes stay on the surface; the mirror follows it.
            parent.children.splice(index, 0, built);
            throw new AggregateError([err, rollbackErr], "replace and its rollback both failed");
          }
          throw err;
        }
        parent.children.splice(index, 1, built);
        return;
      }
      case "updateText": {
        const target = resolve(patch.path);
        if (target.kind !== "text") {
          throw new InvalidPatch(`${formatPatch(patch)}: target is not a text node`);
        }
        surface.setText(target.handle, patch.value);
        return;
      }
      case "setAttribute": {
        const target = resolve(patch.path);
        requireElement(target, patch);
        surface.setAttribute(target.handle, patch.name, patch.value);
        return;
      }
      case "removeAttribute": {
        const target = resolve(patch.path);
        requireElement(target, patch);
        surface.removeAttribute(target.handle, patch.name);
        return;
      }
      case "updateEventBinding": {
        const target = resolve(patch.path);
        requireElement(target, patch);
        surface.bindEvent(target.handle, patch.name, patch.handler);
        return;
      }
      case "insertChildAt": {
        const target = resolve(patch.path);
        requireParent(target, patch);
        requireIndex(patch.index, target.children.length, patch);
        const built = materialize(patch.node);
        surface.insertChild(target.handle, patch.index, built.handle);
        target.children.splice(patch.index, 0, built);
        return;
      }
      case "removeChildAt": {
        const target = resolve(patch.path);
        requireParent(target, patch);
        requireIndex(patch.index, target.children.length - 1, patch);
        surface.removeChild(target.handle, patch.index);
        target.children.splice(patch.index, 1);
        return;
      }
      case "moveChild": {
        const target = resolve(patch.path);
        requireParent(target, patch);
        requireIndex(patch.from, target.children.length - 1, patch);
        requireIndex(patch.to, target.children.length - 1, patch);
        surface.moveChild(target.handle, patch.from, patch.to);
        const [moved] = target.children.splice(patch.from, 1);
        if (moved !== undefined) target.children.splice(patch.to, 0, moved);
        return;
      }
    }
  }

  function apply(patches: readonly Patch[]): ApplyResult {
    for (let i = 0; i < patches.length; i++) {
      const patch = patches[i];
      if (patch === undefined) continue;
      try {
        applyOne(patch);
      } catch (err: unknown) {
        return {
          ok: false,
          failure:
            err instanceof InvalidPatch
              ? { code: "LOOM_INVALID_PATCH", detail: err.message, patchIndex: i, applied: i }
              : {
                  code: "LOOM_SURFACE_FAILURE",
                  detail: `${formatPatch(patch)} failed: ${describeThrown(err)}`,
                  patchIndex: i,
                  applied: i,
                  cause: err,
                },
        };
      }
    }
    return { ok: true, applied: patches.length };
  }

  return Object.freeze({
    surface,
    container,
    handleAt: (path: Path) => {
      let cursor: MirrorNode<H> | undefined = rootMirror;
      for (const index of path) {
        cursor = cursor.children[index];
        if (cursor === undefined) return undefined;
      }
      return cursor.handle;
    },
    root: () => rootMirror.children[0]?.handle,
    build: (node: Node) => materialize(node).handle,
    apply,
  });
}

/** Apply `patches` to `host`. Same as `host.apply(patches)`. */
export function applyPatches<H>(host: HostTree<H>, patches: readonly Patch[]): ApplyResult {
  return host.apply(patches);
}
