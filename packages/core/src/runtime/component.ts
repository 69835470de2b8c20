/**
 * packages/core/src/runtime/component.ts — Component definitions and component nodes.
 */

import { LoomError } from "../errors.js";
import type { ComponentNode, Key, ViewNode } from "../node/types.js";
import type { RenderContext } from "./hooks.js";

export type RenderFn<P> = (props: P, ctx: RenderContext) => ViewNode;

/**
 * A reusable component. Instances are matched across renders by definition
 * identity plus key or position, so define components once at module scope.
 */
export type ComponentDefinition<P> = Readonly<{
  name: string;
  render: RenderFn<P>;
}>;

export function defineComponent<P = undefined>(spec: {
  name: string;
  render: RenderFn<P>;
}): ComponentDefinition<P> {
  if (typeof spec.name !== "string" || spec.name.length === 0) {
    throw new LoomError("LOOM_INVALID_CONFIG", "defineComponent: name must be a non-empty string");
  }
  if (typeof spec.render !== "function") {
    throw new LoomError("LOOM_INVALID_CONFIG", `defineComponent(${spec.name}): render must be a function`);
  }
  return Object.freeze({ name: spec.name, render: spec.render });
}

/** Create a component node. `key` also becomes the key of the output root when it has none. */
export function component<P>(definition: ComponentDefinition<P>, props: P, key?: Key): ComponentNode {
  const base = {
    kind: "component" as const,
    definition,
    props,
    invoke: (ctx: RenderContext) => definition.render(props, ctx),
  };
  return Object.freeze(key === undefined ? base : { ...base, key });
}
