/**
 * packages/core/src/runtime/context.ts — Context values passed down the instance tree.
 *
 * A provider sets a value during its render; descendants read the value of
 * the nearest ancestor that provided it, or the context default.
 */

export type Context<T> = Readonly<{
  id: symbol;
  name: string;
  defaultValue: T;
}>;

export function createContext<T>(defaultValue: T, name = "Context"): Context<T> {
  return Object.freeze({ id: Symbol(`loom.context.${name}`), name, defaultValue });
}
