/**
 * packages/core/src/runtime/instance.ts — Component instance identifiers.
 *
 * Instance IDs index the component arena. They are never reused within a
 * root, so a stale ID can always be told apart from a live one.
 */

export type InstanceId = number;

export type InstanceIdAllocator = Readonly<{
  allocate: () => InstanceId;
}>;

export function createInstanceIdAllocator(start: InstanceId = 1): InstanceIdAllocator {
  let next = start;
  return Object.freeze({
    allocate: () => next++,
  });
}
