/**
 * packages/node/src/env.ts — Process environment switches.
 *
 * LOOM_DEV ("1"/"true"/"0"/"false") overrides NODE_ENV for dev diagnostics.
 */

export type ProcessEnv = Readonly<Record<string, string | undefined>>;

function parseFlag(value: string | undefined): boolean | null {
  if (value === undefined) return null;
  switch (value.trim().toLowerCase()) {
    case "1":
    case "true":
    case "yes":
    case "on":
      return true;
    case "0":
    case "false":
    case "no":
    case "off":
    case "":
      return false;
    default:
      return null;
  }
}

/** Dev mode from the environment: LOOM_DEV first, then `NODE_ENV !== "production"`. */
export function readDevMode(env: ProcessEnv = process.env): boolean {
  const explicit = parseFlag(env.LOOM_DEV);
  if (explicit !== null) return explicit;
  return (env.NODE_ENV ?? "development") !== "production";
}
