import type { ConfigMapping, ConfigValue } from "../ports/config-tree"
import { assignKey, lookupPath } from "./tree"

export type PlaceholderEnv = Readonly<Record<string, string | undefined>>

export type ResolveOptions = {
  /**
   * Tree consulted for dot-path references. Defaults to the value being
   * resolved; `null` restricts resolution to `env`.
   */
  root?: ConfigValue

  /** @default process.env */
  env?: PlaceholderEnv
}

const PLACEHOLDER = /\$\{([^}:]+)(?::([^}]*))?\}/g

/**
 * Rewrites `${NAME}` and `${NAME:DEFAULT}` in every string leaf.
 *
 * `NAME` is looked up as an environment key, then as a dot path into the root
 * tree, then the default applies, then the empty string. Substituted text is
 * not scanned again. Returns a new tree; the input is left untouched.
 */
export function resolvePlaceholders(value: ConfigMapping, options?: ResolveOptions): ConfigMapping
export function resolvePlaceholders(value: ConfigValue, options?: ResolveOptions): ConfigValue
export function resolvePlaceholders(value: ConfigValue, options: ResolveOptions = {}): ConfigValue {
  const root = options.root === undefined ? value : options.root
  const env = options.env ?? process.env

  return resolveValue(value, (name, fallback) => lookup(name, fallback, root, env))
}

type Lookup = (name: string, fallback: string | undefined) => string

function resolveValue(value: ConfigValue, find: Lookup): ConfigValue {
  if (typeof value === "string") {
    return value.replace(PLACEHOLDER, (_match, name: string, fallback: string | undefined) =>
      find(name, fallback),
    )
  }

  if (Array.isArray(value)) return value.map((item) => resolveValue(item, find))

  if (value !== null && typeof value === "object") {
    const out: ConfigMapping = {}

    for (const [key, child] of Object.entries(value)) {
      assignKey(out, key, resolveValue(child, find))
    }

    return out
  }

  return value
}

function lookup(
  name: string,
  fallback: string | undefined,
  root: ConfigValue,
  env: PlaceholderEnv,
): string {
  const fromEnv = Object.hasOwn(env, name) ? env[name] : undefined
  if (fromEnv !== undefined) return fromEnv

  if (root !== null) {
    const hit = lookupPath(root, name)
    if (hit.found && hit.value !== null) return stringify(hit.value)
  }

  return fallback ?? ""
}

function stringify(value: ConfigValue): string {
  if (typeof value === "string") return value
  if (typeof value === "object") return JSON.stringify(value)

  return String(value)
}
