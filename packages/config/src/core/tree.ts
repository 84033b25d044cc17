import { type ConfigMapping, type ConfigValue, isConfigMapping } from "../ports/config-tree"

export type PathLookup = { found: true; value: ConfigValue } | { found: false }

const INDEX = /^\d+$/

/**
 * Converts parser output into a config tree: dates become ISO strings,
 * bigints become numbers when safe, null-prototype objects become plain ones.
 */
export function toConfigValue(raw: unknown): ConfigValue {
  if (raw === null || raw === undefined) return null

  switch (typeof raw) {
    case "string":
    case "number":
    case "boolean":
      return raw
    case "bigint":
      return Number.isSafeInteger(Number(raw)) ? Number(raw) : raw.toString()
    case "object":
      break
    default:
      return String(raw)
  }

  if (raw instanceof Date) return raw.toISOString()
  if (Array.isArray(raw)) return raw.map(toConfigValue)

  const out: ConfigMapping = {}

  for (const [key, value] of Object.entries(raw)) {
    assignKey(out, key, toConfigValue(value))
  }

  return out
}

/**
 * Sets an own enumerable property. Unlike `target[key] = value` this keeps a
 * `__proto__` key as data instead of replacing the prototype.
 */
export function assignKey(target: ConfigMapping, key: string, value: ConfigValue): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true })
}

export function cloneValue<V extends ConfigValue>(value: V): V {
  return structuredClone(value)
}

/**
 * Walks `path` segment by segment. Mappings are entered by key, sequences by
 * a non-negative integer segment. The empty path addresses `root` itself.
 */
export function lookupPath(root: ConfigValue, path: string): PathLookup {
  return walk(root, path, true)
}

/**
 * Like `lookupPath`, but only mappings are entered: a sequence on the way
 * ends the walk as not found.
 */
export function lookupKeyPath(root: ConfigValue, path: string): PathLookup {
  return walk(root, path, false)
}

function walk(root: ConfigValue, path: string, indexSequences: boolean): PathLookup {
  if (path === "") return { found: true, value: root }

  let current: ConfigValue = root

  for (const segment of path.split(".")) {
    if (Array.isArray(current)) {
      if (!indexSequences) return { found: false }
      if (!INDEX.test(segment)) return { found: false }

      const item = current[Number(segment)]
      if (item === undefined) return { found: false }
      current = item
    } else if (isConfigMapping(current)) {
      const child = current[segment]
      if (child === undefined || !Object.hasOwn(current, segment)) return { found: false }
      current = child
    } else {
      return { found: false }
    }
  }

  return { found: true, value: current }
}

/** Writes `value` at `path`, replacing any non-mapping on the way with `{}`. */
export function setPath(root: ConfigMapping, path: string, value: ConfigValue): void {
  const segments = path.split(".")
  const last = segments.pop() ?? ""
  let current = root

  for (const segment of segments) {
    let next = current[segment]

    if (!isConfigMapping(next) || !Object.hasOwn(current, segment)) {
      next = {}
      assignKey(current, segment, next)
    }

    current = next
  }

  assignKey(current, last, value)
}
