import { type ConfigMapping, isConfigMapping } from "../ports/config-tree"
import { assignKey, cloneValue } from "./tree"

/**
 * Folds `update` into `base` in place and returns `base`.
 *
 * Two mappings under the same key merge recursively; any other pair is
 * replaced by the update side. Sequences are never concatenated.
 */
export function mergeTrees(base: ConfigMapping, update: ConfigMapping): ConfigMapping {
  for (const [key, value] of Object.entries(update)) {
    const existing = base[key]

    if (isConfigMapping(existing) && isConfigMapping(value) && Object.hasOwn(base, key)) {
      mergeTrees(existing, value)
    } else {
      assignKey(base, key, cloneValue(value))
    }
  }

  return base
}
