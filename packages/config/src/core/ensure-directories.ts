import fs from "node:fs/promises"
import type { Logger } from "@keel/logger"
import { type ConfigValue, isConfigMapping } from "../ports/config-tree"

const DIRECTORY_KEY = /dir|path/i

/**
 * Collects the directories named under a `paths` subtree: string values whose
 * key mentions "dir" or "path", and string elements of sequences. Mappings are
 * walked; other sequence elements are not.
 */
export function collectDirectories(paths: ConfigValue | undefined): string[] {
  const out: string[] = []

  const walk = (node: ConfigValue | undefined): void => {
    if (Array.isArray(node)) {
      for (const item of node) {
        if (typeof item === "string") out.push(item)
      }
      return
    }

    if (!isConfigMapping(node)) return

    for (const [key, value] of Object.entries(node)) {
      if (typeof value === "string" && DIRECTORY_KEY.test(key)) {
        out.push(value)
      } else {
        walk(value)
      }
    }
  }

  walk(paths)

  return out
}

/**
 * Creates every directory `collectDirectories` finds, parents included.
 * Failures are logged and do not stop the remaining directories.
 */
export async function ensureDirectories(
  paths: ConfigValue | undefined,
  logger?: Logger,
): Promise<void> {
  for (const dir of collectDirectories(paths)) {
    if (dir === "") continue

    try {
      await fs.mkdir(dir, { recursive: true })
    } catch (err) {
      logger?.warn("Could not create configured directory", { dir, err })
    }
  }
}
