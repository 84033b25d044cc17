import type { Logger } from "@keel/logger"
import { isNotFoundError } from "../adapters/file/text-file-source"
import type { ConfigMapping } from "../ports/config-tree"
import { type DiscoveredFile, discoverConfigFiles } from "./discover"
import { loadConfigFile } from "./formats"
import { mergeTrees } from "./merge"
import { type PlaceholderEnv, resolvePlaceholders } from "./placeholders"

export type LoadConfigTreeOptions = {
  /** @default process.env */
  env?: PlaceholderEnv
  logger?: Logger
}

export type LoadedConfigTree = {
  tree: ConfigMapping
  /** File names that loaded, in merge order. */
  files: string[]
}

/**
 * Loads, merges and resolves every recognised file in `dir`.
 *
 * A missing or unreadable directory yields an empty tree. A file that fails
 * to parse is skipped with a warning; the rest still merge.
 */
export async function loadConfigTree(
  dir: string,
  options: LoadConfigTreeOptions = {},
): Promise<LoadedConfigTree> {
  const { logger } = options
  let discovered: DiscoveredFile[]

  try {
    discovered = await discoverConfigFiles(dir)
  } catch (err) {
    if (!isNotFoundError(err)) {
      logger?.warn("Configuration directory is unreadable, using an empty tree", { dir, err })
    }
    return { tree: {}, files: [] }
  }

  const merged: ConfigMapping = {}
  const files: string[] = []

  for (const file of discovered) {
    try {
      mergeTrees(merged, await loadConfigFile(file.path))
      files.push(file.name)
    } catch (err) {
      logger?.warn("Skipping configuration file", { file: file.path, format: file.format, err })
    }
  }

  const tree = resolvePlaceholders(merged, { root: merged, env: options.env ?? process.env })

  return { tree, files }
}
