import type { ConfigValue } from "./config-tree"

/**
 * Read side of a configuration tree, addressed by dot paths (`database.host`,
 * `servers.0.port`).
 */
export interface ConfigReader {
  /**
   * Value at `path`, or `defaultValue` when a segment is missing, the walk
   * meets a scalar first, or the value found is `null`.
   */
  get(path: string): ConfigValue | undefined
  get<D>(path: string, defaultValue: D): ConfigValue | D

  /** True when every segment exists; a stored `null` counts as present. */
  has(path: string): boolean
}
