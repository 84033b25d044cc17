import type { ConfigMapping } from "./config-tree"

/**
 * One place configuration fragments come from: a file in some format, a
 * `.env` file, the environment, or a literal object.
 *
 * A source only reads. Merging, placeholder resolution and validation happen
 * in whatever consumes it.
 */
export interface ConfigSource {
  /** `<kind>:<detail>`, e.g. `yaml:app.yaml`; reported by `explain()`. */
  readonly name: string

  /** A fresh fragment on every call; callers may mutate it. */
  load(): Promise<ConfigMapping>
}
