import { type ZodType, z } from "zod"
import { EnvSource } from "../adapters/env/env-source"
import type { IConfig } from "../ports/config"
import type { ConfigMapping } from "../ports/config-tree"
import type { ConfigSource } from "../ports/source"
import { Config } from "./config"
import { ConfigError } from "./config-error"
import { mergeTrees } from "./merge"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: ZodType<T>

  /** Lowest precedence first. @default [new EnvSource()] */
  sources?: readonly ConfigSource[]
}

/**
 * Folds `sources` into one tree with `mergeTrees` and validates it.
 *
 * Mappings under the same key merge recursively; anything else is replaced
 * by the later source. Each top-level key is credited to the last source
 * that supplied it.
 */
export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources = [new EnvSource()],
}: LoadConfigOptions<T>): Promise<IConfig<T>> {
  const merged: ConfigMapping = {}
  const provenance = new Map<string, string>()

  for (const source of sources) {
    const fragment = await source.load()

    mergeTrees(merged, fragment)
    for (const key of Object.keys(fragment)) provenance.set(key, source.name)
  }

  const result = schema.safeParse(merged)

  if (!result.success) {
    throw new ConfigError(`Settings failed validation:\n${z.prettifyError(result.error)}`, {
      code: "config_validation_failed",
      context: {
        sources: sources.map((s) => s.name),
        paths: result.error.issues.map((issue) => issue.path.join(".")),
      },
      cause: result.error,
    })
  }

  return new Config(result.data, provenance, Object.keys(merged))
}
