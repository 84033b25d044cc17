import type { ConfigMapping } from "../../ports/config-tree"
import type { ConfigSource } from "../../ports/source"
import { cloneValue } from "../../core/tree"

/** Literal values, e.g. programmatic overrides. Each load hands out a deep copy. */
export class ObjectSource implements ConfigSource {
  constructor(
    private readonly values: ConfigMapping,
    readonly name: string = "object:overrides",
  ) {}

  async load(): Promise<ConfigMapping> {
    return cloneValue(this.values)
  }
}
