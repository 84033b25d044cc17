import type { ConfigSource } from "../../ports/source"

type EnvValues = Record<string, string>

export type EnvSourceOptions = {
  prefix?: string
  env?: Record<string, string | undefined>

  /**
   * Restricts the source to these keys. Each key `k` is read from the
   * variable `${prefix}${k}` upper-cased and reported under `k` itself.
   */
  keys?: readonly string[]
}

export class EnvSource implements ConfigSource {
  readonly name = "env"
  private readonly prefix: string
  private readonly env: Record<string, string | undefined>
  private readonly keys?: readonly string[] | undefined

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix ?? ""
    this.env = options.env ?? process.env
    this.keys = options.keys
  }

  /** Unset variables are left out. */
  async load(): Promise<EnvValues> {
    if (this.keys) return this.pick(this.keys)

    const filtered: EnvValues = {}

    for (const [key, value] of Object.entries(this.env)) {
      if (value !== undefined && key.startsWith(this.prefix)) {
        filtered[key.slice(this.prefix.length)] = value
      }
    }

    return filtered
  }

  private pick(keys: readonly string[]): EnvValues {
    const picked: EnvValues = {}

    for (const key of keys) {
      const value = this.env[`${this.prefix}${key}`.toUpperCase()]

      if (value !== undefined) {
        picked[key] = value
      }
    }

    return picked
  }
}
