import type { IConfig } from "../ports/config"

/** Frozen settings plus the name of the source behind each top-level key. */
export class Config<T extends Record<string, unknown>> implements IConfig<T> {
  private readonly data: Readonly<T>

  constructor(
    data: T,
    private readonly provenance: ReadonlyMap<string, string>,
    private readonly suppliedKeys: readonly string[],
  ) {
    this.data = Object.freeze(data)
  }

  get value(): T {
    return this.data
  }

  get<K extends keyof T & string>(key: K): T[K] {
    return this.data[key]
  }

  keys(): (keyof T & string)[] {
    return Object.keys(this.data).filter((k): k is keyof T & string => Object.hasOwn(this.data, k))
  }

  explain<K extends keyof T & string>(key: K): string {
    return this.provenance.get(key) ?? "default"
  }

  sourcesUsed(): string[] {
    return [...new Set(this.provenance.values())]
  }

  unknownKeys(): string[] {
    return this.suppliedKeys.filter((k) => !Object.hasOwn(this.data, k))
  }
}
