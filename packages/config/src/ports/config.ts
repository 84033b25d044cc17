/**
 * Validated settings object with provenance.
 *
 * @example
 * ```typescript
 * const settings = await loadSettings({
 *   schema: z.object({
 *     port: z.coerce.number().default(3000),
 *     database_url: z.string(),
 *   }),
 *   dir: "config",
 *   envPrefix: "APP_",
 * })
 *
 * settings.get("port")           // 8080
 * settings.explain("port")       // "env"
 * settings.explain("database_url") // "yaml:settings.yaml"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  /** Full validated object */
  readonly value: T

  get<K extends keyof T & string>(key: K): T[K]

  keys(): (keyof T & string)[]

  /**
   * Name of the source that supplied the final value for a key, or "default"
   * when the schema filled it in.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Sources credited with at least one top-level key, each listed once. */
  sourcesUsed(): string[]

  /**
   * Keys present in sources but not defined in the schema.
   *
   * Useful for detecting typos and stale settings.
   */
  unknownKeys(): string[]
}
