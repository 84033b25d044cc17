import type { LogLevelName } from "@keel/logger"
import type { Logger as PinoBase } from "pino"

export interface Closable {
  close(): void
}

export type PipelineLevels = {
  root: LogLevelName
  /** Per-logger minimums, keyed by full dotted logger name. */
  loggers?: Readonly<Record<string, LogLevelName>>
}

/**
 * One installed set of writers plus the pino logger feeding them.
 *
 * Named loggers are pino children created on first use and cached. Only the
 * writers handed in at construction are closed by `close()`.
 */
export class LoggingPipeline {
  private readonly children = new Map<string, PinoBase>()
  private closed = false

  constructor(
    readonly serviceName: string,
    private readonly root: PinoBase,
    private readonly writers: readonly Closable[],
    readonly taken: ReadonlySet<string>,
    private readonly levels: PipelineLevels,
  ) {}

  /** `<service>.<name>`, or the service logger when `name` is empty. */
  fullName(name?: string): string {
    return name ? `${this.serviceName}.${name}` : this.serviceName
  }

  loggerFor(name?: string): PinoBase {
    const full = this.fullName(name)
    let child = this.children.get(full)

    if (!child) {
      child = this.root.child({ logger: full }, { level: this.levelFor(full) })
      this.children.set(full, child)
    }

    return child
  }

  /** The most specific `loggers` entry matching `name` or one of its parents. */
  levelFor(name: string): LogLevelName {
    let best: { length: number; level: LogLevelName } | undefined

    for (const [prefix, level] of Object.entries(this.levels.loggers ?? {})) {
      const matches = name === prefix || name.startsWith(`${prefix}.`)

      if (matches && (!best || prefix.length > best.length)) {
        best = { length: prefix.length, level }
      }
    }

    return best?.level ?? this.levels.root
  }

  close(): void {
    if (this.closed) return
    this.closed = true

    closeAll(this.writers)
  }
}

/**
 * Closes every writer even when one throws; the first failure is rethrown
 * once all have been attempted.
 */
export function closeAll(writers: readonly Closable[]): void {
  let failure: { err: unknown } | undefined

  for (const writer of writers) {
    try {
      writer.close()
    } catch (err) {
      failure ??= { err }
    }
  }

  if (failure) throw failure.err
}
