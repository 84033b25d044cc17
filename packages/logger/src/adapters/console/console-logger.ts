import { serializeError } from "@keel/errors"
import { guardFields, stripUndefined, takenKeys } from "../../core/record-fields"
import type { LogContext, LogContextPatch, LogMeta } from "../../ports/log-context"
import { LEVEL_SEVERITY, type LogLevelName } from "../../ports/log-level"
import type { Logger } from "../../ports/logger"
import type { LoggerOptions } from "../../ports/logger-options"

export type ConsoleWriter = Pick<Console, "trace" | "debug" | "info" | "warn" | "error">

export type ConsoleLoggerDeps = {
  console?: ConsoleWriter
}

type ConsoleMethod = "trace" | "debug" | "info" | "warn" | "error"

const LEVEL_TO_CONSOLE_METHOD: Record<LogLevelName, ConsoleMethod> = {
  trace: "trace",
  debug: "debug",
  info: "info",
  warn: "warn",
  error: "error",
  fatal: "error",
}

/**
 * Dependency-free logger writing the structured record through `console`.
 *
 * Used as the basic fallback while no pino pipeline exists (schema failures,
 * configuration load warnings).
 */
export class ConsoleLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  private readonly sink: ConsoleWriter
  private readonly opts: Partial<LoggerOptions>
  private readonly context: Record<string, unknown>
  private readonly taken: ReadonlySet<string>

  constructor(
    private readonly deps: ConsoleLoggerDeps = {},
    opts: Partial<LoggerOptions> = {},
    context: LogContextPatch = {},
  ) {
    this.sink = deps.console ?? globalThis.console
    this.opts = opts
    this.taken = takenKeys(opts.staticFields)
    this.context = guardFields(context, this.taken)
  }

  child<U extends LogContextPatch>(context: U): Logger<TContext & U> {
    return new ConsoleLogger<TContext & U>(this.deps, this.opts, {
      ...this.context,
      ...stripUndefined(context),
    })
  }

  trace(message: string, meta?: LogMeta<TContext>): void {
    this.write("trace", message, meta)
  }

  debug(message: string, meta?: LogMeta<TContext>): void {
    this.write("debug", message, meta)
  }

  info(message: string, meta?: LogMeta<TContext>): void {
    this.write("info", message, meta)
  }

  warn(message: string, meta?: LogMeta<TContext>): void {
    this.write("warn", message, meta)
  }

  error(message: string, meta?: LogMeta<TContext>): void {
    this.write("error", message, meta)
  }

  fatal(message: string, meta?: LogMeta<TContext>): void {
    this.write("fatal", message, meta)
  }

  private shouldLog(level: LogLevelName): boolean {
    const min = this.opts.level ?? "info"
    return LEVEL_SEVERITY[level] >= LEVEL_SEVERITY[min]
  }

  private write(level: LogLevelName, message: string, meta?: LogMeta<TContext>) {
    if (!this.shouldLog(level)) return

    const payload: Record<string, unknown> = {
      timestamp: new Date().toISOString(),
      level: level.toUpperCase(),
      ...(this.opts.name !== undefined && { logger: this.opts.name }),
      ...(this.opts.service !== undefined && { service: this.opts.service }),
      message,
      ...guardFields(this.opts.staticFields ?? {}),
      ...this.context,
      ...(meta ? guardFields(meta, this.taken) : {}),
    }

    if (payload.err instanceof Error) {
      payload.err = serializeError(payload.err, { includeStack: true })
    }

    const output = this.opts.prettify ? formatPretty(payload) : safeStringify(payload)

    this.sink[LEVEL_TO_CONSOLE_METHOD[level]](output)
  }
}

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value)
  } catch {
    return JSON.stringify({ message: "Failed to stringify log payload" })
  }
}

function formatPretty(payload: Record<string, unknown>): string {
  const { timestamp, level, logger, message, err, ...rest } = payload

  const errorObj: Record<string, unknown> | undefined =
    typeof err === "object" && err !== null ? { ...err } : undefined
  const stack = typeof errorObj?.stack === "string" ? errorObj.stack : undefined

  if (errorObj && stack) {
    const { stack: _, ...errWithoutStack } = errorObj
    rest.err = errWithoutStack
  } else if (err !== undefined) {
    rest.err = err
  }

  const scope = typeof logger === "string" ? ` [${logger}]` : ""
  const tail = Object.keys(rest).length ? ` ${safeStringify(rest)}` : ""
  const line = `${String(timestamp)} ${String(level)}${scope} ${String(message)}${tail}`

  if (!stack) return line

  const indentedStack = stack
    .split("\n")
    .map((l) => `  ${l}`)
    .join("\n")

  return `${line}\n${indentedStack}`
}

export function createConsoleLogger<TContext extends LogContext = LogContext>(
  deps: ConsoleLoggerDeps = {},
  opts: Partial<LoggerOptions> = {},
): Logger<TContext> {
  return new ConsoleLogger<TContext>(deps, opts)
}
