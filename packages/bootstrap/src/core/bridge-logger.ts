import {
  guardFields,
  type LogContext,
  type LogContextPatch,
  type Logger,
  type LogLevelName,
  type LogMeta,
  stripUndefined,
} from "@keel/logger"
import type { LoggingPipeline } from "./logging-pipeline"

export interface PipelineSource {
  ensureActive(): LoggingPipeline
}

/**
 * Logger handle that looks up the active pipeline on every call, so it keeps
 * working after the bridge is re-applied or reset.
 */
export class BridgeLogger<TContext extends LogContext = LogContext> implements Logger<TContext> {
  constructor(
    private readonly source: PipelineSource,
    private readonly name: string | undefined,
    private readonly context: Record<string, unknown> = {},
  ) {}

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

  child<U extends LogContextPatch>(context: U): Logger<TContext & U> {
    return new BridgeLogger<TContext & U>(this.source, this.name, {
      ...this.context,
      ...stripUndefined(context),
    })
  }

  private write(level: LogLevelName, message: string, meta?: LogMeta<TContext>): void {
    const pipeline = this.source.ensureActive()
    const fields = guardFields({ ...this.context, ...meta }, pipeline.taken)

    pipeline.loggerFor(this.name)[level](fields, message)
  }
}
