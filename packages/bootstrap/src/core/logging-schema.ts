import { type LogLevelName, toLogLevelName } from "@keel/logger"
import { z } from "zod"
import { LoggingSchemaError } from "./logging-schema-error"

export const DEFAULT_TEXT_FORMAT = "{timestamp} {level} [{logger}] {message}"

const level = z.string().transform((value, ctx): LogLevelName => {
  const name = toLogLevelName(value)

  if (!name) {
    ctx.issues.push({ code: "custom", message: `Unknown log level "${value}"`, input: value })
    return z.NEVER
  }

  return name
})

const count = z.coerce.number().int().nonnegative()

const formatter = z.discriminatedUnion("type", [
  z.object({ type: z.literal("json") }),
  z.object({ type: z.literal("text"), format: z.string().default(DEFAULT_TEXT_FORMAT) }),
])

const handlerBase = {
  formatter: z.string().optional(),
  level: level.optional(),
}

const handler = z.discriminatedUnion("type", [
  z.object({
    ...handlerBase,
    type: z.literal("console"),
    stream: z.enum(["stdout", "stderr"]).default("stdout"),
  }),
  z.object({
    ...handlerBase,
    type: z.literal("file"),
    filename: z.string().min(1),
  }),
  z.object({
    ...handlerBase,
    type: z.literal("rotating_file"),
    filename: z.string().min(1),
    max_bytes: count.default(0),
    backup_count: count.default(0),
  }),
])

export const loggingSchema = z.object({
  version: z.union([z.literal(1), z.literal("1")]),
  formatters: z.record(z.string(), formatter).default({}),
  handlers: z.record(z.string(), handler).default({}),
  root: z
    .object({
      level: level.default("info"),
      handlers: z.array(z.string()).default([]),
    })
    .default({ level: "info", handlers: [] }),
  loggers: z.record(z.string(), z.object({ level })).default({}),
})

export type LoggingSchema = z.infer<typeof loggingSchema>
export type FormatterSpec = z.infer<typeof formatter>
export type HandlerSpec = z.infer<typeof handler>

/**
 * Validates a declarative logging section, including the names handlers and
 * the root logger refer to.
 */
export function parseLoggingSchema(section: unknown): LoggingSchema {
  const result = loggingSchema.safeParse(section)

  if (!result.success) {
    throw new LoggingSchemaError(`Invalid logging schema:\n${z.prettifyError(result.error)}`, {
      code: "logging_schema_invalid",
      cause: result.error,
    })
  }

  const schema = result.data

  for (const [name, spec] of Object.entries(schema.handlers)) {
    if (spec.formatter !== undefined && !Object.hasOwn(schema.formatters, spec.formatter)) {
      throw new LoggingSchemaError(`Handler "${name}" uses unknown formatter "${spec.formatter}"`, {
        code: "logging_formatter_unknown",
        context: { handler: name, formatter: spec.formatter },
      })
    }
  }

  for (const name of schema.root.handlers) {
    if (!Object.hasOwn(schema.handlers, name)) {
      throw new LoggingSchemaError(`Root logger uses unknown handler "${name}"`, {
        code: "logging_handler_unknown",
        context: { handler: name },
      })
    }
  }

  return schema
}
