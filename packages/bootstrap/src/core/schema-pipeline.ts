import fs from "node:fs"
import path from "node:path"
import { type ConfigMapping, type PlaceholderEnv, resolvePlaceholders } from "@keel/config"
import { takenKeys, type WriteErrorHandler } from "@keel/logger"
import type { DestinationStream } from "pino"
import { type Closable, closeAll, LoggingPipeline } from "./logging-pipeline"
import { type FormatterSpec, type HandlerSpec, parseLoggingSchema } from "./logging-schema"
import { LoggingSchemaError } from "./logging-schema-error"
import { type StandardStreams, StreamSet } from "./pipeline-streams"
import { readMapping } from "./section-values"

export type SchemaPipelineDeps = {
  streams: StandardStreams
  env: PlaceholderEnv
  /** Receives failures of file writers after the pipeline is built. */
  onWriteError?: WriteErrorHandler
}

/**
 * Builds a pipeline from a declarative logging section (one with `version`).
 *
 * Placeholders are resolved from the environment only and the parent
 * directory of every file handler is created before validation. Throws when
 * the section cannot be applied; nothing stays open in that case.
 */
export function buildSchemaPipeline(
  section: ConfigMapping,
  serviceName: string,
  deps: SchemaPipelineDeps,
): LoggingPipeline {
  const resolved = resolvePlaceholders(section, { root: null, env: deps.env })

  createHandlerDirectories(resolved)

  const schema = parseLoggingSchema(resolved)
  const set = new StreamSet(deps.onWriteError)

  try {
    for (const name of schema.root.handlers) {
      const handler = schema.handlers[name]

      if (!handler) {
        throw new LoggingSchemaError(`Root logger uses unknown handler "${name}"`, {
          code: "logging_handler_unknown",
          context: { handler: name },
        })
      }

      const formatter = handler.formatter === undefined ? undefined : schema.formatters[handler.formatter]

      set.add(openHandler(handler, set, deps.streams), handler.level, templateOf(formatter))
    }

    const root = set.createRoot({ level: schema.root.level, service: serviceName })

    return new LoggingPipeline(serviceName, root, set.opened, takenKeys(), {
      root: schema.root.level,
      loggers: Object.fromEntries(
        Object.entries(schema.loggers).map(([name, spec]) => [name, spec.level]),
      ),
    })
  } catch (err) {
    releaseAfterFailure(set.opened, err)
  }
}

function openHandler(
  handler: HandlerSpec,
  set: StreamSet,
  streams: StandardStreams,
): DestinationStream {
  switch (handler.type) {
    case "console":
      return streams[handler.stream]
    case "file":
      return set.openFile(handler.filename)
    case "rotating_file":
      return set.openFile(handler.filename, handler.max_bytes, handler.backup_count)
  }
}

function templateOf(formatter: FormatterSpec | undefined): string | undefined {
  return formatter?.type === "text" ? formatter.format : undefined
}

function createHandlerDirectories(section: ConfigMapping): void {
  for (const spec of Object.values(readMapping(section.handlers))) {
    const filename = readMapping(spec).filename

    if (typeof filename === "string" && filename !== "") {
      fs.mkdirSync(path.dirname(path.resolve(filename)), { recursive: true })
    }
  }
}

function releaseAfterFailure(opened: readonly Closable[], err: unknown): never {
  try {
    closeAll(opened)
  } catch (closeErr) {
    throw new LoggingSchemaError("Failed to release writers of a partially built pipeline", {
      code: "logging_schema_invalid",
      context: { closeError: String(closeErr) },
      cause: err,
    })
  }

  throw err
}
