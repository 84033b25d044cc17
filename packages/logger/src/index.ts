export {
  ConsoleLogger,
  type ConsoleLoggerDeps,
  type ConsoleWriter,
  createConsoleLogger,
} from "./adapters/console/console-logger"
export {
  RotatingFileDestination,
  type RotatingFileOptions,
  type WriteErrorHandler,
} from "./adapters/file/rotating-file-destination"
export { PrettyDestination } from "./adapters/pino/pretty-destination"
export { structuredPinoOptions } from "./adapters/pino/structured-options"
export { renderTemplate, TemplateDestination } from "./adapters/template/template-destination"
export { isLogLevelName, parseLogLevel, toLogLevelName } from "./core/parse-log-level"
export { guardFields, stripUndefined, takenKeys } from "./core/record-fields"
export type { LogContext, LogContextPatch, LogEvent, LogMeta } from "./ports/log-context"
export { LEVEL_SEVERITY, type LogLevel, type LogLevelName, LogLevels, logLevelNames } from "./ports/log-level"
export type { Logger } from "./ports/logger"
export type { LoggerOptions } from "./ports/logger-options"
export {
  RESERVED_FIELDS,
  type ReservedField,
  type StructuredRecord,
} from "./ports/structured-record"
