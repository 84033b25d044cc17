import { BaseError } from "@keel/errors"

export type LoggingSchemaErrorCode =
  | "logging_schema_invalid"
  | "logging_handler_unknown"
  | "logging_formatter_unknown"

export class LoggingSchemaError extends BaseError<LoggingSchemaErrorCode> {}
