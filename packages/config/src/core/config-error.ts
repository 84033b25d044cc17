import { BaseError } from "@keel/errors"

export type ConfigErrorCode =
  | "config_unsupported_format"
  | "config_parse_failed"
  | "config_not_a_mapping"
  | "config_validation_failed"

export class ConfigError extends BaseError<ConfigErrorCode> {}
