export { type Bootstrapped, type BootstrapOptions, bootstrap } from "./core/bootstrap"
export { BridgeLogger, type PipelineSource } from "./core/bridge-logger"
export {
  buildDefaultPipeline,
  DEFAULT_BACKUP_COUNT,
  DEFAULT_MAX_BYTES,
  type DefaultPipelineSettings,
  readDefaultSettings,
} from "./core/default-pipeline"
export { DEFAULT_SERVICE_NAME, LoggingBridge, type LoggingBridgeOptions } from "./core/logging-bridge"
export { type Closable, closeAll, LoggingPipeline, type PipelineLevels } from "./core/logging-pipeline"
export {
  DEFAULT_TEXT_FORMAT,
  type FormatterSpec,
  type HandlerSpec,
  type LoggingSchema,
  loggingSchema,
  parseLoggingSchema,
} from "./core/logging-schema"
export { LoggingSchemaError, type LoggingSchemaErrorCode } from "./core/logging-schema-error"
export { type StandardStreams, StreamSet, standardStreams } from "./core/pipeline-streams"
export { buildSchemaPipeline, type SchemaPipelineDeps } from "./core/schema-pipeline"
