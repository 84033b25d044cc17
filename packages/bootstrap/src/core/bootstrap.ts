import { type ConfigMapping, ConfigStore, type ConfigStoreOptions } from "@keel/config"
import type { Logger } from "@keel/logger"
import type { DestinationStream } from "pino"
import { LoggingBridge } from "./logging-bridge"

export type BootstrapOptions = ConfigStoreOptions & {
  /** Logging section to apply instead of the `logging` configuration key. */
  logging?: ConfigMapping

  /** Overrides the service name found in configuration. */
  serviceName?: string

  /** Replaces stdout for console writers. */
  destination?: DestinationStream

  /** Receives logging schema failures. */
  fallbackLogger?: Logger
}

export type Bootstrapped = {
  config: ConfigStore
  logging: LoggingBridge
  /** The service logger. */
  logger: Logger
}

/**
 * Loads configuration, then starts logging from it.
 *
 * Configuration problems never throw here: bad files are skipped with a
 * warning and an unusable logging section falls back to the default
 * pipeline.
 */
export async function bootstrap(options: BootstrapOptions = {}): Promise<Bootstrapped> {
  const { logging: section, serviceName, destination, fallbackLogger, ...storeOptions } = options

  const config = new ConfigStore(storeOptions)
  await config.load()

  const logging = new LoggingBridge({
    config,
    ...(destination && { destination }),
    ...(fallbackLogger && { fallbackLogger }),
    ...(storeOptions.env && { env: storeOptions.env }),
  })
  logging.apply(section, serviceName)

  return { config, logging, logger: logging.getLogger() }
}
