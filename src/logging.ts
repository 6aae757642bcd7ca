/**
 * Logger layer: one structured line per log call on stdout.
 *
 * LOG_FORMAT picks the encoding (json by default), LOG_LEVEL the minimum level.
 */

import { Effect, Layer, Logger } from "effect"
import { loggingConfig, type LogFormat, type LoggingConfig } from "./config/RecorderConfig.js"

const formatLayer = (format: LogFormat): Layer.Layer<never> => {
  switch (format) {
    case "json":
      return Logger.json
    case "logfmt":
      return Logger.logFmt
    case "pretty":
      return Logger.pretty
  }
}

export const makeLoggingLayer = (config: LoggingConfig): Layer.Layer<never> =>
  Layer.merge(formatLayer(config.format), Logger.minimumLogLevel(config.level))

/**
 * Logging layer resolved from the environment
 */
export const LoggingLive = Layer.unwrapEffect(Effect.map(loggingConfig, makeLoggingLayer))
