/**
 * Recorder configuration using Effect Config
 */
import { Config, Context, Layer, LogLevel } from "effect"

/**
 * Recorder configuration interface
 */
export interface RecorderConfig {
  readonly sleepSeconds: number
  readonly resultDir: string
  readonly uploadDir: string
  readonly locationId: string
  readonly speedtestCommand: string
  readonly speedtestFlags: readonly string[]
  readonly speedtestTimeoutSeconds: number
}

export type LogFormat = "json" | "logfmt" | "pretty"

export interface LoggingConfig {
  readonly level: LogLevel.LogLevel
  readonly format: LogFormat
}

/**
 * RecorderConfig service tag
 */
export class RecorderConfigService extends Context.Tag("RecorderConfigService")<
  RecorderConfigService,
  RecorderConfig
>() {}

/**
 * Default recorder configuration
 */
export const defaultConfig: RecorderConfig = {
  sleepSeconds: 5,
  resultDir: "./results",
  uploadDir: "./uploads",
  locationId: "unknown-location",
  speedtestCommand: "speedtest",
  speedtestFlags: ["--secure", "--json", "--bytes"],
  speedtestTimeoutSeconds: 0,
}

const nonNegative = (name: string) => ({
  message: `${name} must be zero or greater`,
  validation: (n: number) => n >= 0,
})

/**
 * Load recorder config from environment with defaults
 */
export const recorderConfig = Config.all({
  sleepSeconds: Config.integer("SLEEP_SECONDS").pipe(
    Config.withDefault(defaultConfig.sleepSeconds),
    Config.validate(nonNegative("SLEEP_SECONDS"))
  ),
  resultDir: Config.string("RESULT_DIR").pipe(
    Config.withDefault(defaultConfig.resultDir)
  ),
  uploadDir: Config.string("UPLOAD_DIR").pipe(
    Config.withDefault(defaultConfig.uploadDir)
  ),
  locationId: Config.string("SPEEDTEST_LOCATION_UUID").pipe(
    Config.withDefault(defaultConfig.locationId),
    Config.validate({
      message: "SPEEDTEST_LOCATION_UUID must be non-empty and contain no path separators",
      validation: (id) => id.length > 0 && !/[\\/]/.test(id),
    })
  ),
  speedtestCommand: Config.string("SPEEDTEST_COMMAND").pipe(
    Config.withDefault(defaultConfig.speedtestCommand)
  ),
  speedtestFlags: Config.string("SPEEDTEST_FLAGS").pipe(
    Config.map((raw) => raw.split(/\s+/).filter((flag) => flag.length > 0)),
    Config.withDefault(defaultConfig.speedtestFlags)
  ),
  speedtestTimeoutSeconds: Config.number("SPEEDTEST_TIMEOUT_SECONDS").pipe(
    Config.withDefault(defaultConfig.speedtestTimeoutSeconds),
    Config.validate(nonNegative("SPEEDTEST_TIMEOUT_SECONDS"))
  ),
})

/**
 * Logging configuration, read separately so the logger exists before any
 * service layer is built.
 */
export const loggingConfig = Config.all({
  level: Config.logLevel("LOG_LEVEL").pipe(Config.withDefault(LogLevel.Info)),
  format: Config.literal("json", "logfmt", "pretty")("LOG_FORMAT").pipe(
    Config.withDefault<LogFormat>("json")
  ),
})

/**
 * Recorder configuration layer
 */
export const RecorderConfigLive = Layer.effect(RecorderConfigService, recorderConfig)

/**
 * Fixed configuration, for tests and embedding
 */
export const RecorderConfigTest = (overrides: Partial<RecorderConfig> = {}) =>
  Layer.succeed(RecorderConfigService, { ...defaultConfig, ...overrides })
