/**
 * MeasurementService - runs the speedtest CLI and turns its JSON output into
 * one flat record.
 *
 * Provides:
 * - Invocation with secure transport, JSON output and byte units
 * - Validation of the fields the recorder relies on
 * - Float rounding (coordinates and distance excepted)
 * - Flattening of nested objects into `{parent}_{child}` columns
 *
 * There are no retries here; the recorder loop decides what happens next.
 */

import { Context, Effect, Layer, Schema } from "effect"
import { RecorderConfigService } from "../config/RecorderConfig.js"
import { MeasurementError } from "../errors.js"
import {
  SpeedtestOutput,
  flattenRecord,
  isJsonObject,
  roundRecord,
  type FlatRecord,
} from "../schema/Record.js"
import { CommandRunner } from "./CommandRunner.js"

// ============================================
// Helper Functions
// ============================================

const toMbps = (bitsPerSecond: number): number => Math.round((bitsPerSecond / 1_000_000) * 100) / 100

/**
 * Parse and validate the CLI's stdout.
 */
export const parseSpeedtestOutput = (
  stdout: string
): Effect.Effect<Record<string, unknown>, MeasurementError> =>
  Effect.gen(function* () {
    if (stdout.trim().length === 0) {
      return yield* Effect.fail(new MeasurementError("empty_output", "Speedtest produced no output"))
    }

    const data = yield* Effect.try({
      try: (): unknown => JSON.parse(stdout),
      catch: (e) => new MeasurementError("parse", `JSON parse error: ${e}`, e),
    })

    if (!isJsonObject(data)) {
      return yield* Effect.fail(new MeasurementError("parse", "Speedtest output is not a JSON object"))
    }

    yield* Schema.decodeUnknown(SpeedtestOutput)(data).pipe(
      Effect.mapError((e) => new MeasurementError("schema", `Unexpected speedtest output: ${e.message}`, e))
    )

    return data
  })

// ============================================
// Service Interface
// ============================================

export interface MeasurementServiceShape {
  /**
   * Run one measurement and return it as a flat record
   */
  readonly run: () => Effect.Effect<FlatRecord, MeasurementError>
}

// ============================================
// Service Tag
// ============================================

export class MeasurementService extends Context.Tag("MeasurementService")<
  MeasurementService,
  MeasurementServiceShape
>() {}

// ============================================
// Live Implementation
// ============================================

export const MeasurementServiceLive = Layer.effect(
  MeasurementService,
  Effect.gen(function* () {
    const runner = yield* CommandRunner
    const config = yield* RecorderConfigService

    const command: readonly [string, ...string[]] = [config.speedtestCommand, ...config.speedtestFlags]

    const impl: MeasurementServiceShape = {
      run: () =>
        Effect.gen(function* () {
          yield* Effect.logInfo(`Running speedtest with flags: ${config.speedtestFlags.join(" ")}`)

          const { stdout, stderr, code } = yield* runner.run(command, config.speedtestTimeoutSeconds).pipe(
            Effect.mapError((e) => new MeasurementError(e.type, e.message, e))
          )

          if (code !== 0) {
            yield* Effect.logError(`Speedtest failed with error: ${stderr.trim() || `exit code ${code}`}`)
            return yield* Effect.fail(
              new MeasurementError("exit_code", `Speedtest exited with code ${code}`, stderr)
            )
          }

          const data = yield* parseSpeedtestOutput(stdout)
          const record = flattenRecord(roundRecord(data))

          const download = record["download"]
          const upload = record["upload"]
          if (typeof download === "number" && typeof upload === "number") {
            yield* Effect.logInfo(
              `Speedtest complete: ${toMbps(download)} Mbps down, ${toMbps(upload)} Mbps up, ${record["ping"]}ms ping`
            )
          }

          return record
        }),
    }

    return impl
  })
)
