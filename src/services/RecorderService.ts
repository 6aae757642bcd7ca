/**
 * RecorderService - the measurement / storage / compaction loop.
 *
 * Each iteration:
 * - runs one measurement and, when it succeeds, stores the raw record
 * - compacts every complete partition, whatever the measurement outcome
 * - logs the partitions still receiving records
 *
 * `runForever` then sleeps for the configured interval and starts over.
 * Nothing that goes wrong inside an iteration ends the loop.
 */

import { Clock, Context, Duration, Effect, Either, Layer, Ref } from "effect"
import { RecorderConfigService } from "../config/RecorderConfig.js"
import { partitionLabel, type PartitionKey } from "../schema/Partition.js"
import { recordTimestamp } from "../schema/Record.js"
import { CompactionEngine, type CompactionSummary } from "./CompactionEngine.js"
import { MeasurementService } from "./MeasurementService.js"
import { PartitionScanner } from "./PartitionScanner.js"
import { RawRecordStore } from "./RawRecordStore.js"

// ============================================
// Types
// ============================================

export interface IterationReport {
  readonly measurement: "recorded" | "measurement_failed" | "storage_failed"
  readonly recordPath: string | null
  readonly compaction: CompactionSummary
  readonly inProgress: readonly PartitionKey[]
}

export interface RecorderStats {
  readonly iterations: number
  readonly measurements_succeeded: number
  readonly measurements_failed: number
  readonly records_written: number
  readonly partitions_compacted: number
  readonly partitions_failed: number
  readonly last_measurement_time: string | null
  readonly last_error: string | null
}

// ============================================
// Scheduling
// ============================================

/**
 * Run `iteration`, sleep for `interval`, repeat. Failures and defects of an
 * iteration are logged and never stop the loop.
 */
export const runForever = <A, E, R>(
  interval: Duration.DurationInput,
  iteration: Effect.Effect<A, E, R>
): Effect.Effect<never, never, R> => {
  const seconds = Duration.toSeconds(Duration.decode(interval))
  return Effect.gen(function* () {
    yield* iteration.pipe(Effect.catchAllCause((cause) => Effect.logError("Error occurred", cause)))
    yield* Effect.logInfo(`sleeping for ${seconds} seconds`)
    yield* Effect.sleep(interval)
  }).pipe(Effect.forever)
}

// ============================================
// Service Interface
// ============================================

export interface RecorderServiceShape {
  /**
   * One measurement + storage + compaction pass
   */
  readonly runIteration: () => Effect.Effect<IterationReport>

  /**
   * Loop `runIteration` at the configured interval until interrupted
   */
  readonly start: () => Effect.Effect<never>

  /**
   * Counters since the process started
   */
  readonly getStats: () => Effect.Effect<RecorderStats>
}

export class RecorderService extends Context.Tag("RecorderService")<
  RecorderService,
  RecorderServiceShape
>() {}

// ============================================
// Live Implementation
// ============================================

const initialStats: RecorderStats = {
  iterations: 0,
  measurements_succeeded: 0,
  measurements_failed: 0,
  records_written: 0,
  partitions_compacted: 0,
  partitions_failed: 0,
  last_measurement_time: null,
  last_error: null,
}

export const RecorderServiceLive = Layer.effect(
  RecorderService,
  Effect.gen(function* () {
    const config = yield* RecorderConfigService
    const measurement = yield* MeasurementService
    const rawStore = yield* RawRecordStore
    const compaction = yield* CompactionEngine
    const scanner = yield* PartitionScanner

    const statsRef = yield* Ref.make<RecorderStats>(initialStats)

    const now = Clock.currentTimeMillis.pipe(Effect.map((millis) => new Date(millis)))

    /**
     * Measure and store. Failures end up in the report, never in the error channel.
     */
    const recordMeasurement = Effect.gen(function* () {
      const measured = yield* Effect.either(measurement.run())

      if (Either.isLeft(measured)) {
        const error = measured.left
        yield* Effect.logError(`Measurement failed: ${error.message}`)
        yield* Ref.update(statsRef, (s) => ({
          ...s,
          measurements_failed: s.measurements_failed + 1,
          last_error: error.message,
        }))
        return { measurement: "measurement_failed", recordPath: null } as const
      }

      const record = measured.right
      const asOf = recordTimestamp(record) ?? (yield* now)
      yield* Ref.update(statsRef, (s) => ({
        ...s,
        measurements_succeeded: s.measurements_succeeded + 1,
        last_measurement_time: asOf.toISOString(),
      }))

      const stored = yield* Effect.either(rawStore.append(record, config.resultDir, asOf))
      if (Either.isLeft(stored)) {
        yield* Effect.logError(`Failed to store measurement: ${stored.left.message}`)
        yield* Ref.update(statsRef, (s) => ({ ...s, last_error: stored.left.message }))
        return { measurement: "storage_failed", recordPath: null } as const
      }

      yield* Ref.update(statsRef, (s) => ({ ...s, records_written: s.records_written + 1 }))
      return { measurement: "recorded", recordPath: stored.right } as const
    })

    const runIteration = () =>
      Effect.gen(function* () {
        yield* Ref.update(statsRef, (s) => ({ ...s, iterations: s.iterations + 1 }))

        const outcome = yield* recordMeasurement

        const today = yield* now
        const summary = yield* compaction.compactAll(
          config.resultDir,
          config.uploadDir,
          config.locationId,
          today
        )
        yield* Ref.update(statsRef, (s) => ({
          ...s,
          partitions_compacted: s.partitions_compacted + summary.compacted,
          partitions_failed: s.partitions_failed + summary.failed,
        }))
        if (summary.failed > 0) {
          yield* Effect.logWarning(`${summary.failed} partition(s) failed to compact; raw records kept for retry`)
        }

        const inProgress: readonly PartitionKey[] = yield* scanner.inProgressPartitions(config.resultDir, today).pipe(
          Effect.catchAll((error) =>
            Effect.logWarning(`Could not list in-progress partitions: ${error.message}`).pipe(Effect.as([]))
          )
        )
        if (inProgress.length > 0) {
          yield* Effect.logInfo(`In progress: ${inProgress.map(partitionLabel).join(", ")}`)
        }

        const report: IterationReport = { ...outcome, compaction: summary, inProgress }
        return report
      }).pipe(Effect.withLogSpan("iteration"))

    const impl: RecorderServiceShape = {
      runIteration,

      start: () =>
        Effect.gen(function* () {
          yield* Effect.logInfo(
            `Starting speedtest loop (interval ${config.sleepSeconds}s, results ${config.resultDir}, uploads ${config.uploadDir}, location ${config.locationId})`
          )
          return yield* runForever(Duration.seconds(config.sleepSeconds), runIteration())
        }),

      getStats: () => Ref.get(statsRef),
    }

    return impl
  })
)
