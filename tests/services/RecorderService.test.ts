import { describe, it, expect, beforeEach, afterEach } from "vitest"
import { existsSync, writeFileSync } from "node:fs"
import { join } from "node:path"
import { Deferred, Duration, Effect, Fiber, Layer, Ref, TestClock, TestContext } from "effect"
import { RecorderConfigTest } from "../../src/config/RecorderConfig.js"
import { MeasurementError } from "../../src/errors.js"
import type { FlatRecord } from "../../src/schema/index.js"
import {
  MeasurementService,
  PartitionScannerLive,
  RawRecordStoreLive,
  RecorderService,
  RecorderServiceLive,
  runForever,
} from "../../src/services/index.js"
import {
  CompactionLayer,
  QuietLogger,
  captureLogs,
  makeTempDir,
  rawCsv,
  removeDir,
  runTest,
  writeRawFile,
} from "../helpers/fixtures.js"

// ── Helpers ──────────────────────────────────────────────────

const measuring = (result: Effect.Effect<FlatRecord, MeasurementError>) =>
  Layer.succeed(MeasurementService, { run: () => result })

const failedMeasurement = Effect.fail(new MeasurementError("exit_code", "Speedtest exited with code 1"))

describe("RecorderService", () => {
  let root: string
  let results: string
  let uploads: string

  const recorderLayer = (measurement: Layer.Layer<MeasurementService>, resultDir = results) =>
    RecorderServiceLive.pipe(
      Layer.provide(CompactionLayer),
      Layer.provide(measurement),
      Layer.provide(PartitionScannerLive),
      Layer.provide(RawRecordStoreLive),
      Layer.provide(RecorderConfigTest({ resultDir, uploadDir: uploads, locationId: "loc1" }))
    )

  /** One iteration with the clock set to `instant` */
  const iterateAt = (instant: string, layer: Layer.Layer<RecorderService>) =>
    runTest(
      Effect.gen(function* () {
        yield* TestClock.setTime(Date.parse(instant))
        const recorder = yield* RecorderService
        const report = yield* recorder.runIteration()
        const stats = yield* recorder.getStats()
        return { report, stats }
      }).pipe(Effect.provide(layer), Effect.provide(TestContext.TestContext))
    )

  beforeEach(() => {
    root = makeTempDir()
    results = join(root, "results")
    uploads = join(root, "uploads")
  })

  afterEach(() => {
    removeDir(root)
  })

  it("compacts completed days even when the measurement fails", async () => {
    writeRawFile(results, "2025-01-20", "speedtest_08-00-00.csv", rawCsv({ download: "100", ping: "14" }))

    const { report, stats } = await iterateAt("2025-01-23T12:00:00Z", recorderLayer(measuring(failedMeasurement)))

    expect(report.measurement).toBe("measurement_failed")
    expect(report.recordPath).toBeNull()
    expect(report.compaction.compacted).toBe(1)
    expect(report.inProgress).toEqual([])
    expect(
      existsSync(join(uploads, "location=loc1", "year=2025", "month=01", "day=20", "speedtest_001.parquet"))
    ).toBe(true)
    expect(stats).toEqual({
      iterations: 1,
      measurements_succeeded: 0,
      measurements_failed: 1,
      records_written: 0,
      partitions_compacted: 1,
      partitions_failed: 0,
      last_measurement_time: null,
      last_error: "Speedtest exited with code 1",
    })
  })

  it("stores a measurement under its own timestamp", async () => {
    const record = { download: 100, upload: 10, ping: 14, timestamp: "2025-01-23T09:30:00Z" }

    const { report, stats } = await iterateAt(
      "2025-01-23T12:00:00Z",
      recorderLayer(measuring(Effect.succeed(record)))
    )

    const expectedPath = join(results, "year=2025", "month=01", "day=23", "speedtest_09-30-00.csv")
    expect(report.measurement).toBe("recorded")
    expect(report.recordPath).toBe(expectedPath)
    expect(existsSync(expectedPath)).toBe(true)
    expect(report.compaction).toEqual({ compacted: 0, empty: 0, failed: 0, results: [] })
    expect(report.inProgress).toEqual([{ year: 2025, month: 1, day: 23 }])
    expect(stats.records_written).toBe(1)
    expect(stats.last_measurement_time).toBe("2025-01-23T09:30:00.000Z")
  })

  it("falls back to the clock when the record has no timestamp", async () => {
    const { report } = await iterateAt(
      "2025-01-23T12:00:00Z",
      recorderLayer(measuring(Effect.succeed({ download: 100 })))
    )

    expect(report.recordPath).toBe(join(results, "year=2025", "month=01", "day=23", "speedtest_12-00-00.csv"))
  })

  it("reports a storage failure without failing the iteration", async () => {
    const blocker = join(root, "blocker")
    writeFileSync(blocker, "")

    const { report, stats } = await iterateAt(
      "2025-01-23T12:00:00Z",
      recorderLayer(measuring(Effect.succeed({ download: 100 })), join(blocker, "results"))
    )

    expect(report.measurement).toBe("storage_failed")
    expect(report.recordPath).toBeNull()
    expect(stats.measurements_succeeded).toBe(1)
    expect(stats.records_written).toBe(0)
    expect(stats.last_error?.startsWith("mkdir failed for")).toBe(true)
  })

  it("logs the partitions still receiving records", async () => {
    writeRawFile(results, "2025-01-24", "speedtest_00-10-00.csv", rawCsv({ download: "90" }))
    const record = { download: 100, timestamp: "2025-01-23T09:30:00Z" }
    const logs = captureLogs()

    const report = await Effect.runPromise(
      Effect.gen(function* () {
        yield* TestClock.setTime(Date.parse("2025-01-23T12:00:00Z"))
        const recorder = yield* RecorderService
        return yield* recorder.runIteration()
      }).pipe(
        Effect.provide(recorderLayer(measuring(Effect.succeed(record)))),
        Effect.provide(TestContext.TestContext),
        Effect.provide(logs.layer)
      )
    )

    expect(report.inProgress).toEqual([
      { year: 2025, month: 1, day: 23 },
      { year: 2025, month: 1, day: 24 },
    ])
    expect(logs.entries).toContainEqual({
      level: "INFO",
      message: "In progress: 2025-01-23, 2025-01-24",
      cause: null,
    })
  })

  it("compacts yesterday's records on the first iteration after midnight", async () => {
    const layer = recorderLayer(measuring(Effect.succeed({ download: 100 })))

    const reports = await runTest(
      Effect.gen(function* () {
        const recorder = yield* RecorderService
        yield* TestClock.setTime(Date.parse("2025-01-22T23:59:00Z"))
        const before = yield* recorder.runIteration()
        yield* TestClock.setTime(Date.parse("2025-01-23T00:00:30Z"))
        const after = yield* recorder.runIteration()
        return [before, after] as const
      }).pipe(Effect.provide(layer), Effect.provide(TestContext.TestContext))
    )

    const [before, after] = reports
    expect(before.compaction.compacted).toBe(0)
    expect(after.compaction.compacted).toBe(1)
    expect(after.recordPath).toBe(join(results, "year=2025", "month=01", "day=23", "speedtest_00-00-30.csv"))
    expect(existsSync(join(results, "year=2025", "month=01", "day=22", "speedtest_23-59-00.csv"))).toBe(false)
  })
})

describe("runForever", () => {
  it("keeps iterating after failures and defects", async () => {
    const calls = await Effect.runPromise(
      Effect.gen(function* () {
        const count = yield* Ref.make(0)
        const third = yield* Deferred.make<void>()

        const iteration = Ref.updateAndGet(count, (n) => n + 1).pipe(
          Effect.flatMap((n): Effect.Effect<void, string> => {
            if (n === 1) return Effect.die(new Error("unexpected"))
            if (n >= 3) return Deferred.succeed(third, undefined).pipe(Effect.zipRight(Effect.fail("still failing")))
            return Effect.fail("failing")
          })
        )

        const fiber = yield* Effect.fork(runForever(Duration.zero, iteration))
        yield* Deferred.await(third)
        yield* Fiber.interrupt(fiber)
        return yield* Ref.get(count)
      }).pipe(Effect.provide(QuietLogger))
    )

    expect(calls).toBeGreaterThanOrEqual(3)
  })
})
