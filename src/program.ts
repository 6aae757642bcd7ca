/**
 * The recorder program with every service layer wired in.
 *
 * Kept apart from the entry point so it can be run against a test config
 * provider and logger.
 */

import { Cause, Effect, Layer } from "effect"
import { RecorderConfigLive } from "./config/RecorderConfig.js"
import { LoggingLive } from "./logging.js"
import {
  ArchiveStoreLive,
  CommandRunnerLive,
  CompactionEngineLive,
  MeasurementServiceLive,
  PartitionScannerLive,
  RawRecordStoreLive,
  RecorderService,
  RecorderServiceLive,
} from "./services/index.js"

// Storage layers
const StorageLayer = Layer.mergeAll(RawRecordStoreLive, ArchiveStoreLive)

// The scanner reads through the raw store
const ScannerLayer = PartitionScannerLive.pipe(Layer.provide(StorageLayer))

// Compaction depends on both stores and the scanner
const CompactionLayer = CompactionEngineLive.pipe(
  Layer.provide(ScannerLayer),
  Layer.provide(StorageLayer)
)

// Measurement depends on the command runner and config
const MeasurementLayer = MeasurementServiceLive.pipe(Layer.provide(CommandRunnerLive))

// Recorder service layer with all dependencies
export const RecorderLayer = RecorderServiceLive.pipe(
  Layer.provide(CompactionLayer),
  Layer.provide(MeasurementLayer),
  Layer.provide(ScannerLayer),
  Layer.provide(StorageLayer),
  Layer.provide(RecorderConfigLive)
)

/**
 * Run the recorder loop until interrupted.
 *
 * Failures are logged after the layers are released, so a config error
 * raised while building them is reported as well.
 */
export const program = Effect.gen(function* () {
  const recorder = yield* RecorderService
  return yield* recorder.start()
}).pipe(
  Effect.onInterrupt(() => Effect.logWarning("interrupt signal received, exiting gracefully")),
  Effect.provide(RecorderLayer),
  Effect.provide(LoggingLive),
  Effect.tapErrorCause((cause) =>
    Cause.isInterruptedOnly(cause) ? Effect.void : Effect.logError("Recorder stopped", cause)
  )
)
