/**
 * Effect services for the recorder.
 *
 * This module exports all service layers that can be composed
 * together for dependency injection using Effect's Layer system.
 */

export * from "./CommandRunner.js"
export * from "./MeasurementService.js"
export * from "./RawRecordStore.js"
export * from "./PartitionScanner.js"
export * from "./ArchiveStore.js"
export * from "./CompactionEngine.js"
export * from "./RecorderService.js"
