/**
 * PartitionScanner - finds the date partitions of the raw record tree.
 *
 * A partition is complete once its date is strictly before today; today's
 * partition (and anything dated later, should the clock jump) may still
 * receive writes and is never handed to compaction. Directory names that do
 * not decode to a real date are skipped.
 */

import { Context, Effect, Layer } from "effect"
import * as path from "node:path"
import type { StorageError } from "../errors.js"
import {
  comparePartitions,
  isComplete,
  isValidPartition,
  parseSegment,
  partitionLabel,
  type PartitionField,
  type PartitionKey,
} from "../schema/Partition.js"
import { readDirectory } from "../utils/fs.js"
import { RawRecordStore } from "./RawRecordStore.js"

// ============================================
// Service Interface
// ============================================

export interface PartitionScannerShape {
  /**
   * Partitions dated before `today` that still hold raw record files,
   * in chronological order.
   */
  readonly completePartitions: (
    baseDir: string,
    today: Date
  ) => Effect.Effect<readonly PartitionKey[], StorageError>

  /**
   * Partitions dated `today` or later that hold raw record files.
   */
  readonly inProgressPartitions: (
    baseDir: string,
    today: Date
  ) => Effect.Effect<readonly PartitionKey[], StorageError>
}

export class PartitionScanner extends Context.Tag("PartitionScanner")<
  PartitionScanner,
  PartitionScannerShape
>() {}

// ============================================
// Live Implementation
// ============================================

interface SegmentDir {
  readonly value: number
  readonly dir: string
}

/**
 * Sub-directories of `dir` whose names decode as `field`.
 */
const segmentDirs = (dir: string, field: PartitionField) =>
  Effect.gen(function* () {
    const found: SegmentDir[] = []
    for (const entry of yield* readDirectory(dir)) {
      if (!entry.isDirectory()) continue
      const value = parseSegment(entry.name, field)
      if (value === null) {
        yield* Effect.logDebug(`Skipping malformed partition directory: ${path.join(dir, entry.name)}`)
        continue
      }
      found.push({ value, dir: path.join(dir, entry.name) })
    }
    return found
  })

export const PartitionScannerLive = Layer.effect(
  PartitionScanner,
  Effect.gen(function* () {
    const rawStore = yield* RawRecordStore

    /**
     * Every valid partition under `baseDir` that holds raw record files
     */
    const listPartitions = (baseDir: string) =>
      Effect.gen(function* () {
        const found: PartitionKey[] = []

        for (const year of yield* segmentDirs(baseDir, "year")) {
          for (const month of yield* segmentDirs(year.dir, "month")) {
            for (const day of yield* segmentDirs(month.dir, "day")) {
              const key: PartitionKey = { year: year.value, month: month.value, day: day.value }
              if (!isValidPartition(key)) {
                yield* Effect.logWarning(`Invalid partition date: ${partitionLabel(key)}`)
                continue
              }
              const files = yield* rawStore.listRecordFiles(day.dir)
              if (files.length > 0) {
                found.push(key)
              }
            }
          }
        }

        return found.sort(comparePartitions)
      })

    const impl: PartitionScannerShape = {
      completePartitions: (baseDir, today) =>
        listPartitions(baseDir).pipe(
          Effect.map((partitions) => partitions.filter((key) => isComplete(key, today)))
        ),

      inProgressPartitions: (baseDir, today) =>
        listPartitions(baseDir).pipe(
          Effect.map((partitions) => partitions.filter((key) => !isComplete(key, today)))
        ),
    }

    return impl
  })
)
