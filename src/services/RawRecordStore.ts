/**
 * RawRecordStore - one CSV file per measurement run, under a date-keyed
 * directory tree.
 *
 * Layout: `<base>/year=YYYY/month=MM/day=DD/speedtest_HH-MM-SS.csv`, one
 * header row and one data row per file. Columns are written in sorted order
 * so files of the same partition line up.
 */

import { Context, Effect, Layer } from "effect"
import * as path from "node:path"
import { decodeCsv, encodeCsv } from "../codec/csv.js"
import { StorageError } from "../errors.js"
import {
  RECORD_FILE_PATTERN,
  partitionOf,
  rawPartitionDir,
  recordFileName,
  type FlatRecord,
  type RecordTable,
} from "../schema/index.js"
import { makeDirectory, readDirectory, readTextFile, removeFile, writeFile } from "../utils/fs.js"

// ============================================
// Service Interface
// ============================================

export interface RawRecordStoreShape {
  /**
   * Persist one record in the partition of `asOf`'s UTC date.
   * Returns the path of the written file.
   */
  readonly append: (
    record: FlatRecord,
    baseDir: string,
    asOf: Date
  ) => Effect.Effect<string, StorageError>

  /**
   * Raw record files of one partition directory, sorted by name.
   * A missing directory has no files.
   */
  readonly listRecordFiles: (partitionDir: string) => Effect.Effect<readonly string[], StorageError>

  readonly readRecordFile: (filePath: string) => Effect.Effect<RecordTable, StorageError>

  readonly deleteRecordFiles: (filePaths: readonly string[]) => Effect.Effect<void, StorageError>
}

// ============================================
// Service Tag
// ============================================

export class RawRecordStore extends Context.Tag("RawRecordStore")<
  RawRecordStore,
  RawRecordStoreShape
>() {}

// ============================================
// Implementation
// ============================================

const append = (record: FlatRecord, baseDir: string, asOf: Date) =>
  Effect.gen(function* () {
    const dir = rawPartitionDir(baseDir, partitionOf(asOf))
    const filePath = path.join(dir, recordFileName(asOf))
    const columns = Object.keys(record).sort()

    yield* makeDirectory(dir)
    yield* writeFile(filePath, encodeCsv(columns, [record]))

    yield* Effect.logInfo(`Speedtest result saved to ${filePath}`)
    return filePath
  })

const listRecordFiles = (partitionDir: string) =>
  readDirectory(partitionDir).pipe(
    Effect.map((entries) =>
      entries
        .filter((entry) => entry.isFile() && RECORD_FILE_PATTERN.test(entry.name))
        .map((entry) => entry.name)
        .sort()
        .map((name) => path.join(partitionDir, name))
    )
  )

const readRecordFile = (filePath: string) =>
  readTextFile(filePath).pipe(
    Effect.flatMap((content) =>
      decodeCsv(content).pipe(Effect.mapError((e) => new StorageError("read", filePath, e)))
    )
  )

const deleteRecordFiles = (filePaths: readonly string[]) =>
  Effect.gen(function* () {
    yield* Effect.forEach(filePaths, removeFile, { discard: true })
    if (filePaths.length > 0) {
      yield* Effect.logInfo(`Deleted ${filePaths.length} CSV files from ${path.dirname(filePaths[0] ?? "")}`)
    }
  })

export const RawRecordStoreLive = Layer.succeed(RawRecordStore, {
  append,
  listRecordFiles,
  readRecordFile,
  deleteRecordFiles,
})
