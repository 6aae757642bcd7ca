/**
 * CompactionEngine - folds the raw records of each completed day into one
 * numbered Parquet archive.
 *
 * Per partition:
 * 1. list raw files (none → nothing to do)
 * 2. read and merge them, taking the union of their columns
 * 3. append the location column
 * 4. pick the next sequence number of the archive partition
 * 5. write the archive
 * 6. re-read it and check row count and columns
 * 7. delete the raw files, only after a passing check
 *
 * A failure at any step is confined to its partition: it is logged, reported
 * in the result and the raw files stay for the next iteration. Nothing is
 * persisted about completed partitions; the raw tree is the only state.
 */

import { Context, Effect, Layer } from "effect"
import * as path from "node:path"
import {
  CompactionError,
  VerificationMismatch,
  type CompactionStage,
  type PartitionFailure,
  type StorageError,
} from "../errors.js"
import {
  archiveFileName,
  archivePartitionDir,
  partitionLabel,
  rawPartitionDir,
  type FlatRecord,
  type PartitionKey,
  type RecordTable,
  type Scalar,
} from "../schema/index.js"
import { ArchiveStore } from "./ArchiveStore.js"
import { PartitionScanner } from "./PartitionScanner.js"
import { RawRecordStore } from "./RawRecordStore.js"

// ============================================
// Types
// ============================================

export const LOCATION_COLUMN = "speedtest_address"

export type ArchiveResult =
  | { readonly status: "empty"; readonly partition: PartitionKey }
  | {
      readonly status: "compacted"
      readonly partition: PartitionKey
      readonly path: string
      readonly sequence: number
      readonly rowCount: number
      readonly columns: readonly string[]
      readonly sourceFiles: number
    }
  | { readonly status: "failed"; readonly partition: PartitionKey; readonly error: PartitionFailure }

export interface CompactionSummary {
  readonly compacted: number
  readonly empty: number
  readonly failed: number
  readonly results: readonly ArchiveResult[]
}

// ============================================
// Merge Helpers
// ============================================

/**
 * Union of all tables: columns in first-seen order, rows in table order,
 * absent values filled with null.
 */
export const mergeTables = (tables: readonly RecordTable[]): RecordTable => {
  const columns: string[] = []
  const seen = new Set<string>()
  for (const table of tables) {
    for (const column of [...table.columns, ...table.rows.flatMap((row) => Object.keys(row))]) {
      if (!seen.has(column)) {
        seen.add(column)
        columns.push(column)
      }
    }
  }

  const rows = tables.flatMap((table) =>
    table.rows.map((row) => {
      const filled: Record<string, Scalar> = {}
      for (const column of columns) {
        filled[column] = row[column] ?? null
      }
      return filled
    })
  )

  return { columns, rows }
}

/**
 * Set `column` to `value` on every row, as the last column.
 */
export const withConstantColumn = (table: RecordTable, column: string, value: Scalar): RecordTable => ({
  columns: [...table.columns.filter((c) => c !== column), column],
  rows: table.rows.map((row): FlatRecord => ({ ...row, [column]: value })),
})

export const summarize = (results: readonly ArchiveResult[]): CompactionSummary => ({
  compacted: results.filter((r) => r.status === "compacted").length,
  empty: results.filter((r) => r.status === "empty").length,
  failed: results.filter((r) => r.status === "failed").length,
  results,
})

// ============================================
// Service Interface
// ============================================

export interface CompactionEngineShape {
  /**
   * Compact one partition. Never fails: failures are reported in the result.
   */
  readonly compact: (
    partition: PartitionKey,
    rawBase: string,
    archiveBase: string,
    locationId: string
  ) => Effect.Effect<ArchiveResult>

  /**
   * Compact every complete partition of the raw tree, one at a time.
   */
  readonly compactAll: (
    rawBase: string,
    archiveBase: string,
    locationId: string,
    today: Date
  ) => Effect.Effect<CompactionSummary>
}

export class CompactionEngine extends Context.Tag("CompactionEngine")<
  CompactionEngine,
  CompactionEngineShape
>() {}

// ============================================
// Live Implementation
// ============================================

export const CompactionEngineLive = Layer.effect(
  CompactionEngine,
  Effect.gen(function* () {
    const rawStore = yield* RawRecordStore
    const archiveStore = yield* ArchiveStore
    const scanner = yield* PartitionScanner

    const compact: CompactionEngineShape["compact"] = (partition, rawBase, archiveBase, locationId) => {
      const label = partitionLabel(partition)
      const stage =
        (name: CompactionStage) =>
        <A>(effect: Effect.Effect<A, StorageError>) =>
          effect.pipe(Effect.mapError((e) => new CompactionError(name, label, e)))

      const run = Effect.gen(function* () {
        const rawDir = rawPartitionDir(rawBase, partition)
        const files = yield* stage("list")(rawStore.listRecordFiles(rawDir))

        if (files.length === 0) {
          yield* Effect.logDebug(`No raw records left in ${rawDir}`)
          return { status: "empty", partition } satisfies ArchiveResult
        }

        yield* Effect.logInfo(`Converting ${files.length} CSV files from ${rawDir}`)

        const tables = yield* stage("read")(Effect.forEach(files, rawStore.readRecordFile))
        const merged = withConstantColumn(mergeTables(tables), LOCATION_COLUMN, locationId)

        const archiveDir = archivePartitionDir(archiveBase, locationId, partition)
        const sequence = yield* stage("write")(archiveStore.nextSequence(archiveDir))
        const archivePath = path.join(archiveDir, archiveFileName(sequence))

        yield* stage("write")(archiveStore.write(archivePath, merged))

        const stats = yield* stage("verify")(archiveStore.inspect(archivePath))
        const missingColumns = merged.columns.filter((column) => !stats.columns.includes(column))
        if (stats.rowCount !== merged.rows.length || missingColumns.length > 0) {
          return yield* Effect.fail(
            new VerificationMismatch(label, archivePath, merged.rows.length, stats.rowCount, missingColumns)
          )
        }
        yield* Effect.logInfo(`Parquet integrity verified: ${archivePath} (${stats.rowCount} rows)`)

        yield* stage("delete")(rawStore.deleteRecordFiles(files))

        return {
          status: "compacted",
          partition,
          path: archivePath,
          sequence,
          rowCount: stats.rowCount,
          columns: merged.columns,
          sourceFiles: files.length,
        } satisfies ArchiveResult
      })

      return run.pipe(
        Effect.catchAllDefect((defect) => Effect.fail(new CompactionError("unexpected", label, defect))),
        Effect.catchAll((error: PartitionFailure) =>
          Effect.logError(`Failed to convert ${label}: ${error.message}`).pipe(
            Effect.as<ArchiveResult>({ status: "failed", partition, error })
          )
        ),
        Effect.annotateLogs({ partition: label })
      )
    }

    const compactAll: CompactionEngineShape["compactAll"] = (rawBase, archiveBase, locationId, today) =>
      Effect.gen(function* () {
        const partitions = yield* scanner.completePartitions(rawBase, today).pipe(
          Effect.catchAll((error) =>
            Effect.logError(`Partition scan failed: ${error.message}`).pipe(
              Effect.as<readonly PartitionKey[]>([])
            )
          )
        )

        if (partitions.length === 0) {
          yield* Effect.logDebug("No complete days to convert")
          return summarize([])
        }

        yield* Effect.logInfo(
          `Found ${partitions.length} complete days to convert: ${partitions.map(partitionLabel).join(", ")}`
        )

        const results = yield* Effect.forEach(partitions, (partition) =>
          compact(partition, rawBase, archiveBase, locationId)
        )

        for (const result of results) {
          if (result.status === "compacted") {
            yield* Effect.logInfo(`Successfully converted ${partitionLabel(result.partition)} to ${result.path}`)
          }
        }

        return summarize(results)
      })

    return { compact, compactAll } satisfies CompactionEngineShape
  })
)
