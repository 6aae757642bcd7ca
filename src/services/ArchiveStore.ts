/**
 * ArchiveStore - numbered Parquet files per archive partition.
 *
 * Layout: `<base>/location=<id>/year=YYYY/month=MM/day=DD/speedtest_NNN.parquet`.
 * Sequence numbers only grow within a partition directory and an existing
 * archive is never overwritten: files are created exclusively.
 */

import { Context, Effect, Layer } from "effect"
import * as path from "node:path"
import { decodeParquet, encodeParquet } from "../codec/parquet.js"
import { StorageError } from "../errors.js"
import { ARCHIVE_FILE_PATTERN, type RecordTable } from "../schema/index.js"
import { makeDirectory, readBinaryFile, readDirectory, writeFile } from "../utils/fs.js"

// ============================================
// Types
// ============================================

export interface ArchiveStats {
  readonly rowCount: number
  readonly columns: readonly string[]
}

// ============================================
// Service Interface
// ============================================

export interface ArchiveStoreShape {
  /**
   * Highest sequence found in the directory plus one (1 when there is none).
   */
  readonly nextSequence: (partitionDir: string) => Effect.Effect<number, StorageError>

  /**
   * Encode the table and create the archive file. Fails if the file exists.
   */
  readonly write: (filePath: string, table: RecordTable) => Effect.Effect<void, StorageError>

  /**
   * Re-read an archive file and report what it holds.
   */
  readonly inspect: (filePath: string) => Effect.Effect<ArchiveStats, StorageError>
}

export class ArchiveStore extends Context.Tag("ArchiveStore")<
  ArchiveStore,
  ArchiveStoreShape
>() {}

// ============================================
// Implementation
// ============================================

const nextSequence = (partitionDir: string) =>
  readDirectory(partitionDir).pipe(
    Effect.map((entries) => {
      const numbers = entries.flatMap((entry) => {
        const match = ARCHIVE_FILE_PATTERN.exec(entry.name)
        return entry.isFile() && match?.[1] !== undefined ? [Number(match[1])] : []
      })
      return numbers.length > 0 ? Math.max(...numbers) + 1 : 1
    })
  )

const write = (filePath: string, table: RecordTable) =>
  Effect.gen(function* () {
    const buffer = yield* Effect.try({
      try: () => encodeParquet(table),
      catch: (cause) => new StorageError("write", filePath, cause),
    })

    yield* makeDirectory(path.dirname(filePath))
    yield* writeFile(filePath, new Uint8Array(buffer), { exclusive: true })
    yield* Effect.logInfo(`Created parquet file: ${filePath}`)
  })

const inspect = (filePath: string) =>
  Effect.gen(function* () {
    const buffer = yield* readBinaryFile(filePath)
    const table = yield* Effect.tryPromise({
      try: () => decodeParquet(buffer),
      catch: (cause) => new StorageError("read", filePath, cause),
    })
    return { rowCount: table.rows.length, columns: table.columns }
  })

export const ArchiveStoreLive = Layer.succeed(ArchiveStore, {
  nextSequence,
  write,
  inspect,
})
