/**
 * CSV encoding for raw records.
 *
 * Writing is a plain RFC 4180 serializer; reading goes through csv-parser.
 * Nulls are written as empty fields and decode back to null. Every other
 * decoded value stays a string: column types are settled at compaction time.
 */

import { Readable } from "node:stream"
import csvParser from "csv-parser"
import { Effect } from "effect"
import type { FlatRecord, RecordTable, Scalar } from "../schema/Record.js"

export class CsvError {
  readonly _tag = "CsvError"
  constructor(
    readonly message: string,
    readonly cause?: unknown
  ) {}
}

const NEEDS_QUOTING = /[",\r\n]/

export const encodeField = (value: Scalar | undefined): string => {
  if (value === null || value === undefined) return ""
  const text = typeof value === "string" ? value : String(value)
  return NEEDS_QUOTING.test(text) ? `"${text.replace(/"/g, '""')}"` : text
}

/**
 * Serialize rows under a header line. Missing values become empty fields.
 */
export const encodeCsv = (columns: readonly string[], rows: readonly FlatRecord[]): string => {
  const lines = [columns.map(encodeField).join(",")]
  for (const row of rows) {
    lines.push(columns.map((column) => encodeField(row[column])).join(","))
  }
  return `${lines.join("\n")}\n`
}

export const decodeCsv = (content: string): Effect.Effect<RecordTable, CsvError> =>
  Effect.async<RecordTable, CsvError>((resume) => {
    let columns: readonly string[] = []
    const rows: FlatRecord[] = []

    const parser = csvParser({
      mapValues: ({ value }: { value: string }) => (value === "" ? null : value),
    })

    parser.on("headers", (headers: string[]) => {
      columns = headers
    })
    parser.on("data", (row: Record<string, string | null>) => {
      rows.push(row)
    })
    parser.on("end", () => {
      resume(Effect.succeed({ columns, rows }))
    })
    parser.on("error", (error: Error) => {
      resume(Effect.fail(new CsvError(`CSV parse error: ${error.message}`, error)))
    })

    Readable.from([content]).pipe(parser)
  })
