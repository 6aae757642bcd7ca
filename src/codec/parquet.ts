/**
 * Parquet encoding for archive files, via hyparquet-writer and hyparquet.
 *
 * Raw records arrive as strings, so each column's physical type is inferred
 * from its values: numeric → DOUBLE, true/false → BOOLEAN, anything else
 * UTF-8 BYTE_ARRAY. Every column is OPTIONAL so missing values survive as
 * nulls.
 */

import { parquetMetadata, parquetReadObjects } from "hyparquet"
import { parquetWriteBuffer } from "hyparquet-writer"
import type { FlatRecord, RecordTable, Scalar } from "../schema/Record.js"

export type ColumnType = "DOUBLE" | "BOOLEAN" | "STRING"

const NUMERIC = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/

// "0123" is an identifier, not a number
const LEADING_ZERO = /^[+-]?0\d/

const isNumeric = (value: Scalar): boolean => {
  if (typeof value === "number") return Number.isFinite(value)
  if (typeof value !== "string") return false
  return NUMERIC.test(value) && !LEADING_ZERO.test(value) && Number.isFinite(Number(value))
}

const isBooleanLike = (value: Scalar): boolean =>
  typeof value === "boolean" || value === "true" || value === "false"

export const inferColumnType = (values: readonly Scalar[]): ColumnType => {
  const present = values.filter((value) => value !== null)
  if (present.length === 0) return "STRING"
  if (present.every(isNumeric)) return "DOUBLE"
  if (present.every(isBooleanLike)) return "BOOLEAN"
  return "STRING"
}

const coerce = (value: Scalar, type: ColumnType): number | boolean | string | null => {
  if (value === null) return null
  switch (type) {
    case "DOUBLE":
      return Number(value)
    case "BOOLEAN":
      return value === true || value === "true"
    case "STRING":
      return typeof value === "string" ? value : String(value)
  }
}

interface ColumnEntry {
  readonly name: string
  readonly data: Array<number | boolean | string | null>
  readonly type: "DOUBLE" | "BOOLEAN" | "BYTE_ARRAY"
  readonly repetition_type: "OPTIONAL"
  readonly converted_type?: "UTF8"
}

/**
 * Each column carries its own physical type. Left to itself the writer guesses
 * from the data, which fails on all-null columns and narrows whole numbers to
 * INT32.
 */
const columnEntry = (name: string, type: ColumnType, data: ColumnEntry["data"]): ColumnEntry =>
  type === "STRING"
    ? { name, data, type: "BYTE_ARRAY", repetition_type: "OPTIONAL", converted_type: "UTF8" }
    : { name, data, type, repetition_type: "OPTIONAL" }

/**
 * Encode a table as one Parquet file.
 */
export const encodeParquet = (table: RecordTable): ArrayBuffer => {
  const columnData: ColumnEntry[] = table.columns.map((column) => {
    const values = table.rows.map((row) => row[column] ?? null)
    const type = inferColumnType(values)
    return columnEntry(
      column,
      type,
      values.map((value) => coerce(value, type))
    )
  })

  return parquetWriteBuffer({ columnData })
}

const toScalar = (value: unknown): Scalar => {
  if (value === null || value === undefined) return null
  if (typeof value === "number" || typeof value === "string" || typeof value === "boolean") {
    return value
  }
  if (typeof value === "bigint") return Number(value)
  return String(value)
}

/**
 * Decode a whole Parquet file. Columns come from the file schema, so a
 * column is reported even when every value in it is null.
 */
export const decodeParquet = async (buffer: ArrayBuffer): Promise<RecordTable> => {
  const metadata = parquetMetadata(buffer)
  const columns = metadata.schema.slice(1).map((element) => element.name)
  const objects = await parquetReadObjects({ file: buffer })

  const rows: FlatRecord[] = objects.map((object) => {
    const row: Record<string, Scalar> = {}
    for (const column of columns) {
      row[column] = toScalar(object[column])
    }
    return row
  })

  return { columns, rows }
}
