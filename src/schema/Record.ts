/**
 * Effect Schema definitions for measurement records.
 *
 * A record has no fixed shape: whatever keys the measurement tool prints
 * become columns. Only the fields the recorder relies on are validated.
 */

import { Predicate, Schema } from "effect"

// ============================================
// Scalars and Records
// ============================================

export const Scalar = Schema.Union(Schema.Number, Schema.String, Schema.Boolean, Schema.Null)
export type Scalar = typeof Scalar.Type

/**
 * One flat measurement result. Key insertion order is the column order.
 */
export type FlatRecord = Readonly<Record<string, Scalar>>

/**
 * Rows sharing one ordered column list.
 */
export interface RecordTable {
  readonly columns: readonly string[]
  readonly rows: readonly FlatRecord[]
}

// ============================================
// Measurement Output
// ============================================

const ISO_DATE_TIME = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d+)?(Z|[+-]\d{2}:?\d{2})$/

/** Full ISO-8601 date-time with an explicit offset, e.g. 2025-01-20T08:15:00.123456Z */
export const isIsoDateTime = (value: string): boolean =>
  ISO_DATE_TIME.test(value) && !Number.isNaN(Date.parse(value))

const IsoTimestamp = Schema.String.pipe(
  Schema.filter(isIsoDateTime, {
    message: () => "timestamp must be an ISO-8601 date-time",
  })
)

/**
 * Minimum shape of the speedtest JSON output.
 */
export const SpeedtestOutput = Schema.Struct({
  download: Schema.Number,
  upload: Schema.Number,
  ping: Schema.Number,
  timestamp: IsoTimestamp,
  server: Schema.Struct({
    name: Schema.String,
  }),
})

export type SpeedtestOutput = typeof SpeedtestOutput.Type

// ============================================
// Transformations
// ============================================

export const isJsonObject = (value: unknown): value is Record<string, unknown> =>
  Predicate.isRecord(value)

/**
 * Keys whose floats are kept as-is: coordinates and server distance.
 */
export const UNROUNDED_KEYS: ReadonlySet<string> = new Set(["lat", "lon", "d"])

/**
 * Round every non-integer number to the nearest integer, recursing through
 * objects and arrays. Values under an excluded key are left untouched.
 */
export const roundFloats = (
  value: unknown,
  exclude: ReadonlySet<string> = UNROUNDED_KEYS
): unknown => {
  if (Array.isArray(value)) {
    return value.map((item) => roundFloats(item, exclude))
  }
  if (isJsonObject(value)) {
    return roundRecord(value, exclude)
  }
  if (typeof value === "number" && Number.isFinite(value) && !Number.isInteger(value)) {
    return Math.round(value)
  }
  return value
}

export const roundRecord = (
  data: Readonly<Record<string, unknown>>,
  exclude: ReadonlySet<string> = UNROUNDED_KEYS
): Record<string, unknown> => {
  const result: Record<string, unknown> = {}
  for (const [key, nested] of Object.entries(data)) {
    result[key] = exclude.has(key) ? nested : roundFloats(nested, exclude)
  }
  return result
}

const toScalar = (value: unknown): Scalar | undefined => {
  if (value === undefined) return undefined
  if (value === null) return null
  if (typeof value === "number" || typeof value === "string" || typeof value === "boolean") {
    return value
  }
  if (Array.isArray(value)) return JSON.stringify(value)
  return String(value)
}

/**
 * Flatten nested objects into `{parent}_{child}` columns.
 *
 * @example
 * flattenRecord({ ping: 12, server: { name: "Leeds", id: 7 } })
 * // { ping: 12, server_name: "Leeds", server_id: 7 }
 */
export const flattenRecord = (
  data: Readonly<Record<string, unknown>>,
  parentKey = "",
  separator = "_"
): Record<string, Scalar> => {
  const flat: Record<string, Scalar> = {}
  for (const [key, value] of Object.entries(data)) {
    const column = parentKey ? `${parentKey}${separator}${key}` : key
    if (isJsonObject(value)) {
      Object.assign(flat, flattenRecord(value, column, separator))
      continue
    }
    const scalar = toScalar(value)
    if (scalar !== undefined) {
      flat[column] = scalar
    }
  }
  return flat
}

/**
 * The record's own capture time, when it carries a parseable `timestamp`.
 */
export const recordTimestamp = (record: FlatRecord): Date | null => {
  const value = record["timestamp"]
  if (typeof value !== "string" || !isIsoDateTime(value)) return null
  return new Date(Date.parse(value))
}
