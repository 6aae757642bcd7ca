/**
 * Hive-style date partitions: `year=YYYY/month=MM/day=DD`.
 *
 * All dates are UTC calendar dates.
 */

import * as path from "node:path"

export interface PartitionKey {
  readonly year: number
  readonly month: number
  readonly day: number
}

const pad = (value: number, width: number): string => String(value).padStart(width, "0")

export const partitionOf = (date: Date): PartitionKey => ({
  year: date.getUTCFullYear(),
  month: date.getUTCMonth() + 1,
  day: date.getUTCDate(),
})

export const partitionSegments = (key: PartitionKey): readonly [string, string, string] => [
  `year=${pad(key.year, 4)}`,
  `month=${pad(key.month, 2)}`,
  `day=${pad(key.day, 2)}`,
]

/**
 * `YYYY-MM-DD`, used in logs and error messages.
 */
export const partitionLabel = (key: PartitionKey): string =>
  `${pad(key.year, 4)}-${pad(key.month, 2)}-${pad(key.day, 2)}`

export const rawPartitionDir = (baseDir: string, key: PartitionKey): string =>
  path.join(baseDir, ...partitionSegments(key))

export const locationSegment = (locationId: string): string => `location=${locationId}`

export const archivePartitionDir = (
  baseDir: string,
  locationId: string,
  key: PartitionKey
): string => path.join(baseDir, locationSegment(locationId), ...partitionSegments(key))

export const comparePartitions = (a: PartitionKey, b: PartitionKey): number =>
  a.year - b.year || a.month - b.month || a.day - b.day

/**
 * A partition is complete once its date is strictly before today.
 */
export const isComplete = (key: PartitionKey, today: Date): boolean =>
  comparePartitions(key, partitionOf(today)) < 0

// ============================================
// Parsing
// ============================================

const SEGMENT_PATTERNS = {
  year: /^year=(\d{4})$/,
  month: /^month=(\d{2})$/,
  day: /^day=(\d{2})$/,
} as const

export type PartitionField = keyof typeof SEGMENT_PATTERNS

/**
 * Decode one directory name, e.g. `month=01` → 1. Returns null when the name
 * does not match the expected pattern.
 */
export const parseSegment = (name: string, field: PartitionField): number | null => {
  const match = SEGMENT_PATTERNS[field].exec(name)
  return match?.[1] !== undefined ? Number(match[1]) : null
}

/**
 * Rejects impossible dates such as `month=13` or `day=30` in February.
 */
export const isValidPartition = (key: PartitionKey): boolean => {
  if (key.month < 1 || key.month > 12 || key.day < 1) return false
  const date = new Date(Date.UTC(key.year, key.month - 1, key.day))
  return (
    date.getUTCFullYear() === key.year &&
    date.getUTCMonth() === key.month - 1 &&
    date.getUTCDate() === key.day
  )
}

// ============================================
// File Names
// ============================================

export const RECORD_FILE_PATTERN = /^speedtest_.+\.csv$/

/**
 * Raw record file name from the UTC time of day, e.g. `speedtest_09-05-03.csv`.
 */
export const recordFileName = (asOf: Date): string =>
  `speedtest_${pad(asOf.getUTCHours(), 2)}-${pad(asOf.getUTCMinutes(), 2)}-${pad(asOf.getUTCSeconds(), 2)}.csv`

export const ARCHIVE_FILE_PATTERN = /^speedtest_(\d+)\.parquet$/

/**
 * Archive file name for a sequence number, zero-padded to three digits.
 */
export const archiveFileName = (sequence: number): string =>
  `speedtest_${pad(sequence, 3)}.parquet`
