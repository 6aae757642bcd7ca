/**
 * Error types shared by the recorder services.
 *
 * Every error is a tagged class carried in the typed error channel of an
 * Effect. None of them is thrown.
 */

import { Predicate } from "effect"

const describe = (cause: unknown): string =>
  Predicate.hasProperty(cause, "message") && typeof cause.message === "string"
    ? cause.message
    : String(cause)

// ============================================
// Measurement
// ============================================

export class MeasurementError {
  readonly _tag = "MeasurementError"
  constructor(
    readonly type: "execution" | "exit_code" | "empty_output" | "parse" | "schema" | "timeout",
    readonly message: string,
    readonly cause?: unknown
  ) {}
}

// ============================================
// Storage
// ============================================

export type StorageOperation = "mkdir" | "write" | "read" | "list" | "delete"

export class StorageError {
  readonly _tag = "StorageError"
  readonly message: string
  constructor(
    readonly operation: StorageOperation,
    readonly path: string,
    readonly cause?: unknown
  ) {
    this.message = `${operation} failed for ${path}: ${describe(cause)}`
  }
}

// ============================================
// Compaction
// ============================================

export type CompactionStage = "list" | "read" | "write" | "verify" | "delete" | "unexpected"

export class CompactionError {
  readonly _tag = "CompactionError"
  readonly message: string
  constructor(
    readonly stage: CompactionStage,
    readonly partition: string,
    readonly cause?: unknown
  ) {
    this.message = `${stage} stage failed for partition ${partition}: ${describe(cause)}`
  }
}

/**
 * The written archive does not hold what was merged into it. Raw sources are
 * always kept when this is raised.
 */
export class VerificationMismatch {
  readonly _tag = "VerificationMismatch"
  readonly message: string
  constructor(
    readonly partition: string,
    readonly path: string,
    readonly expectedRows: number,
    readonly actualRows: number,
    readonly missingColumns: readonly string[]
  ) {
    const missing = missingColumns.length > 0 ? `, missing columns: ${missingColumns.join(", ")}` : ""
    this.message = `Verification failed for ${path}: expected ${expectedRows} rows, found ${actualRows}${missing}`
  }
}

export type PartitionFailure = CompactionError | VerificationMismatch
