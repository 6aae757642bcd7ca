import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { Cause, Effect, Layer, Logger, LogLevel } from "effect"
import {
  ArchiveStoreLive,
  CompactionEngineLive,
  PartitionScannerLive,
  RawRecordStoreLive,
  type ArchiveResult,
} from "../../src/services/index.js"

// ── Temp directories ─────────────────────────────────────────

export const makeTempDir = (): string => mkdtempSync(join(tmpdir(), "speedtrail-"))

export const removeDir = (dir: string): void => rmSync(dir, { recursive: true, force: true })

// ── Running effects ──────────────────────────────────────────

export const QuietLogger = Logger.minimumLogLevel(LogLevel.None)

export const runTest = <A, E>(effect: Effect.Effect<A, E>): Promise<A> =>
  Effect.runPromise(effect.pipe(Effect.provide(QuietLogger)))

export interface CapturedLog {
  readonly level: string
  readonly message: string
  readonly cause: string | null
}

/** Replaces the default logger with one that keeps every entry in `entries` */
export const captureLogs = () => {
  const entries: CapturedLog[] = []
  const logger = Logger.make(({ logLevel, message, cause }) => {
    entries.push({
      level: logLevel.label,
      message: Array.isArray(message) ? message.map(String).join(" ") : String(message),
      cause: Cause.isEmpty(cause) ? null : Cause.pretty(cause),
    })
  })
  return { entries, layer: Logger.replace(Logger.defaultLogger, logger) }
}

// ── Layers ───────────────────────────────────────────────────

export const StorageLayer = Layer.mergeAll(RawRecordStoreLive, ArchiveStoreLive)

export const CompactionLayer = CompactionEngineLive.pipe(
  Layer.provide(PartitionScannerLive),
  Layer.provide(StorageLayer)
)

// ── Raw records ──────────────────────────────────────────────

/** Directory of a raw partition, e.g. `partitionDir(base, "2025-01-20")` */
export const partitionDir = (base: string, date: string): string => {
  const [year, month, day] = date.split("-")
  return join(base, `year=${year}`, `month=${month}`, `day=${day}`)
}

/** One-row CSV in the raw layout */
export const rawCsv = (row: Record<string, string>): string =>
  `${Object.keys(row).join(",")}\n${Object.values(row).join(",")}\n`

export const writeRawFile = (base: string, date: string, name: string, content: string): string => {
  const dir = partitionDir(base, date)
  mkdirSync(dir, { recursive: true })
  const file = join(dir, name)
  writeFileSync(file, content)
  return file
}

export const asCompacted = (result: ArchiveResult | undefined) => {
  if (result?.status !== "compacted") {
    throw new Error(`expected a compacted result, got ${result?.status}`)
  }
  return result
}

export const asFailed = (result: ArchiveResult | undefined) => {
  if (result?.status !== "failed") {
    throw new Error(`expected a failed result, got ${result?.status}`)
  }
  return result
}

// ── Measurement output ───────────────────────────────────────

export const sampleOutput = {
  download: 93456789.6,
  upload: 12345678.4,
  ping: 14.567,
  server: {
    name: "London",
    sponsor: "Example ISP",
    id: "1234",
    lat: 51.5074,
    lon: -0.1278,
    d: 12.3456,
    latency: 14.5,
  },
  timestamp: "2025-01-20T08:15:00Z",
  bytes_sent: 15000000,
  bytes_received: 117000000,
  share: null,
  client: {
    ip: "203.0.113.7",
    isp: "Example ISP",
    ispdlavg: 0,
  },
}
