/**
 * node:fs/promises calls lifted into Effect, failing with StorageError.
 */

import * as fs from "node:fs/promises"
import type { Dirent } from "node:fs"
import { Effect, Predicate } from "effect"
import { StorageError, type StorageOperation } from "../errors.js"

export const isNotFound = (cause: unknown): boolean =>
  Predicate.hasProperty(cause, "code") && cause.code === "ENOENT"

const attempt = <A>(
  operation: StorageOperation,
  target: string,
  run: () => Promise<A>
): Effect.Effect<A, StorageError> =>
  Effect.tryPromise({
    try: run,
    catch: (cause) => new StorageError(operation, target, cause),
  })

/**
 * Directory entries, or an empty list when the directory does not exist.
 */
export const readDirectory = (dir: string): Effect.Effect<readonly Dirent[], StorageError> =>
  attempt("list", dir, () => fs.readdir(dir, { withFileTypes: true })).pipe(
    Effect.catchIf(
      (error) => isNotFound(error.cause),
      () => Effect.succeed([])
    )
  )

export const makeDirectory = (dir: string): Effect.Effect<void, StorageError> =>
  attempt("mkdir", dir, () => fs.mkdir(dir, { recursive: true })).pipe(Effect.asVoid)

/**
 * Write a file. With `exclusive`, an existing file is never replaced.
 */
export const writeFile = (
  filePath: string,
  data: string | Uint8Array,
  options: { readonly exclusive?: boolean } = {}
): Effect.Effect<void, StorageError> =>
  attempt("write", filePath, () => fs.writeFile(filePath, data, { flag: options.exclusive ? "wx" : "w" }))

export const readTextFile = (filePath: string): Effect.Effect<string, StorageError> =>
  attempt("read", filePath, () => fs.readFile(filePath, "utf-8"))

/**
 * Read a whole file into a standalone ArrayBuffer.
 */
export const readBinaryFile = (filePath: string): Effect.Effect<ArrayBuffer, StorageError> =>
  attempt("read", filePath, () => fs.readFile(filePath)).pipe(
    Effect.map((data) => {
      const buffer = new ArrayBuffer(data.byteLength)
      new Uint8Array(buffer).set(data)
      return buffer
    })
  )

export const removeFile = (filePath: string): Effect.Effect<void, StorageError> =>
  attempt("delete", filePath, () => fs.unlink(filePath))
