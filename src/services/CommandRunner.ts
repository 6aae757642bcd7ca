/**
 * CommandRunner - runs an external executable and collects its output.
 *
 * Kept behind a service tag so the measurement adapter can be exercised
 * without the real speedtest binary.
 */

import { Context, Effect, Layer } from "effect"
import * as ChildProcess from "node:child_process"

// ============================================
// Types
// ============================================

export interface CommandOutput {
  readonly stdout: string
  readonly stderr: string
  readonly code: number
}

export class CommandError {
  readonly _tag = "CommandError"
  constructor(
    readonly type: "execution" | "timeout",
    readonly message: string,
    readonly cause?: unknown
  ) {}
}

// ============================================
// Service Interface
// ============================================

export interface CommandRunnerShape {
  /**
   * Run a command to completion. A timeout of 0 waits indefinitely.
   */
  readonly run: (
    cmd: readonly [string, ...string[]],
    timeoutSeconds: number
  ) => Effect.Effect<CommandOutput, CommandError>
}

export class CommandRunner extends Context.Tag("CommandRunner")<
  CommandRunner,
  CommandRunnerShape
>() {}

// ============================================
// Live Implementation
// ============================================

const runCommand = (
  cmd: readonly [string, ...string[]],
  timeoutSeconds: number
): Effect.Effect<CommandOutput, CommandError> =>
  Effect.async<CommandOutput, CommandError>((resume) => {
    const [executable, ...args] = cmd

    const proc = ChildProcess.spawn(executable, args, { windowsHide: true })

    let stdout = ""
    let stderr = ""
    let resolved = false

    // spawn has no timeout option of its own
    const timeoutId =
      timeoutSeconds > 0
        ? setTimeout(() => {
            if (!resolved) {
              resolved = true
              proc.kill("SIGTERM")
              resume(Effect.fail(new CommandError("timeout", `Command timed out after ${timeoutSeconds}s`)))
            }
          }, timeoutSeconds * 1000)
        : undefined

    proc.stdout.on("data", (data: Buffer) => {
      stdout += data.toString()
    })

    proc.stderr.on("data", (data: Buffer) => {
      stderr += data.toString()
    })

    proc.on("close", (code) => {
      if (!resolved) {
        resolved = true
        clearTimeout(timeoutId)
        resume(Effect.succeed({ stdout, stderr, code: code ?? 1 }))
      }
    })

    proc.on("error", (err) => {
      if (!resolved) {
        resolved = true
        clearTimeout(timeoutId)
        resume(Effect.fail(new CommandError("execution", err.message, err)))
      }
    })

    // Interrupting the waiting fiber stops the child as well
    return Effect.sync(() => {
      if (!resolved) {
        resolved = true
        clearTimeout(timeoutId)
        proc.kill("SIGTERM")
      }
    })
  })

export const CommandRunnerLive = Layer.succeed(CommandRunner, { run: runCommand })
