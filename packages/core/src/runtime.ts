/**
 * Promise boundary.
 *
 * Runs core programs and rethrows their typed failures unchanged, so SDK
 * callers catch ConnectionError / MCPError rather than fiber wrappers.
 */

import { Cause, Effect, Exit, LogLevel, Logger, Option } from "effect"
import type { LogLevelName } from "./config.js"
import { ConnectionError } from "./errors.js"

export interface RunOptions {
  /** Aborts the in-flight attempt and any pending backoff sleep */
  readonly signal?: AbortSignal
  /** Minimum level for log output produced while running */
  readonly logLevel?: LogLevelName
}

const abortedError = (signal: AbortSignal | undefined): ConnectionError =>
  new ConnectionError({
    reason: "aborted",
    cause: signal?.reason ?? new Error("Request was interrupted")
  })

/**
 * Return the success value of an exit or throw its failure.
 * Interruption becomes ConnectionError("aborted"); defects are rethrown.
 */
export const unwrapExit = <A, E>(exit: Exit.Exit<A, E>, signal?: AbortSignal): A => {
  if (Exit.isSuccess(exit)) {
    return exit.value
  }
  const failure = Cause.failureOption(exit.cause)
  if (Option.isSome(failure)) {
    throw failure.value
  }
  if (Cause.isInterruptedOnly(exit.cause)) {
    throw abortedError(signal)
  }
  throw Cause.squash(exit.cause)
}

const withLogLevel = <A, E>(
  effect: Effect.Effect<A, E>,
  logLevel: LogLevelName | undefined
): Effect.Effect<A, E> =>
  logLevel ? Logger.withMinimumLogLevel(effect, LogLevel.fromLiteral(logLevel)) : effect

export const runPromise = async <A, E>(
  effect: Effect.Effect<A, E>,
  options: RunOptions = {}
): Promise<A> => {
  const { signal } = options
  if (signal?.aborted) {
    throw abortedError(signal)
  }
  const exit = await Effect.runPromiseExit(withLogLevel(effect, options.logLevel), { signal })
  return unwrapExit(exit, signal)
}

export const runSync = <A, E>(effect: Effect.Effect<A, E>, options: RunOptions = {}): A =>
  unwrapExit(Effect.runSyncExit(withLogLevel(effect, options.logLevel)))
