/**
 * Effect-TS test helpers for running and asserting on Effects.
 *
 * @module @taskwire/test-utils/helpers/effect
 */

import { Cause, Effect, Either, Exit, pipe } from "effect"

// =============================================================================
// Types
// =============================================================================

/**
 * Options for running Effects in tests.
 */
export interface RunEffectOptions {
  /** Timeout in milliseconds (default: 5000) */
  timeout?: number
}

// =============================================================================
// Effect Runners
// =============================================================================

/**
 * Run an Effect and return the result.
 * Throws an error if the Effect fails.
 *
 * @example
 * ```typescript
 * const result = await runEffect(Effect.succeed(42))
 * expect(result).toBe(42)
 * ```
 */
export const runEffect = async <A, E>(
  effect: Effect.Effect<A, E>,
  options: RunEffectOptions = {}
): Promise<A> => {
  const { timeout = 5000 } = options

  const withTimeout = pipe(
    effect,
    Effect.timeoutFail({
      duration: timeout,
      onTimeout: () => new Error(`Effect timed out after ${timeout}ms`)
    })
  )

  const exit = await Effect.runPromiseExit(withTimeout)

  if (Exit.isFailure(exit)) {
    throw new Error(`Effect failed:\n${Cause.pretty(exit.cause)}`)
  }

  return exit.value
}

/**
 * Run an Effect and return an Either (success or failure).
 * Only defects and timeouts throw.
 */
export const runEffectEither = <A, E>(
  effect: Effect.Effect<A, E>,
  options: RunEffectOptions = {}
): Promise<Either.Either<A, E>> => runEffect(Effect.either(effect), options)

// =============================================================================
// Effect Assertions
// =============================================================================

/**
 * Assert that an Effect fails and return its typed error.
 *
 * @example
 * ```typescript
 * const error = await expectEffectFailure(classifyResponse({ statusCode: 404, body: '' }))
 * expect(error._tag).toBe('MCPError')
 * ```
 */
export const expectEffectFailure = async <A, E>(
  effect: Effect.Effect<A, E>,
  validate?: (error: E) => void | Promise<void>
): Promise<E> => {
  const result = await runEffectEither(effect)

  if (Either.isRight(result)) {
    throw new Error(
      `Expected Effect to fail, but it succeeded with: ${JSON.stringify(result.right)}`
    )
  }

  if (validate) {
    await validate(result.left)
  }

  return result.left
}
