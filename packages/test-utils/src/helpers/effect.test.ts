/**
 * Effect test helpers unit tests.
 */

import { describe, it, expect } from "vitest"
import { Data, Effect, Either } from "effect"
import { expectEffectFailure, runEffect, runEffectEither } from "./effect.js"

class TestError extends Data.TaggedError("TestError")<{
  readonly reason: string
}> {}

describe("runEffect", () => {
  it("returns the success value", async () => {
    await expect(runEffect(Effect.succeed(42))).resolves.toBe(42)
  })

  it("throws with the pretty-printed cause on failure", async () => {
    await expect(runEffect(Effect.fail(new TestError({ reason: "nope" })))).rejects.toThrow(
      /^Effect failed:/
    )
  })

  it("times out long-running effects", async () => {
    await expect(runEffect(Effect.never, { timeout: 20 })).rejects.toThrow(
      "Effect timed out after 20ms"
    )
  })
})

describe("runEffectEither", () => {
  it("returns Right on success and Left on failure", async () => {
    const success = await runEffectEither(Effect.succeed("ok"))
    expect(Either.isRight(success) && success.right).toBe("ok")

    const result = await runEffectEither(Effect.fail(new TestError({ reason: "nope" })))
    expect(Either.isLeft(result)).toBe(true)
  })
})

describe("expectEffectFailure", () => {
  it("returns the typed error", async () => {
    const error = await expectEffectFailure(Effect.fail(new TestError({ reason: "nope" })))
    expect(error._tag).toBe("TestError")
    expect(error.reason).toBe("nope")
  })

  it("throws when the effect succeeds", async () => {
    await expect(expectEffectFailure(Effect.succeed(1))).rejects.toThrow(
      "Expected Effect to fail, but it succeeded with: 1"
    )
  })
})
