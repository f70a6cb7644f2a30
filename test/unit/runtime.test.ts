/**
 * Promise boundary: typed failures, interruption and log level
 */

import { describe, it, expect } from "vitest"
import { Effect } from "effect"
import { ConnectionError, MCPError, runPromise, runSync } from "@taskwire/core"

describe("runPromise", () => {
  it("resolves with the success value", async () => {
    await expect(runPromise(Effect.succeed(42))).resolves.toBe(42)
  })

  it("rejects with the typed failure itself", async () => {
    const failure = new MCPError({ statusCode: 404, message: "Task not found", rawResponse: null })
    await expect(runPromise(Effect.fail(failure))).rejects.toBe(failure)
  })

  it("rejects immediately for an already aborted signal", async () => {
    const controller = new AbortController()
    controller.abort(new Error("shutting down"))

    const error = await runPromise(Effect.succeed(1), { signal: controller.signal }).catch(
      (e: unknown) => e
    )
    expect(error).toBeInstanceOf(ConnectionError)
    expect(error instanceof ConnectionError && error.reason).toBe("aborted")
    expect(error instanceof ConnectionError && error.message).toBe(
      "Connection error (aborted): shutting down"
    )
  })

  it("interrupts a running program when the signal fires", async () => {
    const controller = new AbortController()
    const pending = runPromise(Effect.never, { signal: controller.signal })
    setTimeout(() => controller.abort(new Error("caller gave up")), 10)

    const error = await pending.catch((e: unknown) => e)
    expect(error).toBeInstanceOf(ConnectionError)
    expect(error instanceof ConnectionError && error.isAborted()).toBe(true)
  })

  it("rethrows defects", async () => {
    const defect = new Error("boom")
    await expect(runPromise(Effect.die(defect))).rejects.toBe(defect)
  })
})

describe("runSync", () => {
  it("returns the value or throws the failure", () => {
    expect(runSync(Effect.succeed("ok"))).toBe("ok")
    const failure = new MCPError({ statusCode: 400, message: "bad", rawResponse: null })
    expect(() => runSync(Effect.fail(failure))).toThrow(failure)
  })

  it("honors the minimum log level", () => {
    expect(runSync(Effect.logDebug("hidden").pipe(Effect.as(1)), { logLevel: "None" })).toBe(1)
  })
})
