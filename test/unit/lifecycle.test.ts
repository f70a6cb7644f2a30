/**
 * Task status reconciliation
 */

import { describe, it, expect } from "vitest"
import { ensureCancellable, markCancelled, observeTaskStatus, MCPError } from "@taskwire/core"
import { canTransition, isTerminalStatus, type TaskInfo, type TaskStatus } from "@taskwire/types"
import { createTestTask, expectEffectFailure, runEffect } from "@taskwire/test-utils"

const task = (status: TaskStatus, extra: Partial<TaskInfo> = {}): TaskInfo =>
  createTestTask({ id: "task-1", status, ...extra })

describe("observeTaskStatus", () => {
  it("accepts forward transitions", () => {
    const running = observeTaskStatus(task("queued"), task("running"))
    expect(running).toEqual({ task: task("running"), applied: true })

    const completed = observeTaskStatus(running.task, task("completed"))
    expect(completed.applied).toBe(true)
    expect(completed.task.status).toBe("completed")
  })

  it("accepts a jump over missed states", () => {
    expect(observeTaskStatus(task("queued"), task("failed")).task.status).toBe("failed")
  })

  it("discards a regression to an earlier state", () => {
    const result = observeTaskStatus(task("running"), task("queued"))
    expect(result.applied).toBe(false)
    expect(result.task.status).toBe("running")
  })

  it("never leaves a terminal state", () => {
    for (const next of ["queued", "running", "failed", "cancelled"] as const) {
      const result = observeTaskStatus(task("completed"), task(next))
      expect(result).toEqual({ task: task("completed"), applied: false })
    }
  })

  it("takes newer fields for the same status", () => {
    const result = observeTaskStatus(task("running", { progress: 0.2 }), task("running", { progress: 0.6 }))
    expect(result.applied).toBe(true)
    expect(result.task.progress).toBe(0.6)
  })

  it("ignores observations of another task", () => {
    const other = createTestTask({ id: "task-2", status: "completed" })
    expect(observeTaskStatus(task("queued"), other)).toEqual({ task: task("queued"), applied: false })
  })

  it("never reports completed then running over a polled sequence", () => {
    const responses: TaskStatus[] = ["queued", "running", "completed", "running", "queued"]
    const reported: TaskStatus[] = []
    let current = task("queued")
    for (const status of responses) {
      current = observeTaskStatus(current, task(status)).task
      reported.push(current.status)
    }
    expect(reported).toEqual(["queued", "running", "completed", "completed", "completed"])
  })
})

describe("ensureCancellable", () => {
  it("allows queued and running tasks", async () => {
    await expect(runEffect(ensureCancellable(task("queued")))).resolves.toBeUndefined()
    await expect(runEffect(ensureCancellable(task("running")))).resolves.toBeUndefined()
  })

  it("rejects a terminal task with a conflict", async () => {
    const error = await expectEffectFailure(ensureCancellable(task("completed")))
    expect(error).toBeInstanceOf(MCPError)
    expect(error.statusCode).toBe(409)
    expect(error.message).toBe("Task task-1 already completed; nothing to cancel")
  })

  it("marks a task cancelled", () => {
    expect(markCancelled(task("running")).status).toBe("cancelled")
    expect(isTerminalStatus("cancelled")).toBe(true)
  })
})

describe("status transitions", () => {
  it("follows the lifecycle", () => {
    expect(canTransition("queued", "running")).toBe(true)
    expect(canTransition("queued", "cancelled")).toBe(true)
    expect(canTransition("running", "completed")).toBe(true)
    expect(canTransition("running", "queued")).toBe(false)
    expect(canTransition("completed", "running")).toBe(false)
  })
})
