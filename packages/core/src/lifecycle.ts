/**
 * TaskLifecycle
 *
 * Reconciles successive observations of one task. Statuses only move
 * forward (queued → running → terminal) and a terminal status is final, so a
 * stale or out-of-order response never rolls a task back. Polling can miss
 * intermediate states, so forward jumps (queued → completed) are accepted.
 */

import { Effect } from "effect"
import { isTerminalStatus, type TaskInfo, type TaskStatus } from "@taskwire/types"
import { MCPError } from "./errors.js"

const STATUS_RANK: Record<TaskStatus, number> = {
  queued: 0,
  running: 1,
  completed: 2,
  failed: 2,
  cancelled: 2
}

export interface TaskObservation {
  /** The task after reconciliation */
  readonly task: TaskInfo
  /** False when `next` was discarded as stale */
  readonly applied: boolean
}

/**
 * Reconcile the last known state of a task with a newer observation.
 *
 * - same status: the newer fields win (progress, result, ...)
 * - terminal current status: anything else is discarded
 * - lower-ranked status: discarded as stale
 */
export const observeTaskStatus = (current: TaskInfo, next: TaskInfo): TaskObservation => {
  if (next.id !== current.id) {
    return { task: current, applied: false }
  }
  if (next.status === current.status) {
    return { task: next, applied: true }
  }
  if (isTerminalStatus(current.status)) {
    return { task: current, applied: false }
  }
  if (STATUS_RANK[next.status] < STATUS_RANK[current.status]) {
    return { task: current, applied: false }
  }
  return { task: next, applied: true }
}

/**
 * Fail when a task is already terminal: there is nothing left to cancel.
 */
export const ensureCancellable = (task: TaskInfo): Effect.Effect<void, MCPError> =>
  isTerminalStatus(task.status)
    ? Effect.fail(
        new MCPError({
          statusCode: 409,
          message: `Task ${task.id} already ${task.status}; nothing to cancel`,
          rawResponse: null
        })
      )
    : Effect.void

/**
 * The task after a successful cancellation.
 */
export const markCancelled = (task: TaskInfo): TaskInfo => ({ ...task, status: "cancelled" })
