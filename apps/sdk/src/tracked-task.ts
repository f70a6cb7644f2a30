/**
 * @taskwire/sdk TrackedTask
 *
 * Client-side view of one task across successive observations.
 */

import { Effect } from "effect"
import { isTerminalStatus } from "@taskwire/types"
import {
  ensureCancellable,
  markCancelled,
  observeTaskStatus,
  runPromise,
  runSync,
  type LogLevelName
} from "@taskwire/core"
import type { CallOptions, CancelAck, TaskInfo, TaskStatus } from "./types.js"

/**
 * The task calls a TrackedTask needs. Implemented by `client.tasks`.
 */
export interface TaskOperations {
  get(id: string, options?: CallOptions): Promise<TaskInfo>
  cancel(id: string, options?: CallOptions): Promise<CancelAck>
}

/**
 * A task handle that never reports a status regression.
 *
 * Observations reconcile against the last known state: a response that
 * arrives late and carries an older status is discarded, and once the task
 * is terminal its status no longer changes.
 *
 * @example
 * ```typescript
 * const tracked = await client.tasks.track(taskId)
 * await tracked.refresh()
 * if (!tracked.isTerminal) {
 *   await tracked.cancel()
 * }
 * ```
 */
export class TrackedTask {
  private current: TaskInfo

  constructor(
    private readonly tasks: TaskOperations,
    initial: TaskInfo,
    private readonly logLevel?: LogLevelName
  ) {
    this.current = initial
  }

  get id(): string {
    return this.current.id
  }

  get status(): TaskStatus {
    return this.current.status
  }

  /** Last accepted observation. */
  get task(): TaskInfo {
    return this.current
  }

  get isTerminal(): boolean {
    return isTerminalStatus(this.current.status)
  }

  /**
   * Reconcile an observation obtained elsewhere (a list call, a webhook).
   *
   * @returns false when the observation was discarded as stale
   */
  observe(next: TaskInfo): boolean {
    const { task, applied } = observeTaskStatus(this.current, next)
    if (!applied) {
      runSync(
        Effect.logDebug(
          `Discarded observation of task ${next.id}: ${next.status} after ${this.current.status}`
        ),
        { logLevel: this.logLevel }
      )
    }
    this.current = task
    return applied
  }

  /**
   * Fetch the task and reconcile the response.
   *
   * @returns The task after reconciliation
   */
  async refresh(options: CallOptions = {}): Promise<TaskInfo> {
    const latest = await this.tasks.get(this.current.id, options)
    this.observe(latest)
    return this.current
  }

  /**
   * Cancel the task.
   *
   * @throws {MCPError} 409 without contacting the server when the task is
   * already known to be terminal
   */
  async cancel(options: CallOptions = {}): Promise<CancelAck> {
    await runPromise(ensureCancellable(this.current), { logLevel: this.logLevel })
    const ack = await this.tasks.cancel(this.current.id, options)
    this.observe(markCancelled(this.current))
    return ack
  }
}
