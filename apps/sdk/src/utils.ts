/**
 * @taskwire/sdk Utility Functions
 *
 * Helper functions for SDK consumers.
 */

import { Duration, Effect, Schedule } from "effect"
import { isRetryableError, isApiError, MCPError, runPromise } from "@taskwire/core"
import type { TaskInfo, TaskStatus } from "./types.js"

// Re-export status helpers from the types package
export { isValidTaskStatus, isTerminalStatus, canTransition } from "@taskwire/types"

// Re-export URL helpers from core
export { buildUrl, normalizeApiUrl } from "@taskwire/core"

// =============================================================================
// Task Helpers
// =============================================================================

/**
 * Filter tasks by status.
 */
export const filterByStatus = (
  tasks: readonly TaskInfo[],
  status: TaskStatus | readonly TaskStatus[]
): TaskInfo[] => {
  const statuses: readonly TaskStatus[] = typeof status === "string" ? [status] : status
  return tasks.filter(task => statuses.includes(task.status))
}

/**
 * Filter tasks assigned to an agent.
 */
export const filterByAgent = (tasks: readonly TaskInfo[], agent: string): TaskInfo[] => {
  return tasks.filter(task => task.agent === agent)
}

// =============================================================================
// Date Helpers
// =============================================================================

/**
 * Parse ISO date string to Date object.
 *
 * @throws {MCPError} 400 for an unparseable date
 */
export const parseDate = (dateStr: string): Date => {
  const date = new Date(dateStr)
  if (isNaN(date.getTime())) {
    throw new MCPError({
      statusCode: 400,
      message: `Invalid date string: '${dateStr}'`,
      rawResponse: dateStr
    })
  }
  return date
}

/**
 * Check if a task was completed within the last N hours.
 */
export const wasCompletedRecently = (
  task: TaskInfo,
  hours: number,
  now: Date = new Date()
): boolean => {
  if (!task.completedAt) return false
  const completedAt = parseDate(task.completedAt)
  const diffMs = now.getTime() - completedAt.getTime()
  const diffHours = diffMs / (1000 * 60 * 60)
  return diffHours <= hours
}

// =============================================================================
// Retry Helpers
// =============================================================================

/**
 * Options for retry logic.
 *
 * The client already retries each call; this wraps whole sequences of calls
 * (submit then poll, for example).
 */
export interface RetryOptions {
  maxAttempts?: number
  initialDelayMs?: number
  maxDelayMs?: number
  backoffMultiplier?: number
  shouldRetry?: (error: unknown) => boolean
  /** Stops the current attempt and any pending delay */
  signal?: AbortSignal
}

/**
 * Default retry predicate - retry on network errors and 5xx responses.
 */
export const defaultShouldRetry = (error: unknown): boolean => {
  return isApiError(error) && isRetryableError(error)
}

/**
 * Execute a function with retry logic.
 *
 * `fn` receives a signal that fires when the caller aborts; an abort
 * rejects with ConnectionError (reason "aborted").
 *
 * @example
 * ```typescript
 * const task = await withRetry(async (signal) => {
 *   const submitted = await client.tasks.submit({ type: 'lint' }, { signal })
 *   return client.tasks.get(submitted.id, { signal })
 * }, { maxAttempts: 5 })
 * ```
 */
export const withRetry = <T>(
  fn: (signal: AbortSignal) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> => {
  const {
    maxAttempts = 3,
    initialDelayMs = 100,
    maxDelayMs = 5000,
    backoffMultiplier = 2,
    shouldRetry = defaultShouldRetry,
    signal
  } = options

  const schedule = Schedule.exponential(Duration.millis(initialDelayMs), backoffMultiplier).pipe(
    Schedule.modifyDelay((_, delay) => Duration.min(delay, Duration.millis(maxDelayMs))),
    Schedule.intersect(Schedule.recurs(Math.max(0, maxAttempts - 1)))
  )

  return runPromise(
    Effect.tryPromise({ try: fn, catch: (error) => error }).pipe(
      Effect.retry({ schedule, while: shouldRetry })
    ),
    { signal }
  )
}
