/**
 * Retry/backoff policy.
 *
 * Delays grow exponentially from `retryDelay`, get ±`jitter` randomization
 * so concurrently retrying clients spread out, and are capped at
 * `maxRetryDelay`. Within one request the sequence never decreases.
 */

import { Duration, Schedule } from "effect"

export interface RetryPolicy {
  /** Extra attempts after the first one. */
  readonly maxRetries: number
  /** Base delay in milliseconds; doubles with each retry. */
  readonly retryDelay: number
  /** Upper bound for any single delay, in milliseconds. */
  readonly maxRetryDelay: number
  /** Jitter ratio in [0, 1]; 0.2 means ±20%. */
  readonly jitter: number
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  retryDelay: 1000,
  maxRetryDelay: 30_000,
  jitter: 0.2
}

/**
 * Delay before retry number `attempt` (0-based).
 */
export const backoffDelay = (
  attempt: number,
  policy: RetryPolicy,
  random: () => number = Math.random
): number => {
  const base = Math.min(policy.retryDelay * 2 ** attempt, policy.maxRetryDelay)
  const factor = 1 + (random() * 2 - 1) * policy.jitter
  return Math.min(Math.round(base * factor), policy.maxRetryDelay)
}

/**
 * All delays for one request, clamped so that no delay is shorter than the
 * one before it.
 */
export const backoffDelays = (
  policy: RetryPolicy,
  random: () => number = Math.random
): number[] => {
  const delays: number[] = []
  let previous = 0
  for (let attempt = 0; attempt < policy.maxRetries; attempt++) {
    previous = Math.max(previous, backoffDelay(attempt, policy, random))
    delays.push(previous)
  }
  return delays
}

/**
 * Schedule that recurs `maxRetries` times with the backoff delays.
 * Build one per request: the jitter is drawn when it is created.
 */
export const retrySchedule = (
  policy: RetryPolicy,
  random: () => number = Math.random
): Schedule.Schedule<number> => {
  const delays = backoffDelays(policy, random)
  return Schedule.recurs(policy.maxRetries).pipe(
    Schedule.addDelay((attempt) => Duration.millis(delays[attempt] ?? policy.maxRetryDelay))
  )
}
