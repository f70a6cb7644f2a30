/**
 * Task types for taskwire
 *
 * Core type definitions using Effect Schema.
 * Schema definitions provide both compile-time types and runtime validation.
 */

import { Schema } from "effect"
import { JsonObjectSchema } from "./json.js"

// =============================================================================
// CONSTANTS
// =============================================================================

/**
 * All task statuses in lifecycle order.
 * queued → running → completed | failed, with cancelled reachable from
 * queued or running.
 */
export const TASK_STATUSES = [
  "queued",
  "running",
  "completed",
  "failed",
  "cancelled",
] as const

/** Statuses from which no further transition is possible. */
export const TERMINAL_TASK_STATUSES = ["completed", "failed", "cancelled"] as const

/** Task priorities accepted on submission. */
export const TASK_PRIORITIES = ["low", "normal", "high", "critical"] as const

/**
 * Valid status transitions map.
 * Terminal statuses have no outgoing transitions.
 */
export const VALID_TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  queued: ["running", "cancelled"],
  running: ["completed", "failed", "cancelled"],
  completed: [],
  failed: [],
  cancelled: [],
} as const

// =============================================================================
// SCHEMAS & TYPES
// =============================================================================

/** Task status - one of the lifecycle states. */
export const TaskStatusSchema = Schema.Literal(...TASK_STATUSES)
export type TaskStatus = typeof TaskStatusSchema.Type

export type TerminalTaskStatus = (typeof TERMINAL_TASK_STATUSES)[number]

/** Task priority. */
export const TaskPrioritySchema = Schema.Literal(...TASK_PRIORITIES)
export type TaskPriority = typeof TaskPrioritySchema.Type

/** Job submitted by the client. Immutable once sent. */
export const TaskSubmissionSchema = Schema.Struct({
  type: Schema.NonEmptyString,
  target: Schema.optional(Schema.String),
  parameters: Schema.optional(JsonObjectSchema),
  priority: Schema.optional(TaskPrioritySchema),
  agent: Schema.optional(Schema.String),
})
export type TaskSubmission = typeof TaskSubmissionSchema.Type

/**
 * Task as reported by the server.
 * Only `id` and `status` are guaranteed; deployments omit the rest freely.
 */
export const TaskInfoSchema = Schema.Struct({
  id: Schema.String,
  status: TaskStatusSchema,
  type: Schema.optional(Schema.String),
  agent: Schema.optional(Schema.String),
  createdAt: Schema.optional(Schema.String),
  completedAt: Schema.optional(Schema.String),
  priority: Schema.optional(TaskPrioritySchema),
  result: Schema.optional(JsonObjectSchema),
  error: Schema.optional(Schema.String),
  progress: Schema.optional(Schema.Number.pipe(Schema.between(0, 1))),
})
export type TaskInfo = typeof TaskInfoSchema.Type

/** Submission response. A new task without a reported status is queued. */
export const SubmittedTaskSchema = Schema.Struct({
  ...TaskInfoSchema.fields,
  status: Schema.optionalWith(TaskStatusSchema, { default: () => "queued" as const }),
})

/** Aggregate task counts returned by the analytics endpoint. */
export const TaskAnalyticsSchema = JsonObjectSchema
export type TaskAnalytics = typeof TaskAnalyticsSchema.Type

/**
 * Result of listing tasks. Some deployments return the tasks themselves,
 * others only aggregate counts; callers must handle both.
 */
export type TaskListResult =
  | { readonly kind: "list"; readonly tasks: readonly TaskInfo[] }
  | { readonly kind: "analytics"; readonly analytics: TaskAnalytics }

/** Filter options for listing tasks. */
export interface TaskListFilter {
  readonly status?: TaskStatus
  readonly agent?: string
}

/** Acknowledgement returned by the cancel endpoint. */
export const CancelAckSchema = JsonObjectSchema
export type CancelAck = typeof CancelAckSchema.Type

// =============================================================================
// VALIDATION FUNCTIONS
// =============================================================================

/**
 * Check if a string is a valid task status.
 */
export const isValidTaskStatus = (status: string): status is TaskStatus =>
  (TASK_STATUSES as readonly string[]).includes(status)

/**
 * Check if a status is terminal (completed, failed or cancelled).
 */
export const isTerminalStatus = (status: TaskStatus): status is TerminalTaskStatus =>
  (TERMINAL_TASK_STATUSES as readonly TaskStatus[]).includes(status)

/**
 * Check if a direct transition between two statuses is part of the lifecycle.
 */
export const canTransition = (from: TaskStatus, to: TaskStatus): boolean =>
  VALID_TRANSITIONS[from].includes(to)
