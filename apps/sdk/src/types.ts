/**
 * @taskwire/sdk Types
 *
 * Re-exports all wire types from @taskwire/types for convenience.
 * SDK consumers can import types directly from the SDK.
 *
 * @example
 * ```typescript
 * import type { TaskInfo, TaskStatus, TaskSubmission } from "@taskwire/sdk"
 * ```
 */

import type { ClientConfig } from "@taskwire/core"

/** Options for a single SDK call. */
export interface CallOptions {
  /**
   * Cancels the call: aborts the in-flight attempt and any pending retry
   * sleep. The call then fails with ConnectionError (reason "aborted").
   */
  readonly signal?: AbortSignal
}

/** Client configuration (all fields optional). */
export type TaskwireClientConfig = ClientConfig

// Task types
export {
  TASK_STATUSES,
  TERMINAL_TASK_STATUSES,
  TASK_PRIORITIES,
  VALID_TRANSITIONS,
  type TaskStatus,
  type TerminalTaskStatus,
  type TaskPriority,
  type TaskSubmission,
  type TaskInfo,
  type TaskAnalytics,
  type TaskListResult,
  type TaskListFilter,
  type CancelAck
} from "@taskwire/types"

// Agent types
export type { AgentStatus, AgentHeartbeat, HeartbeatAck } from "@taskwire/types"

// Server types
export type { ServerStatus } from "@taskwire/types"

// AI types
export type {
  CodeAnalysisRequest,
  CodeGenerationRequest,
  PerformanceMetrics,
  AiResult
} from "@taskwire/types"

// Webhook types
export {
  WEBHOOK_SIGNATURE_HEADER,
  type WebhookRegistration,
  type WebhookInfo,
  type WebhookDelivery
} from "@taskwire/types"

// Plugin types
export type { PluginInfo } from "@taskwire/types"

// JSON values
export type { JsonValue, JsonObject } from "@taskwire/types"
