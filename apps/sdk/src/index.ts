/**
 * @taskwire/sdk - TypeScript client for the taskwire orchestration server
 *
 * This SDK provides a simple, Promise-based API for submitting and tracking
 * tasks, inspecting agents, running AI operations, and managing webhooks
 * and plugins.
 *
 * @example
 * ```typescript
 * import { TaskwireClient, MCPError } from "@taskwire/sdk"
 *
 * const client = new TaskwireClient({ baseUrl: "http://localhost:5005" })
 *
 * // Submit a task
 * const task = await client.tasks.submit({ type: "code_analysis", target: "main.go" })
 *
 * // Follow it without ever seeing a status go backwards
 * const tracked = await client.tasks.track(task)
 * await tracked.refresh()
 *
 * // Inspect agents
 * const agents = await client.agents.list()
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// Client
// =============================================================================

export { TaskwireClient } from "./client.js"
export { TrackedTask, type TaskOperations } from "./tracked-task.js"

// =============================================================================
// Errors
// =============================================================================

export {
  ConnectionError,
  MCPError,
  ConfigurationError,
  isApiError,
  type ApiError,
  type ConnectionFailureReason
} from "@taskwire/core"

// =============================================================================
// Types
// =============================================================================

export type { CallOptions, TaskwireClientConfig } from "./types.js"

export {
  TASK_STATUSES,
  TERMINAL_TASK_STATUSES,
  TASK_PRIORITIES,
  VALID_TRANSITIONS,
  WEBHOOK_SIGNATURE_HEADER
} from "./types.js"

export type {
  TaskStatus,
  TerminalTaskStatus,
  TaskPriority,
  TaskSubmission,
  TaskInfo,
  TaskAnalytics,
  TaskListResult,
  TaskListFilter,
  CancelAck,
  AgentStatus,
  AgentHeartbeat,
  HeartbeatAck,
  ServerStatus,
  CodeAnalysisRequest,
  CodeGenerationRequest,
  PerformanceMetrics,
  AiResult,
  WebhookRegistration,
  WebhookInfo,
  WebhookDelivery,
  PluginInfo,
  JsonValue,
  JsonObject
} from "./types.js"

// =============================================================================
// Webhooks
// =============================================================================

export {
  canonicalJson,
  signWebhookPayload,
  verifyWebhookSignature,
  parseWebhookDelivery
} from "./webhook-signature.js"

// =============================================================================
// Utilities
// =============================================================================

export {
  // Status helpers
  isValidTaskStatus,
  isTerminalStatus,
  canTransition,
  // Task helpers
  filterByStatus,
  filterByAgent,
  // Date helpers
  parseDate,
  wasCompletedRecently,
  // URL helpers
  buildUrl,
  normalizeApiUrl,
  // Retry logic
  withRetry,
  defaultShouldRetry
} from "./utils.js"

export type { RetryOptions } from "./utils.js"
