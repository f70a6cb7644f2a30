/**
 * @taskwire/types - Shared TypeScript types for taskwire
 *
 * Effect Schema definitions providing both compile-time types and runtime
 * validation of everything that crosses the wire.
 *
 * @example
 * ```typescript
 * import { TaskInfoSchema, type TaskInfo, type TaskStatus } from "@taskwire/types"
 * import { ENVELOPE_PAYLOAD_KEYS } from "@taskwire/types"
 * ```
 */

// JSON values
export {
  JsonValueSchema,
  JsonObjectSchema,
  isJsonObject,
  type JsonPrimitive,
  type JsonValue,
  type JsonObject,
} from "./json.js"

// Envelope
export {
  ENVELOPE_PAYLOAD_KEYS,
  UNKNOWN_ERROR_MESSAGE,
  type EnvelopePayloadKey,
  type PayloadSource,
  type Envelope,
  type DecodedEnvelope,
} from "./envelope.js"

// Task types & schemas
export {
  TASK_STATUSES,
  TERMINAL_TASK_STATUSES,
  TASK_PRIORITIES,
  VALID_TRANSITIONS,
  TaskStatusSchema,
  TaskPrioritySchema,
  TaskSubmissionSchema,
  TaskInfoSchema,
  SubmittedTaskSchema,
  TaskAnalyticsSchema,
  CancelAckSchema,
  isValidTaskStatus,
  isTerminalStatus,
  canTransition,
  type TaskStatus,
  type TerminalTaskStatus,
  type TaskPriority,
  type TaskSubmission,
  type TaskInfo,
  type TaskAnalytics,
  type TaskListResult,
  type TaskListFilter,
  type CancelAck,
} from "./task.js"

// Agent types & schemas
export {
  AgentStatusSchema,
  HeartbeatAckSchema,
  type AgentStatus,
  type AgentHeartbeat,
  type HeartbeatAck,
} from "./agent.js"

// Server types & schemas
export { ServerStatusSchema, type ServerStatus } from "./server.js"

// AI request types & schemas
export {
  CodeAnalysisRequestSchema,
  CodeGenerationRequestSchema,
  PerformanceMetricsSchema,
  AiResultSchema,
  type CodeAnalysisRequest,
  type CodeGenerationRequest,
  type PerformanceMetrics,
  type AiResult,
} from "./ai.js"

// Webhook types & schemas
export {
  WEBHOOK_SIGNATURE_HEADER,
  WebhookRegistrationSchema,
  WebhookCreatedSchema,
  WebhookInfoSchema,
  WebhookDeliverySchema,
  type WebhookRegistration,
  type WebhookCreated,
  type WebhookInfo,
  type WebhookDelivery,
} from "./webhook.js"

// Plugin types & schemas
export { PluginInfoSchema, type PluginInfo } from "./plugin.js"
