/**
 * Agent types for taskwire
 */

import { Schema } from "effect"

/** Worker agent as reported by the server. */
export const AgentStatusSchema = Schema.Struct({
  name: Schema.String,
  status: Schema.String,
  lastSeen: Schema.optional(Schema.String),
  healthScore: Schema.optional(Schema.Number.pipe(Schema.between(0, 1))),
  capabilities: Schema.optionalWith(Schema.Array(Schema.String), { default: () => [] }),
  activeTasks: Schema.optional(Schema.Number.pipe(Schema.int(), Schema.nonNegative())),
  totalTasks: Schema.optional(Schema.Number.pipe(Schema.int(), Schema.nonNegative())),
})
export type AgentStatus = typeof AgentStatusSchema.Type

/** Liveness announcement posted by a controller. */
export interface AgentHeartbeat {
  readonly agent: string
  readonly project?: string
}

export const HeartbeatAckSchema = Schema.Struct({
  agent: Schema.String,
  heartbeat: Schema.Boolean,
})
export type HeartbeatAck = typeof HeartbeatAckSchema.Type
