/**
 * Server status types for taskwire
 */

import { Schema } from "effect"

/**
 * Server status. Deployments attach extra fields (agents, tasks,
 * controllers), which are kept as unknown values.
 */
export const ServerStatusSchema = Schema.Struct(
  {
    status: Schema.String,
    version: Schema.optional(Schema.String),
    uptime: Schema.optional(Schema.Number),
    lastChecked: Schema.optional(Schema.String),
  },
  Schema.Record({ key: Schema.String, value: Schema.Unknown })
)
export type ServerStatus = typeof ServerStatusSchema.Type
