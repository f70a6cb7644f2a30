/**
 * Plugin types for taskwire
 */

import { Schema } from "effect"

export const PluginInfoSchema = Schema.Struct({
  name: Schema.String,
  version: Schema.String,
  description: Schema.optional(Schema.String),
  capabilities: Schema.optionalWith(Schema.Array(Schema.String), { default: () => [] }),
  status: Schema.String,
  installedAt: Schema.optional(Schema.String),
})
export type PluginInfo = typeof PluginInfoSchema.Type
