/**
 * Webhook types for taskwire
 */

import { Schema } from "effect"
import { JsonValueSchema } from "./json.js"

/** Header carrying the delivery signature. */
export const WEBHOOK_SIGNATURE_HEADER = "X-Webhook-Signature"

/** Subscription sent by the client. */
export interface WebhookRegistration {
  readonly url: string
  readonly events: readonly string[]
  readonly secret?: string
}

/** Validation applied to a registration before it is sent. */
export const WebhookRegistrationSchema = Schema.Struct({
  url: Schema.String.pipe(Schema.pattern(/^https?:\/\/\S+$/)),
  events: Schema.NonEmptyArray(Schema.NonEmptyString),
  secret: Schema.optional(Schema.String),
})

/** Server response to a registration. Older deployments use `id`. */
export const WebhookCreatedSchema = Schema.Union(
  Schema.Struct({ webhookId: Schema.String }),
  Schema.Struct({ id: Schema.String })
)
export type WebhookCreated = typeof WebhookCreatedSchema.Type

/** Registered webhook as listed by the server. */
export const WebhookInfoSchema = Schema.Struct({
  webhookId: Schema.optional(Schema.String),
  id: Schema.optional(Schema.String),
  url: Schema.String,
  events: Schema.Array(Schema.String),
  active: Schema.optional(Schema.Boolean),
  createdAt: Schema.optional(Schema.String),
})
export type WebhookInfo = typeof WebhookInfoSchema.Type

/** Body the server posts to a registered webhook URL. */
export const WebhookDeliverySchema = Schema.Struct({
  id: Schema.String,
  webhook_id: Schema.String,
  event_type: Schema.String,
  timestamp: Schema.String,
  data: JsonValueSchema,
})
export type WebhookDelivery = typeof WebhookDeliverySchema.Type
