/**
 * JSON value types for taskwire
 *
 * Task parameters, task results, AI responses and plugin configuration are
 * open maps: the server attaches arbitrary task-specific data, so they are
 * modeled as JSON values rather than fixed structs.
 */

import { Schema } from "effect"

export type JsonPrimitive = string | number | boolean | null

export type JsonValue =
  | JsonPrimitive
  | ReadonlyArray<JsonValue>
  | { readonly [key: string]: JsonValue }

export type JsonObject = { readonly [key: string]: JsonValue }

/** Any JSON-compatible value (recursive). */
export const JsonValueSchema: Schema.Schema<JsonValue> = Schema.Union(
  Schema.String,
  Schema.Number,
  Schema.Boolean,
  Schema.Null,
  Schema.Array(Schema.suspend((): Schema.Schema<JsonValue> => JsonValueSchema)),
  Schema.Record({
    key: Schema.String,
    value: Schema.suspend((): Schema.Schema<JsonValue> => JsonValueSchema),
  })
)

/** A JSON object with arbitrary keys. */
export const JsonObjectSchema: Schema.Schema<JsonObject> = Schema.Record({
  key: Schema.String,
  value: JsonValueSchema,
})

/**
 * Narrow an unknown value to a plain JSON object (not an array, not null).
 */
export const isJsonObject = (value: unknown): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value)
