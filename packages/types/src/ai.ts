/**
 * AI operation request types for taskwire
 */

import { Schema } from "effect"
import { JsonObjectSchema } from "./json.js"

/** Request for AI-assisted code analysis. */
export const CodeAnalysisRequestSchema = Schema.Struct({
  code: Schema.NonEmptyString,
  language: Schema.optional(Schema.String),
  options: Schema.optional(Schema.Record({ key: Schema.String, value: Schema.Boolean })),
  context: Schema.optional(Schema.Record({ key: Schema.String, value: Schema.String })),
})
export type CodeAnalysisRequest = typeof CodeAnalysisRequestSchema.Type

/** Request for code generation from a description. */
export const CodeGenerationRequestSchema = Schema.Struct({
  description: Schema.NonEmptyString,
  language: Schema.optional(Schema.String),
  context: Schema.optional(Schema.String),
  constraints: Schema.optional(Schema.Array(Schema.String)),
})
export type CodeGenerationRequest = typeof CodeGenerationRequestSchema.Type

/** Metrics submitted for performance prediction. */
export const PerformanceMetricsSchema = JsonObjectSchema
export type PerformanceMetrics = typeof PerformanceMetricsSchema.Type

/** AI operations return open result maps. */
export const AiResultSchema = JsonObjectSchema
export type AiResult = typeof AiResultSchema.Type
