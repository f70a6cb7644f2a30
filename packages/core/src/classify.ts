/**
 * Error classification.
 *
 * Maps transport outcomes onto the two error kinds callers see.
 */

import { Effect, type ParseResult } from "effect"
import type { JsonValue, PayloadSource } from "@taskwire/types"
import { decodeEnvelope, envelopeErrorField } from "./envelope.js"
import { ConnectionError, MCPError } from "./errors.js"

/** Status code and body of one HTTP exchange. */
export interface RawResponse {
  readonly statusCode: number
  readonly body: string
}

/** A successful envelope and where its payload came from. */
export interface ClassifiedPayload {
  readonly statusCode: number
  readonly payload: JsonValue
  readonly source: PayloadSource
  readonly document: JsonValue
}

/**
 * Classify a received response.
 *
 * 4xx/5xx always fail, with the envelope's `error` as message when present.
 * Below 400 the envelope decides.
 */
export const classifyResponse = (
  response: RawResponse
): Effect.Effect<ClassifiedPayload, MCPError> => {
  const decoded = decodeEnvelope(response.body)

  if (response.statusCode >= 400) {
    return Effect.fail(
      new MCPError({
        statusCode: response.statusCode,
        message: envelopeErrorField(decoded.document) ?? `HTTP ${response.statusCode}`,
        rawResponse: decoded.document
      })
    )
  }

  if (!decoded.ok) {
    return Effect.fail(
      new MCPError({
        statusCode: response.statusCode,
        message: decoded.error,
        rawResponse: decoded.document
      })
    )
  }

  return Effect.succeed({
    statusCode: response.statusCode,
    payload: decoded.payload,
    source: decoded.source,
    document: decoded.document
  })
}

/**
 * Server error used while a 5xx is still eligible for retry. The same value
 * is surfaced when retries run out.
 */
export const serverError = (response: RawResponse): MCPError => {
  const decoded = decodeEnvelope(response.body)
  return new MCPError({
    statusCode: response.statusCode,
    message: envelopeErrorField(decoded.document) ?? `HTTP ${response.statusCode}`,
    rawResponse: decoded.document
  })
}

/**
 * A fetch rejection: the request never produced a response.
 */
export const connectionFailure = (cause: unknown): ConnectionError =>
  new ConnectionError({ reason: "network", cause })

/**
 * A payload that decoded as an envelope but does not match the expected shape.
 */
export const malformedPayload = (
  classified: ClassifiedPayload,
  error: ParseResult.ParseError
): MCPError =>
  new MCPError({
    statusCode: classified.statusCode,
    message: `Malformed response: ${error.message}`,
    rawResponse: classified.document
  })

/**
 * Rejection of a request before anything is sent.
 */
export const invalidRequest = (reason: string): MCPError =>
  new MCPError({
    statusCode: 400,
    message: `Invalid request: ${reason}`,
    rawResponse: null
  })
