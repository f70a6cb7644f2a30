/**
 * Request pipeline used by every resource operation:
 * transport → envelope → classification → payload schema.
 */

import { Effect, Schema } from "effect"
import type { JsonValue } from "@taskwire/types"
import { classifyResponse, invalidRequest, malformedPayload } from "./classify.js"
import type { ApiError, MCPError } from "./errors.js"
import { HttpTransport, type HttpMethod, type RequestOptions } from "./transport.js"

export interface PayloadRequestOptions extends RequestOptions {
  /** Reshape the selected payload before it is decoded */
  readonly normalize?: (payload: JsonValue, document: JsonValue) => unknown
}

/**
 * Perform a request and decode its payload with `schema`.
 * A payload that does not match fails with MCPError.
 */
export const requestPayload = <A, I>(
  method: HttpMethod,
  path: string,
  schema: Schema.Schema<A, I>,
  options: PayloadRequestOptions = {}
): Effect.Effect<A, ApiError, HttpTransport> =>
  Effect.gen(function* () {
    const transport = yield* HttpTransport
    const response = yield* transport.request(method, path, options)
    const classified = yield* classifyResponse(response)
    const input = options.normalize ? options.normalize(classified.payload, classified.document) : classified.payload
    return yield* Schema.decodeUnknown(schema)(input).pipe(
      Effect.mapError((error) => malformedPayload(classified, error))
    )
  })

/**
 * Validate a request body before sending it. Failures are reported as
 * MCPError with status 400 and nothing goes over the wire.
 */
export const validateRequest = <A, I>(
  schema: Schema.Schema<A, I>,
  input: unknown
): Effect.Effect<A, MCPError> =>
  Schema.decodeUnknown(schema)(input).pipe(
    Effect.mapError((error) => invalidRequest(error.message))
  )
