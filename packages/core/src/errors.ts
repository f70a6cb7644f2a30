import { Data } from "effect"
import type { JsonValue } from "@taskwire/types"

/**
 * How a request failed to produce a usable HTTP response.
 * - network: DNS failure, refused connection, TLS failure, reset
 * - timeout: the call's deadline elapsed (across all attempts)
 * - aborted: the caller's AbortSignal fired
 */
export type ConnectionFailureReason = "network" | "timeout" | "aborted"

/**
 * The transport never got a usable HTTP response.
 */
export class ConnectionError extends Data.TaggedError("ConnectionError")<{
  readonly reason: ConnectionFailureReason
  readonly cause: unknown
}> {
  get message() {
    const detail = this.cause instanceof Error ? this.cause.message : String(this.cause)
    return `Connection error (${this.reason}): ${detail}`
  }

  isTimeout(): boolean {
    return this.reason === "timeout"
  }

  isAborted(): boolean {
    return this.reason === "aborted"
  }
}

/**
 * A response was received but the server reported failure: `ok` was not
 * true, the HTTP status was 4xx/5xx, or the body could not be read as an
 * envelope. Client-side validation failures use the same shape with
 * status 400 (nothing was sent).
 */
export class MCPError extends Data.TaggedError("MCPError")<{
  readonly statusCode: number
  readonly message: string
  /** Parsed response document, or the raw text when it was not JSON. */
  readonly rawResponse: JsonValue
}> {
  isNotFound(): boolean {
    return this.statusCode === 404
  }

  isClientError(): boolean {
    return this.statusCode >= 400 && this.statusCode < 500
  }

  isServerError(): boolean {
    return this.statusCode >= 500
  }
}

/**
 * Invalid client configuration. Raised at construction, never by a call.
 */
export class ConfigurationError extends Data.TaggedError("ConfigurationError")<{
  readonly reason: string
}> {
  get message() {
    return `Invalid configuration: ${this.reason}`
  }
}

/** Every error a resource call can fail with. */
export type ApiError = ConnectionError | MCPError

export const isApiError = (error: unknown): error is ApiError =>
  error instanceof ConnectionError || error instanceof MCPError

/**
 * Connection-level failures and 5xx responses are retried; everything else
 * is surfaced on the first attempt.
 */
export const isRetryableError = (error: ApiError): boolean =>
  error._tag === "ConnectionError" ? error.reason === "network" : error.isServerError()
