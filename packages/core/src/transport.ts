/**
 * HttpTransport
 *
 * Issues HTTP requests against the server. One call is a sequence of
 * attempts: connection failures and 5xx responses are retried with backoff,
 * and the configured timeout bounds the whole sequence.
 *
 * Retries apply to every method. A POST whose response was lost after the
 * server accepted it can therefore be submitted twice (for example a
 * duplicate task); the server offers no idempotency key to prevent this.
 */

import { Context, Duration, Effect, Layer } from "effect"
import { connectionFailure, serverError, type RawResponse } from "./classify.js"
import type { ResolvedClientConfig } from "./config.js"
import { ConnectionError, isRetryableError, type ApiError } from "./errors.js"
import { retrySchedule } from "./retry.js"
import { buildUrl, type QueryParams } from "./url.js"
import { USER_AGENT } from "./version.js"

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE"

export interface RequestOptions {
  /** JSON-serializable request body */
  readonly body?: unknown
  /** Query parameters; undefined values are omitted */
  readonly query?: QueryParams
}

export class HttpTransport extends Context.Tag("HttpTransport")<
  HttpTransport,
  {
    /**
     * Perform a request with retries.
     * Succeeds with any response below 500; fails with ConnectionError, or
     * with MCPError for the last 5xx once retries are exhausted.
     */
    readonly request: (
      method: HttpMethod,
      path: string,
      options?: RequestOptions
    ) => Effect.Effect<RawResponse, ApiError>
  }
>() {}

// Header names are case-insensitive; the SDK values replace any caller variant.
const requestHeaders = (config: ResolvedClientConfig): Headers => {
  const headers = new Headers(config.headers)
  headers.set("Content-Type", "application/json")
  headers.set("Accept", "application/json")
  headers.set("User-Agent", USER_AGENT)

  if (config.apiKey) {
    headers.set("Authorization", `Bearer ${config.apiKey}`)
  }

  return headers
}

export const makeHttpTransport = (
  config: ResolvedClientConfig
): Context.Tag.Service<typeof HttpTransport> => {
  const headers = requestHeaders(config)

  const attempt = (
    method: HttpMethod,
    url: string,
    body: string | undefined
  ): Effect.Effect<RawResponse, ApiError> =>
    Effect.tryPromise({
      try: async (signal) => {
        const response = await config.fetch(url, { method, headers, body, signal })
        return { statusCode: response.status, body: await response.text() }
      },
      catch: connectionFailure
    }).pipe(
      Effect.flatMap((response) =>
        response.statusCode >= 500
          ? Effect.fail(serverError(response))
          : Effect.succeed(response)
      )
    )

  const request = (
    method: HttpMethod,
    path: string,
    options: RequestOptions = {}
  ): Effect.Effect<RawResponse, ApiError> =>
    Effect.suspend(() => {
      const url = buildUrl(config.baseUrl, path, options.query)
      const body = options.body === undefined ? undefined : JSON.stringify(options.body)
      let attempts = 0

      return Effect.suspend(() => {
        attempts++
        return attempt(method, url, body)
      }).pipe(
        Effect.tapError((error) =>
          Effect.logDebug(`Attempt ${attempts} failed: ${error.message}`)
        ),
        Effect.retry({
          schedule: retrySchedule(config, config.random),
          while: isRetryableError
        }),
        Effect.timeoutFail({
          duration: Duration.millis(config.timeout),
          onTimeout: () =>
            new ConnectionError({
              reason: "timeout",
              cause: new Error(`Request timed out after ${config.timeout}ms`)
            })
        }),
        Effect.tap((response) =>
          Effect.logDebug(`HTTP ${response.statusCode} after ${attempts} attempt(s)`)
        ),
        Effect.annotateLogs({ method, path }),
        Effect.withLogSpan("taskwire.request")
      )
    })

  return HttpTransport.of({ request })
}

export const HttpTransportLive = (config: ResolvedClientConfig) =>
  Layer.succeed(HttpTransport, makeHttpTransport(config))
