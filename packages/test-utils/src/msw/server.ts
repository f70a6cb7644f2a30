/**
 * In-process HTTP server for SDK tests, built on msw.
 *
 * The shared `mockServer` is started by the root vitest setup; tests add
 * routes with `mockServer.use(route.handler)`.
 *
 * @example
 * ```typescript
 * const route = mockRoute("get", "/tasks/:id", () => jsonResponse(okEnvelope(task)))
 * mockServer.use(route.handler)
 *
 * const client = new TaskwireClient(TEST_CLIENT_CONFIG)
 * await client.tasks.get(task.id)
 * expect(route.calls).toHaveLength(1)
 * ```
 *
 * @module @taskwire/test-utils/msw
 */

import { http, HttpResponse, type HttpHandler } from "msw"
import { setupServer } from "msw/node"
import type { ClientConfig } from "@taskwire/core"
import type { EnvelopePayloadKey } from "@taskwire/types"

/** Base URL every test client talks to. Never resolved over the network. */
export const TEST_BASE_URL = "http://taskwire.test"

/**
 * Client configuration for tests: fast deterministic backoff and a short
 * call deadline.
 */
export const TEST_CLIENT_CONFIG = {
  baseUrl: TEST_BASE_URL,
  timeout: 2000,
  maxRetries: 3,
  retryDelay: 1,
  maxRetryDelay: 10,
  jitter: 0,
  logLevel: "None"
} satisfies ClientConfig

export const mockServer = setupServer()

// =============================================================================
// Responses
// =============================================================================

/**
 * A success envelope carrying `payload` under `key`.
 */
export const okEnvelope = (
  payload: unknown,
  key: EnvelopePayloadKey = "data"
): Readonly<Record<string, unknown>> => ({
  ok: true,
  [key]: payload
})

/**
 * A failure envelope.
 */
export const errorEnvelope = (error: string): Readonly<Record<string, unknown>> => ({
  ok: false,
  error
})

/**
 * A JSON response with the given status. `body` is serialized with
 * JSON.stringify, so any test data shape is accepted.
 */
export const jsonResponse = (body: unknown, status = 200): Response =>
  new HttpResponse(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" }
  })

/**
 * A response with an arbitrary (possibly malformed) text body.
 */
export const textResponse = (body: string, status = 200): Response =>
  new HttpResponse(body, { status, headers: { "Content-Type": "text/plain" } })

/**
 * A connection-level failure: fetch rejects as if the network failed.
 */
export const networkError = (): Response => HttpResponse.error()

// =============================================================================
// Routes
// =============================================================================

export type RouteMethod = "get" | "post" | "put" | "patch" | "delete"

/**
 * One request as received by a mock route.
 */
export interface RecordedRequest {
  readonly method: string
  readonly url: URL
  readonly headers: Headers
  /** Parsed JSON body, or undefined when the request had none */
  readonly body: unknown
  readonly params: Readonly<Record<string, string | readonly string[] | undefined>>
}

export interface RouteContext {
  readonly request: RecordedRequest
  /** 1-based attempt number for this route */
  readonly attempt: number
}

export type RouteReply = (context: RouteContext) => Response | Promise<Response>

export interface MockRoute {
  readonly handler: HttpHandler
  /** Every request the route received, in order */
  readonly calls: RecordedRequest[]
}

const readBody = async (request: Request): Promise<unknown> => {
  const text = await request.text()
  return text === "" ? undefined : JSON.parse(text)
}

/**
 * A route on TEST_BASE_URL that records each request and answers with
 * `reply`. `path` may contain msw parameters such as `/tasks/:id`.
 */
export const mockRoute = (method: RouteMethod, path: string, reply: RouteReply): MockRoute => {
  const calls: RecordedRequest[] = []
  const handler = http[method](`${TEST_BASE_URL}${path}`, async ({ request, params }) => {
    const recorded: RecordedRequest = {
      method: request.method,
      url: new URL(request.url),
      headers: request.headers,
      body: await readBody(request),
      params
    }
    calls.push(recorded)
    return reply({ request: recorded, attempt: calls.length })
  })
  return { handler, calls }
}

/**
 * Answer with each reply in turn; the last one repeats.
 */
export const sequence = (...replies: readonly RouteReply[]): RouteReply => (context) => {
  const reply = replies[Math.min(context.attempt, replies.length) - 1]
  return reply ? reply(context) : networkError()
}
