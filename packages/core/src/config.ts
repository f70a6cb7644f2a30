/**
 * Client configuration.
 *
 * Configuration is fixed at construction: a resolved config is frozen and
 * shared by every call the client makes.
 */

import { Config, ConfigProvider, Effect, Option, type LogLevel } from "effect"
import { ConfigurationError } from "./errors.js"
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from "./retry.js"

export type LogLevelName = LogLevel.Literal

export type FetchFn = typeof globalThis.fetch

/**
 * Options accepted by the client. Every field is optional.
 */
export interface ClientConfig {
  /** Server base URL, optionally with a path prefix (default: http://localhost:5005) */
  readonly baseUrl?: string
  /** Deadline for a whole call, retries and backoff included, in ms (default: 30000) */
  readonly timeout?: number
  /** Extra attempts for connection failures and 5xx responses (default: 3) */
  readonly maxRetries?: number
  /** Base backoff delay in ms (default: 1000) */
  readonly retryDelay?: number
  /** Backoff cap in ms (default: 30000) */
  readonly maxRetryDelay?: number
  /** Jitter ratio in [0, 1] (default: 0.2) */
  readonly jitter?: number
  /** Headers sent with every request */
  readonly headers?: Readonly<Record<string, string>>
  /** Sent as `Authorization: Bearer <apiKey>` */
  readonly apiKey?: string
  /** Minimum level for the client's log output (default: Info) */
  readonly logLevel?: LogLevelName
  /** fetch implementation (default: the global fetch, looked up per request) */
  readonly fetch?: FetchFn
  /** Random source for backoff jitter, returning values in [0, 1) */
  readonly random?: () => number
}

export interface ResolvedClientConfig extends RetryPolicy {
  readonly baseUrl: string
  readonly timeout: number
  readonly headers: Readonly<Record<string, string>>
  readonly apiKey: string | undefined
  readonly logLevel: LogLevelName
  readonly fetch: FetchFn
  readonly random: () => number
}

export const DEFAULT_BASE_URL = "http://localhost:5005"
export const DEFAULT_TIMEOUT_MS = 30_000

const isNonNegativeInteger = (value: number): boolean =>
  Number.isInteger(value) && value >= 0

const isHttpUrl = (value: string): boolean => {
  try {
    const url = new URL(value)
    return url.protocol === "http:" || url.protocol === "https:"
  } catch {
    return false
  }
}

/**
 * Apply defaults, validate, and freeze a client configuration.
 */
export const resolveClientConfig = (
  config: ClientConfig = {}
): Effect.Effect<ResolvedClientConfig, ConfigurationError> =>
  Effect.gen(function* () {
    const resolved: ResolvedClientConfig = {
      baseUrl: config.baseUrl ?? DEFAULT_BASE_URL,
      timeout: config.timeout ?? DEFAULT_TIMEOUT_MS,
      maxRetries: config.maxRetries ?? DEFAULT_RETRY_POLICY.maxRetries,
      retryDelay: config.retryDelay ?? DEFAULT_RETRY_POLICY.retryDelay,
      maxRetryDelay: config.maxRetryDelay ?? DEFAULT_RETRY_POLICY.maxRetryDelay,
      jitter: config.jitter ?? DEFAULT_RETRY_POLICY.jitter,
      headers: Object.freeze({ ...config.headers }),
      apiKey: config.apiKey,
      logLevel: config.logLevel ?? "Info",
      fetch: config.fetch ?? ((input, init) => globalThis.fetch(input, init)),
      random: config.random ?? Math.random
    }

    if (!isHttpUrl(resolved.baseUrl)) {
      return yield* new ConfigurationError({
        reason: `baseUrl must be an absolute http(s) URL, got '${resolved.baseUrl}'`
      })
    }
    if (!isNonNegativeInteger(resolved.timeout) || resolved.timeout === 0) {
      return yield* new ConfigurationError({ reason: "timeout must be a positive integer" })
    }
    for (const key of ["maxRetries", "retryDelay", "maxRetryDelay"] as const) {
      if (!isNonNegativeInteger(resolved[key])) {
        return yield* new ConfigurationError({ reason: `${key} must be a non-negative integer` })
      }
    }
    if (!(resolved.jitter >= 0 && resolved.jitter <= 1)) {
      return yield* new ConfigurationError({ reason: "jitter must be between 0 and 1" })
    }

    return Object.freeze(resolved)
  })

/**
 * Configuration read from the environment:
 * TASKWIRE_URL, TASKWIRE_TIMEOUT_MS, TASKWIRE_MAX_RETRIES,
 * TASKWIRE_RETRY_DELAY_MS, TASKWIRE_API_KEY, TASKWIRE_LOG_LEVEL.
 */
export const ClientConfigFromEnv: Config.Config<ClientConfig> = Config.all({
  baseUrl: Config.string("TASKWIRE_URL").pipe(Config.withDefault(DEFAULT_BASE_URL)),
  timeout: Config.integer("TASKWIRE_TIMEOUT_MS").pipe(Config.withDefault(DEFAULT_TIMEOUT_MS)),
  maxRetries: Config.integer("TASKWIRE_MAX_RETRIES").pipe(
    Config.withDefault(DEFAULT_RETRY_POLICY.maxRetries)
  ),
  retryDelay: Config.integer("TASKWIRE_RETRY_DELAY_MS").pipe(
    Config.withDefault(DEFAULT_RETRY_POLICY.retryDelay)
  ),
  apiKey: Config.option(Config.string("TASKWIRE_API_KEY")),
  logLevel: Config.option(Config.logLevel("TASKWIRE_LOG_LEVEL"))
}).pipe(
  Config.map(({ apiKey, logLevel, ...rest }): ClientConfig => ({
    ...rest,
    apiKey: Option.getOrUndefined(apiKey),
    logLevel: Option.match(logLevel, {
      onNone: (): LogLevelName => "Info",
      onSome: (level) => level._tag
    })
  }))
)

/**
 * Load ClientConfigFromEnv from an environment map.
 */
export const loadClientConfigFromEnv = (
  env: Readonly<Record<string, string | undefined>> = process.env
): Effect.Effect<ClientConfig, ConfigurationError> => {
  const entries = Object.entries(env).filter(
    (entry): entry is [string, string] => entry[1] !== undefined
  )
  return Effect.withConfigProvider(
    ClientConfigFromEnv,
    ConfigProvider.fromMap(new Map(entries))
  ).pipe(Effect.mapError((error) => new ConfigurationError({ reason: String(error) })))
}
