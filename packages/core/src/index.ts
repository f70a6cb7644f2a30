/**
 * @taskwire/core - Client transport and task lifecycle for taskwire
 *
 * Effect programs implementing the request pipeline: HTTP transport with
 * retry/backoff, envelope decoding, error classification, and the task
 * state machine. The Promise-based SDK is built on top of these.
 */

// =============================================================================
// Errors
// =============================================================================
export {
  ConnectionError,
  MCPError,
  ConfigurationError,
  isApiError,
  isRetryableError,
  type ApiError,
  type ConnectionFailureReason
} from "./errors.js"

// =============================================================================
// Envelope & classification
// =============================================================================
export {
  decodeEnvelope,
  envelopeErrorField,
  MALFORMED_JSON_MESSAGE,
  NOT_AN_OBJECT_MESSAGE,
  MISSING_OK_MESSAGE
} from "./envelope.js"
export {
  classifyResponse,
  serverError,
  connectionFailure,
  malformedPayload,
  invalidRequest,
  type RawResponse,
  type ClassifiedPayload
} from "./classify.js"

// =============================================================================
// Transport
// =============================================================================
export {
  DEFAULT_RETRY_POLICY,
  backoffDelay,
  backoffDelays,
  retrySchedule,
  type RetryPolicy
} from "./retry.js"
export {
  HttpTransport,
  HttpTransportLive,
  makeHttpTransport,
  type HttpMethod,
  type RequestOptions
} from "./transport.js"
export { requestPayload, validateRequest, type PayloadRequestOptions } from "./request.js"
export { buildUrl, normalizeApiUrl, pathSegment, type QueryParams } from "./url.js"
export { SDK_NAME, SDK_VERSION, USER_AGENT } from "./version.js"

// =============================================================================
// Task lifecycle
// =============================================================================
export {
  observeTaskStatus,
  ensureCancellable,
  markCancelled,
  type TaskObservation
} from "./lifecycle.js"

// =============================================================================
// Configuration & runtime
// =============================================================================
export {
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUT_MS,
  ClientConfigFromEnv,
  resolveClientConfig,
  loadClientConfigFromEnv,
  type ClientConfig,
  type ResolvedClientConfig,
  type LogLevelName,
  type FetchFn
} from "./config.js"
export { runPromise, runSync, unwrapExit, type RunOptions } from "./runtime.js"
