/**
 * @module @taskwire/test-utils/msw
 */

export {
  TEST_BASE_URL,
  TEST_CLIENT_CONFIG,
  mockServer,
  okEnvelope,
  errorEnvelope,
  jsonResponse,
  textResponse,
  networkError,
  mockRoute,
  sequence,
  type RouteMethod,
  type RecordedRequest,
  type RouteContext,
  type RouteReply,
  type MockRoute
} from "./server.js"
