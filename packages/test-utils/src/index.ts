/**
 * @taskwire/test-utils - Test utilities, factories, fixtures, and helpers
 *
 * This package centralizes all test utilities across the taskwire monorepo.
 *
 * @example
 * ```typescript
 * import {
 *   createTestTask,
 *   mockRoute,
 *   mockServer,
 *   okEnvelope,
 *   runEffect
 * } from '@taskwire/test-utils'
 * ```
 *
 * @module @taskwire/test-utils
 */

// Fixtures - SHA256-based deterministic IDs
export { taskFixtureId } from "./fixtures/index.js"

// Factories
export {
  TaskFactory,
  createTestTask,
  createTestTasks,
  createTestAgent,
  createTestPlugin,
  type CreateTaskOptions,
  type CreateAgentOptions,
  type CreatePluginOptions
} from "./factories/index.js"

// Effect helpers
export {
  runEffect,
  runEffectEither,
  expectEffectFailure,
  type RunEffectOptions
} from "./helpers/index.js"

// In-process HTTP server
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
} from "./msw/index.js"
