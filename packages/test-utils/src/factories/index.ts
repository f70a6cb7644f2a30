/**
 * Entity factories for creating test data.
 *
 * @module @taskwire/test-utils/factories
 */

// Task factory
export {
  TaskFactory,
  createTestTask,
  createTestTasks,
  type CreateTaskOptions
} from "./task.factory.js"

// Agent & plugin factories
export {
  createTestAgent,
  createTestPlugin,
  type CreateAgentOptions,
  type CreatePluginOptions
} from "./agent.factory.js"
