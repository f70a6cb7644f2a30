/**
 * Task factory for creating test task data.
 *
 * @module @taskwire/test-utils/factories/task
 */

import type { TaskInfo } from "@taskwire/types"
import { taskFixtureId } from "../fixtures/index.js"

/**
 * Options for creating a test task. Any TaskInfo field may be overridden.
 */
export type CreateTaskOptions = Partial<TaskInfo>

/**
 * Factory class for creating test tasks as the server reports them.
 *
 * @example
 * ```typescript
 * const factory = new TaskFactory('tracked-task.test')
 *
 * const task = factory.create({ status: 'running' })
 * const tasks = factory.createMany(5, { agent: 'worker-1' })
 * ```
 */
export class TaskFactory {
  private counter = 0
  private readonly namespace: string

  constructor(namespace = "task-factory") {
    this.namespace = namespace
  }

  /**
   * Create a single test task. Defaults to a queued code analysis task.
   */
  create(options: CreateTaskOptions = {}): TaskInfo {
    this.counter++
    return {
      id: taskFixtureId(this.namespace, this.counter),
      status: "queued",
      type: "code_analysis",
      createdAt: "2024-01-01T00:00:00.000Z",
      ...options
    }
  }

  /**
   * Create multiple test tasks sharing the same overrides.
   */
  createMany(count: number, options: CreateTaskOptions = {}): TaskInfo[] {
    return Array.from({ length: count }, () => this.create(options))
  }

  /**
   * Reset the ID counter.
   */
  reset(): void {
    this.counter = 0
  }
}

/**
 * Create a single test task.
 */
export const createTestTask = (options: CreateTaskOptions = {}): TaskInfo =>
  new TaskFactory().create(options)

/**
 * Create multiple test tasks with distinct IDs.
 */
export const createTestTasks = (count: number, options: CreateTaskOptions = {}): TaskInfo[] =>
  new TaskFactory().createMany(count, options)
