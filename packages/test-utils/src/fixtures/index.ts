/**
 * Deterministic task IDs for test data.
 *
 * @module @taskwire/test-utils/fixtures
 */

import { createHash } from "node:crypto"

/**
 * ID of the nth task a factory creates in a namespace.
 * Stable across runs, shaped like a server-issued ID.
 *
 * @example
 * taskFixtureId("task-factory", 1) // -> 'task-' followed by 8 hex digits, same every run
 */
export const taskFixtureId = (namespace: string, sequence: number): string =>
  `task-${createHash("sha256").update(`${namespace}::task-${sequence}`).digest("hex").slice(0, 8)}`
