/**
 * Agent and plugin factories.
 *
 * @module @taskwire/test-utils/factories/agent
 */

import type { AgentStatus, PluginInfo } from "@taskwire/types"

export type CreateAgentOptions = Partial<AgentStatus>

export type CreatePluginOptions = Partial<PluginInfo>

/**
 * Create a healthy, idle test agent.
 */
export const createTestAgent = (options: CreateAgentOptions = {}): AgentStatus => ({
  name: "worker-1",
  status: "active",
  lastSeen: "2024-01-01T00:00:00.000Z",
  healthScore: 0.95,
  capabilities: ["code_analysis"],
  activeTasks: 0,
  totalTasks: 0,
  ...options
})

/**
 * Create an installed test plugin.
 */
export const createTestPlugin = (options: CreatePluginOptions = {}): PluginInfo => ({
  name: "linter",
  version: "1.0.0",
  capabilities: [],
  status: "installed",
  ...options
})
