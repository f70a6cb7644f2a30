/**
 * @taskwire/sdk Client Tests
 *
 * Each namespace against an in-process server: paths, request bodies and
 * payload decoding.
 */

import { describe, it, expect } from "vitest"
import { ConfigurationError, MCPError } from "@taskwire/core"
import {
  TEST_BASE_URL,
  TEST_CLIENT_CONFIG,
  createTestAgent,
  createTestPlugin,
  createTestTask,
  errorEnvelope,
  jsonResponse,
  mockRoute,
  mockServer,
  okEnvelope
} from "@taskwire/test-utils"
import { TaskwireClient } from "./client.js"

const client = () => new TaskwireClient(TEST_CLIENT_CONFIG)

const rejection = async (promise: Promise<unknown>): Promise<MCPError> => {
  const error = await promise.then(
    () => undefined,
    (e: unknown) => e
  )
  if (!(error instanceof MCPError)) {
    throw new Error(`Expected MCPError, got ${String(error)}`)
  }
  return error
}

describe("TaskwireClient", () => {
  describe("configuration", () => {
    it("uses defaults", () => {
      const config = new TaskwireClient().configuration
      expect(config.baseUrl).toBe("http://localhost:5005")
      expect(config.timeout).toBe(30000)
      expect(config.maxRetries).toBe(3)
    })

    it("throws ConfigurationError for invalid settings", () => {
      expect(() => new TaskwireClient({ timeout: -5 })).toThrow(ConfigurationError)
      expect(() => new TaskwireClient({ baseUrl: "localhost:5005" })).toThrow(
        "Invalid configuration: baseUrl must be an absolute http(s) URL, got 'localhost:5005'"
      )
    })

    it("reads the environment and lets overrides win", () => {
      const fromEnv = TaskwireClient.fromEnv(
        { TASKWIRE_URL: "http://orchestrator:9000", TASKWIRE_MAX_RETRIES: "5" },
        { maxRetries: 1 }
      )
      expect(fromEnv.configuration.baseUrl).toBe("http://orchestrator:9000")
      expect(fromEnv.configuration.maxRetries).toBe(1)
    })

    it("exposes every namespace", () => {
      const sdk = client()
      expect(sdk.server).toBeDefined()
      expect(sdk.agents).toBeDefined()
      expect(sdk.tasks).toBeDefined()
      expect(sdk.ai).toBeDefined()
      expect(sdk.webhooks).toBeDefined()
      expect(sdk.plugins).toBeDefined()
    })
  })

  describe("server", () => {
    it("reads a status string beside other fields", async () => {
      mockServer.use(
        mockRoute("get", "/status", () =>
          jsonResponse({ ok: true, status: "healthy", version: "1.2.0", uptime: 3600 })
        ).handler
      )
      await expect(client().server.status()).resolves.toEqual({
        status: "healthy",
        version: "1.2.0",
        uptime: 3600
      })
    })

    it("reads a status object under data", async () => {
      mockServer.use(
        mockRoute("get", "/status", () =>
          jsonResponse(okEnvelope({ status: "running", version: "2.0.0", agents: 3 }))
        ).handler
      )
      await expect(client().server.status()).resolves.toEqual({
        status: "running",
        version: "2.0.0",
        agents: 3
      })
    })

    it("returns the health map as sent", async () => {
      mockServer.use(
        mockRoute("get", "/health", () =>
          jsonResponse(okEnvelope({ database: "up", queue: { depth: 2 } }))
        ).handler
      )
      await expect(client().server.health()).resolves.toEqual({
        database: "up",
        queue: { depth: 2 }
      })
    })
  })

  describe("agents", () => {
    it("lists agents from an array", async () => {
      const agent = createTestAgent()
      mockServer.use(
        mockRoute("get", "/api/agents/status", () =>
          jsonResponse(okEnvelope([agent], "agents"))
        ).handler
      )
      await expect(client().agents.list()).resolves.toEqual([agent])
    })

    it("lists agents from an object keyed by name", async () => {
      mockServer.use(
        mockRoute("get", "/api/agents/status", () =>
          jsonResponse(
            okEnvelope({ "worker-1": { status: "active" }, "worker-2": { status: "idle" } }, "agents")
          )
        ).handler
      )
      await expect(client().agents.list()).resolves.toEqual([
        { name: "worker-1", status: "active", capabilities: [] },
        { name: "worker-2", status: "idle", capabilities: [] }
      ])
    })

    it("gets one agent with its name encoded", async () => {
      const route = mockRoute("get", "/agents/:name", () =>
        jsonResponse(okEnvelope(createTestAgent({ name: "worker 1" })))
      )
      mockServer.use(route.handler)

      const agent = await client().agents.get("worker 1")
      expect(agent.name).toBe("worker 1")
      expect(route.calls[0]?.url.pathname).toBe("/agents/worker%201")
    })

    it("registers an agent", async () => {
      const route = mockRoute("post", "/agents", () =>
        jsonResponse(okEnvelope({ name: "worker-3", status: "registered", capabilities: ["lint"] }), 201)
      )
      mockServer.use(route.handler)

      const agent = await client().agents.register("worker-3", ["lint"])
      expect(agent).toEqual({ name: "worker-3", status: "registered", capabilities: ["lint"] })
      expect(route.calls[0]?.body).toEqual({ name: "worker-3", capabilities: ["lint"] })
    })

    it("rejects an empty agent name without a request", async () => {
      const route = mockRoute("post", "/agents", () => jsonResponse(okEnvelope({})))
      mockServer.use(route.handler)

      const error = await rejection(client().agents.register("", []))
      expect(error.statusCode).toBe(400)
      expect(error.message.startsWith("Invalid request: ")).toBe(true)
      expect(route.calls).toHaveLength(0)
    })

    it("sends a heartbeat", async () => {
      const route = mockRoute("post", "/heartbeat", () =>
        jsonResponse(okEnvelope({ agent: "controller-1", heartbeat: true }))
      )
      mockServer.use(route.handler)

      await expect(
        client().agents.heartbeat({ agent: "controller-1", project: "billing" })
      ).resolves.toEqual({ agent: "controller-1", heartbeat: true })
      expect(route.calls[0]?.body).toEqual({ agent: "controller-1", project: "billing" })
    })
  })

  describe("tasks", () => {
    it("defaults a submitted task without status to queued", async () => {
      mockServer.use(
        mockRoute("post", "/run", () => jsonResponse(okEnvelope({ id: "task-41" }), 201)).handler
      )
      await expect(client().tasks.submit({ type: "lint" })).resolves.toEqual({
        id: "task-41",
        status: "queued"
      })
    })

    it("rejects a submission without a type", async () => {
      const route = mockRoute("post", "/run", () => jsonResponse(okEnvelope({ id: "x" })))
      mockServer.use(route.handler)

      const error = await rejection(client().tasks.submit({ type: "" }))
      expect(error.statusCode).toBe(400)
      expect(error.rawResponse).toBeNull()
      expect(route.calls).toHaveLength(0)
    })

    it("gets a task", async () => {
      const task = createTestTask({
        id: "task-5",
        status: "completed",
        completedAt: "2024-01-01T00:05:00.000Z",
        result: { issues: 0 }
      })
      mockServer.use(mockRoute("get", "/tasks/:id", () => jsonResponse(okEnvelope(task))).handler)

      await expect(client().tasks.get("task-5")).resolves.toEqual(task)
    })

    it("reports a task payload without status as malformed", async () => {
      mockServer.use(
        mockRoute("get", "/tasks/:id", () => jsonResponse(okEnvelope({ id: "task-6" }))).handler
      )
      const error = await rejection(client().tasks.get("task-6"))
      expect(error.statusCode).toBe(200)
      expect(error.message.startsWith("Malformed response: ")).toBe(true)
      expect(error.rawResponse).toEqual({ ok: true, data: { id: "task-6" } })
    })

    it("returns aggregate analytics with the filter in the query", async () => {
      const route = mockRoute("get", "/api/tasks/analytics", () =>
        jsonResponse(okEnvelope({ total: 4, running: 1 }, "analytics"))
      )
      mockServer.use(route.handler)

      const result = await client().tasks.list({ status: "running" })
      expect(result).toEqual({ kind: "analytics", analytics: { total: 4, running: 1 } })
      expect(route.calls[0]?.url.searchParams.get("status")).toBe("running")
      expect(route.calls[0]?.url.searchParams.has("agent")).toBe(false)
    })

    it("returns a task list when the server sends one", async () => {
      const tasks = [createTestTask({ id: "t-1" }), createTestTask({ id: "t-2", status: "running" })]
      mockServer.use(
        mockRoute("get", "/api/tasks/analytics", () => jsonResponse(okEnvelope(tasks))).handler
      )

      const result = await client().tasks.list()
      expect(result).toEqual({ kind: "list", tasks })
    })

    it("surfaces a server-side cancel rejection", async () => {
      mockServer.use(
        mockRoute("post", "/tasks/:id/cancel", () =>
          jsonResponse(errorEnvelope("task already completed"), 409)
        ).handler
      )
      const error = await rejection(client().tasks.cancel("task-2"))
      expect(error.statusCode).toBe(409)
      expect(error.message).toBe("task already completed")
    })
  })

  describe("ai", () => {
    it("analyzes code", async () => {
      const route = mockRoute("post", "/ai/analyze", () =>
        jsonResponse(okEnvelope({ issues: [], score: 0.9 }))
      )
      mockServer.use(route.handler)

      const request = { code: "func main() {}", language: "go", options: { security: true } }
      await expect(client().ai.analyzeCode(request)).resolves.toEqual({ issues: [], score: 0.9 })
      expect(route.calls[0]?.body).toEqual(request)
    })

    it("predicts performance", async () => {
      const route = mockRoute("post", "/ai/predict", () =>
        jsonResponse(okEnvelope({ latencyMs: 120 }))
      )
      mockServer.use(route.handler)

      await expect(client().ai.predictPerformance({ cpu: 0.5, memory: 512 })).resolves.toEqual({
        latencyMs: 120
      })
      expect(route.calls[0]?.body).toEqual({ cpu: 0.5, memory: 512 })
    })

    it("generates code", async () => {
      mockServer.use(
        mockRoute("post", "/ai/generate", () =>
          jsonResponse(okEnvelope({ code: "print('hi')", language: "python" }))
        ).handler
      )
      await expect(
        client().ai.generateCode({ description: "print a greeting", language: "python" })
      ).resolves.toEqual({ code: "print('hi')", language: "python" })
    })

    it("rejects an empty description", async () => {
      const error = await rejection(client().ai.generateCode({ description: "" }))
      expect(error.statusCode).toBe(400)
    })
  })

  describe("webhooks", () => {
    it("registers a webhook and returns its ID", async () => {
      const route = mockRoute("post", "/webhooks", () =>
        jsonResponse(okEnvelope({ webhookId: "wh-1", url: "https://example.com/hook" }), 201)
      )
      mockServer.use(route.handler)

      const registration = {
        url: "https://example.com/hook",
        events: ["task.completed"],
        secret: "test-secret"
      }
      await expect(client().webhooks.register(registration)).resolves.toEqual({ webhookId: "wh-1" })
      expect(route.calls[0]?.body).toEqual(registration)
    })

    it("accepts an id field from older servers", async () => {
      mockServer.use(
        mockRoute("post", "/webhooks", () => jsonResponse(okEnvelope({ id: "wh-2" }))).handler
      )
      await expect(
        client().webhooks.register({ url: "http://hooks.local/x", events: ["task.failed"] })
      ).resolves.toEqual({ webhookId: "wh-2" })
    })

    it("validates the registration before sending", async () => {
      const route = mockRoute("post", "/webhooks", () => jsonResponse(okEnvelope({ id: "x" })))
      mockServer.use(route.handler)

      const badUrl = await rejection(
        client().webhooks.register({ url: "ftp://example.com", events: ["task.completed"] })
      )
      expect(badUrl.statusCode).toBe(400)

      const noEvents = await rejection(
        client().webhooks.register({ url: "https://example.com/hook", events: [] })
      )
      expect(noEvents.statusCode).toBe(400)
      expect(route.calls).toHaveLength(0)
    })

    it("lists webhooks", async () => {
      const hooks = [{ webhookId: "wh-1", url: "https://example.com/hook", events: ["task.completed"], active: true }]
      mockServer.use(mockRoute("get", "/webhooks", () => jsonResponse(okEnvelope(hooks))).handler)
      await expect(client().webhooks.list()).resolves.toEqual(hooks)
    })

    it("fails to delete an already deleted webhook", async () => {
      let deleted = false
      mockServer.use(
        mockRoute("delete", "/webhooks/:id", () => {
          if (deleted) return jsonResponse(errorEnvelope("Webhook not found"), 404)
          deleted = true
          return jsonResponse(okEnvelope({ deleted: true }))
        }).handler
      )

      const sdk = client()
      await expect(sdk.webhooks.delete("wh-1")).resolves.toEqual({ deleted: true })
      const error = await rejection(sdk.webhooks.delete("wh-1"))
      expect(error.isNotFound()).toBe(true)
      expect(error.message).toBe("Webhook not found")
    })
  })

  describe("plugins", () => {
    it("lists and gets plugins", async () => {
      const plugin = createTestPlugin()
      mockServer.use(
        mockRoute("get", "/plugins", () => jsonResponse(okEnvelope([plugin]))).handler,
        mockRoute("get", "/plugins/:name", () => jsonResponse(okEnvelope(plugin))).handler
      )

      const sdk = client()
      await expect(sdk.plugins.list()).resolves.toEqual([plugin])
      await expect(sdk.plugins.get("linter")).resolves.toEqual(plugin)
    })

    it("installs a plugin with its config", async () => {
      const route = mockRoute("post", "/plugins/install", () =>
        jsonResponse(okEnvelope(createTestPlugin({ name: "formatter" })))
      )
      mockServer.use(route.handler)

      const plugin = await client().plugins.install("formatter", { indent: 2 })
      expect(plugin.name).toBe("formatter")
      expect(route.calls[0]?.body).toEqual({ name: "formatter", config: { indent: 2 } })
    })

    it("uninstalls a plugin", async () => {
      const route = mockRoute("post", "/plugins/:name/uninstall", () =>
        jsonResponse(okEnvelope({ uninstalled: true }))
      )
      mockServer.use(route.handler)

      await expect(client().plugins.uninstall("formatter")).resolves.toEqual({ uninstalled: true })
      expect(route.calls[0]?.url.pathname).toBe("/plugins/formatter/uninstall")
    })
  })

  it("talks to the configured base URL only", () => {
    expect(client().configuration.baseUrl).toBe(TEST_BASE_URL)
  })
})
