/**
 * @taskwire/sdk Client
 *
 * TaskwireClient provides a Promise-based interface to a task-orchestration
 * server: server status, agents, tasks, AI operations, webhooks and plugins.
 *
 * @example
 * ```typescript
 * const client = new TaskwireClient({ baseUrl: 'http://localhost:5005' })
 *
 * const task = await client.tasks.submit({ type: 'code_analysis', target: 'main.go' })
 * const latest = await client.tasks.get(task.id)
 * ```
 */

import { Effect, Schema } from "effect"
import {
  AgentStatusSchema,
  AiResultSchema,
  CancelAckSchema,
  CodeAnalysisRequestSchema,
  CodeGenerationRequestSchema,
  HeartbeatAckSchema,
  JsonObjectSchema,
  JsonValueSchema,
  PerformanceMetricsSchema,
  PluginInfoSchema,
  ServerStatusSchema,
  SubmittedTaskSchema,
  TaskAnalyticsSchema,
  TaskInfoSchema,
  TaskSubmissionSchema,
  WebhookCreatedSchema,
  WebhookInfoSchema,
  WebhookRegistrationSchema,
  isJsonObject,
  type JsonValue
} from "@taskwire/types"
import {
  HttpTransport,
  loadClientConfigFromEnv,
  makeHttpTransport,
  pathSegment,
  requestPayload,
  resolveClientConfig,
  runPromise,
  runSync,
  validateRequest,
  type ApiError,
  type ClientConfig,
  type ResolvedClientConfig
} from "@taskwire/core"
import { TrackedTask } from "./tracked-task.js"
import type {
  AgentHeartbeat,
  AgentStatus,
  AiResult,
  CallOptions,
  CancelAck,
  CodeAnalysisRequest,
  CodeGenerationRequest,
  HeartbeatAck,
  JsonObject,
  PerformanceMetrics,
  PluginInfo,
  ServerStatus,
  TaskInfo,
  TaskListFilter,
  TaskListResult,
  TaskSubmission,
  WebhookInfo,
  WebhookRegistration
} from "./types.js"

// =============================================================================
// Runner
// =============================================================================

/**
 * Runs a resource program against the client's transport and settles the
 * returned promise with its value or its typed error.
 */
type Runner = <A>(
  effect: Effect.Effect<A, ApiError, HttpTransport>,
  options?: CallOptions
) => Promise<A>

const NonEmptyName = Schema.NonEmptyString

/**
 * `/api/agents/status` returns either a list of agents or an object keyed by
 * agent name; both are read as a list.
 */
const agentsFromPayload = (payload: JsonValue): unknown => {
  if (!isJsonObject(payload)) return payload
  return Object.entries(payload).map(([name, agent]) =>
    isJsonObject(agent) ? { name, ...agent } : agent
  )
}

/**
 * `/status` may answer with a bare status string beside other top-level
 * fields; those fields are kept.
 */
const serverStatusFromPayload = (payload: JsonValue, document: JsonValue): unknown => {
  if (typeof payload !== "string") return payload
  const fields = isJsonObject(document)
    ? Object.fromEntries(Object.entries(document).filter(([key]) => key !== "ok"))
    : {}
  return { ...fields, status: payload }
}

/** A list payload is a task list; anything else is aggregate analytics. */
const taskListFromPayload = (payload: JsonValue): unknown =>
  Array.isArray(payload)
    ? { kind: "list", tasks: payload }
    : { kind: "analytics", analytics: payload }

const TaskListResultSchema = Schema.Union(
  Schema.Struct({ kind: Schema.Literal("list"), tasks: Schema.Array(TaskInfoSchema) }),
  Schema.Struct({ kind: Schema.Literal("analytics"), analytics: TaskAnalyticsSchema })
)

// =============================================================================
// Namespaces
// =============================================================================

/**
 * Server status and health.
 */
class ServerNamespace {
  constructor(private readonly run: Runner) {}

  /**
   * Get server status and version.
   *
   * @example
   * ```typescript
   * const { status, version } = await client.server.status()
   * ```
   */
  async status(options: CallOptions = {}): Promise<ServerStatus> {
    return this.run(
      requestPayload("GET", "/status", ServerStatusSchema, { normalize: serverStatusFromPayload }),
      options
    )
  }

  /**
   * Get the server's health report. Its shape varies between deployments.
   */
  async health(options: CallOptions = {}): Promise<JsonValue> {
    return this.run(requestPayload("GET", "/health", JsonValueSchema), options)
  }
}

/**
 * Worker agent operations.
 */
class AgentsNamespace {
  constructor(private readonly run: Runner) {}

  /**
   * List all agents known to the server.
   *
   * @example
   * ```typescript
   * const agents = await client.agents.list()
   * const healthy = agents.filter(a => (a.healthScore ?? 0) > 0.8)
   * ```
   */
  async list(options: CallOptions = {}): Promise<readonly AgentStatus[]> {
    return this.run(
      requestPayload("GET", "/api/agents/status", Schema.Array(AgentStatusSchema), {
        normalize: agentsFromPayload
      }),
      options
    )
  }

  /**
   * Get the status of one agent.
   *
   * @throws {MCPError} 404 if the agent is unknown
   */
  async get(name: string, options: CallOptions = {}): Promise<AgentStatus> {
    return this.run(
      requestPayload("GET", `/agents/${pathSegment(name)}`, AgentStatusSchema),
      options
    )
  }

  /**
   * Register an agent with its capabilities.
   *
   * @returns The registered agent; its `name` identifies it from now on
   */
  async register(
    name: string,
    capabilities: readonly string[],
    options: CallOptions = {}
  ): Promise<AgentStatus> {
    return this.run(
      validateRequest(NonEmptyName, name).pipe(
        Effect.flatMap((agent) =>
          requestPayload("POST", "/agents", AgentStatusSchema, {
            body: { name: agent, capabilities }
          })
        )
      ),
      options
    )
  }

  /**
   * Announce that an agent (controller) is alive.
   */
  async heartbeat(heartbeat: AgentHeartbeat, options: CallOptions = {}): Promise<HeartbeatAck> {
    return this.run(
      validateRequest(NonEmptyName, heartbeat.agent).pipe(
        Effect.flatMap(() =>
          requestPayload("POST", "/heartbeat", HeartbeatAckSchema, { body: heartbeat })
        )
      ),
      options
    )
  }
}

/**
 * Task operations.
 *
 * Nothing is cached: every call reflects the server at response time and
 * may be stale by the time it is acted on. Use `track()` to reconcile
 * successive observations of one task.
 */
class TasksNamespace {
  constructor(
    private readonly run: Runner,
    private readonly config: ResolvedClientConfig
  ) {}

  /**
   * Submit a task for asynchronous processing.
   *
   * Submission is retried on connection failures and 5xx responses like any
   * other call. If the server accepted a submission whose response was lost,
   * the retry can create a duplicate task.
   *
   * @param submission - Task type (required), target, parameters, priority, agent
   * @returns The new task; status is `queued` unless the server says otherwise
   * @throws {MCPError} 400 when `type` is missing or the submission is invalid
   * @example
   * ```typescript
   * const task = await client.tasks.submit({
   *   type: 'code_analysis',
   *   target: 'main.go',
   *   priority: 'high'
   * })
   * ```
   */
  async submit(submission: TaskSubmission, options: CallOptions = {}): Promise<TaskInfo> {
    return this.run(
      validateRequest(TaskSubmissionSchema, submission).pipe(
        Effect.flatMap((body) => requestPayload("POST", "/run", SubmittedTaskSchema, { body }))
      ),
      options
    )
  }

  /**
   * Get the current state of a task.
   *
   * @throws {MCPError} 404 if the task is unknown
   */
  async get(id: string, options: CallOptions = {}): Promise<TaskInfo> {
    return this.run(requestPayload("GET", `/tasks/${pathSegment(id)}`, TaskInfoSchema), options)
  }

  /**
   * List tasks, optionally filtered by status and agent.
   *
   * Deployments differ: some return the tasks, others only aggregate counts.
   * Check `kind` before using the result.
   *
   * @example
   * ```typescript
   * const result = await client.tasks.list({ status: 'running' })
   * if (result.kind === 'list') {
   *   console.log(result.tasks.length)
   * } else {
   *   console.log(result.analytics)
   * }
   * ```
   */
  async list(filter: TaskListFilter = {}, options: CallOptions = {}): Promise<TaskListResult> {
    return this.run(
      requestPayload("GET", "/api/tasks/analytics", TaskListResultSchema, {
        query: { status: filter.status, agent: filter.agent },
        normalize: taskListFromPayload
      }),
      options
    )
  }

  /**
   * Cancel a queued or running task.
   *
   * @throws {MCPError} when the server rejects the cancellation, including
   * for a task that has already finished
   */
  async cancel(id: string, options: CallOptions = {}): Promise<CancelAck> {
    return this.run(
      requestPayload("POST", `/tasks/${pathSegment(id)}/cancel`, CancelAckSchema),
      options
    )
  }

  /**
   * Start tracking a task. The returned handle remembers the last observed
   * state and never reports a status regression.
   *
   * @param task - A task returned by `submit`/`get`, or a task ID to fetch
   * @example
   * ```typescript
   * const tracked = await client.tasks.track(await client.tasks.submit({ type: 'lint' }))
   * while (!tracked.isTerminal) {
   *   await new Promise((resolve) => setTimeout(resolve, 2000))
   *   await tracked.refresh()
   * }
   * ```
   */
  async track(task: TaskInfo | string, options: CallOptions = {}): Promise<TrackedTask> {
    const initial = typeof task === "string" ? await this.get(task, options) : task
    return new TrackedTask(this, initial, this.config.logLevel)
  }
}

/**
 * AI-assisted code operations.
 */
class AiNamespace {
  constructor(private readonly run: Runner) {}

  /**
   * Analyze a piece of code.
   *
   * @example
   * ```typescript
   * const report = await client.ai.analyzeCode({
   *   code: 'func main() {}',
   *   language: 'go',
   *   options: { security: true }
   * })
   * ```
   */
  async analyzeCode(request: CodeAnalysisRequest, options: CallOptions = {}): Promise<AiResult> {
    return this.run(
      validateRequest(CodeAnalysisRequestSchema, request).pipe(
        Effect.flatMap((body) => requestPayload("POST", "/ai/analyze", AiResultSchema, { body }))
      ),
      options
    )
  }

  /**
   * Predict performance from a set of metrics.
   */
  async predictPerformance(
    metrics: PerformanceMetrics,
    options: CallOptions = {}
  ): Promise<AiResult> {
    return this.run(
      validateRequest(PerformanceMetricsSchema, metrics).pipe(
        Effect.flatMap((body) => requestPayload("POST", "/ai/predict", AiResultSchema, { body }))
      ),
      options
    )
  }

  /**
   * Generate code from a description.
   */
  async generateCode(
    request: CodeGenerationRequest,
    options: CallOptions = {}
  ): Promise<AiResult> {
    return this.run(
      validateRequest(CodeGenerationRequestSchema, request).pipe(
        Effect.flatMap((body) => requestPayload("POST", "/ai/generate", AiResultSchema, { body }))
      ),
      options
    )
  }
}

/**
 * Webhook subscriptions. Subscriptions live on the server.
 */
class WebhooksNamespace {
  constructor(private readonly run: Runner) {}

  /**
   * Subscribe a URL to server events.
   *
   * @returns The server-assigned webhook ID, used for deletion
   * @throws {MCPError} 400 when the URL is not http(s) or `events` is empty
   * @example
   * ```typescript
   * const { webhookId } = await client.webhooks.register({
   *   url: 'https://example.com/hooks/tasks',
   *   events: ['task.completed', 'task.failed'],
   *   secret: 'test-secret'
   * })
   * ```
   */
  async register(
    registration: WebhookRegistration,
    options: CallOptions = {}
  ): Promise<{ readonly webhookId: string }> {
    return this.run(
      validateRequest(WebhookRegistrationSchema, registration).pipe(
        Effect.flatMap((body) => requestPayload("POST", "/webhooks", WebhookCreatedSchema, { body })),
        Effect.map((created) => ({
          webhookId: "webhookId" in created ? created.webhookId : created.id
        }))
      ),
      options
    )
  }

  /**
   * List registered webhooks.
   */
  async list(options: CallOptions = {}): Promise<readonly WebhookInfo[]> {
    return this.run(requestPayload("GET", "/webhooks", Schema.Array(WebhookInfoSchema)), options)
  }

  /**
   * Delete a webhook.
   *
   * @throws {MCPError} when the webhook does not exist, including one that
   * was already deleted
   */
  async delete(webhookId: string, options: CallOptions = {}): Promise<JsonObject> {
    return this.run(
      requestPayload("DELETE", `/webhooks/${pathSegment(webhookId)}`, JsonObjectSchema),
      options
    )
  }
}

/**
 * Plugin management.
 */
class PluginsNamespace {
  constructor(private readonly run: Runner) {}

  /**
   * List available plugins.
   */
  async list(options: CallOptions = {}): Promise<readonly PluginInfo[]> {
    return this.run(requestPayload("GET", "/plugins", Schema.Array(PluginInfoSchema)), options)
  }

  /**
   * Get information about one plugin.
   *
   * @throws {MCPError} 404 if the plugin is unknown
   */
  async get(name: string, options: CallOptions = {}): Promise<PluginInfo> {
    return this.run(
      requestPayload("GET", `/plugins/${pathSegment(name)}`, PluginInfoSchema),
      options
    )
  }

  /**
   * Install a plugin with optional configuration.
   */
  async install(
    name: string,
    config: JsonObject = {},
    options: CallOptions = {}
  ): Promise<PluginInfo> {
    return this.run(
      validateRequest(NonEmptyName, name).pipe(
        Effect.flatMap((plugin) =>
          requestPayload("POST", "/plugins/install", PluginInfoSchema, {
            body: { name: plugin, config }
          })
        )
      ),
      options
    )
  }

  /**
   * Uninstall a plugin.
   *
   * @throws {MCPError} when the plugin is not installed, including one that
   * was already uninstalled
   */
  async uninstall(name: string, options: CallOptions = {}): Promise<JsonObject> {
    return this.run(
      requestPayload("POST", `/plugins/${pathSegment(name)}/uninstall`, JsonObjectSchema),
      options
    )
  }
}

// =============================================================================
// Main Client
// =============================================================================

/**
 * Taskwire client.
 *
 * Holds only immutable configuration, so one instance can serve any number
 * of concurrent calls. Create it once per process and pass it around.
 *
 * @example
 * ```typescript
 * const client = new TaskwireClient({ baseUrl: 'http://localhost:5005', maxRetries: 2 })
 *
 * try {
 *   const task = await client.tasks.submit({ type: 'code_analysis', target: 'main.go' })
 * } catch (error) {
 *   if (error instanceof MCPError && error.isClientError()) {
 *     // rejected by the server, do not retry
 *   }
 * }
 * ```
 */
export class TaskwireClient {
  private readonly config: ResolvedClientConfig

  /**
   * Server status and health.
   */
  public readonly server: ServerNamespace

  /**
   * Agent operations.
   */
  public readonly agents: AgentsNamespace

  /**
   * Task operations.
   */
  public readonly tasks: TasksNamespace

  /**
   * AI operations.
   */
  public readonly ai: AiNamespace

  /**
   * Webhook operations.
   */
  public readonly webhooks: WebhooksNamespace

  /**
   * Plugin operations.
   */
  public readonly plugins: PluginsNamespace

  /**
   * Create a new TaskwireClient.
   *
   * @param config - Client configuration; every field has a default
   * @throws {ConfigurationError} if the configuration is invalid
   */
  constructor(config: ClientConfig = {}) {
    this.config = runSync(resolveClientConfig(config))

    const transport = makeHttpTransport(this.config)
    const logLevel = this.config.logLevel
    const run: Runner = (effect, options = {}) =>
      runPromise(Effect.provideService(effect, HttpTransport, transport), {
        signal: options.signal,
        logLevel
      })

    this.server = new ServerNamespace(run)
    this.agents = new AgentsNamespace(run)
    this.tasks = new TasksNamespace(run, this.config)
    this.ai = new AiNamespace(run)
    this.webhooks = new WebhooksNamespace(run)
    this.plugins = new PluginsNamespace(run)
  }

  /**
   * Create a client from TASKWIRE_* environment variables.
   * Explicit overrides win over the environment.
   *
   * @throws {ConfigurationError} if a variable is malformed
   */
  static fromEnv(
    env: Readonly<Record<string, string | undefined>> = process.env,
    overrides: ClientConfig = {}
  ): TaskwireClient {
    const fromEnv = runSync(loadClientConfigFromEnv(env))
    return new TaskwireClient({ ...fromEnv, ...overrides })
  }

  /**
   * Get the resolved client configuration.
   */
  get configuration(): Readonly<ResolvedClientConfig> {
    return this.config
  }
}
