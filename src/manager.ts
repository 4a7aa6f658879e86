import type { AgentRegistry } from "./agents/registry.js";
import { resolveConfig, type OrchestratorConfig } from "./config.js";
import { ConfigError, errorMessage } from "./errors.js";
import { newTaskId, type DocumentGenerator } from "./orchestrator.js";
import { getPattern, type PatternName, type PatternOptions } from "./patterns/registry.js";
import type { RunStore, WorkflowSummary } from "./persistence/store.js";
import { parseOrThrow, SubmitRequestSchema } from "./schemas.js";
import { EventChannel } from "./tracking/events.js";
import { log } from "./utils/logger.js";
import type { WorkflowContext, WorkflowResult, WorkflowStatus } from "./workflow/types.js";

export type SubmitRequest = {
  pattern: PatternName;
  task: string;
  title?: string;
  context?: WorkflowContext;
  config?: PatternOptions;
};

/** Async handle: read `events` with `for await`, await `result` for the outcome. */
export type WorkflowHandle = {
  taskId: string;
  events: EventChannel;
  result: Promise<WorkflowResult>;
};

export type WorkflowManagerOptions = {
  agents: AgentRegistry;
  config?: OrchestratorConfig;
  documents?: DocumentGenerator;
  /** Finished results are written here when set. */
  store?: RunStore;
};

type Tracked = {
  taskId: string;
  pattern: string;
  title: string;
  status: WorkflowStatus;
  startedAt: string;
  controller: AbortController;
  result?: WorkflowResult;
};

/**
 * Tracks running and recently finished workflows. Bounded on both sides:
 * `maxActiveWorkflows` running at once, `completedRetention` kept after.
 */
export class WorkflowManager {
  private readonly agents: AgentRegistry;
  private readonly config: OrchestratorConfig;
  private readonly documents?: DocumentGenerator;
  private readonly store?: RunStore;

  private active = new Map<string, Tracked>();
  private finished = new Map<string, Tracked>();

  constructor(opts: WorkflowManagerOptions) {
    this.agents = opts.agents;
    this.config = opts.config ?? resolveConfig();
    this.documents = opts.documents;
    this.store = opts.store;
  }

  get activeCount(): number {
    return this.active.size;
  }

  /**
   * Validate, construct and start a workflow. Configuration problems throw
   * here, before anything runs.
   */
  submit(request: SubmitRequest): WorkflowHandle {
    const entry = getPattern(request.pattern);
    const config = request.config ?? {};
    // Callbacks are not part of the wire shape; validate the rest.
    parseOrThrow(
      SubmitRequestSchema,
      {
        pattern: request.pattern,
        task: request.task,
        title: request.title,
        context: request.context,
        config: { ...config, condition: typeof config.condition === "string" ? config.condition : undefined },
      },
      "workflow request",
    );

    const { maxActiveWorkflows } = this.config.manager;
    if (this.active.size >= maxActiveWorkflows) {
      throw new ConfigError("WORKFLOW_LIMIT", `Maximum of ${maxActiveWorkflows} active workflows reached`);
    }

    const runner = entry.create(
      { agents: this.agents, config: this.config, documents: this.documents },
      config,
    );

    const taskId = newTaskId(request.pattern);
    const title = request.title ?? request.task.slice(0, 80);
    const events = new EventChannel({
      capacity: this.config.events.bufferSize,
      overflow: this.config.events.overflow,
      blockTimeoutMs: this.config.events.blockTimeoutMs,
    });
    const tracked: Tracked = {
      taskId,
      pattern: request.pattern,
      title,
      status: "running",
      startedAt: new Date().toISOString(),
      controller: new AbortController(),
    };
    this.active.set(taskId, tracked);
    log.info(`Submitted ${request.pattern} workflow ${taskId}`, { title });

    const result = runner
      .executeWorkflow(request.task, title, request.context ?? {}, events, {
        taskId,
        signal: tracked.controller.signal,
      })
      .then(
        (res) => {
          this.finish(tracked, res.status, res);
          return res;
        },
        (err: unknown) => {
          this.finish(tracked, "failed");
          throw err;
        },
      )
      .finally(() => events.close());

    return { taskId, events, result };
  }

  /** Stop dispatching new subtasks. False when the workflow is unknown or already finished. */
  cancel(taskId: string): boolean {
    const tracked = this.active.get(taskId);
    if (!tracked || tracked.controller.signal.aborted) return false;
    tracked.controller.abort();
    log.info(`Cancellation requested for ${taskId}`);
    return true;
  }

  status(taskId: string): WorkflowStatus | undefined {
    return (this.active.get(taskId) ?? this.finished.get(taskId))?.status;
  }

  /** Finished result, from memory or the store. */
  get(taskId: string): WorkflowResult | undefined {
    return this.finished.get(taskId)?.result ?? this.store?.get(taskId);
  }

  /** Running first, then retained finished workflows, newest first. */
  list(): WorkflowSummary[] {
    const summarize = (t: Tracked): WorkflowSummary => ({
      taskId: t.taskId,
      pattern: t.pattern,
      title: t.title,
      status: t.status,
      totalCost: t.result?.totalCost ?? 0,
      agentCount: t.result?.agentResults.length ?? 0,
      startedAt: t.startedAt,
      completedAt: t.result?.completedAt ?? "",
    });
    return [...[...this.active.values()].reverse(), ...[...this.finished.values()].reverse()].map(summarize);
  }

  private finish(tracked: Tracked, status: WorkflowStatus, result?: WorkflowResult): void {
    tracked.status = status;
    tracked.result = result;
    this.active.delete(tracked.taskId);
    this.finished.set(tracked.taskId, tracked);

    const { completedRetention } = this.config.manager;
    while (this.finished.size > completedRetention) {
      const oldest = this.finished.keys().next();
      if (oldest.done) break;
      this.finished.delete(oldest.value);
    }

    if (result && this.store) {
      try {
        this.store.save(result);
      } catch (err) {
        log.error(`Failed to persist workflow ${tracked.taskId}`, { error: errorMessage(err) });
      }
    }
  }
}
