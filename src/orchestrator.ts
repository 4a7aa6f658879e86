import { randomUUID } from "node:crypto";
import type { AgentAdapter } from "./agents/adapter.js";
import type { AgentRegistry } from "./agents/registry.js";
import { resolveConfig, type OrchestratorConfig } from "./config.js";
import {
  CancelledError,
  ConfigError,
  DecompositionError,
  OrchestratorError,
  SynthesisError,
  classifyFailure,
  errorMessage,
  type FailureKind,
} from "./errors.js";
import { ConcurrencyController } from "./executor/scheduler.js";
import type { ScheduleOutcome, SchedulerHooks } from "./executor/types.js";
import { parseOrThrow, WorkflowConfigSchema, type WorkflowConfig } from "./schemas.js";
import { CostTracker } from "./tracking/cost-tracker.js";
import { createEvent, type ProgressSink } from "./tracking/events.js";
import { log, type Logger } from "./utils/logger.js";
import { withRetry } from "./utils/retry.js";
import { createSubTask, validateGraph } from "./workflow/graph.js";
import { createAgentResult, failedResult, isSuccess } from "./workflow/results.js";
import type {
  AgentResult,
  AgentType,
  ArtifactRef,
  EventType,
  SubTask,
  SynthesisLevel,
  SynthesisResult,
  WorkflowContext,
  WorkflowResult,
  WorkflowStatus,
} from "./workflow/types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Renders final synthesis text into artifacts. Optional. */
export interface DocumentGenerator {
  generate(text: string, formats: readonly string[], meta: { taskId: string; title: string }): Promise<ArtifactRef[]>;
}

export type OrchestratorDeps = {
  agents: AgentRegistry;
  /** Engine-wide defaults; per-workflow options override them. */
  config?: OrchestratorConfig;
  documents?: DocumentGenerator;
};

export type ResolvedOptions = {
  parallel: boolean;
  maxConcurrentAgents: number;
  timeoutMs: number;
  workflowTimeoutMs?: number;
  failFast: boolean;
  skipOnFailedDependency: boolean;
  retry: {
    maxRetries: number;
    backoffBaseMs: number;
    maxBackoffMs: number;
    retryableKinds: readonly FailureKind[];
  };
  generateDocuments: boolean;
  documentFormats: readonly string[];
  outputTruncation: number;
};

/** Per-run state threaded through every policy call. */
export type WorkflowRun = {
  readonly taskId: string;
  readonly task: string;
  readonly title: string;
  readonly context: Readonly<WorkflowContext>;
  readonly options: ResolvedOptions;
  readonly signal?: AbortSignal;
  /** Epoch ms; set when a workflow timeout applies. */
  readonly deadline?: number;
  readonly costs: CostTracker;
  readonly agentResults: AgentResult[];
  readonly synthesisResults: SynthesisResult[];
  readonly warnings: string[];
  readonly metadata: Record<string, unknown>;
  readonly log: Logger;
  emit(eventType: EventType, payload?: Record<string, unknown>): Promise<void>;
};

/** How one decompose → execute → synthesize pass ended. */
export type PassOutcome =
  | { kind: "synthesized"; synthesis: string; results: AgentResult[]; schedule: ScheduleOutcome }
  | { kind: "cancelled"; results: AgentResult[]; schedule: ScheduleOutcome };

export type ExecuteWorkflowOptions = {
  taskId?: string;
  /** Cancellation: checked between dispatches. */
  signal?: AbortSignal;
};

export type SynthesisRequest = {
  id: string;
  level: SynthesisLevel;
  agentType: Extract<AgentType, "synthesizer" | "executive">;
  instruction: string;
  sources: ReadonlyArray<{ id: string; content: string }>;
};

export function resolveOptions(config: OrchestratorConfig, workflow: WorkflowConfig): ResolvedOptions {
  const workflowSeconds = workflow.workflowTimeoutSeconds ?? config.timeouts.workflowSeconds;
  return {
    parallel: workflow.parallelExecution ?? config.execution.parallel,
    maxConcurrentAgents: workflow.maxConcurrentAgents ?? config.execution.maxConcurrentAgents,
    timeoutMs: (workflow.timeoutSeconds ?? config.timeouts.subtaskSeconds) * 1000,
    workflowTimeoutMs: workflowSeconds > 0 ? workflowSeconds * 1000 : undefined,
    failFast: workflow.failFast ?? config.execution.failFast,
    skipOnFailedDependency: workflow.skipOnFailedDependency ?? config.execution.skipOnFailedDependency,
    retry: {
      maxRetries: workflow.retryPolicy?.maxRetries ?? config.retry.maxRetries,
      backoffBaseMs: workflow.retryPolicy?.backoffBaseMs ?? config.retry.backoffBaseMs,
      maxBackoffMs: workflow.retryPolicy?.maxBackoffMs ?? config.retry.maxBackoffMs,
      retryableKinds: workflow.retryPolicy?.retryableKinds ?? config.retry.retryableKinds,
    },
    generateDocuments: workflow.generateDocuments ?? config.documents.enabled,
    documentFormats: workflow.documentFormats ?? config.documents.formats,
    outputTruncation: config.limits.outputTruncation,
  };
}

/** Labeled concatenation: `## <id>` followed by the output, successful results only. */
export function concatenateResults(results: readonly AgentResult[]): string {
  return results
    .filter(isSuccess)
    .map((r) => `## ${r.agentId}\n${r.output}`)
    .join("\n\n");
}

/** `<pattern>_<12 hex chars>` */
export function newTaskId(pattern: string): string {
  return `${pattern}_${randomUUID().replace(/-/g, "").slice(0, 12)}`;
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...(truncated)` : text;
}

// ---------------------------------------------------------------------------
// Template
// ---------------------------------------------------------------------------

/**
 * Shared workflow template: decompose → execute → synthesize → artifacts →
 * assemble. Patterns supply `decompose` and `synthesize`; everything else,
 * including failure handling, lives here.
 */
export abstract class BaseOrchestrator<TOptions extends WorkflowConfig = WorkflowConfig> {
  abstract readonly pattern: string;

  protected readonly agents: AgentRegistry;
  protected readonly config: OrchestratorConfig;
  protected readonly documents?: DocumentGenerator;
  protected readonly options: TOptions;
  protected readonly resolved: ResolvedOptions;

  constructor(deps: OrchestratorDeps, options: TOptions) {
    this.agents = deps.agents;
    this.config = deps.config ?? resolveConfig();
    this.documents = deps.documents;
    this.options = options;
    this.resolved = resolveOptions(this.config, parseWorkflowConfig(options));
  }

  /** Split the task into subtasks. May throw; the template reports it as a DecompositionError. */
  protected abstract decompose(run: WorkflowRun, pass: PassContext): Promise<SubTask[]> | SubTask[];

  /** Turn results into final text. May throw; the template reports it as a SynthesisError. */
  protected abstract synthesize(results: AgentResult[], run: WorkflowRun, pass: PassContext): Promise<string>;

  /** Pattern-level option checks that must fail before anything runs. */
  protected preflight(_run: WorkflowRun): void | Promise<void> {}

  /** Executor roles the pattern calls outside decomposed subtasks (planner, synthesizers). */
  protected requiredRoles(): AgentType[] {
    return [];
  }

  protected maxConcurrency(): number {
    return this.resolved.parallel ? this.resolved.maxConcurrentAgents : 1;
  }

  /** Default: a single pass. Iterative patterns override this. */
  protected async orchestrate(run: WorkflowRun): Promise<PassOutcome> {
    return this.runPass(run, { passIndex: 0, idPrefix: "" });
  }

  async executeWorkflow(
    task: string,
    title: string,
    context: WorkflowContext = {},
    sink?: ProgressSink,
    opts: ExecuteWorkflowOptions = {},
  ): Promise<WorkflowResult> {
    const startedAt = new Date();
    const taskId = opts.taskId ?? newTaskId(this.pattern);
    const runLog = log.child(this.pattern);
    const run: WorkflowRun = {
      taskId,
      task,
      title,
      context: Object.freeze({ ...context }),
      options: this.resolved,
      signal: opts.signal,
      deadline: this.resolved.workflowTimeoutMs !== undefined ? startedAt.getTime() + this.resolved.workflowTimeoutMs : undefined,
      costs: new CostTracker(),
      agentResults: [],
      synthesisResults: [],
      warnings: [],
      metadata: {},
      log: runLog,
      emit: async (eventType, payload = {}) => {
        if (!sink) return;
        try {
          await sink.emit(createEvent(eventType, taskId, payload));
        } catch (err) {
          runLog.warn(`Progress sink rejected ${eventType}`, { error: String(err) });
        }
      },
    };

    await run.emit("workflow_start", { task, title, pattern: this.pattern });
    runLog.info(`Workflow ${taskId} started`, { title });

    let status: WorkflowStatus = "completed";
    let finalSynthesis: string | null = null;
    let failure: OrchestratorError | undefined;
    const artifacts: ArtifactRef[] = [];

    try {
      await this.preflight(run);
      this.agents.assertResolvable(this.requiredRoles().map((agentType) => ({ id: `<${agentType}>`, agentType })));
      const outcome = await this.orchestrate(run);
      if (outcome.kind === "cancelled") {
        status = "cancelled";
      } else {
        finalSynthesis = outcome.synthesis;
      }
    } catch (err) {
      if (err instanceof CancelledError) {
        status = "cancelled";
        runLog.info(`Workflow ${taskId} cancelled`, { reason: err.message });
      } else {
        status = "failed";
        failure = err instanceof OrchestratorError ? err : new OrchestratorError("INTERNAL_ERROR", errorMessage(err), { cause: err });
        runLog.error(`Workflow ${taskId} failed`, { code: failure.code, error: failure.message });
      }
    }

    if (status === "completed" && finalSynthesis !== null && this.resolved.generateDocuments) {
      artifacts.push(...(await this.generateArtifacts(run, finalSynthesis)));
    }

    const costs = run.costs.snapshot();
    const result: WorkflowResult = Object.freeze({
      taskId,
      title,
      pattern: this.pattern,
      status,
      agentResults: Object.freeze([...run.agentResults]),
      synthesisResults: Object.freeze([...run.synthesisResults]),
      finalSynthesis,
      totalCost: costs.cost,
      totalTokens: costs.tokens,
      totalExecutionTime: Date.now() - startedAt.getTime(),
      costBreakdown: costs.breakdown,
      artifacts: Object.freeze(artifacts),
      warnings: Object.freeze([...run.warnings]),
      ...(failure ? { error: failure.toJSON() } : {}),
      metadata: Object.freeze({ ...run.metadata }),
      startedAt: startedAt.toISOString(),
      completedAt: new Date().toISOString(),
    });

    if (status === "failed") {
      await run.emit("workflow_error", { error: failure?.toJSON(), agentCount: result.agentResults.length });
    } else if (status === "cancelled") {
      await run.emit("workflow_cancelled", { agentCount: result.agentResults.length });
    } else {
      await run.emit("workflow_complete", {
        status,
        totalCost: result.totalCost,
        agentCount: result.agentResults.length,
        warnings: result.warnings,
      });
    }
    runLog.info(`Workflow ${taskId} ${status}`, {
      agents: result.agentResults.length,
      cost: result.totalCost,
      durationMs: result.totalExecutionTime,
    });
    return result;
  }

  /** One decompose → execute → synthesize cycle. */
  protected async runPass(run: WorkflowRun, pass: PassContext): Promise<PassOutcome> {
    const subtasks = await this.decomposeChecked(run, pass);
    const schedule = await this.executeSubtasks(run, subtasks);

    if (schedule.cancelled) {
      return { kind: "cancelled", results: schedule.results, schedule };
    }
    if (schedule.failedFast) {
      const failed = schedule.results.find((r) => !isSuccess(r));
      throw new OrchestratorError(
        "AGENT_FAILED",
        `Fail-fast: subtask "${failed?.agentId ?? "?"}" ${failed?.status ?? "failed"}${failed?.error ? `: ${failed.error}` : ""}`,
      );
    }
    if (schedule.deadlineExceeded) {
      run.metadata.workflowTimedOut = true;
      run.warnings.push(
        `Workflow timeout reached; ${schedule.undispatched.length} subtask(s) not dispatched, synthesizing partial results`,
      );
    }

    await run.emit("synthesis_start", { level: "final", sourceCount: schedule.results.filter(isSuccess).length });
    let synthesis: string;
    try {
      synthesis = await this.synthesize(schedule.results, run, pass);
    } catch (err) {
      if (err instanceof OrchestratorError) throw err;
      throw new SynthesisError(errorMessage(err), { cause: err });
    }
    await run.emit("synthesis_complete", { level: "final", length: synthesis.length });
    return { kind: "synthesized", synthesis, results: schedule.results, schedule };
  }

  private async decomposeChecked(run: WorkflowRun, pass: PassContext): Promise<SubTask[]> {
    let subtasks: SubTask[];
    try {
      subtasks = await this.decompose(run, pass);
    } catch (err) {
      if (err instanceof OrchestratorError) throw err;
      throw new DecompositionError("DECOMPOSITION_FAILED", `Decomposition failed: ${errorMessage(err)}`, { cause: err });
    }
    if (subtasks.length === 0) {
      throw new DecompositionError("DECOMPOSITION_FAILED", "Decomposition produced no subtasks");
    }
    validateGraph(subtasks);
    this.agents.assertResolvable(subtasks);

    await run.emit("decomposition_complete", { count: subtasks.length, subtaskIds: subtasks.map((t) => t.id) });
    run.log.info(`Decomposed into ${subtasks.length} subtasks`);
    return subtasks;
  }

  /**
   * Run subtasks through the bounded pool, emitting lifecycle events and recording costs.
   *
   * Quiet runs (planner, syntheses) keep no agent results, never fail fast,
   * and throw CancelledError when cancellation left any of them undispatched.
   * `workflowDeadline: false` leaves only the per-subtask timeout in force.
   */
  protected async executeSubtasks(
    run: WorkflowRun,
    subtasks: readonly SubTask[],
    overrides: { maxConcurrency?: number; quiet?: boolean; workflowDeadline?: boolean } = {},
  ): Promise<ScheduleOutcome> {
    const hooks: SchedulerHooks = {
      onDispatch: overrides.quiet
        ? undefined
        : (subtask) =>
            run.emit("agent_start", {
              agentId: subtask.id,
              agentType: subtask.agentType,
              specialization: subtask.specialization,
              description: subtask.description,
            }),
      onSettled: async (subtask, result) => {
        run.costs.record({
          agentType: subtask.agentType,
          specialization: subtask.specialization,
          tokensUsed: result.tokensUsed,
          cost: result.cost,
        });
        if (overrides.quiet) return;
        if (isSuccess(result)) {
          await run.emit("agent_complete", {
            agentId: result.agentId,
            status: result.status,
            tokensUsed: result.tokensUsed,
            cost: result.cost,
            executionTime: result.executionTime,
          });
        } else {
          await run.emit("agent_failed", {
            agentId: result.agentId,
            status: result.status,
            error: result.error,
            errorKind: result.errorKind,
          });
        }
      },
    };

    const controller = new ConcurrencyController({
      maxConcurrency: overrides.maxConcurrency ?? this.maxConcurrency(),
      deadline: overrides.workflowDeadline === false ? undefined : run.deadline,
      failFast: overrides.quiet ? false : this.resolved.failFast,
      skipOnFailedDependency: this.resolved.skipOnFailedDependency,
      signal: run.signal,
      hooks,
    });

    const schedule = await controller.run(subtasks, (subtask, exec) =>
      this.executeOne(subtask, run, exec.dependencyResults, exec.signal),
    );
    if (overrides.quiet && schedule.cancelled && schedule.undispatched.length > 0) {
      throw new CancelledError(`Cancelled before ${schedule.undispatched.join(", ")} could run`);
    }
    if (!overrides.quiet) run.agentResults.push(...schedule.results);
    return schedule;
  }

  /**
   * Execute one subtask with timeout and the opt-in retry policy. Never
   * rejects: every failure becomes a failed or timeout result.
   */
  protected async executeOne(
    subtask: SubTask,
    run: WorkflowRun,
    dependencyResults: Record<string, AgentResult>,
    signal: AbortSignal,
  ): Promise<AgentResult> {
    const agent = this.agents.resolve(subtask.agentType, subtask.specialization);
    if (!agent) {
      return failedResult(subtask, "validation", `No executor registered for "${subtask.agentType}"`, { attempts: 0 });
    }

    const { maxRetries, backoffBaseMs, maxBackoffMs, retryableKinds } = run.options.retry;
    let spentCost = 0;
    let spentTokens = 0;

    const attempt = async (n: number): Promise<AgentResult> => {
      const result = await this.attempt(agent, subtask, run, dependencyResults, signal, n);
      spentCost += result.cost;
      spentTokens += result.tokensUsed;
      return result;
    };

    let result: AgentResult;
    if (maxRetries === 0) {
      result = await attempt(1);
    } else {
      result = await withRetry(attempt, {
        maxAttempts: maxRetries + 1,
        baseDelayMs: backoffBaseMs,
        maxDelayMs: maxBackoffMs,
        signal,
        retryOn: (r) => !isSuccess(r) && r.errorKind !== undefined && retryableKinds.includes(r.errorKind),
        onRetry: async ({ attempt: n, delayMs, reason }) => {
          const errorKind = typeof reason === "object" && reason !== null && "errorKind" in reason ? reason.errorKind : undefined;
          run.log.warn(`Retrying "${subtask.id}" after attempt ${n}`, { delayMs, errorKind });
          await run.emit("agent_retry", { agentId: subtask.id, attempt: n, delayMs, errorKind });
        },
      });
    }

    if (spentCost === result.cost && spentTokens === result.tokensUsed) return result;
    // Failed attempts still cost something; charge the total to the final result.
    return createAgentResult(subtask, {
      status: result.status,
      output: result.output,
      tokensUsed: spentTokens,
      cost: spentCost,
      executionTime: result.executionTime,
      error: result.error,
      errorKind: result.errorKind,
      attempts: result.attempts,
      metadata: result.metadata,
    });
  }

  private async attempt(
    agent: AgentAdapter,
    subtask: SubTask,
    run: WorkflowRun,
    dependencyResults: Record<string, AgentResult>,
    outer: AbortSignal,
    attemptNumber: number,
  ): Promise<AgentResult> {
    const start = Date.now();
    const timeoutMs = run.options.timeoutMs;
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    let onAbort: (() => void) | undefined;

    const timedOut = new Promise<"timeout">((resolve) => {
      timer = setTimeout(() => resolve("timeout"), timeoutMs);
    });
    const aborted = new Promise<"aborted">((resolve) => {
      if (outer.aborted) {
        resolve("aborted");
        return;
      }
      onAbort = () => resolve("aborted");
      outer.addEventListener("abort", onAbort, { once: true });
    });

    try {
      const execution = agent
        .execute(subtask, {
          taskId: run.taskId,
          task: run.task,
          title: run.title,
          context: run.context,
          dependencyResults,
          attempt: attemptNumber,
          signal: controller.signal,
        })
        .then((output) => ({ output }));

      const outcome = await Promise.race([execution, timedOut, aborted]);
      const executionTime = Date.now() - start;

      if (outcome === "timeout") {
        controller.abort();
        return failedResult(subtask, "timeout", `Timed out after ${timeoutMs}ms`, { executionTime, attempts: attemptNumber });
      }
      if (outcome === "aborted") {
        controller.abort();
        return failedResult(subtask, "timeout", "Abandoned before completion", { executionTime, attempts: attemptNumber });
      }

      const { output } = outcome;
      const status = output.status ?? "success";
      return createAgentResult(subtask, {
        status,
        output: output.output,
        tokensUsed: output.tokensUsed,
        cost: output.cost,
        executionTime: output.executionTime ?? executionTime,
        error: status === "success" ? undefined : output.error ?? `Executor reported ${status}`,
        errorKind: status === "success" ? undefined : output.errorKind ?? (status === "timeout" ? "timeout" : "unknown"),
        attempts: attemptNumber,
        metadata: { ...output.metadata, executor: agent.name },
      });
    } catch (err) {
      const kind = classifyFailure(err);
      run.log.warn(`Subtask "${subtask.id}" failed`, { kind, error: errorMessage(err) });
      return failedResult(subtask, kind, errorMessage(err), { executionTime: Date.now() - start, attempts: attemptNumber });
    } finally {
      if (timer) clearTimeout(timer);
      if (onAbort) outer.removeEventListener("abort", onAbort);
    }
  }

  /**
   * Run syntheses in parallel through the executor registry. Each becomes a
   * SynthesisResult on the run; costs are recorded like any other call.
   */
  protected async runSyntheses(run: WorkflowRun, requests: readonly SynthesisRequest[]): Promise<SynthesisResult[]> {
    if (requests.length === 0) return [];
    const level = requests[0].level;
    await run.emit("synthesis_start", { level, count: requests.length });

    const subtasks = requests.map((req) =>
      createSubTask({
        id: req.id,
        description: req.instruction,
        agentType: req.agentType,
        context: {
          level: req.level,
          sourceIds: req.sources.map((s) => s.id),
          material: req.sources
            .map((s) => `### ${s.id}\n${truncate(s.content, run.options.outputTruncation)}`)
            .join("\n\n"),
        },
      }),
    );

    // Only the per-subtask timeout applies to syntheses.
    const schedule = await this.executeSubtasks(run, subtasks, { quiet: true, workflowDeadline: false });
    const byId = new Map(schedule.results.map((r) => [r.agentId, r]));
    const syntheses = requests.map((req): SynthesisResult => {
      const r = byId.get(req.id);
      return Object.freeze({
        synthesisId: req.id,
        level: req.level,
        status: r?.status ?? "failed",
        content: r && isSuccess(r) ? r.output : "",
        sourceIds: Object.freeze(req.sources.map((s) => s.id)),
        tokensUsed: r?.tokensUsed ?? 0,
        cost: r?.cost ?? 0,
        executionTime: r?.executionTime ?? 0,
        ...(r?.error !== undefined ? { error: r.error } : r ? {} : { error: "Synthesis was not dispatched" }),
      });
    });
    run.synthesisResults.push(...syntheses);
    await run.emit("synthesis_complete", {
      level,
      count: syntheses.length,
      succeeded: syntheses.filter((s) => s.status === "success").length,
    });
    return syntheses;
  }

  private async generateArtifacts(run: WorkflowRun, text: string): Promise<ArtifactRef[]> {
    if (!this.documents) {
      run.warnings.push("Document generation requested but no document generator is configured");
      return [];
    }
    try {
      return await this.documents.generate(text, run.options.documentFormats, { taskId: run.taskId, title: run.title });
    } catch (err) {
      run.log.warn("Document generation failed", { error: errorMessage(err) });
      run.warnings.push(`Document generation failed: ${errorMessage(err)}`);
      return [];
    }
  }
}

/** Position of a pass within a run; single-pass patterns always see index 0. */
export type PassContext = {
  passIndex: number;
  /** Prepended to subtask ids so they stay unique across passes. */
  idPrefix: string;
  previousSynthesis?: string;
};

function parseWorkflowConfig(options: WorkflowConfig): WorkflowConfig {
  try {
    return parseOrThrow(WorkflowConfigSchema, pickWorkflowConfig(options), "workflow config");
  } catch (err) {
    throw new ConfigError("INVALID_CONFIG", errorMessage(err), { cause: err });
  }
}

function pickWorkflowConfig(options: WorkflowConfig): WorkflowConfig {
  return {
    numAgents: options.numAgents,
    parallelExecution: options.parallelExecution,
    maxConcurrentAgents: options.maxConcurrentAgents,
    timeoutSeconds: options.timeoutSeconds,
    workflowTimeoutSeconds: options.workflowTimeoutSeconds,
    failFast: options.failFast,
    skipOnFailedDependency: options.skipOnFailedDependency,
    retryPolicy: options.retryPolicy,
    generateDocuments: options.generateDocuments,
    documentFormats: options.documentFormats,
  };
}
