import type { ExecutorOutput } from "../src/agents/adapter.js";
import { FunctionAdapter, type AgentFunction } from "../src/agents/function-adapter.js";
import { AgentRegistry } from "../src/agents/registry.js";
import { BaseOrchestrator, concatenateResults, type OrchestratorDeps } from "../src/orchestrator.js";
import type { WorkflowConfig } from "../src/schemas.js";
import type { ProgressSink } from "../src/tracking/events.js";
import { createSubTask } from "../src/workflow/graph.js";
import type { AgentResult, AgentType, EventType, SubTask, SubTaskInput, WorkflowEvent } from "../src/workflow/types.js";

export function agent(agentType: AgentType, fn: AgentFunction, specializations?: string[]): FunctionAdapter {
  return new FunctionAdapter({ name: `${agentType}${specializations ? `:${specializations.join("+")}` : ""}`, agentType, fn, specializations });
}

function sourceIds(subtask: SubTask): string {
  const ids = subtask.context.sourceIds;
  return Array.isArray(ids) ? ids.join(",") : "";
}

/** worker/specialist answer `out:<id>`; synthesizer `synth[<sources>]`; executive `exec[<sources>]`. */
export function echoRegistry(overrides: Partial<Record<AgentType, AgentFunction>> = {}): AgentRegistry {
  const registry = new AgentRegistry();
  const defaults: Record<Exclude<AgentType, "planner">, AgentFunction> = {
    worker: async (t) => `out:${t.id}`,
    specialist: async (t) => `out:${t.id}`,
    synthesizer: async (t) => `synth[${sourceIds(t)}]`,
    executive: async (t) => `exec[${sourceIds(t)}]`,
  };
  for (const [type, fn] of Object.entries(defaults)) {
    if (type === "worker" || type === "specialist" || type === "synthesizer" || type === "executive") {
      registry.add(agent(type, overrides[type] ?? fn));
    }
  }
  if (overrides.planner) registry.add(agent("planner", overrides.planner));
  return registry;
}

export class RecordingSink implements ProgressSink {
  readonly events: WorkflowEvent[] = [];

  emit(event: WorkflowEvent): void {
    this.events.push(event);
  }

  types(): EventType[] {
    return this.events.map((e) => e.eventType);
  }

  ofType(type: EventType): WorkflowEvent[] {
    return this.events.filter((e) => e.eventType === type);
  }
}

/** Resolves after `ms`, or right away when the signal fires. */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const timer = setTimeout(resolve, ms);
    signal?.addEventListener(
      "abort",
      () => {
        clearTimeout(timer);
        resolve();
      },
      { once: true },
    );
  });
}

export type Deferred<T = void> = { promise: Promise<T>; resolve(value: T): void };

export function deferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

/** Runs a fixed subtask list and concatenates the results. */
export class StaticOrchestrator extends BaseOrchestrator {
  readonly pattern = "static";
  private readonly inputs: SubTaskInput[];
  private readonly synth?: (results: AgentResult[]) => Promise<string>;

  constructor(
    deps: OrchestratorDeps,
    inputs: SubTaskInput[],
    options: WorkflowConfig = {},
    synth?: (results: AgentResult[]) => Promise<string>,
  ) {
    super(deps, options);
    this.inputs = inputs;
    this.synth = synth;
  }

  protected decompose(): SubTask[] {
    return this.inputs.map(createSubTask);
  }

  protected async synthesize(results: AgentResult[]): Promise<string> {
    return this.synth ? this.synth(results) : concatenateResults(results);
  }
}

export function output(text: string, extra: Partial<ExecutorOutput> = {}): ExecutorOutput {
  return { output: text, ...extra };
}
