import { BaseOrchestrator, concatenateResults, type OrchestratorDeps, type WorkflowRun } from "../orchestrator.js";
import type { StepDefinition, WorkflowConfig } from "../schemas.js";
import { chainSequentially } from "../workflow/graph.js";
import type { AgentResult, SubTask } from "../workflow/types.js";
import { parseSteps, stepsToSubtasks, type AggregateFn } from "./steps.js";

export type SequentialOptions = WorkflowConfig & {
  steps?: StepDefinition[];
  aggregate?: AggregateFn;
};

/** Caller-ordered steps run as a strict chain, one at a time. */
export class SequentialOrchestrator extends BaseOrchestrator<SequentialOptions> {
  readonly pattern = "sequential";

  private readonly steps: StepDefinition[];

  constructor(deps: OrchestratorDeps, options: SequentialOptions = {}) {
    super(deps, options);
    this.steps = parseSteps(options.steps, "steps");
  }

  // Parallelism settings are ignored here.
  protected override maxConcurrency(): number {
    return 1;
  }

  protected decompose(run: WorkflowRun): SubTask[] {
    return chainSequentially(stepsToSubtasks(this.steps, { context: run.context }));
  }

  protected async synthesize(results: AgentResult[]): Promise<string> {
    return this.options.aggregate ? this.options.aggregate(results) : concatenateResults(results);
  }
}
