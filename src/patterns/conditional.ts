import { ConfigError, DecompositionError } from "../errors.js";
import { BaseOrchestrator, concatenateResults, type OrchestratorDeps, type WorkflowRun } from "../orchestrator.js";
import type { StepDefinition, WorkflowConfig } from "../schemas.js";
import type { AgentResult, SubTask, WorkflowContext } from "../workflow/types.js";
import { parseSteps, stepsToSubtasks, type AggregateFn } from "./steps.js";

export type ConditionEvaluator = (context: Readonly<WorkflowContext>) => string | Promise<string>;

export type ConditionalOptions = WorkflowConfig & {
  branches?: Record<string, StepDefinition[]>;
  /**
   * Branch name, or an evaluator over the workflow context. When omitted,
   * `context.condition` is used.
   */
  condition?: string | ConditionEvaluator;
  fallbackBranch?: string;
  aggregate?: AggregateFn;
};

/** Runs exactly one named branch; the others are never executed. */
export class ConditionalOrchestrator extends BaseOrchestrator<ConditionalOptions> {
  readonly pattern = "conditional";

  private readonly branches = new Map<string, StepDefinition[]>();

  constructor(deps: OrchestratorDeps, options: ConditionalOptions = {}) {
    super(deps, options);
    const entries = Object.entries(options.branches ?? {});
    if (entries.length === 0) {
      throw new ConfigError("INVALID_CONFIG", "Conditional workflow needs at least one branch");
    }
    for (const [name, steps] of entries) {
      this.branches.set(name, parseSteps(steps, `branch "${name}"`));
    }
    if (options.fallbackBranch !== undefined && !this.branches.has(options.fallbackBranch)) {
      throw new ConfigError(
        "INVALID_BRANCH",
        `Fallback branch "${options.fallbackBranch}" is not defined (branches: ${[...this.branches.keys()].join(", ")})`,
      );
    }
  }

  private async evaluate(context: Readonly<WorkflowContext>): Promise<string | undefined> {
    const { condition } = this.options;
    if (typeof condition === "function") return condition(context);
    if (condition !== undefined) return condition;
    const fromContext = context.condition;
    return fromContext === undefined || fromContext === null ? undefined : String(fromContext);
  }

  protected async decompose(run: WorkflowRun): Promise<SubTask[]> {
    const value = await this.evaluate(run.context);
    let selected = value !== undefined && this.branches.has(value) ? value : undefined;
    const usedFallback = selected === undefined;

    if (selected === undefined) {
      selected = this.options.fallbackBranch;
      if (selected === undefined) {
        throw new DecompositionError(
          "UNMATCHED_CONDITION",
          `Condition "${value ?? ""}" matches no branch and no fallback is set`,
        );
      }
      run.log.info(`Condition "${value ?? ""}" unmatched, using fallback branch "${selected}"`);
    }

    run.metadata.selectedBranch = selected;
    run.metadata.availableBranches = [...this.branches.keys()];
    run.metadata.usedFallback = usedFallback;
    await run.emit("branch_selected", { branch: selected, condition: value, usedFallback });

    return stepsToSubtasks(this.branches.get(selected) ?? [], { prefix: `${selected}.`, context: run.context });
  }

  protected async synthesize(results: AgentResult[]): Promise<string> {
    return this.options.aggregate ? this.options.aggregate(results) : concatenateResults(results);
  }
}
