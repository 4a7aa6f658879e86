import { ConfigError } from "../errors.js";
import {
  BaseOrchestrator,
  concatenateResults,
  type OrchestratorDeps,
  type PassContext,
  type PassOutcome,
  type WorkflowRun,
} from "../orchestrator.js";
import type { StepDefinition, WorkflowConfig } from "../schemas.js";
import type { AgentResult, SubTask } from "../workflow/types.js";
import { parseSteps, stepsToSubtasks, type AggregateFn } from "./steps.js";

export type SuccessPredicate = (
  synthesis: string,
  passResults: readonly AgentResult[],
  passIndex: number,
) => boolean | Promise<boolean>;

export type PassPlanner = (
  task: string,
  pass: { passIndex: number; previousSynthesis?: string },
) => StepDefinition[] | Promise<StepDefinition[]>;

export type IterativeOptions = WorkflowConfig & {
  maxIterations?: number;
  /** Without one, every pass up to the ceiling runs. */
  successPredicate?: SuccessPredicate;
  steps?: StepDefinition[];
  /** Plans each pass; takes precedence over `steps`. */
  planPass?: PassPlanner;
  aggregate?: AggregateFn;
};

const DEFAULT_MAX_ITERATIONS = 3;

/**
 * Repeated decompose → execute → synthesize passes until the success
 * predicate holds or `maxIterations` is reached. Reaching the ceiling is not
 * a failure: status stays completed and `metadata.converged` is false.
 */
export class IterativeOrchestrator extends BaseOrchestrator<IterativeOptions> {
  readonly pattern = "iterative";

  private readonly maxIterations: number;
  private readonly steps?: StepDefinition[];

  constructor(deps: OrchestratorDeps, options: IterativeOptions = {}) {
    super(deps, options);
    this.maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
    if (!Number.isInteger(this.maxIterations) || this.maxIterations < 1) {
      throw new ConfigError("INVALID_CONFIG", `maxIterations must be a positive integer, got ${this.maxIterations}`);
    }
    if (!options.planPass) {
      if (options.steps === undefined) {
        throw new ConfigError("INVALID_CONFIG", "Iterative workflow needs steps or planPass");
      }
      this.steps = parseSteps(options.steps, "steps");
    }
  }

  protected override async orchestrate(run: WorkflowRun): Promise<PassOutcome> {
    const history: string[] = [];
    let converged = false;
    let outcome: PassOutcome | undefined;

    for (let passIndex = 0; passIndex < this.maxIterations; passIndex++) {
      await run.emit("iteration_start", { passIndex });
      outcome = await this.runPass(run, { passIndex, idPrefix: `p${passIndex}-`, previousSynthesis: history.at(-1) });
      run.metadata.iterationCount = passIndex + 1;

      if (outcome.kind === "cancelled") break;

      history.push(outcome.synthesis);
      converged = this.options.successPredicate
        ? await this.options.successPredicate(outcome.synthesis, outcome.results, passIndex)
        : false;
      await run.emit("iteration_complete", { passIndex, converged });
      run.log.info(`Pass ${passIndex + 1}/${this.maxIterations} done`, { converged });

      if (converged || outcome.schedule.deadlineExceeded) break;
    }

    run.metadata.converged = converged;
    run.metadata.synthesisHistory = history;
    if (!outcome) throw new ConfigError("INVALID_CONFIG", "maxIterations must be at least 1");
    return outcome;
  }

  protected async decompose(run: WorkflowRun, pass: PassContext): Promise<SubTask[]> {
    const steps = this.options.planPass
      ? await this.options.planPass(run.task, { passIndex: pass.passIndex, previousSynthesis: pass.previousSynthesis })
      : this.steps ?? [];
    return stepsToSubtasks(steps, {
      prefix: pass.idPrefix,
      context: {
        ...run.context,
        passIndex: pass.passIndex,
        ...(pass.previousSynthesis !== undefined ? { previousSynthesis: pass.previousSynthesis } : {}),
      },
    });
  }

  protected async synthesize(results: AgentResult[]): Promise<string> {
    return this.options.aggregate ? this.options.aggregate(results) : concatenateResults(results);
  }
}
