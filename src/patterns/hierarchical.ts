import { ConfigError, DecompositionError, SynthesisError, errorMessage } from "../errors.js";
import {
  BaseOrchestrator,
  concatenateResults,
  type OrchestratorDeps,
  type PassContext,
  type WorkflowRun,
} from "../orchestrator.js";
import { parseOrThrow, PlannerResponseSchema, type WorkflowConfig } from "../schemas.js";
import { createSubTask } from "../workflow/graph.js";
import { isSuccess } from "../workflow/results.js";
import type { AgentResult, AgentType, SubTask, SynthesisResult } from "../workflow/types.js";

export type HierarchicalOptions = WorkflowConfig & {
  /** Tier-1 results per tier-2 synthesis. */
  groupSize?: number;
  tier2Enabled?: boolean;
  tier3Enabled?: boolean;
};

/** Used when no planner executor is registered. */
const RESEARCH_ANGLES = [
  "background and definitions",
  "current state and recent developments",
  "key actors and stakeholders",
  "data, statistics and evidence",
  "challenges and risks",
  "opportunities and open problems",
  "case studies and examples",
  "outlook and future directions",
] as const;

const DEFAULT_AGENTS = 8;
const DEFAULT_GROUP_SIZE = 5;

function chunk<T>(items: readonly T[], size: number): T[][] {
  const groups: T[][] = [];
  for (let i = 0; i < items.length; i += size) groups.push(items.slice(i, i + size));
  return groups;
}

/** Extract the first JSON object from a planner's answer, tolerating code fences. */
export function extractJson(text: string): unknown {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/.exec(text);
  const body = fenced ? fenced[1] : text;
  const start = body.indexOf("{");
  const end = body.lastIndexOf("}");
  if (start === -1 || end <= start) throw new Error("no JSON object found");
  return JSON.parse(body.slice(start, end + 1));
}

/**
 * Wide tier-1 research fan-out, then grouped tier-2 syntheses and a single
 * tier-3 executive synthesis when more than one group exists.
 */
export class HierarchicalOrchestrator extends BaseOrchestrator<HierarchicalOptions> {
  readonly pattern = "hierarchical";

  private readonly groupSize: number;
  private readonly tier2: boolean;
  private readonly tier3: boolean;

  constructor(deps: OrchestratorDeps, options: HierarchicalOptions = {}) {
    super(deps, options);
    this.groupSize = options.groupSize ?? DEFAULT_GROUP_SIZE;
    if (!Number.isInteger(this.groupSize) || this.groupSize < 1) {
      throw new ConfigError("INVALID_CONFIG", `groupSize must be a positive integer, got ${this.groupSize}`);
    }
    this.tier2 = options.tier2Enabled ?? true;
    this.tier3 = options.tier3Enabled ?? true;
  }

  protected override requiredRoles(): AgentType[] {
    const roles: AgentType[] = [];
    if (this.tier2) roles.push("synthesizer");
    if (this.tier3) roles.push("executive");
    return roles;
  }

  protected async decompose(run: WorkflowRun, _pass: PassContext): Promise<SubTask[]> {
    const count = this.options.numAgents ?? DEFAULT_AGENTS;
    const plan = this.agents.has("planner") ? await this.plan(run, count) : this.defaultPlan(count);

    return plan.map((item, i) =>
      createSubTask({
        id: `tier1-${i + 1}`,
        description: `${item.description}\n\nResearch topic: ${run.task}`,
        agentType: "worker",
        specialization: item.specialization,
        priority: item.priority,
        context: { ...run.context, tier: 1, angle: item.description },
      }),
    );
  }

  private defaultPlan(count: number): Array<{ description: string; specialization?: string; priority?: number }> {
    return Array.from({ length: count }, (_, i) => {
      const angle = RESEARCH_ANGLES[i % RESEARCH_ANGLES.length];
      const round = Math.floor(i / RESEARCH_ANGLES.length);
      return { description: round === 0 ? `Investigate ${angle}` : `Investigate ${angle} (part ${round + 1})` };
    });
  }

  private async plan(run: WorkflowRun, count: number) {
    const planner = createSubTask({
      id: "planner",
      description: `Split the research topic into at most ${count} independent subtasks. Answer with JSON: {"subtasks":[{"description":"..."}]}.\n\nTopic: ${run.task}`,
      agentType: "planner",
      context: { ...run.context, maxSubtasks: count },
    });
    const { results } = await this.executeSubtasks(run, [planner], { maxConcurrency: 1, quiet: true });
    const answer = results[0];
    if (!answer || !isSuccess(answer)) {
      throw new DecompositionError("DECOMPOSITION_FAILED", `Planner failed: ${answer?.error ?? "no result"}`);
    }

    let raw: unknown;
    try {
      raw = extractJson(answer.output);
    } catch (err) {
      throw new DecompositionError("DECOMPOSITION_FAILED", `Planner answer is not JSON: ${errorMessage(err)}`, { cause: err });
    }
    try {
      const parsed = parseOrThrow(PlannerResponseSchema, raw, "planner response");
      return parsed.subtasks.slice(0, count);
    } catch (err) {
      throw new DecompositionError("DECOMPOSITION_FAILED", errorMessage(err), { cause: err });
    }
  }

  protected async synthesize(results: AgentResult[], run: WorkflowRun): Promise<string> {
    const successes = results.filter(isSuccess);
    if (successes.length === 0) {
      throw new SynthesisError("No successful tier-1 results to synthesize");
    }
    run.metadata.tier1Succeeded = successes.length;

    if (!this.tier2 && !this.tier3) return concatenateResults(successes);

    if (!this.tier2) {
      run.metadata.tier2Count = 0;
      return this.executiveSynthesis(run, successes.map((r) => ({ id: r.agentId, content: r.output })));
    }

    const groups = chunk(successes, this.groupSize);
    const tier2 = await this.runSyntheses(
      run,
      groups.map((group, g) => ({
        id: `tier2-${g + 1}`,
        level: "tier2" as const,
        agentType: "synthesizer" as const,
        instruction: `Synthesize these ${group.length} research findings into one coherent section.\n\nTopic: ${run.task}`,
        sources: group.map((r) => ({ id: r.agentId, content: r.output })),
      })),
    );
    run.metadata.tier2Count = tier2.length;

    const usable = tier2.filter((s) => s.status === "success");
    if (usable.length === 0) {
      throw new SynthesisError(`All ${tier2.length} tier-2 syntheses failed`);
    }
    for (const failed of tier2.filter((s) => s.status !== "success")) {
      run.warnings.push(`Tier-2 synthesis ${failed.synthesisId} failed: ${failed.error ?? failed.status}`);
    }

    if (usable.length === 1) {
      run.metadata.tier3Count = 0;
      return usable[0].content;
    }
    if (!this.tier3) {
      run.metadata.tier3Count = 0;
      return labelSyntheses(usable);
    }
    return this.executiveSynthesis(run, usable.map((s) => ({ id: s.synthesisId, content: s.content })));
  }

  private async executiveSynthesis(run: WorkflowRun, sources: Array<{ id: string; content: string }>): Promise<string> {
    const [final] = await this.runSyntheses(run, [
      {
        id: "tier3-final",
        level: "tier3",
        agentType: "executive",
        instruction: `Write the final executive synthesis from these sections.\n\nTopic: ${run.task}`,
        sources,
      },
    ]);
    run.metadata.tier3Count = 1;
    if (final.status !== "success") {
      throw new SynthesisError(`Tier-3 synthesis failed: ${final.error ?? final.status}`);
    }
    return final.content;
  }
}

function labelSyntheses(syntheses: readonly SynthesisResult[]): string {
  return syntheses.map((s) => `## ${s.synthesisId}\n${s.content}`).join("\n\n");
}
