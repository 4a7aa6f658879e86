import { ConfigError } from "../errors.js";
import type { ExecuteWorkflowOptions, OrchestratorDeps } from "../orchestrator.js";
import type { ProgressSink } from "../tracking/events.js";
import type { WorkflowContext, WorkflowResult } from "../workflow/types.js";
import { ConditionalOrchestrator, type ConditionalOptions } from "./conditional.js";
import { HierarchicalOrchestrator, type HierarchicalOptions } from "./hierarchical.js";
import { IterativeOrchestrator, type IterativeOptions } from "./iterative.js";
import { SequentialOrchestrator, type SequentialOptions } from "./sequential.js";
import { SwarmOrchestrator, type SwarmOptions } from "./swarm.js";

export type PatternName = "hierarchical" | "swarm" | "sequential" | "conditional" | "iterative";

/** Every option any pattern reads; each pattern ignores the ones it does not use. */
export type PatternOptions = HierarchicalOptions &
  SwarmOptions &
  SequentialOptions &
  ConditionalOptions &
  IterativeOptions;

/** What callers hold after construction, whatever the pattern. */
export interface WorkflowRunner {
  readonly pattern: string;
  executeWorkflow(
    task: string,
    title: string,
    context?: WorkflowContext,
    sink?: ProgressSink,
    opts?: ExecuteWorkflowOptions,
  ): Promise<WorkflowResult>;
}

export type PatternEntry = {
  name: PatternName;
  displayName: string;
  description: string;
  useCases: string[];
  defaults: Record<string, unknown>;
  create(deps: OrchestratorDeps, options: PatternOptions): WorkflowRunner;
};

const PATTERNS: readonly PatternEntry[] = [
  {
    name: "hierarchical",
    displayName: "Hierarchical research",
    description: "Wide parallel research fan-out, grouped tier-2 syntheses, one executive tier-3 synthesis",
    useCases: ["comprehensive research reports", "market and competitive analysis", "literature reviews"],
    defaults: { numAgents: 8, groupSize: 5, tier2Enabled: true, tier3Enabled: true },
    create: (deps, options) => new HierarchicalOrchestrator(deps, options),
  },
  {
    name: "swarm",
    displayName: "Domain swarm",
    description: "One specialist per detected domain in parallel, combined in a single synthesis",
    useCases: ["multi-source search", "news and social monitoring", "product comparisons"],
    defaults: { numAgents: 5 },
    create: (deps, options) => new SwarmOrchestrator(deps, options),
  },
  {
    name: "sequential",
    displayName: "Sequential pipeline",
    description: "Caller-ordered steps run one after another, each seeing its predecessor's result",
    useCases: ["draft then review pipelines", "extract, transform, summarize chains"],
    defaults: {},
    create: (deps, options) => new SequentialOrchestrator(deps, options),
  },
  {
    name: "conditional",
    displayName: "Conditional branches",
    description: "Selects one named branch of steps from a condition value or evaluator",
    useCases: ["routing by request type", "depth selection (quick vs thorough)"],
    defaults: {},
    create: (deps, options) => new ConditionalOrchestrator(deps, options),
  },
  {
    name: "iterative",
    displayName: "Iterative refinement",
    description: "Repeats passes until a success predicate holds or the iteration ceiling is reached",
    useCases: ["refine until quality bar", "progressive deepening of research"],
    defaults: { maxIterations: 3 },
    create: (deps, options) => new IterativeOrchestrator(deps, options),
  },
];

const byName = new Map<string, PatternEntry>(PATTERNS.map((p) => [p.name, p]));

export function listPatterns(): readonly PatternEntry[] {
  return PATTERNS;
}

export function getPattern(name: string): PatternEntry {
  const entry = byName.get(name);
  if (!entry) {
    throw new ConfigError("UNKNOWN_PATTERN", `Unknown pattern "${name}" (known: ${PATTERNS.map((p) => p.name).join(", ")})`);
  }
  return entry;
}

export function createOrchestrator(name: string, deps: OrchestratorDeps, options: PatternOptions = {}): WorkflowRunner {
  return getPattern(name).create(deps, options);
}
