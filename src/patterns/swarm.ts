import { ConfigError, DecompositionError, SynthesisError } from "../errors.js";
import { BaseOrchestrator, type OrchestratorDeps, type WorkflowRun } from "../orchestrator.js";
import type { WorkflowConfig } from "../schemas.js";
import { createSubTask } from "../workflow/graph.js";
import { isSuccess } from "../workflow/results.js";
import type { AgentResult, AgentType, SubTask } from "../workflow/types.js";

export const SWARM_DOMAINS = [
  "text",
  "image",
  "video",
  "news",
  "academic",
  "social",
  "product",
  "technical",
  "general",
] as const;

export type SwarmDomain = (typeof SWARM_DOMAINS)[number];

export type SwarmOptions = WorkflowConfig & {
  /** Explicit domains; skips keyword detection. */
  domains?: string[];
  /** Restricts whatever was selected. */
  allowedDomains?: string[];
};

const DOMAIN_KEYWORDS: Record<Exclude<SwarmDomain, "general">, readonly string[]> = {
  text: ["article", "document", "essay", "blog", "writing"],
  image: ["image", "photo", "picture", "visual", "diagram"],
  video: ["video", "youtube", "film", "footage", "stream"],
  news: ["news", "latest", "breaking", "headline", "today"],
  academic: ["paper", "research", "study", "journal", "arxiv"],
  social: ["twitter", "reddit", "social", "community", "forum"],
  product: ["product", "price", "review", "buy", "compare"],
  technical: ["code", "api", "library", "documentation", "github"],
};

const DEFAULT_AGENTS = 5;

function isDomain(value: string): value is SwarmDomain {
  return SWARM_DOMAINS.some((d) => d === value);
}

/** Domains whose keywords appear in the task, in catalogue order. */
export function detectDomains(task: string): SwarmDomain[] {
  const words = new Set(task.toLowerCase().split(/[^a-z0-9]+/).filter(Boolean));
  const found: SwarmDomain[] = [];
  for (const domain of SWARM_DOMAINS) {
    if (domain === "general") continue;
    if (DOMAIN_KEYWORDS[domain].some((k) => words.has(k))) found.push(domain);
  }
  return found;
}

/** One specialist per domain, all in parallel, then one combining synthesis. */
export class SwarmOrchestrator extends BaseOrchestrator<SwarmOptions> {
  readonly pattern = "swarm";

  constructor(deps: OrchestratorDeps, options: SwarmOptions = {}) {
    super(deps, options);
    for (const d of [...(options.domains ?? []), ...(options.allowedDomains ?? [])]) {
      if (!isDomain(d)) {
        throw new ConfigError("INVALID_CONFIG", `Unknown swarm domain "${d}" (known: ${SWARM_DOMAINS.join(", ")})`);
      }
    }
  }

  protected override requiredRoles(): AgentType[] {
    return ["synthesizer"];
  }

  selectDomains(task: string): SwarmDomain[] {
    const explicit = this.options.domains?.filter(isDomain);
    let domains: SwarmDomain[] = explicit?.length ? [...new Set(explicit)] : detectDomains(task);
    if (domains.length === 0) domains = ["general"];

    const allowed = this.options.allowedDomains;
    if (allowed) domains = domains.filter((d) => allowed.includes(d));
    return domains.slice(0, this.options.numAgents ?? DEFAULT_AGENTS);
  }

  protected decompose(run: WorkflowRun): SubTask[] {
    const domains = this.selectDomains(run.task);
    if (domains.length === 0) {
      throw new DecompositionError("DECOMPOSITION_FAILED", "No swarm domain left after applying allowedDomains");
    }
    run.metadata.domains = domains;
    return domains.map((domain) =>
      createSubTask({
        id: `swarm-${domain}`,
        description: `Research the ${domain} sources for: ${run.task}`,
        agentType: "specialist",
        specialization: domain,
        context: { ...run.context, domain },
      }),
    );
  }

  protected async synthesize(results: AgentResult[], run: WorkflowRun): Promise<string> {
    const successes = results.filter(isSuccess);
    if (successes.length === 0) {
      throw new SynthesisError("No successful domain results to synthesize");
    }
    const [final] = await this.runSyntheses(run, [
      {
        id: "swarm-synthesis",
        level: "final",
        agentType: "synthesizer",
        instruction: `Combine and summarize the findings from ${successes.length} domains.\n\nTopic: ${run.task}`,
        sources: successes.map((r) => ({ id: r.agentId, content: r.output })),
      },
    ]);
    if (final.status !== "success") {
      throw new SynthesisError(`Swarm synthesis failed: ${final.error ?? final.status}`);
    }
    return final.content;
  }
}
