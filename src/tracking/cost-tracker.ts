import type { AgentType, CostBreakdown } from "../workflow/types.js";

export type CostEntry = {
  agentType: AgentType;
  specialization?: string;
  tokensUsed: number;
  cost: number;
};

export type CostSnapshot = {
  calls: number;
  tokens: number;
  cost: number;
  breakdown: CostBreakdown;
};

/**
 * Running cost/token totals for one workflow run. Append-only; every
 * executor call, synthesis included, is recorded once.
 */
export class CostTracker {
  private calls = 0;
  private tokens = 0;
  private cost = 0;
  private breakdown = new Map<string, { calls: number; tokens: number; cost: number }>();

  record(entry: CostEntry): void {
    const tokens = Number.isFinite(entry.tokensUsed) ? Math.max(0, entry.tokensUsed) : 0;
    const cost = Number.isFinite(entry.cost) ? Math.max(0, entry.cost) : 0;

    this.calls++;
    this.tokens += tokens;
    this.cost += cost;

    const key = entry.specialization ? `${entry.agentType}:${entry.specialization}` : entry.agentType;
    const bucket = this.breakdown.get(key) ?? { calls: 0, tokens: 0, cost: 0 };
    bucket.calls++;
    bucket.tokens += tokens;
    bucket.cost += cost;
    this.breakdown.set(key, bucket);
  }

  get totalCost(): number {
    return this.cost;
  }

  get totalTokens(): number {
    return this.tokens;
  }

  snapshot(): CostSnapshot {
    const breakdown: CostBreakdown = {};
    for (const [key, bucket] of this.breakdown) {
      breakdown[key] = { ...bucket };
    }
    return { calls: this.calls, tokens: this.tokens, cost: this.cost, breakdown };
  }
}
