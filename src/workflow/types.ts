import type { FailureKind } from "../errors.js";

export type AgentType = "worker" | "planner" | "specialist" | "synthesizer" | "executive";

export const AGENT_TYPES: readonly AgentType[] = ["worker", "planner", "specialist", "synthesizer", "executive"];

export type SubTask = {
  readonly id: string;
  readonly description: string;
  readonly agentType: AgentType;
  readonly specialization?: string;
  /** Higher runs first among ready subtasks. */
  readonly priority: number;
  readonly dependencies: readonly string[];
  readonly context: Readonly<Record<string, unknown>>;
};

export type SubTaskInput = {
  id: string;
  description: string;
  agentType?: AgentType;
  specialization?: string;
  priority?: number;
  dependencies?: string[];
  context?: Record<string, unknown>;
};

export type AgentStatus = "success" | "failed" | "timeout";

export type AgentResult = {
  readonly agentId: string;
  readonly agentType: AgentType;
  readonly specialization?: string;
  readonly status: AgentStatus;
  readonly output: string;
  readonly tokensUsed: number;
  readonly cost: number;
  /** Milliseconds. */
  readonly executionTime: number;
  readonly error?: string;
  readonly errorKind?: FailureKind;
  readonly attempts: number;
  readonly metadata: Readonly<Record<string, unknown>>;
};

export type SynthesisLevel = "tier2" | "tier3" | "final";

export type SynthesisResult = {
  readonly synthesisId: string;
  readonly level: SynthesisLevel;
  readonly status: AgentStatus;
  readonly content: string;
  readonly sourceIds: readonly string[];
  readonly tokensUsed: number;
  readonly cost: number;
  readonly executionTime: number;
  readonly error?: string;
};

export type WorkflowStatus = "pending" | "running" | "completed" | "failed" | "cancelled";

export type ArtifactRef = {
  format: string;
  location: string;
  bytes?: number;
};

export type CostBreakdown = Record<string, { calls: number; tokens: number; cost: number }>;

export type WorkflowResult = {
  readonly taskId: string;
  readonly title: string;
  readonly pattern: string;
  readonly status: WorkflowStatus;
  /** In subtask declaration order. */
  readonly agentResults: readonly AgentResult[];
  readonly synthesisResults: readonly SynthesisResult[];
  readonly finalSynthesis: string | null;
  readonly totalCost: number;
  readonly totalTokens: number;
  /** Milliseconds, wall clock. */
  readonly totalExecutionTime: number;
  readonly costBreakdown: CostBreakdown;
  readonly artifacts: readonly ArtifactRef[];
  readonly warnings: readonly string[];
  readonly error?: { name: string; code: string; message: string };
  readonly metadata: Readonly<Record<string, unknown>>;
  readonly startedAt: string;
  readonly completedAt: string;
};

export type EventType =
  | "workflow_start"
  | "decomposition_complete"
  | "agent_start"
  | "agent_complete"
  | "agent_failed"
  | "agent_retry"
  | "synthesis_start"
  | "synthesis_complete"
  | "workflow_complete"
  | "workflow_error"
  | "workflow_cancelled"
  | "iteration_start"
  | "iteration_complete"
  | "branch_selected";

export type WorkflowEvent = {
  eventType: EventType;
  taskId: string;
  /** ISO-8601. */
  timestamp: string;
  payload: Record<string, unknown>;
};

/** Opaque caller-supplied bag threaded through decomposition and execution. */
export type WorkflowContext = Record<string, unknown>;
