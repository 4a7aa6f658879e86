import type { FailureKind } from "../errors.js";
import type { AgentResult, AgentStatus, AgentType, SubTask, WorkflowContext } from "../workflow/types.js";

/** Everything an executor may read about the run a subtask belongs to. */
export type ExecutionContext = {
  taskId: string;
  task: string;
  title: string;
  context: Readonly<WorkflowContext>;
  /** Results of this subtask's dependencies, keyed by subtask id. */
  dependencyResults: Readonly<Record<string, AgentResult>>;
  /** 1-based attempt number. */
  attempt: number;
  /** Fires when the subtask times out or the workflow gives up on it. */
  signal: AbortSignal;
};

export type ExecutorOutput = {
  /** Defaults to "success". */
  status?: AgentStatus;
  output: string;
  tokensUsed?: number;
  cost?: number;
  /** Milliseconds; measured by the engine when omitted. */
  executionTime?: number;
  error?: string;
  errorKind?: FailureKind;
  metadata?: Record<string, unknown>;
};

/**
 * The boundary to whatever turns a subtask into text. Implementations may
 * throw; the engine converts thrown errors into failed results.
 */
export interface AgentAdapter {
  readonly name: string;
  readonly agentType: AgentType;
  /** Specializations this adapter serves. Without any it serves the bare role. */
  readonly specializations?: readonly string[];
  readonly description?: string;

  execute(subtask: SubTask, ctx: ExecutionContext): Promise<ExecutorOutput>;
  healthCheck?(): Promise<boolean>;
}
