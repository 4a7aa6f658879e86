import type { FailureKind } from "../errors.js";
import type { AgentResult, AgentStatus, SubTask } from "./types.js";

type ResultFields = {
  status: AgentStatus;
  output?: string;
  tokensUsed?: number;
  cost?: number;
  executionTime?: number;
  error?: string;
  errorKind?: FailureKind;
  attempts?: number;
  metadata?: Record<string, unknown>;
};

/** Build the single, frozen result for a subtask. */
export function createAgentResult(subtask: SubTask, fields: ResultFields): AgentResult {
  return Object.freeze({
    agentId: subtask.id,
    agentType: subtask.agentType,
    ...(subtask.specialization !== undefined ? { specialization: subtask.specialization } : {}),
    status: fields.status,
    output: fields.output ?? "",
    tokensUsed: fields.tokensUsed ?? 0,
    cost: fields.cost ?? 0,
    executionTime: fields.executionTime ?? 0,
    ...(fields.error !== undefined ? { error: fields.error } : {}),
    ...(fields.errorKind !== undefined ? { errorKind: fields.errorKind } : {}),
    attempts: fields.attempts ?? 1,
    metadata: Object.freeze({ ...(fields.metadata ?? {}) }),
  });
}

export function failedResult(
  subtask: SubTask,
  errorKind: FailureKind,
  error: string,
  extra: Omit<ResultFields, "status" | "error" | "errorKind"> = {},
): AgentResult {
  return createAgentResult(subtask, {
    ...extra,
    status: errorKind === "timeout" ? "timeout" : "failed",
    error,
    errorKind,
    attempts: extra.attempts ?? (errorKind === "dependency" ? 0 : 1),
  });
}

export function isSuccess(result: AgentResult): boolean {
  return result.status === "success";
}
