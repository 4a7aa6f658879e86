import type { AgentResult, SubTask } from "../workflow/types.js";

export type SchedulerHooks = {
  /** Called right before a subtask is handed to its executor. */
  onDispatch?: (subtask: SubTask) => void | Promise<void>;
  /** Called once per recorded result, including skipped and abandoned subtasks. */
  onSettled?: (subtask: SubTask, result: AgentResult) => void | Promise<void>;
};

export type SchedulerOptions = {
  maxConcurrency: number;
  /** Epoch ms after which nothing new is dispatched and in-flight work is abandoned. */
  deadline?: number;
  failFast?: boolean;
  skipOnFailedDependency?: boolean;
  /** Checked between dispatches. */
  signal?: AbortSignal;
  hooks?: SchedulerHooks;
};

/** Runs one subtask to a result. Must not reject. */
export type RunSubtask = (
  subtask: SubTask,
  run: { dependencyResults: Record<string, AgentResult>; signal: AbortSignal },
) => Promise<AgentResult>;

export type ScheduleOutcome = {
  /** Declaration order; subtasks never dispatched have no entry. */
  results: AgentResult[];
  /** Number of subtasks handed to an executor. */
  dispatched: number;
  undispatched: string[];
  cancelled: boolean;
  deadlineExceeded: boolean;
  failedFast: boolean;
  /** Highest number of executor calls in flight at once. */
  peakConcurrency: number;
  durationMs: number;
};
