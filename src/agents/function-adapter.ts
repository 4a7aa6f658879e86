import type { AgentType, SubTask } from "../workflow/types.js";
import type { AgentAdapter, ExecutionContext, ExecutorOutput } from "./adapter.js";

/** Plain async function backing an executor. Returning a string means success with zero cost. */
export type AgentFunction = (subtask: SubTask, ctx: ExecutionContext) => Promise<string | ExecutorOutput>;

export type FunctionAdapterOptions = {
  name: string;
  agentType: AgentType;
  fn: AgentFunction;
  specializations?: string[];
  description?: string;
};

export class FunctionAdapter implements AgentAdapter {
  readonly name: string;
  readonly agentType: AgentType;
  readonly specializations?: readonly string[];
  readonly description?: string;

  private fn: AgentFunction;

  constructor(opts: FunctionAdapterOptions) {
    this.name = opts.name;
    this.agentType = opts.agentType;
    this.specializations = opts.specializations;
    this.description = opts.description;
    this.fn = opts.fn;
  }

  async execute(subtask: SubTask, ctx: ExecutionContext): Promise<ExecutorOutput> {
    const result = await this.fn(subtask, ctx);
    return typeof result === "string" ? { output: result } : result;
  }
}
