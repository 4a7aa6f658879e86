import { z } from "zod";
import { AgentError } from "../errors.js";
import { log } from "../utils/logger.js";
import type { AgentType, SubTask } from "../workflow/types.js";
import type { AgentAdapter, ExecutionContext, ExecutorOutput } from "./adapter.js";

const ExecutorResponseSchema = z.object({
  output: z.string(),
  tokensUsed: z.number().nonnegative().optional(),
  cost: z.number().nonnegative().optional(),
  metadata: z.record(z.unknown()).optional(),
});

export type HttpAdapterOptions = {
  name: string;
  url: string;
  agentType: AgentType;
  specializations?: string[];
  headers?: Record<string, string>;
  /** Injected for tests; defaults to the global fetch. */
  fetch?: typeof fetch;
};

/**
 * Executor that POSTs each subtask to an HTTP endpoint. The endpoint answers
 * with `{ output, tokensUsed?, cost? }` JSON, or plain text.
 */
export class HttpAdapter implements AgentAdapter {
  readonly name: string;
  readonly agentType: AgentType;
  readonly specializations?: readonly string[];

  private url: string;
  private headers: Record<string, string>;
  private fetchImpl: typeof fetch;

  constructor(opts: HttpAdapterOptions) {
    this.name = opts.name;
    this.url = opts.url;
    this.agentType = opts.agentType;
    this.specializations = opts.specializations;
    this.headers = opts.headers ?? {};
    this.fetchImpl = opts.fetch ?? fetch;
  }

  async execute(subtask: SubTask, ctx: ExecutionContext): Promise<ExecutorOutput> {
    log.debug(`[${this.name}] POST ${this.url} for subtask "${subtask.id}"`, { attempt: ctx.attempt });

    const res = await this.fetchImpl(this.url, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...this.headers },
      body: JSON.stringify({
        id: subtask.id,
        description: subtask.description,
        agentType: subtask.agentType,
        specialization: subtask.specialization,
        context: subtask.context,
        workflow: { taskId: ctx.taskId, task: ctx.task, title: ctx.title },
        dependencies: Object.fromEntries(
          Object.entries(ctx.dependencyResults).map(([id, r]) => [id, { status: r.status, output: r.output }]),
        ),
      }),
      signal: ctx.signal,
    });

    const body = await res.text();
    if (!res.ok) {
      throw new AgentError(failureKindForStatus(res.status), `HTTP ${res.status}: ${body.slice(0, 200)}`);
    }

    const contentType = res.headers.get("content-type") ?? "";
    if (!contentType.includes("application/json")) {
      return { output: body, metadata: { httpStatus: res.status } };
    }

    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch (err) {
      throw new AgentError("validation", `Executor returned invalid JSON: ${String(err)}`);
    }
    const parsed = ExecutorResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new AgentError("validation", `Executor response rejected: ${parsed.error.issues.map((i) => i.message).join("; ")}`);
    }
    return {
      output: parsed.data.output,
      tokensUsed: parsed.data.tokensUsed,
      cost: parsed.data.cost,
      metadata: { ...parsed.data.metadata, httpStatus: res.status },
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      const res = await this.fetchImpl(this.url, {
        method: "HEAD",
        signal: AbortSignal.timeout(5_000),
      });
      return res.ok;
    } catch (err) {
      log.debug(`[${this.name}] health check failed`, { error: String(err) });
      return false;
    }
  }
}

function failureKindForStatus(status: number): AgentError["kind"] {
  if (status === 429) return "rate_limit";
  if (status === 401 || status === 403) return "auth";
  if (status === 408 || status === 504) return "timeout";
  if (status >= 400 && status < 500) return "validation";
  return "unknown";
}
