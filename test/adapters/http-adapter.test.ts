import { describe, expect, it } from "vitest";
import type { ExecutionContext } from "../../src/agents/adapter.js";
import { HttpAdapter } from "../../src/agents/http-adapter.js";
import { AgentError } from "../../src/errors.js";
import { createSubTask } from "../../src/workflow/graph.js";
import { createAgentResult } from "../../src/workflow/results.js";

const subtask = createSubTask({ id: "tier1-1", description: "Market size", context: { region: "EU" } });

function ctx(): ExecutionContext {
  const dep = createSubTask({ id: "scope", description: "Scope" });
  return {
    taskId: "hierarchical_000000000001",
    task: "EV batteries",
    title: "Report",
    context: {},
    dependencyResults: { scope: createAgentResult(dep, { status: "success", output: "scoped" }) },
    attempt: 1,
    signal: new AbortController().signal,
  };
}

type Captured = { url: string; init?: RequestInit };

function fakeFetch(response: () => Response, captured: Captured[] = []): typeof fetch {
  return async (input, init) => {
    captured.push({ url: String(input), init });
    return response();
  };
}

describe("HttpAdapter", () => {
  it("posts the subtask with its workflow and dependency outputs", async () => {
    const captured: Captured[] = [];
    const adapter = new HttpAdapter({
      name: "research",
      url: "http://executor.test/worker",
      agentType: "worker",
      headers: { Authorization: "Bearer test-token" },
      fetch: fakeFetch(() => Response.json({ output: "42 GWh", tokensUsed: 120, cost: 0.01 }), captured),
    });

    const out = await adapter.execute(subtask, ctx());

    expect(out).toEqual({ output: "42 GWh", tokensUsed: 120, cost: 0.01, metadata: { httpStatus: 200 } });
    expect(captured).toHaveLength(1);
    expect(captured[0].url).toBe("http://executor.test/worker");
    expect(captured[0].init?.method).toBe("POST");
    expect(captured[0].init?.headers).toEqual({ "Content-Type": "application/json", Authorization: "Bearer test-token" });
    expect(JSON.parse(String(captured[0].init?.body))).toEqual({
      id: "tier1-1",
      description: "Market size",
      agentType: "worker",
      context: { region: "EU" },
      workflow: { taskId: "hierarchical_000000000001", task: "EV batteries", title: "Report" },
      dependencies: { scope: { status: "success", output: "scoped" } },
    });
  });

  it("treats a non-JSON body as plain output", async () => {
    const adapter = new HttpAdapter({
      name: "text",
      url: "http://executor.test/worker",
      agentType: "worker",
      fetch: fakeFetch(() => new Response("plain answer", { headers: { "content-type": "text/plain" } })),
    });
    expect(await adapter.execute(subtask, ctx())).toEqual({ output: "plain answer", metadata: { httpStatus: 200 } });
  });

  it.each([
    [429, "rate_limit"],
    [401, "auth"],
    [504, "timeout"],
    [400, "validation"],
    [500, "unknown"],
  ])("maps HTTP %i to a %s failure", async (status, kind) => {
    const adapter = new HttpAdapter({
      name: "flaky",
      url: "http://executor.test/worker",
      agentType: "worker",
      fetch: fakeFetch(() => new Response("nope", { status })),
    });

    const err = await adapter.execute(subtask, ctx()).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(AgentError);
    expect(err).toMatchObject({ kind, message: `HTTP ${status}: nope` });
  });

  it("rejects a JSON body without output", async () => {
    const adapter = new HttpAdapter({
      name: "bad",
      url: "http://executor.test/worker",
      agentType: "worker",
      fetch: fakeFetch(() => Response.json({ answer: "x" })),
    });
    const err = await adapter.execute(subtask, ctx()).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(AgentError);
    expect(err).toMatchObject({ kind: "validation" });
  });

  it("reports health from a HEAD request", async () => {
    const up = new HttpAdapter({
      name: "up",
      url: "http://executor.test/worker",
      agentType: "worker",
      fetch: fakeFetch(() => new Response(null, { status: 200 })),
    });
    const down = new HttpAdapter({
      name: "down",
      url: "http://executor.test/worker",
      agentType: "worker",
      fetch: async () => {
        throw new TypeError("fetch failed");
      },
    });
    expect(await up.healthCheck()).toBe(true);
    expect(await down.healthCheck()).toBe(false);
  });
});
