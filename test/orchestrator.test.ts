import { describe, expect, it } from "vitest";
import { AgentRegistry } from "../src/agents/registry.js";
import { resolveConfig } from "../src/config.js";
import { AgentError, ConfigError } from "../src/errors.js";
import type { DocumentGenerator } from "../src/orchestrator.js";
import { agent, delay, echoRegistry, RecordingSink, StaticOrchestrator } from "./helpers.js";

const independent = (...ids: string[]) => ids.map((id) => ({ id, description: `research ${id}` }));

describe("BaseOrchestrator", () => {
  it("runs the four phases and emits lifecycle events in order", async () => {
    const sink = new RecordingSink();
    const orch = new StaticOrchestrator({ agents: echoRegistry() }, independent("a", "b"), { maxConcurrentAgents: 1 });
    const result = await orch.executeWorkflow("topic", "Title", {}, sink);

    expect(result.status).toBe("completed");
    expect(result.finalSynthesis).toBe("## a\nout:a\n\n## b\nout:b");
    expect(result.pattern).toBe("static");
    expect(result.taskId).toMatch(/^static_[0-9a-f]{12}$/);
    expect(sink.types()).toEqual([
      "workflow_start",
      "decomposition_complete",
      "agent_start",
      "agent_complete",
      "agent_start",
      "agent_complete",
      "synthesis_start",
      "synthesis_complete",
      "workflow_complete",
    ]);
    expect(sink.ofType("decomposition_complete")[0].payload).toEqual({ count: 2, subtaskIds: ["a", "b"] });
    expect(sink.events.every((e) => e.taskId === result.taskId)).toBe(true);
  });

  it("keeps one result per subtask in declaration order", async () => {
    const waits: Record<string, number> = { a: 30, b: 15, c: 0 };
    const agents = new AgentRegistry();
    agents.add(
      agent("worker", async (t, ctx) => {
        await delay(waits[t.id], ctx.signal);
        return `out:${t.id}`;
      }),
    );
    const result = await new StaticOrchestrator({ agents }, independent("a", "b", "c")).executeWorkflow("t", "T");
    expect(result.agentResults.map((r) => r.agentId)).toEqual(["a", "b", "c"]);
  });

  it("rejects a cyclic graph before any executor call", async () => {
    let calls = 0;
    const agents = new AgentRegistry();
    agents.add(agent("worker", async () => `call ${++calls}`));
    const sink = new RecordingSink();
    const orch = new StaticOrchestrator({ agents }, [
      { id: "a", description: "a", dependencies: ["b"] },
      { id: "b", description: "b", dependencies: ["a"] },
    ]);
    const result = await orch.executeWorkflow("t", "T", {}, sink);

    expect(calls).toBe(0);
    expect(result.status).toBe("failed");
    expect(result.agentResults).toEqual([]);
    expect(result.totalCost).toBe(0);
    expect(result.error).toEqual({
      name: "DecompositionError",
      code: "CYCLIC_DEPENDENCY",
      message: "Dependency cycle: a -> b -> a",
    });
    expect(sink.types()).toEqual(["workflow_start", "workflow_error"]);
  });

  it("rejects an unregistered agent type before execution", async () => {
    const agents = new AgentRegistry();
    agents.add(agent("worker", async () => "ok"));
    const result = await new StaticOrchestrator({ agents }, [
      { id: "a", description: "a" },
      { id: "x", description: "x", agentType: "specialist" },
    ]).executeWorkflow("t", "T");

    expect(result.status).toBe("failed");
    expect(result.agentResults).toEqual([]);
    expect(result.error).toEqual({
      name: "ConfigError",
      code: "UNKNOWN_AGENT_TYPE",
      message: 'No executor registered for "specialist" (subtask "x")',
    });
  });

  it("times out one subtask under a workflow timeout and synthesizes the rest", async () => {
    const agents = new AgentRegistry();
    agents.add(
      agent("worker", async (t, ctx) => {
        await delay(t.id === "d" ? 3_000 : 10, ctx.signal);
        return `out:${t.id}`;
      }),
    );
    const orch = new StaticOrchestrator({ agents }, independent("a", "b", "c", "d"), {
      maxConcurrentAgents: 2,
      timeoutSeconds: 1,
      workflowTimeoutSeconds: 5,
    });
    const result = await orch.executeWorkflow("t", "T");

    expect(result.status).toBe("completed");
    expect(result.agentResults).toHaveLength(4);
    expect(result.agentResults.map((r) => r.status)).toEqual(["success", "success", "success", "timeout"]);
    expect(result.agentResults[3]).toMatchObject({ errorKind: "timeout", error: "Timed out after 1000ms" });
    expect(result.finalSynthesis).toBe("## a\nout:a\n\n## b\nout:b\n\n## c\nout:c");
    expect(result.metadata.workflowTimedOut).toBeUndefined();
  });

  it("proceeds to synthesis when the workflow deadline passes", async () => {
    const agents = new AgentRegistry();
    agents.add(
      agent("worker", async (t, ctx) => {
        await delay(t.id === "slow" ? 2_000 : 5, ctx.signal);
        return `out:${t.id}`;
      }),
    );
    const orch = new StaticOrchestrator({ agents }, independent("fast", "slow", "queued"), {
      maxConcurrentAgents: 2,
      timeoutSeconds: 10,
      workflowTimeoutSeconds: 0.2,
    });
    const result = await orch.executeWorkflow("t", "T");

    expect(result.status).toBe("completed");
    expect(result.agentResults.map((r) => [r.agentId, r.status])).toEqual([
      ["fast", "success"],
      ["slow", "timeout"],
      ["queued", "success"],
    ]);
    expect(result.metadata.workflowTimedOut).toBe(true);
    expect(result.warnings).toEqual(["Workflow timeout reached; 0 subtask(s) not dispatched, synthesizing partial results"]);
    expect(result.finalSynthesis).toBe("## fast\nout:fast\n\n## queued\nout:queued");
  });

  it("turns executor errors into failed results and keeps going", async () => {
    const agents = new AgentRegistry();
    agents.add(
      agent("worker", async (t) => {
        if (t.id === "b") throw new Error("exploded");
        return `out:${t.id}`;
      }),
    );
    const sink = new RecordingSink();
    const result = await new StaticOrchestrator({ agents }, independent("a", "b", "c")).executeWorkflow("t", "T", {}, sink);

    expect(result.status).toBe("completed");
    expect(result.agentResults[1]).toMatchObject({ status: "failed", error: "exploded", errorKind: "unknown" });
    expect(result.finalSynthesis).toBe("## a\nout:a\n\n## c\nout:c");
    expect(sink.ofType("agent_failed")[0].payload).toEqual({
      agentId: "b",
      status: "failed",
      error: "exploded",
      errorKind: "unknown",
    });
  });

  it("respects a failure status reported by the executor", async () => {
    const agents = new AgentRegistry();
    agents.add(agent("worker", async () => ({ status: "failed", output: "", error: "no sources", errorKind: "validation" })));
    const result = await new StaticOrchestrator({ agents }, independent("a")).executeWorkflow("t", "T");
    expect(result.agentResults[0]).toMatchObject({ status: "failed", error: "no sources", errorKind: "validation" });
  });

  it("keeps every agent result when synthesis fails", async () => {
    const orch = new StaticOrchestrator({ agents: echoRegistry() }, independent("a", "b"), {}, async () => {
      throw new Error("model overloaded");
    });
    const result = await orch.executeWorkflow("t", "T");

    expect(result.status).toBe("failed");
    expect(result.finalSynthesis).toBeNull();
    expect(result.agentResults.map((r) => r.status)).toEqual(["success", "success"]);
    expect(result.error).toEqual({ name: "SynthesisError", code: "SYNTHESIS_FAILED", message: "model overloaded" });
  });

  it("stops dispatching and fails the run with failFast", async () => {
    let calls = 0;
    const agents = new AgentRegistry();
    agents.add(
      agent("worker", async (t) => {
        calls++;
        if (t.id === "a") throw new Error("boom");
        return "ok";
      }),
    );
    const sink = new RecordingSink();
    const result = await new StaticOrchestrator({ agents }, independent("a", "b", "c"), {
      maxConcurrentAgents: 1,
      failFast: true,
    }).executeWorkflow("t", "T", {}, sink);

    expect(calls).toBe(1);
    expect(result.status).toBe("failed");
    expect(result.agentResults).toHaveLength(1);
    expect(result.error).toEqual({ name: "OrchestratorError", code: "AGENT_FAILED", message: 'Fail-fast: subtask "a" failed: boom' });
    expect(sink.ofType("synthesis_start")).toEqual([]);
  });

  it("cancels between dispatches and skips synthesis", async () => {
    const controller = new AbortController();
    const calls: string[] = [];
    const agents = new AgentRegistry();
    agents.add(
      agent("worker", async (t) => {
        calls.push(t.id);
        controller.abort();
        return `out:${t.id}`;
      }),
    );
    const sink = new RecordingSink();
    const result = await new StaticOrchestrator({ agents }, independent("a", "b", "c"), {
      maxConcurrentAgents: 1,
    }).executeWorkflow("t", "T", {}, sink, { signal: controller.signal });

    expect(calls).toEqual(["a"]);
    expect(result.status).toBe("cancelled");
    expect(result.agentResults.map((r) => [r.agentId, r.status])).toEqual([["a", "success"]]);
    expect(result.finalSynthesis).toBeNull();
    expect(sink.types().at(-1)).toBe("workflow_cancelled");
  });

  it("retries transient failures with backoff and counts attempts", async () => {
    let calls = 0;
    const agents = new AgentRegistry();
    agents.add(
      agent("worker", async () => {
        calls++;
        if (calls < 3) throw new AgentError("rate_limit", "slow down");
        return { output: "finally", cost: 0.5, tokensUsed: 10 };
      }),
    );
    const sink = new RecordingSink();
    const result = await new StaticOrchestrator({ agents }, independent("a"), {
      retryPolicy: { maxRetries: 3, backoffBaseMs: 1, maxBackoffMs: 4 },
    }).executeWorkflow("t", "T", {}, sink);

    expect(result.agentResults[0]).toMatchObject({ status: "success", output: "finally", attempts: 3, cost: 0.5 });
    expect(sink.ofType("agent_retry").map((e) => e.payload)).toEqual([
      { agentId: "a", attempt: 1, delayMs: 1, errorKind: "rate_limit" },
      { agentId: "a", attempt: 2, delayMs: 2, errorKind: "rate_limit" },
    ]);
  });

  it("never retries non-transient failures", async () => {
    let calls = 0;
    const agents = new AgentRegistry();
    agents.add(
      agent("worker", async () => {
        calls++;
        throw new AgentError("auth", "bad key");
      }),
    );
    const result = await new StaticOrchestrator({ agents }, independent("a"), {
      retryPolicy: { maxRetries: 3, backoffBaseMs: 1 },
    }).executeWorkflow("t", "T");

    expect(calls).toBe(1);
    expect(result.agentResults[0]).toMatchObject({ status: "failed", errorKind: "auth", attempts: 1 });
  });

  it("aggregates cost and tokens per agent type", async () => {
    const agents = new AgentRegistry();
    agents.add(agent("worker", async () => ({ output: "w", cost: 0.25, tokensUsed: 100 })));
    agents.add(agent("specialist", async () => ({ output: "s", cost: 0.5, tokensUsed: 40 }), ["news"]));
    const result = await new StaticOrchestrator({ agents }, [
      { id: "a", description: "a" },
      { id: "b", description: "b" },
      { id: "n", description: "n", agentType: "specialist", specialization: "news" },
    ]).executeWorkflow("t", "T");

    expect(result.totalCost).toBe(1);
    expect(result.totalTokens).toBe(240);
    expect(result.costBreakdown).toEqual({
      worker: { calls: 2, tokens: 200, cost: 0.5 },
      "specialist:news": { calls: 1, tokens: 40, cost: 0.5 },
    });
  });

  it("downgrades a document failure to a warning", async () => {
    const documents: DocumentGenerator = {
      generate: async () => {
        throw new Error("disk full");
      },
    };
    const result = await new StaticOrchestrator({ agents: echoRegistry(), documents }, independent("a"), {
      generateDocuments: true,
    }).executeWorkflow("t", "T");

    expect(result.status).toBe("completed");
    expect(result.artifacts).toEqual([]);
    expect(result.warnings).toEqual(["Document generation failed: disk full"]);
  });

  it("attaches generated artifacts", async () => {
    const documents: DocumentGenerator = {
      generate: async (text, formats) => formats.map((format) => ({ format, location: `mem://${format}`, bytes: text.length })),
    };
    const result = await new StaticOrchestrator({ agents: echoRegistry(), documents }, independent("a"), {
      generateDocuments: true,
      documentFormats: ["markdown", "json"],
    }).executeWorkflow("t", "T");

    expect(result.artifacts).toEqual([
      { format: "markdown", location: "mem://markdown", bytes: 10 },
      { format: "json", location: "mem://json", bytes: 10 },
    ]);
  });

  it("is not affected by a failing progress sink", async () => {
    const sink = {
      emit: () => {
        throw new Error("consumer gone");
      },
    };
    const result = await new StaticOrchestrator({ agents: echoRegistry() }, independent("a")).executeWorkflow("t", "T", {}, sink);
    expect(result.status).toBe("completed");
  });

  it("runs one subtask at a time when parallel execution is off", async () => {
    let inFlight = 0;
    let peak = 0;
    const agents = new AgentRegistry();
    agents.add(
      agent("worker", async () => {
        peak = Math.max(peak, ++inFlight);
        await delay(5);
        inFlight--;
        return "ok";
      }),
    );
    await new StaticOrchestrator({ agents }, independent("a", "b", "c"), { parallelExecution: false }).executeWorkflow("t", "T");
    expect(peak).toBe(1);
  });

  it("takes engine defaults from the config object", async () => {
    let inFlight = 0;
    let peak = 0;
    const agents = new AgentRegistry();
    agents.add(
      agent("worker", async () => {
        peak = Math.max(peak, ++inFlight);
        await delay(5);
        inFlight--;
        return "ok";
      }),
    );
    const config = resolveConfig({ execution: { maxConcurrentAgents: 2 } });
    await new StaticOrchestrator({ agents, config }, independent("a", "b", "c", "d")).executeWorkflow("t", "T");
    expect(peak).toBe(2);
  });

  it("rejects invalid workflow options at construction with a ConfigError", () => {
    let caught: unknown;
    try {
      new StaticOrchestrator({ agents: echoRegistry() }, [], { maxConcurrentAgents: 0 });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({
      code: "INVALID_CONFIG",
      message: expect.stringMatching(/^Invalid workflow config: maxConcurrentAgents: /),
    });
  });

  it("returns a frozen result", async () => {
    const result = await new StaticOrchestrator({ agents: echoRegistry() }, independent("a")).executeWorkflow("t", "T");
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.agentResults)).toBe(true);
    expect(Object.isFrozen(result.agentResults[0])).toBe(true);
  });
});
