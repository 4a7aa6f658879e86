import { describe, expect, it } from "vitest";
import { AgentRegistry } from "../src/agents/registry.js";
import { ConfigError, ValidationError } from "../src/errors.js";
import { createOrchestrator, getPattern, listPatterns } from "../src/patterns/registry.js";
import { agent, echoRegistry } from "./helpers.js";

describe("AgentRegistry", () => {
  it("prefers a specialized executor and falls back to the bare role", () => {
    const registry = new AgentRegistry();
    const general = agent("specialist", async () => "general");
    const news = agent("specialist", async () => "news", ["news", "social"]);
    registry.add(general);
    registry.add(news);

    expect(registry.resolve("specialist", "social")).toBe(news);
    expect(registry.resolve("specialist", "video")).toBe(general);
    expect(registry.resolve("worker")).toBeUndefined();
    expect(registry.keys()).toEqual(["specialist", "specialist:news", "specialist:social"]);
    expect(registry.list()).toEqual([general, news]);
  });

  it("refuses a second executor for the same key", () => {
    const registry = new AgentRegistry();
    registry.add(agent("worker", async () => "a"));
    expect(() => registry.add(agent("worker", async () => "b"))).toThrow(ValidationError);
  });

  it("removes every key an executor was registered under", () => {
    const registry = new AgentRegistry();
    registry.add(agent("specialist", async () => "x", ["news", "social"]));
    expect(registry.remove("specialist:news+social")).toBe(true);
    expect(registry.keys()).toEqual([]);
    expect(registry.remove("specialist:news+social")).toBe(false);
  });

  it("names the missing executor and subtask", () => {
    const registry = new AgentRegistry();
    registry.add(agent("worker", async () => "x"));
    expect(() =>
      registry.assertResolvable([
        { id: "a", agentType: "worker" },
        { id: "b", agentType: "specialist", specialization: "news" },
      ]),
    ).toThrow('No executor registered for "specialist:news" (subtask "b")');
  });

  it("reports health, counting executors without a check as healthy", async () => {
    const registry = new AgentRegistry();
    registry.add(agent("worker", async () => "x"));
    registry.add({
      name: "remote",
      agentType: "executive",
      execute: async () => ({ output: "" }),
      healthCheck: async () => {
        throw new Error("unreachable");
      },
    });
    expect(await registry.checkAllHealth()).toEqual([
      { name: "worker", healthy: true },
      { name: "remote", healthy: false, error: "Error: unreachable" },
    ]);
  });
});

describe("pattern catalogue", () => {
  it("lists the five patterns", () => {
    expect(listPatterns().map((p) => p.name)).toEqual(["hierarchical", "swarm", "sequential", "conditional", "iterative"]);
  });

  it("rejects an unknown pattern name", () => {
    let caught: unknown;
    try {
      getPattern("mesh");
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({
      code: "UNKNOWN_PATTERN",
      message: 'Unknown pattern "mesh" (known: hierarchical, swarm, sequential, conditional, iterative)',
    });
  });

  it("builds a runnable orchestrator by name", async () => {
    const runner = createOrchestrator("swarm", { agents: echoRegistry() }, { domains: ["academic"] });
    expect(runner.pattern).toBe("swarm");
    const result = await runner.executeWorkflow("t", "T");
    expect(result.finalSynthesis).toBe("synth[swarm-academic]");
  });
});
