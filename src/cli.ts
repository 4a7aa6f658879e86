#!/usr/bin/env node

import { readFileSync } from "node:fs";
import { Command } from "commander";
import { HttpAdapter } from "./agents/http-adapter.js";
import { AgentRegistry } from "./agents/registry.js";
import { resolveConfig } from "./config.js";
import { FileDocumentGenerator } from "./documents/file-generator.js";
import { errorMessage } from "./errors.js";
import { WorkflowManager } from "./manager.js";
import { getPattern, listPatterns, type PatternName } from "./patterns/registry.js";
import { RunStore } from "./persistence/store.js";
import { parseOrThrow, SubmitRequestSchema } from "./schemas.js";
import { setLogLevel } from "./utils/logger.js";
import type { AgentType, WorkflowResult } from "./workflow/types.js";

process.on("unhandledRejection", (reason) => {
  console.error("Unhandled rejection:", reason instanceof Error ? reason.message : reason);
});

const ROLES: readonly AgentType[] = ["worker", "specialist", "synthesizer", "executive"];

const program = new Command();

program
  .name("research-orchestrator")
  .description("Multi-agent research and synthesis workflows")
  .version("0.1.0")
  .option("--debug", "Enable debug logging");

program.hook("preAction", (_cmd, actionCmd) => {
  const opts = actionCmd.optsWithGlobals();
  if (opts.debug) setLogLevel("debug");
});

// --- patterns ---
program
  .command("patterns")
  .description("List available workflow patterns")
  .action(() => {
    for (const p of listPatterns()) {
      console.log(`${p.name.padEnd(14)} ${p.displayName}`);
      console.log(`${"".padEnd(14)} ${p.description}`);
      console.log(`${"".padEnd(14)} use for: ${p.useCases.join("; ")}`);
    }
  });

// --- run ---
program
  .command("run")
  .description("Run a workflow against HTTP executors")
  .argument("<pattern>", "Workflow pattern (see `patterns`)")
  .argument("<task>", "Research task")
  .requiredOption("-e, --endpoint <url>", "Executor base URL; each role is POSTed to <url>/<role>")
  .option("-t, --token <token>", "Bearer token sent to executors")
  .option("--title <title>", "Workflow title")
  .option("--planner", "Also register a planner executor at <url>/planner")
  .option("-f, --config <file>", "JSON file with workflow options (steps, branches, ...)")
  .option("-n, --agents <n>", "Number of agents")
  .option("-c, --concurrency <n>", "Max concurrent executor calls")
  .option("--timeout <seconds>", "Per-subtask timeout")
  .option("--workflow-timeout <seconds>", "Whole-workflow timeout")
  .option("--domains <list>", "Comma-separated swarm domains")
  .option("--condition <branch>", "Conditional branch to run")
  .option("--max-iterations <n>", "Iteration ceiling")
  .option("--out <dir>", "Write the final synthesis as documents to this directory")
  .option("--format <formats>", "Comma-separated document formats", "markdown")
  .option("--db <path>", "Run store path")
  .option("--no-save", "Do not persist the result")
  .option("--json", "Print the full result as JSON")
  .action(async (pattern: string, task: string, opts) => {
    const fileConfig = opts.config ? readJsonFile(opts.config) : {};
    const config = parseOrThrow(SubmitRequestSchema.shape.config, fileConfig, `config file ${opts.config ?? ""}`);

    const agents = new AgentRegistry();
    const headers: Record<string, string> = opts.token ? { Authorization: `Bearer ${opts.token}` } : {};
    const base = String(opts.endpoint).replace(/\/$/, "");
    for (const role of opts.planner ? [...ROLES, "planner" as const] : ROLES) {
      agents.add(new HttpAdapter({ name: `http-${role}`, url: `${base}/${role}`, agentType: role, headers }));
    }

    const store = opts.save ? new RunStore(opts.db) : undefined;
    const manager = new WorkflowManager({
      agents,
      config: resolveConfig(),
      documents: opts.out ? new FileDocumentGenerator(opts.out) : undefined,
      store,
    });

    try {
      const handle = manager.submit({
        pattern: toPatternName(pattern),
        task,
        title: opts.title,
        config: {
          ...config,
          ...(opts.agents ? { numAgents: Number(opts.agents) } : {}),
          ...(opts.concurrency ? { maxConcurrentAgents: Number(opts.concurrency) } : {}),
          ...(opts.timeout ? { timeoutSeconds: Number(opts.timeout) } : {}),
          ...(opts.workflowTimeout ? { workflowTimeoutSeconds: Number(opts.workflowTimeout) } : {}),
          ...(opts.domains ? { domains: String(opts.domains).split(",").map((d) => d.trim()) } : {}),
          ...(opts.condition ? { condition: String(opts.condition) } : {}),
          ...(opts.maxIterations ? { maxIterations: Number(opts.maxIterations) } : {}),
          ...(opts.out ? { generateDocuments: true, documentFormats: String(opts.format).split(",") } : {}),
        },
      });

      process.once("SIGINT", () => {
        console.error("\nCancelling... (in-flight subtasks will finish)");
        manager.cancel(handle.taskId);
      });

      console.error(`Workflow ${handle.taskId} started`);
      for await (const event of handle.events) {
        const p = event.payload;
        const who = typeof p.agentId === "string" ? ` ${p.agentId}` : "";
        console.error(`  ${event.timestamp.slice(11, 19)} ${event.eventType}${who}`);
      }

      const result = await handle.result;
      if (opts.json) {
        console.log(JSON.stringify(result, null, 2));
      } else {
        printResult(result);
      }
      if (result.status !== "completed") process.exitCode = 1;
    } catch (err) {
      console.error("Run failed:", errorMessage(err));
      process.exitCode = 1;
    } finally {
      store?.close();
    }
  });

// --- history ---
program
  .command("history")
  .description("List stored workflows, newest first")
  .option("-l, --limit <n>", "Max rows", "20")
  .option("-p, --pattern <name>", "Only this pattern")
  .option("--db <path>", "Run store path")
  .action((opts) => {
    const store = new RunStore(opts.db);
    try {
      const rows = store.list({ limit: Number(opts.limit), pattern: opts.pattern });
      if (rows.length === 0) {
        console.log("No stored workflows.");
        return;
      }
      for (const r of rows) {
        console.log(`${r.taskId}  ${r.status.padEnd(9)}  ${r.agentCount} agents  $${r.totalCost.toFixed(4)}  ${r.startedAt}  ${r.title}`);
      }
    } finally {
      store.close();
    }
  });

// --- show ---
program
  .command("show")
  .description("Show a stored workflow result")
  .argument("<taskId>", "Workflow task id")
  .option("--db <path>", "Run store path")
  .option("--json", "Print the full result as JSON")
  .action((taskId: string, opts) => {
    const store = new RunStore(opts.db);
    try {
      const result = store.get(taskId);
      if (!result) {
        console.error(`No workflow ${taskId}`);
        process.exitCode = 1;
        return;
      }
      if (opts.json) console.log(JSON.stringify(result, null, 2));
      else printResult(result);
    } finally {
      store.close();
    }
  });

// --- health ---
program
  .command("health")
  .description("Check every executor endpoint")
  .requiredOption("-e, --endpoint <url>", "Executor base URL")
  .action(async (opts) => {
    const agents = new AgentRegistry();
    const base = String(opts.endpoint).replace(/\/$/, "");
    for (const role of [...ROLES, "planner" as const]) {
      agents.add(new HttpAdapter({ name: `http-${role}`, url: `${base}/${role}`, agentType: role }));
    }
    for (const r of await agents.checkAllHealth()) {
      console.log(`[${r.healthy ? "+" : "x"}] ${r.name}${r.error ? ` (${r.error})` : ""}`);
    }
  });

function toPatternName(name: string): PatternName {
  return getPattern(name).name;
}

function readJsonFile(path: string): unknown {
  return JSON.parse(readFileSync(path, "utf8"));
}

function printResult(result: WorkflowResult): void {
  console.log(`\n--- ${result.title} (${result.pattern}, ${result.status}) ---`);
  for (const r of result.agentResults) {
    console.log(`  [${r.status}] ${r.agentId}${r.error ? `: ${r.error}` : ""}`);
  }
  if (result.finalSynthesis !== null) {
    console.log(`\n${result.finalSynthesis}`);
  }
  if (result.error) console.log(`\nError: ${result.error.name} (${result.error.code}): ${result.error.message}`);
  for (const w of result.warnings) console.log(`Warning: ${w}`);
  for (const a of result.artifacts) console.log(`Artifact: ${a.format} → ${a.location}`);
  console.log(`\n${result.agentResults.length} agents, ${result.totalTokens} tokens, $${result.totalCost.toFixed(4)}, ${result.totalExecutionTime}ms`);
}

program.parseAsync().catch((err: unknown) => {
  console.error(errorMessage(err));
  process.exit(1);
});
