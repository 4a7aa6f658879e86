import { z } from "zod";
import { ConfigError, errorMessage } from "../errors.js";
import { parseOrThrow, StepDefinitionSchema, type StepDefinition } from "../schemas.js";
import { createSubTask } from "../workflow/graph.js";
import type { AgentResult, SubTask, WorkflowContext } from "../workflow/types.js";

/** Caller-supplied replacement for the labeled concatenation. */
export type AggregateFn = (results: readonly AgentResult[]) => string | Promise<string>;

const StepListSchema = z.array(StepDefinitionSchema);

/** Construction-time check; every problem surfaces as a ConfigError. */
export function parseSteps(steps: unknown, what: string): StepDefinition[] {
  let parsed: StepDefinition[];
  try {
    parsed = parseOrThrow(StepListSchema, steps, what);
  } catch (err) {
    throw new ConfigError("INVALID_CONFIG", errorMessage(err), { cause: err });
  }
  if (parsed.length === 0) {
    throw new ConfigError("INVALID_CONFIG", `${what} must contain at least one step`);
  }
  return parsed;
}

/**
 * Step definitions → subtasks. Ids default to `step-<n>`; `prefix` is applied
 * to ids and dependencies alike.
 */
export function stepsToSubtasks(
  steps: readonly StepDefinition[],
  opts: { prefix?: string; context?: WorkflowContext } = {},
): SubTask[] {
  const prefix = opts.prefix ?? "";
  return steps.map((step, i) =>
    createSubTask({
      id: `${prefix}${step.id ?? `step-${i + 1}`}`,
      description: step.description,
      agentType: step.agentType,
      specialization: step.specialization,
      priority: step.priority,
      dependencies: step.dependencies?.map((d) => `${prefix}${d}`),
      context: { ...opts.context, ...step.context },
    }),
  );
}
