import { z } from "zod";
import { ValidationError } from "./errors.js";

export const FailureKindSchema = z.enum(["timeout", "rate_limit", "validation", "auth", "dependency", "unknown"]);

export const AgentTypeSchema = z.enum(["worker", "planner", "specialist", "synthesizer", "executive"]);

export const RetryPolicySchema = z.object({
  maxRetries: z.number().int().min(0).max(10),
  backoffBaseMs: z.number().nonnegative().optional(),
  maxBackoffMs: z.number().nonnegative().optional(),
  retryableKinds: z.array(FailureKindSchema).optional(),
});

/** Options every pattern accepts. Pattern-specific options live on each pattern's own type. */
export const WorkflowConfigSchema = z.object({
  numAgents: z.number().int().positive().max(100).optional(),
  parallelExecution: z.boolean().optional(),
  maxConcurrentAgents: z.number().int().positive().max(64).optional(),
  timeoutSeconds: z.number().positive().optional(),
  workflowTimeoutSeconds: z.number().positive().optional(),
  failFast: z.boolean().optional(),
  skipOnFailedDependency: z.boolean().optional(),
  retryPolicy: RetryPolicySchema.optional(),
  generateDocuments: z.boolean().optional(),
  documentFormats: z.array(z.string().min(1)).optional(),
});

export const StepDefinitionSchema = z.object({
  id: z.string().min(1).optional(),
  description: z.string().min(1, "step has no description"),
  agentType: AgentTypeSchema.optional(),
  specialization: z.string().min(1).optional(),
  priority: z.number().int().optional(),
  dependencies: z.array(z.string()).optional(),
  context: z.record(z.unknown()).optional(),
});

/** What a planner executor must answer with. */
export const PlannerResponseSchema = z.object({
  subtasks: z
    .array(
      z.object({
        description: z.string().min(1),
        specialization: z.string().min(1).optional(),
        priority: z.number().int().optional(),
      }),
    )
    .min(1, "planner returned no subtasks"),
});

/** A workflow request as it arrives from outside (CLI flags, JSON files). */
export const SubmitRequestSchema = z.object({
  pattern: z.enum(["hierarchical", "swarm", "sequential", "conditional", "iterative"]),
  task: z.string().min(1, "task is required"),
  title: z.string().optional(),
  context: z.record(z.unknown()).optional(),
  config: WorkflowConfigSchema.extend({
    groupSize: z.number().int().positive().optional(),
    tier2Enabled: z.boolean().optional(),
    tier3Enabled: z.boolean().optional(),
    domains: z.array(z.string().min(1)).optional(),
    allowedDomains: z.array(z.string().min(1)).optional(),
    maxIterations: z.number().int().positive().max(50).optional(),
    steps: z.array(StepDefinitionSchema).optional(),
    branches: z.record(z.array(StepDefinitionSchema)).optional(),
    condition: z.string().optional(),
    fallbackBranch: z.string().optional(),
  }).default({}),
});

export type WorkflowConfig = z.infer<typeof WorkflowConfigSchema>;
export type RetryPolicy = z.infer<typeof RetryPolicySchema>;
export type StepDefinition = z.infer<typeof StepDefinitionSchema>;

/** Parse with a schema and surface issues as a ValidationError. */
export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, data: unknown, what = "input"): z.infer<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const msg = result.error.issues
      .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
      .join("; ");
    throw new ValidationError("VALIDATION_FAILED", `Invalid ${what}: ${msg}`);
  }
  return result.data;
}
