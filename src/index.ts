// Config
export { resolveConfig, defaults } from "./config.js";
export type { OrchestratorConfig, ConfigOverrides, OverflowPolicy } from "./config.js";

// Errors
export {
  OrchestratorError,
  DecompositionError,
  SynthesisError,
  ConfigError,
  ValidationError,
  AgentError,
  CancelledError,
  classifyFailure,
} from "./errors.js";
export type { ErrorCode, FailureKind } from "./errors.js";

// Schemas
export {
  parseOrThrow,
  WorkflowConfigSchema,
  RetryPolicySchema,
  StepDefinitionSchema,
  PlannerResponseSchema,
  SubmitRequestSchema,
} from "./schemas.js";
export type { WorkflowConfig, RetryPolicy, StepDefinition } from "./schemas.js";

// Workflow model
export { createSubTask, validateGraph, findCycle, topologicalSort } from "./workflow/graph.js";
export { createAgentResult, failedResult, isSuccess } from "./workflow/results.js";
export type * from "./workflow/types.js";

// Core
export { BaseOrchestrator, concatenateResults, newTaskId, resolveOptions } from "./orchestrator.js";
export type {
  DocumentGenerator,
  ExecuteWorkflowOptions,
  OrchestratorDeps,
  PassContext,
  PassOutcome,
  ResolvedOptions,
  SynthesisRequest,
  WorkflowRun,
} from "./orchestrator.js";
export { ConcurrencyController } from "./executor/scheduler.js";
export type { ScheduleOutcome, SchedulerOptions, SchedulerHooks } from "./executor/types.js";

// Patterns
export { HierarchicalOrchestrator } from "./patterns/hierarchical.js";
export type { HierarchicalOptions } from "./patterns/hierarchical.js";
export { SwarmOrchestrator, SWARM_DOMAINS, detectDomains } from "./patterns/swarm.js";
export type { SwarmOptions, SwarmDomain } from "./patterns/swarm.js";
export { SequentialOrchestrator } from "./patterns/sequential.js";
export type { SequentialOptions } from "./patterns/sequential.js";
export { ConditionalOrchestrator } from "./patterns/conditional.js";
export type { ConditionalOptions, ConditionEvaluator } from "./patterns/conditional.js";
export { IterativeOrchestrator } from "./patterns/iterative.js";
export type { IterativeOptions, SuccessPredicate, PassPlanner } from "./patterns/iterative.js";
export type { AggregateFn } from "./patterns/steps.js";
export { listPatterns, getPattern, createOrchestrator } from "./patterns/registry.js";
export type { PatternName, PatternOptions, PatternEntry, WorkflowRunner } from "./patterns/registry.js";

// Manager
export { WorkflowManager } from "./manager.js";
export type { SubmitRequest, WorkflowHandle, WorkflowManagerOptions } from "./manager.js";

// Persistence
export { RunStore } from "./persistence/store.js";
export type { WorkflowSummary } from "./persistence/store.js";

// Agents
export type { AgentAdapter, ExecutionContext, ExecutorOutput } from "./agents/adapter.js";
export { AgentRegistry } from "./agents/registry.js";
export { HttpAdapter } from "./agents/http-adapter.js";
export type { HttpAdapterOptions } from "./agents/http-adapter.js";
export { FunctionAdapter } from "./agents/function-adapter.js";
export type { AgentFunction, FunctionAdapterOptions } from "./agents/function-adapter.js";

// Tracking
export { CostTracker } from "./tracking/cost-tracker.js";
export type { CostSnapshot } from "./tracking/cost-tracker.js";
export { EventChannel, CallbackSink, FanOutSink, createEvent } from "./tracking/events.js";
export type { ProgressSink, EventChannelOptions } from "./tracking/events.js";

// Documents
export { FileDocumentGenerator } from "./documents/file-generator.js";

// Utils
export { log, setLogLevel } from "./utils/logger.js";
export { withRetry, backoffDelay } from "./utils/retry.js";
