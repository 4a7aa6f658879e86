export type ErrorCode =
  | "DECOMPOSITION_FAILED"
  | "CYCLIC_DEPENDENCY"
  | "UNKNOWN_DEPENDENCY"
  | "DUPLICATE_SUBTASK"
  | "UNMATCHED_CONDITION"
  | "SYNTHESIS_FAILED"
  | "INVALID_CONFIG"
  | "UNKNOWN_AGENT_TYPE"
  | "INVALID_BRANCH"
  | "UNKNOWN_PATTERN"
  | "WORKFLOW_LIMIT"
  | "VALIDATION_FAILED"
  | "DUPLICATE_REGISTRATION"
  | "PARSE_FAILED"
  | "AGENT_FAILED"
  | "CANCELLED"
  | "INTERNAL_ERROR";

/** Failure categories used by the retry policy. */
export type FailureKind = "timeout" | "rate_limit" | "validation" | "auth" | "dependency" | "unknown";

export class OrchestratorError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "OrchestratorError";
    this.code = code;
  }

  toJSON(): { name: string; code: ErrorCode; message: string } {
    return { name: this.name, code: this.code, message: this.message };
  }
}

/** Decomposition could not produce a runnable subtask graph. No executor was called. */
export class DecompositionError extends OrchestratorError {
  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(code, message, options);
    this.name = "DecompositionError";
  }
}

/** Synthesis failed. Agent results gathered before it are kept on the workflow result. */
export class SynthesisError extends OrchestratorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("SYNTHESIS_FAILED", message, options);
    this.name = "SynthesisError";
  }
}

/** Raised when a run is cancelled before a required internal call (planner, synthesis) could be dispatched. */
export class CancelledError extends OrchestratorError {
  constructor(message: string) {
    super("CANCELLED", message);
    this.name = "CancelledError";
  }
}

export class ConfigError extends OrchestratorError {
  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(code, message, options);
    this.name = "ConfigError";
  }
}

export class ValidationError extends OrchestratorError {
  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(code, message, options);
    this.name = "ValidationError";
  }
}

/** Thrown by executors to tell the engine what kind of failure happened. */
export class AgentError extends OrchestratorError {
  readonly kind: FailureKind;

  constructor(kind: FailureKind, message: string, options?: { cause?: unknown }) {
    super("AGENT_FAILED", message, options);
    this.name = "AgentError";
    this.kind = kind;
  }
}

const RATE_LIMIT_PATTERN = /rate.?limit|too many requests|\b429\b/i;
const AUTH_PATTERN = /unauthori[sz]ed|forbidden|invalid api key|\b401\b|\b403\b/i;

/** Map an arbitrary thrown value to a failure kind. */
export function classifyFailure(err: unknown): FailureKind {
  if (err instanceof AgentError) return err.kind;
  if (err instanceof ValidationError) return "validation";
  const message = err instanceof Error ? err.message : String(err);
  if (err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError")) return "timeout";
  if (RATE_LIMIT_PATTERN.test(message)) return "rate_limit";
  if (AUTH_PATTERN.test(message)) return "auth";
  return "unknown";
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
