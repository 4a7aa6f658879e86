import type { FailureKind } from "./errors.js";

export type OverflowPolicy = "drop-oldest" | "block";

export type OrchestratorConfig = {
  execution: {
    parallel: boolean;
    maxConcurrentAgents: number;
    failFast: boolean;
    skipOnFailedDependency: boolean;
  };
  timeouts: {
    /** Per-subtask timeout. */
    subtaskSeconds: number;
    /** Whole-workflow timeout; 0 disables it. */
    workflowSeconds: number;
  };
  retry: {
    maxRetries: number;
    backoffBaseMs: number;
    maxBackoffMs: number;
    retryableKinds: FailureKind[];
  };
  events: {
    bufferSize: number;
    overflow: OverflowPolicy;
    blockTimeoutMs: number;
  };
  manager: {
    maxActiveWorkflows: number;
    completedRetention: number;
  };
  documents: {
    enabled: boolean;
    formats: string[];
  };
  limits: {
    /** Per-result character cap when outputs are packed into a synthesis prompt. */
    outputTruncation: number;
  };
};

type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends Array<infer U> ? U[] : T[P] extends object ? DeepPartial<T[P]> : T[P];
};

export type ConfigOverrides = DeepPartial<OrchestratorConfig>;

const DEFAULTS: OrchestratorConfig = {
  execution: {
    parallel: true,
    maxConcurrentAgents: 5,
    failFast: false,
    skipOnFailedDependency: false,
  },
  timeouts: {
    subtaskSeconds: 120,
    workflowSeconds: 0,
  },
  retry: {
    maxRetries: 0,
    backoffBaseMs: 500,
    maxBackoffMs: 10_000,
    retryableKinds: ["timeout", "rate_limit"],
  },
  events: {
    bufferSize: 1_000,
    overflow: "drop-oldest",
    blockTimeoutMs: 1_000,
  },
  manager: {
    maxActiveWorkflows: 50,
    completedRetention: 100,
  },
  documents: {
    enabled: false,
    formats: ["markdown"],
  },
  limits: {
    outputTruncation: 8_000,
  },
};

function mergeSection<T extends object>(base: T, override?: Partial<T>): T {
  const defined = Object.fromEntries(
    Object.entries(override ?? {}).filter(([, value]) => value !== undefined),
  );
  return Object.assign(structuredClone(base), defined);
}

/**
 * Build a config from the defaults and a partial override. Every orchestrator
 * and manager takes the result as a constructor argument.
 */
export function resolveConfig(overrides: ConfigOverrides = {}): OrchestratorConfig {
  return {
    execution: mergeSection(DEFAULTS.execution, overrides.execution),
    timeouts: mergeSection(DEFAULTS.timeouts, overrides.timeouts),
    retry: mergeSection(DEFAULTS.retry, overrides.retry),
    events: mergeSection(DEFAULTS.events, overrides.events),
    manager: mergeSection(DEFAULTS.manager, overrides.manager),
    documents: mergeSection(DEFAULTS.documents, overrides.documents),
    limits: mergeSection(DEFAULTS.limits, overrides.limits),
  };
}

/** The default config values (frozen). */
export const defaults: Readonly<OrchestratorConfig> = Object.freeze(structuredClone(DEFAULTS));
