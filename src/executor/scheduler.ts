import { log } from "../utils/logger.js";
import { readyIndices } from "../workflow/graph.js";
import { failedResult } from "../workflow/results.js";
import type { AgentResult, SubTask } from "../workflow/types.js";
import type { RunSubtask, ScheduleOutcome, SchedulerOptions } from "./types.js";

type InFlight = {
  controller: AbortController;
  done: Promise<void>;
};

type StopWait = {
  promise: Promise<"deadline" | "abort">;
  cancel(): void;
};

function waitForStop(deadline: number | undefined, signal: AbortSignal | undefined): StopWait {
  let timer: NodeJS.Timeout | undefined;
  let onAbort: (() => void) | undefined;
  const promise = new Promise<"deadline" | "abort">((resolve) => {
    if (deadline !== undefined) {
      timer = setTimeout(() => resolve("deadline"), Math.max(0, deadline - Date.now()));
    }
    if (signal) {
      onAbort = () => resolve("abort");
      signal.addEventListener("abort", onAbort, { once: true });
    }
  });
  return {
    promise,
    cancel() {
      if (timer) clearTimeout(timer);
      if (signal && onAbort) signal.removeEventListener("abort", onAbort);
    },
  };
}

/**
 * Bounded worker pool over a validated subtask DAG. A subtask is dispatched
 * once every dependency has a result; among ready subtasks, higher priority
 * goes first, then declaration order.
 */
export class ConcurrencyController {
  private readonly opts: SchedulerOptions;

  constructor(opts: SchedulerOptions) {
    this.opts = { ...opts, maxConcurrency: Math.max(1, Math.floor(opts.maxConcurrency)) };
  }

  async run(subtasks: readonly SubTask[], runOne: RunSubtask): Promise<ScheduleOutcome> {
    const start = Date.now();
    const { maxConcurrency, deadline, failFast, skipOnFailedDependency, signal, hooks } = this.opts;

    const results = new Array<AgentResult | undefined>(subtasks.length);
    const byId = new Map<string, AgentResult>();
    const dispatched = new Set<number>();
    const finished = new Set<string>();
    const inFlight = new Map<number, InFlight>();

    let executorCalls = 0;
    let peakConcurrency = 0;
    let cancelled = false;
    let deadlineExceeded = false;
    let failedFast = false;

    const settle = async (index: number, result: AgentResult): Promise<void> => {
      results[index] = result;
      byId.set(result.agentId, result);
      finished.add(result.agentId);
      if (failFast && result.status !== "success" && !failedFast) {
        failedFast = true;
        log.warn(`Fail-fast: stopping dispatch after "${result.agentId}" ${result.status}`);
      }
      await hooks?.onSettled?.(subtasks[index], result);
    };

    const dispatch = (index: number): void => {
      const subtask = subtasks[index];
      const controller = new AbortController();
      const dependencyResults: Record<string, AgentResult> = {};
      for (const dep of subtask.dependencies) {
        const depResult = byId.get(dep);
        if (depResult) dependencyResults[dep] = depResult;
      }

      dispatched.add(index);
      executorCalls++;

      const done = (async () => {
        let result: AgentResult;
        try {
          await hooks?.onDispatch?.(subtask);
          result = await runOne(subtask, { dependencyResults, signal: controller.signal });
        } catch (err) {
          log.error(`Subtask "${subtask.id}" runner threw`, { error: String(err) });
          result = failedResult(subtask, "unknown", String(err));
        }
        // Abandoned at the workflow deadline: a timeout result was already recorded.
        if (!inFlight.has(index)) return;
        inFlight.delete(index);
        await settle(index, result);
      })();

      inFlight.set(index, { controller, done });
      peakConcurrency = Math.max(peakConcurrency, inFlight.size);
    };

    const stopped = () => cancelled || deadlineExceeded || failedFast;

    const fill = async (): Promise<void> => {
      let progressed = true;
      while (progressed && !stopped()) {
        progressed = false;
        for (const index of readyIndices(subtasks, dispatched, finished)) {
          if (inFlight.size >= maxConcurrency || stopped()) break;
          if (signal?.aborted) {
            cancelled = true;
            break;
          }
          const subtask = subtasks[index];
          const failedDep = skipOnFailedDependency
            ? subtask.dependencies.find((d) => byId.get(d)?.status !== "success")
            : undefined;
          if (failedDep !== undefined) {
            dispatched.add(index);
            await settle(index, failedResult(subtask, "dependency", `Dependency "${failedDep}" did not succeed`));
            progressed = true;
            continue;
          }
          dispatch(index);
        }
      }
    };

    for (;;) {
      if (signal?.aborted) cancelled = true;
      if (deadline !== undefined && Date.now() >= deadline) deadlineExceeded = true;

      if (deadlineExceeded) {
        await this.abandon(inFlight, subtasks, settle);
        break;
      }

      await fill();
      if (inFlight.size === 0) break;

      const stop = waitForStop(deadline, cancelled ? undefined : signal);
      const outcome = await Promise.race([
        ...[...inFlight.values()].map((f) => f.done.then(() => "settled" as const)),
        stop.promise,
      ]);
      stop.cancel();
      if (outcome === "deadline") deadlineExceeded = true;
    }

    const undispatched = subtasks.filter((_, i) => !dispatched.has(i)).map((t) => t.id);
    if (cancelled) log.info("Dispatch cancelled", { undispatched: undispatched.length });
    if (deadlineExceeded) log.warn("Workflow deadline exceeded", { undispatched: undispatched.length });

    return {
      results: results.filter((r): r is AgentResult => r !== undefined),
      dispatched: executorCalls,
      undispatched,
      cancelled,
      deadlineExceeded,
      failedFast,
      peakConcurrency,
      durationMs: Date.now() - start,
    };
  }

  /** Give up on in-flight work: abort it and record a timeout in its place. */
  private async abandon(
    inFlight: Map<number, InFlight>,
    subtasks: readonly SubTask[],
    settle: (index: number, result: AgentResult) => Promise<void>,
  ): Promise<void> {
    const abandoned = [...inFlight.entries()].sort(([a], [b]) => a - b);
    inFlight.clear();
    for (const [index, flight] of abandoned) {
      flight.controller.abort();
      await settle(index, failedResult(subtasks[index], "timeout", "Workflow deadline exceeded before subtask finished"));
    }
  }
}
