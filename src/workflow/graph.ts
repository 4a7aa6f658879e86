import { DecompositionError } from "../errors.js";
import type { SubTask, SubTaskInput } from "./types.js";

/** Create an immutable subtask, filling defaults. */
export function createSubTask(input: SubTaskInput): SubTask {
  return Object.freeze({
    id: input.id,
    description: input.description,
    agentType: input.agentType ?? "worker",
    ...(input.specialization !== undefined ? { specialization: input.specialization } : {}),
    priority: input.priority ?? 0,
    dependencies: Object.freeze([...(input.dependencies ?? [])]),
    context: Object.freeze({ ...(input.context ?? {}) }),
  });
}

/**
 * Validate a subtask set: duplicate ids, missing deps, self deps and cycles.
 * Runs before any dispatch.
 */
export function validateGraph(subtasks: readonly SubTask[]): void {
  const ids = new Set<string>();
  for (const task of subtasks) {
    if (ids.has(task.id)) {
      throw new DecompositionError("DUPLICATE_SUBTASK", `Duplicate subtask id "${task.id}"`);
    }
    ids.add(task.id);
  }

  for (const task of subtasks) {
    for (const dep of task.dependencies) {
      if (dep === task.id) {
        throw new DecompositionError("CYCLIC_DEPENDENCY", `Subtask "${task.id}" depends on itself`);
      }
      if (!ids.has(dep)) {
        throw new DecompositionError("UNKNOWN_DEPENDENCY", `Subtask "${task.id}" depends on unknown subtask "${dep}"`);
      }
    }
  }

  const cycle = findCycle(subtasks);
  if (cycle) {
    throw new DecompositionError("CYCLIC_DEPENDENCY", `Dependency cycle: ${cycle.join(" -> ")}`);
  }
}

/** DFS with coloring over the dependency adjacency list. Returns the cycle path if one exists. */
export function findCycle(subtasks: readonly SubTask[]): string[] | null {
  const WHITE = 0, GRAY = 1, BLACK = 2;
  const color = new Map<string, number>();
  const adjacency = new Map<string, readonly string[]>();
  for (const task of subtasks) {
    color.set(task.id, WHITE);
    adjacency.set(task.id, task.dependencies);
  }

  const stack: string[] = [];

  function dfs(id: string): string[] | null {
    color.set(id, GRAY);
    stack.push(id);
    for (const next of adjacency.get(id) ?? []) {
      const c = color.get(next) ?? BLACK;
      if (c === GRAY) return [...stack.slice(stack.indexOf(next)), next]; // back edge
      if (c === WHITE) {
        const found = dfs(next);
        if (found) return found;
      }
    }
    stack.pop();
    color.set(id, BLACK);
    return null;
  }

  for (const task of subtasks) {
    if (color.get(task.id) === WHITE) {
      const found = dfs(task.id);
      if (found) return found;
    }
  }
  return null;
}

/** Return subtasks in dependency order (dependencies first), stable on declaration order. */
export function topologicalSort(subtasks: readonly SubTask[]): SubTask[] {
  const byId = new Map(subtasks.map((t) => [t.id, t]));
  const visited = new Set<string>();
  const sorted: SubTask[] = [];

  function visit(task: SubTask): void {
    if (visited.has(task.id)) return;
    visited.add(task.id);
    for (const dep of task.dependencies) {
      const depTask = byId.get(dep);
      if (depTask) visit(depTask);
    }
    sorted.push(task);
  }

  for (const task of subtasks) visit(task);
  return sorted;
}

/**
 * Indices of subtasks not yet dispatched whose dependencies all have results,
 * ordered by priority (higher first) then declaration order.
 */
export function readyIndices(
  subtasks: readonly SubTask[],
  dispatched: ReadonlySet<number>,
  finished: ReadonlySet<string>,
): number[] {
  const ready: number[] = [];
  subtasks.forEach((task, index) => {
    if (!dispatched.has(index) && task.dependencies.every((d) => finished.has(d))) {
      ready.push(index);
    }
  });
  return ready.sort((a, b) => subtasks[b].priority - subtasks[a].priority || a - b);
}

/** Chain subtasks so each depends on its predecessor, keeping any explicit deps. */
export function chainSequentially(subtasks: readonly SubTask[]): SubTask[] {
  return subtasks.map((task, index) => {
    if (index === 0) return task;
    const previous = subtasks[index - 1].id;
    if (task.dependencies.includes(previous)) return task;
    return createSubTask({ ...task, dependencies: [...task.dependencies, previous], context: { ...task.context } });
  });
}
