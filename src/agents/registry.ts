import { ConfigError, ValidationError } from "../errors.js";
import { log } from "../utils/logger.js";
import type { AgentType, SubTask } from "../workflow/types.js";
import type { AgentAdapter } from "./adapter.js";

function registryKey(agentType: AgentType, specialization?: string): string {
  return specialization ? `${agentType}:${specialization}` : agentType;
}

/**
 * Executors keyed by role, optionally narrowed by specialization. Populated
 * once at startup; lookups never reflect on names beyond these keys.
 */
export class AgentRegistry {
  private agents = new Map<string, AgentAdapter>();

  add(agent: AgentAdapter): void {
    const keys = agent.specializations?.length
      ? agent.specializations.map((s) => registryKey(agent.agentType, s))
      : [registryKey(agent.agentType)];

    for (const key of keys) {
      if (this.agents.has(key)) {
        throw new ValidationError("DUPLICATE_REGISTRATION", `An executor for "${key}" is already registered`);
      }
    }
    for (const key of keys) this.agents.set(key, agent);
    log.debug(`Registered executor "${agent.name}"`, { keys });
  }

  remove(name: string): boolean {
    let removed = false;
    for (const [key, agent] of this.agents) {
      if (agent.name === name) {
        this.agents.delete(key);
        removed = true;
      }
    }
    return removed;
  }

  list(): AgentAdapter[] {
    return [...new Set(this.agents.values())];
  }

  keys(): string[] {
    return [...this.agents.keys()];
  }

  /** Specialized executor first, then the bare role. */
  resolve(agentType: AgentType, specialization?: string): AgentAdapter | undefined {
    return (specialization ? this.agents.get(registryKey(agentType, specialization)) : undefined)
      ?? this.agents.get(registryKey(agentType));
  }

  has(agentType: AgentType, specialization?: string): boolean {
    return this.resolve(agentType, specialization) !== undefined;
  }

  /** Fail before execution when any subtask has no executor. */
  assertResolvable(subtasks: readonly Pick<SubTask, "id" | "agentType" | "specialization">[]): void {
    for (const task of subtasks) {
      if (!this.has(task.agentType, task.specialization)) {
        const wanted = registryKey(task.agentType, task.specialization);
        throw new ConfigError("UNKNOWN_AGENT_TYPE", `No executor registered for "${wanted}" (subtask "${task.id}")`);
      }
    }
  }

  /** Run every executor's health check; executors without one count as healthy. */
  async checkAllHealth(): Promise<Array<{ name: string; healthy: boolean; error?: string }>> {
    return Promise.all(
      this.list().map(async (agent) => {
        if (!agent.healthCheck) return { name: agent.name, healthy: true };
        try {
          return { name: agent.name, healthy: await agent.healthCheck() };
        } catch (err) {
          log.warn(`Health check failed for executor "${agent.name}"`, { error: String(err) });
          return { name: agent.name, healthy: false, error: String(err) };
        }
      }),
    );
  }
}
