import Database from "better-sqlite3";
import { join } from "node:path";
import { homedir } from "node:os";
import { mkdirSync } from "node:fs";
import type { WorkflowResult, WorkflowStatus } from "../workflow/types.js";

const DEFAULT_DB_DIR = join(homedir(), ".research-orchestrator");
const DEFAULT_DB_PATH = join(DEFAULT_DB_DIR, "workflows.db");

export type WorkflowSummary = {
  taskId: string;
  pattern: string;
  title: string;
  status: WorkflowStatus;
  totalCost: number;
  agentCount: number;
  startedAt: string;
  completedAt: string;
};

/** Finished workflow results, one row each, the full result kept as JSON. */
export class RunStore {
  private db: Database.Database;

  /** Pass ":memory:" for a throwaway store. */
  constructor(dbPath?: string) {
    const path = dbPath ?? DEFAULT_DB_PATH;
    if (!dbPath) {
      mkdirSync(DEFAULT_DB_DIR, { recursive: true });
    }
    this.db = new Database(path);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS workflows (
        task_id      TEXT PRIMARY KEY,
        pattern      TEXT NOT NULL,
        title        TEXT NOT NULL,
        status       TEXT NOT NULL,
        total_cost   REAL NOT NULL DEFAULT 0,
        agent_count  INTEGER NOT NULL DEFAULT 0,
        result       TEXT NOT NULL,
        started_at   TEXT NOT NULL,
        completed_at TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_workflows_started ON workflows(started_at DESC);
    `);
  }

  save(result: WorkflowResult): void {
    this.db.prepare(`
      INSERT OR REPLACE INTO workflows (task_id, pattern, title, status, total_cost, agent_count, result, started_at, completed_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      result.taskId,
      result.pattern,
      result.title,
      result.status,
      result.totalCost,
      result.agentResults.length,
      JSON.stringify(result),
      result.startedAt,
      result.completedAt,
    );
  }

  get(taskId: string): WorkflowResult | undefined {
    const row = this.db.prepare("SELECT result FROM workflows WHERE task_id = ?").get(taskId) as { result: string } | undefined;
    if (!row) return undefined;
    const result: WorkflowResult = JSON.parse(row.result);
    return result;
  }

  /** Newest first. */
  list(opts: { limit?: number; pattern?: string } = {}): WorkflowSummary[] {
    const limit = opts.limit ?? 50;
    const rows = (opts.pattern
      ? this.db
          .prepare("SELECT * FROM workflows WHERE pattern = ? ORDER BY started_at DESC LIMIT ?")
          .all(opts.pattern, limit)
      : this.db.prepare("SELECT * FROM workflows ORDER BY started_at DESC LIMIT ?").all(limit)) as WorkflowRow[];
    return rows.map(rowToSummary);
  }

  delete(taskId: string): boolean {
    const result = this.db.prepare("DELETE FROM workflows WHERE task_id = ?").run(taskId);
    return result.changes > 0;
  }

  deleteAll(): number {
    return this.db.prepare("DELETE FROM workflows").run().changes;
  }

  /** Delete workflows started before an ISO timestamp. */
  deleteOlderThan(isoTimestamp: string): number {
    return this.db.prepare("DELETE FROM workflows WHERE started_at < ?").run(isoTimestamp).changes;
  }

  close(): void {
    this.db.close();
  }
}

type WorkflowRow = {
  task_id: string;
  pattern: string;
  title: string;
  status: WorkflowStatus;
  total_cost: number;
  agent_count: number;
  started_at: string;
  completed_at: string;
};

function rowToSummary(row: WorkflowRow): WorkflowSummary {
  return {
    taskId: row.task_id,
    pattern: row.pattern,
    title: row.title,
    status: row.status,
    totalCost: row.total_cost,
    agentCount: row.agent_count,
    startedAt: row.started_at,
    completedAt: row.completed_at,
  };
}
