import type Database from "better-sqlite3";
import { z } from "zod";
import type { StepReport, TaskStatusReport } from "../reports.js";
import { CAPABILITY_TYPES, INTENT_TYPES, TASK_STATUSES } from "../types.js";
import { openDatabase, parseJsonColumn } from "./database.js";

const StepReportSchema = z.object({
  id: z.string(),
  key: z.string(),
  capability: z.enum(CAPABILITY_TYPES),
  status: z.enum(TASK_STATUSES),
  mandatory: z.boolean(),
  dependsOn: z.array(z.string()),
  retryCount: z.number(),
  workerName: z.string().optional(),
  error: z.string().optional(),
  startedAt: z.number().optional(),
  completedAt: z.number().optional(),
});

const ReportColumn = z.object({
  result: z.record(z.unknown()).optional(),
  error: z.string().optional(),
  errorCode: z.string().optional(),
  confidence: z.number(),
  usage: z.object({ tokensUsed: z.number(), cost: z.number() }),
  estimatedDurationSeconds: z.number(),
  steps: z.array(StepReportSchema),
  startedAt: z.number().optional(),
});

type ReportColumnValue = z.infer<typeof ReportColumn>;

const EMPTY_REPORT: ReportColumnValue = {
  confidence: 0,
  usage: { tokensUsed: 0, cost: 0 },
  estimatedDurationSeconds: 0,
  steps: [],
};

type TaskRow = {
  task_id: string;
  session_id: string;
  intent: string;
  description: string;
  status: string;
  progress: number;
  report: string;
  created_at: number;
  completed_at: number | null;
};

/**
 * Durable record of task status reports, so `getStatus` answers after the
 * engine has forgotten a plan or the process restarted.
 */
export class TaskStore {
  private db: Database.Database;

  constructor(dbPath?: string) {
    this.db = openDatabase(dbPath);
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS tasks (
        task_id      TEXT PRIMARY KEY,
        session_id   TEXT NOT NULL,
        intent       TEXT NOT NULL,
        description  TEXT NOT NULL,
        status       TEXT NOT NULL DEFAULT 'pending',
        progress     REAL NOT NULL DEFAULT 0,
        report       TEXT NOT NULL DEFAULT '{}',
        created_at   INTEGER NOT NULL,
        completed_at INTEGER
      );
      CREATE INDEX IF NOT EXISTS idx_tasks_created ON tasks(created_at DESC);
      CREATE INDEX IF NOT EXISTS idx_tasks_session ON tasks(session_id, created_at DESC);
    `);
  }

  save(report: TaskStatusReport): void {
    const column: ReportColumnValue = {
      result: report.result,
      error: report.error,
      errorCode: report.errorCode,
      confidence: report.confidence,
      usage: report.usage,
      estimatedDurationSeconds: report.estimatedDurationSeconds,
      steps: report.steps,
      startedAt: report.startedAt,
    };
    this.db.prepare(`
      INSERT OR REPLACE INTO tasks (task_id, session_id, intent, description, status, progress, report, created_at, completed_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      report.taskId,
      report.sessionId,
      report.intent,
      report.description,
      report.status,
      report.progress,
      JSON.stringify(column),
      report.createdAt,
      report.completedAt ?? null,
    );
  }

  get(taskId: string): TaskStatusReport | undefined {
    const row = this.db.prepare<[string], TaskRow>("SELECT * FROM tasks WHERE task_id = ?").get(taskId);
    return row ? rowToReport(row) : undefined;
  }

  list(limit = 50): TaskStatusReport[] {
    const rows = this.db.prepare<[number], TaskRow>("SELECT * FROM tasks ORDER BY created_at DESC LIMIT ?").all(limit);
    return rows.map(rowToReport);
  }

  listBySession(sessionId: string, limit = 50): TaskStatusReport[] {
    const rows = this.db
      .prepare<[string, number], TaskRow>("SELECT * FROM tasks WHERE session_id = ? ORDER BY created_at DESC LIMIT ?")
      .all(sessionId, limit);
    return rows.map(rowToReport);
  }

  /**
   * Mark tasks a previous process left pending or in progress as failed.
   * Returns how many were changed.
   */
  markInterrupted(now = Date.now()): number {
    const rows = this.db
      .prepare<[], TaskRow>("SELECT * FROM tasks WHERE status IN ('pending', 'in_progress')")
      .all();
    const update = this.db.transaction((reports: TaskStatusReport[]) => {
      for (const report of reports) this.save(report);
    });
    update(
      rows.map((row): TaskStatusReport => {
        const report = rowToReport(row);
        return {
          ...report,
          status: "failed",
          error: "Task was interrupted by a restart",
          errorCode: "INTERNAL",
          confidence: 0,
          steps: report.steps.map((s): StepReport =>
            s.status === "pending" || s.status === "in_progress" ? { ...s, status: "cancelled" } : s,
          ),
          completedAt: now,
        };
      }),
    );
    return rows.length;
  }

  /** Delete a specific task by ID. Returns true if deleted. */
  delete(taskId: string): boolean {
    const result = this.db.prepare("DELETE FROM tasks WHERE task_id = ?").run(taskId);
    return result.changes > 0;
  }

  /** Delete tasks created before a given timestamp. */
  deleteOlderThan(timestamp: number): number {
    const result = this.db.prepare("DELETE FROM tasks WHERE created_at < ?").run(timestamp);
    return result.changes;
  }

  count(): number {
    const row = this.db.prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM tasks").get();
    return row?.n ?? 0;
  }

  close(): void {
    this.db.close();
  }
}

function rowToReport(row: TaskRow): TaskStatusReport {
  const report = parseJsonColumn(ReportColumn, row.report, EMPTY_REPORT);
  const intent = z.enum(INTENT_TYPES).safeParse(row.intent);
  const status = z.enum(TASK_STATUSES).safeParse(row.status);
  return {
    taskId: row.task_id,
    sessionId: row.session_id,
    intent: intent.success ? intent.data : "code_generation",
    description: row.description,
    status: status.success ? status.data : "failed",
    progress: row.progress,
    ...report,
    createdAt: row.created_at,
    completedAt: row.completed_at ?? undefined,
  };
}
