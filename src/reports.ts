import { getConfig } from "./config.js";
import { planProgress } from "./planner/plan-graph.js";
import { stepKey } from "./planner/planner.js";
import type {
  CapabilityType,
  ExecutionPlan,
  IntentType,
  ResourceUsage,
  TaskResult,
  TaskStatus,
} from "./types.js";

export type StepReport = {
  id: string;
  key: string;
  capability: CapabilityType;
  status: TaskStatus;
  mandatory: boolean;
  /** Keys of the steps this one waits for. */
  dependsOn: string[];
  retryCount: number;
  workerName?: string;
  error?: string;
  startedAt?: number;
  completedAt?: number;
};

/** What callers see of a task: derived from its plan and results. */
export type TaskStatusReport = {
  taskId: string;
  sessionId: string;
  intent: IntentType;
  description: string;
  status: TaskStatus;
  /** 0..100 */
  progress: number;
  /** Payloads of completed steps, keyed by step key. */
  result?: Record<string, unknown>;
  error?: string;
  errorCode?: string;
  confidence: number;
  usage: ResourceUsage;
  estimatedDurationSeconds: number;
  steps: StepReport[];
  createdAt: number;
  startedAt?: number;
  completedAt?: number;
};

export type SubmitResponse = {
  sessionId: string;
  /** Absent when the request failed before a task was created. */
  taskId?: string;
  intent?: IntentType;
  status: TaskStatus;
  /** Human-readable answer or error summary. */
  response: string;
  result?: Record<string, unknown>;
  error?: string;
  errorCode?: string;
  confidence: number;
  usage: ResourceUsage;
  processingTimeMs: number;
};

export type AcceptedTask = {
  taskId: string;
  sessionId: string;
  intent: IntentType;
  status: TaskStatus;
  estimatedDurationSeconds: number;
};

/** Build the caller-facing report of a plan and its (possibly partial) results. */
export function buildStatusReport(plan: ExecutionPlan, results: readonly TaskResult[]): TaskStatusReport {
  const byStep = new Map(results.map((r) => [r.stepId, r]));
  const completed = results.filter((r) => r.status === "completed");

  const payload: Record<string, unknown> = {};
  for (const r of completed) {
    payload[stepKey(r.stepId)] = r.result ?? {};
  }

  const firstFailure = plan.steps
    .filter((s) => s.mandatory)
    .map((s) => byStep.get(s.id))
    .find((r) => r !== undefined && (r.status === "failed" || r.status === "cancelled"));

  const usage = results.reduce<ResourceUsage>(
    (acc, r) => ({ tokensUsed: acc.tokensUsed + r.usage.tokensUsed, cost: acc.cost + r.usage.cost }),
    { tokensUsed: 0, cost: 0 },
  );

  const confidence =
    plan.status === "completed" && completed.length > 0
      ? completed.reduce((sum, r) => sum + r.confidence, 0) / completed.length
      : 0;

  return {
    taskId: plan.id,
    sessionId: plan.request.context.sessionId,
    intent: plan.request.intent,
    description: plan.request.description,
    status: plan.status,
    progress: planProgress(plan).percent,
    result: completed.length > 0 ? payload : undefined,
    error: plan.status === "completed" ? undefined : firstFailure?.error,
    errorCode: plan.status === "completed" ? undefined : firstFailure?.errorCode,
    confidence,
    usage,
    estimatedDurationSeconds: plan.estimatedDurationSeconds,
    steps: plan.steps.map((s) => ({
      id: s.id,
      key: stepKey(s.id),
      capability: s.capability,
      status: s.status,
      mandatory: s.mandatory,
      dependsOn: s.dependencies.map(stepKey),
      retryCount: s.retryCount,
      workerName: s.workerName,
      error: s.error,
      startedAt: s.startedAt,
      completedAt: s.completedAt,
    })),
    createdAt: plan.createdAt,
    startedAt: plan.startedAt,
    completedAt: plan.completedAt,
  };
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}\n... (truncated)` : text;
}

function renderPayload(value: unknown): string {
  if (typeof value === "string") return value;
  if (value && typeof value === "object") {
    for (const field of ["content", "text", "message"]) {
      const inner: unknown = Reflect.get(value, field);
      if (typeof inner === "string") return inner;
    }
  }
  return JSON.stringify(value, null, 2);
}

/** Render a report as the text answer of a chat submission. */
export function renderResponse(report: TaskStatusReport): string {
  const max = getConfig().limits.outputTruncation;
  if (report.status === "cancelled") return "Task was cancelled.";
  if (report.status !== "completed") {
    return `Task failed: ${report.error ?? "unknown error"}`;
  }

  const entries = Object.entries(report.result ?? {});
  if (entries.length === 0) return "Task completed.";
  if (entries.length === 1) return truncate(renderPayload(entries[0][1]), max);
  return entries.map(([key, value]) => `## ${key}\n${truncate(renderPayload(value), max)}`).join("\n\n");
}
