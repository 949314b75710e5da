import { z } from "zod";
import { IntentClassifier } from "./classifier/classifier.js";
import { getConfig } from "./config.js";
import { ExecutionEngine } from "./engine/engine.js";
import { errorCode, errorMessage, ValidationError } from "./errors.js";
import type { LlmGateway } from "./llm/types.js";
import type { TaskStore } from "./persistence/task-store.js";
import { TaskPlanner } from "./planner/planner.js";
import type { AcceptedTask, SubmitResponse, TaskStatusReport } from "./reports.js";
import { buildStatusReport, renderResponse } from "./reports.js";
import { parseOrThrow, SubmitRequestSchema } from "./schemas.js";
import type { SessionStore } from "./sessions/store.js";
import { MemorySessionStore } from "./sessions/store.js";
import { createExecutionContext, createMessage, createTaskRequest } from "./tasks.js";
import type {
  CapabilityDescriptor,
  CapabilityType,
  ConversationMessage,
  ExecutionPlan,
  IntentType,
  SessionContext,
  TaskStatus,
} from "./types.js";
import { CAPABILITY_TYPES, isTerminal } from "./types.js";
import { createLogger } from "./utils/logger.js";
import { CapabilityRegistry } from "./workers/registry.js";
import type { Worker } from "./workers/worker.js";

const log = createLogger("orchestrator");

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type OrchestratorEvent =
  | { type: "task:accepted"; taskId: string; sessionId: string; intent: IntentType; steps: string[] }
  | { type: "step:started"; taskId: string; stepId: string; capability: CapabilityType; workerName?: string; attempt: number }
  | { type: "step:ended"; taskId: string; stepId: string; status: TaskStatus; error?: string }
  | { type: "task:finished"; taskId: string; status: TaskStatus; confidence: number; error?: string };

export type OrchestratorListener = (event: OrchestratorEvent) => void;

export type CapabilityListing = {
  type: CapabilityType;
  capabilities: CapabilityDescriptor[];
};

export type SessionView = {
  context: SessionContext;
  history: ConversationMessage[];
};

export type OrchestratorStats = {
  /** Sessions active within `limits.activeSessionWindowSeconds`. */
  activeSessions: number;
  runningTasks: number;
  totalRequests: number;
  /** Requests answered with a failed or cancelled status, or rejected on submitAsync. */
  totalErrors: number;
  averageResponseTimeMs: number;
};

export type OrchestratorOptions = {
  registry?: CapabilityRegistry;
  /** Defaults to an in-memory store. */
  sessions?: SessionStore;
  /** Durable task reports. Without one, statuses live only as long as the process. */
  taskStore?: TaskStore;
  /** Used by the default classifier for inconclusive requests. */
  gateway?: LlmGateway;
  classifier?: IntentClassifier;
  planner?: TaskPlanner;
  engine?: ExecutionEngine;
  /** Record each finished step as a system message in its session. Defaults to true. */
  recordSteps?: boolean;
};

type Prepared = {
  sessionId: string;
  intent: IntentType;
  plan: ExecutionPlan;
};

/** What `prepare` learned before it failed, for the error response. */
type Progress = Partial<Omit<Prepared, "plan">>;

type TrackedTask = {
  plan: ExecutionPlan;
  final?: TaskStatusReport;
};

const SessionIdProbe = z.object({ sessionId: z.string().trim().min(1) });

// ---------------------------------------------------------------------------
// Orchestrator
// ---------------------------------------------------------------------------

/**
 * Entry point tying the pieces together: validate a submission, keep the
 * session up to date, classify, plan, execute, and aggregate the results.
 */
export class Orchestrator {
  readonly registry: CapabilityRegistry;
  readonly sessions: SessionStore;
  private classifier: IntentClassifier;
  private planner: TaskPlanner;
  private engine: ExecutionEngine;
  private taskStore?: TaskStore;
  private tasks = new Map<string, TrackedTask>();
  private running = new Set<Promise<unknown>>();
  private listeners = new Set<OrchestratorListener>();
  private initialized = false;
  private counters = { requests: 0, errors: 0, responseTimeMs: 0 };

  constructor(opts: OrchestratorOptions = {}) {
    this.registry = opts.registry ?? new CapabilityRegistry();
    this.sessions = opts.sessions ?? new MemorySessionStore();
    this.taskStore = opts.taskStore;
    this.classifier = opts.classifier ?? new IntentClassifier({ gateway: opts.gateway });
    this.planner = opts.planner ?? new TaskPlanner({ registry: this.registry, deferCapabilityGaps: true });
    this.engine =
      opts.engine ??
      new ExecutionEngine({
        registry: this.registry,
        sessions: opts.recordSteps === false ? undefined : this.sessions,
      });
  }

  async initialize(): Promise<void> {
    if (this.initialized) return;
    await this.sessions.initialize();
    const interrupted = this.taskStore?.markInterrupted() ?? 0;
    if (interrupted > 0) {
      log.warn(`Marked ${interrupted} interrupted task(s) as failed`);
    }
    this.initialized = true;
    log.info("Orchestrator initialized", { workers: this.registry.list().length });
  }

  async shutdown(): Promise<void> {
    const cancelled = this.engine.cancelAll();
    if (cancelled > 0) log.info(`Cancelled ${cancelled} running task(s)`);
    await Promise.allSettled([...this.running]);
    await this.sessions.close();
    this.taskStore?.close();
    this.initialized = false;
    this.listeners.clear();
  }

  register(worker: Worker): void {
    this.registry.register(worker);
  }

  /** Subscribe to task lifecycle events. Returns an unsubscribe function. */
  subscribe(listener: OrchestratorListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Process a chat-style submission to completion. Never throws: every
   * fault becomes a failed response carrying an error code.
   */
  async submit(input: unknown): Promise<SubmitResponse> {
    const response = await this.process(input);
    this.count(response.status !== "completed", response.processingTimeMs);
    return response;
  }

  private async process(input: unknown): Promise<SubmitResponse> {
    const started = Date.now();
    const progress: Progress = {};
    try {
      const prepared = await this.prepare(input, progress);
      const report = await this.run(prepared);
      return {
        sessionId: prepared.sessionId,
        taskId: report.taskId,
        intent: report.intent,
        status: report.status,
        response: renderResponse(report),
        result: report.result,
        error: report.error,
        errorCode: report.errorCode,
        confidence: report.confidence,
        usage: report.usage,
        processingTimeMs: Date.now() - started,
      };
    } catch (err) {
      const probe = SessionIdProbe.safeParse(input);
      const sessionId = progress.sessionId ?? (probe.success ? probe.data.sessionId : "");
      log.error("Request failed", { sessionId, code: errorCode(err), error: errorMessage(err) });
      if (sessionId && !(err instanceof ValidationError)) {
        await this.appendQuietly(sessionId, "error", `Request failed: ${errorMessage(err)}`, { code: errorCode(err) });
      }
      return {
        sessionId,
        intent: progress.intent,
        status: "failed",
        response: `Request failed: ${errorMessage(err)}`,
        error: errorMessage(err),
        errorCode: errorCode(err),
        confidence: 0,
        usage: { tokensUsed: 0, cost: 0 },
        processingTimeMs: Date.now() - started,
      };
    }
  }

  /**
   * Validate, classify and plan, then run the plan in the background.
   * Throws ValidationError or PlanningError when the task cannot be accepted.
   */
  async submitAsync(input: unknown): Promise<AcceptedTask> {
    const started = Date.now();
    let prepared: Prepared;
    try {
      prepared = await this.prepare(input);
    } catch (err) {
      this.count(true, Date.now() - started);
      throw err;
    }
    this.count(false, Date.now() - started);
    const work = this.run(prepared).catch((err: unknown) => {
      log.error(`Background task "${prepared.plan.id}" failed`, { error: errorMessage(err) });
    });
    this.running.add(work);
    void work.finally(() => this.running.delete(work));

    return {
      taskId: prepared.plan.id,
      sessionId: prepared.sessionId,
      intent: prepared.intent,
      status: prepared.plan.status,
      estimatedDurationSeconds: prepared.plan.estimatedDurationSeconds,
    };
  }

  /** Current report for a task, from memory or the task store. Terminal reports never change. */
  getStatus(taskId: string): TaskStatusReport | undefined {
    const tracked = this.tasks.get(taskId);
    if (tracked?.final) return structuredClone(tracked.final);

    const plan = this.engine.getPlan(taskId);
    if (plan) return buildStatusReport(plan, this.engine.getResults(taskId) ?? []);
    if (tracked) return buildStatusReport(tracked.plan, []);

    return this.taskStore?.get(taskId);
  }

  /** Cancel a running task. `reason` becomes the error of its cancelled steps. */
  cancel(taskId: string, reason?: string): boolean {
    const cancelled = this.engine.cancel(taskId, reason);
    if (cancelled) log.info(`Task "${taskId}" cancelled by caller`, { reason });
    return cancelled;
  }

  async stats(): Promise<OrchestratorStats> {
    const windowMs = getConfig().limits.activeSessionWindowSeconds * 1000;
    const { requests, errors, responseTimeMs } = this.counters;
    return {
      activeSessions: await this.sessions.countActive(Date.now() - windowMs),
      runningTasks: this.engine.runningCount(),
      totalRequests: requests,
      totalErrors: errors,
      averageResponseTimeMs: requests === 0 ? 0 : Math.round(responseTimeMs / requests),
    };
  }

  listCapabilities(): CapabilityListing[] {
    const all = this.registry.capabilities();
    return CAPABILITY_TYPES.flatMap((type) => {
      const capabilities = all[type];
      return capabilities ? [{ type, capabilities }] : [];
    });
  }

  async getSession(sessionId: string, limit?: number): Promise<SessionView | undefined> {
    const context = await this.sessions.get(sessionId);
    if (!context) return undefined;
    const history = await this.sessions.history(sessionId, limit);
    return { context, history };
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private async prepare(input: unknown, progress: Progress = {}): Promise<Prepared> {
    const body = parseOrThrow(SubmitRequestSchema, input, "submit request");
    const { sessionId, userId, projectId, workspacePath, parameters } = body;
    progress.sessionId = sessionId;

    await this.sessions.load(sessionId, { userId, projectId });
    await this.sessions.appendMessage(sessionId, createMessage(sessionId, "user", body.message, { parameters }));

    const context = createExecutionContext({
      sessionId,
      userId,
      projectId,
      workspacePath,
      language: typeof parameters.language === "string" ? parameters.language : undefined,
      framework: typeof parameters.framework === "string" ? parameters.framework : undefined,
    });

    const intent = parameters.intent ?? (await this.classifier.classify(body.message, context));
    progress.intent = intent;
    const request = createTaskRequest({
      intent,
      description: body.message,
      context,
      parameters,
      priority: parameters.priority,
      timeoutSeconds: parameters.timeoutSeconds,
      maxRetries: parameters.maxRetries,
    });
    const plan = this.planner.createPlan(request, intent);

    this.track(plan.id, { plan });
    this.taskStore?.save(buildStatusReport(plan, []));
    this.emit({
      type: "task:accepted",
      taskId: plan.id,
      sessionId,
      intent,
      steps: plan.steps.map((s) => s.id),
    });
    log.info(`Accepted task "${plan.id}"`, { sessionId, intent, steps: plan.steps.length });
    return { sessionId, intent, plan };
  }

  private async run(prepared: Prepared): Promise<TaskStatusReport> {
    const { plan, sessionId } = prepared;
    let report: TaskStatusReport;
    try {
      const outcome = await this.engine.execute(plan, {
        onStepStart: (step, attempt) =>
          this.emit({
            type: "step:started",
            taskId: plan.id,
            stepId: step.id,
            capability: step.capability,
            workerName: step.workerName,
            attempt,
          }),
        onStepEnd: (step, result) => {
          this.emit({ type: "step:ended", taskId: plan.id, stepId: step.id, status: result.status, error: result.error });
          this.persistProgress(plan.id);
        },
      });
      report = buildStatusReport(outcome.plan, outcome.results);
    } catch (err) {
      log.error(`Execution of task "${plan.id}" failed`, { error: errorMessage(err) });
      report = {
        ...buildStatusReport(plan, []),
        status: "failed",
        error: errorMessage(err),
        errorCode: errorCode(err),
        completedAt: Date.now(),
      };
    }

    this.track(plan.id, { plan, final: report });
    this.taskStore?.save(report);
    this.emit({
      type: "task:finished",
      taskId: plan.id,
      status: report.status,
      confidence: report.confidence,
      error: report.error,
    });

    const role = report.status === "completed" ? "agent" : "error";
    await this.appendQuietly(sessionId, role, renderResponse(report), {
      taskId: report.taskId,
      status: report.status,
      confidence: report.confidence,
    });
    const used = new Set(
      report.steps.filter((s) => s.status === "completed").map((s) => s.capability),
    );
    try {
      await this.sessions.update(sessionId, (ctx) => ({
        ...ctx,
        activeCapabilities: CAPABILITY_TYPES.filter((c) => used.has(c) || ctx.activeCapabilities.includes(c)),
        contextData: { ...ctx.contextData, lastTaskId: report.taskId },
      }));
    } catch (err) {
      log.warn(`Could not update session "${sessionId}"`, { error: errorMessage(err) });
    }
    return report;
  }

  private count(failed: boolean, elapsedMs: number): void {
    this.counters.requests++;
    if (failed) this.counters.errors++;
    this.counters.responseTimeMs += elapsedMs;
  }

  private persistProgress(taskId: string): void {
    if (!this.taskStore) return;
    const plan = this.engine.getPlan(taskId);
    if (!plan || isTerminal(plan.status)) return;
    this.taskStore.save(buildStatusReport(plan, this.engine.getResults(taskId) ?? []));
  }

  private track(taskId: string, task: TrackedTask): void {
    this.tasks.set(taskId, task);
    const max = getConfig().limits.maxTasks;
    if (this.tasks.size <= max) return;
    for (const [id, t] of this.tasks) {
      if (this.tasks.size <= max) break;
      if (t.final) this.tasks.delete(id);
    }
  }

  private async appendQuietly(
    sessionId: string,
    role: ConversationMessage["role"],
    content: string,
    payload: Record<string, unknown>,
  ): Promise<void> {
    try {
      await this.sessions.appendMessage(sessionId, createMessage(sessionId, role, content, payload));
    } catch (err) {
      log.warn(`Could not append to session "${sessionId}"`, { error: errorMessage(err) });
    }
  }

  private emit(event: OrchestratorEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        log.warn("Event listener threw", { type: event.type, error: errorMessage(err) });
      }
    }
  }
}
