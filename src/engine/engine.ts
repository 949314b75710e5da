import { getConfig } from "../config.js";
import {
  CancellationError,
  DispatchError,
  OrchestratorError,
  PlanningError,
  TimeoutError,
  WorkerError,
  errorMessage,
} from "../errors.js";
import { blockedSteps, readySteps, snapshotPlan, validatePlanGraph } from "../planner/plan-graph.js";
import { stepKey } from "../planner/planner.js";
import type { SessionStore } from "../sessions/store.js";
import type { ResultOutcome } from "../tasks.js";
import { compareRequests, createMessage, createPendingResult, settleResult } from "../tasks.js";
import type { ExecutionPlan, ExecutionStep, TaskResult } from "../types.js";
import { isTerminal } from "../types.js";
import { createLogger } from "../utils/logger.js";
import { backoffDelay, sleep } from "../utils/retry.js";
import type { CapabilityRegistry } from "../workers/registry.js";
import type { WorkerResult } from "../workers/worker.js";
import { PrioritySemaphore } from "./semaphore.js";
import type { EngineOptions, ExecuteOptions, ExecutionOutcome } from "./types.js";

const log = createLogger("engine");

type PlanRun = {
  plan: ExecutionPlan;
  opts: ExecuteOptions;
  controller: AbortController;
  results: Map<string, TaskResult>;
  /** Steps launched and not yet returned, including those waiting out a backoff. */
  inFlight: Set<string>;
  order: Map<string, number>;
  changed: boolean;
  wake?: () => void;
  finished: boolean;
};

/**
 * `record` is set when the attempt settled the step. `lingering` is the
 * worker's promise when the attempt was aborted before the worker settled.
 */
type AttemptOutcome = ({ kind: "done"; record: boolean } | { kind: "retry"; delayMs: number }) & {
  lingering?: Promise<unknown>;
};

/** Reject with the signal's reason once it aborts, so a worker that ignores the signal cannot hold the step. */
function raceAbort<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener("abort", onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}

/**
 * Runs execution plans: schedules ready steps under a shared priority
 * semaphore, dispatches them to workers with timeouts and retries, and
 * propagates failure and cancellation through the dependency graph.
 *
 * The engine is the only writer of step and plan state once a plan is
 * handed to `execute`. Readers get deep copies.
 */
export class ExecutionEngine {
  private registry: CapabilityRegistry;
  private semaphore: PrioritySemaphore;
  private sessions?: SessionStore;
  private retryBaseDelayMs?: number;
  private retryMaxDelayMs?: number;
  private runs = new Map<string, PlanRun>();

  constructor(opts: EngineOptions) {
    this.registry = opts.registry;
    this.semaphore = opts.semaphore ?? new PrioritySemaphore(getConfig().engine.maxConcurrentTasks);
    this.sessions = opts.sessions;
    this.retryBaseDelayMs = opts.retryBaseDelayMs;
    this.retryMaxDelayMs = opts.retryMaxDelayMs;
  }

  async execute(plan: ExecutionPlan, opts: ExecuteOptions = {}): Promise<ExecutionOutcome> {
    const existing = this.runs.get(plan.id);
    if (existing && !existing.finished) {
      throw new PlanningError("INVALID_PLAN", `Plan "${plan.id}" is already executing`);
    }
    if (plan.status !== "pending") {
      throw new PlanningError("INVALID_PLAN", `Plan "${plan.id}" is ${plan.status}, expected pending`);
    }
    validatePlanGraph(plan.steps);

    const start = Date.now();
    const owned = snapshotPlan(plan);
    const run: PlanRun = {
      plan: owned,
      opts,
      controller: new AbortController(),
      results: new Map(owned.steps.map((s) => [s.id, createPendingResult(s.id, s.request, s.capability)])),
      inFlight: new Set(),
      order: new Map(owned.steps.map((s, i) => [s.id, i])),
      changed: false,
      finished: false,
    };
    this.runs.set(owned.id, run);
    this.evictFinished();

    owned.status = "in_progress";
    owned.startedAt = start;
    log.info(`Executing plan "${owned.id}"`, { steps: owned.steps.length });

    const onExternalAbort = () => this.cancel(owned.id);
    if (opts.signal?.aborted) {
      this.cancel(owned.id);
    } else {
      opts.signal?.addEventListener("abort", onExternalAbort, { once: true });
    }

    try {
      await this.schedule(run);
    } finally {
      opts.signal?.removeEventListener("abort", onExternalAbort);
    }

    this.finish(run);
    return { plan: snapshotPlan(owned), results: this.orderedResults(run), durationMs: Date.now() - start };
  }

  /**
   * Cancel a running plan. Non-terminal steps become cancelled at once,
   * in-flight attempts are aborted, and late results are discarded.
   * `reason` becomes the error of every step cancelled here.
   */
  cancel(planId: string, reason?: string): boolean {
    const run = this.runs.get(planId);
    if (!run || run.finished || isTerminal(run.plan.status)) return false;

    const now = Date.now();
    const cancellation = new CancellationError(reason);
    run.plan.status = "cancelled";
    run.plan.completedAt = now;
    for (const step of run.plan.steps) {
      if (isTerminal(step.status)) continue;
      this.settleStep(run, step, {
        status: "cancelled",
        workerName: step.workerName,
        error: cancellation.message,
        errorCode: "CANCELLED",
        executionTimeMs: step.startedAt ? now - step.startedAt : 0,
      });
    }
    run.controller.abort(cancellation);
    log.info(`Cancelled plan "${planId}"`, { reason: cancellation.message });
    this.notify(run);
    return true;
  }

  /** Cancel every plan still running. */
  cancelAll(): number {
    let count = 0;
    for (const id of [...this.runs.keys()]) {
      if (this.cancel(id)) count++;
    }
    return count;
  }

  getPlan(planId: string): ExecutionPlan | undefined {
    const run = this.runs.get(planId);
    return run ? snapshotPlan(run.plan) : undefined;
  }

  getResults(planId: string): TaskResult[] | undefined {
    const run = this.runs.get(planId);
    return run ? this.orderedResults(run) : undefined;
  }

  /** Plans currently executing. */
  runningCount(): number {
    let n = 0;
    for (const run of this.runs.values()) {
      if (!run.finished) n++;
    }
    return n;
  }

    isRunning(planId: string): boolean {
    const run = this.runs.get(planId);
    return run !== undefined && !run.finished;
  }

  // --- scheduling ---

  private async schedule(run: PlanRun): Promise<void> {
    for (;;) {
      if (run.plan.status === "cancelled") return;

      for (const step of blockedSteps(run.plan)) {
        this.settleStep(run, step, {
          status: "cancelled",
          error: "A dependency failed or was cancelled",
          errorCode: "CANCELLED",
          executionTimeMs: 0,
        });
      }

      const ready = readySteps(run.plan)
        .filter((s) => !run.inFlight.has(s.id))
        .sort((a, b) => compareRequests(a.request, b.request) || this.planIndex(run, a) - this.planIndex(run, b));

      for (const step of ready) {
        run.inFlight.add(step.id);
        this.runStep(run, step).catch((err: unknown) => {
          log.error(`Unexpected failure running step "${step.id}"`, { error: errorMessage(err) });
        });
      }

      if (run.inFlight.size === 0) return;
      await this.nextChange(run);
    }
  }

  private planIndex(run: PlanRun, step: ExecutionStep): number {
    return run.order.get(step.id) ?? 0;
  }

  private nextChange(run: PlanRun): Promise<void> {
    if (run.changed) {
      run.changed = false;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      run.wake = () => {
        run.wake = undefined;
        run.changed = false;
        resolve();
      };
    });
  }

  private notify(run: PlanRun): void {
    if (run.wake) run.wake();
    else run.changed = true;
  }

  private discarded(run: PlanRun, step: ExecutionStep): boolean {
    return run.plan.status === "cancelled" || isTerminal(step.status);
  }

  private async runStep(run: PlanRun, step: ExecutionStep): Promise<void> {
    try {
      let release: () => void;
      try {
        release = await this.semaphore.acquire(step.request, run.controller.signal);
      } catch (err) {
        if (err instanceof CancellationError) return;
        throw err;
      }

      if (this.discarded(run, step)) {
        release();
        return;
      }
      let outcome: AttemptOutcome;
      try {
        outcome = await this.attempt(run, step);
      } catch (err) {
        release();
        throw err;
      }
      if (outcome.lingering) this.releaseWhenSettled(step, outcome.lingering, release);
      else release();

      if (outcome.kind === "done") {
        // Recorded after release.
        if (outcome.record) await this.record(run, step);
        return;
      }

      try {
        await sleep(outcome.delayMs, run.controller.signal);
      } catch (err) {
        if (err instanceof CancellationError) return;
        throw err;
      }
    } finally {
      run.inFlight.delete(step.id);
      this.notify(run);
    }
  }

  private async attempt(run: PlanRun, step: ExecutionStep): Promise<AttemptOutcome> {
    const candidates = this.registry.findCapable(step.request, step.capability);
    if (candidates.length === 0) {
      const err = new DispatchError(
        `No capable worker for capability "${step.capability}" (step "${step.id}")`,
        { capability: step.capability, stepId: step.id },
      );
      log.error(err.message);
      this.settleStep(run, step, {
        status: "failed",
        error: err.message,
        errorCode: err.code,
        executionTimeMs: 0,
      });
      return { kind: "done", record: true };
    }

    // Rotate through candidates so a retry can land on another worker.
    const worker = candidates[step.retryCount % candidates.length];
    const attempt = step.retryCount + 1;
    step.status = "in_progress";
    step.workerName = worker.name;
    step.startedAt ??= Date.now();
    this.emit(run, "onStepStart", () => run.opts.onStepStart?.(structuredClone(step), attempt));
    log.info(`Dispatching step "${step.id}" to worker "${worker.name}"`, { attempt });

    const timeoutMs = step.request.timeoutSeconds * 1000;
    const attemptController = new AbortController();
    const onPlanAbort = () => attemptController.abort(run.controller.signal.reason);
    run.controller.signal.addEventListener("abort", onPlanAbort, { once: true });
    const timer = setTimeout(() => attemptController.abort(new TimeoutError(timeoutMs)), timeoutMs);

    const started = Date.now();
    let reply: WorkerResult | undefined;
    let failure: OrchestratorError | undefined;
    let workSettled = false;
    const work = Promise.resolve()
      .then(() => worker.execute(step.request, { signal: attemptController.signal, attempt, stepId: step.id }))
      .finally(() => {
        workSettled = true;
      });
    try {
      reply = await raceAbort(work, attemptController.signal);
      if (reply.status === "error") {
        failure = new WorkerError(worker.name, reply.error ?? `Worker "${worker.name}" reported an error`);
      }
    } catch (err) {
      failure = err instanceof OrchestratorError ? err : new WorkerError(worker.name, errorMessage(err), err);
    } finally {
      clearTimeout(timer);
      run.controller.signal.removeEventListener("abort", onPlanAbort);
    }
    const executionTimeMs = Date.now() - started;
    // Still running when the abort fired.
    const lingering = workSettled ? undefined : work;

    if (this.discarded(run, step)) {
      log.debug(`Discarding late result for step "${step.id}"`);
      return { kind: "done", record: false, lingering };
    }

    if (!failure && reply) {
      this.settleStep(run, step, {
        status: "completed",
        workerName: worker.name,
        result: reply.output,
        usage: reply.usage,
        confidence: reply.confidence,
        executionTimeMs,
        metadata: { ...reply.metadata, attempts: attempt },
      });
      return { kind: "done", record: true };
    }

    const error = failure ?? new WorkerError(worker.name, "Worker returned no result");
    if (error.retryable && step.retryCount < step.maxRetries) {
      step.retryCount++;
      step.status = "pending";
      step.error = error.message;
      const { engine } = getConfig();
      const delayMs = backoffDelay(
        step.retryCount,
        this.retryBaseDelayMs ?? engine.retryBaseDelayMs,
        this.retryMaxDelayMs ?? engine.retryMaxDelayMs,
      );
      log.warn(`Step "${step.id}" failed, retrying in ${delayMs}ms`, {
        attempt,
        maxRetries: step.maxRetries,
        error: error.message,
      });
      return { kind: "retry", delayMs, lingering };
    }

    log.error(`Step "${step.id}" failed`, { attempts: attempt, code: error.code, error: error.message });
    this.settleStep(run, step, {
      status: "failed",
      workerName: worker.name,
      error: error.message,
      errorCode: error.code,
      usage: reply?.usage,
      executionTimeMs,
      metadata: { ...reply?.metadata, attempts: attempt },
    });
    return { kind: "done", record: true, lingering };
  }

  /**
   * Hold an aborted attempt's permit until its worker settles, so workers
   * that ignore the signal still count against the concurrency limit.
   * Gives up after `engine.abandonAfterMs`.
   */
  private releaseWhenSettled(step: ExecutionStep, work: Promise<unknown>, release: () => void): void {
    const abandonAfterMs = getConfig().engine.abandonAfterMs;
    const timer = setTimeout(() => {
      log.warn(`Worker for step "${step.id}" ignored its abort; releasing its permit after ${abandonAfterMs}ms`);
      release();
    }, abandonAfterMs);
    timer.unref();
    const done = () => {
      clearTimeout(timer);
      release();
    };
    work.then(done, done);
  }

  private settleStep(run: PlanRun, step: ExecutionStep, outcome: ResultOutcome): void {
    const pending = run.results.get(step.id) ?? createPendingResult(step.id, step.request, step.capability);
    const settled = settleResult(pending, outcome);
    run.results.set(step.id, settled);
    step.status = outcome.status;
    step.completedAt = settled.completedAt;
    if (outcome.status !== "completed") step.error = outcome.error;
    this.emit(run, "onStepEnd", () => run.opts.onStepEnd?.(structuredClone(step), settled));
  }

  /** Append a terminal step to its session. Failures here never affect the plan. */
  private async record(run: PlanRun, step: ExecutionStep): Promise<void> {
    const sessions = this.sessions;
    if (!sessions) return;
    const sessionId = step.request.context.sessionId;
    const content = step.error && step.status !== "completed"
      ? `Step "${stepKey(step.id)}" ${step.status}: ${step.error}`
      : `Step "${stepKey(step.id)}" ${step.status}`;
    try {
      await sessions.appendMessage(
        sessionId,
        createMessage(sessionId, "system", content, {
          planId: run.plan.id,
          stepId: step.id,
          status: step.status,
          workerName: step.workerName,
        }),
      );
    } catch (err) {
      log.warn(`Could not record step "${step.id}" in session "${sessionId}"`, { error: errorMessage(err) });
    }
  }

  private finish(run: PlanRun): void {
    const plan = run.plan;
    if (plan.status !== "cancelled") {
      // Nothing left can run; anything still pending is unreachable.
      for (const step of plan.steps) {
        if (step.status === "pending") {
          this.settleStep(run, step, {
            status: "cancelled",
            error: "Step is unreachable",
            errorCode: "CANCELLED",
            executionTimeMs: 0,
          });
        }
      }
      const ok = plan.steps.every((s) => !s.mandatory || s.status === "completed");
      plan.status = ok ? "completed" : "failed";
      plan.completedAt = Date.now();
    }
    run.finished = true;

    log.info(`Plan "${plan.id}" ${plan.status}`, {
      durationMs: (plan.completedAt ?? Date.now()) - (plan.startedAt ?? plan.createdAt),
    });
    this.emit(run, "onPlanEnd", () => run.opts.onPlanEnd?.(snapshotPlan(plan), this.orderedResults(run)));
  }

  private orderedResults(run: PlanRun): TaskResult[] {
    return run.plan.steps.flatMap((s) => {
      const result = run.results.get(s.id);
      return result ? [result] : [];
    });
  }

  private emit(run: PlanRun, hook: keyof ExecuteOptions, call: () => void): void {
    try {
      call();
    } catch (err) {
      log.warn(`${hook} callback threw for plan "${run.plan.id}"`, { error: errorMessage(err) });
    }
  }

  /** Forget the oldest finished runs once more than `limits.maxTasks` are held. */
  private evictFinished(): void {
    const max = getConfig().limits.maxTasks;
    if (this.runs.size <= max) return;
    for (const [id, run] of this.runs) {
      if (this.runs.size <= max) break;
      if (run.finished) this.runs.delete(id);
    }
  }
}
