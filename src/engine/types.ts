import type { SessionStore } from "../sessions/store.js";
import type { ExecutionPlan, ExecutionStep, TaskResult } from "../types.js";
import type { CapabilityRegistry } from "../workers/registry.js";
import type { PrioritySemaphore } from "./semaphore.js";

export type EngineOptions = {
  registry: CapabilityRegistry;
  /** Global permit pool. Defaults to one sized by `engine.maxConcurrentTasks`. */
  semaphore?: PrioritySemaphore;
  retryBaseDelayMs?: number;
  retryMaxDelayMs?: number;
  /** When set, each terminal step is recorded as a system message in its session. */
  sessions?: SessionStore;
};

/** Callbacks receive snapshots; mutating them has no effect on the run. */
export type ExecuteOptions = {
  onStepStart?: (step: ExecutionStep, attempt: number) => void;
  onStepEnd?: (step: ExecutionStep, result: TaskResult) => void;
  onPlanEnd?: (plan: ExecutionPlan, results: TaskResult[]) => void;
  /** Aborting cancels the plan. */
  signal?: AbortSignal;
};

export type ExecutionOutcome = {
  plan: ExecutionPlan;
  /** One per step, in plan order. */
  results: TaskResult[];
  durationMs: number;
};
