import { PlanningError } from "../errors.js";
import type { ExecutionPlan, ExecutionStep } from "../types.js";
import type { PlanProgress } from "./types.js";

type GraphStep = Pick<ExecutionStep, "id" | "dependencies" | "mandatory">;

function dependentsOf<T extends GraphStep>(steps: readonly T[]): Map<string, string[]> {
  const dependents = new Map<string, string[]>();
  for (const step of steps) {
    for (const dep of step.dependencies) {
      const list = dependents.get(dep) ?? [];
      list.push(step.id);
      dependents.set(dep, list);
    }
  }
  return dependents;
}

/**
 * Validate the dependency graph of a plan: unique ids, known dependencies,
 * no cycles, and no mandatory step waiting on an optional one.
 * Throws PlanningError naming the offending edge.
 */
export function validatePlanGraph(steps: readonly GraphStep[]): void {
  const byId = new Map<string, GraphStep>();
  for (const step of steps) {
    if (byId.has(step.id)) {
      throw new PlanningError("INVALID_PLAN", `Duplicate step id "${step.id}"`);
    }
    byId.set(step.id, step);
  }

  for (const step of steps) {
    for (const dep of step.dependencies) {
      const target = byId.get(dep);
      if (!target) {
        throw new PlanningError("UNKNOWN_DEPENDENCY", `Step "${step.id}" depends on unknown step "${dep}"`, {
          from: step.id,
          to: dep,
        });
      }
      if (dep === step.id) {
        throw new PlanningError("DEPENDENCY_CYCLE", `Step "${step.id}" depends on itself`, { from: step.id, to: dep });
      }
      if (step.mandatory && !target.mandatory) {
        throw new PlanningError(
          "INVALID_PLAN",
          `Mandatory step "${step.id}" depends on optional step "${dep}"`,
          { from: step.id, to: dep },
        );
      }
    }
  }

  const cycle = findCycle(steps);
  if (cycle) {
    throw new PlanningError("DEPENDENCY_CYCLE", `Dependency cycle detected: step "${cycle.from}" -> "${cycle.to}"`, cycle);
  }
}

/** DFS with coloring. Returns the back edge that closes a cycle, if any. */
function findCycle(steps: readonly GraphStep[]): { from: string; to: string } | undefined {
  const WHITE = 0, GRAY = 1, BLACK = 2;
  const color = new Map<string, number>();
  for (const step of steps) color.set(step.id, WHITE);

  // step -> steps that depend on it
  const dependents = dependentsOf(steps);

  function dfs(id: string): { from: string; to: string } | undefined {
    color.set(id, GRAY);
    for (const next of dependents.get(id) ?? []) {
      const c = color.get(next) ?? WHITE;
      if (c === GRAY) return { from: next, to: id };
      if (c === WHITE) {
        const found = dfs(next);
        if (found) return found;
      }
    }
    color.set(id, BLACK);
    return undefined;
  }

  for (const step of steps) {
    if (color.get(step.id) === WHITE) {
      const found = dfs(step.id);
      if (found) return found;
    }
  }
  return undefined;
}

/** Steps in dependency order, plan order among independent steps. Assumes a valid graph. */
export function topologicalOrder<T extends GraphStep>(steps: readonly T[]): T[] {
  const byId = new Map(steps.map((s) => [s.id, s]));
  const visited = new Set<string>();
  const sorted: T[] = [];

  function visit(step: T): void {
    if (visited.has(step.id)) return;
    visited.add(step.id);
    for (const dep of step.dependencies) {
      const target = byId.get(dep);
      if (target) visit(target);
    }
    sorted.push(step);
  }

  for (const step of steps) visit(step);
  return sorted;
}

/** Sum of estimated durations along the longest dependency chain. */
export function criticalPathSeconds(steps: readonly ExecutionStep[]): number {
  const finish = new Map<string, number>();
  let longest = 0;
  for (const step of topologicalOrder(steps)) {
    const start = Math.max(0, ...step.dependencies.map((d) => finish.get(d) ?? 0));
    const end = start + step.estimatedDurationSeconds;
    finish.set(step.id, end);
    longest = Math.max(longest, end);
  }
  return longest;
}

/** Pending steps whose dependencies are all in `completedIds` (default: completed steps). */
export function readySteps(plan: ExecutionPlan, completedIds?: ReadonlySet<string>): ExecutionStep[] {
  const done = completedIds ?? new Set(plan.steps.filter((s) => s.status === "completed").map((s) => s.id));
  return plan.steps.filter((s) => s.status === "pending" && s.dependencies.every((d) => done.has(d)));
}

/**
 * Pending steps that can never run because a dependency, direct or
 * transitive, failed or was cancelled.
 */
export function blockedSteps(plan: ExecutionPlan): ExecutionStep[] {
  const dead = new Set(
    plan.steps.filter((s) => s.status === "failed" || s.status === "cancelled").map((s) => s.id),
  );
  const blocked: ExecutionStep[] = [];
  for (const step of topologicalOrder(plan.steps)) {
    if (step.status !== "pending") continue;
    if (step.dependencies.some((d) => dead.has(d))) {
      dead.add(step.id);
      blocked.push(step);
    }
  }
  return blocked;
}

export function planProgress(plan: ExecutionPlan): PlanProgress {
  const count = (status: ExecutionStep["status"]) => plan.steps.filter((s) => s.status === status).length;
  const total = plan.steps.length;
  const completed = count("completed");
  return {
    total,
    completed,
    failed: count("failed"),
    cancelled: count("cancelled"),
    inProgress: count("in_progress"),
    pending: count("pending"),
    percent: total === 0 ? 0 : (completed / total) * 100,
  };
}

/** Deep copy handed to callers so they never alias engine state. */
export function snapshotPlan(plan: ExecutionPlan): ExecutionPlan {
  return structuredClone(plan);
}
