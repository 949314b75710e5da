import { getConfig } from "../config.js";
import { PlanningError } from "../errors.js";
import { narrowRequest } from "../tasks.js";
import type { CapabilityType, ExecutionPlan, ExecutionStep, IntentType, TaskRequest } from "../types.js";
import { createLogger } from "../utils/logger.js";
import type { CapabilityRegistry } from "../workers/registry.js";
import { criticalPathSeconds, validatePlanGraph } from "./plan-graph.js";
import type { Decomposition, StepSpec } from "./types.js";

const log = createLogger("planner");

/** Capability that serves each intent when it is not decomposed. */
export const INTENT_CAPABILITY: Readonly<Record<IntentType, CapabilityType>> = {
  code_generation: "code",
  refactoring: "code",
  debugging: "code",
  code_review: "review",
  infrastructure_setup: "infrastructure",
  testing: "testing",
  deployment: "devops",
  documentation: "documentation",
  explanation: "documentation",
  security_scan: "security",
  project_setup: "code",
};

export const DEFAULT_DECOMPOSITIONS: Readonly<Partial<Record<IntentType, Decomposition>>> = {
  project_setup: (description) => [
    {
      key: "scaffold",
      capability: "infrastructure",
      intent: "infrastructure_setup",
      description: `Set up project structure and infrastructure: ${description}`,
    },
    {
      key: "code",
      capability: "code",
      intent: "code_generation",
      description: `Implement the application code: ${description}`,
      dependsOn: ["scaffold"],
    },
    {
      key: "tests",
      capability: "testing",
      intent: "testing",
      description: `Write tests for the generated code: ${description}`,
      dependsOn: ["code"],
    },
    {
      key: "docs",
      capability: "documentation",
      intent: "documentation",
      description: `Document the project: ${description}`,
      dependsOn: ["code"],
      mandatory: false,
    },
  ],
};

export type PlannerOptions = {
  registry: CapabilityRegistry;
  /** Per-intent templates, merged over the defaults. */
  decompositions?: Partial<Record<IntentType, Decomposition>>;
  /**
   * Keep mandatory steps that have no registered worker instead of raising
   * CAPABILITY_GAP. The engine then fails them at dispatch.
   */
  deferCapabilityGaps?: boolean;
};

export const MAIN_STEP_KEY = "main";

/** Key part of a step id (`<requestId>/<key>`). */
export function stepKey(stepId: string): string {
  const slash = stepId.lastIndexOf("/");
  return slash === -1 ? stepId : stepId.slice(slash + 1);
}

/**
 * Turns a classified request into a validated execution plan. Single
 * capability intents produce one step; composite intents expand through a
 * decomposition template into a dependency graph.
 */
export class TaskPlanner {
  private registry: CapabilityRegistry;
  private decompositions: Partial<Record<IntentType, Decomposition>>;
  private deferCapabilityGaps: boolean;

  constructor(opts: PlannerOptions) {
    this.registry = opts.registry;
    this.deferCapabilityGaps = opts.deferCapabilityGaps ?? false;
    this.decompositions = { ...DEFAULT_DECOMPOSITIONS, ...opts.decompositions };
  }

  createPlan(request: TaskRequest, intent: IntentType = request.intent): ExecutionPlan {
    const decompose = this.decompositions[intent];
    const specs: StepSpec[] = decompose
      ? decompose(request.description)
      : [{ key: MAIN_STEP_KEY, capability: INTENT_CAPABILITY[intent], intent }];

    const plan = this.planFromSpecs(request, specs);
    log.info(`Created plan for task "${request.id}"`, {
      intent,
      steps: plan.steps.map((s) => stepKey(s.id)),
      estimatedDurationSeconds: plan.estimatedDurationSeconds,
    });
    return plan;
  }

  /** Build a plan from explicit step specs. */
  planFromSpecs(request: TaskRequest, specs: readonly StepSpec[]): ExecutionPlan {
    if (specs.length === 0) {
      throw new PlanningError("INVALID_PLAN", `Plan for task "${request.id}" has no steps`);
    }

    const idOf = (key: string) => `${request.id}/${key}`;
    const single = specs.length === 1;

    const steps: ExecutionStep[] = specs.map((spec) => {
      const wrapsOriginal =
        single &&
        spec.description === undefined &&
        (spec.intent === undefined || spec.intent === request.intent) &&
        spec.priority === undefined;
      const stepRequest = wrapsOriginal
        ? request
        : {
            ...narrowRequest(request, spec.intent ?? request.intent, spec.description ?? request.description),
            priority: spec.priority ?? request.priority,
          };
      return {
        id: idOf(spec.key),
        capability: spec.capability,
        request: stepRequest,
        dependencies: (spec.dependsOn ?? []).map(idOf),
        status: "pending",
        retryCount: 0,
        maxRetries: stepRequest.maxRetries,
        estimatedDurationSeconds: this.estimate(spec.capability),
        mandatory: spec.mandatory ?? true,
      };
    });

    validatePlanGraph(steps);

    const kept = this.dropUnservedOptional(steps);

    return {
      id: request.id,
      request,
      steps: kept,
      estimatedDurationSeconds: criticalPathSeconds(kept),
      status: "pending",
      createdAt: Date.now(),
    };
  }

  private estimate(capability: CapabilityType): number {
    return this.registry.descriptor(capability)?.estimatedDurationSeconds ?? getConfig().planner.defaultStepDurationSeconds;
  }

  /**
   * A mandatory step without workers is a capability gap, unless gaps are
   * deferred to dispatch. Optional steps
   * without workers are dropped together with the optional steps that
   * depend on them.
   */
  private dropUnservedOptional(steps: ExecutionStep[]): ExecutionStep[] {
    const dropped = new Set<string>();
    for (const step of steps) {
      if (this.registry.count(step.capability) > 0) continue;
      if (step.mandatory) {
        if (this.deferCapabilityGaps) {
          log.warn(`No worker for capability "${step.capability}" (step "${step.id}"); it will fail at dispatch`);
          continue;
        }
        throw new PlanningError(
          "CAPABILITY_GAP",
          `No worker registered for capability "${step.capability}" required by step "${step.id}"`,
        );
      }
      dropped.add(step.id);
    }
    if (dropped.size === 0) return steps;

    let changed = true;
    while (changed) {
      changed = false;
      for (const step of steps) {
        if (!dropped.has(step.id) && step.dependencies.some((d) => dropped.has(d))) {
          dropped.add(step.id);
          changed = true;
        }
      }
    }
    for (const id of dropped) {
      log.warn(`Dropping optional step "${id}": no worker for its capability`);
    }
    return steps.filter((s) => !dropped.has(s.id));
  }
}
