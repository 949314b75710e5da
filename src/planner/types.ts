import type { CapabilityType, IntentType, Priority } from "../types.js";

/** One step of a plan before ids and requests are assigned. */
export type StepSpec = {
  /** Unique within the plan. Becomes the suffix of the step id. */
  key: string;
  capability: CapabilityType;
  /** Narrowed description. Defaults to the originating request's. */
  description?: string;
  /** Narrowed intent. Defaults to the originating request's. */
  intent?: IntentType;
  /** Keys of steps that must complete first. */
  dependsOn?: string[];
  /** Defaults to true. A failed optional step does not fail the plan. */
  mandatory?: boolean;
  priority?: Priority;
};

/** Builds the step specs for a request's description. */
export type Decomposition = (description: string) => StepSpec[];

export type PlanProgress = {
  total: number;
  completed: number;
  failed: number;
  cancelled: number;
  inProgress: number;
  pending: number;
  /** completed / total * 100, 0 for an empty plan. */
  percent: number;
};
