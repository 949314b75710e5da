import type { CapabilityDescriptor, CapabilityType, ResourceUsage, TaskRequest } from "../types.js";

export type WorkerContext = {
  /** Fires on dispatch timeout or plan cancellation. Honoring it is best-effort. */
  signal: AbortSignal;
  /** 1 for the first attempt, incremented on every retry. */
  attempt: number;
  stepId: string;
};

export type WorkerResult = {
  status: "ok" | "error";
  output?: Record<string, unknown>;
  error?: string;
  usage?: Partial<ResourceUsage>;
  /** 0..1; defaults to 1 for successful results. */
  confidence?: number;
  metadata?: Record<string, unknown>;
};

/**
 * A unit of work capacity registered under one capability type.
 * Concrete code/infra/test generators implement this contract.
 */
export interface Worker {
  readonly name: string;
  readonly capability: CapabilityType;
  readonly descriptor: CapabilityDescriptor;

  canHandle(request: TaskRequest): boolean;
  execute(request: TaskRequest, ctx: WorkerContext): Promise<WorkerResult>;
  healthCheck?(): Promise<boolean>;
}

export function defaultDescriptor(name: string, capability: CapabilityType, overrides?: Partial<CapabilityDescriptor>): CapabilityDescriptor {
  return {
    name: overrides?.name ?? name,
    description: overrides?.description ?? `${capability} worker`,
    requiredInputs: overrides?.requiredInputs ?? ["description"],
    outputs: overrides?.outputs ?? [],
    estimatedDurationSeconds: overrides?.estimatedDurationSeconds ?? 60,
  };
}
