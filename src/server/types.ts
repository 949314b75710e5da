import type { OrchestratorStats } from "../orchestrator.js";
import type { CapabilityType } from "../types.js";
import type { WorkerHealth } from "../workers/registry.js";

// --- REST Request/Response ---

export type ErrorBody = {
  error: string;
  code?: string;
  details?: Record<string, unknown>;
};

export type WorkerSummary = {
  name: string;
  capability: CapabilityType;
  description: string;
  health?: WorkerHealth;
};

export type HealthResponse = OrchestratorStats & {
  ok: boolean;
  uptimeSeconds: number;
  workers: WorkerSummary[];
};

export type CancelResponse = {
  taskId: string;
  cancelled: boolean;
  reason?: string;
};
