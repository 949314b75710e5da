import { ValidationError, errorMessage } from "../errors.js";
import type { CapabilityDescriptor, CapabilityType, TaskRequest } from "../types.js";
import { createLogger } from "../utils/logger.js";
import type { Worker } from "./worker.js";

const log = createLogger("registry");

export type WorkerHealth = {
  name: string;
  capability: CapabilityType;
  healthy: boolean;
  lastCheck: number;
  responseTimeMs?: number;
  error?: string;
};

/**
 * Workers keyed by capability type. Several workers may share a type; they
 * are load-balancing candidates in registration order.
 *
 * Mutations swap in a fresh array so readers iterating a previous snapshot
 * are unaffected by concurrent registrations.
 */
export class CapabilityRegistry {
  private workers: readonly Worker[] = [];
  private healthCache = new Map<string, WorkerHealth>();

  register(worker: Worker): void {
    if (this.workers.some((w) => w.name === worker.name)) {
      throw new ValidationError("DUPLICATE_REGISTRATION", `Worker "${worker.name}" already registered`);
    }
    this.workers = [...this.workers, worker];
    log.info(`Registered worker "${worker.name}"`, { capability: worker.capability });
  }

  unregister(name: string): boolean {
    const next = this.workers.filter((w) => w.name !== name);
    const removed = next.length !== this.workers.length;
    this.workers = next;
    this.healthCache.delete(name);
    return removed;
  }

  get(name: string): Worker | undefined {
    return this.workers.find((w) => w.name === name);
  }

  list(capability?: CapabilityType): Worker[] {
    const snapshot = this.workers;
    return capability ? snapshot.filter((w) => w.capability === capability) : [...snapshot];
  }

  count(capability: CapabilityType): number {
    return this.list(capability).length;
  }

  /** Every worker (of `capability`, when given) whose `canHandle` accepts the request, in registration order. */
  findCapable(request: TaskRequest, capability?: CapabilityType): Worker[] {
    return this.list(capability).filter((worker) => {
      try {
        return worker.canHandle(request);
      } catch (err) {
        log.warn(`canHandle threw for worker "${worker.name}"`, { error: errorMessage(err) });
        return false;
      }
    });
  }

  /** Descriptor of the first worker registered for a type, if any. */
  descriptor(capability: CapabilityType): CapabilityDescriptor | undefined {
    return this.list(capability)[0]?.descriptor;
  }

  capabilities(): Partial<Record<CapabilityType, CapabilityDescriptor[]>> {
    const snapshot: Partial<Record<CapabilityType, CapabilityDescriptor[]>> = {};
    for (const worker of this.workers) {
      const list = snapshot[worker.capability] ?? [];
      list.push({ ...worker.descriptor, requiredInputs: [...worker.descriptor.requiredInputs], outputs: [...worker.descriptor.outputs] });
      snapshot[worker.capability] = list;
    }
    return snapshot;
  }

  async checkHealth(name: string): Promise<WorkerHealth | undefined> {
    const worker = this.get(name);
    if (!worker) return undefined;

    const start = Date.now();
    let result: WorkerHealth;
    try {
      const healthy = worker.healthCheck ? await worker.healthCheck() : true;
      result = {
        name,
        capability: worker.capability,
        healthy,
        lastCheck: Date.now(),
        responseTimeMs: Date.now() - start,
      };
    } catch (err) {
      result = {
        name,
        capability: worker.capability,
        healthy: false,
        lastCheck: Date.now(),
        responseTimeMs: Date.now() - start,
        error: errorMessage(err),
      };
      log.warn(`Health check failed for worker "${name}"`, { error: result.error });
    }
    this.healthCache.set(name, result);
    return result;
  }

  async checkAllHealth(): Promise<WorkerHealth[]> {
    const results = await Promise.all(this.workers.map((w) => this.checkHealth(w.name)));
    return results.filter((r): r is WorkerHealth => r !== undefined);
  }

  getCachedHealth(name: string): WorkerHealth | undefined {
    return this.healthCache.get(name);
  }
}
