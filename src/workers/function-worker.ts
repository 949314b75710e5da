import { errorMessage } from "../errors.js";
import type { CapabilityDescriptor, CapabilityType, IntentType, TaskRequest } from "../types.js";
import { createLogger } from "../utils/logger.js";
import type { Worker, WorkerContext, WorkerResult } from "./worker.js";
import { defaultDescriptor } from "./worker.js";

const log = createLogger("worker");

/**
 * The function behind a FunctionWorker. Returning a plain record means
 * success with that output; returning a WorkerResult passes it through.
 */
export type WorkerFunction = (
  request: TaskRequest,
  ctx: WorkerContext,
) => Promise<Record<string, unknown> | WorkerResult>;

export type FunctionWorkerOptions = {
  name: string;
  capability: CapabilityType;
  fn: WorkerFunction;
  /** Restrict to these intents. Omitted means any intent routed to this capability. */
  intents?: IntentType[];
  /** Extra acceptance predicate, checked after `intents`. */
  accepts?: (request: TaskRequest) => boolean;
  descriptor?: Partial<CapabilityDescriptor>;
};

function isWorkerResult(value: Record<string, unknown> | WorkerResult): value is WorkerResult {
  return (value.status === "ok" || value.status === "error") && Object.keys(value).every((k) =>
    ["status", "output", "error", "usage", "confidence", "metadata"].includes(k),
  );
}

/** In-process worker wrapping an async function. */
export class FunctionWorker implements Worker {
  readonly name: string;
  readonly capability: CapabilityType;
  readonly descriptor: CapabilityDescriptor;

  private fn: WorkerFunction;
  private intents?: ReadonlySet<IntentType>;
  private accepts?: (request: TaskRequest) => boolean;

  constructor(opts: FunctionWorkerOptions) {
    this.name = opts.name;
    this.capability = opts.capability;
    this.fn = opts.fn;
    this.intents = opts.intents ? new Set(opts.intents) : undefined;
    this.accepts = opts.accepts;
    this.descriptor = defaultDescriptor(opts.name, opts.capability, opts.descriptor);
  }

  canHandle(request: TaskRequest): boolean {
    if (this.intents && !this.intents.has(request.intent)) return false;
    return this.accepts ? this.accepts(request) : true;
  }

  async execute(request: TaskRequest, ctx: WorkerContext): Promise<WorkerResult> {
    log.debug(`[${this.name}] Running function for task "${request.id}"`, { attempt: ctx.attempt });
    try {
      const value = await this.fn(request, ctx);
      return isWorkerResult(value) ? value : { status: "ok", output: value };
    } catch (err) {
      log.warn(`[${this.name}] Task "${request.id}" failed`, { error: errorMessage(err) });
      return { status: "error", error: errorMessage(err) };
    }
  }
}
