import { z } from "zod";
import { errorMessage } from "../errors.js";
import type { CapabilityDescriptor, CapabilityType, IntentType, TaskRequest } from "../types.js";
import { createLogger } from "../utils/logger.js";
import type { Worker, WorkerContext, WorkerResult } from "./worker.js";
import { defaultDescriptor } from "./worker.js";

const log = createLogger("worker");

export type HttpWorkerOptions = {
  name: string;
  capability: CapabilityType;
  url: string;
  headers?: Record<string, string>;
  intents?: IntentType[];
  descriptor?: Partial<CapabilityDescriptor>;
};

/** Optional structured body a remote worker may answer with. */
const RemoteResultSchema = z.object({
  output: z.record(z.unknown()).optional(),
  usage: z
    .object({ tokensUsed: z.number().nonnegative(), cost: z.number().nonnegative() })
    .partial()
    .optional(),
  confidence: z.number().min(0).max(1).optional(),
});

/**
 * Worker backed by a remote HTTP endpoint. The request is POSTed as JSON;
 * a JSON answer of `{ output, usage, confidence }` is unpacked, any other
 * body becomes `{ text }`.
 */
export class HttpWorker implements Worker {
  readonly name: string;
  readonly capability: CapabilityType;
  readonly descriptor: CapabilityDescriptor;

  private url: string;
  private headers: Record<string, string>;
  private intents?: ReadonlySet<IntentType>;

  constructor(opts: HttpWorkerOptions) {
    this.name = opts.name;
    this.capability = opts.capability;
    this.url = opts.url;
    this.headers = opts.headers ?? {};
    this.intents = opts.intents ? new Set(opts.intents) : undefined;
    this.descriptor = defaultDescriptor(opts.name, opts.capability, opts.descriptor);
  }

  canHandle(request: TaskRequest): boolean {
    return this.intents ? this.intents.has(request.intent) : true;
  }

  async execute(request: TaskRequest, ctx: WorkerContext): Promise<WorkerResult> {
    const start = Date.now();
    try {
      log.info(`[${this.name}] Calling ${this.url} for task "${request.id}"`);

      const res = await fetch(this.url, {
        method: "POST",
        headers: { "Content-Type": "application/json", ...this.headers },
        body: JSON.stringify({
          id: request.id,
          intent: request.intent,
          description: request.description,
          context: request.context,
          parameters: request.parameters,
          attempt: ctx.attempt,
        }),
        signal: ctx.signal,
      });

      const body = await res.text();
      if (!res.ok) {
        return {
          status: "error",
          error: `HTTP ${res.status}: ${body.slice(0, 500)}`,
          metadata: { durationMs: Date.now() - start, httpStatus: res.status },
        };
      }

      const structured = parseStructured(body);
      return {
        status: "ok",
        output: structured?.output ?? { text: body },
        usage: structured?.usage,
        confidence: structured?.confidence,
        metadata: { durationMs: Date.now() - start, httpStatus: res.status },
      };
    } catch (err) {
      log.error(`[${this.name}] Task "${request.id}" failed`, { error: errorMessage(err) });
      return {
        status: "error",
        error: errorMessage(err),
        metadata: { durationMs: Date.now() - start },
      };
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      const res = await fetch(this.url, {
        method: "HEAD",
        signal: AbortSignal.timeout(5_000),
      });
      return res.ok;
    } catch {
      return false;
    }
  }
}

function parseStructured(body: string): z.output<typeof RemoteResultSchema> | undefined {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    return undefined;
  }
  const parsed = RemoteResultSchema.safeParse(json);
  return parsed.success && parsed.data.output ? parsed.data : undefined;
}
