import { LlmError, errorMessage } from "../errors.js";
import type { LlmGateway } from "../llm/types.js";
import type { CapabilityDescriptor, CapabilityType, IntentType, TaskRequest } from "../types.js";
import { createLogger } from "../utils/logger.js";
import type { Worker, WorkerContext, WorkerResult } from "./worker.js";
import { defaultDescriptor } from "./worker.js";

const log = createLogger("worker");

export type LlmWorkerOptions = {
  name: string;
  capability: CapabilityType;
  gateway: LlmGateway;
  /** System prompt shaping the model's behavior for this capability. */
  rolePrompt?: string;
  intents?: IntentType[];
  descriptor?: Partial<CapabilityDescriptor>;
};

const DEFAULT_ROLE_PROMPTS: Record<CapabilityType, string> = {
  code: "You are a code generation expert. Produce clean, well-documented code for the request.",
  infrastructure: "You are an infrastructure engineer. Produce configuration and provisioning files for the request.",
  testing: "You are a test engineer. Produce thorough automated tests for the request.",
  devops: "You are a release engineer. Produce deployment pipelines and instructions for the request.",
  documentation: "You are a technical writer. Produce clear documentation or explanations for the request.",
  security: "You are a security reviewer. Report vulnerabilities and remediations for the request.",
  planning: "You are a software architect. Break the request down into an actionable plan.",
  review: "You are a senior reviewer. Review the code described in the request and list concrete issues.",
};

function buildUserMessage(request: TaskRequest): string {
  const ctx = request.context;
  const lines = [request.description, "", `Project: ${ctx.projectId}`, `Workspace: ${ctx.workspacePath}`];
  if (ctx.language) lines.push(`Language: ${ctx.language}`);
  if (ctx.framework) lines.push(`Framework: ${ctx.framework}`);
  return lines.join("\n");
}

/** Worker that answers a request with one language-model completion. */
export class LlmWorker implements Worker {
  readonly name: string;
  readonly capability: CapabilityType;
  readonly descriptor: CapabilityDescriptor;

  private gateway: LlmGateway;
  private rolePrompt: string;
  private intents?: ReadonlySet<IntentType>;

  constructor(opts: LlmWorkerOptions) {
    this.name = opts.name;
    this.capability = opts.capability;
    this.gateway = opts.gateway;
    this.rolePrompt = opts.rolePrompt ?? DEFAULT_ROLE_PROMPTS[opts.capability];
    this.intents = opts.intents ? new Set(opts.intents) : undefined;
    this.descriptor = defaultDescriptor(opts.name, opts.capability, {
      outputs: ["content"],
      ...opts.descriptor,
    });
  }

  canHandle(request: TaskRequest): boolean {
    return this.intents ? this.intents.has(request.intent) : true;
  }

  async execute(request: TaskRequest, ctx: WorkerContext): Promise<WorkerResult> {
    const start = Date.now();
    try {
      log.info(`[${this.name}] Executing task "${request.id}"`, { description: request.description.slice(0, 100) });

      const completion = await this.gateway.complete(
        [
          { role: "system", content: this.rolePrompt },
          { role: "user", content: buildUserMessage(request) },
        ],
        { signal: ctx.signal },
      );

      return {
        status: "ok",
        output: { content: completion.content },
        usage: { tokensUsed: completion.tokensUsed },
        metadata: {
          provider: this.gateway.provider,
          model: this.gateway.model,
          durationMs: Date.now() - start,
        },
      };
    } catch (err) {
      log.error(`[${this.name}] Task "${request.id}" failed`, { error: errorMessage(err) });
      return {
        status: "error",
        error: errorMessage(err),
        usage: err instanceof LlmError ? { tokensUsed: err.tokensUsed } : undefined,
        metadata: { durationMs: Date.now() - start },
      };
    }
  }

  async healthCheck(): Promise<boolean> {
    return this.gateway.healthCheck ? this.gateway.healthCheck() : true;
  }
}
