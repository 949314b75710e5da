import { z } from "zod";
import { getConfig } from "../config.js";
import { CancellationError, LlmError, errorMessage } from "../errors.js";
import { createLogger } from "../utils/logger.js";
import { withRetry } from "../utils/retry.js";
import type { ChatMessage, CompletionOptions, LlmCompletion, LlmGateway } from "./types.js";

const log = createLogger("llm");

export type HttpLlmGatewayOptions = {
  provider?: string;
  model?: string;
  /** Base URL of an OpenAI-compatible API, e.g. `https://host/v1`. */
  baseUrl?: string;
  apiKey?: string;
  timeoutMs?: number;
  maxRetries?: number;
  maxTokens?: number;
  temperature?: number;
  retryBaseDelayMs?: number;
  headers?: Record<string, string>;
};

const CompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
      }),
    )
    .min(1),
  usage: z.object({ total_tokens: z.number().int().nonnegative() }).partial().optional(),
});

/**
 * Chat-completions client over HTTP. Each attempt has its own timeout;
 * network errors, timeouts, 429 and 5xx answers are retried with backoff.
 */
export class HttpLlmGateway implements LlmGateway {
  readonly provider: string;
  readonly model: string;

  private baseUrl: string;
  private apiKey?: string;
  private timeoutMs: number;
  private maxRetries: number;
  private maxTokens: number;
  private temperature: number;
  private retryBaseDelayMs: number;
  private headers: Record<string, string>;

  constructor(opts: HttpLlmGatewayOptions = {}) {
    const { llm } = getConfig();
    this.provider = opts.provider ?? llm.provider;
    this.model = opts.model ?? llm.model;
    this.baseUrl = (opts.baseUrl ?? llm.baseUrl).replace(/\/+$/, "");
    this.apiKey = opts.apiKey ?? llm.apiKey;
    this.timeoutMs = opts.timeoutMs ?? llm.timeoutMs;
    this.maxRetries = opts.maxRetries ?? llm.maxRetries;
    this.maxTokens = opts.maxTokens ?? llm.maxTokens;
    this.temperature = opts.temperature ?? llm.temperature;
    this.retryBaseDelayMs = opts.retryBaseDelayMs ?? 500;
    this.headers = opts.headers ?? {};
  }

  async complete(messages: ChatMessage[], opts?: CompletionOptions): Promise<LlmCompletion> {
    return withRetry((attempt) => this.attempt(messages, attempt, opts), {
      maxRetries: this.maxRetries,
      baseDelayMs: this.retryBaseDelayMs,
      signal: opts?.signal,
      shouldRetry: (err) => err instanceof LlmError && err.retryable,
    });
  }

  async healthCheck(): Promise<boolean> {
    try {
      const res = await fetch(`${this.baseUrl}/models`, {
        headers: this.requestHeaders(),
        signal: AbortSignal.timeout(5_000),
      });
      return res.ok;
    } catch {
      return false;
    }
  }

  private requestHeaders(): Record<string, string> {
    const headers: Record<string, string> = { "Content-Type": "application/json", ...this.headers };
    if (this.apiKey) headers.Authorization = `Bearer ${this.apiKey}`;
    return headers;
  }

  private async attempt(messages: ChatMessage[], attempt: number, opts?: CompletionOptions): Promise<LlmCompletion> {
    if (opts?.signal?.aborted) throw new CancellationError();

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    const onAbort = (): void => controller.abort();
    opts?.signal?.addEventListener("abort", onAbort, { once: true });

    log.debug("Sending completion request", { provider: this.provider, model: this.model, attempt });
    try {
      const res = await fetch(`${this.baseUrl}/chat/completions`, {
        method: "POST",
        headers: this.requestHeaders(),
        body: JSON.stringify({
          model: this.model,
          messages,
          max_tokens: opts?.maxTokens ?? this.maxTokens,
          temperature: opts?.temperature ?? this.temperature,
        }),
        signal: controller.signal,
      });

      const body = await res.text();
      if (!res.ok) {
        throw new LlmError(this.provider, this.model, `HTTP ${res.status}: ${body.slice(0, 200)}`, {
          retryable: res.status === 429 || res.status >= 500,
        });
      }

      let json: unknown;
      try {
        json = JSON.parse(body);
      } catch {
        throw new LlmError(this.provider, this.model, "Response was not valid JSON", { retryable: false });
      }
      const parsed = CompletionResponseSchema.safeParse(json);
      if (!parsed.success) {
        throw new LlmError(this.provider, this.model, "Response did not match the chat-completions shape", {
          retryable: false,
        });
      }

      return {
        content: parsed.data.choices[0].message.content ?? "",
        tokensUsed: parsed.data.usage?.total_tokens ?? 0,
      };
    } catch (err) {
      if (err instanceof LlmError) throw err;
      if (opts?.signal?.aborted) throw new CancellationError();
      if (controller.signal.aborted) {
        throw new LlmError(this.provider, this.model, `Request timed out after ${this.timeoutMs}ms`, { cause: err });
      }
      throw new LlmError(this.provider, this.model, errorMessage(err), { cause: err });
    } finally {
      clearTimeout(timer);
      opts?.signal?.removeEventListener("abort", onAbort);
    }
  }
}
