export type ChatRole = "system" | "user" | "assistant";

export type ChatMessage = {
  role: ChatRole;
  content: string;
};

export type CompletionOptions = {
  signal?: AbortSignal;
  maxTokens?: number;
  temperature?: number;
};

export type LlmCompletion = {
  content: string;
  tokensUsed: number;
};

/**
 * A language-model endpoint. Implementations raise LlmError on failure.
 */
export interface LlmGateway {
  readonly provider: string;
  readonly model: string;
  complete(messages: ChatMessage[], opts?: CompletionOptions): Promise<LlmCompletion>;
  healthCheck?(): Promise<boolean>;
}
