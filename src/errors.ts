export type ErrorCode =
  | "VALIDATION_FAILED"
  | "DUPLICATE_REGISTRATION"
  | "DEPENDENCY_CYCLE"
  | "UNKNOWN_DEPENDENCY"
  | "CAPABILITY_GAP"
  | "INVALID_PLAN"
  | "DISPATCH_FAILED"
  | "WORKER_FAILED"
  | "TIMEOUT"
  | "CANCELLED"
  | "LLM_FAILED"
  | "CONFIG_INVALID"
  | "INTERNAL";

type OrchestratorErrorOptions = {
  retryable?: boolean;
  details?: Record<string, unknown>;
  cause?: unknown;
};

/** Base class for every error the orchestration core raises. */
export class OrchestratorError extends Error {
  readonly code: ErrorCode;
  readonly retryable: boolean;
  readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, opts: OrchestratorErrorOptions = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = new.target.name;
    this.code = code;
    this.retryable = opts.retryable ?? false;
    this.details = opts.details;
  }

  toJSON(): { name: string; code: ErrorCode; message: string; retryable: boolean; details?: Record<string, unknown> } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      details: this.details,
    };
  }
}

/** Malformed request or context. Rejected before planning. */
export class ValidationError extends OrchestratorError {
  constructor(code: "VALIDATION_FAILED" | "DUPLICATE_REGISTRATION", message: string, details?: Record<string, unknown>) {
    super(code, message, { details });
  }
}

/** Capability gap or an invalid dependency graph. Never retried. */
export class PlanningError extends OrchestratorError {
  readonly edge?: { from: string; to: string };

  constructor(
    code: "DEPENDENCY_CYCLE" | "UNKNOWN_DEPENDENCY" | "CAPABILITY_GAP" | "INVALID_PLAN",
    message: string,
    edge?: { from: string; to: string },
  ) {
    super(code, message, { details: edge ? { ...edge } : undefined });
    this.edge = edge;
  }
}

/** No capable worker at schedule time. Fatal for the step. */
export class DispatchError extends OrchestratorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("DISPATCH_FAILED", message, { details });
  }
}

/** A worker reported a failure. Retryable. */
export class WorkerError extends OrchestratorError {
  readonly workerName: string;

  constructor(workerName: string, message: string, cause?: unknown) {
    super("WORKER_FAILED", message, { retryable: true, details: { worker: workerName }, cause });
    this.workerName = workerName;
  }
}

/** A dispatch exceeded its bound. Shares the retry budget with WorkerError. */
export class TimeoutError extends OrchestratorError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number, message = `Operation timed out after ${timeoutMs}ms`) {
    super("TIMEOUT", message, { retryable: true, details: { timeoutMs } });
    this.timeoutMs = timeoutMs;
  }
}

export class CancellationError extends OrchestratorError {
  constructor(message = "Cancelled by caller") {
    super("CANCELLED", message);
  }
}

export class LlmError extends OrchestratorError {
  readonly provider: string;
  readonly model: string;
  readonly tokensUsed: number;

  constructor(provider: string, model: string, message: string, opts: { tokensUsed?: number; retryable?: boolean; cause?: unknown } = {}) {
    const tokensUsed = opts.tokensUsed ?? 0;
    super("LLM_FAILED", message, {
      retryable: opts.retryable ?? true,
      details: { provider, model, tokensUsed },
      cause: opts.cause,
    });
    this.provider = provider;
    this.model = model;
    this.tokensUsed = tokensUsed;
  }
}

export class ConfigError extends OrchestratorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("CONFIG_INVALID", message, { details });
  }
}

export function isRetryable(err: unknown): boolean {
  return err instanceof OrchestratorError && err.retryable;
}

export function errorCode(err: unknown): ErrorCode {
  return err instanceof OrchestratorError ? err.code : "INTERNAL";
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
