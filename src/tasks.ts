import { randomUUID } from "node:crypto";
import { getConfig } from "./config.js";
import { OrchestratorError } from "./errors.js";
import type { ExecutionContextInput, TaskRequestInput } from "./schemas.js";
import { ExecutionContextSchema, parseOrThrow, TaskRequestSchema } from "./schemas.js";
import type {
  CapabilityType,
  ConversationMessage,
  ExecutionContext,
  IntentType,
  MessageRole,
  ResourceUsage,
  TaskRequest,
  TaskResult,
  TerminalStatus,
} from "./types.js";
import { PRIORITY_RANK } from "./types.js";

export function createExecutionContext(input: ExecutionContextInput): ExecutionContext {
  return parseOrThrow(ExecutionContextSchema, input, "execution context");
}

/** Validate and normalize a task request, filling defaults from config. */
export function createTaskRequest(input: TaskRequestInput): TaskRequest {
  const parsed = parseOrThrow(TaskRequestSchema, input, "task request");
  const { tasks } = getConfig();
  return {
    id: parsed.id ?? randomUUID(),
    intent: parsed.intent,
    description: parsed.description,
    context: parsed.context,
    parameters: parsed.parameters,
    priority: parsed.priority ?? tasks.defaultPriority,
    timeoutSeconds: parsed.timeoutSeconds ?? tasks.defaultTimeoutSeconds,
    maxRetries: parsed.maxRetries ?? tasks.defaultMaxRetries,
    parentTaskId: parsed.parentTaskId,
    createdAt: parsed.createdAt ?? Date.now(),
  };
}

/**
 * Derive a child request for one step of a decomposed plan.
 * Shares context, priority, timeout and retry budget with the parent.
 */
export function narrowRequest(parent: TaskRequest, intent: IntentType, description: string): TaskRequest {
  return {
    ...parent,
    id: randomUUID(),
    intent,
    description,
    context: structuredClone(parent.context),
    parameters: structuredClone(parent.parameters),
    parentTaskId: parent.id,
  };
}

/** Sort comparator: higher priority first, then earlier creation. */
export function compareRequests(a: TaskRequest, b: TaskRequest): number {
  const byRank = PRIORITY_RANK[b.priority] - PRIORITY_RANK[a.priority];
  if (byRank !== 0) return byRank;
  return a.createdAt - b.createdAt;
}

const ZERO_USAGE: ResourceUsage = Object.freeze({ tokensUsed: 0, cost: 0 });

export function createPendingResult(stepId: string, request: TaskRequest, capability: CapabilityType): TaskResult {
  const result: TaskResult = {
    taskId: request.id,
    stepId,
    capability,
    status: "pending",
    executionTimeMs: 0,
    usage: ZERO_USAGE,
    confidence: 0,
    createdAt: Date.now(),
    metadata: Object.freeze({}),
  };
  return Object.freeze(result);
}

export type ResultOutcome =
  | {
      status: "completed";
      workerName?: string;
      result?: Record<string, unknown>;
      usage?: Partial<ResourceUsage>;
      confidence?: number;
      executionTimeMs: number;
      metadata?: Record<string, unknown>;
    }
  | {
      status: Exclude<TerminalStatus, "completed">;
      workerName?: string;
      error: string;
      errorCode?: string;
      usage?: Partial<ResourceUsage>;
      executionTimeMs: number;
      metadata?: Record<string, unknown>;
    };

function clampConfidence(value: number | undefined): number {
  if (value === undefined || Number.isNaN(value)) return 1;
  return Math.min(1, Math.max(0, value));
}

/**
 * Move a pending result to its terminal state. Returns a new frozen object;
 * settling an already-settled result is a programming error.
 */
export function settleResult(pending: TaskResult, outcome: ResultOutcome): TaskResult {
  if (pending.status !== "pending") {
    throw new OrchestratorError(
      "INTERNAL",
      `Result for step "${pending.stepId}" already settled as ${pending.status}`,
    );
  }
  const usage = Object.freeze({
    tokensUsed: outcome.usage?.tokensUsed ?? 0,
    cost: outcome.usage?.cost ?? 0,
  });
  const base = {
    taskId: pending.taskId,
    stepId: pending.stepId,
    capability: pending.capability,
    workerName: outcome.workerName,
    executionTimeMs: Math.max(0, outcome.executionTimeMs),
    usage,
    createdAt: pending.createdAt,
    completedAt: Date.now(),
    metadata: Object.freeze({ ...pending.metadata, ...outcome.metadata }),
  };
  const settled: TaskResult =
    outcome.status === "completed"
      ? {
          ...base,
          status: outcome.status,
          result: outcome.result ? Object.freeze({ ...outcome.result }) : undefined,
          confidence: clampConfidence(outcome.confidence),
        }
      : {
          ...base,
          status: outcome.status,
          error: outcome.error,
          errorCode: outcome.errorCode,
          confidence: 0,
        };
  return Object.freeze(settled);
}

/** Attach non-semantic metadata to a result without touching its outcome. */
export function annotateResult(result: TaskResult, metadata: Record<string, unknown>): TaskResult {
  const annotated: TaskResult = { ...result, metadata: Object.freeze({ ...result.metadata, ...metadata }) };
  return Object.freeze(annotated);
}

export function createMessage(
  sessionId: string,
  role: MessageRole,
  content: string,
  payload: Record<string, unknown> = {},
): ConversationMessage {
  return {
    id: randomUUID(),
    sessionId,
    role,
    content,
    payload,
    timestamp: Date.now(),
  };
}
