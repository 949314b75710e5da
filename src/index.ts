// Config
export { getConfig, configure, resetConfig, configFromEnv, defaults } from "./config.js";
export type { OrchestratorConfig, ConfigOverrides } from "./config.js";

// Errors
export {
  OrchestratorError,
  ValidationError,
  PlanningError,
  DispatchError,
  WorkerError,
  TimeoutError,
  CancellationError,
  LlmError,
  ConfigError,
  isRetryable,
  errorCode,
  errorMessage,
} from "./errors.js";
export type { ErrorCode } from "./errors.js";

// Types
export {
  INTENT_TYPES,
  CAPABILITY_TYPES,
  PRIORITIES,
  PRIORITY_RANK,
  TASK_STATUSES,
  MESSAGE_ROLES,
  isTerminal,
} from "./types.js";
export type {
  IntentType,
  CapabilityType,
  Priority,
  TaskStatus,
  TerminalStatus,
  ExecutionContext,
  TaskRequest,
  CapabilityDescriptor,
  ExecutionStep,
  ExecutionPlan,
  ResourceUsage,
  TaskResult,
  MessageRole,
  ConversationMessage,
  SessionContext,
} from "./types.js";

// Schemas and value helpers
export {
  parseOrThrow,
  ExecutionContextSchema,
  TaskRequestSchema,
  SubmitRequestSchema,
  CapabilityDescriptorSchema,
  WorkerFileSchema,
} from "./schemas.js";
export type { ExecutionContextInput, TaskRequestInput, SubmitRequestInput, WorkerFile } from "./schemas.js";
export {
  createExecutionContext,
  createTaskRequest,
  narrowRequest,
  compareRequests,
  createPendingResult,
  settleResult,
  annotateResult,
  createMessage,
} from "./tasks.js";
export type { ResultOutcome } from "./tasks.js";

// Workers
export type { Worker, WorkerContext, WorkerResult } from "./workers/worker.js";
export { defaultDescriptor } from "./workers/worker.js";
export { CapabilityRegistry } from "./workers/registry.js";
export type { WorkerHealth } from "./workers/registry.js";
export { FunctionWorker } from "./workers/function-worker.js";
export type { WorkerFunction, FunctionWorkerOptions } from "./workers/function-worker.js";
export { HttpWorker } from "./workers/http-worker.js";
export type { HttpWorkerOptions } from "./workers/http-worker.js";
export { LlmWorker } from "./workers/llm-worker.js";
export type { LlmWorkerOptions } from "./workers/llm-worker.js";
export { buildWorkers, loadWorkerFile } from "./workers/loader.js";
export type { LoadOptions } from "./workers/loader.js";

// LLM
export { HttpLlmGateway } from "./llm/gateway.js";
export type { HttpLlmGatewayOptions } from "./llm/gateway.js";
export type { LlmGateway, ChatMessage, ChatRole, CompletionOptions, LlmCompletion } from "./llm/types.js";

// Classification and planning
export { IntentClassifier } from "./classifier/classifier.js";
export type { ClassifierOptions, Classification } from "./classifier/classifier.js";
export { DEFAULT_KEYWORDS } from "./classifier/keywords.js";
export type { KeywordTable } from "./classifier/keywords.js";
export { TaskPlanner, INTENT_CAPABILITY, DEFAULT_DECOMPOSITIONS, MAIN_STEP_KEY, stepKey } from "./planner/planner.js";
export type { PlannerOptions } from "./planner/planner.js";
export {
  validatePlanGraph,
  topologicalOrder,
  criticalPathSeconds,
  readySteps,
  blockedSteps,
  planProgress,
} from "./planner/plan-graph.js";
export type { StepSpec, Decomposition, PlanProgress } from "./planner/types.js";

// Execution
export { ExecutionEngine } from "./engine/engine.js";
export { PrioritySemaphore } from "./engine/semaphore.js";
export type { EngineOptions, ExecuteOptions, ExecutionOutcome } from "./engine/types.js";

// Sessions and persistence
export { MemorySessionStore, BaseSessionStore, newSessionContext } from "./sessions/store.js";
export type { SessionStore, SessionSeed } from "./sessions/store.js";
export { SqliteSessionStore } from "./sessions/sqlite-store.js";
export { KeyedMutex } from "./sessions/keyed-mutex.js";
export { TaskStore } from "./persistence/task-store.js";

// Core
export { Orchestrator } from "./orchestrator.js";
export type {
  OrchestratorOptions,
  OrchestratorEvent,
  OrchestratorListener,
  CapabilityListing,
  SessionView,
  OrchestratorStats,
} from "./orchestrator.js";
export { buildStatusReport, renderResponse } from "./reports.js";
export type { StepReport, TaskStatusReport, SubmitResponse, AcceptedTask } from "./reports.js";

// API
export { ApiServer } from "./server/server.js";
export type { ApiServerOptions } from "./server/server.js";
export type { ErrorBody, HealthResponse, CancelResponse, WorkerSummary } from "./server/types.js";

// Utils
export { log, createLogger, setLogLevel } from "./utils/logger.js";
export type { Logger, LogLevel } from "./utils/logger.js";
export { withRetry, backoffDelay, sleep } from "./utils/retry.js";
