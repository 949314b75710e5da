import type { TaskRequestInput } from "../../src/schemas.js";
import { createTaskRequest } from "../../src/tasks.js";
import type { CapabilityType, ExecutionPlan, ExecutionStep, TaskRequest, TaskStatus } from "../../src/types.js";
import type { WorkerFunction } from "../../src/workers/function-worker.js";
import { FunctionWorker } from "../../src/workers/function-worker.js";

export const testContext = {
  sessionId: "session-1",
  userId: "user-1",
  projectId: "project-1",
  workspacePath: "/tmp/workspace",
};

export function makeRequest(overrides: Partial<TaskRequestInput> = {}): TaskRequest {
  return createTaskRequest({
    intent: "code_generation",
    description: "write a parser",
    context: testContext,
    ...overrides,
  });
}

export function echoWorker(name: string, capability: CapabilityType, fn?: WorkerFunction): FunctionWorker {
  return new FunctionWorker({
    name,
    capability,
    fn: fn ?? (async (request) => ({ text: `done: ${request.description}` })),
  });
}

type StepInit = {
  deps?: string[];
  mandatory?: boolean;
  status?: TaskStatus;
  seconds?: number;
};

export function makeStep(id: string, init: StepInit = {}): ExecutionStep {
  return {
    id,
    capability: "code",
    request: makeRequest({ description: `step ${id}` }),
    dependencies: init.deps ?? [],
    status: init.status ?? "pending",
    retryCount: 0,
    maxRetries: 0,
    estimatedDurationSeconds: init.seconds ?? 60,
    mandatory: init.mandatory ?? true,
  };
}

export function makePlan(steps: ExecutionStep[]): ExecutionPlan {
  const request = makeRequest();
  return {
    id: request.id,
    request,
    steps,
    estimatedDurationSeconds: 0,
    status: "pending",
    createdAt: Date.now(),
  };
}

/** A promise plus its resolver, for steering workers from a test. */
export function deferred<T = void>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
