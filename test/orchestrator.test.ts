import { afterEach, describe, expect, it } from "vitest";
import { Orchestrator, type OrchestratorEvent } from "../src/orchestrator.js";
import { TaskStore } from "../src/persistence/task-store.js";
import type { TaskStatusReport } from "../src/reports.js";
import type { CapabilityType } from "../src/types.js";
import type { WorkerFunction } from "../src/workers/function-worker.js";
import { deferred, echoWorker } from "./helpers/fixtures.js";

let current: Orchestrator | undefined;

async function orchestrator(
  workers: Array<[CapabilityType, WorkerFunction?]>,
  opts: { taskStore?: TaskStore } = {},
): Promise<Orchestrator> {
  const orch = new Orchestrator({ taskStore: opts.taskStore });
  for (const [capability, fn] of workers) orch.register(echoWorker(`${capability}-worker`, capability, fn));
  await orch.initialize();
  current = orch;
  return orch;
}

type FinishedEvent = Extract<OrchestratorEvent, { type: "task:finished" }>;

function stepStarted(orch: Orchestrator): Promise<void> {
  return new Promise((resolve) => {
    const unsubscribe = orch.subscribe((event) => {
      if (event.type !== "step:started") return;
      unsubscribe();
      resolve();
    });
  });
}

function taskFinished(orch: Orchestrator, taskId: string): Promise<FinishedEvent> {
  return new Promise((resolve) => {
    const unsubscribe = orch.subscribe((event) => {
      if (event.type !== "task:finished" || event.taskId !== taskId) return;
      unsubscribe();
      resolve(event);
    });
  });
}

afterEach(async () => {
  await current?.shutdown();
  current = undefined;
});

describe("Orchestrator.submit", () => {
  it("classifies, plans, executes and answers", async () => {
    const orch = await orchestrator([["code"]]);

    const res = await orch.submit({ message: "implement a linked list", sessionId: "s1" });

    expect(res).toMatchObject({
      sessionId: "s1",
      intent: "code_generation",
      status: "completed",
      response: "done: implement a linked list",
      result: { main: { text: "done: implement a linked list" } },
      confidence: 1,
    });
    expect(res.taskId).toBeTypeOf("string");
    expect(res.error).toBeUndefined();
    expect(res.processingTimeMs).toBeGreaterThanOrEqual(0);
  });

  it("keeps the session's conversation", async () => {
    const orch = await orchestrator([["code"]]);
    const res = await orch.submit({ message: "implement a linked list", sessionId: "s1", userId: "alice" });

    const view = await orch.getSession("s1");
    expect(view?.history.map((m) => [m.role, m.content])).toEqual([
      ["user", "implement a linked list"],
      ["system", 'Step "main" completed'],
      ["agent", "done: implement a linked list"],
    ]);
    expect(view?.context).toMatchObject({
      userId: "alice",
      messageCount: 3,
      activeCapabilities: ["code"],
      contextData: { lastTaskId: res.taskId },
    });
  });

  it("emits lifecycle events in order", async () => {
    const orch = await orchestrator([["code"]]);
    const events: string[] = [];
    orch.subscribe((event) => events.push(event.type));

    await orch.submit({ message: "implement a linked list", sessionId: "s1" });

    expect(events).toEqual(["task:accepted", "step:started", "step:ended", "task:finished"]);
  });

  it("honors an explicit intent parameter", async () => {
    const orch = await orchestrator([["code"], ["testing"]]);
    const res = await orch.submit({
      message: "implement a linked list",
      sessionId: "s1",
      parameters: { intent: "testing" },
    });
    expect(res.intent).toBe("testing");
    expect(orch.getStatus(res.taskId ?? "")?.steps.map((s) => s.capability)).toEqual(["testing"]);
  });

  it("runs a decomposed project setup", async () => {
    const orch = await orchestrator([["infrastructure"], ["code"], ["testing"], ["documentation"]]);

    const res = await orch.submit({ message: "Scaffold a new project for a todo API", sessionId: "s1" });

    expect(res.intent).toBe("project_setup");
    expect(res.status).toBe("completed");
    expect(Object.keys(res.result ?? {}).sort()).toEqual(["code", "docs", "scaffold", "tests"]);
    expect(res.result?.scaffold).toEqual({
      text: "done: Set up project structure and infrastructure: Scaffold a new project for a todo API",
    });
  });

  it("answers invalid input without throwing or touching sessions", async () => {
    const orch = await orchestrator([["code"]]);

    const res = await orch.submit({ message: "   ", sessionId: "s1" });

    expect(res).toMatchObject({
      sessionId: "s1",
      status: "failed",
      errorCode: "VALIDATION_FAILED",
      error: "Invalid submit request: message: message cannot be empty",
      confidence: 0,
    });
    expect(res.taskId).toBeUndefined();
    expect(await orch.getSession("s1")).toBeUndefined();
  });

  it("answers a non-object input", async () => {
    const orch = await orchestrator([]);
    const res = await orch.submit("not a request");
    expect(res).toMatchObject({ sessionId: "", status: "failed", errorCode: "VALIDATION_FAILED" });
  });

  it("fails a request no worker can serve at dispatch, without retries", async () => {
    const orch = await orchestrator([["code"]]);

    const res = await orch.submit({ message: "review my pull request", sessionId: "s1", parameters: { maxRetries: 3 } });

    const taskId = res.taskId ?? "";
    const dispatchError = `No capable worker for capability "review" (step "${taskId}/main")`;
    expect(taskId).not.toBe("");
    expect(res).toMatchObject({
      intent: "code_review",
      status: "failed",
      errorCode: "DISPATCH_FAILED",
      error: dispatchError,
      response: `Task failed: ${dispatchError}`,
      confidence: 0,
      usage: { tokensUsed: 0, cost: 0 },
    });
    expect(orch.getStatus(taskId)).toMatchObject({
      status: "failed",
      errorCode: "DISPATCH_FAILED",
      steps: [{ key: "main", capability: "review", status: "failed", retryCount: 0 }],
    });
    const view = await orch.getSession("s1");
    expect(view?.history.map((m) => m.role)).toEqual(["user", "system", "error"]);
  });

  it("reports a failing worker", async () => {
    const orch = await orchestrator([
      [
        "code",
        async () => {
          throw new Error("compiler crashed");
        },
      ],
    ]);

    const res = await orch.submit({ message: "implement a queue", sessionId: "s1", parameters: { maxRetries: 0 } });

    expect(res).toMatchObject({
      status: "failed",
      response: "Task failed: compiler crashed",
      error: "compiler crashed",
      errorCode: "WORKER_FAILED",
      confidence: 0,
    });
    const view = await orch.getSession("s1");
    expect(view?.history.map((m) => [m.role, m.content])).toEqual([
      ["user", "implement a queue"],
      ["system", 'Step "main" failed: compiler crashed'],
      ["error", "Task failed: compiler crashed"],
    ]);
  });
});

describe("Orchestrator.submitAsync", () => {
  it("accepts a task and reports its progress", async () => {
    const gate = deferred();
    const orch = await orchestrator([
      [
        "code",
        async () => {
          await gate.promise;
          return { text: "built" };
        },
      ],
    ]);
    const started = stepStarted(orch);

    const accepted = await orch.submitAsync({ message: "implement a cache", sessionId: "s1" });
    const finished = taskFinished(orch, accepted.taskId);

    expect(accepted).toMatchObject({ sessionId: "s1", intent: "code_generation", status: "pending", estimatedDurationSeconds: 60 });
    await started;
    expect(orch.getStatus(accepted.taskId)?.status).toBe("in_progress");

    gate.resolve();
    await finished;

    const first = orch.getStatus(accepted.taskId);
    const second = orch.getStatus(accepted.taskId);
    expect(first?.status).toBe("completed");
    expect(first?.result).toEqual({ main: { text: "built" } });
    expect(second).toEqual(first);
    expect(second).not.toBe(first);
  });

  it("rejects invalid input", async () => {
    const orch = await orchestrator([["code"]]);
    await expect(orch.submitAsync({ sessionId: "s1" })).rejects.toMatchObject({ code: "VALIDATION_FAILED" });
  });

  it("accepts a task no worker can serve and fails it in the background", async () => {
    const orch = await orchestrator([["code"]]);
    const accepted = await orch.submitAsync({ message: "review my pull request", sessionId: "s1" });
    const report = orch.getStatus(accepted.taskId);
    if (report?.status !== "failed") await taskFinished(orch, accepted.taskId);

    expect(accepted.intent).toBe("code_review");
    expect(orch.getStatus(accepted.taskId)).toMatchObject({ status: "failed", errorCode: "DISPATCH_FAILED" });
  });

  it("records the cancel reason on the task", async () => {
    const orch = await orchestrator([["code", () => new Promise<Record<string, unknown>>(() => undefined)]]);
    const started = stepStarted(orch);
    const accepted = await orch.submitAsync({ message: "implement a cache", sessionId: "s1" });
    const finished = taskFinished(orch, accepted.taskId);
    await started;

    expect(orch.cancel(accepted.taskId, "no longer needed")).toBe(true);
    await finished;

    expect(orch.getStatus(accepted.taskId)).toMatchObject({
      status: "cancelled",
      error: "no longer needed",
      errorCode: "CANCELLED",
      steps: [{ key: "main", status: "cancelled", error: "no longer needed" }],
    });
  });

  it("cancels a running task", async () => {
    const orch = await orchestrator([["code", () => new Promise<Record<string, unknown>>(() => undefined)]]);
    const started = stepStarted(orch);
    const accepted = await orch.submitAsync({ message: "implement a cache", sessionId: "s1" });
    const finished = taskFinished(orch, accepted.taskId);
    await started;

    expect(orch.cancel(accepted.taskId)).toBe(true);
    expect((await finished).status).toBe("cancelled");
    expect(orch.getStatus(accepted.taskId)?.status).toBe("cancelled");
    expect(orch.cancel(accepted.taskId)).toBe(false);
    expect(orch.cancel("no-such-task")).toBe(false);
  });

  it("cancels running work on shutdown", async () => {
    const orch = await orchestrator([["code", () => new Promise<Record<string, unknown>>(() => undefined)]]);
    const started = stepStarted(orch);
    const accepted = await orch.submitAsync({ message: "implement a cache", sessionId: "s1" });
    await started;

    await orch.shutdown();
    current = undefined;
    expect(orch.getStatus(accepted.taskId)?.status).toBe("cancelled");
  });
});

describe("Orchestrator introspection", () => {
  it("lists capabilities in a stable order", async () => {
    const orch = await orchestrator([["testing"], ["code"]]);
    expect(orch.listCapabilities().map((c) => [c.type, c.capabilities.map((d) => d.name)])).toEqual([
      ["code", ["code-worker"]],
      ["testing", ["testing-worker"]],
    ]);
  });

  it("counts requests, errors and active sessions", async () => {
    const orch = await orchestrator([["code"]]);
    await orch.submit({ message: "implement a linked list", sessionId: "s1" });
    await orch.submit({ message: "", sessionId: "s2" });

    const stats = await orch.stats();

    expect(stats).toMatchObject({ activeSessions: 1, runningTasks: 0, totalRequests: 2, totalErrors: 1 });
    expect(stats.averageResponseTimeMs).toBeGreaterThanOrEqual(0);
  });

  it("returns undefined for unknown tasks and sessions", async () => {
    const orch = await orchestrator([]);
    expect(orch.getStatus("missing")).toBeUndefined();
    expect(await orch.getSession("missing")).toBeUndefined();
  });

  it("limits the session history it returns", async () => {
    const orch = await orchestrator([["code"]]);
    await orch.submit({ message: "implement a linked list", sessionId: "s1" });
    expect((await orch.getSession("s1", 1))?.history.map((m) => m.role)).toEqual(["agent"]);
  });
});

describe("Orchestrator with a task store", () => {
  it("persists final reports", async () => {
    const taskStore = new TaskStore(":memory:");
    const orch = await orchestrator([["code"]], { taskStore });

    const res = await orch.submit({ message: "implement a linked list", sessionId: "s1" });

    expect(taskStore.get(res.taskId ?? "")).toMatchObject({ status: "completed", progress: 100 });
  });

  it("fails tasks left unfinished by an earlier process", async () => {
    const taskStore = new TaskStore(":memory:");
    const stale: TaskStatusReport = {
      taskId: "stale-task",
      sessionId: "s1",
      intent: "code_generation",
      description: "implement a cache",
      status: "in_progress",
      progress: 0,
      confidence: 0,
      usage: { tokensUsed: 0, cost: 0 },
      estimatedDurationSeconds: 60,
      steps: [],
      createdAt: 1,
    };
    taskStore.save(stale);

    const orch = await orchestrator([["code"]], { taskStore });

    expect(orch.getStatus("stale-task")).toMatchObject({
      status: "failed",
      error: "Task was interrupted by a restart",
    });
  });
});
