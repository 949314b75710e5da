import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { TaskStore } from "../src/persistence/task-store.js";
import type { TaskStatusReport } from "../src/reports.js";

function report(overrides: Partial<TaskStatusReport> = {}): TaskStatusReport {
  return {
    taskId: "task-1",
    sessionId: "session-1",
    intent: "project_setup",
    description: "a todo API",
    status: "in_progress",
    progress: 50,
    confidence: 0,
    usage: { tokensUsed: 10, cost: 0.5 },
    estimatedDurationSeconds: 180,
    steps: [
      {
        id: "task-1/scaffold",
        key: "scaffold",
        capability: "infrastructure",
        status: "completed",
        mandatory: true,
        dependsOn: [],
        retryCount: 0,
        workerName: "infra",
      },
      {
        id: "task-1/code",
        key: "code",
        capability: "code",
        status: "in_progress",
        mandatory: true,
        dependsOn: ["scaffold"],
        retryCount: 1,
      },
    ],
    createdAt: 1_000,
    startedAt: 1_100,
    ...overrides,
  };
}

describe("TaskStore", () => {
  let store: TaskStore;

  beforeEach(() => {
    store = new TaskStore(":memory:");
  });

  afterEach(() => {
    store.close();
  });

  it("round-trips a report", () => {
    const saved = report({ result: { scaffold: { text: "ok" } } });
    store.save(saved);
    expect(store.get("task-1")).toEqual(saved);
    expect(store.get("missing")).toBeUndefined();
  });

  it("replaces a report on save", () => {
    store.save(report());
    store.save(report({ status: "completed", progress: 100, confidence: 0.9, completedAt: 2_000 }));
    expect(store.get("task-1")).toMatchObject({ status: "completed", progress: 100, confidence: 0.9, completedAt: 2_000 });
    expect(store.count()).toBe(1);
  });

  it("lists newest first, optionally by session", () => {
    store.save(report({ taskId: "a", createdAt: 1 }));
    store.save(report({ taskId: "b", createdAt: 3 }));
    store.save(report({ taskId: "c", createdAt: 2, sessionId: "other" }));

    expect(store.list().map((r) => r.taskId)).toEqual(["b", "c", "a"]);
    expect(store.list(1).map((r) => r.taskId)).toEqual(["b"]);
    expect(store.listBySession("session-1").map((r) => r.taskId)).toEqual(["b", "a"]);
  });

  it("marks unfinished tasks as interrupted", () => {
    store.save(report({ taskId: "running" }));
    store.save(report({ taskId: "queued", status: "pending", progress: 0 }));
    store.save(report({ taskId: "done", status: "completed", progress: 100, confidence: 1 }));

    expect(store.markInterrupted(9_000)).toBe(2);

    const running = store.get("running");
    expect(running).toMatchObject({
      status: "failed",
      error: "Task was interrupted by a restart",
      errorCode: "INTERNAL",
      confidence: 0,
      completedAt: 9_000,
    });
    expect(running?.steps.map((s) => s.status)).toEqual(["completed", "cancelled"]);
    expect(store.get("queued")?.status).toBe("failed");
    expect(store.get("done")?.status).toBe("completed");
    expect(store.markInterrupted()).toBe(0);
  });

  it("deletes by id and by age", () => {
    store.save(report({ taskId: "old", createdAt: 10 }));
    store.save(report({ taskId: "new", createdAt: 100 }));

    expect(store.delete("old")).toBe(true);
    expect(store.delete("old")).toBe(false);
    expect(store.deleteOlderThan(1_000)).toBe(1);
    expect(store.count()).toBe(0);
  });
});
