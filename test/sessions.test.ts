import { describe, expect, it } from "vitest";
import { configure } from "../src/config.js";
import { ValidationError } from "../src/errors.js";
import { KeyedMutex } from "../src/sessions/keyed-mutex.js";
import { SqliteSessionStore } from "../src/sessions/sqlite-store.js";
import type { SessionStore } from "../src/sessions/store.js";
import { MemorySessionStore, newSessionContext } from "../src/sessions/store.js";
import { createMessage } from "../src/tasks.js";

const sleep = (ms: number) => new Promise((r) => setTimeout(r, ms));

describe("KeyedMutex", () => {
  it("serializes sections under one key", async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];
    const section = (name: string, ms: number) =>
      mutex.runExclusive("k", async () => {
        events.push(`start:${name}`);
        await sleep(ms);
        events.push(`end:${name}`);
        return name;
      });

    const results = await Promise.all([section("a", 10), section("b", 1)]);

    expect(results).toEqual(["a", "b"]);
    expect(events).toEqual(["start:a", "end:a", "start:b", "end:b"]);
    expect(mutex.size).toBe(0);
  });

  it("runs different keys concurrently", async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];
    await Promise.all(
      ["x", "y"].map((key) =>
        mutex.runExclusive(key, async () => {
          events.push(`start:${key}`);
          await sleep(5);
          events.push(`end:${key}`);
        }),
      ),
    );
    expect(events.slice(0, 2)).toEqual(["start:x", "start:y"]);
  });

  it("keeps the queue moving after a failure", async () => {
    const mutex = new KeyedMutex();
    const failed = mutex.runExclusive("k", async () => {
      throw new Error("section failed");
    });
    const next = mutex.runExclusive("k", () => "after");

    await expect(failed).rejects.toThrow("section failed");
    await expect(next).resolves.toBe("after");
  });
});

const stores: Array<[string, () => SessionStore]> = [
  ["MemorySessionStore", () => new MemorySessionStore()],
  ["SqliteSessionStore", () => new SqliteSessionStore(":memory:")],
];

describe.each(stores)("%s", (_name, create) => {
  async function open(): Promise<SessionStore> {
    const store = create();
    await store.initialize();
    return store;
  }

  it("returns undefined for an unknown session", async () => {
    const store = await open();
    expect(await store.get("nope")).toBeUndefined();
    await store.close();
  });

  it("creates a session on load and returns it afterwards", async () => {
    const store = await open();
    const created = await store.load("s1", { userId: "alice", projectId: "shop" });
    expect(created).toMatchObject({
      sessionId: "s1",
      userId: "alice",
      projectId: "shop",
      messageCount: 0,
      activeCapabilities: [],
      contextData: {},
    });

    const again = await store.load("s1", { userId: "bob", projectId: "other" });
    expect(again.userId).toBe("alice");
    expect(await store.get("s1")).toEqual(created);
    await store.close();
  });

  it("counts sessions active since a point in time", async () => {
    const store = await open();
    const base = newSessionContext("old");
    await store.save({ ...base, lastActivity: 1_000 });
    await store.save({ ...base, sessionId: "recent", lastActivity: 5_000 });
    await store.save({ ...base, sessionId: "edge", lastActivity: 3_000 });

    expect(await store.countActive(3_000)).toBe(2);
    expect(await store.countActive(10_000)).toBe(0);
    await store.close();
  });

  it("uses default owner ids", async () => {
    const store = await open();
    const created = await store.load("s1");
    expect([created.userId, created.projectId]).toEqual(["default_user", "default_project"]);
    await store.close();
  });

  it("appends messages and returns the recent ones oldest first", async () => {
    const store = await open();
    for (const content of ["one", "two", "three"]) {
      await store.appendMessage("s1", createMessage("s1", "user", content));
    }

    expect((await store.history("s1")).map((m) => m.content)).toEqual(["one", "two", "three"]);
    expect((await store.history("s1", 2)).map((m) => m.content)).toEqual(["two", "three"]);
    expect(await store.history("s1", 0)).toEqual([]);
    expect((await store.get("s1"))?.messageCount).toBe(3);
    await store.close();
  });

  it("keeps message fields intact", async () => {
    const store = await open();
    const message = createMessage("s1", "agent", "done", { taskId: "t1", steps: ["a"] });
    await store.appendMessage("s1", message);
    expect(await store.history("s1")).toEqual([message]);
    await store.close();
  });

  it("limits history to the configured default", async () => {
    configure({ limits: { historyLimit: 2 } });
    const store = await open();
    for (const content of ["a", "b", "c"]) {
      await store.appendMessage("s1", createMessage("s1", "user", content));
    }
    expect((await store.history("s1")).map((m) => m.content)).toEqual(["b", "c"]);
    await store.close();
  });

  it("rejects empty messages", async () => {
    const store = await open();
    await expect(store.appendMessage("s1", createMessage("s1", "user", "  "))).rejects.toBeInstanceOf(ValidationError);
    expect(await store.get("s1")).toBeUndefined();
    await store.close();
  });

  it("never moves lastActivity backwards", async () => {
    const store = await open();
    await store.appendMessage("s1", { ...createMessage("s1", "user", "new"), timestamp: 5_000_000_000_000 });
    await store.appendMessage("s1", { ...createMessage("s1", "user", "old"), timestamp: 1 });
    expect((await store.get("s1"))?.lastActivity).toBe(5_000_000_000_000);
    await store.close();
  });

  it("counts every concurrent append", async () => {
    const store = await open();
    await Promise.all(
      Array.from({ length: 25 }, (_, i) => store.appendMessage("s1", createMessage("s1", "user", `m${i}`))),
    );
    expect((await store.get("s1"))?.messageCount).toBe(25);
    expect(await store.history("s1", 100)).toHaveLength(25);
    await store.close();
  });

  it("applies updates atomically", async () => {
    const store = await open();
    await store.load("s1");
    await Promise.all(
      Array.from({ length: 10 }, () =>
        store.update("s1", (ctx) => ({
          ...ctx,
          contextData: { ...ctx.contextData, hits: Number(ctx.contextData.hits ?? 0) + 1 },
        })),
      ),
    );
    expect((await store.get("s1"))?.contextData).toEqual({ hits: 10 });
    await store.close();
  });

  it("keeps the current context when an update returns nothing", async () => {
    const store = await open();
    const updated = await store.update("s2", () => undefined);
    expect(updated.sessionId).toBe("s2");
    expect(await store.get("s2")).toEqual(updated);
    await store.close();
  });

  it("saves a full context", async () => {
    const store = await open();
    const ctx = await store.load("s1");
    await store.save({ ...ctx, activeCapabilities: ["code", "testing"], contextData: { lastTaskId: "t1" } });
    expect(await store.get("s1")).toMatchObject({ activeCapabilities: ["code", "testing"], contextData: { lastTaskId: "t1" } });
    await store.close();
  });

  it("hands out copies", async () => {
    const store = await open();
    const ctx = await store.load("s1");
    ctx.contextData.mutated = true;
    expect((await store.get("s1"))?.contextData).toEqual({});
    await store.close();
  });
});

describe("SqliteSessionStore", () => {
  it("fails clearly before initialize", async () => {
    const store = new SqliteSessionStore(":memory:");
    await expect(store.get("s1")).rejects.toThrow("SqliteSessionStore used before initialize()");
  });
});
