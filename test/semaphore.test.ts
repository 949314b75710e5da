import { describe, expect, it } from "vitest";
import { PrioritySemaphore } from "../src/engine/semaphore.js";
import { CancellationError } from "../src/errors.js";
import type { Priority } from "../src/types.js";
import { makeRequest } from "./helpers/fixtures.js";

const req = (priority: Priority, createdAt = 1) => makeRequest({ priority, createdAt });

describe("PrioritySemaphore", () => {
  it("requires a positive integer permit count", () => {
    expect(() => new PrioritySemaphore(0)).toThrow(RangeError);
    expect(() => new PrioritySemaphore(1.5)).toThrow(RangeError);
  });

  it("grants permits immediately while available", async () => {
    const sem = new PrioritySemaphore(2);
    const a = await sem.acquire(req("low"));
    await sem.acquire(req("low"));
    expect(sem.available).toBe(0);
    a();
    expect(sem.available).toBe(1);
  });

  it("serves waiters by priority", async () => {
    const sem = new PrioritySemaphore(1);
    const order: string[] = [];
    const first = await sem.acquire(req("low"));

    const waits = (["low", "critical", "medium"] as const).map((priority) =>
      sem.acquire(req(priority)).then((release) => {
        order.push(priority);
        return release;
      }),
    );
    expect(sem.waiting).toBe(3);

    first();
    const critical = await waits[1];
    expect(order).toEqual(["critical"]);
    critical();
    const medium = await waits[2];
    medium();
    const low = await waits[0];
    low();

    expect(order).toEqual(["critical", "medium", "low"]);
    expect(sem.available).toBe(1);
    expect(sem.waiting).toBe(0);
  });

  it("serves equal priorities by creation time, then arrival", async () => {
    const sem = new PrioritySemaphore(1);
    const order: string[] = [];
    const first = await sem.acquire(req("high"));

    const track = (name: string, createdAt: number) =>
      sem.acquire(req("high", createdAt)).then((release) => {
        order.push(name);
        release();
      });
    const all = Promise.all([track("late", 50), track("early-1", 10), track("early-2", 10)]);

    first();
    await all;
    expect(order).toEqual(["early-1", "early-2", "late"]);
  });

  it("drops an aborted waiter", async () => {
    const sem = new PrioritySemaphore(1);
    const held = await sem.acquire(req("low"));
    const controller = new AbortController();

    const waiting = sem.acquire(req("critical"), controller.signal);
    expect(sem.waiting).toBe(1);
    controller.abort();

    await expect(waiting).rejects.toBeInstanceOf(CancellationError);
    expect(sem.waiting).toBe(0);
    held();
    expect(sem.available).toBe(1);
  });

  it("rejects when the signal is already aborted", async () => {
    const sem = new PrioritySemaphore(1);
    await expect(sem.acquire(req("low"), AbortSignal.abort())).rejects.toBeInstanceOf(CancellationError);
    expect(sem.available).toBe(1);
  });

  it("ignores a second release", async () => {
    const sem = new PrioritySemaphore(1);
    const release = await sem.acquire(req("low"));
    release();
    release();
    expect(sem.available).toBe(1);
  });
});
