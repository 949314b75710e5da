import { describe, expect, it } from "vitest";
import { ValidationError } from "../src/errors.js";
import { FunctionWorker } from "../src/workers/function-worker.js";
import { CapabilityRegistry } from "../src/workers/registry.js";
import type { Worker } from "../src/workers/worker.js";
import { defaultDescriptor } from "../src/workers/worker.js";
import { echoWorker, makeRequest } from "./helpers/fixtures.js";

describe("CapabilityRegistry", () => {
  it("keeps several workers per capability in registration order", () => {
    const registry = new CapabilityRegistry();
    registry.register(echoWorker("coder-a", "code"));
    registry.register(echoWorker("tester", "testing"));
    registry.register(echoWorker("coder-b", "code"));

    expect(registry.list("code").map((w) => w.name)).toEqual(["coder-a", "coder-b"]);
    expect(registry.count("code")).toBe(2);
    expect(registry.count("security")).toBe(0);
    expect(registry.list()).toHaveLength(3);
  });

  it("rejects a duplicate name", () => {
    const registry = new CapabilityRegistry();
    registry.register(echoWorker("coder", "code"));
    try {
      registry.register(echoWorker("coder", "testing"));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      if (err instanceof ValidationError) expect(err.code).toBe("DUPLICATE_REGISTRATION");
    }
    expect(registry.list()).toHaveLength(1);
  });

  it("unregisters by name", () => {
    const registry = new CapabilityRegistry();
    registry.register(echoWorker("coder", "code"));
    expect(registry.unregister("coder")).toBe(true);
    expect(registry.unregister("coder")).toBe(false);
    expect(registry.get("coder")).toBeUndefined();
  });

  it("finds workers whose canHandle accepts the request", () => {
    const registry = new CapabilityRegistry();
    registry.register(
      new FunctionWorker({ name: "py-only", capability: "code", fn: async () => ({}), accepts: (r) => r.context.language === "python" }),
    );
    registry.register(new FunctionWorker({ name: "tests-only", capability: "code", fn: async () => ({}), intents: ["testing"] }));
    registry.register(echoWorker("any", "code"));

    const request = makeRequest({ context: { sessionId: "s", userId: "u", projectId: "p", workspacePath: "/w", language: "python" } });
    expect(registry.findCapable(request, "code").map((w) => w.name)).toEqual(["py-only", "any"]);
    expect(registry.findCapable(request, "testing")).toEqual([]);
  });

  it("treats a throwing canHandle as not capable", () => {
    const registry = new CapabilityRegistry();
    const broken: Worker = {
      name: "broken",
      capability: "code",
      descriptor: defaultDescriptor("broken", "code"),
      canHandle: () => {
        throw new Error("bad predicate");
      },
      execute: async () => ({ status: "ok" }),
    };
    registry.register(broken);
    expect(registry.findCapable(makeRequest(), "code")).toEqual([]);
  });

  it("snapshots descriptors by capability", () => {
    const registry = new CapabilityRegistry();
    registry.register(
      new FunctionWorker({
        name: "coder",
        capability: "code",
        fn: async () => ({}),
        descriptor: { description: "Writes code", estimatedDurationSeconds: 30 },
      }),
    );

    const snapshot = registry.capabilities();
    expect(snapshot.code).toEqual([
      { name: "coder", description: "Writes code", requiredInputs: ["description"], outputs: [], estimatedDurationSeconds: 30 },
    ]);
    expect(snapshot.testing).toBeUndefined();
    expect(registry.descriptor("code")?.estimatedDurationSeconds).toBe(30);

    snapshot.code?.[0]?.outputs.push("mutated");
    expect(registry.descriptor("code")?.outputs).toEqual([]);
  });

  it("checks and caches worker health", async () => {
    const registry = new CapabilityRegistry();
    registry.register(echoWorker("plain", "code"));
    const sick: Worker = {
      name: "sick",
      capability: "testing",
      descriptor: defaultDescriptor("sick", "testing"),
      canHandle: () => true,
      execute: async () => ({ status: "ok" }),
      healthCheck: async () => {
        throw new Error("unreachable host");
      },
    };
    registry.register(sick);

    const all = await registry.checkAllHealth();
    expect(all.map((h) => [h.name, h.healthy])).toEqual([
      ["plain", true],
      ["sick", false],
    ]);
    expect(registry.getCachedHealth("sick")?.error).toBe("unreachable host");
    expect(await registry.checkHealth("missing")).toBeUndefined();
  });
});
