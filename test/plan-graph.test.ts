import { describe, expect, it } from "vitest";
import { PlanningError } from "../src/errors.js";
import {
  blockedSteps,
  criticalPathSeconds,
  planProgress,
  readySteps,
  topologicalOrder,
  validatePlanGraph,
} from "../src/planner/plan-graph.js";
import { makePlan, makeStep } from "./helpers/fixtures.js";

function planningError(fn: () => void): PlanningError {
  try {
    fn();
  } catch (err) {
    if (err instanceof PlanningError) return err;
    throw err;
  }
  throw new Error("expected a PlanningError");
}

describe("validatePlanGraph", () => {
  it("accepts a diamond", () => {
    expect(() =>
      validatePlanGraph([
        makeStep("a"),
        makeStep("b", { deps: ["a"] }),
        makeStep("c", { deps: ["a"] }),
        makeStep("d", { deps: ["b", "c"] }),
      ]),
    ).not.toThrow();
  });

  it("rejects duplicate ids", () => {
    const err = planningError(() => validatePlanGraph([makeStep("a"), makeStep("a")]));
    expect(err.code).toBe("INVALID_PLAN");
    expect(err.message).toBe('Duplicate step id "a"');
  });

  it("names the edge to an unknown step", () => {
    const err = planningError(() => validatePlanGraph([makeStep("a", { deps: ["ghost"] })]));
    expect(err.code).toBe("UNKNOWN_DEPENDENCY");
    expect(err.edge).toEqual({ from: "a", to: "ghost" });
    expect(err.message).toBe('Step "a" depends on unknown step "ghost"');
  });

  it("rejects a self-dependency", () => {
    const err = planningError(() => validatePlanGraph([makeStep("a", { deps: ["a"] })]));
    expect(err.code).toBe("DEPENDENCY_CYCLE");
    expect(err.edge).toEqual({ from: "a", to: "a" });
  });

  it("rejects a cycle", () => {
    const err = planningError(() =>
      validatePlanGraph([makeStep("a", { deps: ["c"] }), makeStep("b", { deps: ["a"] }), makeStep("c", { deps: ["b"] })]),
    );
    expect(err.code).toBe("DEPENDENCY_CYCLE");
    expect(err.message).toMatch(/^Dependency cycle detected/);
  });

  it("rejects a mandatory step waiting on an optional one", () => {
    const err = planningError(() =>
      validatePlanGraph([makeStep("docs", { mandatory: false }), makeStep("publish", { deps: ["docs"] })]),
    );
    expect(err.code).toBe("INVALID_PLAN");
    expect(err.edge).toEqual({ from: "publish", to: "docs" });
  });

  it("allows an optional step to depend on a mandatory one", () => {
    expect(() => validatePlanGraph([makeStep("code"), makeStep("docs", { deps: ["code"], mandatory: false })])).not.toThrow();
  });
});

describe("topologicalOrder", () => {
  it("puts dependencies first and keeps plan order otherwise", () => {
    const order = topologicalOrder([makeStep("c", { deps: ["a", "b"] }), makeStep("a"), makeStep("b", { deps: ["a"] })]);
    expect(order.map((s) => s.id)).toEqual(["a", "b", "c"]);
  });
});

describe("criticalPathSeconds", () => {
  it("sums the longest chain, not every step", () => {
    const seconds = criticalPathSeconds([
      makeStep("a", { seconds: 10 }),
      makeStep("b", { deps: ["a"], seconds: 20 }),
      makeStep("c", { deps: ["a"], seconds: 5 }),
      makeStep("d", { deps: ["b", "c"], seconds: 1 }),
    ]);
    expect(seconds).toBe(31);
  });

  it("is zero for no steps", () => {
    expect(criticalPathSeconds([])).toBe(0);
  });
});

describe("readySteps", () => {
  it("returns pending steps whose dependencies completed", () => {
    const plan = makePlan([
      makeStep("a", { status: "completed" }),
      makeStep("b", { deps: ["a"] }),
      makeStep("c", { deps: ["b"] }),
      makeStep("d", { status: "in_progress" }),
    ]);
    expect(readySteps(plan).map((s) => s.id)).toEqual(["b"]);
  });

  it("accepts an explicit completed set", () => {
    const plan = makePlan([makeStep("a"), makeStep("b", { deps: ["x"] })]);
    expect(readySteps(plan, new Set(["x"])).map((s) => s.id)).toEqual(["a", "b"]);
  });
});

describe("blockedSteps", () => {
  it("follows failures through the graph", () => {
    const plan = makePlan([
      makeStep("a", { status: "failed" }),
      makeStep("b", { deps: ["a"] }),
      makeStep("c", { deps: ["b"] }),
      makeStep("d"),
      makeStep("e", { deps: ["d"], status: "cancelled" }),
      makeStep("f", { deps: ["e"] }),
    ]);
    expect(blockedSteps(plan).map((s) => s.id)).toEqual(["b", "c", "f"]);
  });
});

describe("planProgress", () => {
  it("counts steps by status", () => {
    const plan = makePlan([
      makeStep("a", { status: "completed" }),
      makeStep("b", { status: "failed" }),
      makeStep("c", { status: "in_progress" }),
      makeStep("d"),
    ]);
    expect(planProgress(plan)).toEqual({
      total: 4,
      completed: 1,
      failed: 1,
      cancelled: 0,
      inProgress: 1,
      pending: 1,
      percent: 25,
    });
  });

  it("is zero for an empty plan", () => {
    expect(planProgress(makePlan([])).percent).toBe(0);
  });
});
