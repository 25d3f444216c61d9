import { describe, it, expect } from "vitest";
import { ResourceRegistry } from "../../src/core/registry.js";
import { TaskModel } from "../../src/core/tasks.js";
import { Timeline } from "../../src/core/timeline.js";
import { ConflictResolver, RepairTracker } from "../../src/core/resolver.js";
import type { ResolverOptions } from "../../src/core/resolver.js";
import type { PlacementContext } from "../../src/core/solver.js";
import type { Assignment, ResourceInput, TaskInput } from "../../src/types/index.js";
import { at, resource, silentLogger, task } from "../fixtures.js";

const horizon = { start: "2025-06-02T08:00:00Z", end: 600 };

function context(
  resources: ResourceInput[],
  tasks: TaskInput[],
  committed: Assignment[]
): PlacementContext {
  const timeline = new Timeline(committed);
  const registry = new ResourceRegistry(horizon, (id) => timeline.forResource(id));
  for (const r of resources) registry.register(r);
  const model = new TaskModel(horizon);
  model.submitBatch(tasks);
  for (const a of committed) model.setStatus(a.taskId, "scheduled");
  return { registry, tasks: model, timeline, horizonEnd: horizon.end };
}

function resolver(overrides: Partial<ResolverOptions> = {}): ConflictResolver {
  return new ConflictResolver({
    timeLimitMs: 10_000,
    maxCascade: 50,
    logger: silentLogger,
    ...overrides,
  });
}

const deliver = (id: string, predecessors: string[]): TaskInput =>
  task(id, { kind: "deliver", requirements: [{ type: "vehicle", quantity: 1 }], predecessors });

describe("RepairTracker", () => {
  it("records legal transitions from Stable", () => {
    const tracker = new RepairTracker();
    tracker.transition("A", "AtRisk");
    tracker.transition("A", "Repairing");
    tracker.transition("A", "Resolved");
    tracker.transition("A", "AtRisk");

    expect(tracker.state("A")).toBe("AtRisk");
    expect(tracker.history("A")).toEqual(["Stable", "AtRisk", "Repairing", "Resolved", "AtRisk"]);
  });

  it("rejects illegal transitions", () => {
    const tracker = new RepairTracker();
    expect(() => tracker.transition("A", "Resolved")).toThrow(
      "Illegal repair transition for task A: Stable -> Resolved"
    );
  });

  it("treats Escalated as terminal", () => {
    const tracker = new RepairTracker();
    tracker.transition("A", "AtRisk");
    tracker.transition("A", "Repairing");
    tracker.transition("A", "Escalated");
    expect(() => tracker.transition("A", "AtRisk")).toThrow("Escalated -> AtRisk");
  });
});

describe("ConflictResolver", () => {
  it("re-places an at-risk task on another eligible resource", () => {
    const ctx = context(
      [resource("H1"), resource("H2")],
      [task("A", { duration_minutes: 180, deadline: at("13:00") })],
      [{ taskId: "A", resourceId: "H1", start: 0, end: 180, units: 1 }]
    );
    ctx.registry.markUnavailable("H1", { start: 0, end: 30 }, { force: true });

    const result = resolver().repair(ctx, ["A"]);

    expect(result.escalation).toBeNull();
    expect(result.tasks).toEqual([
      {
        taskId: "A",
        transitions: ["Stable", "AtRisk", "Repairing", "Resolved"],
        finalState: "Resolved",
        previous: { start: 0, end: 180, resourceIds: ["H1"] },
        next: { start: 0, end: 180, resourceIds: ["H2"] },
        cause: null,
      },
    ]);
  });

  it("escalates a task that misses its deadline and its placed dependents", () => {
    const ctx = context(
      [resource("H1"), resource("V1", "vehicle")],
      [task("A", { duration_minutes: 180, deadline: at("12:00") }), deliver("C", ["A"])],
      [
        { taskId: "A", resourceId: "H1", start: 0, end: 180, units: 1 },
        { taskId: "C", resourceId: "V1", start: 180, end: 240, units: 1 },
      ]
    );
    ctx.registry.markUnavailable("H1", { start: 60, end: 180 }, { force: true });

    const result = resolver().repair(ctx, ["A"]);

    expect(result.tasks.map((t) => [t.taskId, t.finalState, t.cause?.constraint.kind])).toEqual([
      ["A", "Escalated", "deadline"],
      ["C", "Escalated", "predecessor"],
    ]);
    expect(result.escalation?.taskIds).toEqual(["A", "C"]);
    expect(result.escalation?.why[0]).toBe(
      "Task A (deadline): earliest feasible slot 180-360 min ends after deadline 240 min"
    );
    expect(ctx.timeline.all()).toEqual([]);
    expect(ctx.tasks.get("A").status).toBe("escalated");
    expect(ctx.tasks.get("C").status).toBe("escalated");
  });

  it("cascades to dependents a re-placement overlaps", () => {
    const ctx = context(
      [resource("H1"), resource("V1", "vehicle")],
      [task("A"), deliver("B", ["A"])],
      [
        { taskId: "A", resourceId: "H1", start: 0, end: 60, units: 1 },
        { taskId: "B", resourceId: "V1", start: 60, end: 120, units: 1 },
      ]
    );
    ctx.tasks.extendDuration("A", 30);

    const result = resolver().repair(ctx, ["A"], new Map([["A", 0]]));

    expect(result.tasks.map((t) => [t.taskId, t.finalState, t.next])).toEqual([
      ["A", "Resolved", { start: 0, end: 90, resourceIds: ["H1"] }],
      ["B", "Resolved", { start: 90, end: 150, resourceIds: ["V1"] }],
    ]);
  });

  it("leaves dependents alone when precedence still holds", () => {
    const ctx = context(
      [resource("H1"), resource("V1", "vehicle")],
      [task("A"), deliver("B", ["A"])],
      [
        { taskId: "A", resourceId: "H1", start: 0, end: 60, units: 1 },
        { taskId: "B", resourceId: "V1", start: 200, end: 260, units: 1 },
      ]
    );
    ctx.tasks.extendDuration("A", 30);

    const result = resolver().repair(ctx, ["A"], new Map([["A", 0]]));
    expect(result.tasks.map((t) => t.taskId)).toEqual(["A"]);
  });

  it("escalates tasks beyond the cascade budget", () => {
    const ctx = context(
      [resource("H1"), resource("V1", "vehicle")],
      [task("A"), deliver("B", ["A"])],
      [
        { taskId: "A", resourceId: "H1", start: 0, end: 60, units: 1 },
        { taskId: "B", resourceId: "V1", start: 60, end: 120, units: 1 },
      ]
    );
    ctx.tasks.extendDuration("A", 30);

    const result = resolver({ maxCascade: 1 }).repair(ctx, ["A"], new Map([["A", 0]]));

    expect(result.escalation?.reasons).toEqual([
      {
        taskId: "B",
        constraint: {
          kind: "time_limit",
          resourceType: null,
          detail: "repair cascade limit of 1 tasks reached",
        },
      },
    ]);
  });

  it("escalates the rest once the repair time limit has passed", () => {
    const ctx = context(
      [resource("H1"), resource("V1", "vehicle")],
      [task("A"), deliver("B", ["A"])],
      [
        { taskId: "A", resourceId: "H1", start: 0, end: 60, units: 1 },
        { taskId: "B", resourceId: "V1", start: 60, end: 120, units: 1 },
      ]
    );
    ctx.tasks.extendDuration("A", 30);
    let clock = 0;
    const now = () => {
      const value = clock;
      clock += 6_000;
      return value;
    };

    const result = resolver({ now }).repair(ctx, ["A"], new Map([["A", 0]]));

    expect(result.tasks.map((t) => [t.taskId, t.finalState])).toEqual([
      ["A", "Resolved"],
      ["B", "Escalated"],
    ]);
    expect(result.escalation?.reasons).toEqual([
      {
        taskId: "B",
        constraint: {
          kind: "time_limit",
          resourceType: null,
          detail: "repair time limit of 10000 ms reached",
        },
      },
    ]);
    expect(ctx.tasks.get("B").status).toBe("escalated");
  });

  it("reports tasks an insertion displaced as resolved", () => {
    const ctx = context(
      [resource("H1")],
      [task("X"), task("U")],
      [
        { taskId: "U", resourceId: "H1", start: 0, end: 60, units: 1 },
        { taskId: "X", resourceId: "H1", start: 60, end: 120, units: 1 },
      ]
    );
    const before = new Map([["X", { start: 0, end: 60, resourceIds: ["H1"] }]]);

    const result = resolver().displaced(ctx, before, "U");

    expect(result.tasks).toEqual([
      {
        taskId: "X",
        transitions: ["Stable", "AtRisk", "Repairing", "Resolved"],
        finalState: "Resolved",
        previous: { start: 0, end: 60, resourceIds: ["H1"] },
        next: { start: 60, end: 120, resourceIds: ["H1"] },
        cause: null,
      },
    ]);
  });
});
