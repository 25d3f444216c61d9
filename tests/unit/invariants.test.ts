import { describe, it, expect } from "vitest";
import { findViolations } from "../../src/core/invariants.js";
import { ResourceRegistry } from "../../src/core/registry.js";
import { TaskModel } from "../../src/core/tasks.js";
import { Timeline } from "../../src/core/timeline.js";
import { at, resource, task } from "../fixtures.js";

const horizon = { start: "2025-06-02T08:00:00Z", end: 600 };

function setup() {
  const registry = new ResourceRegistry(horizon);
  registry.register(resource("H1", "harvester", { calendar: [[at("08:00"), at("12:00")]] }));
  const tasks = new TaskModel(horizon);
  tasks.submitBatch([task("A"), task("B", { predecessors: ["A"] })]);
  return { registry, tasks };
}

describe("findViolations", () => {
  it("accepts a valid schedule", () => {
    const { registry, tasks } = setup();
    expect(
      findViolations(
        [
          { taskId: "A", resourceId: "H1", start: 0, end: 60, units: 1 },
          { taskId: "B", resourceId: "H1", start: 60, end: 120, units: 1 },
        ],
        registry,
        tasks
      )
    ).toEqual([]);
  });

  it("flags capacity, precedence and availability breaches", () => {
    const { registry, tasks } = setup();
    expect(
      findViolations(
        [
          { taskId: "A", resourceId: "H1", start: 200, end: 260, units: 1 },
          { taskId: "B", resourceId: "H1", start: 200, end: 260, units: 1 },
        ],
        registry,
        tasks
      )
    ).toEqual([
      "Task A: H1 is not available at 200-260",
      "Resource H1: capacity 1 exceeded during 200-260",
      "Task B: H1 is not available at 200-260",
      "Resource H1: capacity 1 exceeded during 200-260",
      "Task B: starts at 200 before predecessor A ends at 260",
    ]);
  });

  it("flags unknown tasks and wrong durations", () => {
    const { registry, tasks } = setup();
    expect(
      findViolations(
        [
          { taskId: "Z", resourceId: "H1", start: 0, end: 60, units: 1 },
          { taskId: "A", resourceId: "H1", start: 0, end: 30, units: 1 },
        ],
        registry,
        tasks
      )
    ).toEqual(["Assignment for unknown task Z", "Task A: interval 0-30 does not match duration 60"]);
  });
});

describe("Timeline", () => {
  it("tracks peak load across staggered assignments", () => {
    const timeline = new Timeline([
      { taskId: "A", resourceId: "F1", start: 0, end: 60, units: 1 },
      { taskId: "B", resourceId: "F1", start: 30, end: 90, units: 2 },
      { taskId: "C", resourceId: "F1", start: 90, end: 120, units: 3 },
    ]);
    expect(timeline.peakLoad("F1", { start: 0, end: 120 })).toBe(3);
    expect(timeline.peakLoad("F1", { start: 0, end: 90 })).toBe(3);
    expect(timeline.peakLoad("F1", { start: 60, end: 90 })).toBe(2);
  });

  it("restores a checkpoint", () => {
    const timeline = new Timeline([{ taskId: "A", resourceId: "H1", start: 0, end: 60, units: 1 }]);
    const checkpoint = timeline.checkpoint();
    timeline.removeTask("A");
    timeline.add([{ taskId: "B", resourceId: "H1", start: 0, end: 30, units: 1 }]);
    timeline.restore(checkpoint);

    expect(timeline.hasTask("B")).toBe(false);
    expect(timeline.placementOf("A")).toEqual({ start: 0, end: 60, resourceIds: ["H1"] });
  });

  it("orders assignments by start, then by id code units", () => {
    const timeline = new Timeline([
      { taskId: "a", resourceId: "H1", start: 0, end: 60, units: 1 },
      { taskId: "B", resourceId: "H2", start: 0, end: 60, units: 1 },
      { taskId: "A", resourceId: "H1", start: 60, end: 90, units: 1 },
    ]);
    expect(timeline.all().map((a) => a.taskId)).toEqual(["B", "a", "A"]);
  });
});
