import { describe, it, expect } from "vitest";
import { ScheduleHistory } from "../../src/core/history.js";
import { ScheduleQuery } from "../../src/core/query.js";
import { ResourceRegistry } from "../../src/core/registry.js";
import { TaskModel } from "../../src/core/tasks.js";
import { NotFoundError } from "../../src/core/errors.js";
import { at, resource, task } from "../fixtures.js";

const horizon = { start: "2025-06-02T08:00:00Z", end: 600 };

function setup(): ScheduleQuery {
  const registry = new ResourceRegistry(horizon);
  registry.register(resource("H1", "harvester", { capacity: 2 }));
  registry.register(resource("V1", "vehicle", { calendar: [[at("08:00"), at("13:00")]] }));

  const tasks = new TaskModel(horizon);
  tasks.submitBatch([
    task("A", { deadline: at("09:30") }),
    task("B", { requirements: [{ type: "harvester", quantity: 1, units: 2 }] }),
    task("D", { kind: "deliver", requirements: [{ type: "vehicle", quantity: 1 }], predecessors: ["A"] }),
    task("P"),
  ]);
  tasks.setStatus("P", "escalated");

  const history = ScheduleHistory.initial(new Date("2025-06-01T12:00:00Z")).commit(
    [
      { taskId: "A", resourceId: "H1", start: 0, end: 60, units: 1 },
      { taskId: "D", resourceId: "V1", start: 60, end: 120, units: 1 },
      { taskId: "B", resourceId: "H1", start: 60, end: 120, units: 2 },
    ],
    "solve (strict): 3 task(s) placed",
    new Date("2025-06-01T12:05:00Z")
  );
  return new ScheduleQuery(history.latest, registry, tasks, horizon);
}

describe("ScheduleQuery", () => {
  it("filters by resource, task and window", () => {
    const query = setup();

    expect(query.byResource("H1").map((a) => a.taskId)).toEqual(["A", "B"]);
    expect(query.byTask("D").map((a) => a.resourceId)).toEqual(["V1"]);
    expect(query.byWindow({ start: 30, end: 60 }).map((a) => a.taskId)).toEqual(["A"]);
    expect(query.byResourceType("vehicle").map((a) => a.taskId)).toEqual(["D"]);
  });

  it("limits a resource type's assignments to a window", () => {
    const query = setup();

    expect(query.byResourceType("harvester").map((a) => a.taskId)).toEqual(["A", "B"]);
    expect(query.byResourceType("harvester", { start: 60, end: 90 }).map((a) => a.taskId)).toEqual(["B"]);
    expect(query.byResourceType("crew", { start: 0, end: 600 })).toEqual([]);
  });

  it("returns no assignments for a known but unplaced task", () => {
    expect(setup().byTask("P")).toEqual([]);
  });

  it("throws NotFound for unknown ids", () => {
    const query = setup();
    expect(() => query.byResource("X")).toThrow(NotFoundError);
    expect(() => query.byTask("X")).toThrow(NotFoundError);
  });

  it("computes utilization against available unit-minutes", () => {
    expect(setup().utilization()).toEqual({ H1: 15, V1: 20 });
  });

  it("summarizes KPIs", () => {
    expect(setup().kpis()).toEqual({
      tardiness_minutes: 0,
      makespan_minutes: 120,
      utilization: { H1: 15, V1: 20 },
      scheduled_tasks: 3,
      pending_tasks: 3,
      escalated_tasks: 1,
      total_tasks: 4,
    });
  });

  it("exports ISO-formatted assignment records", () => {
    const exported = setup().export();

    expect(exported.snapshot_version).toBe(2);
    expect(exported.created_at).toBe("2025-06-01T12:05:00.000Z");
    expect(exported.assignments[0]).toEqual({
      task: "A",
      kind: "harvest",
      resource: "H1",
      resource_type: "harvester",
      start: "2025-06-02T08:00:00.000Z",
      end: "2025-06-02T09:00:00.000Z",
      units: 1,
    });
  });
});
