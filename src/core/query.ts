import type {
  Assignment,
  AssignmentOutput,
  Interval,
  KPIs,
  NormalizedHorizon,
  ResourceType,
  ScheduleOutput,
  ScheduleSnapshot,
} from "../types/index.js";
import { doIntervalsOverlap, formatIsoOffset, totalMinutes } from "../util/timeUtils.js";
import { NotFoundError } from "./errors.js";
import type { ResourceRegistry } from "./registry.js";
import type { TaskModel } from "./tasks.js";

/**
 * Read-only views over one committed snapshot, together with the frozen
 * registry and task model that were current when the query was opened.
 * A query never observes a repair in progress.
 */
export class ScheduleQuery {
  constructor(
    readonly snapshot: ScheduleSnapshot,
    private readonly registry: ResourceRegistry,
    private readonly tasks: TaskModel,
    private readonly horizon: NormalizedHorizon
  ) {}

  get version(): number {
    return this.snapshot.version;
  }

  all(): readonly Assignment[] {
    return this.snapshot.assignments;
  }

  byResource(resourceId: string): Assignment[] {
    this.registry.get(resourceId);
    return this.snapshot.assignments.filter((a) => a.resourceId === resourceId);
  }

  byTask(taskId: string): Assignment[] {
    const assignments = this.snapshot.assignments.filter((a) => a.taskId === taskId);
    if (assignments.length === 0 && !this.tasks.has(taskId)) {
      throw new NotFoundError("task", taskId);
    }
    return assignments;
  }

  /** Assignments overlapping the window. */
  byWindow(window: Interval): Assignment[] {
    return this.snapshot.assignments.filter((a) => doIntervalsOverlap(a, window));
  }

  /** Assignments on resources of `type`, such as a crew roster for a day. */
  byResourceType(type: ResourceType, window?: Interval): Assignment[] {
    const ids = new Set(this.registry.list(type).map((r) => r.id));
    const assignments = window ? this.byWindow(window) : this.snapshot.assignments;
    return assignments.filter((a) => ids.has(a.resourceId));
  }

  /** Percent of each resource's available unit-minutes that is assigned. */
  utilization(): Record<string, number> {
    const result: Record<string, number> = {};
    for (const resource of this.registry.list()) {
      const available = totalMinutes(resource.windows) * resource.capacity;
      const busy = this.snapshot.assignments
        .filter((a) => a.resourceId === resource.id)
        .reduce((sum, a) => sum + (a.end - a.start) * a.units, 0);
      result[resource.id] = Math.round((busy / Math.max(available, 1)) * 100);
    }
    return result;
  }

  kpis(): KPIs {
    const assignments = this.snapshot.assignments;
    const minStart = assignments.reduce((m, a) => Math.min(m, a.start), Infinity);
    const maxEnd = assignments.reduce((m, a) => Math.max(m, a.end), 0);
    const tasks = this.tasks.list();

    let tardiness = 0;
    for (const task of tasks) {
      const end = assignments.find((a) => a.taskId === task.id)?.end;
      if (end !== undefined && task.deadline !== null) {
        tardiness += Math.max(0, end - task.deadline);
      }
    }

    return {
      tardiness_minutes: tardiness,
      makespan_minutes: assignments.length > 0 ? maxEnd - minStart : 0,
      utilization: this.utilization(),
      scheduled_tasks: new Set(assignments.map((a) => a.taskId)).size,
      pending_tasks: tasks.filter((t) => t.status === "pending").length,
      escalated_tasks: tasks.filter((t) => t.status === "escalated").length,
      total_tasks: tasks.length,
    };
  }

  toOutput(assignment: Assignment): AssignmentOutput {
    return {
      task: assignment.taskId,
      kind: this.tasks.has(assignment.taskId) ? this.tasks.get(assignment.taskId).kind : null,
      resource: assignment.resourceId,
      resource_type: this.registry.get(assignment.resourceId).type,
      start: formatIsoOffset(assignment.start, this.horizon.start),
      end: formatIsoOffset(assignment.end, this.horizon.start),
      units: assignment.units,
    };
  }

  export(assignments: readonly Assignment[] = this.snapshot.assignments): ScheduleOutput {
    return {
      snapshot_version: this.snapshot.version,
      created_at: this.snapshot.createdAt,
      reason: this.snapshot.reason,
      assignments: assignments.map((a) => this.toOutput(a)),
    };
  }
}
