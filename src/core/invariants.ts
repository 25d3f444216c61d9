import type { Assignment } from "../types/index.js";
import type { ResourceRegistry } from "./registry.js";
import type { TaskModel } from "./tasks.js";
import { Timeline } from "./timeline.js";

/**
 * Checks a candidate schedule against the commit invariants and returns one
 * line per violation. An empty list means the schedule may be committed.
 */
export function findViolations(
  assignments: readonly Assignment[],
  registry: ResourceRegistry,
  tasks: TaskModel
): string[] {
  const violations: string[] = [];
  const timeline = new Timeline(assignments);

  for (const a of assignments) {
    if (!tasks.has(a.taskId)) {
      violations.push(`Assignment for unknown task ${a.taskId}`);
      continue;
    }
    if (!registry.has(a.resourceId)) {
      violations.push(`Task ${a.taskId}: unknown resource ${a.resourceId}`);
      continue;
    }
    const task = tasks.get(a.taskId);
    if (a.end - a.start !== task.duration) {
      violations.push(
        `Task ${a.taskId}: interval ${a.start}-${a.end} does not match duration ${task.duration}`
      );
    }
    if (!registry.isFree(a.resourceId, a)) {
      violations.push(
        `Task ${a.taskId}: ${a.resourceId} is not available at ${a.start}-${a.end}`
      );
    }
    const resource = registry.get(a.resourceId);
    if (timeline.peakLoad(a.resourceId, a) > resource.capacity) {
      violations.push(
        `Resource ${a.resourceId}: capacity ${resource.capacity} exceeded during ${a.start}-${a.end}`
      );
    }
  }

  for (const task of tasks.list()) {
    const placement = timeline.placementOf(task.id);
    if (!placement) continue;
    for (const predecessor of task.predecessors) {
      const end = timeline.taskEnd(predecessor);
      if (end === null) {
        violations.push(`Task ${task.id}: predecessor ${predecessor} is not placed`);
      } else if (end > placement.start) {
        violations.push(
          `Task ${task.id}: starts at ${placement.start} before predecessor ${predecessor} ends at ${end}`
        );
      }
    }
  }

  return violations;
}
