import type { Assignment, Interval, Placement } from "../types/index.js";
import { doIntervalsOverlap } from "../util/timeUtils.js";

const compareIds = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Mutable working copy of a schedule, indexed by resource and by task.
 * The solver and resolver edit a Timeline; only its final contents are
 * frozen into a snapshot.
 */
export class Timeline {
  private byResource = new Map<string, Assignment[]>();
  private byTask = new Map<string, Assignment[]>();

  constructor(assignments: readonly Assignment[] = []) {
    this.add(assignments);
  }

  all(): Assignment[] {
    return [...this.byTask.values()]
      .flat()
      .sort(
        (a, b) =>
          a.start - b.start ||
          compareIds(a.taskId, b.taskId) ||
          compareIds(a.resourceId, b.resourceId)
      );
  }

  forResource(resourceId: string): readonly Assignment[] {
    return this.byResource.get(resourceId) ?? [];
  }

  forTask(taskId: string): readonly Assignment[] {
    return this.byTask.get(taskId) ?? [];
  }

  hasTask(taskId: string): boolean {
    return this.byTask.has(taskId);
  }

  placementOf(taskId: string): Placement | null {
    const assignments = this.forTask(taskId);
    if (assignments.length === 0) return null;
    return {
      start: assignments[0].start,
      end: assignments[0].end,
      resourceIds: assignments.map((a) => a.resourceId).sort(),
    };
  }

  taskEnd(taskId: string): number | null {
    return this.placementOf(taskId)?.end ?? null;
  }

  add(assignments: readonly Assignment[]): void {
    for (const assignment of assignments) {
      const copy = { ...assignment };
      const onResource = this.byResource.get(copy.resourceId) ?? [];
      onResource.push(copy);
      onResource.sort((a, b) => a.start - b.start);
      this.byResource.set(copy.resourceId, onResource);

      const onTask = this.byTask.get(copy.taskId) ?? [];
      onTask.push(copy);
      this.byTask.set(copy.taskId, onTask);
    }
  }

  removeTask(taskId: string): Assignment[] {
    const removed = this.byTask.get(taskId) ?? [];
    this.byTask.delete(taskId);
    for (const assignment of removed) {
      const onResource = (this.byResource.get(assignment.resourceId) ?? []).filter(
        (a) => a.taskId !== taskId
      );
      this.byResource.set(assignment.resourceId, onResource);
    }
    return removed;
  }

  /** Highest summed `units` held on the resource at any instant of `interval`. */
  peakLoad(resourceId: string, interval: Interval): number {
    const overlapping = this.forResource(resourceId).filter((a) =>
      doIntervalsOverlap(a, interval)
    );
    const probes = [
      interval.start,
      ...overlapping.map((a) => a.start).filter((s) => s > interval.start),
    ];
    let peak = 0;
    for (const probe of probes) {
      const load = overlapping
        .filter((a) => a.start <= probe && probe < a.end)
        .reduce((sum, a) => sum + a.units, 0);
      peak = Math.max(peak, load);
    }
    return peak;
  }

  checkpoint(): Assignment[] {
    return this.all();
  }

  restore(checkpoint: readonly Assignment[]): void {
    this.byResource.clear();
    this.byTask.clear();
    this.add(checkpoint);
  }
}
