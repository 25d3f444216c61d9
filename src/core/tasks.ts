/**
 * Task Model
 *
 * Schedulable work items and the predecessor graph between them. The graph
 * is kept acyclic at submission time, so nothing downstream ever has to
 * discover a cycle.
 */

import { produce, freeze } from "immer";
import type {
  NormalizedHorizon,
  Requirement,
  TaskRecord,
  TaskStatus,
} from "../types/index.js";
import { parseInput, taskSchema } from "../types/schemas.js";
import type { ParsedTask, TaskInput } from "../types/schemas.js";
import { parseIsoOffset } from "../util/timeUtils.js";
import {
  CyclicDependencyError,
  NotFoundError,
  ValidationError,
} from "./errors.js";

type TaskState = Readonly<Record<string, TaskRecord>>;

/**
 * Scheduling order: deadline ascending (none last), priority descending,
 * earliest start ascending, then id.
 */
export function compareTaskPriority(a: TaskRecord, b: TaskRecord): number {
  const deadlineA = a.deadline ?? Infinity;
  const deadlineB = b.deadline ?? Infinity;
  if (deadlineA !== deadlineB) return deadlineA < deadlineB ? -1 : 1;
  if (a.priority !== b.priority) return b.priority - a.priority;
  if (a.earliestStart !== b.earliestStart) return a.earliestStart - b.earliestStart;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * Depth-first search along predecessor edges from `from`. Returns the path
 * `[from, ..., target]` when `target` is reachable, null otherwise.
 */
function findPredecessorPath(
  from: string,
  target: string,
  predecessorsOf: (id: string) => readonly string[]
): string[] | null {
  const parent = new Map<string, string | null>([[from, null]]);
  const stack = [from];

  while (stack.length > 0) {
    const current = stack.pop();
    if (current === undefined) break;
    if (current === target) {
      const path: string[] = [];
      for (let node: string | null = current; node !== null; node = parent.get(node) ?? null) {
        path.unshift(node);
      }
      return path;
    }
    for (const next of predecessorsOf(current)) {
      if (!parent.has(next)) {
        parent.set(next, current);
        stack.push(next);
      }
    }
  }

  return null;
}

export class TaskModel {
  private state: TaskState;

  constructor(
    private readonly horizon: NormalizedHorizon,
    state: TaskState = {}
  ) {
    this.state = freeze(state, true);
  }

  clone(): TaskModel {
    return new TaskModel(this.horizon, this.state);
  }

  submit(input: TaskInput): string {
    const [id] = this.submitBatch([input]);
    return id;
  }

  /**
   * Validates and adds a batch atomically. Members may name each other as
   * predecessors; anything else they name must already exist.
   */
  submitBatch(inputs: readonly TaskInput[]): string[] {
    const parsed = inputs.map((input, index) =>
      parseInput(taskSchema, input, `task at index ${index}`)
    );

    const batchIds = new Set<string>();
    for (const task of parsed) {
      if (this.state[task.id] || batchIds.has(task.id)) {
        throw new ValidationError(`Task ${task.id} already exists`);
      }
      batchIds.add(task.id);
    }

    const records = parsed.map((task) => this.normalize(task));

    for (const record of records) {
      const unknown = record.predecessors.filter(
        (p) => !this.state[p] && !batchIds.has(p)
      );
      if (unknown.length > 0) {
        throw new ValidationError(
          `Task ${record.id} has unknown predecessors`,
          unknown.map((p) => `predecessor ${p} does not exist`)
        );
      }
    }

    const batch = new Map(records.map((r) => [r.id, r]));
    const predecessorsOf = (id: string): readonly string[] =>
      batch.get(id)?.predecessors ?? this.state[id]?.predecessors ?? [];

    for (const record of records) {
      for (const predecessor of record.predecessors) {
        const path = findPredecessorPath(predecessor, record.id, predecessorsOf);
        if (path) throw new CyclicDependencyError([record.id, ...path]);
      }
    }

    this.state = produce(this.state, (draft) => {
      for (const record of records) draft[record.id] = record;
    });
    return records.map((r) => r.id);
  }

  get(taskId: string): TaskRecord {
    const task = this.state[taskId];
    if (!task) throw new NotFoundError("task", taskId);
    return task;
  }

  has(taskId: string): boolean {
    return taskId in this.state;
  }

  list(status?: TaskStatus): TaskRecord[] {
    return Object.values(this.state)
      .filter((t) => status === undefined || t.status === status)
      .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  }

  /** Removes the task; its dependents simply lose it as a predecessor. */
  remove(taskId: string): TaskRecord {
    const removed = this.get(taskId);
    const dependents = this.dependentsOf(taskId);
    this.state = produce(this.state, (draft) => {
      delete draft[taskId];
      for (const id of dependents) {
        draft[id].predecessors = draft[id].predecessors.filter((p) => p !== taskId);
      }
    });
    return removed;
  }

  setStatus(taskId: string, status: TaskStatus): void {
    this.get(taskId);
    this.state = produce(this.state, (draft) => {
      draft[taskId].status = status;
    });
  }

  /** Hands an escalated task back to the solver. */
  requeue(taskId: string): TaskRecord {
    const task = this.get(taskId);
    if (task.status !== "escalated") {
      throw new ValidationError(`Task ${taskId} is ${task.status}, not escalated`);
    }
    this.setStatus(taskId, "pending");
    return this.get(taskId);
  }

  extendDuration(taskId: string, minutes: number): TaskRecord {
    this.get(taskId);
    this.state = produce(this.state, (draft) => {
      draft[taskId].duration += minutes;
    });
    return this.get(taskId);
  }

  dependentsOf(taskId: string): string[] {
    return this.list()
      .filter((t) => t.predecessors.includes(taskId))
      .map((t) => t.id);
  }

  /** Transitive dependents, in breadth-first order. */
  descendantsOf(taskId: string): string[] {
    const seen = new Set<string>();
    const queue = this.dependentsOf(taskId);
    while (queue.length > 0) {
      const id = queue.shift();
      if (id === undefined || seen.has(id)) continue;
      seen.add(id);
      queue.push(...this.dependentsOf(id));
    }
    return [...seen];
  }

  ancestorsOf(taskId: string): Set<string> {
    const seen = new Set<string>();
    const stack = [...this.get(taskId).predecessors];
    while (stack.length > 0) {
      const id = stack.pop();
      if (id === undefined || seen.has(id)) continue;
      seen.add(id);
      stack.push(...(this.state[id]?.predecessors ?? []));
    }
    return seen;
  }

  /**
   * Orders `ids` so every task follows its predecessors within the set;
   * ties are broken by scheduling priority.
   */
  topologicalOrder(ids: Iterable<string>): string[] {
    const remaining = new Set(ids);
    const ordered: string[] = [];

    while (remaining.size > 0) {
      const ready = [...remaining]
        .map((id) => this.get(id))
        .filter((t) => t.predecessors.every((p) => !remaining.has(p)))
        .sort(compareTaskPriority);
      if (ready.length === 0) {
        throw new Error(`Predecessor graph contains a cycle among ${[...remaining].join(", ")}`);
      }
      ordered.push(ready[0].id);
      remaining.delete(ready[0].id);
    }

    return ordered;
  }

  private normalize(task: ParsedTask): TaskRecord {
    const requestedStart = parseIsoOffset(task.earliest_start, this.horizon.start);
    const deadline =
      task.deadline === undefined
        ? null
        : parseIsoOffset(task.deadline, this.horizon.start);

    if (deadline !== null && requestedStart > deadline) {
      throw new ValidationError(`Invalid time window for task ${task.id}`, [
        `earliest_start ${task.earliest_start} is after deadline ${task.deadline}`,
      ]);
    }
    if (deadline !== null && deadline < 0) {
      throw new ValidationError(`Invalid time window for task ${task.id}`, [
        `deadline ${task.deadline} is before the horizon start ${this.horizon.start}`,
      ]);
    }
    const earliestStart = Math.max(0, requestedStart);

    if (task.predecessors.includes(task.id)) {
      throw new CyclicDependencyError([task.id, task.id]);
    }

    const requirements: Requirement[] = task.requirements.map((r) => ({
      type: r.type,
      quantity: r.quantity,
      units: r.units,
      resourceIds: r.resource_ids ?? null,
    }));

    return {
      id: task.id,
      kind: task.kind,
      duration: task.duration_minutes,
      earliestStart,
      deadline,
      requirements,
      predecessors: [...new Set(task.predecessors)],
      priority: task.priority,
      status: "pending",
    };
  }
}
