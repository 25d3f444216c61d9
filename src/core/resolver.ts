/**
 * Conflict Resolver / Rescheduler
 *
 * Repairs a working schedule after an event invalidated some assignments.
 * Every affected task walks Stable -> AtRisk -> Repairing -> Resolved | Escalated.
 * Only the affected tasks, and dependents whose precedence breaks as a result,
 * are re-placed; unrelated assignments are never moved.
 */

import type { Logger } from "pino";
import type {
  InfeasibilityReason,
  Placement,
  RepairState,
  TaskRecord,
} from "../types/index.js";
import { EscalatedError } from "./errors.js";
import { findPlacement, lowerBoundFor } from "./solver.js";
import type { PlacementContext, PlacementResult } from "./solver.js";
import { compareTaskPriority } from "./tasks.js";

const TRANSITIONS: Readonly<Record<RepairState, readonly RepairState[]>> = {
  Stable: ["AtRisk"],
  AtRisk: ["Repairing"],
  Repairing: ["Resolved", "Escalated"],
  // A resolved task goes back at risk when a predecessor is re-placed after it.
  Resolved: ["AtRisk"],
  Escalated: [],
};

export class RepairTracker {
  private readonly histories = new Map<string, RepairState[]>();

  state(taskId: string): RepairState {
    const history = this.histories.get(taskId);
    return history ? history[history.length - 1] : "Stable";
  }

  transition(taskId: string, to: RepairState): void {
    const from = this.state(taskId);
    if (!TRANSITIONS[from].includes(to)) {
      throw new Error(`Illegal repair transition for task ${taskId}: ${from} -> ${to}`);
    }
    const history = this.histories.get(taskId) ?? ["Stable"];
    history.push(to);
    this.histories.set(taskId, history);
  }

  history(taskId: string): RepairState[] {
    return [...(this.histories.get(taskId) ?? ["Stable"])];
  }

  taskIds(): string[] {
    return [...this.histories.keys()];
  }
}

export interface TaskRepairOutcome {
  taskId: string;
  transitions: RepairState[];
  finalState: RepairState;
  previous: Placement | null;
  next: Placement | null;
  cause: InfeasibilityReason | null;
}

export interface RepairResult {
  tasks: TaskRepairOutcome[];
  escalation: EscalatedError | null;
}

export interface ResolverOptions {
  timeLimitMs: number;
  maxCascade: number;
  logger: Logger;
  now?: () => number;
}

export class ConflictResolver {
  private readonly log: Logger;

  constructor(private readonly options: ResolverOptions) {
    this.log = options.logger.child({ component: "resolver" });
  }

  /**
   * Removes the `atRisk` tasks from the timeline and re-places them, then any
   * placed dependents their new placement pushes out of order. `floors` pins
   * a minimum start per task (a delayed task keeps its original start).
   */
  repair(
    ctx: PlacementContext,
    atRisk: readonly string[],
    floors: ReadonlyMap<string, number> = new Map()
  ): RepairResult {
    const now = this.options.now ?? Date.now;
    const started = now();
    const tracker = new RepairTracker();
    const previous = new Map<string, Placement | null>();
    const next = new Map<string, Placement>();
    const causes = new Map<string, InfeasibilityReason>();
    const pending = new Set<string>();

    const putAtRisk = (taskId: string): void => {
      if (!previous.has(taskId)) previous.set(taskId, ctx.timeline.placementOf(taskId));
      ctx.timeline.removeTask(taskId);
      next.delete(taskId);
      tracker.transition(taskId, "AtRisk");
      pending.add(taskId);
    };

    for (const taskId of new Set(atRisk)) putAtRisk(taskId);
    this.log.info({ atRisk: [...pending] }, "repair started");

    let replaced = 0;
    while (pending.size > 0) {
      const task = [...pending]
        .map((id) => ctx.tasks.get(id))
        .filter((t) => t.predecessors.every((p) => !pending.has(p)))
        .sort(compareTaskPriority)[0];
      if (!task) {
        throw new Error(`No repairable task among ${[...pending].join(", ")}`);
      }
      pending.delete(task.id);
      tracker.transition(task.id, "Repairing");

      const attempt = this.attempt(task, ctx, floors, replaced, now() - started);
      if (attempt.ok) {
        ctx.timeline.add(attempt.assignments);
        ctx.tasks.setStatus(task.id, "scheduled");
        tracker.transition(task.id, "Resolved");
        next.set(task.id, attempt.placement);
        replaced++;

        for (const dependent of ctx.tasks.dependentsOf(task.id)) {
          const placement = ctx.timeline.placementOf(dependent);
          if (placement && placement.start < attempt.placement.end) putAtRisk(dependent);
        }
      } else {
        tracker.transition(task.id, "Escalated");
        ctx.tasks.setStatus(task.id, "escalated");
        causes.set(task.id, { taskId: task.id, constraint: attempt.constraint });
        this.log.warn({ task: task.id, constraint: attempt.constraint }, "task escalated");

        for (const dependent of ctx.tasks.dependentsOf(task.id)) {
          if (ctx.timeline.hasTask(dependent)) putAtRisk(dependent);
        }
      }
    }

    const tasks = tracker.taskIds().map((taskId) => {
      const transitions = tracker.history(taskId);
      return {
        taskId,
        transitions,
        finalState: transitions[transitions.length - 1],
        previous: previous.get(taskId) ?? null,
        next: next.get(taskId) ?? null,
        cause: causes.get(taskId) ?? null,
      };
    });

    this.log.info(
      { resolved: replaced, escalated: causes.size, elapsedMs: now() - started },
      "repair finished"
    );

    return {
      tasks,
      escalation: causes.size > 0 ? new EscalatedError([...causes.values()]) : null,
    };
  }

  /**
   * Outcomes for tasks an eviction moved while another task was inserted.
   * Backtracking re-places every evicted task or undoes itself, so all of
   * them end Resolved.
   */
  displaced(
    ctx: PlacementContext,
    before: ReadonlyMap<string, Placement>,
    insertedId: string
  ): RepairResult {
    const tracker = new RepairTracker();
    const tasks: TaskRepairOutcome[] = [];

    for (const [taskId, previous] of before) {
      if (taskId === insertedId) continue;
      const current = ctx.timeline.placementOf(taskId);
      if (
        current !== null &&
        current.start === previous.start &&
        current.resourceIds.join() === previous.resourceIds.join()
      ) {
        continue;
      }
      tracker.transition(taskId, "AtRisk");
      tracker.transition(taskId, "Repairing");
      tracker.transition(taskId, "Resolved");
      tasks.push({
        taskId,
        transitions: tracker.history(taskId),
        finalState: "Resolved",
        previous,
        next: current,
        cause: null,
      });
    }

    if (tasks.length > 0) {
      this.log.info({ inserted: insertedId, moved: tasks.map((t) => t.taskId) }, "urgent insertion displaced tasks");
    }
    return { tasks, escalation: null };
  }

  private attempt(
    task: TaskRecord,
    ctx: PlacementContext,
    floors: ReadonlyMap<string, number>,
    replaced: number,
    elapsedMs: number
  ): PlacementResult {
    const stop = (detail: string): PlacementResult => ({
      ok: false,
      constraint: { kind: "time_limit", resourceType: null, detail },
    });

    if (elapsedMs > this.options.timeLimitMs) {
      return stop(`repair time limit of ${this.options.timeLimitMs} ms reached`);
    }
    if (replaced >= this.options.maxCascade) {
      return stop(`repair cascade limit of ${this.options.maxCascade} tasks reached`);
    }

    const lower = lowerBoundFor(task, ctx);
    if (lower === null) {
      return {
        ok: false,
        constraint: {
          kind: "predecessor",
          resourceType: null,
          detail: "a predecessor lost its placement",
        },
      };
    }
    return findPlacement(task, Math.max(lower, floors.get(task.id) ?? 0), ctx);
  }
}
