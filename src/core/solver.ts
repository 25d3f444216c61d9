/**
 * Constraint Solver
 *
 * Priority-ordered list scheduling with bounded local backtracking:
 * - Ready list: tasks whose predecessors are all placed, ordered by
 *   compareTaskPriority
 * - Each task goes to the earliest start where the requirements can be
 *   matched to distinct resources with a covering free window and spare capacity
 * - A task that does not fit may evict the single lowest-priority assignment
 *   in its way, which is then re-placed (depth-bounded)
 */

import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import type { Logger } from "pino";
import type {
  Assignment,
  BindingConstraint,
  InfeasibilityReason,
  Placement,
  Requirement,
  ResourceRecord,
  ResourceType,
  SolveMode,
  TaskRecord,
} from "../types/index.js";
import { doIntervalsOverlap } from "../util/timeUtils.js";
import { InfeasibleError, SolveCancelledError } from "./errors.js";
import type { ResourceRegistry } from "./registry.js";
import { compareTaskPriority } from "./tasks.js";
import type { TaskModel } from "./tasks.js";
import type { Timeline } from "./timeline.js";

export interface PlacementContext {
  registry: ResourceRegistry;
  tasks: TaskModel;
  timeline: Timeline;
  horizonEnd: number;
}

export type PlacementResult =
  | { ok: true; placement: Placement; assignments: Assignment[] }
  | { ok: false; constraint: BindingConstraint };

export interface SolverOptions {
  maxBacktrackDepth: number;
  timeLimitMs: number;
  mode: SolveMode;
  logger: Logger;
  signal?: AbortSignal;
  now?: () => number;
}

export interface SolveResult {
  assignments: Assignment[];
  placed: string[];
  /** Previously placed tasks whose placement changed through eviction. */
  moved: string[];
  unplaced: InfeasibilityReason[];
  elapsedMs: number;
}

interface ResourcePool {
  requirement: Requirement;
  resources: ResourceRecord[];
}

interface Slot {
  start: number;
  end: number;
  picks: { resourceId: string; units: number }[];
}

function blocked(
  kind: BindingConstraint["kind"],
  resourceType: ResourceType | null,
  detail: string
): PlacementResult {
  return { ok: false, constraint: { kind, resourceType, detail } };
}

function eligibleResources(
  requirement: Requirement,
  registry: ResourceRegistry
): ResourceRecord[] {
  return registry
    .list(requirement.type)
    .filter(
      (r) =>
        (requirement.resourceIds === null || requirement.resourceIds.includes(r.id)) &&
        r.capacity >= requirement.units
    );
}

/**
 * Earliest start allowed by the task's own window and its placed
 * predecessors, or null while a predecessor has no placement.
 */
export function lowerBoundFor(task: TaskRecord, ctx: PlacementContext): number | null {
  let lower = task.earliestStart;
  for (const predecessor of task.predecessors) {
    const end = ctx.timeline.taskEnd(predecessor);
    if (end === null) return null;
    lower = Math.max(lower, end);
  }
  return lower;
}

/**
 * Distinct resources for every requirement at [start, end), or null. The
 * most constrained requirements pick first (pinned, then more units, then
 * fewer free candidates) and earlier picks are revisited when a later
 * requirement runs out. Candidates are tried in id order.
 */
function pickResources(
  start: number,
  end: number,
  pools: readonly ResourcePool[],
  ctx: PlacementContext
): Slot["picks"] | null {
  const interval = { start, end };
  const options = pools.map(({ requirement, resources }, index) => ({
    index,
    requirement,
    free: resources.filter(
      (r) =>
        ctx.registry.isFree(r.id, interval) &&
        ctx.timeline.peakLoad(r.id, interval) + requirement.units <= r.capacity
    ),
  }));
  if (options.some((o) => o.free.length < o.requirement.quantity)) return null;

  const order = [...options].sort(
    (a, b) =>
      Number(b.requirement.resourceIds !== null) - Number(a.requirement.resourceIds !== null) ||
      b.requirement.units - a.requirement.units ||
      a.free.length - b.free.length ||
      a.index - b.index
  );

  const chosen: string[][] = options.map(() => []);
  const used = new Set<string>();

  // Within one requirement picks ascend by id, so each combination is tried once.
  const fill = (position: number, from: number): boolean => {
    if (position === order.length) return true;
    const { index, requirement, free } = order[position];
    const picked = chosen[index];
    if (picked.length === requirement.quantity) return fill(position + 1, 0);

    for (let i = from; i < free.length; i++) {
      const id = free[i].id;
      if (used.has(id)) continue;
      used.add(id);
      picked.push(id);
      if (fill(position, i + 1)) return true;
      picked.pop();
      used.delete(id);
    }
    return false;
  };

  if (!fill(0, 0)) return null;
  return options.flatMap(({ index, requirement }) =>
    chosen[index].map((resourceId) => ({ resourceId, units: requirement.units }))
  );
}

function searchSlot(
  task: TaskRecord,
  pools: readonly ResourcePool[],
  lowerBound: number,
  latestEnd: number,
  ctx: PlacementContext
): Slot | null {
  // The earliest feasible start is the lower bound itself or a point where
  // some eligible resource gains free time: a window opening or an assignment ending.
  const points = new Set<number>([lowerBound]);
  for (const { resources } of pools) {
    for (const resource of resources) {
      for (const window of resource.windows) {
        if (window.start > lowerBound) points.add(window.start);
      }
      for (const assignment of ctx.timeline.forResource(resource.id)) {
        if (assignment.end > lowerBound) points.add(assignment.end);
      }
    }
  }

  for (const start of [...points].sort((a, b) => a - b)) {
    const end = start + task.duration;
    if (end > latestEnd) break;
    const picks = pickResources(start, end, pools, ctx);
    if (picks) return { start, end, picks };
  }

  return null;
}

/** Earliest feasible placement for `task` at or after `lowerBound`. Does not mutate. */
export function findPlacement(
  task: TaskRecord,
  lowerBound: number,
  ctx: PlacementContext
): PlacementResult {
  const pools: ResourcePool[] = task.requirements.map((requirement) => ({
    requirement,
    resources: eligibleResources(requirement, ctx.registry),
  }));

  const short = pools.find((p) => p.resources.length < p.requirement.quantity);
  if (short) {
    const { requirement, resources } = short;
    return blocked(
      "resource_type",
      requirement.type,
      `needs ${requirement.quantity} ${requirement.type} resource(s) with capacity for ${requirement.units} unit(s), ${resources.length} eligible`
    );
  }

  const latestEnd = Math.min(ctx.horizonEnd, task.deadline ?? Infinity);
  const slot = searchSlot(task, pools, lowerBound, latestEnd, ctx);
  if (slot) {
    return {
      ok: true,
      placement: {
        start: slot.start,
        end: slot.end,
        resourceIds: slot.picks.map((p) => p.resourceId).sort(),
      },
      assignments: slot.picks.map((p) => ({
        taskId: task.id,
        resourceId: p.resourceId,
        start: slot.start,
        end: slot.end,
        units: p.units,
      })),
    };
  }

  if (task.deadline !== null && task.deadline < ctx.horizonEnd) {
    const late = searchSlot(task, pools, lowerBound, ctx.horizonEnd, ctx);
    if (late) {
      return blocked(
        "deadline",
        null,
        `earliest feasible slot ${late.start}-${late.end} min ends after deadline ${task.deadline} min`
      );
    }
  }

  const bottleneck = pools.find(
    (p) => searchSlot(task, [p], lowerBound, latestEnd, ctx) === null
  );
  const type = bottleneck?.requirement.type ?? null;
  return blocked(
    "capacity",
    type,
    `no common ${task.duration} min window with free capacity${type ? ` on ${type} resources` : ""} between ${lowerBound} and ${latestEnd} min`
  );
}

export class ConstraintSolver {
  private readonly log: Logger;

  constructor(private readonly options: SolverOptions) {
    this.log = options.logger.child({ component: "solver" });
  }

  /**
   * Places every task in `batch` onto `ctx.timeline`. In strict mode the
   * first infeasible task aborts the solve with InfeasibleError; the caller
   * discards the working timeline, so nothing is committed.
   */
  async solve(batch: readonly string[], ctx: PlacementContext): Promise<SolveResult> {
    const now = this.options.now ?? Date.now;
    const started = now();
    const before = new Map<string, Placement>();
    for (const assignment of ctx.timeline.all()) {
      const placement = ctx.timeline.placementOf(assignment.taskId);
      if (placement) before.set(assignment.taskId, placement);
    }

    this.log.info(
      { batch: batch.length, mode: this.options.mode, committed: before.size },
      "solve started"
    );

    const unscheduled = new Set(batch);
    const placed: string[] = [];
    const unplaced: InfeasibilityReason[] = [];

    while (unscheduled.size > 0) {
      if (this.options.signal?.aborted) {
        this.log.info({ placed: placed.length }, "solve cancelled");
        throw new SolveCancelledError();
      }

      if (now() - started > this.options.timeLimitMs) {
        for (const id of [...unscheduled].sort()) {
          unplaced.push({
            taskId: id,
            constraint: {
              kind: "time_limit",
              resourceType: null,
              detail: `solve time limit of ${this.options.timeLimitMs} ms reached`,
            },
          });
        }
        break;
      }

      const remaining = [...unscheduled].map((id) => ctx.tasks.get(id)).sort(compareTaskPriority);
      const orphan = remaining.find((t) =>
        t.predecessors.some((p) => !unscheduled.has(p) && !ctx.timeline.hasTask(p))
      );
      if (orphan) {
        const missing = orphan.predecessors.filter(
          (p) => !unscheduled.has(p) && !ctx.timeline.hasTask(p)
        );
        unscheduled.delete(orphan.id);
        unplaced.push({
          taskId: orphan.id,
          constraint: {
            kind: "predecessor",
            resourceType: null,
            detail: `predecessor(s) ${missing.join(", ")} have no placement`,
          },
        });
        if (this.options.mode === "strict") break;
        continue;
      }

      const next = remaining.find((t) => t.predecessors.every((p) => ctx.timeline.hasTask(p)));
      if (!next) {
        throw new Error(`No ready task among ${remaining.map((t) => t.id).join(", ")}`);
      }

      const result = this.placeWithBacktracking(next, ctx, this.options.maxBacktrackDepth);
      unscheduled.delete(next.id);

      if (result.ok) {
        placed.push(next.id);
      } else {
        this.log.warn({ task: next.id, constraint: result.constraint }, "task is infeasible");
        unplaced.push({ taskId: next.id, constraint: result.constraint });
        if (this.options.mode === "strict") break;
      }

      await yieldToEventLoop();
    }

    if (this.options.mode === "strict" && unplaced.length > 0) {
      throw new InfeasibleError(unplaced);
    }

    const moved = [...before.entries()]
      .filter(([taskId, previous]) => {
        const current = ctx.timeline.placementOf(taskId);
        return (
          current === null ||
          current.start !== previous.start ||
          current.resourceIds.join() !== previous.resourceIds.join()
        );
      })
      .map(([taskId]) => taskId)
      .sort();

    const elapsedMs = now() - started;
    this.log.info(
      { placed: placed.length, moved: moved.length, unplaced: unplaced.length, elapsedMs },
      "solve finished"
    );

    return {
      assignments: ctx.timeline.all(),
      placed,
      moved,
      unplaced,
      elapsedMs,
    };
  }

  /**
   * Places `task` on the timeline, evicting and re-placing lower-priority
   * work when `depth` allows. On failure the timeline is left as it was.
   */
  placeWithBacktracking(
    task: TaskRecord,
    ctx: PlacementContext,
    depth: number
  ): PlacementResult {
    const lower = lowerBoundFor(task, ctx);
    if (lower === null) {
      return blocked("predecessor", null, "a predecessor has no placement");
    }

    const direct = findPlacement(task, lower, ctx);
    if (direct.ok) {
      ctx.timeline.add(direct.assignments);
      return direct;
    }
    if (depth <= 0 || direct.constraint.kind === "resource_type") return direct;

    const victim = this.selectVictim(task, lower, ctx);
    if (victim === null) return direct;

    const checkpoint = ctx.timeline.checkpoint();
    const evicted = ctx.tasks.topologicalOrder([
      victim,
      ...ctx.tasks.descendantsOf(victim).filter((id) => ctx.timeline.hasTask(id)),
    ]);
    for (const id of evicted) ctx.timeline.removeTask(id);
    this.log.debug({ task: task.id, victim, evicted, depth }, "evicting to make room");

    const retry = findPlacement(task, lower, ctx);
    if (!retry.ok) {
      ctx.timeline.restore(checkpoint);
      return direct;
    }
    ctx.timeline.add(retry.assignments);

    for (const id of evicted) {
      const replaced = this.placeWithBacktracking(ctx.tasks.get(id), ctx, depth - 1);
      if (!replaced.ok) {
        this.log.debug({ task: task.id, victim, failed: id }, "backtrack undone");
        ctx.timeline.restore(checkpoint);
        return direct;
      }
    }

    return retry;
  }

  /**
   * Lowest-priority task ranked after `task` that holds one of its eligible
   * resources inside the window it could use. Ancestors are never evicted.
   */
  private selectVictim(
    task: TaskRecord,
    lowerBound: number,
    ctx: PlacementContext
  ): string | null {
    const window = {
      start: lowerBound,
      end: Math.min(ctx.horizonEnd, task.deadline ?? Infinity),
    };
    const ancestors = ctx.tasks.ancestorsOf(task.id);
    const candidates = new Map<string, TaskRecord>();

    for (const requirement of task.requirements) {
      for (const resource of eligibleResources(requirement, ctx.registry)) {
        for (const assignment of ctx.timeline.forResource(resource.id)) {
          if (
            assignment.taskId === task.id ||
            ancestors.has(assignment.taskId) ||
            !doIntervalsOverlap(assignment, window)
          ) {
            continue;
          }
          const other = ctx.tasks.get(assignment.taskId);
          if (compareTaskPriority(task, other) < 0) candidates.set(other.id, other);
        }
      }
    }

    const ranked = [...candidates.values()].sort(compareTaskPriority);
    return ranked.length > 0 ? ranked[ranked.length - 1].id : null;
  }
}
