/**
 * Scheduling Engine
 *
 * Owns one planning horizon. All writes go through a serial queue and run
 * against copies of the committed state (registry, tasks, snapshot history);
 * the copies replace the committed state in a single assignment once the
 * result has passed the schedule invariants. Reads never wait on writers.
 */

import type { Logger } from "pino";
import { DEFAULT_SCHEDULER_SETTINGS } from "../constants.js";
import type { SchedulerSettings } from "../constants.js";
import type {
  Assignment,
  AvailableSlot,
  Horizon,
  NormalizedHorizon,
  Placement,
  RepairOutcome,
  ResourceRecord,
  ResourceType,
  ScheduleEvent,
  ScheduleSnapshot,
  SolveMode,
  TaskRecord,
  TaskStatus,
} from "../types/index.js";
import { horizonSchema, intervalSchema, parseInput } from "../types/schemas.js";
import type { IntervalInput, ResourceInput, TaskInput } from "../types/schemas.js";
import { parseIsoOffset } from "../util/timeUtils.js";
import { createLogger } from "../logger.js";
import {
  EscalatedError,
  InfeasibleError,
  ResourceConflictError,
  ValidationError,
} from "./errors.js";
import { ScheduleHistory } from "./history.js";
import { findViolations } from "./invariants.js";
import { LogNotifier } from "./notifier.js";
import type { Notifier } from "./notifier.js";
import { ScheduleQuery } from "./query.js";
import { SerialQueue } from "./queue.js";
import { ResourceRegistry } from "./registry.js";
import { ConflictResolver } from "./resolver.js";
import type { RepairResult, TaskRepairOutcome } from "./resolver.js";
import { ConstraintSolver } from "./solver.js";
import type { PlacementContext, SolveResult } from "./solver.js";
import { TaskModel } from "./tasks.js";
import { Timeline } from "./timeline.js";

export interface EngineOptions {
  horizon: Horizon;
  settings?: Partial<SchedulerSettings>;
  logger?: Logger;
  notifier?: Notifier;
}

export interface SolveOptions {
  mode?: SolveMode;
  /** Defaults to every pending task. */
  taskIds?: readonly string[];
}

export interface SolveReport extends SolveResult {
  snapshotVersion: number;
}

export interface RepairReport {
  event: ScheduleEvent;
  outcome: RepairOutcome;
  tasks: TaskRepairOutcome[];
  escalation: EscalatedError | null;
  snapshotVersion: number;
}

export type OutageReport =
  | { conflict: false; resource: ResourceRecord; repair: null }
  | { conflict: true; resource: ResourceRecord; repair: RepairReport };

interface EngineState {
  readonly registry: ResourceRegistry;
  readonly tasks: TaskModel;
  readonly history: ScheduleHistory;
}

export class SchedulingEngine {
  readonly horizon: NormalizedHorizon;
  readonly settings: SchedulerSettings;
  private state: EngineState;
  private readonly root: Logger;
  private readonly log: Logger;
  private readonly notifier: Notifier;
  private readonly resolver: ConflictResolver;
  private readonly writer = new SerialQueue();
  private inFlight: AbortController | null = null;

  constructor(options: EngineOptions) {
    const horizon = parseInput(horizonSchema, options.horizon, "horizon");
    this.horizon = {
      start: horizon.start,
      end: parseIsoOffset(horizon.end, horizon.start),
    };
    this.settings = { ...DEFAULT_SCHEDULER_SETTINGS, ...options.settings };
    this.root = options.logger ?? createLogger();
    this.log = this.root.child({ component: "engine" });
    this.notifier = options.notifier ?? new LogNotifier(this.root);
    this.resolver = new ConflictResolver({
      timeLimitMs: this.settings.repairTimeLimitMs,
      maxCascade: this.settings.maxRepairCascade,
      logger: this.root,
    });
    this.state = {
      registry: new ResourceRegistry(this.horizon, this.committedOccupancy),
      tasks: new TaskModel(this.horizon),
      history: ScheduleHistory.initial(),
    };
  }

  // ========== Reads ==========

  query(version?: number): ScheduleQuery {
    const { registry, tasks, history } = this.state;
    const snapshot = version === undefined ? history.latest : history.get(version);
    return new ScheduleQuery(snapshot, registry, tasks, this.horizon);
  }

  versions(): readonly ScheduleSnapshot[] {
    return this.state.history.list();
  }

  getResource(resourceId: string): ResourceRecord {
    return this.state.registry.get(resourceId);
  }

  listResources(type?: ResourceType): ResourceRecord[] {
    return this.state.registry.list(type);
  }

  availability(type: ResourceType, start: string, end: string): AvailableSlot[] {
    return this.state.registry.query(type, {
      start: parseIsoOffset(start, this.horizon.start),
      end: parseIsoOffset(end, this.horizon.start),
    });
  }

  getTask(taskId: string): TaskRecord {
    return this.state.tasks.get(taskId);
  }

  listTasks(status?: TaskStatus): TaskRecord[] {
    return this.state.tasks.list(status);
  }

  get pendingWrites(): number {
    return this.writer.size;
  }

  // ========== Inbound: resources and tasks ==========

  registerResource(input: ResourceInput): Promise<ResourceRecord> {
    return this.writer.run(() => {
      const registry = this.state.registry.clone();
      const resource = registry.register(input);
      this.state = { ...this.state, registry };
      this.log.info({ resource: resource.id, type: resource.type }, "resource registered");
      return resource;
    });
  }

  submitTasks(inputs: readonly TaskInput[]): Promise<string[]> {
    return this.writer.run(() => {
      const tasks = this.state.tasks.clone();
      const ids = tasks.submitBatch(inputs);
      this.state = { ...this.state, tasks };
      this.log.info({ tasks: ids }, "tasks submitted");
      return ids;
    });
  }

  requeueTask(taskId: string): Promise<TaskRecord> {
    return this.writer.run(() => {
      const tasks = this.state.tasks.clone();
      const task = tasks.requeue(taskId);
      this.state = { ...this.state, tasks };
      return task;
    });
  }

  // ========== Solving ==========

  solve(options: SolveOptions = {}): Promise<SolveReport> {
    return this.writer.run(async () => {
      const tx = this.begin();
      const mode = options.mode ?? "strict";
      const batch = options.taskIds
        ? this.checkBatch(tx, options.taskIds)
        : tx.tasks.list("pending").map((t) => t.id);

      const latest = this.state.history.latest.version;
      if (batch.length === 0) {
        return { assignments: tx.timeline.all(), placed: [], moved: [], unplaced: [], elapsedMs: 0, snapshotVersion: latest };
      }

      const controller = new AbortController();
      this.inFlight = controller;
      try {
        const solver = this.createSolver(mode, controller.signal);
        const result = await solver.solve(batch, tx);
        if (result.unplaced.length > 0) {
          this.notifier.infeasible(new InfeasibleError(result.unplaced));
        }
        if (result.placed.length === 0 && result.moved.length === 0) {
          return { ...result, snapshotVersion: latest };
        }
        const snapshot = this.commit(tx, `solve (${mode}): ${result.placed.length} task(s) placed`);
        return { ...result, snapshotVersion: snapshot.version };
      } catch (error) {
        if (error instanceof InfeasibleError) this.notifier.infeasible(error);
        throw error;
      } finally {
        this.inFlight = null;
      }
    });
  }

  /** Aborts the solve currently running, if any. Queued solves are unaffected. */
  cancelSolve(): boolean {
    if (!this.inFlight) return false;
    this.inFlight.abort();
    return true;
  }

  // ========== Events ==========

  /**
   * Revokes availability. When committed work sits in the interval the
   * registry refuses with ResourceConflictError and the outage is applied
   * together with a repair of the affected tasks.
   */
  reportOutage(resourceId: string, input: IntervalInput): Promise<OutageReport> {
    return this.writer.run(() => {
      const interval = this.toInterval(input, "outage");
      const tx = this.begin();
      try {
        const resource = tx.registry.markUnavailable(resourceId, interval);
        this.state = { ...this.state, registry: tx.registry.clone(this.committedOccupancy) };
        this.log.info({ resource: resourceId, interval }, "outage recorded");
        return { conflict: false, resource, repair: null };
      } catch (error) {
        if (!(error instanceof ResourceConflictError)) throw error;
        this.log.info(
          { resource: resourceId, interval, conflicts: error.conflicts.length },
          "outage conflicts with committed work; repairing"
        );
        const resource = tx.registry.markUnavailable(resourceId, interval, { force: true });
        const result = this.resolver.repair(tx, error.conflicts.map((a) => a.taskId));
        const repair = this.finishRepair(tx, { type: "resource_outage", resourceId, interval }, result);
        return { conflict: true, resource, repair };
      }
    });
  }

  restoreAvailability(resourceId: string, input: IntervalInput): Promise<ResourceRecord> {
    return this.writer.run(() => {
      const interval = this.toInterval(input, "availability window");
      const registry = this.state.registry.clone();
      const resource = registry.restoreAvailability(resourceId, interval);
      this.state = { ...this.state, registry };
      return resource;
    });
  }

  /** Removes the task and its assignments; dependents only lose the edge. */
  cancelTask(taskId: string): Promise<RepairReport> {
    return this.writer.run(() => {
      const tx = this.begin();
      tx.tasks.get(taskId);
      const removed = tx.timeline.removeTask(taskId);
      tx.tasks.remove(taskId);
      this.log.info({ task: taskId, assignments: removed.length }, "task cancelled");

      const event: ScheduleEvent = { type: "task_cancelled", taskId };
      if (removed.length === 0) {
        this.state = { ...this.state, tasks: tx.tasks };
        return this.report(event, { tasks: [], escalation: null }, this.state.history.latest.version);
      }
      return this.finishRepair(tx, event, { tasks: [], escalation: null });
    });
  }

  /**
   * Submits and immediately places a task, evicting lower-priority work if
   * needed. Fails with InfeasibleError, changing nothing, when it cannot fit.
   */
  insertUrgentTask(input: TaskInput): Promise<RepairReport> {
    return this.writer.run(() => {
      const tx = this.begin();
      const taskId = tx.tasks.submit(input);
      const before = new Map<string, Placement>();
      for (const task of tx.tasks.list("scheduled")) {
        const placement = tx.timeline.placementOf(task.id);
        if (placement) before.set(task.id, placement);
      }

      const solver = this.createSolver("strict");
      const result = solver.placeWithBacktracking(tx.tasks.get(taskId), tx, this.settings.maxBacktrackDepth);
      if (!result.ok) {
        const error = new InfeasibleError([{ taskId, constraint: result.constraint }]);
        this.notifier.infeasible(error);
        throw error;
      }

      const displaced = this.resolver.displaced(tx, before, taskId);
      return this.finishRepair(tx, { type: "urgent_task", taskId }, displaced);
    });
  }

  /**
   * A running task overruns by `delayMinutes`. It keeps its start if the
   * longer interval still fits, otherwise it is re-placed no earlier than
   * that start, and dependents it now overlaps are repaired in turn.
   */
  reportDelay(taskId: string, delayMinutes: number): Promise<RepairReport> {
    return this.writer.run(() => {
      if (!Number.isInteger(delayMinutes) || delayMinutes <= 0) {
        throw new ValidationError("Invalid delay", ["delay_minutes must be a positive integer"]);
      }
      const tx = this.begin();
      tx.tasks.extendDuration(taskId, delayMinutes);
      const event: ScheduleEvent = { type: "task_delayed", taskId, delayMinutes };

      const placement = tx.timeline.placementOf(taskId);
      if (!placement) {
        this.state = { ...this.state, tasks: tx.tasks };
        return this.report(event, { tasks: [], escalation: null }, this.state.history.latest.version);
      }

      const result = this.resolver.repair(tx, [taskId], new Map([[taskId, placement.start]]));
      return this.finishRepair(tx, event, result);
    });
  }

  // ========== Versions ==========

  /**
   * Re-commits an older snapshot as a new version, provided it still fits
   * the current resources and tasks.
   */
  rollback(version: number): Promise<ScheduleSnapshot> {
    return this.writer.run(() => {
      const target = this.state.history.get(version);
      const missing = [...new Set(target.assignments.map((a) => a.taskId))].filter(
        (id) => !this.state.tasks.has(id)
      );
      if (missing.length > 0) {
        throw new ValidationError(
          `Snapshot ${version} references cancelled tasks`,
          missing.map((id) => `task ${id} no longer exists`)
        );
      }

      const blocked = target.assignments.filter(
        (a) => !this.state.registry.isFree(a.resourceId, a)
      );
      if (blocked.length > 0) {
        const resourceId = blocked[0].resourceId;
        throw new ResourceConflictError(
          resourceId,
          blocked[0],
          blocked.filter((a) => a.resourceId === resourceId)
        );
      }

      const tx = this.begin(target.assignments);
      const violations = findViolations(target.assignments, tx.registry, tx.tasks);
      if (violations.length > 0) {
        throw new ValidationError(`Snapshot ${version} no longer fits the task graph`, violations);
      }
      for (const task of tx.tasks.list()) {
        if (tx.timeline.hasTask(task.id)) tx.tasks.setStatus(task.id, "scheduled");
        else if (task.status === "scheduled") tx.tasks.setStatus(task.id, "pending");
      }
      return this.commit(tx, `rollback to version ${version}`);
    });
  }

  discardVersion(version: number): Promise<void> {
    return this.writer.run(() => {
      this.state = { ...this.state, history: this.state.history.discard(version) };
    });
  }

  // ========== Internals ==========

  private readonly committedOccupancy = (resourceId: string): readonly Assignment[] =>
    this.state.history.latest.assignments.filter((a) => a.resourceId === resourceId);

  private begin(assignments: readonly Assignment[] = this.state.history.latest.assignments): PlacementContext {
    const timeline = new Timeline(assignments);
    return {
      registry: this.state.registry.clone((id) => timeline.forResource(id)),
      tasks: this.state.tasks.clone(),
      timeline,
      horizonEnd: this.horizon.end,
    };
  }

  private commit(tx: PlacementContext, reason: string): ScheduleSnapshot {
    const assignments = tx.timeline.all();
    const violations = findViolations(assignments, tx.registry, tx.tasks);
    if (violations.length > 0) {
      this.log.error({ reason, violations }, "schedule invariant violated; nothing committed");
      throw new Error(`Schedule invariant violated: ${violations[0]}`);
    }

    for (const task of tx.tasks.list()) {
      if (tx.timeline.hasTask(task.id) && task.status !== "scheduled") {
        tx.tasks.setStatus(task.id, "scheduled");
      }
    }

    const history = this.state.history.commit(assignments, reason);
    this.state = {
      registry: tx.registry.clone(this.committedOccupancy),
      tasks: tx.tasks,
      history,
    };
    this.log.info({ version: history.latest.version, assignments: assignments.length, reason }, "snapshot committed");
    return history.latest;
  }

  private finishRepair(tx: PlacementContext, event: ScheduleEvent, result: RepairResult): RepairReport {
    const snapshot = this.commit(tx, `repair after ${event.type}`);
    const report = this.report(event, result, snapshot.version);
    if (report.escalation) this.notifier.escalated(report.escalation, event);
    return report;
  }

  private report(event: ScheduleEvent, result: RepairResult, snapshotVersion: number): RepairReport {
    const outcome: RepairOutcome = result.escalation
      ? "escalated"
      : result.tasks.length > 0
        ? "resolved"
        : "noop";
    return { event, outcome, tasks: result.tasks, escalation: result.escalation, snapshotVersion };
  }

  private createSolver(mode: SolveMode, signal?: AbortSignal): ConstraintSolver {
    return new ConstraintSolver({
      maxBacktrackDepth: this.settings.maxBacktrackDepth,
      timeLimitMs: this.settings.solveTimeLimitMs,
      mode,
      signal,
      logger: this.root,
    });
  }

  private checkBatch(tx: PlacementContext, taskIds: readonly string[]): string[] {
    const notPending = taskIds
      .map((id) => tx.tasks.get(id))
      .filter((t) => t.status !== "pending");
    if (notPending.length > 0) {
      throw new ValidationError(
        "Only pending tasks can be solved",
        notPending.map((t) => `task ${t.id} is ${t.status}`)
      );
    }
    return [...new Set(taskIds)];
  }

  private toInterval(input: IntervalInput, what: string) {
    const parsed = parseInput(intervalSchema, input, what);
    return {
      start: parseIsoOffset(parsed.start, this.horizon.start),
      end: parseIsoOffset(parsed.end, this.horizon.start),
    };
  }
}
