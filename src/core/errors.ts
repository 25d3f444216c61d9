import type { Assignment, InfeasibilityReason, Interval } from "../types/index.js";

export type SchedulingErrorCode =
  | "VALIDATION_ERROR"
  | "CYCLIC_DEPENDENCY"
  | "RESOURCE_CONFLICT"
  | "INFEASIBLE"
  | "ESCALATED"
  | "NOT_FOUND"
  | "SOLVE_CANCELLED";

/**
 * Base class for every failure the engine reports to its callers.
 * `why` holds one human-readable line per cause, matching the API error body.
 */
export abstract class SchedulingError extends Error {
  abstract readonly code: SchedulingErrorCode;
  readonly why: string[];

  constructor(message: string, why: string[] = []) {
    super(message);
    this.name = new.target.name;
    this.why = why;
  }
}

export class ValidationError extends SchedulingError {
  readonly code = "VALIDATION_ERROR";
}

export class NotFoundError extends SchedulingError {
  readonly code = "NOT_FOUND";

  constructor(
    readonly entity: "resource" | "task" | "snapshot",
    readonly id: string
  ) {
    super(`Unknown ${entity}: ${id}`);
  }
}

export class CyclicDependencyError extends SchedulingError {
  readonly code = "CYCLIC_DEPENDENCY";

  /** Task ids along the cycle; the first id is repeated at the end. */
  constructor(readonly cycle: string[]) {
    super("Cyclic dependency", [`Cycle: ${cycle.join(" -> ")}`]);
  }
}

export class ResourceConflictError extends SchedulingError {
  readonly code = "RESOURCE_CONFLICT";

  constructor(
    readonly resourceId: string,
    readonly interval: Interval,
    readonly conflicts: readonly Assignment[]
  ) {
    super(
      `Resource ${resourceId} is committed during ${interval.start}-${interval.end}`,
      conflicts.map(
        (a) => `Task ${a.taskId} holds ${resourceId} at ${a.start}-${a.end} min`
      )
    );
  }
}

export class InfeasibleError extends SchedulingError {
  readonly code = "INFEASIBLE";

  constructor(readonly reasons: readonly InfeasibilityReason[]) {
    super(
      reasons.length > 0
        ? `Cannot place task ${reasons[0].taskId}`
        : "Cannot place batch",
      reasons.map(
        (r) => `Task ${r.taskId} (${r.constraint.kind}): ${r.constraint.detail}`
      )
    );
  }

  get taskId(): string | null {
    return this.reasons[0]?.taskId ?? null;
  }
}

export class EscalatedError extends SchedulingError {
  readonly code = "ESCALATED";

  constructor(readonly reasons: readonly InfeasibilityReason[]) {
    super(
      `Repair escalated ${reasons.length} task(s)`,
      reasons.map(
        (r) => `Task ${r.taskId} (${r.constraint.kind}): ${r.constraint.detail}`
      )
    );
  }

  get taskIds(): string[] {
    return this.reasons.map((r) => r.taskId);
  }
}

export class SolveCancelledError extends SchedulingError {
  readonly code = "SOLVE_CANCELLED";

  constructor() {
    super("Solve cancelled", ["The in-flight solve was aborted; no changes were committed"]);
  }
}
