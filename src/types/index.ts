/**
 * Type Definitions for the Farm Scheduling Engine
 *
 * NAMING CONVENTION:
 * - snake_case: Types that map to JSON (Input/Output, matches API contract)
 * - camelCase: Internal-only types (never serialized, idiomatic TypeScript)
 *
 * TIME/DURATION UNITS:
 * - All durations are in MINUTES
 * - External timestamps use ISO 8601 strings (e.g., "2025-06-02T08:00:00Z")
 * - Internal timestamps use minutes from horizon start (normalized at input)
 */

import type { RESOURCE_TYPES, TASK_KINDS, TASK_STATUSES } from "../constants.js";

export type {
  HorizonInput,
  ResourceInput,
  RequirementInput,
  TaskInput,
  IntervalInput,
  SolveRequest,
} from "./schemas.js";

// Base Types

export interface Interval {
  start: number;
  end: number;
}

export type ResourceType = (typeof RESOURCE_TYPES)[number];
export type TaskKind = (typeof TASK_KINDS)[number];
export type TaskStatus = (typeof TASK_STATUSES)[number];
export type SolveMode = "strict" | "best_effort";

export interface Horizon {
  start: string;
  end: string;
}

// Output Types (JSON - snake_case)

export interface AssignmentOutput {
  task: string;
  /** Null when the task was cancelled after this snapshot was taken. */
  kind: TaskKind | null;
  resource: string;
  resource_type: ResourceType;
  start: string;
  end: string;
  units: number;
}

export interface ScheduleOutput {
  snapshot_version: number;
  created_at: string;
  reason: string;
  assignments: AssignmentOutput[];
}

export interface KPIs {
  /** Summed minutes by which placed tasks end after their deadline. */
  tardiness_minutes: number;
  makespan_minutes: number;
  utilization: Record<string, number>;
  scheduled_tasks: number;
  pending_tasks: number;
  escalated_tasks: number;
  total_tasks: number;
}

export interface ResourceOutput {
  id: string;
  type: ResourceType;
  name: string | null;
  capacity: number;
  location: string | null;
  available: [string, string][];
  outages: [string, string][];
}

export interface TaskOutput {
  id: string;
  kind: TaskKind;
  status: TaskStatus;
  duration_minutes: number;
  earliest_start: string;
  deadline: string | null;
  priority: number;
  predecessors: string[];
}

export interface InfeasibilityOutput {
  task: string;
  constraint: BindingConstraintKind;
  resource_type: ResourceType | null;
  detail: string;
}

export interface SolveOutput {
  snapshot_version: number;
  placed: string[];
  moved: string[];
  unplaced: InfeasibilityOutput[];
  elapsed_ms: number;
  kpis: KPIs;
}

export interface TaskRepairOutput {
  task: string;
  transitions: RepairState[];
  final_state: RepairState;
  previous: PlacementOutput | null;
  next: PlacementOutput | null;
  cause: InfeasibilityOutput | null;
}

export interface PlacementOutput {
  start: string;
  end: string;
  resources: string[];
}

export interface RepairOutput {
  event: ScheduleEventType;
  outcome: RepairOutcome;
  snapshot_version: number;
  tasks: TaskRepairOutput[];
  escalated: string[];
}

// Internal Types (camelCase)

export interface NormalizedHorizon {
  start: string;
  /** Minutes from `start`. */
  end: number;
}

export interface ResourceRecord {
  id: string;
  type: ResourceType;
  name: string | null;
  capacity: number;
  location: string | null;
  /** Disjoint free windows, sorted by start. */
  windows: Interval[];
  /** Disjoint outage intervals, sorted by start. */
  outages: Interval[];
}

export interface Requirement {
  type: ResourceType;
  quantity: number;
  units: number;
  resourceIds: string[] | null;
}

export interface TaskRecord {
  id: string;
  kind: TaskKind;
  duration: number;
  earliestStart: number;
  deadline: number | null;
  requirements: Requirement[];
  predecessors: string[];
  priority: number;
  status: TaskStatus;
}

export interface Assignment {
  taskId: string;
  resourceId: string;
  start: number;
  end: number;
  units: number;
}

export interface ScheduleSnapshot {
  version: number;
  createdAt: string;
  reason: string;
  assignments: readonly Assignment[];
}

export interface Placement {
  start: number;
  end: number;
  resourceIds: string[];
}

export interface AvailableSlot {
  resource: ResourceRecord;
  interval: Interval;
}

export type BindingConstraintKind =
  | "resource_type"
  | "capacity"
  | "deadline"
  | "predecessor"
  | "time_limit";

export interface BindingConstraint {
  kind: BindingConstraintKind;
  resourceType: ResourceType | null;
  detail: string;
}

export interface InfeasibilityReason {
  taskId: string;
  constraint: BindingConstraint;
}

// Rescheduling

export type RepairState =
  | "Stable"
  | "AtRisk"
  | "Repairing"
  | "Resolved"
  | "Escalated";

export type RepairOutcome = "resolved" | "escalated" | "noop";

export type ScheduleEvent =
  | { type: "resource_outage"; resourceId: string; interval: Interval }
  | { type: "task_cancelled"; taskId: string }
  | { type: "urgent_task"; taskId: string }
  | { type: "task_delayed"; taskId: string; delayMinutes: number };

export type ScheduleEventType = ScheduleEvent["type"];
