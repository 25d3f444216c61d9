import type {
  InfeasibilityOutput,
  InfeasibilityReason,
  KPIs,
  Placement,
  PlacementOutput,
  RepairOutput,
  ResourceOutput,
  ResourceRecord,
  SolveOutput,
  TaskOutput,
  TaskRecord,
} from "../types/index.js";
import { formatInterval, formatIsoOffset } from "../util/timeUtils.js";
import type { RepairReport, SolveReport } from "./engine.js";

export function formatResource(resource: ResourceRecord, horizonStart: string): ResourceOutput {
  return {
    id: resource.id,
    type: resource.type,
    name: resource.name,
    capacity: resource.capacity,
    location: resource.location,
    available: resource.windows.map((w) => formatInterval(w, horizonStart)),
    outages: resource.outages.map((o) => formatInterval(o, horizonStart)),
  };
}

export function formatTask(task: TaskRecord, horizonStart: string): TaskOutput {
  return {
    id: task.id,
    kind: task.kind,
    status: task.status,
    duration_minutes: task.duration,
    earliest_start: formatIsoOffset(task.earliestStart, horizonStart),
    deadline: task.deadline === null ? null : formatIsoOffset(task.deadline, horizonStart),
    priority: task.priority,
    predecessors: [...task.predecessors],
  };
}

export function formatInfeasibility(reason: InfeasibilityReason): InfeasibilityOutput {
  return {
    task: reason.taskId,
    constraint: reason.constraint.kind,
    resource_type: reason.constraint.resourceType,
    detail: reason.constraint.detail,
  };
}

function formatPlacement(placement: Placement | null, horizonStart: string): PlacementOutput | null {
  if (!placement) return null;
  return {
    start: formatIsoOffset(placement.start, horizonStart),
    end: formatIsoOffset(placement.end, horizonStart),
    resources: [...placement.resourceIds],
  };
}

export function formatSolveReport(report: SolveReport, kpis: KPIs): SolveOutput {
  return {
    snapshot_version: report.snapshotVersion,
    placed: [...report.placed],
    moved: [...report.moved],
    unplaced: report.unplaced.map(formatInfeasibility),
    elapsed_ms: report.elapsedMs,
    kpis,
  };
}

export function formatRepairReport(report: RepairReport, horizonStart: string): RepairOutput {
  return {
    event: report.event.type,
    outcome: report.outcome,
    snapshot_version: report.snapshotVersion,
    tasks: report.tasks.map((t) => ({
      task: t.taskId,
      transitions: [...t.transitions],
      final_state: t.finalState,
      previous: formatPlacement(t.previous, horizonStart),
      next: formatPlacement(t.next, horizonStart),
      cause: t.cause ? formatInfeasibility(t.cause) : null,
    })),
    escalated: report.escalation ? report.escalation.taskIds : [],
  };
}
