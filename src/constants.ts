export const SCHEDULER_VERSION = "1.0.0";

export interface SchedulerSettings {
  /** Eviction depth for the solver's local backtracking. 0 disables it. */
  maxBacktrackDepth: number;
  solveTimeLimitMs: number;
  repairTimeLimitMs: number;
  /** Tasks a single repair may re-place before the rest are escalated. */
  maxRepairCascade: number;
}

export const DEFAULT_SCHEDULER_SETTINGS: SchedulerSettings = {
  maxBacktrackDepth: 2,
  solveTimeLimitMs: 30_000,
  repairTimeLimitMs: 10_000,
  maxRepairCascade: 50,
};

export const RESOURCE_TYPES = ["field", "vehicle", "harvester", "crew"] as const;

export const TASK_KINDS = ["plant", "harvest", "deliver", "treat"] as const;

export const TASK_STATUSES = ["pending", "scheduled", "escalated"] as const;
