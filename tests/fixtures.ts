import { createLogger } from "../src/logger.js";
import type { Horizon, ResourceInput, TaskInput } from "../src/types/index.js";

export const HORIZON: Horizon = {
  start: "2025-06-02T08:00:00Z",
  end: "2025-06-02T18:00:00Z",
};

export const silentLogger = createLogger("silent");

/** ISO timestamp `hh:mm` on the horizon day. */
export function at(time: string): string {
  return `2025-06-02T${time}:00Z`;
}

export function resource(
  id: string,
  type: ResourceInput["type"] = "harvester",
  overrides: Partial<ResourceInput> = {}
): ResourceInput {
  return {
    id,
    type,
    calendar: [[HORIZON.start, HORIZON.end]],
    ...overrides,
  };
}

export function task(id: string, overrides: Partial<TaskInput> = {}): TaskInput {
  return {
    id,
    kind: "harvest",
    duration_minutes: 60,
    earliest_start: HORIZON.start,
    requirements: [{ type: "harvester", quantity: 1 }],
    ...overrides,
  };
}
