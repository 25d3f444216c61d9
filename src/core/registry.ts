/**
 * Resource Registry
 *
 * Catalog of schedulable resources and their availability over the planning
 * horizon. State is an immer-frozen record, so `clone()` is free and a clone
 * can be mutated inside a transaction without disturbing readers of the
 * original.
 */

import { freeze, produce } from "immer";
import type {
  Assignment,
  AvailableSlot,
  Interval,
  NormalizedHorizon,
  ResourceRecord,
  ResourceType,
} from "../types/index.js";
import { resourceSchema, parseInput } from "../types/schemas.js";
import type { ResourceInput } from "../types/schemas.js";
import {
  clipToHorizon,
  combineOverlappingIntervals,
  doIntervalsOverlap,
  intersectIntervals,
  isWithinCalendarWindow,
  parseCalendarWindows,
  subtractInterval,
} from "../util/timeUtils.js";
import {
  NotFoundError,
  ResourceConflictError,
  ValidationError,
} from "./errors.js";

/** Committed assignments currently holding a resource. */
export type OccupancyLookup = (resourceId: string) => readonly Assignment[];

type RegistryState = Readonly<Record<string, ResourceRecord>>;

const noOccupancy: OccupancyLookup = () => [];

function byId(a: ResourceRecord, b: ResourceRecord): number {
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

export class ResourceRegistry {
  private state: RegistryState;

  constructor(
    private readonly horizon: NormalizedHorizon,
    private readonly occupancy: OccupancyLookup = noOccupancy,
    state: RegistryState = {}
  ) {
    this.state = freeze(state, true);
  }

  /** Copy sharing the current (frozen) state, optionally bound to another schedule. */
  clone(occupancy: OccupancyLookup = this.occupancy): ResourceRegistry {
    return new ResourceRegistry(this.horizon, occupancy, this.state);
  }

  register(input: ResourceInput): ResourceRecord {
    const parsed = parseInput(resourceSchema, input, "resource");

    if (this.state[parsed.id]) {
      throw new ValidationError(`Resource ${parsed.id} is already registered`);
    }

    const raw = parseCalendarWindows(parsed.calendar, this.horizon.start);
    const inverted = raw.filter((w) => w.end <= w.start);
    if (inverted.length > 0) {
      throw new ValidationError(
        `Invalid calendar for resource ${parsed.id}`,
        inverted.map((w) => `window ${w.start}-${w.end} min ends before it starts`)
      );
    }

    const record: ResourceRecord = {
      id: parsed.id,
      type: parsed.type,
      name: parsed.name ?? null,
      capacity: parsed.capacity,
      location: parsed.location ?? null,
      windows: clipToHorizon(combineOverlappingIntervals(raw), this.horizon.end),
      outages: [],
    };

    this.state = produce(this.state, (draft) => {
      draft[record.id] = record;
    });
    return this.get(record.id);
  }

  get(resourceId: string): ResourceRecord {
    const resource = this.state[resourceId];
    if (!resource) throw new NotFoundError("resource", resourceId);
    return resource;
  }

  has(resourceId: string): boolean {
    return resourceId in this.state;
  }

  list(type?: ResourceType): ResourceRecord[] {
    return Object.values(this.state)
      .filter((r) => type === undefined || r.type === type)
      .sort(byId);
  }

  /**
   * Free windows of every resource of `type`, intersected with `range`,
   * ordered by window start and then resource id.
   */
  query(type: ResourceType, range: Interval): AvailableSlot[] {
    const slots: AvailableSlot[] = [];
    for (const resource of this.list(type)) {
      for (const interval of intersectIntervals(resource.windows, range)) {
        slots.push({ resource, interval });
      }
    }
    return slots.sort(
      (a, b) =>
        a.interval.start - b.interval.start || byId(a.resource, b.resource)
    );
  }

  isFree(resourceId: string, interval: Interval): boolean {
    return isWithinCalendarWindow(interval, this.get(resourceId).windows);
  }

  /**
   * Revokes `interval` from the resource's free windows. Throws
   * ResourceConflictError, leaving the registry untouched, when a committed
   * assignment overlaps it, unless `force` is set by the rescheduler that is
   * about to re-place those assignments.
   */
  markUnavailable(
    resourceId: string,
    interval: Interval,
    options: { force?: boolean } = {}
  ): ResourceRecord {
    const resource = this.get(resourceId);
    if (interval.end <= interval.start) {
      throw new ValidationError("Outage must end after it starts", [
        `${interval.start}-${interval.end} min`,
      ]);
    }

    const conflicts = this.occupancy(resourceId).filter((a) =>
      doIntervalsOverlap(a, interval)
    );
    if (conflicts.length > 0 && !options.force) {
      throw new ResourceConflictError(resourceId, interval, conflicts);
    }

    const revoked = intersectIntervals(resource.windows, interval);
    this.state = produce(this.state, (draft) => {
      const target = draft[resource.id];
      target.windows = subtractInterval(target.windows, interval);
      target.outages = combineOverlappingIntervals([...target.outages, ...revoked]);
    });
    return this.get(resourceId);
  }

  /**
   * Gives back availability previously revoked by an outage. Only the
   * recorded outage portions inside `interval` are restored, so a resource
   * never gains time outside its original calendar.
   */
  restoreAvailability(resourceId: string, interval: Interval): ResourceRecord {
    const resource = this.get(resourceId);
    const restored = intersectIntervals(resource.outages, interval);
    if (restored.length === 0) return resource;

    this.state = produce(this.state, (draft) => {
      const target = draft[resource.id];
      target.windows = combineOverlappingIntervals([...target.windows, ...restored]);
      target.outages = subtractInterval(target.outages, interval);
    });
    return this.get(resourceId);
  }
}
