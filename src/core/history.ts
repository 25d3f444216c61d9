import { castDraft, freeze, produce } from "immer";
import type { Assignment, ScheduleSnapshot } from "../types/index.js";
import { NotFoundError, ValidationError } from "./errors.js";

/**
 * Versioned, immutable schedule snapshots. Every commit returns a new
 * history; readers holding an older one keep a consistent view.
 */
export class ScheduleHistory {
  private constructor(private readonly snapshots: readonly ScheduleSnapshot[]) {}

  static initial(createdAt: Date = new Date()): ScheduleHistory {
    return new ScheduleHistory(
      freeze(
        [{ version: 1, createdAt: createdAt.toISOString(), reason: "initial", assignments: [] }],
        true
      )
    );
  }

  get latest(): ScheduleSnapshot {
    return this.snapshots[this.snapshots.length - 1];
  }

  list(): readonly ScheduleSnapshot[] {
    return this.snapshots;
  }

  get(version: number): ScheduleSnapshot {
    const snapshot = this.snapshots.find((s) => s.version === version);
    if (!snapshot) throw new NotFoundError("snapshot", String(version));
    return snapshot;
  }

  commit(
    assignments: readonly Assignment[],
    reason: string,
    createdAt: Date = new Date()
  ): ScheduleHistory {
    const snapshot: ScheduleSnapshot = {
      version: this.latest.version + 1,
      createdAt: createdAt.toISOString(),
      reason,
      assignments: assignments.map((a) => ({ ...a })),
    };
    return new ScheduleHistory(
      produce(this.snapshots, (draft) => {
        draft.push(castDraft(snapshot));
      })
    );
  }

  /** Drops a retained snapshot. The latest one is the live schedule and stays. */
  discard(version: number): ScheduleHistory {
    this.get(version);
    if (version === this.latest.version) {
      throw new ValidationError(`Snapshot ${version} is the current schedule`, [
        "the latest snapshot cannot be discarded",
      ]);
    }
    return new ScheduleHistory(
      freeze(this.snapshots.filter((s) => s.version !== version))
    );
  }
}
