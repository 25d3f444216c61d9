import type { Logger } from "pino";
import type { ScheduleEvent } from "../types/index.js";
import type { EscalatedError, InfeasibleError } from "./errors.js";

/** Outbound channel for scheduling failures that need a human decision. */
export interface Notifier {
  infeasible(error: InfeasibleError): void;
  escalated(error: EscalatedError, event: ScheduleEvent): void;
}

export class LogNotifier implements Notifier {
  private readonly log: Logger;

  constructor(logger: Logger) {
    this.log = logger.child({ component: "notifier" });
  }

  infeasible(error: InfeasibleError): void {
    this.log.warn({ task: error.taskId, why: error.why }, error.message);
  }

  escalated(error: EscalatedError, event: ScheduleEvent): void {
    this.log.warn({ event: event.type, tasks: error.taskIds, why: error.why }, error.message);
  }
}
