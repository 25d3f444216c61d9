import { pino } from "pino";
import type { Logger, LevelWithSilent } from "pino";

export type { Logger };

export function createLogger(level: LevelWithSilent = "info"): Logger {
  return pino({
    level,
    base: { service: "farm-scheduler" },
  });
}
