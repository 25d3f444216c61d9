import { z } from "zod";
import { DEFAULT_SCHEDULER_SETTINGS } from "./constants.js";
import type { SchedulerSettings } from "./constants.js";
import { ValidationError } from "./core/errors.js";
import type { Horizon } from "./types/index.js";
import { formatZodIssues, horizonSchema } from "./types/schemas.js";

const count = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

const envSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  HOST: z.string().min(1).default("0.0.0.0"),
  SCHEDULER_HORIZON_START: z.string().datetime({ offset: true }),
  SCHEDULER_HORIZON_END: z.string().datetime({ offset: true }),
  SCHEDULER_MAX_BACKTRACK_DEPTH: count(DEFAULT_SCHEDULER_SETTINGS.maxBacktrackDepth),
  SCHEDULER_SOLVE_TIME_LIMIT_MS: count(DEFAULT_SCHEDULER_SETTINGS.solveTimeLimitMs),
  SCHEDULER_REPAIR_TIME_LIMIT_MS: count(DEFAULT_SCHEDULER_SETTINGS.repairTimeLimitMs),
  SCHEDULER_MAX_REPAIR_CASCADE: count(DEFAULT_SCHEDULER_SETTINGS.maxRepairCascade),
});

export type LogLevel = z.output<typeof envSchema>["LOG_LEVEL"];

export interface AppConfig {
  logLevel: LogLevel;
  port: number;
  host: string;
  horizon: Horizon;
  settings: SchedulerSettings;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ValidationError("Invalid configuration", formatZodIssues(parsed.error));
  }
  const values = parsed.data;

  const horizon = { start: values.SCHEDULER_HORIZON_START, end: values.SCHEDULER_HORIZON_END };
  const checked = horizonSchema.safeParse(horizon);
  if (!checked.success) {
    throw new ValidationError("Invalid configuration", formatZodIssues(checked.error));
  }

  return {
    logLevel: values.LOG_LEVEL,
    port: values.PORT,
    host: values.HOST,
    horizon,
    settings: {
      maxBacktrackDepth: values.SCHEDULER_MAX_BACKTRACK_DEPTH,
      solveTimeLimitMs: values.SCHEDULER_SOLVE_TIME_LIMIT_MS,
      repairTimeLimitMs: values.SCHEDULER_REPAIR_TIME_LIMIT_MS,
      maxRepairCascade: values.SCHEDULER_MAX_REPAIR_CASCADE,
    },
  };
}
