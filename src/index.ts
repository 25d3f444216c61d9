import { pathToFileURL } from "node:url";
import { buildApp, startServer } from "./api/server.js";
import { loadConfig } from "./config.js";
import { SchedulingEngine } from "./core/engine.js";
import { createLogger } from "./logger.js";
import type { Logger } from "./logger.js";

export { SchedulingEngine } from "./core/engine.js";
export type { EngineOptions, OutageReport, RepairReport, SolveOptions, SolveReport } from "./core/engine.js";
export * from "./core/errors.js";
export type { Notifier } from "./core/notifier.js";
export { ScheduleQuery } from "./core/query.js";
export { buildApp, startServer } from "./api/server.js";
export { loadConfig } from "./config.js";
export type * from "./types/index.js";

export function reportStartupFailure(error: unknown, logger: Logger = createLogger("error")): void {
  logger.error({ err: error }, "failed to start");
}

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);
  const engine = new SchedulingEngine({
    horizon: config.horizon,
    settings: config.settings,
    logger,
  });
  await startServer(buildApp(engine, logger), config.port, config.host);
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((error: unknown) => {
    reportStartupFailure(error);
    process.exit(1);
  });
}
