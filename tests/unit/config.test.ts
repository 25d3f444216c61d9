import { describe, it, expect } from "vitest";
import { loadConfig } from "../../src/config.js";
import { pino } from "pino";
import { ValidationError } from "../../src/core/errors.js";
import { reportStartupFailure } from "../../src/index.js";

const horizonEnv = {
  SCHEDULER_HORIZON_START: "2025-06-02T08:00:00Z",
  SCHEDULER_HORIZON_END: "2025-06-02T18:00:00Z",
};

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig(horizonEnv)).toEqual({
      logLevel: "info",
      port: 3000,
      host: "0.0.0.0",
      horizon: { start: "2025-06-02T08:00:00Z", end: "2025-06-02T18:00:00Z" },
      settings: {
        maxBacktrackDepth: 2,
        solveTimeLimitMs: 30000,
        repairTimeLimitMs: 10000,
        maxRepairCascade: 50,
      },
    });
  });

  it("reads numeric settings from strings", () => {
    const config = loadConfig({
      ...horizonEnv,
      PORT: "8080",
      LOG_LEVEL: "debug",
      SCHEDULER_MAX_BACKTRACK_DEPTH: "0",
      SCHEDULER_MAX_REPAIR_CASCADE: "5",
    });
    expect(config.port).toBe(8080);
    expect(config.logLevel).toBe("debug");
    expect(config.settings.maxBacktrackDepth).toBe(0);
    expect(config.settings.maxRepairCascade).toBe(5);
  });

  it("requires the horizon", () => {
    try {
      loadConfig({});
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.why).toEqual([
          "SCHEDULER_HORIZON_START: Required",
          "SCHEDULER_HORIZON_END: Required",
        ]);
      }
    }
  });

  it("rejects an inverted horizon", () => {
    expect(() =>
      loadConfig({
        SCHEDULER_HORIZON_START: "2025-06-02T18:00:00Z",
        SCHEDULER_HORIZON_END: "2025-06-02T08:00:00Z",
      })
    ).toThrow("Invalid configuration");
  });

  it("rejects an unknown log level", () => {
    expect(() => loadConfig({ ...horizonEnv, LOG_LEVEL: "loud" })).toThrow(ValidationError);
  });
});

describe("reportStartupFailure", () => {
  it("logs the error through the logger", () => {
    const lines: string[] = [];
    const logger = pino({ level: "error" }, { write: (line: string) => void lines.push(line) });

    reportStartupFailure(new ValidationError("Invalid configuration", ["PORT: Expected number"]), logger);

    expect(lines).toHaveLength(1);
    const entry: unknown = JSON.parse(lines[0]);
    expect(entry).toMatchObject({
      level: 50,
      msg: "failed to start",
      err: { message: "Invalid configuration" },
    });
  });
});
