import type { FastifyError, FastifyPluginAsync, FastifyReply } from "fastify";
import { ZodError } from "zod";
import { SCHEDULER_VERSION } from "../constants.js";
import type { RepairReport, SchedulingEngine } from "../core/engine.js";
import {
  CyclicDependencyError,
  EscalatedError,
  InfeasibleError,
  NotFoundError,
  ResourceConflictError,
  SchedulingError,
  SolveCancelledError,
  ValidationError,
} from "../core/errors.js";
import {
  formatInfeasibility,
  formatRepairReport,
  formatResource,
  formatSolveReport,
  formatTask,
} from "../core/export.js";
import {
  availabilityQuerySchema,
  delaySchema,
  formatZodIssues,
  idParamsSchema,
  intervalSchema,
  parseInput,
  resourceListQuerySchema,
  resourceSchema,
  scheduleQuerySchema,
  solveRequestSchema,
  taskBatchSchema,
  taskListQuerySchema,
  taskSchema,
  versionParamsSchema,
  windowQuerySchema,
} from "../types/schemas.js";
import { formatIsoOffset, parseIsoOffset } from "../util/timeUtils.js";

export interface RoutesOptions {
  engine: SchedulingEngine;
}

function statusFor(error: SchedulingError): number {
  if (error instanceof ValidationError) return 400;
  if (error instanceof NotFoundError) return 404;
  if (error instanceof CyclicDependencyError) return 422;
  if (error instanceof InfeasibleError) return 422;
  if (error instanceof ResourceConflictError) return 409;
  if (error instanceof SolveCancelledError) return 409;
  if (error instanceof EscalatedError) return 409;
  return 500;
}

function ok(reply: FastifyReply, body: Record<string, unknown>, status = 200) {
  return reply.status(status).send({ version: SCHEDULER_VERSION, success: true, ...body });
}

const routes: FastifyPluginAsync<RoutesOptions> = async (fastify, { engine }) => {
  const horizonStart = engine.horizon.start;

  /** A repair that escalated is still committed, but the caller must act on it. */
  const sendRepair = (reply: FastifyReply, report: RepairReport, extra: Record<string, unknown> = {}) => {
    const repair = formatRepairReport(report, horizonStart);
    if (report.escalation) {
      return reply.status(409).send({
        version: SCHEDULER_VERSION,
        success: false,
        error: report.escalation.message,
        why: report.escalation.why,
        ...extra,
        repair,
      });
    }
    return ok(reply, { ...extra, repair });
  };

  fastify.setErrorHandler((error: FastifyError | Error, _request, reply) => {
    if (error instanceof ZodError) {
      return reply.status(400).send({
        version: SCHEDULER_VERSION,
        success: false,
        error: "Invalid input",
        why: formatZodIssues(error),
      });
    }

    if (error instanceof SchedulingError) {
      const body: Record<string, unknown> = {
        version: SCHEDULER_VERSION,
        success: false,
        error: error.message,
        why: error.why,
      };
      if (error instanceof InfeasibleError) body.unplaced = error.reasons.map(formatInfeasibility);
      return reply.status(statusFor(error)).send(body);
    }

    // Framework errors such as malformed JSON carry their own 4xx status.
    if ("statusCode" in error && typeof error.statusCode === "number" && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        version: SCHEDULER_VERSION,
        success: false,
        error: error.message,
        why: [],
      });
    }

    fastify.log.error(error);
    return reply.status(500).send({
      version: SCHEDULER_VERSION,
      success: false,
      error: "Internal server error",
      why: ["An unexpected error occurred"],
    });
  });

  fastify.get("/health", async (_request, reply) => {
    return reply.send({
      status: "ok",
      version: SCHEDULER_VERSION,
      snapshot_version: engine.query().version,
      pending_writes: engine.pendingWrites,
    });
  });

  // ========== Resources ==========

  fastify.post("/resources", async (request, reply) => {
    const resource = await engine.registerResource(parseInput(resourceSchema, request.body, "resource"));
    return ok(reply, { resource: formatResource(resource, horizonStart) }, 201);
  });

  fastify.get("/resources", async (request, reply) => {
    const { type } = parseInput(resourceListQuerySchema, request.query, "query");
    return ok(reply, {
      resources: engine.listResources(type).map((r) => formatResource(r, horizonStart)),
    });
  });

  fastify.get("/resources/availability", async (request, reply) => {
    const { type, start, end } = parseInput(availabilityQuerySchema, request.query, "query");
    return ok(reply, {
      slots: engine.availability(type, start, end).map(({ resource, interval }) => ({
        resource: resource.id,
        start: formatIsoOffset(interval.start, horizonStart),
        end: formatIsoOffset(interval.end, horizonStart),
      })),
    });
  });

  fastify.get("/resources/:id", async (request, reply) => {
    const { id } = parseInput(idParamsSchema, request.params, "path");
    return ok(reply, { resource: formatResource(engine.getResource(id), horizonStart) });
  });

  fastify.post("/resources/:id/outages", async (request, reply) => {
    const { id } = parseInput(idParamsSchema, request.params, "path");
    const interval = parseInput(intervalSchema, request.body, "outage");
    const result = await engine.reportOutage(id, interval);
    const resource = formatResource(result.resource, horizonStart);
    if (!result.conflict) return ok(reply, { resource, repair: null });
    return sendRepair(reply, result.repair, { resource });
  });

  fastify.post("/resources/:id/availability", async (request, reply) => {
    const { id } = parseInput(idParamsSchema, request.params, "path");
    const interval = parseInput(intervalSchema, request.body, "availability window");
    const resource = await engine.restoreAvailability(id, interval);
    return ok(reply, { resource: formatResource(resource, horizonStart) });
  });

  // ========== Tasks ==========

  fastify.post("/tasks", async (request, reply) => {
    const { tasks } = parseInput(taskBatchSchema, request.body, "task submission");
    const ids = await engine.submitTasks(tasks);
    return ok(reply, { task_ids: ids }, 201);
  });

  fastify.get("/tasks", async (request, reply) => {
    const { status } = parseInput(taskListQuerySchema, request.query, "query");
    return ok(reply, {
      tasks: engine.listTasks(status).map((t) => formatTask(t, horizonStart)),
    });
  });

  fastify.post("/tasks/urgent", async (request, reply) => {
    const task = parseInput(taskSchema, request.body, "task");
    const report = await engine.insertUrgentTask(task);
    return sendRepair(reply, report);
  });

  fastify.get("/tasks/:id", async (request, reply) => {
    const { id } = parseInput(idParamsSchema, request.params, "path");
    return ok(reply, { task: formatTask(engine.getTask(id), horizonStart) });
  });

  fastify.delete("/tasks/:id", async (request, reply) => {
    const { id } = parseInput(idParamsSchema, request.params, "path");
    return sendRepair(reply, await engine.cancelTask(id));
  });

  fastify.post("/tasks/:id/delay", async (request, reply) => {
    const { id } = parseInput(idParamsSchema, request.params, "path");
    const { delay_minutes } = parseInput(delaySchema, request.body, "delay");
    return sendRepair(reply, await engine.reportDelay(id, delay_minutes));
  });

  fastify.post("/tasks/:id/requeue", async (request, reply) => {
    const { id } = parseInput(idParamsSchema, request.params, "path");
    const task = await engine.requeueTask(id);
    return ok(reply, { task: formatTask(task, horizonStart) });
  });

  // ========== Schedule ==========

  fastify.post("/schedule/solve", async (request, reply) => {
    const { mode, task_ids } = parseInput(solveRequestSchema, request.body ?? {}, "solve request");
    const report = await engine.solve({ mode, taskIds: task_ids });
    return ok(reply, { result: formatSolveReport(report, engine.query().kpis()) });
  });

  fastify.post("/schedule/solve/cancel", async (_request, reply) => {
    return ok(reply, { cancelled: engine.cancelSolve() });
  });

  fastify.get("/schedule", async (request, reply) => {
    const { type, start, end } = parseInput(scheduleQuerySchema, request.query, "query");
    const query = engine.query();
    const window =
      start !== undefined && end !== undefined
        ? { start: parseIsoOffset(start, horizonStart), end: parseIsoOffset(end, horizonStart) }
        : undefined;

    if (type !== undefined) {
      return ok(reply, { schedule: query.export(query.byResourceType(type, window)) });
    }
    return ok(reply, { schedule: query.export(window ? query.byWindow(window) : query.all()) });
  });

  fastify.get("/schedule/kpis", async (_request, reply) => {
    return ok(reply, { kpis: engine.query().kpis() });
  });

  fastify.get("/schedule/resources/:id", async (request, reply) => {
    const { id } = parseInput(idParamsSchema, request.params, "path");
    const query = engine.query();
    return ok(reply, { schedule: query.export(query.byResource(id)) });
  });

  fastify.get("/schedule/tasks/:id", async (request, reply) => {
    const { id } = parseInput(idParamsSchema, request.params, "path");
    const query = engine.query();
    return ok(reply, { schedule: query.export(query.byTask(id)) });
  });

  fastify.get("/schedule/window", async (request, reply) => {
    const { start, end } = parseInput(windowQuerySchema, request.query, "query");
    const query = engine.query();
    const window = {
      start: parseIsoOffset(start, horizonStart),
      end: parseIsoOffset(end, horizonStart),
    };
    return ok(reply, { schedule: query.export(query.byWindow(window)) });
  });

  // ========== Versions ==========

  fastify.get("/schedule/versions", async (_request, reply) => {
    return ok(reply, {
      versions: engine.versions().map((s) => ({
        snapshot_version: s.version,
        created_at: s.createdAt,
        reason: s.reason,
        assignments: s.assignments.length,
      })),
    });
  });

  fastify.get("/schedule/versions/:version", async (request, reply) => {
    const { version } = parseInput(versionParamsSchema, request.params, "path");
    return ok(reply, { schedule: engine.query(version).export() });
  });

  fastify.delete("/schedule/versions/:version", async (request, reply) => {
    const { version } = parseInput(versionParamsSchema, request.params, "path");
    await engine.discardVersion(version);
    return ok(reply, { discarded: version });
  });

  fastify.post("/schedule/versions/:version/rollback", async (request, reply) => {
    const { version } = parseInput(versionParamsSchema, request.params, "path");
    const snapshot = await engine.rollback(version);
    return ok(reply, { schedule: engine.query(snapshot.version).export() });
  });
};

export default routes;
