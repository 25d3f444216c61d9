import { z, ZodError } from "zod";
import { RESOURCE_TYPES, TASK_KINDS, TASK_STATUSES } from "../constants.js";
import { ValidationError } from "../core/errors.js";

const isoTimestamp = z.string().datetime({ offset: true });

export const horizonSchema = z
  .object({
    start: isoTimestamp,
    end: isoTimestamp,
  })
  .refine((h) => Date.parse(h.start) < Date.parse(h.end), {
    message: "horizon start must be before horizon end",
    path: ["end"],
  });

export const resourceTypeSchema = z.enum(RESOURCE_TYPES);

export const resourceSchema = z.object({
  id: z.string().min(1),
  type: resourceTypeSchema,
  name: z.string().min(1).optional(),
  capacity: z.number().int().positive().default(1),
  calendar: z.array(z.tuple([isoTimestamp, isoTimestamp])).min(1),
  location: z.string().min(1).optional(),
});

export const requirementSchema = z.object({
  type: resourceTypeSchema,
  quantity: z.number().int().positive(),
  units: z.number().int().positive().default(1),
  resource_ids: z.array(z.string().min(1)).min(1).optional(),
});

export const taskSchema = z.object({
  id: z.string().min(1),
  kind: z.enum(TASK_KINDS),
  duration_minutes: z.number().int().positive(),
  earliest_start: isoTimestamp,
  deadline: isoTimestamp.optional(),
  requirements: z.array(requirementSchema).min(1),
  predecessors: z.array(z.string().min(1)).default([]),
  priority: z.number().min(0).default(1),
});

export const taskBatchSchema = z.union([
  z.object({ tasks: z.array(taskSchema).min(1) }),
  taskSchema.transform((task) => ({ tasks: [task] })),
]);

export const intervalSchema = z
  .object({
    start: isoTimestamp,
    end: isoTimestamp,
    reason: z.string().optional(),
  })
  .refine((i) => Date.parse(i.start) < Date.parse(i.end), {
    message: "start must be before end",
    path: ["end"],
  });

export const delaySchema = z.object({
  delay_minutes: z.number().int().positive(),
});

export const solveRequestSchema = z.object({
  mode: z.enum(["strict", "best_effort"]).default("strict"),
  task_ids: z.array(z.string().min(1)).min(1).optional(),
});

export const taskListQuerySchema = z.object({
  status: z.enum(TASK_STATUSES).optional(),
});

export const resourceListQuerySchema = z.object({
  type: resourceTypeSchema.optional(),
});

export const availabilityQuerySchema = z.object({
  type: resourceTypeSchema,
  start: isoTimestamp,
  end: isoTimestamp,
});

export const windowQuerySchema = z.object({
  start: isoTimestamp,
  end: isoTimestamp,
});

export const scheduleQuerySchema = z
  .object({
    type: resourceTypeSchema.optional(),
    start: isoTimestamp.optional(),
    end: isoTimestamp.optional(),
  })
  .refine((q) => (q.start === undefined) === (q.end === undefined), {
    message: "start and end must be given together",
    path: ["end"],
  });

export const idParamsSchema = z.object({
  id: z.string().min(1),
});

export const versionParamsSchema = z.object({
  version: z.coerce.number().int().positive(),
});

export type HorizonInput = z.input<typeof horizonSchema>;
export type ResourceInput = z.input<typeof resourceSchema>;
export type RequirementInput = z.input<typeof requirementSchema>;
export type TaskInput = z.input<typeof taskSchema>;
export type ParsedTask = z.output<typeof taskSchema>;
export type IntervalInput = z.input<typeof intervalSchema>;
export type SolveRequest = z.output<typeof solveRequestSchema>;

export function formatZodIssues(error: ZodError): string[] {
  return error.errors.map((e) => `${e.path.join(".")}: ${e.message}`);
}

/**
 * Parses `value` with `schema`, rethrowing zod failures as a ValidationError
 * so the core never leaks library error types to its callers.
 */
export function parseInput<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  what: string
): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(`Invalid ${what}`, formatZodIssues(result.error));
  }
  return result.data;
}
