import { z } from "zod";
import { addDays, isValid, parseISO } from "date-fns";

const TIMEFRAME_UNITS = ["day", "days", "week", "weeks", "month", "months", "year", "years"];

export const priorityEnum = z.enum(["high", "medium", "low"]);
export const taskStatusEnum = z.enum(["todo", "in_progress", "completed", "blocked"]);

const startDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "Invalid date format. Use YYYY-MM-DD")
  .superRefine((value, ctx) => {
    const date = parseISO(value);
    if (!isValid(date)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Invalid date format. Use YYYY-MM-DD" });
      return;
    }
    const now = new Date();
    if (date < addDays(now, -365)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Start date cannot be more than 1 year in the past" });
    } else if (date > addDays(now, 365 * 5)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Start date cannot be more than 5 years in the future" });
    }
  });

export const constraintsSchema = z
  .object({
    team_size: z.coerce.number().int().positive().optional(),
    budget: z.string().optional(),
    experience_level: z.string().optional(),
    technical_stack: z.string().optional(),
  })
  .passthrough();

export const planRequestSchema = z.object({
  goal: z.string().trim().min(10).max(500),
  timeframe: z
    .string()
    .trim()
    .refine(
      v => v === "" || v.toLowerCase().split(/\s+/).some(word => TIMEFRAME_UNITS.includes(word)),
      "Timeframe must include: days, weeks, months, or years",
    )
    .transform(v => (v === "" ? undefined : v))
    .optional(),
  start_date: startDate.optional(),
  constraints: constraintsSchema.default({}),
});

export const taskUpdateSchema = z.object({
  title: z.string().min(3).max(200).optional(),
  description: z.string().min(10).max(1000).optional(),
  estimated_hours: z.number().positive().max(168).optional(),
  priority: priorityEnum.optional(),
  status: taskStatusEnum.optional(),
  actual_hours: z.number().positive().max(168).optional(),
  notes: z.string().max(1000).optional(),
  completed_at: z.string().optional(),
});

export const taskStatusUpdateSchema = z.object({
  status: taskStatusEnum,
  actual_hours: z.number().positive().max(168).optional(),
  notes: z.string().max(1000).optional(),
});

export const commentCreateSchema = z.object({
  text: z.string().trim().min(1).max(500),
  author: z.string().trim().min(1).max(100).default("User"),
});

export const recommendationSchema = z.object({
  type: z.enum(["parallelization", "sequencing", "priority_adjustment", "resource_optimization", "risk_mitigation"]),
  task_ids: z.array(z.number().int()).default([]),
  suggestion: z.string().default(""),
  impact: z.string().default(""),
  priority: priorityEnum.default("medium"),
  new_priority: priorityEnum.optional(),
});

export const applyOptimizationSchema = z.object({
  recommendations: z.array(recommendationSchema).min(1),
});

export const optimizationTypeSchema = z.enum(["time", "resources", "risk"]);

export const listPlansQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export const createPlanQuerySchema = z.object({
  use_cache: z
    .enum(["true", "false", "1", "0"])
    .default("true")
    .transform(v => v === "true" || v === "1"),
  client_id: z.string().min(1).default("default"),
  session_id: z.string().min(1).optional(),
});

/** A non-negative integer path segment; `Number(" ")` would otherwise read as 0. */
export const indexParam = (name: string) =>
  z.string().regex(/^\d+$/, `${name} must be a non-negative integer`).transform(Number);

export const taskParamsSchema = z.object({
  planId: z.string().min(1),
  taskId: indexParam("Task id"),
});

export type PlanRequestInput = z.infer<typeof planRequestSchema>;

const subtaskSchema = z.object({
  id: z.number().int(),
  title: z.string(),
  description: z.string(),
  estimated_hours: z.number(),
  status: taskStatusEnum,
  completed: z.boolean(),
});

const commentSchema = z.object({
  id: z.number().int(),
  author: z.string(),
  text: z.string(),
  created_at: z.string(),
});

/** A task as persisted in `plans.tasks_json`. */
export const storedTaskSchema = z.object({
  id: z.number().int(),
  title: z.string(),
  description: z.string(),
  estimated_hours: z.number(),
  priority: priorityEnum,
  dependencies: z.array(z.number().int()).default([]),
  complexity_level: z.enum(["simple", "moderate", "complex", "expert"]).optional(),
  task_type: z
    .enum(["research", "design", "implementation", "testing", "deployment", "documentation"])
    .optional(),
  base_hours: z.number().optional(),
  overhead_factors: z
    .object({
      complexity_multiplier: z.number(),
      experience_multiplier: z.number(),
      technical_stack_multiplier: z.number(),
      task_type_overhead: z.number(),
      dependency_overhead: z.number(),
      coordination_overhead: z.number(),
    })
    .optional(),
  start_time: z.string().optional(),
  deadline: z.string().optional(),
  status: taskStatusEnum.default("todo"),
  actual_hours: z.number().optional(),
  notes: z.string().optional(),
  completed_at: z.string().optional(),
  subtasks: z.array(subtaskSchema).optional(),
  comments: z.array(commentSchema).optional(),
});

export const storedTasksSchema = z.array(storedTaskSchema);
