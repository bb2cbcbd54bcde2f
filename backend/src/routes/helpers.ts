import type { z } from "zod";
import { ValidationError } from "../lib/errors.js";
import { estimatedCompletion, totalHours } from "../lib/schedule.js";
import type { PlanResponse, StoredPlan } from "../types.js";

/** Parse request input, turning schema failures into a 422. */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first && first.path.length > 0 ? `${first.path.join(".")}: ` : "";
    throw new ValidationError(`${where}${first?.message ?? "Invalid input"}`, parsed.error.format());
  }
  return parsed.data;
}

export function toPlanResponse(plan: StoredPlan): PlanResponse {
  return {
    plan_id: plan.id,
    goal: plan.goal,
    timeframe: plan.timeframe,
    start_date: plan.start_date,
    tasks: plan.tasks,
    created_at: plan.created_at,
    total_estimated_hours: totalHours(plan.tasks),
    estimated_completion: estimatedCompletion(plan.tasks),
  };
}
