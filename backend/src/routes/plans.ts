import { Router } from "express";
import type { AppContext } from "../context.js";
import { computePlanAnalytics } from "../lib/analytics.js";
import { planCacheKey } from "../lib/cache.js";
import { buildCalendar, calendarFilename } from "../lib/calendar.js";
import { BadRequestError, PlanNotFoundError, RateLimitError, errorMessage } from "../lib/errors.js";
import { getLogger } from "../lib/logger.js";
import { applyOptimization } from "../lib/optimization.js";
import {
  applyOptimizationSchema,
  createPlanQuerySchema,
  listPlansQuerySchema,
  optimizationTypeSchema,
  planRequestSchema,
  type PlanRequestInput,
} from "../lib/plan-schema.js";
import { suggestNextTasks } from "../lib/suggestions.js";
import type { GeneratedPlan } from "../types.js";
import { asyncRoute } from "../middleware.js";
import { parseInput, toPlanResponse } from "./helpers.js";

const log = getLogger("http");

export function planRoutes(ctx: AppContext): Router {
  const router = Router();

  /** Run generation, reporting the outcome to the session's WebSocket clients. */
  async function generate(request: PlanRequestInput, sessionId: string | undefined): Promise<GeneratedPlan> {
    try {
      const generated = await ctx.planner.generatePlan(request, sessionId);
      ctx.metrics.recordLlmCall(generated.tokens_used);
      return generated;
    } catch (err) {
      if (sessionId) ctx.hub.complete(sessionId, { success: false, error: errorMessage(err) });
      throw err;
    }
  }

  router.post("/", asyncRoute(async (req, res) => {
    const query = parseInput(createPlanQuerySchema, req.query);
    if (!ctx.rateLimiter.check(query.client_id).allowed) {
      throw new RateLimitError(ctx.rateLimiter.maxRequests);
    }
    const request = parseInput(planRequestSchema, req.body);
    const key = planCacheKey(request.goal, request.timeframe, request.start_date);

    let generated = query.use_cache ? ctx.cache.get(key) : undefined;
    const fromCache = generated !== undefined;
    if (query.use_cache) {
      if (fromCache) ctx.metrics.recordCacheHit();
      else ctx.metrics.recordCacheMiss();
    }
    if (!generated) {
      generated = await generate(request, query.session_id);
      ctx.cache.set(key, generated);
    } else {
      log.info({ goal: request.goal }, "serving plan from cache");
    }

    const plan = await ctx.repo.savePlan({
      goal: generated.goal,
      timeframe: generated.timeframe,
      start_date: generated.start_date,
      tasks: generated.tasks,
    });
    if (!fromCache && generated.tokens_used > 0) {
      await ctx.repo.logGeneration(plan.id, generated.prompt, generated.raw_response, generated.tokens_used);
    }
    if (query.session_id) ctx.hub.complete(query.session_id, { success: true, planId: plan.id });

    res.status(201).json(toPlanResponse(plan));
  }));

  router.get("/", asyncRoute(async (req, res) => {
    const { limit } = parseInput(listPlansQuerySchema, req.query);
    res.json(await ctx.repo.listPlans(limit));
  }));

  router.get("/:planId", asyncRoute(async (req, res) => {
    res.json(toPlanResponse(await ctx.repo.requirePlan(req.params.planId)));
  }));

  // Regenerate an existing plan from a new request; id and created_at are kept.
  router.put("/:planId", asyncRoute(async (req, res) => {
    const { planId } = req.params;
    await ctx.repo.requirePlan(planId);
    const request = parseInput(planRequestSchema, req.body);
    const sessionId = typeof req.query.session_id === "string" ? req.query.session_id : undefined;

    const generated = await generate(request, sessionId);
    const plan = await ctx.repo.updatePlan(planId, {
      goal: generated.goal,
      timeframe: generated.timeframe,
      start_date: generated.start_date,
      tasks: generated.tasks,
    });
    if (generated.tokens_used > 0) {
      await ctx.repo.logGeneration(planId, generated.prompt, generated.raw_response, generated.tokens_used);
    }
    if (sessionId) ctx.hub.complete(sessionId, { success: true, planId });
    res.json(toPlanResponse(plan));
  }));

  router.delete("/:planId", asyncRoute(async (req, res) => {
    const { planId } = req.params;
    if (!(await ctx.repo.deletePlan(planId))) throw new PlanNotFoundError(planId);
    res.status(204).end();
  }));

  router.get("/:planId/suggestions", asyncRoute(async (req, res) => {
    const plan = await ctx.repo.requirePlan(req.params.planId);
    const suggestions = suggestNextTasks(plan.tasks);
    res.json({ plan_id: plan.id, suggestions, total_available: suggestions.length });
  }));

  router.get("/:planId/export/calendar", asyncRoute(async (req, res) => {
    const plan = await ctx.repo.requirePlan(req.params.planId);
    res
      .status(200)
      .type("text/calendar; charset=utf-8")
      .attachment(calendarFilename(plan))
      .send(buildCalendar(plan));
  }));

  router.get("/:planId/analytics", asyncRoute(async (req, res) => {
    res.json(computePlanAnalytics(await ctx.repo.requirePlan(req.params.planId)));
  }));

  router.post("/:planId/optimize", asyncRoute(async (req, res) => {
    const type = optimizationTypeSchema.safeParse(req.query.optimization_type ?? "time");
    if (!type.success) {
      throw new BadRequestError("Invalid optimization type. Must be one of: time, resources, risk");
    }
    const plan = await ctx.repo.requirePlan(req.params.planId);
    const result = await ctx.planner.optimize(plan.goal, plan.tasks, type.data);
    res.json({ plan_id: plan.id, optimization_type: type.data, ...result });
  }));

  router.post("/:planId/apply-optimization", asyncRoute(async (req, res) => {
    const plan = await ctx.repo.requirePlan(req.params.planId);
    const { recommendations } = parseInput(applyOptimizationSchema, req.body);
    const startDate = plan.start_date ?? plan.tasks[0]?.start_time?.slice(0, 10) ?? plan.created_at.slice(0, 10);
    const { tasks, applied } = applyOptimization(plan.tasks, recommendations, startDate);
    const updated = await ctx.repo.updatePlan(plan.id, { tasks });
    log.info({ planId: plan.id, applied }, "optimizations applied");
    res.json({
      message: "Optimizations applied successfully",
      applied_recommendations: applied,
      plan: toPlanResponse(updated),
    });
  }));

  return router;
}
