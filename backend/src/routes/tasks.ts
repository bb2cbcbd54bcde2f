import { Router } from "express";
import { format } from "date-fns";
import type { AppContext } from "../context.js";
import { calculateDeadlines } from "../lib/schedule.js";
import {
  commentCreateSchema,
  indexParam,
  taskParamsSchema,
  taskStatusUpdateSchema,
  taskUpdateSchema,
} from "../lib/plan-schema.js";
import { asyncRoute } from "../middleware.js";
import { parseInput, toPlanResponse } from "./helpers.js";

const commentParamsSchema = taskParamsSchema.extend({ commentId: indexParam("Comment id") });

/** Routes under `/api/plans/:planId/tasks`; `taskId` is the task's index in the plan. */
export function taskRoutes(ctx: AppContext): Router {
  const router = Router({ mergeParams: true });

  router.patch("/:taskId", asyncRoute(async (req, res) => {
    const { planId, taskId } = parseInput(taskParamsSchema, req.params);
    const update = parseInput(taskUpdateSchema, req.body);

    const current = await ctx.repo.getTask(planId, taskId);
    const hoursChanged = update.estimated_hours !== undefined && update.estimated_hours !== current.estimated_hours;
    const result = await ctx.repo.updateTask(planId, taskId, task => ({ ...task, ...update }));

    let plan = result.plan;
    if (hoursChanged) {
      const startDate = plan.start_date ?? format(new Date(), "yyyy-MM-dd");
      plan = await ctx.repo.updatePlan(planId, { tasks: calculateDeadlines(plan.tasks, startDate) });
    }
    res.json({ message: "Task updated successfully", task: plan.tasks[taskId], plan: toPlanResponse(plan) });
  }));

  router.patch("/:taskId/status", asyncRoute(async (req, res) => {
    const { planId, taskId } = parseInput(taskParamsSchema, req.params);
    const update = parseInput(taskStatusUpdateSchema, req.body);
    const { task } = await ctx.repo.updateTask(planId, taskId, current => ({
      ...current,
      status: update.status,
      ...(update.actual_hours !== undefined ? { actual_hours: update.actual_hours } : {}),
      ...(update.notes !== undefined ? { notes: update.notes } : {}),
      ...(update.status === "completed" ? { completed_at: new Date().toISOString() } : {}),
    }));
    res.json({ message: "Task status updated successfully", task });
  }));

  router.post("/:taskId/subtasks", asyncRoute(async (req, res) => {
    const { planId, taskId } = parseInput(taskParamsSchema, req.params);
    const task = await ctx.repo.getTask(planId, taskId);
    const subtasks = await ctx.planner.generateSubtasks(task);
    await ctx.repo.updateTask(planId, taskId, current => ({ ...current, subtasks }));
    res.json({ task_id: taskId, subtasks });
  }));

  router.post("/:taskId/comments", asyncRoute(async (req, res) => {
    const { planId, taskId } = parseInput(taskParamsSchema, req.params);
    const { text, author } = parseInput(commentCreateSchema, req.body);
    const comment = await ctx.repo.addComment(planId, taskId, text, author);
    res.status(201).json({ message: "Comment added successfully", comment });
  }));

  router.get("/:taskId/comments", asyncRoute(async (req, res) => {
    const { planId, taskId } = parseInput(taskParamsSchema, req.params);
    res.json({ task_id: taskId, comments: await ctx.repo.listComments(planId, taskId) });
  }));

  router.delete("/:taskId/comments/:commentId", asyncRoute(async (req, res) => {
    const { planId, taskId, commentId } = parseInput(commentParamsSchema, req.params);
    const comments = await ctx.repo.deleteComment(planId, taskId, commentId);
    res.json({ message: "Comment deleted successfully", comments });
  }));

  return router;
}
