import { calculateDeadlines } from "./schedule.js";
import { isRecord } from "./task-validation.js";
import {
  PRIORITIES,
  type OptimizationResult,
  type Priority,
  type Recommendation,
  type RecommendationType,
  type Task,
} from "../types.js";

const RECOMMENDATION_TYPES: readonly RecommendationType[] = [
  "parallelization",
  "sequencing",
  "priority_adjustment",
  "resource_optimization",
  "risk_mitigation",
];

const isRecommendationType = (v: unknown): v is RecommendationType =>
  typeof v === "string" && RECOMMENDATION_TYPES.some(t => t === v);
const isPriority = (v: unknown): v is Priority => typeof v === "string" && PRIORITIES.some(p => p === v);
const text = (v: unknown, fallback: string) => (typeof v === "string" && v.trim() !== "" ? v : fallback);

/**
 * Shape the model's analysis into an OptimizationResult. Recommendations of an
 * unknown type are dropped, and so are task ids that do not exist in the plan.
 * Returns undefined when the reply has no recommendations array.
 */
export function normalizeOptimization(data: Record<string, unknown>, taskCount: number): OptimizationResult | undefined {
  if (!Array.isArray(data.recommendations)) return undefined;

  const recommendations: Recommendation[] = [];
  for (const item of data.recommendations) {
    if (!isRecord(item)) continue;
    const { type, task_ids, suggestion, impact, priority, new_priority } = item;
    if (!isRecommendationType(type)) continue;
    const ids: unknown[] = Array.isArray(task_ids) ? task_ids : [];
    const rec: Recommendation = {
      type,
      task_ids: ids.filter((id): id is number => typeof id === "number" && Number.isInteger(id) && id >= 0 && id < taskCount),
      suggestion: text(suggestion, "No suggestion provided"),
      impact: text(impact, "Unknown impact"),
      priority: isPriority(priority) ? priority : "medium",
    };
    if (isPriority(new_priority)) rec.new_priority = new_priority;
    recommendations.push(rec);
  }

  const warnings: unknown[] = Array.isArray(data.warnings) ? data.warnings : [];
  return {
    recommendations,
    estimated_improvement: text(data.estimated_improvement, "Unknown"),
    warnings: warnings.filter((w): w is string => typeof w === "string"),
    summary: text(data.summary, "Optimization analysis completed"),
  };
}

export type ApplyResult = { tasks: Task[]; applied: number };

/**
 * Apply recommendations to a task list and re-propagate deadlines.
 * parallelization removes dependencies among the grouped tasks, sequencing
 * chains them in index order and priority_adjustment sets the new priority.
 * Resource and risk recommendations are advisory and change nothing.
 */
export function applyOptimization(tasks: Task[], recommendations: Recommendation[], startDate: string): ApplyResult {
  const next = tasks.map(t => ({ ...t, dependencies: [...t.dependencies] }));
  const valid = (id: number) => id >= 0 && id < next.length;
  let applied = 0;

  for (const rec of recommendations) {
    const ids = [...new Set(rec.task_ids.filter(valid))].sort((a, b) => a - b);
    switch (rec.type) {
      case "parallelization": {
        if (ids.length < 2) break;
        const group = new Set(ids);
        for (const id of ids) {
          next[id].dependencies = next[id].dependencies.filter(dep => !group.has(dep));
        }
        applied++;
        break;
      }
      case "sequencing": {
        if (ids.length < 2) break;
        for (let i = 1; i < ids.length; i++) {
          const deps = next[ids[i]].dependencies;
          if (!deps.includes(ids[i - 1])) deps.push(ids[i - 1]);
        }
        applied++;
        break;
      }
      case "priority_adjustment": {
        if (ids.length === 0) break;
        for (const id of ids) next[id].priority = rec.new_priority ?? "medium";
        applied++;
        break;
      }
      case "resource_optimization":
      case "risk_mitigation":
        break;
    }
  }

  return { tasks: calculateDeadlines(next, startDate), applied };
}
