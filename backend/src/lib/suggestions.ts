import type { Priority, Task, TaskSuggestion } from "../types.js";

const PRIORITY_RANK: Record<Priority, number> = { high: 0, medium: 1, low: 2 };
const MAX_SUGGESTIONS = 5;

/**
 * Tasks that can be started now: not completed or in progress, with every
 * dependency completed. Highest priority first, then the quickest wins.
 */
export function suggestNextTasks(tasks: Task[]): TaskSuggestion[] {
  const completed = new Set(tasks.filter(t => t.status === "completed").map(t => t.id));

  return tasks
    .filter(t => t.status !== "completed" && t.status !== "in_progress")
    .filter(t => t.dependencies.every(dep => completed.has(dep)))
    .sort(
      (a, b) =>
        PRIORITY_RANK[a.priority] - PRIORITY_RANK[b.priority] || a.estimated_hours - b.estimated_hours,
    )
    .slice(0, MAX_SUGGESTIONS)
    .map(t => ({
      task_id: t.id,
      title: t.title,
      description: t.description,
      priority: t.priority,
      estimated_hours: t.estimated_hours,
      reason: t.dependencies.length > 0 ? "All dependencies completed" : "Ready to start",
    }));
}
