import { detectComplexityLevel, detectTaskType } from "./estimation.js";
import { round1 } from "./schedule.js";
import {
  COMPLEXITY_LEVELS,
  PRIORITIES,
  TASK_TYPES,
  type ComplexityLevel,
  type Priority,
  type Task,
  type TaskType,
} from "../types.js";

const DEFAULT_HOURS = 4.0;
const LOW_PRIORITY_HINTS = ["test", "document", "polish", "optimize", "cleanup"];

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

const isOneOf = <T extends string>(options: readonly T[], value: unknown): value is T =>
  typeof value === "string" && options.some(o => o === value);

function toHours(value: unknown): number {
  const n = typeof value === "string" ? Number.parseFloat(value) : value;
  if (typeof n !== "number" || !Number.isFinite(n) || n <= 0) return DEFAULT_HOURS;
  return round1(n);
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() !== "" ? value.trim() : undefined;
}

/**
 * Coerce model output into well-formed tasks: fill missing fields, keep only
 * backward dependencies and even out an unrealistic priority spread.
 */
export function validateAndFixTasks(raw: unknown[]): Task[] {
  const tasks = raw.map((item, index): Task => {
    const t = isRecord(item) ? item : {};
    const title = nonEmptyString(t.title) ?? `Task ${index + 1}`;
    const description = nonEmptyString(t.description) ?? "No description provided";
    const { priority: rawPriority, complexity_level: rawComplexity, task_type: rawType } = t;
    const priority: Priority = isOneOf(PRIORITIES, rawPriority) ? rawPriority : "medium";
    const complexity_level: ComplexityLevel = isOneOf(COMPLEXITY_LEVELS, rawComplexity)
      ? rawComplexity
      : detectComplexityLevel(title, description);
    const task_type: TaskType = isOneOf(TASK_TYPES, rawType) ? rawType : detectTaskType(title, description);
    const rawDeps: unknown[] = Array.isArray(t.dependencies) ? t.dependencies : [];
    const dependencies = rawDeps.filter(
      (d): d is number => typeof d === "number" && Number.isInteger(d) && d >= 0 && d < index,
    );

    return {
      id: index,
      title,
      description,
      estimated_hours: toHours(t.estimated_hours),
      priority,
      dependencies: [...new Set(dependencies)],
      complexity_level,
      task_type,
      status: "todo",
    };
  });

  return rebalancePriorities(tasks);
}

/**
 * More than 40% high priority: only the first three stay high. Fewer than 10%
 * low: the last two medium tasks become low when they look like polish work.
 */
export function rebalancePriorities(tasks: Task[]): Task[] {
  if (tasks.length === 0) return tasks;
  const result = tasks.map(t => ({ ...t }));
  const count = (p: Priority) => result.filter(t => t.priority === p).length;

  if (count("high") / result.length > 0.4) {
    result
      .filter(t => t.priority === "high")
      .slice(3)
      .forEach(t => {
        t.priority = "medium";
      });
  }

  if (count("low") / result.length < 0.1) {
    result
      .filter(t => t.priority === "medium")
      .slice(-2)
      .forEach(t => {
        const title = t.title.toLowerCase();
        if (LOW_PRIORITY_HINTS.some(hint => title.includes(hint))) t.priority = "low";
      });
  }

  return result;
}
