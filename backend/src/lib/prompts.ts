import { timeframeBudget } from "./schedule.js";
import type { Constraints, OptimizationType, Task } from "../types.js";

export const SYSTEM_PROMPT = [
  "You are an experienced project manager. Break high-level goals into specific, actionable tasks with realistic estimates and dependencies.",
  "",
  "RULES:",
  "1. Every task title starts with an action verb (Create, Design, Implement, Test, Deploy...).",
  "2. Every task is specific, measurable and completable within its estimate.",
  "3. Classify each task:",
  "   complexity_level: simple (familiar, clear scope), moderate (some learning), complex (new technology, integrations), expert (high risk, many systems)",
  "   task_type: research, design, implementation, testing, deployment or documentation",
  "4. Give base estimates in hours for a competent person; vary them with the real size of the work.",
  "5. Dependencies reference the indices of EARLIER tasks only (design before implementation, testing after development).",
  "6. Priorities: about 20-30% high (blockers, core work), 50-60% medium, 20-30% low (polish, documentation, nice-to-haves).",
  "",
  "OUTPUT: return ONLY a JSON object of this shape, with no other text:",
  '{"tasks": [{"title": "Design database schema", "description": "Model users, posts and comments with their relations", "estimated_hours": 4, "complexity_level": "moderate", "task_type": "design", "priority": "high", "dependencies": []}]}',
].join("\n");

function constraintLines(constraints: Constraints): string[] {
  const lines: string[] = [];
  for (const [key, value] of Object.entries(constraints)) {
    if (value === undefined || value === null || value === "") continue;
    switch (key) {
      case "team_size": {
        const size = Number(value);
        if (size <= 1) lines.push(`- Team size: ${value} person (sequential tasks, no coordination overhead)`);
        else if (size <= 3) lines.push(`- Team size: ${value} people (some parallel work, 5-10% coordination overhead)`);
        else lines.push(`- Team size: ${value} people (high parallelism, 10-15% coordination overhead)`);
        break;
      }
      case "budget":
        lines.push(`- Budget: ${String(value)} (favor low-cost solutions if 'low')`);
        break;
      case "experience_level": {
        const level = String(value).toLowerCase();
        const hint =
          level === "beginner"
            ? "simpler tasks, more learning time"
            : level === "advanced"
              ? "can take on complex tasks efficiently"
              : "baseline estimates";
        lines.push(`- Experience level: ${String(value)} (${hint})`);
        break;
      }
      case "technical_stack":
        lines.push(`- Technical stack: ${String(value)} (adjust complexity to familiarity)`);
        break;
      default:
        lines.push(`- ${key}: ${typeof value === "string" ? value : JSON.stringify(value)}`);
    }
  }
  return lines;
}

export function buildPlanPrompt(
  goal: string,
  timeframe: string | undefined,
  startDate: string,
  constraints: Constraints,
): string {
  const parts = [`Goal: ${goal}`, ""];
  parts.push(timeframe ? `Timeframe: ${timeframe}` : "Timeframe: not specified (flexible timeline)");
  parts.push(`Start date: ${startDate}`);

  const extra = constraintLines(constraints);
  if (extra.length > 0) parts.push("", "Constraints:", ...extra);

  parts.push(
    "",
    "Break this goal into actionable tasks following the rules.",
    "Keep the plan realistic and executable, with clear dependencies.",
  );

  if (timeframe) {
    const { days, availableHours, minHours, maxHours } = timeframeBudget(timeframe);
    parts.push(
      "",
      `TIMEFRAME: ${timeframe} (${days} days = ${availableHours} working hours)`,
      `Use 80-100% of the available time: ${Math.round(minHours)}-${availableHours} hours in total.`,
      `The total of estimated_hours must NOT exceed ${Math.round(maxHours)} hours.`,
      "If the goal looks small for the timeframe, add research, testing and quality phases.",
    );
  }
  return parts.join("\n");
}

export function buildSubtaskPrompt(task: Task): string {
  return [
    "Break this task into 3-5 specific, actionable subtasks.",
    "",
    "MAIN TASK:",
    `Title: ${task.title}`,
    `Description: ${task.description}`,
    `Estimated hours: ${task.estimated_hours}`,
    "",
    "REQUIREMENTS:",
    "1. Each subtask is a logical step toward completing the main task.",
    `2. The estimated hours of all subtasks sum to ${task.estimated_hours}.`,
    "3. Order them so prerequisites come first.",
    "",
    "Return ONLY a JSON object of this shape:",
    '{"subtasks": [{"title": "Create the users table", "description": "Columns, indexes and migration", "estimated_hours": 1.5}]}',
  ].join("\n");
}

const OPTIMIZATION_FOCUS: Record<OptimizationType, string> = {
  time: "Shorten the overall timeline: find tasks that can run in parallel, unnecessary dependencies and a better ordering.",
  resources: "Balance the workload: find oversized tasks, bottlenecks and work that could be shared.",
  risk: "Reduce delivery risk: find critical-path tasks, missing buffers and risky dependencies.",
};

export function buildOptimizationPrompt(goal: string, tasks: Task[], type: OptimizationType): string {
  const summary = tasks.map(t => ({
    id: t.id,
    title: t.title,
    estimated_hours: t.estimated_hours,
    priority: t.priority,
    status: t.status,
    dependencies: t.dependencies,
  }));
  return [
    `Analyze this project plan and recommend optimizations. Focus: ${type}.`,
    OPTIMIZATION_FOCUS[type],
    "",
    `Goal: ${goal}`,
    `Tasks: ${JSON.stringify(summary)}`,
    "",
    "Recommendation types: parallelization, sequencing, priority_adjustment, resource_optimization, risk_mitigation.",
    "task_ids must be ids from the list above. A priority_adjustment also gives new_priority (high, medium or low).",
    "",
    "Return ONLY a JSON object of this shape:",
    '{"recommendations": [{"type": "parallelization", "task_ids": [1, 2], "suggestion": "Run these together", "impact": "Saves about 6 hours", "priority": "high"}], "estimated_improvement": "15% shorter timeline", "warnings": [], "summary": "One sentence overview"}',
  ].join("\n");
}
