import { mentions } from "./estimation.js";
import { round1 } from "./schedule.js";
import type { OptimizationResult, OptimizationType, Recommendation, Subtask, Task } from "../types.js";

export type DraftTask = {
  title: string;
  description: string;
  estimated_hours: number;
  complexity_level: string;
  task_type: string;
  priority: string;
  dependencies: number[];
};

const draft = (
  title: string,
  description: string,
  estimated_hours: number,
  complexity_level: string,
  task_type: string,
  priority: string,
  dependencies: number[],
): DraftTask => ({ title, description, estimated_hours, complexity_level, task_type, priority, dependencies });

const SOFTWARE_PLAN: DraftTask[] = [
  draft("Setup development environment", "Install and configure the necessary tools and frameworks", 4, "simple", "deployment", "high", []),
  draft("Design user interface", "Create wireframes and design mockups for the main screens", 8, "moderate", "design", "high", [0]),
  draft("Implement core functionality", "Develop the main features and functionality", 16, "complex", "implementation", "high", [0, 1]),
  draft("Testing and debugging", "Test the application and fix the issues found", 6, "moderate", "testing", "medium", [2]),
  draft("Deploy and document", "Deploy the application and write the user documentation", 4, "simple", "deployment", "medium", [3]),
];

const GENERIC_PLAN: DraftTask[] = [
  draft("Research and planning", "Research the requirements and create a project plan", 4, "moderate", "research", "high", []),
  draft("Initial setup", "Set up the project structure and tools", 4, "simple", "deployment", "high", [0]),
  draft("Core development", "Develop the main functionality", 12, "complex", "implementation", "high", [1]),
  draft("Testing and refinement", "Test the solution and make improvements", 6, "moderate", "testing", "medium", [2]),
  draft("Final review and documentation", "Review the work and create documentation", 3, "simple", "documentation", "low", [3]),
];

const LIST_ITEM = [/^\d+\.\s*(.+)$/, /^[-*]\s*(.+)$/, /^•\s*(.+)$/];

const fromTitle = (title: string): DraftTask =>
  draft(title, `Complete ${title.toLowerCase()}`, 4, "moderate", "implementation", "medium", []);

const reasonableTitle = (title: string) => title.length > 5 && title.length < 100;

/**
 * Tasks recovered from a reply that held no usable JSON: quoted titles first,
 * then numbered or bulleted lines, then a generic plan shaped by the goal.
 */
export function createFallbackTasks(content: string, goal: string): DraftTask[] {
  const tasks: DraftTask[] = [];

  for (const match of content.matchAll(/"title"\s*:\s*"([^"]+)"/g)) {
    if (reasonableTitle(match[1])) tasks.push(fromTitle(match[1]));
  }

  if (tasks.length === 0) {
    for (const raw of content.split("\n")) {
      const line = raw.trim();
      if (line.length < 10) continue;
      for (const pattern of LIST_ITEM) {
        const match = pattern.exec(line);
        if (!match) continue;
        const title = match[1].replace(/[^\w\s\-()]/g, "").trim();
        if (reasonableTitle(title)) tasks.push(fromTitle(title));
        break;
      }
    }
  }

  if (tasks.length > 0) return tasks;
  const software = mentions(goal.toLowerCase(), ["website", "web", "app", "application"]);
  return (software ? SOFTWARE_PLAN : GENERIC_PLAN).map(t => ({ ...t, dependencies: [...t.dependencies] }));
}

/** 20% planning, 60% implementation and 20% verification of the parent task's hours. */
export function fallbackSubtasks(task: Task): Subtask[] {
  const total = task.estimated_hours;
  const planning = round1(total * 0.2);
  const verification = round1(total * 0.2);
  const implementation = round1(total - planning - verification);
  const parts: Array<[string, string, number]> = [
    [`Plan ${task.title}`, `Define the approach, requirements and acceptance criteria for: ${task.title}`, planning],
    [`Implement ${task.title}`, `Carry out the main work for: ${task.title}`, implementation],
    [`Verify ${task.title}`, `Review and test the result of: ${task.title}`, verification],
  ];
  return parts.map(([title, description, estimated_hours], id): Subtask => ({
    id,
    title,
    description,
    estimated_hours,
    status: "todo",
    completed: false,
  }));
}

const FALLBACK_WARNING = "AI analysis unavailable - using basic heuristics";

/** Heuristic recommendations used when the model gives no usable analysis. */
export function fallbackOptimization(tasks: Task[], type: OptimizationType): OptimizationResult {
  const recommendations: Recommendation[] = [];
  let summary: string;
  let estimated_improvement = "Unknown";

  if (type === "time") {
    const independent = tasks.filter(t => t.dependencies.length === 0 && t.status !== "completed");
    if (independent.length >= 2) {
      const pair = independent.slice(0, 2);
      recommendations.push({
        type: "parallelization",
        task_ids: pair.map(t => t.id),
        suggestion: `Tasks "${pair[0].title}" and "${pair[1].title}" have no dependencies and can run in parallel`,
        impact: `Could save up to ${Math.min(pair[0].estimated_hours, pair[1].estimated_hours)} hours`,
        priority: "high",
      });
      estimated_improvement = "10-20% time reduction";
    }
    summary = "Basic time optimization based on task dependencies";
  } else if (type === "resources") {
    const large = tasks.find(t => t.estimated_hours > 8);
    if (large) {
      recommendations.push({
        type: "resource_optimization",
        task_ids: [large.id],
        suggestion: `"${large.title}" is a large task (${large.estimated_hours}h); split it or assign extra help`,
        impact: "Better workload distribution",
        priority: "medium",
      });
      estimated_improvement = "Improved resource balance";
    }
    summary = "Basic resource analysis based on task sizes";
  } else {
    const critical = tasks.find(t => t.priority === "high");
    if (critical) {
      recommendations.push({
        type: "risk_mitigation",
        task_ids: [critical.id],
        suggestion: `"${critical.title}" is high priority; add buffer time and a contingency plan`,
        impact: "Reduced risk of delays",
        priority: "high",
      });
      estimated_improvement = "Lower delivery risk";
    }
    summary = "Basic risk analysis based on task priorities";
  }

  return { recommendations, estimated_improvement, warnings: [FALLBACK_WARNING], summary };
}
