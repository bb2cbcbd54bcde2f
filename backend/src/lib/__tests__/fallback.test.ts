import { describe, expect, it } from "vitest";
import type { Task } from "../../types.js";
import { createFallbackTasks, fallbackOptimization, fallbackSubtasks } from "../fallback.js";

function task(id: number, title: string, estimated_hours: number, extra: Partial<Task> = {}): Task {
  return { id, title, description: "", estimated_hours, priority: "medium", dependencies: [], status: "todo", ...extra };
}

describe("createFallbackTasks", () => {
  it("uses quoted titles from a broken reply", () => {
    const tasks = createFallbackTasks('{"title": "Set up CI pipeline", "title": "Go"', "Ship a tool");
    expect(tasks).toEqual([
      {
        title: "Set up CI pipeline",
        description: "Complete set up ci pipeline",
        estimated_hours: 4,
        complexity_level: "moderate",
        task_type: "implementation",
        priority: "medium",
        dependencies: [],
      },
    ]);
  });

  it("reads numbered and bulleted lines", () => {
    const tasks = createFallbackTasks("1. Gather requirements\n- Build prototype!\nshort\n", "Ship a tool");
    expect(tasks.map(t => t.title)).toEqual(["Gather requirements", "Build prototype"]);
  });

  it("falls back to a software plan for app goals", () => {
    const tasks = createFallbackTasks("nothing useful", "Launch a web app");
    expect(tasks).toHaveLength(5);
    expect(tasks[0].title).toBe("Setup development environment");
    expect(tasks[2].dependencies).toEqual([0, 1]);
  });

  it("falls back to a generic plan otherwise", () => {
    expect(createFallbackTasks("nothing useful", "Organize a wedding")[0].title).toBe("Research and planning");
  });
});

describe("fallbackSubtasks", () => {
  it("splits hours 20/60/20", () => {
    const subtasks = fallbackSubtasks(task(0, "Homepage", 10));
    expect(subtasks.map(s => [s.id, s.title, s.estimated_hours])).toEqual([
      [0, "Plan Homepage", 2],
      [1, "Implement Homepage", 6],
      [2, "Verify Homepage", 2],
    ]);
    expect(subtasks.every(s => s.status === "todo" && !s.completed)).toBe(true);
  });
});

describe("fallbackOptimization", () => {
  const tasks = [task(0, "Design", 4), task(1, "Research", 6), task(2, "Build", 12, { dependencies: [0], priority: "high" })];

  it("suggests running independent tasks in parallel", () => {
    const result = fallbackOptimization(tasks, "time");
    expect(result.recommendations).toEqual([
      {
        type: "parallelization",
        task_ids: [0, 1],
        suggestion: 'Tasks "Design" and "Research" have no dependencies and can run in parallel',
        impact: "Could save up to 4 hours",
        priority: "high",
      },
    ]);
    expect(result.estimated_improvement).toBe("10-20% time reduction");
    expect(result.warnings).toEqual(["AI analysis unavailable - using basic heuristics"]);
  });

  it("flags large tasks for resources", () => {
    expect(fallbackOptimization(tasks, "resources").recommendations[0].task_ids).toEqual([2]);
  });

  it("returns no recommendations when nothing applies", () => {
    const result = fallbackOptimization([task(0, "Design", 4)], "risk");
    expect(result.recommendations).toEqual([]);
    expect(result.estimated_improvement).toBe("Unknown");
  });
});
