import { describe, expect, it } from "vitest";
import type { Recommendation, Task } from "../../types.js";
import { applyOptimization, normalizeOptimization } from "../optimization.js";

function task(id: number, title: string, estimated_hours: number, dependencies: number[] = []): Task {
  return { id, title, description: "", estimated_hours, priority: "medium", dependencies, status: "todo" };
}

const rec = (type: Recommendation["type"], task_ids: number[], extra: Partial<Recommendation> = {}): Recommendation => ({
  type,
  task_ids,
  suggestion: "",
  impact: "",
  priority: "medium",
  ...extra,
});

describe("normalizeOptimization", () => {
  it("drops unknown types and task ids outside the plan", () => {
    const result = normalizeOptimization(
      {
        recommendations: [
          { type: "parallelization", task_ids: [0, 1, 7, "2"], suggestion: "Run together", impact: "Saves a day", priority: "high" },
          { type: "magic" },
          { type: "priority_adjustment", task_ids: [2], new_priority: "low" },
        ],
        warnings: ["tight", 3],
      },
      3,
    );
    expect(result).toEqual({
      recommendations: [
        { type: "parallelization", task_ids: [0, 1], suggestion: "Run together", impact: "Saves a day", priority: "high" },
        {
          type: "priority_adjustment",
          task_ids: [2],
          suggestion: "No suggestion provided",
          impact: "Unknown impact",
          priority: "medium",
          new_priority: "low",
        },
      ],
      estimated_improvement: "Unknown",
      warnings: ["tight"],
      summary: "Optimization analysis completed",
    });
  });

  it("returns undefined without a recommendations array", () => {
    expect(normalizeOptimization({ summary: "nothing" }, 3)).toBeUndefined();
  });
});

describe("applyOptimization", () => {
  const tasks = [task(0, "Design", 4), task(1, "Content", 4, [0]), task(2, "Launch", 2, [1])];

  it("removes dependencies inside a parallel group and reschedules", () => {
    const { tasks: next, applied } = applyOptimization(
      tasks,
      [rec("parallelization", [1, 0]), rec("priority_adjustment", [2], { new_priority: "high" }), rec("risk_mitigation", [0])],
      "2025-10-15",
    );
    expect(applied).toBe(2);
    expect(next[1]).toMatchObject({ dependencies: [], start_time: "2025-10-15T09:00:00", deadline: "2025-10-15T13:00:00" });
    expect(next[2]).toMatchObject({ priority: "high", start_time: "2025-10-15T13:00:00", deadline: "2025-10-15T15:00:00" });
  });

  it("chains sequenced tasks in index order", () => {
    const independent = [task(0, "X", 2), task(1, "Y", 2), task(2, "Z", 2)];
    const { tasks: next, applied } = applyOptimization(independent, [rec("sequencing", [2, 0])], "2025-10-15");
    expect(applied).toBe(1);
    expect(next[2]).toMatchObject({ dependencies: [0], start_time: "2025-10-15T11:00:00" });
  });

  it("skips recommendations without enough valid tasks", () => {
    const { applied } = applyOptimization(tasks, [rec("parallelization", [0, 9]), rec("priority_adjustment", [])], "2025-10-15");
    expect(applied).toBe(0);
  });

  it("does not modify the input tasks", () => {
    applyOptimization(tasks, [rec("parallelization", [0, 1])], "2025-10-15");
    expect(tasks[1].dependencies).toEqual([0]);
  });
});
