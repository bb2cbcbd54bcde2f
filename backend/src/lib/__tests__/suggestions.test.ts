import { describe, expect, it } from "vitest";
import type { Task } from "../../types.js";
import { suggestNextTasks } from "../suggestions.js";

function task(id: number, extra: Partial<Task>): Task {
  return { id, title: `Task ${id}`, description: "", estimated_hours: 2, priority: "medium", dependencies: [], status: "todo", ...extra };
}

describe("suggestNextTasks", () => {
  it("lists ready tasks by priority, then by size", () => {
    const suggestions = suggestNextTasks([
      task(0, { status: "completed" }),
      task(1, { dependencies: [0], estimated_hours: 3 }),
      task(2, { priority: "high", estimated_hours: 5 }),
      task(3, { status: "in_progress" }),
      task(4, { dependencies: [3] }),
      task(5, { priority: "low", estimated_hours: 1 }),
      task(6, { estimated_hours: 1 }),
    ]);
    expect(suggestions.map(s => [s.task_id, s.reason])).toEqual([
      [2, "Ready to start"],
      [6, "Ready to start"],
      [1, "All dependencies completed"],
      [5, "Ready to start"],
    ]);
  });

  it("returns at most five", () => {
    const tasks = Array.from({ length: 8 }, (_, i) => task(i, {}));
    expect(suggestNextTasks(tasks)).toHaveLength(5);
  });
});
