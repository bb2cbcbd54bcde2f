import { describe, expect, it } from "vitest";
import type { Task } from "../../types.js";
import { rebalancePriorities, validateAndFixTasks } from "../task-validation.js";

describe("validateAndFixTasks", () => {
  const tasks = validateAndFixTasks([
    { title: " Research market ", description: "Look at competitors", estimated_hours: "3.25", priority: "urgent", dependencies: [0, 5] },
    { title: "", estimated_hours: -2, priority: "high", dependencies: [0, 0, "1", 1.5] },
    "garbage",
  ]);

  it("fills in missing fields", () => {
    expect(tasks[1]).toEqual({
      id: 1,
      title: "Task 2",
      description: "No description provided",
      estimated_hours: 4,
      priority: "high",
      dependencies: [0],
      complexity_level: "moderate",
      task_type: "implementation",
      status: "todo",
    });
    expect(tasks[2].title).toBe("Task 3");
  });

  it("coerces hours and priority", () => {
    expect(tasks[0]).toMatchObject({ title: "Research market", estimated_hours: 3.3, priority: "medium", task_type: "research" });
  });

  it("keeps only backward integer dependencies", () => {
    expect(tasks.map(t => t.dependencies)).toEqual([[], [0], []]);
  });
});

describe("rebalancePriorities", () => {
  const make = (title: string): Task => ({
    id: 0,
    title,
    description: "",
    estimated_hours: 2,
    priority: "high",
    dependencies: [],
    status: "todo",
  });

  it("keeps three high priority tasks and lowers polish work", () => {
    const result = rebalancePriorities(["Plan", "Design", "Build", "Write tests", "Polish UI"].map(make));
    expect(result.map(t => t.priority)).toEqual(["high", "high", "high", "low", "low"]);
  });

  it("does not mutate its input", () => {
    const input = ["A", "B", "C", "D", "E"].map(make);
    rebalancePriorities(input);
    expect(input.every(t => t.priority === "high")).toBe(true);
  });
});
