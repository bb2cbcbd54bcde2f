import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { CommentNotFoundError, PlanNotFoundError, TaskNotFoundError } from "../errors.js";
import { openDatabase } from "../db.js";
import { PlanRepository, type NewPlan } from "../plan-repository.js";
import type { Task } from "../../types.js";

function task(id: number, title: string): Task {
  return { id, title, description: "", estimated_hours: 2, priority: "medium", dependencies: [], status: "todo" };
}

const newPlan = (goal: string): NewPlan => ({
  goal,
  timeframe: "1 week",
  start_date: "2025-10-15",
  tasks: [task(0, "First"), task(1, "Second")],
});

describe("PlanRepository", () => {
  let repo: PlanRepository;
  let tick: number;

  beforeEach(async () => {
    tick = 0;
    const clock = () => new Date(Date.UTC(2025, 9, 14, 8, 0, tick++));
    repo = new PlanRepository(await openDatabase(":memory:"), clock);
  });

  afterEach(async () => {
    await repo.close();
  });

  it("saves and reads back a plan", async () => {
    const saved = await repo.savePlan(newPlan("Launch a blog"));
    expect(saved.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(saved.created_at).toBe("2025-10-14T08:00:00.000Z");
    expect(await repo.getPlan(saved.id)).toEqual(saved);
  });

  it("throws for a missing plan", async () => {
    await expect(repo.requirePlan("nope")).rejects.toBeInstanceOf(PlanNotFoundError);
    expect(await repo.getPlan("nope")).toBeUndefined();
  });

  it("lists plans newest first", async () => {
    await repo.savePlan(newPlan("First goal"));
    await repo.savePlan(newPlan("Second goal"));
    const list = await repo.listPlans(10);
    expect(list.map(p => p.goal)).toEqual(["Second goal", "First goal"]);
    expect(Object.keys(list[0]).sort()).toEqual(["created_at", "goal", "id", "timeframe"]);
    expect(await repo.listPlans(1)).toHaveLength(1);
  });

  it("updates tasks and bumps updated_at", async () => {
    const saved = await repo.savePlan(newPlan("Launch a blog"));
    const updated = await repo.updatePlan(saved.id, { tasks: [task(0, "Only")] });
    expect(updated.tasks.map(t => t.title)).toEqual(["Only"]);
    expect(updated.created_at).toBe(saved.created_at);
    expect(updated.updated_at).toBe("2025-10-14T08:00:01.000Z");
  });

  it("deletes a plan with its generation logs", async () => {
    const saved = await repo.savePlan(newPlan("Launch a blog"));
    await repo.logGeneration(saved.id, "prompt", "response", 42);
    expect(await repo.countGenerationLogs(saved.id)).toBe(1);
    expect(await repo.deletePlan(saved.id)).toBe(true);
    expect(await repo.countGenerationLogs(saved.id)).toBe(0);
    expect(await repo.deletePlan(saved.id)).toBe(false);
  });

  it("updates a single task", async () => {
    const saved = await repo.savePlan(newPlan("Launch a blog"));
    const { task: changed, plan } = await repo.updateTask(saved.id, 1, t => ({ ...t, status: "in_progress" }));
    expect(changed.status).toBe("in_progress");
    expect(plan.tasks[0].status).toBe("todo");
    expect((await repo.getTask(saved.id, 1)).status).toBe("in_progress");
  });

  it("rejects task ids outside the plan", async () => {
    const saved = await repo.savePlan(newPlan("Launch a blog"));
    await expect(repo.getTask(saved.id, 2)).rejects.toBeInstanceOf(TaskNotFoundError);
    await expect(repo.updateTask(saved.id, -1, t => t)).rejects.toBeInstanceOf(TaskNotFoundError);
  });

  it("numbers comments and renumbers them after a delete", async () => {
    const saved = await repo.savePlan(newPlan("Launch a blog"));
    await repo.addComment(saved.id, 0, "first", "Ana");
    const second = await repo.addComment(saved.id, 0, "second", "Ben");
    expect(second).toEqual({ id: 1, author: "Ben", text: "second", created_at: "2025-10-14T08:00:03.000Z" });

    const remaining = await repo.deleteComment(saved.id, 0, 0);
    expect(remaining.map(c => [c.id, c.text])).toEqual([[0, "second"]]);
    expect(await repo.listComments(saved.id, 0)).toEqual(remaining);
    await expect(repo.deleteComment(saved.id, 0, 5)).rejects.toBeInstanceOf(CommentNotFoundError);
  });
});
