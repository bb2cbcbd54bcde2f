import type { Database } from "sqlite";
import { v4 as uuidv4 } from "uuid";
import { CommentNotFoundError, PlanNotFoundError, TaskNotFoundError } from "./errors.js";
import { openDatabase } from "./db.js";
import { storedTasksSchema } from "./plan-schema.js";
import type { Comment, PlanListItem, StoredPlan, Task } from "../types.js";

type PlanRow = {
  id: string;
  goal: string;
  timeframe: string | null;
  start_date: string | null;
  tasks_json: string;
  created_at: string;
  updated_at: string;
};

export type NewPlan = {
  goal: string;
  timeframe: string | null;
  start_date: string | null;
  tasks: Task[];
};

function toPlan(row: PlanRow): StoredPlan {
  const parsed: unknown = JSON.parse(row.tasks_json);
  return {
    id: row.id,
    goal: row.goal,
    timeframe: row.timeframe,
    start_date: row.start_date,
    tasks: storedTasksSchema.parse(parsed),
    created_at: row.created_at,
    updated_at: row.updated_at,
  };
}

/** Plans and their generation logs; tasks live as a JSON array on the plan row. */
export class PlanRepository {
  constructor(
    private readonly db: Database,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  static async open(filename: string): Promise<PlanRepository> {
    return new PlanRepository(await openDatabase(filename));
  }

  async ping(): Promise<void> {
    await this.db.get("SELECT 1");
  }

  async close(): Promise<void> {
    await this.db.close();
  }

  async savePlan(plan: NewPlan): Promise<StoredPlan> {
    const id = uuidv4();
    const now = this.clock().toISOString();
    await this.db.run(
      `INSERT INTO plans (id, goal, timeframe, start_date, tasks_json, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
      [id, plan.goal, plan.timeframe, plan.start_date, JSON.stringify(plan.tasks), now, now],
    );
    return { id, ...plan, created_at: now, updated_at: now };
  }

  async getPlan(id: string): Promise<StoredPlan | undefined> {
    const row = await this.db.get<PlanRow>("SELECT * FROM plans WHERE id = ?", [id]);
    return row ? toPlan(row) : undefined;
  }

  async requirePlan(id: string): Promise<StoredPlan> {
    const plan = await this.getPlan(id);
    if (!plan) throw new PlanNotFoundError(id);
    return plan;
  }

  async listPlans(limit = 20): Promise<PlanListItem[]> {
    return this.db.all<PlanListItem[]>(
      "SELECT id, goal, timeframe, created_at FROM plans ORDER BY created_at DESC, rowid DESC LIMIT ?",
      [limit],
    );
  }

  async listPlansWithTasks(limit = 1000): Promise<StoredPlan[]> {
    const rows = await this.db.all<PlanRow[]>(
      "SELECT * FROM plans ORDER BY created_at DESC, rowid DESC LIMIT ?",
      [limit],
    );
    return rows.map(toPlan);
  }

  /** Replace the tasks, and optionally the request fields, of an existing plan. */
  async updatePlan(
    id: string,
    changes: { tasks: Task[] } & Partial<Pick<StoredPlan, "goal" | "timeframe" | "start_date">>,
  ): Promise<StoredPlan> {
    const current = await this.requirePlan(id);
    const next: StoredPlan = { ...current, ...changes, updated_at: this.clock().toISOString() };
    await this.db.run(
      "UPDATE plans SET goal = ?, timeframe = ?, start_date = ?, tasks_json = ?, updated_at = ? WHERE id = ?",
      [next.goal, next.timeframe, next.start_date, JSON.stringify(next.tasks), next.updated_at, id],
    );
    return next;
  }

  async deletePlan(id: string): Promise<boolean> {
    await this.db.run("DELETE FROM generation_logs WHERE plan_id = ?", [id]);
    const result = await this.db.run("DELETE FROM plans WHERE id = ?", [id]);
    return (result.changes ?? 0) > 0;
  }

  async logGeneration(planId: string, prompt: string, response: string, tokensUsed: number): Promise<void> {
    await this.db.run(
      "INSERT INTO generation_logs (plan_id, prompt, response, tokens_used, created_at) VALUES (?, ?, ?, ?, ?)",
      [planId, prompt, response, tokensUsed, this.clock().toISOString()],
    );
  }

  async countGenerationLogs(planId: string): Promise<number> {
    const row = await this.db.get<{ n: number }>("SELECT COUNT(*) AS n FROM generation_logs WHERE plan_id = ?", [planId]);
    return row?.n ?? 0;
  }

  /** Read-modify-write of one task. The callback gets a copy and returns the new task. */
  async updateTask(planId: string, taskId: number, change: (task: Task) => Task): Promise<{ plan: StoredPlan; task: Task }> {
    const plan = await this.requirePlan(planId);
    const current = plan.tasks[taskId];
    if (taskId < 0 || !current) throw new TaskNotFoundError(taskId, planId);
    const task = change({ ...current });
    const tasks = plan.tasks.map((t, i) => (i === taskId ? task : t));
    return { plan: await this.updatePlan(planId, { tasks }), task };
  }

  async getTask(planId: string, taskId: number): Promise<Task> {
    const plan = await this.requirePlan(planId);
    const task = plan.tasks[taskId];
    if (taskId < 0 || !task) throw new TaskNotFoundError(taskId, planId);
    return task;
  }

  async addComment(planId: string, taskId: number, text: string, author: string): Promise<Comment> {
    const comment: Comment = { id: 0, author, text, created_at: this.clock().toISOString() };
    await this.updateTask(planId, taskId, task => {
      const comments = task.comments ?? [];
      comment.id = comments.length;
      return { ...task, comments: [...comments, comment] };
    });
    return comment;
  }

  async listComments(planId: string, taskId: number): Promise<Comment[]> {
    return (await this.getTask(planId, taskId)).comments ?? [];
  }

  /** Remove a comment; the remaining ones are renumbered from 0. */
  async deleteComment(planId: string, taskId: number, commentId: number): Promise<Comment[]> {
    const { task } = await this.updateTask(planId, taskId, current => {
      const comments = current.comments ?? [];
      if (!comments.some(c => c.id === commentId)) throw new CommentNotFoundError(commentId);
      return {
        ...current,
        comments: comments.filter(c => c.id !== commentId).map((c, id) => ({ ...c, id })),
      };
    });
    return task.comments ?? [];
  }
}
