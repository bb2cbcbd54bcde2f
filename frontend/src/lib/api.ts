import type {
  Comment,
  OptimizationAnalysis,
  OptimizationType,
  Plan,
  PlanListItem,
  PlanRequest,
  Priority,
  Recommendation,
  Subtask,
  Task,
  TaskStatus,
  TaskSuggestion,
} from "./types.js";

const API_BASE_URL = (import.meta.env.VITE_API_URL ?? "").trim().replace(/\/+$/, "");

/** Non-2xx response; `code` and `detail` come from the server's error body. */
export class ApiError extends Error {
  constructor(
    readonly status: number,
    readonly code: string,
    readonly detail: string,
    readonly suggestions: string[] = [],
  ) {
    super(detail);
    this.name = "ApiError";
  }
}

/** Human readable message for anything a request can throw. */
export function errorDetail(err: unknown): string {
  if (err instanceof ApiError) return err.detail;
  if (err instanceof TypeError) return "Cannot reach the server. Is the backend running?";
  return err instanceof Error ? err.message : String(err);
}

async function toApiError(response: Response): Promise<ApiError> {
  let code = "http_error";
  let detail = `API error: ${response.status}`;
  let suggestions: string[] = [];
  try {
    const body: unknown = await response.json();
    if (typeof body === "object" && body !== null) {
      if ("error" in body && typeof body.error === "string") code = body.error;
      if ("detail" in body && typeof body.detail === "string") detail = body.detail;
      if ("suggestions" in body && Array.isArray(body.suggestions)) {
        suggestions = body.suggestions.filter((s): s is string => typeof s === "string");
      }
    }
  } catch {
    // body was not JSON; keep the status text
    detail = `${detail} ${response.statusText}`.trim();
  }
  return new ApiError(response.status, code, detail, suggestions);
}

async function request(path: string, init?: RequestInit): Promise<Response> {
  const response = await fetch(`${API_BASE_URL}${path}`, {
    headers: { "Content-Type": "application/json" },
    ...init,
  });
  if (!response.ok) throw await toApiError(response);
  return response;
}

export async function api<T>(path: string, init?: RequestInit): Promise<T> {
  const data: T = await (await request(path, init)).json();
  return data;
}

const json = (method: string, body?: unknown): RequestInit => ({
  method,
  body: body === undefined ? undefined : JSON.stringify(body),
});

export function generatePlan(request: PlanRequest, sessionId?: string, useCache = true): Promise<Plan> {
  const query = new URLSearchParams({ use_cache: String(useCache) });
  if (sessionId) query.set("session_id", sessionId);
  return api<Plan>(`/api/plans?${query.toString()}`, json("POST", request));
}

export const listPlans = (limit = 10) => api<PlanListItem[]>(`/api/plans?limit=${limit}`);

export const getPlan = (planId: string) => api<Plan>(`/api/plans/${encodeURIComponent(planId)}`);

export async function deletePlan(planId: string): Promise<void> {
  await request(`/api/plans/${encodeURIComponent(planId)}`, { method: "DELETE" });
}

const taskPath = (planId: string, taskId: number) => `/api/plans/${encodeURIComponent(planId)}/tasks/${taskId}`;

export type TaskPatch = Partial<Pick<Task, "title" | "description" | "estimated_hours" | "priority" | "status" | "actual_hours" | "notes">>;

/** The edit form's fields as a patch; hours that are blank or not positive are left out. */
export function detailsPatch(hours: string, actual: string, notes: string): TaskPatch {
  const patch: TaskPatch = { notes };
  const estimated = Number.parseFloat(hours);
  if (Number.isFinite(estimated) && estimated > 0) patch.estimated_hours = estimated;
  const spent = Number.parseFloat(actual);
  if (Number.isFinite(spent) && spent > 0) patch.actual_hours = spent;
  return patch;
}

export const updateTask = (planId: string, taskId: number, patch: TaskPatch) =>
  api<{ message: string; task: Task; plan: Plan }>(taskPath(planId, taskId), json("PATCH", patch));

export type TaskStatusUpdate = { status: TaskStatus; actual_hours?: number; notes?: string };

export async function updateTaskStatus(planId: string, taskId: number, update: TaskStatusUpdate): Promise<Task> {
  const { task } = await api<{ message: string; task: Task }>(`${taskPath(planId, taskId)}/status`, json("PATCH", update));
  return task;
}

export async function generateSubtasks(planId: string, taskId: number): Promise<Subtask[]> {
  const { subtasks } = await api<{ task_id: number; subtasks: Subtask[] }>(`${taskPath(planId, taskId)}/subtasks`, json("POST"));
  return subtasks;
}

export async function addComment(planId: string, taskId: number, text: string, author?: string): Promise<Comment> {
  const { comment } = await api<{ message: string; comment: Comment }>(
    `${taskPath(planId, taskId)}/comments`,
    json("POST", author ? { text, author } : { text }),
  );
  return comment;
}

export async function deleteComment(planId: string, taskId: number, commentId: number): Promise<Comment[]> {
  const { comments } = await api<{ message: string; comments: Comment[] }>(
    `${taskPath(planId, taskId)}/comments/${commentId}`,
    { method: "DELETE" },
  );
  return comments;
}

export const getSuggestions = (planId: string) =>
  api<{ plan_id: string; suggestions: TaskSuggestion[]; total_available: number }>(
    `/api/plans/${encodeURIComponent(planId)}/suggestions`,
  );

export const optimizePlan = (planId: string, type: OptimizationType) =>
  api<OptimizationAnalysis>(`/api/plans/${encodeURIComponent(planId)}/optimize?optimization_type=${type}`, json("POST"));

export type AppliedOptimization = { message: string; applied_recommendations: number; plan: Plan };

export const applyOptimization = (planId: string, recommendations: Recommendation[]) =>
  api<AppliedOptimization>(`/api/plans/${encodeURIComponent(planId)}/apply-optimization`, json("POST", { recommendations }));

export type PlanAnalytics = {
  plan_id: string;
  total_tasks: number;
  completed_tasks: number;
  in_progress_tasks: number;
  completion_rate: number;
  priority_distribution: Record<Priority, number>;
  total_estimated_hours: number;
  total_actual_hours: number;
  estimated_completion: string | null;
};

export const getPlanAnalytics = (planId: string) => api<PlanAnalytics>(`/api/plans/${encodeURIComponent(planId)}/analytics`);

/** Download the plan's .ics file under the name the server suggests. */
export async function downloadCalendar(planId: string): Promise<string> {
  const response = await request(`/api/plans/${encodeURIComponent(planId)}/export/calendar`);
  const disposition = response.headers.get("content-disposition") ?? "";
  const filename = /filename="?([^";]+)"?/.exec(disposition)?.[1] ?? `plan-${planId.slice(0, 8)}.ics`;

  const url = URL.createObjectURL(await response.blob());
  const link = document.createElement("a");
  link.href = url;
  link.download = filename;
  document.body.appendChild(link);
  link.click();
  link.remove();
  URL.revokeObjectURL(url);
  return filename;
}
