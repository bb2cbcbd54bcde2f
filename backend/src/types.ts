export type Priority = "high" | "medium" | "low";
export type TaskStatus = "todo" | "in_progress" | "completed" | "blocked";
export type ComplexityLevel = "simple" | "moderate" | "complex" | "expert";
export type TaskType =
  | "research"
  | "design"
  | "implementation"
  | "testing"
  | "deployment"
  | "documentation";

export const PRIORITIES: readonly Priority[] = ["high", "medium", "low"];
export const COMPLEXITY_LEVELS: readonly ComplexityLevel[] = ["simple", "moderate", "complex", "expert"];
export const TASK_TYPES: readonly TaskType[] = [
  "research",
  "design",
  "implementation",
  "testing",
  "deployment",
  "documentation",
];

export type OverheadFactors = {
  complexity_multiplier: number;
  experience_multiplier: number;
  technical_stack_multiplier: number;
  task_type_overhead: number;
  dependency_overhead: number;
  coordination_overhead: number;
};

export type Comment = {
  id: number;
  author: string;
  text: string;
  created_at: string;
};

export type Subtask = {
  id: number;
  title: string;
  description: string;
  estimated_hours: number;
  status: TaskStatus;
  completed: boolean;
};

export type Task = {
  id: number;
  title: string;
  description: string;
  estimated_hours: number;
  priority: Priority;
  dependencies: number[]; // indices of earlier tasks
  complexity_level?: ComplexityLevel;
  task_type?: TaskType;
  base_hours?: number;
  overhead_factors?: OverheadFactors;
  start_time?: string; // naive local datetime
  deadline?: string;   // naive local datetime
  status: TaskStatus;
  actual_hours?: number;
  notes?: string;
  completed_at?: string;
  subtasks?: Subtask[];
  comments?: Comment[];
};

export type Constraints = {
  team_size?: number;
  budget?: string;
  experience_level?: string;
  technical_stack?: string;
  [key: string]: unknown;
};

export type PlanRequest = {
  goal: string;
  timeframe?: string;
  start_date?: string; // YYYY-MM-DD
  constraints?: Constraints;
};

export type StoredPlan = {
  id: string;
  goal: string;
  timeframe: string | null;
  start_date: string | null;
  tasks: Task[];
  created_at: string;
  updated_at: string;
};

export type PlanListItem = Pick<StoredPlan, "id" | "goal" | "timeframe" | "created_at">;

/** Output of the generation pipeline before it is persisted. */
export type GeneratedPlan = {
  goal: string;
  timeframe: string | null;
  start_date: string;
  tasks: Task[];
  model_used: string;
  prompt: string;
  raw_response: string;
  tokens_used: number;
};

export type PlanResponse = {
  plan_id: string;
  goal: string;
  timeframe: string | null;
  start_date: string | null;
  tasks: Task[];
  created_at: string;
  total_estimated_hours: number;
  estimated_completion: string | null;
};

export type OptimizationType = "time" | "resources" | "risk";

export type RecommendationType =
  | "parallelization"
  | "sequencing"
  | "priority_adjustment"
  | "resource_optimization"
  | "risk_mitigation";

export type Recommendation = {
  type: RecommendationType;
  task_ids: number[];
  suggestion: string;
  impact: string;
  priority: Priority;
  new_priority?: Priority;
};

export type OptimizationResult = {
  recommendations: Recommendation[];
  estimated_improvement: string;
  warnings: string[];
  summary: string;
};

export type TaskSuggestion = {
  task_id: number;
  title: string;
  description: string;
  priority: Priority;
  estimated_hours: number;
  reason: string;
};

export type ProgressStatus = "processing" | "completed" | "error";

/** Receives generation progress; the WebSocket hub is the production implementation. */
export interface ProgressReporter {
  progress(sessionId: string, progress: number, message: string, status?: ProgressStatus): void;
  complete(sessionId: string, outcome: { success: true; planId: string } | { success: false; error: string }): void;
}
