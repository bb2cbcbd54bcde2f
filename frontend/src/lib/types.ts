export type Priority = "high" | "medium" | "low";
export type TaskStatus = "todo" | "in_progress" | "completed" | "blocked";
export type OptimizationType = "time" | "resources" | "risk";
export type ProgressStatus = "processing" | "completed" | "error";

export const TASK_STATUSES: readonly TaskStatus[] = ["todo", "in_progress", "completed", "blocked"];

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
  dependencies: number[];
  complexity_level?: string;
  task_type?: string;
  base_hours?: number;
  start_time?: string;
  deadline?: string;
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
};

export type PlanRequest = {
  goal: string;
  timeframe?: string;
  start_date?: string;
  constraints?: Constraints;
};

export type Plan = {
  plan_id: string;
  goal: string;
  timeframe: string | null;
  start_date: string | null;
  tasks: Task[];
  created_at: string;
  total_estimated_hours: number;
  estimated_completion: string | null;
};

export type PlanListItem = {
  id: string;
  goal: string;
  timeframe: string | null;
  created_at: string;
};

export type TaskSuggestion = {
  task_id: number;
  title: string;
  description: string;
  priority: Priority;
  estimated_hours: number;
  reason: string;
};

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

export type OptimizationAnalysis = {
  plan_id: string;
  optimization_type: OptimizationType;
  recommendations: Recommendation[];
  estimated_improvement: string;
  warnings: string[];
  summary: string;
};

export type GenerationProgress = {
  progress: number;
  message: string;
  status: ProgressStatus;
};
