import { format } from "date-fns";
import { applyPracticalTimeAdjustments } from "./estimation.js";
import { errorMessage, TimeframeViolationError } from "./errors.js";
import { createFallbackTasks, fallbackOptimization, fallbackSubtasks } from "./fallback.js";
import { extractJson, JsonExtractionError } from "./json-extract.js";
import type { LlmClient } from "./llm.js";
import { getLogger } from "./logger.js";
import { normalizeOptimization } from "./optimization.js";
import type { PlanRequestInput } from "./plan-schema.js";
import { SYSTEM_PROMPT, buildOptimizationPrompt, buildPlanPrompt, buildSubtaskPrompt } from "./prompts.js";
import {
  calculateDeadlines,
  isTimeframeCompliant,
  round1,
  scaleToTimeframe,
  splitLongTasks,
  timeframeBudget,
  totalHours,
} from "./schedule.js";
import { isRecord, validateAndFixTasks } from "./task-validation.js";
import type {
  GeneratedPlan,
  OptimizationResult,
  OptimizationType,
  ProgressReporter,
  ProgressStatus,
  Subtask,
  Task,
} from "../types.js";

const log = getLogger("planner");

export type PlannerDeps = {
  llm: LlmClient;
  reporter?: ProgressReporter;
  now?: () => Date;
};

function timeframeViolation(tasks: Task[], timeframe: string): TimeframeViolationError {
  const { days, minHours, maxHours } = timeframeBudget(timeframe);
  const total = totalHours(tasks);
  const neededDays = Math.ceil(total / 8);
  if (total > maxHours) {
    return new TimeframeViolationError(
      `The plan needs ${total} hours but ${timeframe} allows at most ${Math.round(maxHours)} hours`,
      [
        `Extend the timeframe to about ${neededDays} days`,
        "Narrow the goal to its most important outcomes",
        "Increase the team size or the experience level",
      ],
    );
  }
  return new TimeframeViolationError(
    `The plan only fills ${total} of the ${Math.round(minHours)} hours expected for ${timeframe} (${days} days)`,
    [
      `Shorten the timeframe to about ${Math.max(1, neededDays)} days`,
      "Broaden the goal with related objectives",
      "Add more detail to the goal description",
    ],
  );
}

/** LLM-backed planning: plan generation, subtask breakdown and optimization analysis. */
export class TaskPlanner {
  private readonly now: () => Date;

  constructor(private readonly deps: PlannerDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  get model(): string {
    return this.deps.llm.model;
  }

  private report(sessionId: string | undefined, progress: number, message: string, status?: ProgressStatus) {
    if (sessionId) this.deps.reporter?.progress(sessionId, progress, message, status);
  }

  async generatePlan(request: PlanRequestInput, sessionId?: string): Promise<GeneratedPlan> {
    const startDate = request.start_date ?? format(this.now(), "yyyy-MM-dd");
    const constraints = request.constraints ?? {};
    const timeframe = request.timeframe;

    try {
      this.report(sessionId, 10, "Preparing AI prompt...");
      const prompt = buildPlanPrompt(request.goal, timeframe, startDate, constraints);

      this.report(sessionId, 20, "Analyzing your goal...");
      this.report(sessionId, 30, "Sending request to AI model...");
      const completion = await this.deps.llm.complete(prompt, SYSTEM_PROMPT);

      this.report(sessionId, 60, "AI response received, parsing tasks...");
      const raw = this.parseTasks(completion.content, request.goal);

      this.report(sessionId, 70, "Validating task structure...");
      let tasks = applyPracticalTimeAdjustments(validateAndFixTasks(raw), constraints);

      if (timeframe && !isTimeframeCompliant(tasks, timeframe)) {
        this.report(sessionId, 75, "Adjusting estimates to fit the timeframe...");
        log.info({ timeframe, total: totalHours(tasks) }, "scaling estimates to timeframe");
        tasks = scaleToTimeframe(tasks, timeframe);
        if (!isTimeframeCompliant(tasks, timeframe)) throw timeframeViolation(tasks, timeframe);
      }

      this.report(sessionId, 80, "Splitting long tasks...");
      tasks = splitLongTasks(tasks);

      this.report(sessionId, 90, "Calculating deadlines...");
      tasks = calculateDeadlines(tasks, startDate);

      this.report(sessionId, 100, "Task plan generated successfully!", "completed");
      log.info({ tasks: tasks.length, hours: totalHours(tasks), tokens: completion.tokens }, "plan generated");

      return {
        goal: request.goal,
        timeframe: timeframe ?? null,
        start_date: startDate,
        tasks,
        model_used: completion.model,
        prompt,
        raw_response: completion.content,
        tokens_used: completion.tokens,
      };
    } catch (err) {
      this.report(sessionId, 0, `Error: ${errorMessage(err)}`, "error");
      throw err;
    }
  }

  /** The `tasks` array of the reply, or tasks recovered from its text. */
  private parseTasks(content: string, goal: string): unknown[] {
    try {
      const data = extractJson(content);
      if (Array.isArray(data.tasks) && data.tasks.length > 0) return data.tasks;
      log.warn("LLM reply has no tasks array; using fallback tasks");
    } catch (err) {
      if (!(err instanceof JsonExtractionError)) throw err;
      log.warn({ reason: err.message }, "could not parse LLM reply; using fallback tasks");
    }
    return createFallbackTasks(content, goal);
  }

  /** Three to five subtasks whose hours add up to the task's estimate. */
  async generateSubtasks(task: Task): Promise<Subtask[]> {
    try {
      const completion = await this.deps.llm.complete(buildSubtaskPrompt(task), SYSTEM_PROMPT);
      const data = extractJson(completion.content);
      const items: unknown[] = Array.isArray(data.subtasks) ? data.subtasks : [];
      if (items.length < 2) {
        log.warn({ taskId: task.id }, "too few subtasks in LLM reply; using fallback");
        return fallbackSubtasks(task);
      }
      return scaleSubtasks(items.slice(0, 5).map(toSubtask), task.estimated_hours);
    } catch (err) {
      log.warn({ taskId: task.id, err: errorMessage(err) }, "subtask generation failed; using fallback");
      return fallbackSubtasks(task);
    }
  }

  async optimize(goal: string, tasks: Task[], type: OptimizationType): Promise<OptimizationResult> {
    try {
      const completion = await this.deps.llm.complete(buildOptimizationPrompt(goal, tasks, type), SYSTEM_PROMPT);
      const result = normalizeOptimization(extractJson(completion.content), tasks.length);
      if (result) return result;
      log.warn({ type }, "LLM reply has no recommendations; using heuristics");
    } catch (err) {
      log.warn({ type, err: errorMessage(err) }, "optimization analysis failed; using heuristics");
    }
    return fallbackOptimization(tasks, type);
  }
}

function toSubtask(item: unknown, id: number): Subtask {
  const s = isRecord(item) ? item : {};
  const hours = typeof s.estimated_hours === "number" ? s.estimated_hours : Number(s.estimated_hours);
  return {
    id,
    title: typeof s.title === "string" && s.title.trim() ? s.title.trim() : `Subtask ${id + 1}`,
    description: typeof s.description === "string" && s.description.trim() ? s.description.trim() : "No description provided",
    estimated_hours: Number.isFinite(hours) && hours > 0 ? hours : 1,
    status: "todo",
    completed: false,
  };
}

/** Rescale so the subtasks add up to `target`; rounding drift lands on the last one. */
export function scaleSubtasks(subtasks: Subtask[], target: number): Subtask[] {
  const sum = subtasks.reduce((acc, s) => acc + s.estimated_hours, 0);
  if (sum <= 0 || Math.abs(sum - target) < 0.05) return subtasks;
  const factor = target / sum;
  const scaled = subtasks.map(s => ({ ...s, estimated_hours: Math.max(0.1, round1(s.estimated_hours * factor)) }));
  const drift = round1(target - scaled.reduce((acc, s) => acc + s.estimated_hours, 0));
  const last = scaled[scaled.length - 1];
  if (drift !== 0 && last.estimated_hours + drift > 0) last.estimated_hours = round1(last.estimated_hours + drift);
  return scaled;
}
