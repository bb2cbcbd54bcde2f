import { differenceInMinutes, format, isValid, parseISO, subDays } from "date-fns";
import { estimatedCompletion, round1 } from "./schedule.js";
import type { Priority, StoredPlan, TaskStatus } from "../types.js";

type PriorityDistribution = Record<Priority, number>;
type StatusDistribution = Record<TaskStatus, number>;

export type RecentActivity = {
  id: string;
  goal: string;
  created_at: string;
  tasks_count: number;
  completed_tasks: number;
};

export type Analytics = {
  total_plans: number;
  total_tasks: number;
  total_hours: number;
  avg_tasks_per_plan: number;
  avg_hours_per_plan: number;
  priority_distribution: PriorityDistribution;
  status_distribution: StatusDistribution;
  completion_rate: number;
  popular_timeframes: Record<string, number>;
  recent_activity: RecentActivity[];
  productivity_metrics: {
    plans_this_week: number;
    tasks_completed_this_week: number;
    avg_completion_time: number; // hours from plan creation to task completion
    most_productive_day: string | null;
  };
  insights: string[];
};

export type PlanAnalytics = {
  plan_id: string;
  goal: string;
  total_tasks: number;
  completed_tasks: number;
  in_progress_tasks: number;
  completion_rate: number;
  priority_distribution: PriorityDistribution;
  total_estimated_hours: number;
  total_actual_hours: number;
  created_at: string;
  estimated_completion: string | null;
};

const parseDate = (value: string | undefined) => {
  if (!value) return undefined;
  const date = parseISO(value);
  return isValid(date) ? date : undefined;
};

const emptyPriorities = (): PriorityDistribution => ({ high: 0, medium: 0, low: 0 });
const emptyStatuses = (): StatusDistribution => ({ todo: 0, in_progress: 0, completed: 0, blocked: 0 });

/** Usage and progress figures across every stored plan. */
export function computeAnalytics(plans: StoredPlan[], now: Date = new Date()): Analytics {
  const weekAgo = subDays(now, 7);
  const priority_distribution = emptyPriorities();
  const status_distribution = emptyStatuses();
  const popular_timeframes: Record<string, number> = {};
  const activityByDay = new Map<string, number>();
  const recent: RecentActivity[] = [];

  let totalTasks = 0;
  let totalHours = 0;
  let completedTasks = 0;
  let plansThisWeek = 0;
  let completedThisWeek = 0;
  let completionMinutes = 0;
  let completionCount = 0;

  for (const plan of plans) {
    const created = parseDate(plan.created_at);
    if (created) {
      const day = format(created, "EEEE");
      activityByDay.set(day, (activityByDay.get(day) ?? 0) + 1);
      if (created > weekAgo) plansThisWeek++;
    }
    if (plan.timeframe) popular_timeframes[plan.timeframe] = (popular_timeframes[plan.timeframe] ?? 0) + 1;

    totalTasks += plan.tasks.length;
    let planCompleted = 0;
    for (const task of plan.tasks) {
      totalHours += task.estimated_hours;
      priority_distribution[task.priority]++;
      status_distribution[task.status]++;
      if (task.status !== "completed") continue;
      completedTasks++;
      planCompleted++;
      const done = parseDate(task.completed_at);
      if (done && created) {
        completionMinutes += differenceInMinutes(done, created);
        completionCount++;
      }
      if (done && done > weekAgo) completedThisWeek++;
    }

    recent.push({
      id: plan.id,
      goal: plan.goal,
      created_at: plan.created_at,
      tasks_count: plan.tasks.length,
      completed_tasks: planCompleted,
    });
  }

  let most_productive_day: string | null = null;
  let best = 0;
  for (const [day, count] of activityByDay) {
    if (count > best) {
      best = count;
      most_productive_day = day;
    }
  }

  const analytics: Analytics = {
    total_plans: plans.length,
    total_tasks: totalTasks,
    total_hours: round1(totalHours),
    avg_tasks_per_plan: plans.length ? round1(totalTasks / plans.length) : 0,
    avg_hours_per_plan: plans.length ? round1(totalHours / plans.length) : 0,
    priority_distribution,
    status_distribution,
    completion_rate: totalTasks ? round1((completedTasks / totalTasks) * 100) : 0,
    popular_timeframes,
    recent_activity: recent.sort((a, b) => b.created_at.localeCompare(a.created_at)).slice(0, 10),
    productivity_metrics: {
      plans_this_week: plansThisWeek,
      tasks_completed_this_week: completedThisWeek,
      avg_completion_time: completionCount ? round1(completionMinutes / 60 / completionCount) : 0,
      most_productive_day,
    },
    insights: [],
  };
  analytics.insights = plans.length === 0
    ? ["No data available yet. Create your first plan to see analytics!"]
    : generateInsights(analytics);
  return analytics;
}

export function generateInsights(a: Analytics): string[] {
  const insights: string[] = [];

  if (a.completion_rate > 80) insights.push("Excellent completion rate! You're very productive.");
  else if (a.completion_rate > 60) insights.push("Good completion rate. Consider breaking down larger tasks.");
  else if (a.completion_rate > 40) insights.push("Room for improvement. Try focusing on fewer tasks at once.");
  else insights.push("Consider prioritizing smaller, achievable tasks.");

  const { high, medium, low } = a.priority_distribution;
  const prioritized = high + medium + low;
  if (prioritized > 0) {
    const ratio = high / prioritized;
    if (ratio > 0.5) insights.push("Many high-priority tasks. Consider delegating or rescheduling.");
    else if (ratio < 0.2) insights.push("Consider adding more high-impact tasks to your plans.");
  }

  const weekly = a.productivity_metrics.plans_this_week;
  if (weekly > 3) insights.push("Very active this week! Great momentum.");
  else if (weekly === 0) insights.push("Ready to start a new project?");

  if (a.avg_hours_per_plan > 100) insights.push("Large projects detected. Consider breaking them into phases.");
  else if (a.avg_hours_per_plan < 10) insights.push("Quick projects! Perfect for building momentum.");

  const day = a.productivity_metrics.most_productive_day;
  if (day) insights.push(`Most active on ${day}s. Schedule important work then!`);

  return insights.slice(0, 5);
}

export function computePlanAnalytics(plan: StoredPlan): PlanAnalytics {
  const priority_distribution = emptyPriorities();
  let completed = 0;
  let inProgress = 0;
  let estimated = 0;
  let actual = 0;
  for (const task of plan.tasks) {
    priority_distribution[task.priority]++;
    if (task.status === "completed") completed++;
    if (task.status === "in_progress") inProgress++;
    estimated += task.estimated_hours;
    actual += task.actual_hours ?? 0;
  }
  const total = plan.tasks.length;
  return {
    plan_id: plan.id,
    goal: plan.goal,
    total_tasks: total,
    completed_tasks: completed,
    in_progress_tasks: inProgress,
    completion_rate: total ? round1((completed / total) * 100) : 0,
    priority_distribution,
    total_estimated_hours: round1(estimated),
    total_actual_hours: round1(actual),
    created_at: plan.created_at,
    estimated_completion: estimatedCompletion(plan.tasks),
  };
}
