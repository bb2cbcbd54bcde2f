import {
  addDays,
  addMinutes,
  differenceInCalendarDays,
  differenceInMinutes,
  isValid,
  isWeekend,
  parseISO,
  set,
  startOfDay,
} from "date-fns";
import type { Plan, Task } from "./types.js";

export const WORKDAY_START_HOUR = 9;
export const HOURS_PER_WORKDAY = 8;
const WORKDAY_END_HOUR = WORKDAY_START_HOUR + HOURS_PER_WORKDAY;

const atHour = (date: Date, hours: number) => set(date, { hours, minutes: 0, seconds: 0, milliseconds: 0 });

export function nextWorkingMoment(date: Date): Date {
  let current = date;
  if (current >= atHour(current, WORKDAY_END_HOUR)) current = atHour(addDays(current, 1), WORKDAY_START_HOUR);
  else if (current < atHour(current, WORKDAY_START_HOUR)) current = atHour(current, WORKDAY_START_HOUR);
  while (isWeekend(current)) current = atHour(addDays(current, 1), WORKDAY_START_HOUR);
  return current;
}

export function addWorkingHours(start: Date, hours: number): Date {
  let current = nextWorkingMoment(start);
  let remaining = Math.max(0, Math.round(hours * 60));
  while (remaining > 0) {
    const spent = Math.min(differenceInMinutes(atHour(current, WORKDAY_END_HOUR), current), remaining);
    current = addMinutes(current, spent);
    remaining -= spent;
    if (remaining > 0) current = nextWorkingMoment(current);
  }
  return current;
}

export type ScheduledTask = {
  task: Task;
  index: number;
  start: Date;
  end: Date;
};

const parseTime = (value: string | undefined) => {
  if (!value) return undefined;
  const date = parseISO(value);
  return isValid(date) ? date : undefined;
};

/** The day a plan's schedule is anchored to. */
export function planStartOf(plan: Pick<Plan, "start_date" | "tasks" | "created_at">): string {
  return plan.start_date ?? plan.tasks[0]?.start_time?.slice(0, 10) ?? plan.created_at.slice(0, 10);
}

/**
 * Display schedule for the timeline and gantt views. The server's start and
 * deadline are kept when present, but a task is never shown starting before
 * its dependencies end; missing times are derived from the estimate in
 * working hours. A dependency that closes a cycle is ignored.
 */
export function scheduleTasks(tasks: Task[], planStart: string): ScheduledTask[] {
  const anchor = parseTime(planStart) ?? startOfDay(new Date());
  const base = nextWorkingMoment(anchor);
  const resolved = new Map<number, ScheduledTask>();
  const visiting = new Set<number>();

  const resolve = (index: number): ScheduledTask => {
    const known = resolved.get(index);
    if (known) return known;
    visiting.add(index);

    const task = tasks[index];
    let earliest = base;
    for (const dep of task.dependencies) {
      if (dep < 0 || dep >= tasks.length || visiting.has(dep)) continue;
      const { end } = resolve(dep);
      if (end > earliest) earliest = end;
    }

    const serverStart = parseTime(task.start_time);
    const serverEnd = parseTime(task.deadline);
    let start: Date;
    let end: Date;
    if (serverStart && serverStart >= earliest) {
      start = serverStart;
      end = serverEnd && serverEnd > start ? serverEnd : addWorkingHours(start, task.estimated_hours);
    } else {
      start = nextWorkingMoment(earliest);
      end = addWorkingHours(start, task.estimated_hours);
    }

    visiting.delete(index);
    const item = { task, index, start, end };
    resolved.set(index, item);
    return item;
  };

  return tasks.map((_, index) => resolve(index));
}

export type ScheduleBounds = {
  start: Date;
  end: Date;
  days: number;
};

/** Whole days covered by the schedule, from the first start to the last end. */
export function scheduleBounds(items: ScheduledTask[]): ScheduleBounds | undefined {
  if (items.length === 0) return undefined;
  const first = Math.min(...items.map(i => i.start.getTime()));
  const last = Math.max(...items.map(i => i.end.getTime()));
  const start = startOfDay(first);
  const end = new Date(last);
  return { start, end, days: differenceInCalendarDays(end, start) + 1 };
}

const round2 = (n: number) => Math.round(n * 100) / 100;

/** Left offset and width of a bar, as percentages of the bounds' days. */
export function barPosition(item: ScheduledTask, bounds: ScheduleBounds): { left: number; width: number } {
  const span = addDays(bounds.start, bounds.days).getTime() - bounds.start.getTime();
  const left = ((item.start.getTime() - bounds.start.getTime()) / span) * 100;
  const width = ((item.end.getTime() - item.start.getTime()) / span) * 100;
  return { left: round2(left), width: round2(Math.max(0.5, width)) };
}
