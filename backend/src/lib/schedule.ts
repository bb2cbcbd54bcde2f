import {
  addDays,
  addMinutes,
  differenceInMinutes,
  format,
  isAfter,
  isWeekend,
  parseISO,
  set,
} from "date-fns";
import type { Task } from "../types.js";

export const WORKDAY_START_HOUR = 9;
export const HOURS_PER_WORKDAY = 8;
const WORKDAY_END_HOUR = WORKDAY_START_HOUR + HOURS_PER_WORKDAY;

export const LONG_TASK_THRESHOLD_HOURS = 24;
export const SPLIT_CHUNK_HOURS = 8;

export function formatLocal(date: Date): string {
  return format(date, "yyyy-MM-dd'T'HH:mm:ss");
}

const atHour = (date: Date, hours: number) =>
  set(date, { hours, minutes: 0, seconds: 0, milliseconds: 0 });

/** First moment at or after `date` that falls inside a Monday–Friday 09:00–17:00 workday. */
export function nextWorkingMoment(date: Date): Date {
  let current = date;
  if (current >= atHour(current, WORKDAY_END_HOUR)) {
    current = atHour(addDays(current, 1), WORKDAY_START_HOUR);
  } else if (current < atHour(current, WORKDAY_START_HOUR)) {
    current = atHour(current, WORKDAY_START_HOUR);
  }
  while (isWeekend(current)) {
    current = atHour(addDays(current, 1), WORKDAY_START_HOUR);
  }
  return current;
}

/** Moment at which `hours` of work starting at `start` are done, counting only working hours. */
export function addWorkingHours(start: Date, hours: number): Date {
  let current = nextWorkingMoment(start);
  let remainingMinutes = Math.max(0, Math.round(hours * 60));
  while (remainingMinutes > 0) {
    const available = differenceInMinutes(atHour(current, WORKDAY_END_HOUR), current);
    const spent = Math.min(available, remainingMinutes);
    current = addMinutes(current, spent);
    remainingMinutes -= spent;
    if (remainingMinutes > 0) current = nextWorkingMoment(current);
  }
  return current;
}

/**
 * Deadline propagation. Every task starts at the later of the plan start and the
 * latest deadline among its dependencies, and runs for its estimated hours inside
 * working hours. Only dependencies on earlier tasks are honored.
 */
export function calculateDeadlines(tasks: Task[], startDate: string): Task[] {
  const planStart = nextWorkingMoment(parseISO(startDate));
  const ends: Date[] = [];

  return tasks.map((task, index) => {
    let start = planStart;
    for (const dep of task.dependencies) {
      const depEnd = dep >= 0 && dep < index ? ends[dep] : undefined;
      if (depEnd && isAfter(depEnd, start)) start = depEnd;
    }
    const begin = nextWorkingMoment(start);
    const end = addWorkingHours(begin, task.estimated_hours);
    ends.push(end);
    return { ...task, id: index, start_time: formatLocal(begin), deadline: formatLocal(end) };
  });
}

export function totalHours(tasks: Task[]): number {
  return round1(tasks.reduce((sum, t) => sum + t.estimated_hours, 0));
}

/** Latest deadline among the tasks, compared as naive local datetimes. */
export function estimatedCompletion(tasks: Task[]): string | null {
  let latest: string | null = null;
  for (const t of tasks) {
    if (t.deadline && (latest === null || t.deadline > latest)) latest = t.deadline;
  }
  return latest;
}

export function round1(n: number): number {
  return Math.round(n * 10) / 10;
}

/**
 * Calendar days covered by a timeframe such as "2 weeks" or "3 months".
 * A bare number is read as days up to 31, weeks up to 52 and days beyond.
 */
export function parseTimeframeToDays(timeframe: string | null | undefined): number {
  if (!timeframe) return 7;
  const text = timeframe.toLowerCase().trim();
  const match = text.match(/(\d+(?:\.\d+)?)/);
  if (!match) return 7;
  const amount = Number(match[1]);

  let days: number;
  if (/\byears?\b/.test(text)) days = amount * 365;
  else if (/\bmonths?\b/.test(text)) days = amount * 30;
  else if (/\bweeks?\b/.test(text)) days = amount * 7;
  else if (/\bdays?\b/.test(text)) days = amount;
  else if (amount <= 31) days = amount;
  else if (amount <= 52) days = amount * 7;
  else days = amount;

  return Math.max(1, Math.round(days));
}

export type TimeframeBudget = {
  days: number;
  availableHours: number;
  minHours: number;
  maxHours: number;
};

export function timeframeBudget(timeframe: string): TimeframeBudget {
  const days = parseTimeframeToDays(timeframe);
  const availableHours = days * HOURS_PER_WORKDAY;
  return { days, availableHours, minHours: round1(availableHours * 0.8), maxHours: round1(availableHours * 1.2) };
}

const TOLERANCE = 0.01;

/** True when the total estimate fills 80–120% of the timeframe's hours. */
export function isTimeframeCompliant(tasks: Task[], timeframe: string): boolean {
  const { minHours, maxHours } = timeframeBudget(timeframe);
  const total = tasks.reduce((sum, t) => sum + t.estimated_hours, 0);
  return total >= minHours - TOLERANCE && total <= maxHours + TOLERANCE;
}

/**
 * Scale estimates toward the nearer bound of the timeframe budget. High priority
 * tasks keep more of their time and low priority tasks less; the weighted hours
 * are then normalized so the total lands at 90% (growing) or 110% (shrinking)
 * of the available hours. Only the one-hour floor can push it out of range.
 */
export function scaleToTimeframe(tasks: Task[], timeframe: string): Task[] {
  const { availableHours, minHours, maxHours } = timeframeBudget(timeframe);
  const total = tasks.reduce((sum, t) => sum + t.estimated_hours, 0);
  if (total <= 0 || (total >= minHours && total <= maxHours)) return tasks;

  const expanding = total < minHours;
  const target = availableHours * (expanding ? 0.9 : 1.1);

  const weighted = tasks.map(task => {
    let factor = 1;
    if (task.priority === "high") factor *= 1.1;
    else if (task.priority === "low") factor *= 0.9;
    if (expanding && task.estimated_hours < 4) factor *= 1.05;
    if (!expanding && task.estimated_hours > 8) factor *= 0.95;
    return task.estimated_hours * factor;
  });
  const scale = target / weighted.reduce((sum, h) => sum + h, 0);

  return tasks.map((task, i) => ({ ...task, estimated_hours: round1(Math.max(1, weighted[i] * scale)) }));
}

/**
 * Break tasks longer than `threshold` hours into `chunk`-hour parts. The first
 * part keeps the original dependencies; every later part depends on the one before.
 */
export function splitLongTasks(
  tasks: Task[],
  threshold = LONG_TASK_THRESHOLD_HOURS,
  chunk = SPLIT_CHUNK_HOURS,
): Task[] {
  const pieces: Array<{ task: Task; part: number }> = [];
  const lastIndex = new Map<number, number>();

  tasks.forEach((task, origin) => {
    if (task.estimated_hours <= threshold) {
      lastIndex.set(origin, pieces.length);
      pieces.push({ task, part: 0 });
      return;
    }
    const parts = Math.ceil(task.estimated_hours / chunk);
    let remaining = task.estimated_hours;
    for (let part = 1; part <= parts; part++) {
      const hours = round1(Math.min(chunk, remaining));
      remaining = round1(remaining - hours);
      pieces.push({
        task: {
          ...task,
          title: `${task.title} (Part ${part} of ${parts})`,
          estimated_hours: hours,
        },
        part,
      });
    }
    lastIndex.set(origin, pieces.length - 1);
  });

  return pieces.map(({ task, part }, index) => {
    let dependencies: number[];
    if (part > 1) {
      dependencies = [index - 1];
    } else {
      // a dependency on a split task waits for its final part
      dependencies = task.dependencies.flatMap(dep => {
        const mapped = lastIndex.get(dep);
        return mapped === undefined ? [] : [mapped];
      });
    }
    return { ...task, id: index, dependencies };
  });
}
