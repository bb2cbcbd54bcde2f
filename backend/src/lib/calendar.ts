import { format, isValid, parseISO } from "date-fns";
import { addWorkingHours, nextWorkingMoment } from "./schedule.js";
import type { Priority, StoredPlan, Task } from "../types.js";

const ICS_PRIORITY: Record<Priority, number> = { high: 1, medium: 5, low: 9 };
const MAX_LINE_OCTETS = 75;

/** Escape a TEXT value (commas, semicolons, backslashes and newlines). */
export function escapeText(value: string): string {
  return value
    .replace(/\\/g, "\\\\")
    .replace(/;/g, "\\;")
    .replace(/,/g, "\\,")
    .replace(/\r?\n/g, "\\n");
}

/** Fold a content line to 75 octets; continuation lines start with a space. */
export function foldLine(line: string): string {
  const encoder = new TextEncoder();
  if (encoder.encode(line).length <= MAX_LINE_OCTETS) return line;

  const out: string[] = [];
  let current = "";
  let octets = 0;
  for (const ch of line) {
    const size = encoder.encode(ch).length;
    const limit = out.length === 0 ? MAX_LINE_OCTETS : MAX_LINE_OCTETS - 1;
    if (octets + size > limit) {
      out.push(current);
      current = "";
      octets = 0;
    }
    current += ch;
    octets += size;
  }
  out.push(current);
  return out.join("\r\n ");
}

const icsLocal = (date: Date) => format(date, "yyyyMMdd'T'HHmmss");

// Unscheduled tasks start at the first working moment of the plan.
function taskWindow(task: Task, planStart: string | null): { start: Date; end: Date } | undefined {
  const parsed = parseISO(task.start_time ?? planStart ?? "");
  if (!isValid(parsed)) return undefined;
  const start = task.start_time ? parsed : nextWorkingMoment(parsed);
  const end = task.deadline ? parseISO(task.deadline) : addWorkingHours(start, task.estimated_hours);
  return { start, end: isValid(end) ? end : addWorkingHours(start, task.estimated_hours) };
}

function describeTask(task: Task, tasks: Task[]): string {
  const lines = [
    task.description,
    "",
    `Priority: ${task.priority}`,
    `Estimated hours: ${task.estimated_hours}`,
    `Status: ${task.status}`,
  ];
  if (task.dependencies.length > 0) {
    const names = task.dependencies.map(dep => tasks[dep]?.title ?? `Task ${dep + 1}`);
    lines.push(`Depends on: ${names.join(", ")}`);
  }
  return lines.join("\n");
}

/** iCalendar document with one event per scheduled task, in floating local time. */
export function buildCalendar(plan: StoredPlan, now: Date = new Date()): string {
  const stamp = now.toISOString().replace(/[-:]/g, "").replace(/\.\d{3}/, "");
  const lines = [
    "BEGIN:VCALENDAR",
    "VERSION:2.0",
    "PRODID:-//TaskFlow//Task Plan Export//EN",
    "CALSCALE:GREGORIAN",
    "METHOD:PUBLISH",
    `X-WR-CALNAME:${escapeText(plan.goal)}`,
  ];

  plan.tasks.forEach((task, index) => {
    const window = taskWindow(task, plan.start_date);
    if (!window) return;
    lines.push(
      "BEGIN:VEVENT",
      `UID:${plan.id}-task-${index}@taskflow`,
      `DTSTAMP:${stamp}`,
      `DTSTART:${icsLocal(window.start)}`,
      `DTEND:${icsLocal(window.end)}`,
      `SUMMARY:${escapeText(task.title)}`,
      `DESCRIPTION:${escapeText(describeTask(task, plan.tasks))}`,
      `PRIORITY:${ICS_PRIORITY[task.priority]}`,
      `CATEGORIES:${task.priority.toUpperCase()},${task.status.toUpperCase()}`,
      `STATUS:${task.status === "completed" ? "CONFIRMED" : "TENTATIVE"}`,
      "END:VEVENT",
    );
  });

  lines.push("END:VCALENDAR");
  return lines.map(foldLine).join("\r\n") + "\r\n";
}

/** `<goal slug>-<first 8 chars of the plan id>.ics` */
export function calendarFilename(plan: Pick<StoredPlan, "id" | "goal">): string {
  const slug = plan.goal
    .replace(/[^a-zA-Z0-9 _-]/g, "")
    .trim()
    .replace(/\s+/g, "-")
    .toLowerCase()
    .slice(0, 50);
  return `${slug || "plan"}-${plan.id.slice(0, 8)}.ics`;
}
