import { describe, expect, it } from "vitest";
import type { StoredPlan } from "../../types.js";
import { buildCalendar, calendarFilename, escapeText, foldLine } from "../calendar.js";

const plan: StoredPlan = {
  id: "abcdef12-3456",
  goal: "Launch blog, v2",
  timeframe: "1 week",
  start_date: "2025-10-15",
  created_at: "2025-10-14T08:00:00.000Z",
  updated_at: "2025-10-14T08:00:00.000Z",
  tasks: [
    {
      id: 0,
      title: "Design; layout",
      description: "Mockups\nand colors",
      estimated_hours: 4,
      priority: "high",
      dependencies: [],
      status: "completed",
      start_time: "2025-10-15T09:00:00",
      deadline: "2025-10-15T13:00:00",
    },
    {
      id: 1,
      title: "Write posts",
      description: "Two posts",
      estimated_hours: 2,
      priority: "medium",
      dependencies: [0],
      status: "todo",
    },
  ],
};

const ics = buildCalendar(plan, new Date("2025-10-20T08:30:00.000Z"));
const lines = ics.replace(/\r\n /g, "").split("\r\n");

describe("buildCalendar", () => {
  it("wraps events in a calendar named after the goal", () => {
    expect(lines.slice(0, 6)).toEqual([
      "BEGIN:VCALENDAR",
      "VERSION:2.0",
      "PRODID:-//TaskFlow//Task Plan Export//EN",
      "CALSCALE:GREGORIAN",
      "METHOD:PUBLISH",
      "X-WR-CALNAME:Launch blog\\, v2",
    ]);
    expect(ics.endsWith("END:VCALENDAR\r\n")).toBe(true);
  });

  it("writes a scheduled task as an event", () => {
    const start = lines.indexOf("BEGIN:VEVENT");
    expect(lines.slice(start, start + 11)).toEqual([
      "BEGIN:VEVENT",
      "UID:abcdef12-3456-task-0@taskflow",
      "DTSTAMP:20251020T083000Z",
      "DTSTART:20251015T090000",
      "DTEND:20251015T130000",
      "SUMMARY:Design\\; layout",
      "DESCRIPTION:Mockups\\nand colors\\n\\nPriority: high\\nEstimated hours: 4\\nStatus: completed",
      "PRIORITY:1",
      "CATEGORIES:HIGH,COMPLETED",
      "STATUS:CONFIRMED",
      "END:VEVENT",
    ]);
  });

  it("places an unscheduled task at the plan start and names its dependencies", () => {
    expect(lines).toContain("UID:abcdef12-3456-task-1@taskflow");
    expect(lines).toContain("DTSTART:20251015T090000");
    expect(lines).toContain("DTEND:20251015T110000");
    expect(lines).toContain(
      "DESCRIPTION:Two posts\\n\\nPriority: medium\\nEstimated hours: 2\\nStatus: todo\\nDepends on: Design\\; layout",
    );
    expect(lines).toContain("STATUS:TENTATIVE");
  });

  it("folds long lines", () => {
    const raw = ics.split("\r\n");
    expect(raw.every(line => new TextEncoder().encode(line).length <= 75)).toBe(true);
  });
});

describe("foldLine", () => {
  it("continues long lines with a leading space", () => {
    const parts = foldLine("X".repeat(160)).split("\r\n");
    expect(parts.map(p => p.length)).toEqual([75, 75, 12]);
    expect(parts[1].startsWith(" ")).toBe(true);
  });

  it("leaves short lines alone", () => {
    expect(foldLine("SUMMARY:Short")).toBe("SUMMARY:Short");
  });
});

describe("escapeText", () => {
  it("escapes special characters", () => {
    expect(escapeText("a\\b;c,d\ne")).toBe("a\\\\b\\;c\\,d\\ne");
  });
});

describe("calendarFilename", () => {
  it("slugs the goal", () => {
    expect(calendarFilename({ id: "abcdef12-3456", goal: "Launch blog, v2!" })).toBe("launch-blog-v2-abcdef12.ics");
    expect(calendarFilename({ id: "abcdef12-3456", goal: "!!!" })).toBe("plan-abcdef12.ics");
  });
});
