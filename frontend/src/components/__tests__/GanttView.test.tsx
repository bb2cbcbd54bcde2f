import { renderToStaticMarkup } from "react-dom/server";
import { describe, expect, it } from "vitest";
import type { Plan, Task } from "../../lib/types.js";
import { scheduleTasks } from "../../lib/schedule.js";
import { GanttView } from "../GanttView.js";
import { TimelineView, groupByDay } from "../TimelineView.js";

function task(title: string, estimated_hours: number, dependencies: number[] = [], extra: Partial<Task> = {}): Task {
  return { id: 0, title, description: "", estimated_hours, priority: "medium", dependencies, status: "todo", ...extra };
}

const plan = (tasks: Task[]): Plan => ({
  plan_id: "p1",
  goal: "Launch a personal blog",
  timeframe: "1 week",
  start_date: "2025-10-14",
  tasks,
  created_at: "2025-10-14T08:00:00.000Z",
  total_estimated_hours: tasks.reduce((sum, t) => sum + t.estimated_hours, 0),
  estimated_completion: null,
});

describe("GanttView", () => {
  const html = renderToStaticMarkup(<GanttView plan={plan([task("Outline", 4), task("Draft", 6, [0], { priority: "high" })])} />);

  it("draws one column per day", () => {
    expect(html).toContain('<span class="gantt-day" style="width:50%">14 Oct</span>');
    expect(html).toContain('<span class="gantt-day" style="width:50%">15 Oct</span>');
  });

  it("positions bars from the shared schedule", () => {
    expect(html).toContain(
      '<div class="gantt-bar priority-medium status-todo" style="left:18.75%;width:8.33%" title="14 Oct 09:00 → 14 Oct 13:00"></div>',
    );
    expect(html).toContain(
      '<div class="gantt-bar priority-high status-todo" style="left:27.08%;width:45.83%" title="14 Oct 13:00 → 15 Oct 11:00"></div>',
    );
  });

  it("renders a hint for an empty plan", () => {
    expect(renderToStaticMarkup(<GanttView plan={plan([])} />)).toBe('<p class="hint">This plan has no tasks.</p>');
  });
});

describe("TimelineView", () => {
  const tasks = [
    task("Outline", 4),
    task("Draft", 6, [0]),
    task("Review", 2, [0], { start_time: "2025-10-15T14:00:00", deadline: "2025-10-15T16:00:00" }),
    task("Publish", 1, [1]),
  ];

  it("groups tasks by start day in time order", () => {
    const groups = groupByDay(scheduleTasks(tasks, "2025-10-14"));
    expect(groups.map(g => [g.day, g.items.map(i => i.index)])).toEqual([
      ["2025-10-14", [0, 1]],
      ["2025-10-15", [3, 2]],
    ]);
  });

  it("shows a heading per day", () => {
    const html = renderToStaticMarkup(<TimelineView plan={plan(tasks)} />);
    expect(html).toContain("<h4>Tuesday, 14 October 2025</h4>");
    expect(html).toContain("<h4>Wednesday, 15 October 2025</h4>");
  });
});
