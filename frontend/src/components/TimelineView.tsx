import { useMemo } from "react";
import { format } from "date-fns";
import { planStartOf, scheduleTasks, type ScheduledTask } from "../lib/schedule.js";
import type { Plan } from "../lib/types.js";

/** Tasks grouped by the day they start on, in schedule order. */
export function groupByDay(items: ScheduledTask[]): Array<{ day: string; items: ScheduledTask[] }> {
  const sorted = [...items].sort((a, b) => a.start.getTime() - b.start.getTime() || a.index - b.index);
  const groups: Array<{ day: string; items: ScheduledTask[] }> = [];
  for (const item of sorted) {
    const day = format(item.start, "yyyy-MM-dd");
    const last = groups[groups.length - 1];
    if (last && last.day === day) last.items.push(item);
    else groups.push({ day, items: [item] });
  }
  return groups;
}

export function TimelineView({ plan }: { plan: Plan }) {
  const groups = useMemo(() => groupByDay(scheduleTasks(plan.tasks, planStartOf(plan))), [plan]);

  if (groups.length === 0) return <p className="hint">This plan has no tasks.</p>;

  return (
    <div className="timeline">
      {groups.map(group => (
        <section key={group.day} className="timeline-day">
          <h4>{format(new Date(`${group.day}T00:00:00`), "EEEE, d MMMM yyyy")}</h4>
          <ul>
            {group.items.map(({ task, index, start, end }) => (
              <li key={index} className={`timeline-item status-${task.status}`}>
                <span className="time">
                  {format(start, "HH:mm")}–{format(end, "EEE HH:mm")}
                </span>
                <span className={`badge priority-${task.priority}`}>{task.priority}</span>
                <strong>#{index + 1}</strong> {task.title} <span className="hint">{task.estimated_hours}h</span>
              </li>
            ))}
          </ul>
        </section>
      ))}
    </div>
  );
}
