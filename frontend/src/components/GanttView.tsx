import { useMemo } from "react";
import { addDays, format } from "date-fns";
import { barPosition, planStartOf, scheduleBounds, scheduleTasks } from "../lib/schedule.js";
import type { Plan } from "../lib/types.js";

export function GanttView({ plan }: { plan: Plan }) {
  const items = useMemo(() => scheduleTasks(plan.tasks, planStartOf(plan)), [plan]);
  const bounds = scheduleBounds(items);

  if (!bounds) return <p className="hint">This plan has no tasks.</p>;

  const days = Array.from({ length: bounds.days }, (_, i) => addDays(bounds.start, i));

  return (
    <div className="gantt">
      <div className="gantt-row gantt-header">
        <div className="gantt-label">Task</div>
        <div className="gantt-track">
          {days.map(day => (
            <span key={day.toISOString()} className="gantt-day" style={{ width: `${100 / bounds.days}%` }}>
              {format(day, "d MMM")}
            </span>
          ))}
        </div>
      </div>
      {items.map(item => {
        const { left, width } = barPosition(item, bounds);
        return (
          <div key={item.index} className="gantt-row">
            <div className="gantt-label" title={item.task.title}>
              #{item.index + 1} {item.task.title}
            </div>
            <div className="gantt-track">
              <div
                className={`gantt-bar priority-${item.task.priority} status-${item.task.status}`}
                style={{ left: `${left}%`, width: `${width}%` }}
                title={`${format(item.start, "d MMM HH:mm")} → ${format(item.end, "d MMM HH:mm")}`}
              />
            </div>
          </div>
        );
      })}
    </div>
  );
}
