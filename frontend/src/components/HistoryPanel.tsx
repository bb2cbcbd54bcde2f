import { useMemo, useState } from "react";
import { useHistory } from "../hooks/useHistory.js";
import { clearEvents, formatEvent, type HistoryEventType, type HistoryFilters } from "../lib/history.js";
import type { Task } from "../lib/types.js";

const EVENT_TYPES: Array<{ value: HistoryEventType; label: string }> = [
  { value: "plan.created", label: "Plans" },
  { value: "plan.optimized", label: "Optimizations" },
  { value: "task.status", label: "Status" },
  { value: "task.updated", label: "Edits" },
  { value: "task.comment", label: "Comments" },
  { value: "task.subtasks", label: "Subtasks" },
];

const PAGE_SIZE = 50;

const show = (value: unknown) => (value === undefined ? "(none)" : JSON.stringify(value));

export function HistoryPanel({ planId, tasks }: { planId: string; tasks: Task[] }) {
  const [types, setTypes] = useState<HistoryEventType[]>([]);
  const [taskId, setTaskId] = useState<number | undefined>(undefined);
  const [search, setSearch] = useState("");

  const filters = useMemo<HistoryFilters>(
    () => ({
      planId,
      limit: PAGE_SIZE,
      ...(types.length > 0 ? { types } : {}),
      ...(taskId !== undefined ? { taskId } : {}),
      ...(search.trim() ? { search: search.trim() } : {}),
    }),
    [planId, types, taskId, search],
  );
  const events = useHistory(filters);

  const toggleType = (type: HistoryEventType) =>
    setTypes(current => (current.includes(type) ? current.filter(t => t !== type) : [...current, type]));

  return (
    <section className="card history">
      <header>
        <h3>Activity</h3>
        <button
          type="button"
          className="link"
          onClick={() => {
            if (window.confirm("Clear the whole activity log?")) clearEvents();
          }}
        >
          Clear
        </button>
      </header>

      <div className="inline filters">
        {EVENT_TYPES.map(option => (
          <label key={option.value} className="radio">
            <input type="checkbox" checked={types.includes(option.value)} onChange={() => toggleType(option.value)} />
            {option.label}
          </label>
        ))}
        <select
          value={taskId === undefined ? "" : String(taskId)}
          onChange={e => setTaskId(e.target.value === "" ? undefined : Number(e.target.value))}
        >
          <option value="">All tasks</option>
          {tasks.map((task, index) => (
            <option key={index} value={index}>
              #{index + 1} {task.title}
            </option>
          ))}
        </select>
        <input value={search} onChange={e => setSearch(e.target.value)} placeholder="Search" />
      </div>

      {events.length === 0 ? (
        <p className="hint">No activity yet.</p>
      ) : (
        <ul className="history-list">
          {events.map(event => (
            <li key={event.id}>
              <code>{formatEvent(event)}</code>
              {event.after && (
                <table className="diff">
                  <tbody>
                    {Object.keys(event.after).map(field => (
                      <tr key={field}>
                        <th>{field}</th>
                        <td className="before">{show(event.before?.[field])}</td>
                        <td className="after">{show(event.after?.[field])}</td>
                      </tr>
                    ))}
                  </tbody>
                </table>
              )}
            </li>
          ))}
        </ul>
      )}
    </section>
  );
}
