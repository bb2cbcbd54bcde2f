import { useEffect, useState } from "react";
import { errorDetail, getSuggestions } from "../lib/api.js";
import type { Plan, TaskSuggestion } from "../lib/types.js";

export function TaskSuggestions({ plan }: { plan: Plan }) {
  const [suggestions, setSuggestions] = useState<TaskSuggestion[]>([]);
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    let cancelled = false;
    const load = async () => {
      try {
        const result = await getSuggestions(plan.plan_id);
        if (!cancelled) {
          setSuggestions(result.suggestions);
          setError(null);
        }
      } catch (err) {
        if (!cancelled) setError(errorDetail(err));
      }
    };
    void load();
    return () => {
      cancelled = true;
    };
  }, [plan]);

  if (error) return <p className="error">{error}</p>;
  if (suggestions.length === 0) return null;

  return (
    <section className="card suggestions">
      <h3>Up next</h3>
      <ul>
        {suggestions.map(s => (
          <li key={s.task_id}>
            <span className={`badge priority-${s.priority}`}>{s.priority}</span> #{s.task_id + 1} {s.title}{" "}
            <span className="hint">
              {s.estimated_hours}h · {s.reason}
            </span>
          </li>
        ))}
      </ul>
    </section>
  );
}
