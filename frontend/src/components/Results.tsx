import { useEffect, useState } from "react";
import { format, parseISO } from "date-fns";
import { downloadCalendar, errorDetail, getPlanAnalytics, type PlanAnalytics } from "../lib/api.js";
import type { Plan, Task } from "../lib/types.js";
import { GanttView } from "./GanttView.js";
import { HistoryPanel } from "./HistoryPanel.js";
import { OptimizationModal } from "./OptimizationModal.js";
import { TaskList } from "./TaskList.js";
import { TaskSuggestions } from "./TaskSuggestions.js";
import { TimelineView } from "./TimelineView.js";

type View = "list" | "timeline" | "gantt";

const VIEWS: Array<{ value: View; label: string }> = [
  { value: "list", label: "Tasks" },
  { value: "timeline", label: "Timeline" },
  { value: "gantt", label: "Gantt" },
];

export function Results({ plan, onPlanChange }: { plan: Plan; onPlanChange: (plan: Plan) => void }) {
  const [view, setView] = useState<View>("list");
  const [optimizing, setOptimizing] = useState(false);
  const [analytics, setAnalytics] = useState<PlanAnalytics | null>(null);
  const [notice, setNotice] = useState<string | null>(null);

  useEffect(() => {
    let cancelled = false;
    const load = async () => {
      try {
        const next = await getPlanAnalytics(plan.plan_id);
        if (!cancelled) setAnalytics(next);
      } catch (err) {
        if (!cancelled) setNotice(errorDetail(err));
      }
    };
    void load();
    return () => {
      cancelled = true;
    };
  }, [plan]);

  const changeTask = (index: number, task: Task) =>
    onPlanChange({ ...plan, tasks: plan.tasks.map((t, i) => (i === index ? task : t)) });

  const exportCalendar = async () => {
    try {
      const filename = await downloadCalendar(plan.plan_id);
      setNotice(`Saved ${filename}`);
    } catch (err) {
      setNotice(errorDetail(err));
    }
  };

  return (
    <section className="results">
      <header className="card plan-header">
        <div>
          <h2>{plan.goal}</h2>
          <p className="hint">
            {plan.tasks.length} tasks · {plan.total_estimated_hours}h
            {plan.timeframe ? ` · ${plan.timeframe}` : ""}
            {plan.estimated_completion
              ? ` · done by ${format(parseISO(plan.estimated_completion), "EEE d MMM yyyy, HH:mm")}`
              : ""}
          </p>
          {analytics && (
            <p className="hint">
              {analytics.completed_tasks}/{analytics.total_tasks} completed ({analytics.completion_rate}%) ·{" "}
              {analytics.total_actual_hours}h spent
            </p>
          )}
        </div>
        <div className="inline">
          <button type="button" onClick={() => void exportCalendar()}>
            Export .ics
          </button>
          <button type="button" onClick={() => setOptimizing(true)}>
            Optimize
          </button>
        </div>
      </header>
      {notice && <p className="hint">{notice}</p>}

      <TaskSuggestions plan={plan} />

      <nav className="tabs">
        {VIEWS.map(option => (
          <button
            key={option.value}
            type="button"
            className={view === option.value ? "active" : undefined}
            onClick={() => setView(option.value)}
          >
            {option.label}
          </button>
        ))}
      </nav>

      {view === "list" && <TaskList plan={plan} onTaskChange={changeTask} onPlanChange={onPlanChange} />}
      {view === "timeline" && <TimelineView plan={plan} />}
      {view === "gantt" && <GanttView plan={plan} />}

      <HistoryPanel planId={plan.plan_id} tasks={plan.tasks} />

      {optimizing && (
        <OptimizationModal
          plan={plan}
          onApplied={onPlanChange}
          onClose={() => setOptimizing(false)}
        />
      )}
    </section>
  );
}
