import { useEffect, useState } from "react";
import { format, parseISO } from "date-fns";
import { deletePlan, errorDetail, listPlans } from "../lib/api.js";
import type { PlanListItem } from "../lib/types.js";

type Props = {
  refreshKey: number;
  activePlanId?: string;
  onOpen: (planId: string) => void;
  onDeleted: (planId: string) => void;
};

export function RecentPlans({ refreshKey, activePlanId, onOpen, onDeleted }: Props) {
  const [plans, setPlans] = useState<PlanListItem[]>([]);
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    let cancelled = false;
    const load = async () => {
      try {
        const list = await listPlans();
        if (!cancelled) {
          setPlans(list);
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
  }, [refreshKey]);

  const remove = async (planId: string) => {
    try {
      await deletePlan(planId);
      setPlans(current => current.filter(p => p.id !== planId));
      onDeleted(planId);
    } catch (err) {
      setError(errorDetail(err));
    }
  };

  return (
    <aside className="card recent-plans">
      <h3>Recent plans</h3>
      {error && <p className="error">{error}</p>}
      {plans.length === 0 && !error && <p className="hint">No saved plans yet.</p>}
      <ul>
        {plans.map(plan => (
          <li key={plan.id} className={plan.id === activePlanId ? "active" : undefined}>
            <button type="button" className="link" onClick={() => onOpen(plan.id)}>
              {plan.goal}
            </button>
            <span className="hint">
              {format(parseISO(plan.created_at), "d MMM yyyy")}
              {plan.timeframe ? ` · ${plan.timeframe}` : ""}
            </span>
            <button type="button" className="link danger" onClick={() => void remove(plan.id)}>
              Delete
            </button>
          </li>
        ))}
      </ul>
    </aside>
  );
}
