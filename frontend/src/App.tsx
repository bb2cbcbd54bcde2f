import { useState } from "react";
import { ApiError, errorDetail, generatePlan, getPlan } from "./lib/api.js";
import { recordEvent } from "./lib/history.js";
import type { Plan, PlanRequest } from "./lib/types.js";
import { useWebSocket } from "./hooks/useWebSocket.js";
import { GenerationStatus } from "./components/GenerationStatus.js";
import { GoalForm } from "./components/GoalForm.js";
import { RecentPlans } from "./components/RecentPlans.js";
import { Results } from "./components/Results.js";
import "./App.css";

type Failure = { message: string; suggestions: string[] };

export default function App() {
  const ws = useWebSocket();
  const [plan, setPlan] = useState<Plan | null>(null);
  const [loading, setLoading] = useState(false);
  const [failure, setFailure] = useState<Failure | null>(null);
  const [plansVersion, setPlansVersion] = useState(0);

  const generate = async (request: PlanRequest) => {
    setLoading(true);
    setFailure(null);
    // progress starts right away, so subscribe before posting
    const sessionId = await ws.connect();
    try {
      const created = await generatePlan(request, sessionId);
      setPlan(created);
      setPlansVersion(v => v + 1);
      recordEvent({
        type: "plan.created",
        summary: `Generated ${created.tasks.length} tasks for "${created.goal}"`,
        planId: created.plan_id,
        after: { total_estimated_hours: created.total_estimated_hours, estimated_completion: created.estimated_completion },
      });
    } catch (err) {
      setFailure({ message: errorDetail(err), suggestions: err instanceof ApiError ? err.suggestions : [] });
    } finally {
      setLoading(false);
      ws.disconnect();
    }
  };

  const open = async (planId: string) => {
    setFailure(null);
    try {
      setPlan(await getPlan(planId));
    } catch (err) {
      setFailure({ message: errorDetail(err), suggestions: [] });
    }
  };

  return (
    <div className="app">
      <header className="app-header">
        <h1>TaskFlow</h1>
        <p className="hint">Describe a goal and get a scheduled, dependency-aware plan.</p>
      </header>

      <main className="layout">
        <div className="main-column">
          <GoalForm disabled={loading} onSubmit={request => void generate(request)} />
          {loading && <GenerationStatus progress={ws.progress} connected={ws.connected} />}
          {failure && (
            <div className="card error-box" role="alert">
              <p className="error">{failure.message}</p>
              {failure.suggestions.length > 0 && (
                <ul>
                  {failure.suggestions.map(s => (
                    <li key={s}>{s}</li>
                  ))}
                </ul>
              )}
            </div>
          )}
          {plan && <Results key={plan.plan_id} plan={plan} onPlanChange={setPlan} />}
        </div>
        <RecentPlans
          refreshKey={plansVersion}
          activePlanId={plan?.plan_id}
          onOpen={id => void open(id)}
          onDeleted={id => {
            if (plan?.plan_id === id) setPlan(null);
          }}
        />
      </main>
    </div>
  );
}
