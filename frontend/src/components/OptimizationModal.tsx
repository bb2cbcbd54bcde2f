import { useState } from "react";
import { applyOptimization, errorDetail, optimizePlan } from "../lib/api.js";
import { recordEvent } from "../lib/history.js";
import type { OptimizationAnalysis, OptimizationType, Plan, RecommendationType } from "../lib/types.js";

type Props = {
  plan: Plan;
  onApplied: (plan: Plan) => void;
  onClose: () => void;
};

const TYPES: Array<{ value: OptimizationType; label: string }> = [
  { value: "time", label: "Finish sooner" },
  { value: "resources", label: "Balance workload" },
  { value: "risk", label: "Reduce risk" },
];

const APPLICABLE: ReadonlySet<RecommendationType> = new Set(["parallelization", "sequencing", "priority_adjustment"]);

export function OptimizationModal({ plan, onApplied, onClose }: Props) {
  const [type, setType] = useState<OptimizationType>("time");
  const [analysis, setAnalysis] = useState<OptimizationAnalysis | null>(null);
  const [selected, setSelected] = useState<Set<number>>(new Set());
  const [busy, setBusy] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const [result, setResult] = useState<string | null>(null);

  const analyze = async () => {
    setBusy(true);
    setError(null);
    setResult(null);
    try {
      const next = await optimizePlan(plan.plan_id, type);
      setAnalysis(next);
      setSelected(new Set(next.recommendations.flatMap((r, i) => (APPLICABLE.has(r.type) ? [i] : []))));
    } catch (err) {
      setError(errorDetail(err));
    } finally {
      setBusy(false);
    }
  };

  const apply = async () => {
    if (!analysis) return;
    const recommendations = analysis.recommendations.filter((_, i) => selected.has(i));
    setBusy(true);
    setError(null);
    try {
      const applied = await applyOptimization(plan.plan_id, recommendations);
      recordEvent({
        type: "plan.optimized",
        summary: `Applied ${applied.applied_recommendations} of ${recommendations.length} ${type} recommendations`,
        planId: plan.plan_id,
        before: { estimated_completion: plan.estimated_completion },
        after: { estimated_completion: applied.plan.estimated_completion },
      });
      setResult(applied.message);
      onApplied(applied.plan);
    } catch (err) {
      setError(errorDetail(err));
    } finally {
      setBusy(false);
    }
  };

  const toggle = (index: number) => {
    const next = new Set(selected);
    if (next.has(index)) next.delete(index);
    else next.add(index);
    setSelected(next);
  };

  return (
    <div className="modal-backdrop" role="dialog" aria-modal="true" aria-label="Optimize plan">
      <div className="modal card">
        <header>
          <h3>Optimize plan</h3>
          <button type="button" className="link" onClick={onClose}>
            Close
          </button>
        </header>

        <div className="inline">
          {TYPES.map(option => (
            <label key={option.value} className="radio">
              <input
                type="radio"
                name="optimization-type"
                checked={type === option.value}
                onChange={() => setType(option.value)}
              />
              {option.label}
            </label>
          ))}
          <button type="button" disabled={busy} onClick={() => void analyze()}>
            {busy && !analysis ? "Analyzing..." : "Analyze"}
          </button>
        </div>

        {analysis && (
          <>
            <p>{analysis.summary}</p>
            <p className="hint">Expected improvement: {analysis.estimated_improvement}</p>
            {analysis.warnings.length > 0 && (
              <ul className="warnings">
                {analysis.warnings.map(warning => (
                  <li key={warning}>{warning}</li>
                ))}
              </ul>
            )}
            <ul className="recommendations">
              {analysis.recommendations.map((rec, i) => (
                <li key={`${rec.type}-${i}`}>
                  <label>
                    <input type="checkbox" checked={selected.has(i)} onChange={() => toggle(i)} />
                    <span className={`badge priority-${rec.priority}`}>{rec.type.replaceAll("_", " ")}</span>
                    {rec.suggestion}
                  </label>
                  <p className="hint">
                    Tasks {rec.task_ids.map(id => `#${id + 1}`).join(", ") || "none"} · {rec.impact}
                    {!APPLICABLE.has(rec.type) && " · advisory only"}
                  </p>
                </li>
              ))}
            </ul>
            <button type="button" disabled={busy || selected.size === 0} onClick={() => void apply()}>
              Apply {selected.size} selected
            </button>
          </>
        )}

        {result && <p className="success">{result}</p>}
        {error && <p className="error">{error}</p>}
      </div>
    </div>
  );
}
