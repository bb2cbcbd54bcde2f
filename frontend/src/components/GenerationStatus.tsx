import type { GenerationProgress } from "../lib/types.js";

export function GenerationStatus({ progress, connected }: { progress: GenerationProgress | null; connected: boolean }) {
  const percent = progress?.progress ?? 0;
  return (
    <div className={`card generation ${progress?.status ?? "processing"}`} role="status">
      <div className="progress-track">
        <div className="progress-fill" style={{ width: `${percent}%` }} />
      </div>
      <p>
        {progress?.message ?? (connected ? "Waiting for the model..." : "Connecting...")} <strong>{percent}%</strong>
      </p>
    </div>
  );
}
