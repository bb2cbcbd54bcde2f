import { useState, type FormEvent } from "react";
import type { PlanRequest } from "../lib/types.js";

type Props = {
  disabled: boolean;
  onSubmit: (request: PlanRequest) => void;
};

const EXPERIENCE_LEVELS = ["beginner", "intermediate", "advanced"];

export function GoalForm({ disabled, onSubmit }: Props) {
  const [goal, setGoal] = useState("");
  const [timeframe, setTimeframe] = useState("");
  const [startDate, setStartDate] = useState("");
  const [teamSize, setTeamSize] = useState("");
  const [experience, setExperience] = useState("");
  const [budget, setBudget] = useState("");
  const [stack, setStack] = useState("");

  const goalLength = goal.trim().length;
  const valid = goalLength >= 10 && goalLength <= 500;

  const submit = (event: FormEvent) => {
    event.preventDefault();
    if (!valid) return;
    const team = Number.parseInt(teamSize, 10);
    onSubmit({
      goal: goal.trim(),
      ...(timeframe.trim() ? { timeframe: timeframe.trim() } : {}),
      ...(startDate ? { start_date: startDate } : {}),
      constraints: {
        ...(Number.isInteger(team) && team > 0 ? { team_size: team } : {}),
        ...(experience ? { experience_level: experience } : {}),
        ...(budget.trim() ? { budget: budget.trim() } : {}),
        ...(stack.trim() ? { technical_stack: stack.trim() } : {}),
      },
    });
  };

  return (
    <form className="card goal-form" onSubmit={submit}>
      <label>
        What do you want to achieve?
        <textarea
          value={goal}
          onChange={e => setGoal(e.target.value)}
          placeholder="Launch a personal blog with a custom theme"
          rows={3}
          maxLength={500}
        />
        <span className="hint">{goalLength}/500 characters, at least 10</span>
      </label>

      <div className="grid">
        <label>
          Timeframe
          <input value={timeframe} onChange={e => setTimeframe(e.target.value)} placeholder="2 weeks" />
        </label>
        <label>
          Start date
          <input type="date" value={startDate} onChange={e => setStartDate(e.target.value)} />
        </label>
        <label>
          Team size
          <input type="number" min={1} value={teamSize} onChange={e => setTeamSize(e.target.value)} />
        </label>
        <label>
          Experience
          <select value={experience} onChange={e => setExperience(e.target.value)}>
            <option value="">Not specified</option>
            {EXPERIENCE_LEVELS.map(level => (
              <option key={level} value={level}>
                {level}
              </option>
            ))}
          </select>
        </label>
        <label>
          Budget
          <input value={budget} onChange={e => setBudget(e.target.value)} placeholder="$500" />
        </label>
        <label>
          Technical stack
          <input value={stack} onChange={e => setStack(e.target.value)} placeholder="React, Node" />
        </label>
      </div>

      <button type="submit" disabled={disabled || !valid}>
        {disabled ? "Generating..." : "Generate plan"}
      </button>
    </form>
  );
}
