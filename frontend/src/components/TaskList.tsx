import type { Plan, Task } from "../lib/types.js";
import { TaskCard } from "./TaskCard.js";

type Props = {
  plan: Plan;
  onTaskChange: (index: number, task: Task) => void;
  onPlanChange: (plan: Plan) => void;
};

export function TaskList({ plan, onTaskChange, onPlanChange }: Props) {
  return (
    <ol className="task-list">
      {plan.tasks.map((task, index) => (
        <TaskCard
          key={`${plan.plan_id}-${index}`}
          planId={plan.plan_id}
          index={index}
          task={task}
          tasks={plan.tasks}
          onTaskChange={onTaskChange}
          onPlanChange={onPlanChange}
        />
      ))}
    </ol>
  );
}
