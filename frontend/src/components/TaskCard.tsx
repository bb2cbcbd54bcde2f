import { useState } from "react";
import { format, parseISO } from "date-fns";
import {
  addComment,
  deleteComment,
  detailsPatch,
  errorDetail,
  generateSubtasks,
  updateTask,
  updateTaskStatus,
} from "../lib/api.js";
import { diffObjects, recordEvent } from "../lib/history.js";
import { TASK_STATUSES, type Comment, type Plan, type Task, type TaskStatus } from "../lib/types.js";

type Props = {
  planId: string;
  index: number;
  task: Task;
  tasks: Task[];
  onTaskChange: (index: number, task: Task) => void;
  onPlanChange: (plan: Plan) => void;
};

const STATUS_LABELS: Record<TaskStatus, string> = {
  todo: "To do",
  in_progress: "In progress",
  completed: "Completed",
  blocked: "Blocked",
};

const formatTime = (value?: string) => (value ? format(parseISO(value), "EEE d MMM, HH:mm") : "not scheduled");

export function TaskCard({ planId, index, task, tasks, onTaskChange, onPlanChange }: Props) {
  const [expanded, setExpanded] = useState(false);
  const [busy, setBusy] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const [hours, setHours] = useState(String(task.estimated_hours));
  const [actual, setActual] = useState(task.actual_hours === undefined ? "" : String(task.actual_hours));
  const [notes, setNotes] = useState(task.notes ?? "");
  const [commentText, setCommentText] = useState("");
  const [comments, setComments] = useState<Comment[]>(task.comments ?? []);

  const run = async (action: () => Promise<void>) => {
    setBusy(true);
    setError(null);
    try {
      await action();
    } catch (err) {
      setError(errorDetail(err));
    } finally {
      setBusy(false);
    }
  };

  const changeStatus = (status: TaskStatus) =>
    run(async () => {
      const updated = await updateTaskStatus(planId, index, { status });
      recordEvent({
        type: "task.status",
        summary: `${task.title}: ${STATUS_LABELS[task.status]} → ${STATUS_LABELS[status]}`,
        planId,
        taskId: index,
        ...diffObjects({ status: task.status }, { status: updated.status }),
      });
      onTaskChange(index, updated);
    });

  const saveDetails = () =>
    run(async () => {
      const { task: updated, plan } = await updateTask(planId, index, detailsPatch(hours, actual, notes));
      const diff = diffObjects(
        { estimated_hours: task.estimated_hours, actual_hours: task.actual_hours, notes: task.notes },
        { estimated_hours: updated.estimated_hours, actual_hours: updated.actual_hours, notes: updated.notes },
      );
      if (diff.after) recordEvent({ type: "task.updated", summary: `Updated ${task.title}`, planId, taskId: index, ...diff });
      onPlanChange(plan);
    });

  const breakDown = () =>
    run(async () => {
      const subtasks = await generateSubtasks(planId, index);
      recordEvent({
        type: "task.subtasks",
        summary: `Generated ${subtasks.length} subtasks for ${task.title}`,
        planId,
        taskId: index,
      });
      onTaskChange(index, { ...task, subtasks });
    });

  const postComment = () =>
    run(async () => {
      const text = commentText.trim();
      if (!text) return;
      const comment = await addComment(planId, index, text);
      const next = [...comments, comment];
      setComments(next);
      setCommentText("");
      recordEvent({ type: "task.comment", summary: `Comment on ${task.title}: ${text}`, planId, taskId: index });
      onTaskChange(index, { ...task, comments: next });
    });

  const removeComment = (commentId: number) =>
    run(async () => {
      const next = await deleteComment(planId, index, commentId);
      setComments(next);
      onTaskChange(index, { ...task, comments: next });
    });

  const dependencyTitles = task.dependencies.flatMap(dep => {
    const dependency = tasks[dep];
    return dependency ? [`#${dep + 1} ${dependency.title}`] : [];
  });

  return (
    <li className={`card task-card status-${task.status}`}>
      <header>
        <button type="button" className="link" onClick={() => setExpanded(!expanded)} aria-expanded={expanded}>
          <span className="task-number">#{index + 1}</span> {task.title}
        </button>
        <span className={`badge priority-${task.priority}`}>{task.priority}</span>
        <select
          value={task.status}
          disabled={busy}
          onChange={e => {
            const next = TASK_STATUSES.find(s => s === e.target.value);
            if (next && next !== task.status) void changeStatus(next);
          }}
        >
          {TASK_STATUSES.map(status => (
            <option key={status} value={status}>
              {STATUS_LABELS[status]}
            </option>
          ))}
        </select>
      </header>

      <p className="meta">
        {task.estimated_hours}h · {formatTime(task.start_time)} → {formatTime(task.deadline)}
        {dependencyTitles.length > 0 && <> · after {dependencyTitles.join(", ")}</>}
      </p>

      {expanded && (
        <div className="task-details">
          <p>{task.description}</p>

          <div className="grid">
            <label>
              Estimated hours
              <input type="number" min={0.5} step={0.5} value={hours} onChange={e => setHours(e.target.value)} />
            </label>
            <label>
              Actual hours
              <input type="number" min={0} step={0.5} value={actual} onChange={e => setActual(e.target.value)} />
            </label>
          </div>
          <label>
            Notes
            <textarea rows={2} value={notes} onChange={e => setNotes(e.target.value)} />
          </label>
          <button type="button" disabled={busy} onClick={() => void saveDetails()}>
            Save
          </button>

          <section>
            <h4>Subtasks</h4>
            {task.subtasks && task.subtasks.length > 0 ? (
              <ul className="subtasks">
                {task.subtasks.map(subtask => (
                  <li key={subtask.id}>
                    {subtask.title} <span className="hint">{subtask.estimated_hours}h</span>
                  </li>
                ))}
              </ul>
            ) : (
              <p className="hint">No subtasks yet.</p>
            )}
            <button type="button" disabled={busy} onClick={() => void breakDown()}>
              {task.subtasks?.length ? "Regenerate subtasks" : "Break down"}
            </button>
          </section>

          <section>
            <h4>Comments</h4>
            <ul className="comments">
              {comments.map(comment => (
                <li key={comment.id}>
                  <strong>{comment.author}</strong> <span className="hint">{formatTime(comment.created_at)}</span>
                  <p>{comment.text}</p>
                  <button type="button" className="link" disabled={busy} onClick={() => void removeComment(comment.id)}>
                    Delete
                  </button>
                </li>
              ))}
            </ul>
            <div className="inline">
              <input value={commentText} onChange={e => setCommentText(e.target.value)} placeholder="Add a comment" />
              <button type="button" disabled={busy || !commentText.trim()} onClick={() => void postComment()}>
                Post
              </button>
            </div>
          </section>
        </div>
      )}

      {error && <p className="error">{error}</p>}
    </li>
  );
}
