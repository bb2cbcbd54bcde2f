import { format } from "date-fns";
import { z } from "zod";

export const STORAGE_KEY = "taskflow:history:v1";
export const MAX_EVENTS = 2000;
export const HISTORY_CHANGED_EVENT = "taskflow:history:changed";

const historyEventSchema = z.object({
  id: z.string(),
  timestamp: z.number(),
  type: z.enum(["plan.created", "plan.optimized", "task.updated", "task.status", "task.comment", "task.subtasks"]),
  summary: z.string(),
  planId: z.string().optional(),
  taskId: z.number().int().optional(),
  before: z.record(z.unknown()).optional(),
  after: z.record(z.unknown()).optional(),
});

export type HistoryEvent = z.infer<typeof historyEventSchema>;
export type HistoryEventType = HistoryEvent["type"];

export type HistoryFilters = {
  types?: HistoryEventType[];
  planId?: string;
  taskId?: number;
  search?: string;
  limit?: number;
  offset?: number;
};

let cache: HistoryEvent[] | null = null;

const storage = (): Storage | undefined => (typeof window === "undefined" ? undefined : window.localStorage);

// Entries that no longer match the schema are dropped rather than failing the whole log.
function parseStored(raw: string | null): HistoryEvent[] {
  if (!raw) return [];
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (err) {
    console.warn("history: stored log is not valid JSON, starting fresh", err);
    return [];
  }
  if (!Array.isArray(value)) return [];
  return value.flatMap(item => {
    const parsed = historyEventSchema.safeParse(item);
    return parsed.success ? [parsed.data] : [];
  });
}

function load(): HistoryEvent[] {
  cache ??= parseStored(storage()?.getItem(STORAGE_KEY) ?? null);
  return cache;
}

function save(events: HistoryEvent[]): void {
  cache = events;
  try {
    storage()?.setItem(STORAGE_KEY, JSON.stringify(events));
  } catch (err) {
    // quota exceeded or storage disabled: the in-memory log stays authoritative
    console.warn("history: could not persist activity log", err);
  }
  if (typeof window !== "undefined") window.dispatchEvent(new Event(HISTORY_CHANGED_EVENT));
}

/** Forget the in-memory copy so the next read comes from localStorage (e.g. after another tab wrote). */
export function reloadHistory(): void {
  cache = null;
}

export function appendEvents(events: HistoryEvent[]): void {
  if (events.length === 0) return;
  save([...load(), ...events].slice(-MAX_EVENTS));
}

export function appendEvent(event: HistoryEvent): void {
  appendEvents([event]);
}

const newId = () =>
  typeof crypto !== "undefined" && "randomUUID" in crypto
    ? crypto.randomUUID()
    : `${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 10)}`;

export function recordEvent(event: Omit<HistoryEvent, "id" | "timestamp">, now: number = Date.now()): HistoryEvent {
  const full: HistoryEvent = { id: newId(), timestamp: now, ...event };
  appendEvent(full);
  return full;
}

/** Newest first. */
export function listEvents(filters: HistoryFilters = {}): HistoryEvent[] {
  const search = filters.search?.trim().toLowerCase();
  const types = filters.types && filters.types.length > 0 ? new Set(filters.types) : undefined;

  const matching = [...load()].reverse().filter(
    e =>
      (!types || types.has(e.type)) &&
      (filters.planId === undefined || e.planId === filters.planId) &&
      (filters.taskId === undefined || e.taskId === filters.taskId) &&
      (!search || e.summary.toLowerCase().includes(search)),
  );
  const offset = filters.offset ?? 0;
  return matching.slice(offset, filters.limit === undefined ? undefined : offset + filters.limit);
}

export function clearEvents(): void {
  save([]);
}

export function prune(maxEvents: number = MAX_EVENTS): void {
  save(load().slice(-maxEvents));
}

const sameValue = (a: unknown, b: unknown) =>
  (typeof a === "object" && a !== null) || (typeof b === "object" && b !== null)
    ? JSON.stringify(a) === JSON.stringify(b)
    : a === b;

export type FieldDiff = { before?: Record<string, unknown>; after?: Record<string, unknown> };

/** The fields that differ between two snapshots, on each side. Empty when nothing changed. */
export function diffObjects(before?: Record<string, unknown>, after?: Record<string, unknown>): FieldDiff {
  if (!before && !after) return {};
  if (!before) return { after };
  if (!after) return { before };

  const changed = [...new Set([...Object.keys(before), ...Object.keys(after)])].filter(
    key => !sameValue(before[key], after[key]),
  );
  if (changed.length === 0) return {};

  const pick = (source: Record<string, unknown>) =>
    Object.fromEntries(changed.filter(key => key in source).map(key => [key, source[key]]));
  return { before: pick(before), after: pick(after) };
}

export function formatEvent(event: HistoryEvent): string {
  return `[${format(event.timestamp, "HH:mm:ss")}] ${event.type} • ${event.summary}`;
}
