import { useEffect, useState } from "react";
import { HISTORY_CHANGED_EVENT, STORAGE_KEY, listEvents, reloadHistory, type HistoryEvent, type HistoryFilters } from "../lib/history.js";

/**
 * Activity log matching `filters`, kept current across components and tabs.
 * Pass a memoized filters object; a new object on every render re-subscribes.
 */
export function useHistory(filters: HistoryFilters): HistoryEvent[] {
  const [events, setEvents] = useState<HistoryEvent[]>(() => listEvents(filters));

  useEffect(() => {
    const refresh = () => setEvents(listEvents(filters));
    const onStorage = (event: StorageEvent) => {
      if (event.key !== STORAGE_KEY) return;
      reloadHistory();
      refresh();
    };
    refresh();
    window.addEventListener(HISTORY_CHANGED_EVENT, refresh);
    window.addEventListener("storage", onStorage);
    return () => {
      window.removeEventListener(HISTORY_CHANGED_EVENT, refresh);
      window.removeEventListener("storage", onStorage);
    };
  }, [filters]);

  return events;
}
