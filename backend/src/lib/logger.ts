import pino from "pino";

let rootLogger: pino.Logger | null = null;

/** Create the root logger. Later calls replace it (tests, config reload). */
export function initLogger(level: string): pino.Logger {
  rootLogger = pino({
    name: "taskflow",
    level,
    formatters: {
      level: (label: string) => ({ level: label.toUpperCase() }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
  return rootLogger;
}

/**
 * Child logger for a subsystem (`http`, `llm`, `planner`, `ws`, `db`).
 * Falls back to a logger at LOG_LEVEL when initLogger has not run yet.
 */
export function getLogger(subsystem: string): pino.Logger {
  const root = rootLogger ?? initLogger(process.env.LOG_LEVEL ?? "info");
  return root.child({ subsystem });
}
