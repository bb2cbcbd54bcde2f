import { describe, expect, it } from "vitest";
import type { Task } from "../../types.js";
import {
  addWorkingHours,
  calculateDeadlines,
  estimatedCompletion,
  formatLocal,
  isTimeframeCompliant,
  nextWorkingMoment,
  parseTimeframeToDays,
  scaleToTimeframe,
  splitLongTasks,
  timeframeBudget,
  totalHours,
} from "../schedule.js";

function task(title: string, estimated_hours: number, dependencies: number[] = [], extra: Partial<Task> = {}): Task {
  return { id: 0, title, description: "", estimated_hours, priority: "medium", dependencies, status: "todo", ...extra };
}

const at = (iso: string) => new Date(iso);

describe("nextWorkingMoment", () => {
  it("keeps a moment inside working hours", () => {
    expect(formatLocal(nextWorkingMoment(at("2025-10-15T11:30:00")))).toBe("2025-10-15T11:30:00");
  });

  it("moves an early morning start to 09:00 the same day", () => {
    expect(formatLocal(nextWorkingMoment(at("2025-10-15T06:00:00")))).toBe("2025-10-15T09:00:00");
  });

  it("moves 17:00 and later to the next morning", () => {
    expect(formatLocal(nextWorkingMoment(at("2025-10-15T17:00:00")))).toBe("2025-10-16T09:00:00");
  });

  it("skips weekends", () => {
    expect(formatLocal(nextWorkingMoment(at("2025-10-18T10:00:00")))).toBe("2025-10-20T09:00:00");
    expect(formatLocal(nextWorkingMoment(at("2025-10-17T18:00:00")))).toBe("2025-10-20T09:00:00");
  });
});

describe("addWorkingHours", () => {
  it("fits work inside a single day", () => {
    expect(formatLocal(addWorkingHours(at("2025-10-15T09:00:00"), 4))).toBe("2025-10-15T13:00:00");
  });

  it("ends exactly at close of business", () => {
    expect(formatLocal(addWorkingHours(at("2025-10-15T09:00:00"), 8))).toBe("2025-10-15T17:00:00");
  });

  it("carries work over a weekend", () => {
    expect(formatLocal(addWorkingHours(at("2025-10-17T13:00:00"), 8))).toBe("2025-10-20T13:00:00");
  });

  it("counts fractional hours in minutes", () => {
    expect(formatLocal(addWorkingHours(at("2025-10-15T09:00:00"), 1.5))).toBe("2025-10-15T10:30:00");
  });
});

describe("calculateDeadlines", () => {
  const scheduled = calculateDeadlines(
    [task("Design", 4), task("Backend", 6, [0]), task("Frontend", 12, [0]), task("Release", 2, [1, 2])],
    "2025-10-15",
  );

  it("starts tasks without dependencies at the plan start", () => {
    expect(scheduled[0]).toMatchObject({ id: 0, start_time: "2025-10-15T09:00:00", deadline: "2025-10-15T13:00:00" });
  });

  it("starts a task after its dependency ends", () => {
    expect(scheduled[1]).toMatchObject({ start_time: "2025-10-15T13:00:00", deadline: "2025-10-16T11:00:00" });
    expect(scheduled[2]).toMatchObject({ start_time: "2025-10-15T13:00:00", deadline: "2025-10-16T17:00:00" });
  });

  it("waits for the latest of several dependencies", () => {
    expect(scheduled[3]).toMatchObject({ start_time: "2025-10-17T09:00:00", deadline: "2025-10-17T11:00:00" });
  });

  it("ignores dependencies on later tasks", () => {
    const [first] = calculateDeadlines([task("A", 2, [1]), task("B", 2)], "2025-10-15");
    expect(first.start_time).toBe("2025-10-15T09:00:00");
  });

  it("moves a weekend plan start to Monday", () => {
    const [first] = calculateDeadlines([task("A", 2)], "2025-10-18");
    expect(first.start_time).toBe("2025-10-20T09:00:00");
  });
});

describe("plan totals", () => {
  it("sums hours to one decimal", () => {
    expect(totalHours([task("A", 1.25), task("B", 2.1)])).toBe(3.4);
  });

  it("reports the latest deadline, not the last one", () => {
    const tasks = [task("A", 1, [], { deadline: "2025-10-20T12:00:00" }), task("B", 1, [], { deadline: "2025-10-16T10:00:00" })];
    expect(estimatedCompletion(tasks)).toBe("2025-10-20T12:00:00");
    expect(estimatedCompletion([task("A", 1)])).toBeNull();
  });
});

describe("parseTimeframeToDays", () => {
  it.each([
    ["2 weeks", 14],
    ["3 months", 90],
    ["1 year", 365],
    ["5 days", 5],
    ["1.5 weeks", 11],
    ["10", 10],
    ["40", 280],
    ["100", 100],
    ["0.2 days", 1],
    ["soon", 7],
  ])("reads %s as %i days", (timeframe, days) => {
    expect(parseTimeframeToDays(timeframe)).toBe(days);
  });

  it("defaults to a week", () => {
    expect(parseTimeframeToDays(undefined)).toBe(7);
  });
});

describe("timeframe budget", () => {
  it("allows 80 to 120 percent of the working hours", () => {
    expect(timeframeBudget("1 week")).toEqual({ days: 7, availableHours: 56, minHours: 44.8, maxHours: 67.2 });
  });

  it("checks compliance against the budget", () => {
    expect(isTimeframeCompliant([task("A", 30), task("B", 20)], "1 week")).toBe(true);
    expect(isTimeframeCompliant([task("A", 40)], "1 week")).toBe(false);
    expect(isTimeframeCompliant([task("A", 70)], "1 week")).toBe(false);
  });

  it("scales short plans up, favouring high priority work", () => {
    const scaled = scaleToTimeframe(
      [task("A", 20, [], { priority: "high" }), task("B", 10), task("C", 10, [], { priority: "low" })],
      "1 week",
    );
    expect(scaled.map(t => t.estimated_hours)).toEqual([27, 12.3, 11.1]);
    expect(isTimeframeCompliant(scaled, "1 week")).toBe(true);
  });

  it("brings a mostly low priority plan up into the budget", () => {
    const low = { priority: "low" } as const;
    const scaled = scaleToTimeframe([task("A", 10, [], low), task("B", 10, [], low), task("C", 10, [], low), task("D", 6)], "1 week");
    expect(scaled.map(t => t.estimated_hours)).toEqual([13.7, 13.7, 13.7, 9.2]);
    expect(isTimeframeCompliant(scaled, "1 week")).toBe(true);
  });

  it("scales long plans down into the budget", () => {
    const high = { priority: "high" } as const;
    const scaled = scaleToTimeframe(
      [task("A", 20, [], high), task("B", 20, [], high), task("C", 20, [], high), task("D", 10)],
      "1 week",
    );
    expect(scaled.map(t => t.estimated_hours)).toEqual([17.8, 17.8, 17.8, 8.1]);
    expect(isTimeframeCompliant(scaled, "1 week")).toBe(true);
  });

  it("cannot shrink tasks below one hour", () => {
    const scaled = scaleToTimeframe(Array.from({ length: 12 }, (_, i) => task(`T${i}`, 2)), "1 day");
    expect(scaled.every(t => t.estimated_hours === 1)).toBe(true);
    expect(isTimeframeCompliant(scaled, "1 day")).toBe(false);
  });

  it("leaves compliant plans alone", () => {
    const tasks = [task("A", 50)];
    expect(scaleToTimeframe(tasks, "1 week")).toBe(tasks);
  });
});

describe("splitLongTasks", () => {
  const split = splitLongTasks([task("Setup", 4), task("Build", 30, [0]), task("Ship", 2, [1])]);

  it("splits a long task into eight hour parts", () => {
    expect(split.map(t => [t.title, t.estimated_hours])).toEqual([
      ["Setup", 4],
      ["Build (Part 1 of 4)", 8],
      ["Build (Part 2 of 4)", 8],
      ["Build (Part 3 of 4)", 8],
      ["Build (Part 4 of 4)", 6],
      ["Ship", 2],
    ]);
  });

  it("chains the parts and points dependents at the last part", () => {
    expect(split.map(t => t.dependencies)).toEqual([[], [0], [1], [2], [3], [4]]);
    expect(split.map(t => t.id)).toEqual([0, 1, 2, 3, 4, 5]);
  });

  it("keeps tasks at the threshold whole", () => {
    expect(splitLongTasks([task("A", 24)])).toHaveLength(1);
  });
});

describe("calculateDeadlines over generated plans", () => {
  // Park-Miller generator so every run checks the same plans.
  function random(seed: number) {
    let state = seed;
    return () => {
      state = (state * 48271) % 2147483647;
      return state / 2147483647;
    };
  }

  it("never starts a task before its dependencies end", () => {
    const next = random(42);
    for (let round = 0; round < 50; round++) {
      const count = 1 + Math.floor(next() * 12);
      const tasks = Array.from({ length: count }, (_, i) => {
        const deps = Array.from({ length: i }, (_, d) => d).filter(() => next() < 0.3);
        return task(`T${i}`, Math.round((0.5 + next() * 30) * 2) / 2, deps);
      });

      const scheduled = calculateDeadlines(tasks, "2025-10-17");
      for (const t of scheduled) {
        const start = t.start_time ?? "";
        const deadline = t.deadline ?? "";
        expect(deadline >= start).toBe(true);
        for (const dep of t.dependencies) {
          expect(start >= (scheduled[dep].deadline ?? "")).toBe(true);
        }
      }
    }
  });
});
