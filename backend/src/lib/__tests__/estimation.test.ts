import { describe, expect, it } from "vitest";
import type { Task } from "../../types.js";
import {
  applyPracticalTimeAdjustments,
  detectComplexityLevel,
  detectTaskType,
  mentions,
  roundToPracticalIncrement,
  taskTypeOverhead,
  technicalStackMultiplier,
} from "../estimation.js";

function task(title: string, estimated_hours: number, dependencies: number[] = []): Task {
  return { id: 0, title, description: "", estimated_hours, priority: "medium", dependencies, status: "todo" };
}

describe("mentions", () => {
  it("matches short keywords only as whole words", () => {
    expect(mentions("maintain the site", ["ai"])).toBe(false);
    expect(mentions("train an ai model", ["ai"])).toBe(true);
  });

  it("matches longer keywords as a word prefix", () => {
    expect(mentions("testing the app", ["test"])).toBe(true);
    expect(mentions("contest entry", ["test"])).toBe(false);
  });
});

describe("task classification", () => {
  it("detects the task type from keywords in order", () => {
    expect(detectTaskType("Research competitors", "")).toBe("research");
    expect(detectTaskType("Write API tests", "")).toBe("testing");
    expect(detectTaskType("Write user guide", "")).toBe("documentation");
    expect(detectTaskType("Misc", "")).toBe("implementation");
  });

  it("detects complexity from keywords", () => {
    expect(detectComplexityLevel("Train machine learning model", "")).toBe("expert");
    expect(detectComplexityLevel("Set up payment integration", "")).toBe("complex");
    expect(detectComplexityLevel("Fix typo", "")).toBe("simple");
    expect(detectComplexityLevel("Team meeting", "")).toBe("moderate");
  });

  it("adds overhead for integration and build work", () => {
    expect(taskTypeOverhead("implementation", "build the api")).toBe(3.5);
    expect(taskTypeOverhead("documentation", "write user guide")).toBe(0.2);
  });

  it("weighs the technical stack", () => {
    expect(technicalStackMultiplier(undefined)).toBe(1);
    expect(technicalStackMultiplier("React and Node")).toBe(0.95);
    expect(technicalStackMultiplier("Rust")).toBe(1.3);
    expect(technicalStackMultiplier("Python and Docker")).toBe(1.1);
    expect(technicalStackMultiplier("COBOL")).toBe(1);
  });
});

describe("roundToPracticalIncrement", () => {
  it("snaps to a nearby increment", () => {
    expect(roundToPracticalIncrement(3.9)).toBe(4);
    expect(roundToPracticalIncrement(11.8)).toBe(12);
  });

  it("falls back to half hours far from an increment", () => {
    expect(roundToPracticalIncrement(5)).toBe(5);
    expect(roundToPracticalIncrement(13.1)).toBe(13);
  });
});

describe("applyPracticalTimeAdjustments", () => {
  it("applies complexity and type overhead to a plain task", () => {
    const [adjusted] = applyPracticalTimeAdjustments([task("Write user guide", 2)]);
    expect(adjusted).toMatchObject({
      task_type: "documentation",
      complexity_level: "moderate",
      base_hours: 2,
      estimated_hours: 3,
      overhead_factors: {
        complexity_multiplier: 1.5,
        experience_multiplier: 1,
        technical_stack_multiplier: 1,
        task_type_overhead: 0.2,
        dependency_overhead: 0,
        coordination_overhead: 0,
      },
    });
  });

  it("adds dependency and coordination buffers for a team", () => {
    const [, adjusted] = applyPracticalTimeAdjustments(
      [task("Write user guide", 2), task("Build API endpoints", 4, [0])],
      { team_size: 3, experience_level: "Beginner", technical_stack: "React" },
    );
    expect(adjusted.complexity_level).toBe("complex");
    expect(adjusted.estimated_hours).toBe(22.5);
    expect(adjusted.overhead_factors?.experience_multiplier).toBe(1.5);
    expect(adjusted.overhead_factors?.task_type_overhead).toBe(3.5);
    expect(adjusted.overhead_factors?.dependency_overhead).toBeCloseTo(2.66, 2);
    expect(adjusted.overhead_factors?.coordination_overhead).toBeCloseTo(2.04, 2);
  });

  it("keeps complexity and type given by the model", () => {
    const [adjusted] = applyPracticalTimeAdjustments([{ ...task("Misc", 2), complexity_level: "simple", task_type: "research" }]);
    expect(adjusted.estimated_hours).toBe(2.5);
  });
});
