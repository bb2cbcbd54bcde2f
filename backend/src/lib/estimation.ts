import type { ComplexityLevel, Constraints, OverheadFactors, Task, TaskType } from "../types.js";

const TYPE_KEYWORDS: Array<[TaskType, string[]]> = [
  ["research", ["research", "analyze", "study", "investigate", "explore", "survey"]],
  ["design", ["design", "architecture", "plan", "wireframe", "mockup", "prototype", "blueprint"]],
  ["implementation", ["implement", "build", "create", "develop", "code", "program", "construct"]],
  ["testing", ["test", "qa", "quality", "debug", "verify", "validate"]],
  ["deployment", ["deploy", "release", "publish", "launch", "production", "host"]],
  ["documentation", ["document", "write", "manual", "guide", "tutorial", "readme"]],
];

const EXPERT_KEYWORDS = ["ai", "machine learning", "blockchain", "distributed", "microservices", "scalable", "enterprise", "security audit"];
const COMPLEX_KEYWORDS = ["api", "integration", "database", "authentication", "payment", "third-party", "framework", "architecture", "system"];
const SIMPLE_KEYWORDS = ["setup", "configure", "install", "basic", "simple", "update", "fix", "bug", "small"];

const FAMILIAR_TECH = ["javascript", "typescript", "python", "react", "node", "html", "css", "sql", "git"];
const LEARNING_TECH = ["rust", "go", "kubernetes", "docker", "microservices", "ai", "machine learning", "blockchain"];

export const COMPLEXITY_MULTIPLIERS: Record<ComplexityLevel, number> = {
  simple: 1.0,
  moderate: 1.5,
  complex: 2.5,
  expert: 4.0,
};

export const EXPERIENCE_MULTIPLIERS: Record<string, number> = {
  beginner: 1.5,
  intermediate: 1.0,
  advanced: 0.8,
};

const TYPE_OVERHEAD_HOURS: Record<TaskType, number> = {
  research: 0.5,
  design: 1.0,
  implementation: 2.0,
  testing: 0.5,
  deployment: 1.0,
  documentation: 0.2,
};

const PRACTICAL_INCREMENTS = [0.5, 1, 1.5, 2, 2.5, 3, 4, 6, 8, 12, 16, 24];

const escapeRegExp = (s: string) => s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

/**
 * Keyword test on lowercase text. Words of three letters or fewer must match
 * whole ("ai" does not match "maintain"); longer ones match as a word prefix
 * ("test" matches "testing").
 */
export function mentions(text: string, keywords: readonly string[]): boolean {
  return keywords.some(word => {
    const tail = word.length <= 3 ? "\\b" : "";
    return new RegExp(`\\b${escapeRegExp(word)}${tail}`).test(text);
  });
}

export function detectTaskType(title: string, description: string): TaskType {
  const text = `${title} ${description}`.toLowerCase();
  for (const [type, words] of TYPE_KEYWORDS) {
    if (mentions(text, words)) return type;
  }
  return "implementation";
}

export function detectComplexityLevel(title: string, description: string): ComplexityLevel {
  const text = `${title} ${description}`.toLowerCase();
  if (mentions(text, EXPERT_KEYWORDS)) return "expert";
  if (mentions(text, COMPLEX_KEYWORDS)) return "complex";
  if (mentions(text, SIMPLE_KEYWORDS)) return "simple";
  return "moderate";
}

/** Fixed hours added per task for review, debugging and release work. */
export function taskTypeOverhead(type: TaskType, text: string): number {
  let overhead = TYPE_OVERHEAD_HOURS[type];
  if (mentions(text, ["api", "integration", "database"])) overhead += 1.0;
  if (mentions(text, ["deploy", "production", "release"])) overhead += 1.5;
  if (mentions(text, ["implement", "build", "create"])) overhead += 0.5;
  return overhead;
}

export function technicalStackMultiplier(stack: string | undefined): number {
  if (!stack) return 1.0;
  const text = stack.toLowerCase();
  const familiar = mentions(text, FAMILIAR_TECH);
  const learning = mentions(text, LEARNING_TECH);
  if (learning && !familiar) return 1.3;
  if (learning && familiar) return 1.1;
  if (familiar) return 0.95;
  return 1.0;
}

export function roundToPracticalIncrement(hours: number): number {
  let closest = PRACTICAL_INCREMENTS[0];
  for (const inc of PRACTICAL_INCREMENTS) {
    if (Math.abs(inc - hours) < Math.abs(closest - hours)) closest = inc;
  }
  if (Math.abs(hours - closest) < 0.25) return closest;
  return Math.round(hours * 2) / 2;
}

/**
 * Turn the model's raw estimates into working estimates: complexity, experience
 * and stack multipliers, task-type overhead, then integration and coordination
 * buffers. The inputs are kept on the task as `base_hours` and `overhead_factors`.
 */
export function applyPracticalTimeAdjustments(tasks: Task[], constraints: Constraints = {}): Task[] {
  const experience = (constraints.experience_level ?? "intermediate").toLowerCase();
  const experienceMultiplier = EXPERIENCE_MULTIPLIERS[experience] ?? 1.0;
  const teamSize = constraints.team_size ?? 1;
  const coordinationRate = 0.05 * Math.max(0, teamSize - 1);
  const stackMultiplier = technicalStackMultiplier(constraints.technical_stack);

  return tasks.map(task => {
    const text = `${task.title} ${task.description}`.toLowerCase();
    const taskType = task.task_type ?? detectTaskType(task.title, task.description);
    const complexity = task.complexity_level ?? detectComplexityLevel(task.title, task.description);

    const complexityMultiplier = COMPLEXITY_MULTIPLIERS[complexity];
    const typeOverhead = taskTypeOverhead(taskType, text);

    let hours = task.estimated_hours * complexityMultiplier * experienceMultiplier * stackMultiplier;
    hours += typeOverhead;

    const dependencyOverhead = task.dependencies.length > 0 ? hours * 0.15 : 0;
    hours += dependencyOverhead;

    const coordinationOverhead = hours * coordinationRate;
    hours += coordinationOverhead;

    const overhead_factors: OverheadFactors = {
      complexity_multiplier: complexityMultiplier,
      experience_multiplier: experienceMultiplier,
      technical_stack_multiplier: stackMultiplier,
      task_type_overhead: typeOverhead,
      dependency_overhead: Math.round(dependencyOverhead * 100) / 100,
      coordination_overhead: Math.round(coordinationOverhead * 100) / 100,
    };

    return {
      ...task,
      task_type: taskType,
      complexity_level: complexity,
      base_hours: task.estimated_hours,
      estimated_hours: roundToPracticalIncrement(hours),
      overhead_factors,
    };
  });
}
