import type { PlanCache } from "./lib/cache.js";
import type { LlmClient } from "./lib/llm.js";
import type { MetricsCollector } from "./lib/metrics.js";
import type { PlanRepository } from "./lib/plan-repository.js";
import type { TaskPlanner } from "./lib/planner.js";
import type { ProgressHub } from "./lib/progress-hub.js";
import type { RateLimiter } from "./lib/rate-limit.js";

/** Services shared by the route handlers. */
export type AppContext = {
  corsOrigin: string;
  repo: PlanRepository;
  llm: LlmClient;
  planner: TaskPlanner;
  hub: ProgressHub;
  cache: PlanCache;
  metrics: MetricsCollector;
  rateLimiter: RateLimiter;
};
