import { describe, expect, it } from "vitest";
import type { GeneratedPlan } from "../../types.js";
import { PlanCache, planCacheKey } from "../cache.js";
import { MetricsCollector } from "../metrics.js";
import { RateLimiter } from "../rate-limit.js";

const generated = (goal: string): GeneratedPlan => ({
  goal,
  timeframe: null,
  start_date: "2025-10-15",
  tasks: [],
  model_used: "test-model",
  prompt: "",
  raw_response: "",
  tokens_used: 0,
});

describe("planCacheKey", () => {
  it("is an md5 of goal, timeframe and start date", () => {
    expect(planCacheKey("goal", "1 week", "2025-10-15")).toMatch(/^[0-9a-f]{32}$/);
    expect(planCacheKey("goal", "1 week", "2025-10-15")).toBe(planCacheKey("goal", "1 week", "2025-10-15"));
    expect(planCacheKey("goal", "1 week")).not.toBe(planCacheKey("goal", "2 weeks"));
    expect(planCacheKey("goal")).toBe(planCacheKey("goal", null, null));
  });
});

describe("PlanCache", () => {
  it("evicts the oldest entry when full", () => {
    const cache = new PlanCache(2);
    cache.set("a", generated("A"));
    cache.set("b", generated("B"));
    cache.set("c", generated("C"));
    expect(cache.get("a")).toBeUndefined();
    expect(cache.get("c")?.goal).toBe("C");
    expect(cache.stats()).toEqual({ size: 2, max_size: 2 });
  });

  it("overwrites an existing key without evicting", () => {
    const cache = new PlanCache(2);
    cache.set("a", generated("A"));
    cache.set("b", generated("B"));
    cache.set("a", generated("A2"));
    expect(cache.get("a")?.goal).toBe("A2");
    expect(cache.get("b")?.goal).toBe("B");
  });
});

describe("RateLimiter", () => {
  it("allows a fixed number of requests per window and client", () => {
    let now = 1_000;
    const limiter = new RateLimiter(2, 60_000, () => now);
    expect(limiter.check("a")).toEqual({ allowed: true, remaining: 1, limit: 2, resetMs: 60_000 });
    now = 11_000;
    expect(limiter.check("a").allowed).toBe(true);
    expect(limiter.check("a")).toEqual({ allowed: false, remaining: 0, limit: 2, resetMs: 50_000 });
    expect(limiter.check("b").allowed).toBe(true);
  });

  it("frees slots as the window slides", () => {
    let now = 0;
    const limiter = new RateLimiter(1, 60_000, () => now);
    limiter.check("a");
    now = 60_001;
    expect(limiter.check("a").allowed).toBe(true);
  });

  it("forgets clients that went quiet", () => {
    let now = 0;
    const limiter = new RateLimiter(3, 60_000, () => now);
    for (let i = 0; i < 1_000; i++) limiter.check(`client-${i}`);
    expect(limiter.trackedClients).toBe(1_000);

    now = 30_000;
    limiter.check("client-0");
    expect(limiter.trackedClients).toBe(1_000);

    now = 70_000;
    limiter.check("late");
    expect(limiter.trackedClients).toBe(2);
  });
});

describe("MetricsCollector", () => {
  it("aggregates requests, errors and cache use", () => {
    const metrics = new MetricsCollector();
    metrics.recordRequest("/api/plans", 10, 201);
    metrics.recordRequest("/api/plans", 30, 500);
    metrics.recordRequest("/api/health", 5, 200);
    metrics.recordLlmCall(150);
    metrics.recordCacheHit();
    metrics.recordCacheMiss();
    metrics.recordCacheMiss();

    expect(metrics.snapshot()).toEqual({
      total_requests: 3,
      total_errors: 1,
      error_rate: 33.33,
      avg_response_time_ms: 15,
      llm_calls: 1,
      llm_tokens_used: 150,
      cache_hit_rate: 33.33,
      cache_hits: 1,
      cache_misses: 2,
      endpoint_stats: {
        "/api/plans": { count: 2, total_duration_ms: 40, avg_duration_ms: 20 },
        "/api/health": { count: 1, total_duration_ms: 5, avg_duration_ms: 5 },
      },
    });
  });

  it("reports zeros before any traffic", () => {
    const snapshot = new MetricsCollector().snapshot();
    expect(snapshot.error_rate).toBe(0);
    expect(snapshot.cache_hit_rate).toBe(0);
    expect(snapshot.avg_response_time_ms).toBe(0);
  });
});
