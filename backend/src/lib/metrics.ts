type EndpointStats = { count: number; total_duration_ms: number; avg_duration_ms: number };

export type MetricsSnapshot = {
  total_requests: number;
  total_errors: number;
  error_rate: number;
  avg_response_time_ms: number;
  llm_calls: number;
  llm_tokens_used: number;
  cache_hit_rate: number;
  cache_hits: number;
  cache_misses: number;
  endpoint_stats: Record<string, EndpointStats>;
};

const round2 = (n: number) => Math.round(n * 100) / 100;
const percent = (part: number, whole: number) => (whole === 0 ? 0 : round2((part / whole) * 100));

export class MetricsCollector {
  private requests = 0;
  private errors = 0;
  private totalDurationMs = 0;
  private endpoints: Map<string, { count: number; totalMs: number }> = new Map();
  private llmCalls = 0;
  private llmTokens = 0;
  private cacheHits = 0;
  private cacheMisses = 0;

  recordRequest(endpoint: string, durationMs: number, statusCode: number): void {
    this.requests++;
    this.totalDurationMs += durationMs;
    if (statusCode >= 400) this.errors++;
    const stats = this.endpoints.get(endpoint) ?? { count: 0, totalMs: 0 };
    stats.count++;
    stats.totalMs += durationMs;
    this.endpoints.set(endpoint, stats);
  }

  recordLlmCall(tokens = 0): void {
    this.llmCalls++;
    this.llmTokens += tokens;
  }

  recordCacheHit(): void {
    this.cacheHits++;
  }

  recordCacheMiss(): void {
    this.cacheMisses++;
  }

  snapshot(): MetricsSnapshot {
    const endpoint_stats: Record<string, EndpointStats> = {};
    for (const [endpoint, { count, totalMs }] of this.endpoints) {
      endpoint_stats[endpoint] = {
        count,
        total_duration_ms: round2(totalMs),
        avg_duration_ms: round2(totalMs / count),
      };
    }
    return {
      total_requests: this.requests,
      total_errors: this.errors,
      error_rate: percent(this.errors, this.requests),
      avg_response_time_ms: this.requests === 0 ? 0 : round2(this.totalDurationMs / this.requests),
      llm_calls: this.llmCalls,
      llm_tokens_used: this.llmTokens,
      cache_hit_rate: percent(this.cacheHits, this.cacheHits + this.cacheMisses),
      cache_hits: this.cacheHits,
      cache_misses: this.cacheMisses,
      endpoint_stats,
    };
  }
}
