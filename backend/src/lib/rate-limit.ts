export type RateLimitCheck = {
  allowed: boolean;
  remaining: number;
  limit: number;
  resetMs: number;
};

/** Sliding-window limiter keyed by client id. */
export class RateLimiter {
  private buckets: Map<string, number[]> = new Map();
  private lastSweep = 0;

  constructor(
    readonly maxRequests: number,
    private readonly windowMs = 60_000,
    private readonly clock: () => number = Date.now,
  ) {}

  check(clientId: string): RateLimitCheck {
    const now = this.clock();
    const windowStart = now - this.windowMs;
    if (now - this.lastSweep >= this.windowMs) this.sweep(windowStart, now);
    const timestamps = (this.buckets.get(clientId) ?? []).filter(t => t > windowStart);

    const allowed = timestamps.length < this.maxRequests;
    if (allowed) timestamps.push(now);
    this.buckets.set(clientId, timestamps);

    const oldest = timestamps[0] ?? now;
    return {
      allowed,
      remaining: Math.max(0, this.maxRequests - timestamps.length),
      limit: this.maxRequests,
      resetMs: Math.max(0, oldest + this.windowMs - now),
    };
  }

  get trackedClients(): number {
    return this.buckets.size;
  }

  // Drops clients with no request inside the window.
  private sweep(windowStart: number, now: number): void {
    for (const [clientId, timestamps] of this.buckets) {
      if ((timestamps.at(-1) ?? 0) <= windowStart) this.buckets.delete(clientId);
    }
    this.lastSweep = now;
  }
}
