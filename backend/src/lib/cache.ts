import { createHash } from "node:crypto";
import type { GeneratedPlan } from "../types.js";

export function planCacheKey(goal: string, timeframe?: string | null, startDate?: string | null): string {
  return createHash("md5").update(`${goal}:${timeframe ?? ""}:${startDate ?? ""}`).digest("hex");
}

/** In-memory plan cache; the oldest entry is evicted first once full. */
export class PlanCache {
  private entries: Map<string, GeneratedPlan> = new Map();

  constructor(private readonly maxSize = 100) {}

  get(key: string): GeneratedPlan | undefined {
    return this.entries.get(key);
  }

  set(key: string, plan: GeneratedPlan): void {
    if (!this.entries.has(key) && this.entries.size >= this.maxSize) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) this.entries.delete(oldest.value);
    }
    this.entries.set(key, plan);
  }

  clear(): void {
    this.entries.clear();
  }

  stats(): { size: number; max_size: number } {
    return { size: this.entries.size, max_size: this.maxSize };
  }
}
