import type { IRateLimitRepository } from "./rate-limit-repository.js";
import type { RateLimitEntry } from "./repository-types.js";

export class InMemoryRateLimitRepository implements IRateLimitRepository {
  private readonly entries = new Map<string, RateLimitEntry>();

  private makeKey(key: string, scope: string): string {
    return `${scope}\u0000${key}`;
  }

  async increment(key: string, scope: string, windowMs: number): Promise<RateLimitEntry> {
    const now = Date.now();
    const id = this.makeKey(key, scope);
    const existing = this.entries.get(id);
    const entry: RateLimitEntry =
      existing && now - existing.windowStart < windowMs
        ? { ...existing, count: existing.count + 1 }
        : { key, scope, count: 1, windowStart: now };
    this.entries.set(id, entry);
    return { ...entry };
  }

  async get(key: string, scope: string): Promise<RateLimitEntry | null> {
    const entry = this.entries.get(this.makeKey(key, scope));
    return entry ? { ...entry } : null;
  }

  async purgeStale(windowMs: number): Promise<number> {
    const cutoff = Date.now() - windowMs;
    let removed = 0;
    for (const [id, entry] of this.entries) {
      if (entry.windowStart < cutoff) {
        this.entries.delete(id);
        removed++;
      }
    }
    return removed;
  }

  async reset(): Promise<void> {
    this.entries.clear();
  }
}
