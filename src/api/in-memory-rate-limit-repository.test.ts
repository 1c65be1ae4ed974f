import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { InMemoryRateLimitRepository } from "./in-memory-rate-limit-repository.js";

describe("InMemoryRateLimitRepository", () => {
  let repo: InMemoryRateLimitRepository;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-02-21T12:00:00Z"));
    repo = new InMemoryRateLimitRepository();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("counts within a window and restarts after it", async () => {
    await repo.increment("k", "s", 1000);
    expect((await repo.increment("k", "s", 1000)).count).toBe(2);

    vi.advanceTimersByTime(1000);
    expect((await repo.increment("k", "s", 1000)).count).toBe(1);
  });

  it("does not share state between scopes", async () => {
    await repo.increment("k", "a", 1000);
    expect((await repo.increment("k", "b", 1000)).count).toBe(1);
  });

  it("returns copies, not live entries", async () => {
    const entry = await repo.increment("k", "s", 1000);
    entry.count = 99;
    expect((await repo.get("k", "s"))?.count).toBe(1);
  });

  it("purges stale entries and resets", async () => {
    await repo.increment("old", "s", 1000);
    vi.advanceTimersByTime(5000);
    await repo.increment("new", "s", 1000);

    expect(await repo.purgeStale(1000)).toBe(1);
    await repo.reset();
    expect(await repo.get("new", "s")).toBeNull();
  });
});
