import { type Context, Hono } from "hono";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { AppError, RateLimitedError } from "../errors.js";
import { InMemoryRateLimitRepository } from "../in-memory-rate-limit-repository.js";
import { apiRateLimitRules, type RateLimitConfig, type RateLimitRule, rateLimitByRoute } from "./rate-limit.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const byTestIp = (c: Context) => c.req.header("x-test-ip") ?? "unknown";

function buildApp(rules: RateLimitRule[], defaultConfig: RateLimitConfig, repo: InMemoryRateLimitRepository) {
  const app = new Hono();
  app.onError((err, c) => {
    if (err instanceof AppError) return c.json({ error: err.message }, err.status);
    return c.json({ error: "Internal server error" }, 500);
  });
  app.use("*", rateLimitByRoute(rules, defaultConfig, repo, byTestIp));
  app.all("*", (c) => c.json({ ok: true }));
  return app;
}

function req(path: string, ip = "127.0.0.1", method = "GET") {
  return new Request(`http://localhost${path}`, { method, headers: { "x-test-ip": ip } });
}

// ---------------------------------------------------------------------------
// rateLimitByRoute
// ---------------------------------------------------------------------------

describe("rateLimitByRoute", () => {
  let repo: InMemoryRateLimitRepository;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-02-21T12:00:00Z"));
    repo = new InMemoryRateLimitRepository();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("allows requests within the limit and reports remaining quota", async () => {
    const app = buildApp([], { max: 3 }, repo);

    const first = await app.request(req("/x"));
    expect(first.status).toBe(200);
    expect(first.headers.get("X-RateLimit-Limit")).toBe("3");
    expect(first.headers.get("X-RateLimit-Remaining")).toBe("2");
    expect(first.headers.get("X-RateLimit-Reset")).toBe(String(Date.UTC(2026, 1, 21, 12, 1) / 1000));

    await app.request(req("/x"));
    const third = await app.request(req("/x"));
    expect(third.status).toBe(200);
    expect(third.headers.get("X-RateLimit-Remaining")).toBe("0");
  });

  it("returns 429 with Retry-After once the limit is exceeded", async () => {
    const app = buildApp([], { max: 2 }, repo);
    await app.request(req("/x"));
    await app.request(req("/x"));

    vi.advanceTimersByTime(15_000);
    const res = await app.request(req("/x"));

    expect(res.status).toBe(429);
    expect(res.headers.get("Retry-After")).toBe("45");
    expect(res.headers.get("X-RateLimit-Remaining")).toBe("0");
    expect(await res.json()).toEqual({ error: "Too many requests, please try again later" });
  });

  it("starts a fresh window once the old one expires", async () => {
    const app = buildApp([], { max: 1 }, repo);
    await app.request(req("/x"));
    expect((await app.request(req("/x"))).status).toBe(429);

    vi.advanceTimersByTime(60_000);
    expect((await app.request(req("/x"))).status).toBe(200);
  });

  it("counts clients independently", async () => {
    const app = buildApp([], { max: 1 }, repo);
    expect((await app.request(req("/x", "10.0.0.1"))).status).toBe(200);
    expect((await app.request(req("/x", "10.0.0.2"))).status).toBe(200);
    expect((await app.request(req("/x", "10.0.0.1"))).status).toBe(429);
  });

  it("applies the first matching rule under its own scope", async () => {
    const rules: RateLimitRule[] = [
      { method: "POST", pathPrefix: "/strict", config: { max: 1, message: "slow down" }, scope: "strict" },
    ];
    const app = buildApp(rules, { max: 100 }, repo);

    expect((await app.request(req("/strict", "1.1.1.1", "POST"))).status).toBe(200);
    const limited = await app.request(req("/strict", "1.1.1.1", "POST"));
    expect(limited.status).toBe(429);
    expect(await limited.json()).toEqual({ error: "slow down" });

    // GET does not match the POST rule and falls back to the default scope
    expect((await app.request(req("/strict", "1.1.1.1"))).status).toBe(200);
    expect((await repo.get("1.1.1.1", "strict"))?.count).toBe(2);
    expect((await repo.get("1.1.1.1", "default"))?.count).toBe(1);
  });

  it("does not call the handler when limited", async () => {
    const handler = vi.fn(() => new Response("ok"));
    const app = new Hono();
    app.onError((err, c) => c.json({ error: err.message }, err instanceof RateLimitedError ? 429 : 500));
    app.use("*", rateLimitByRoute([], { max: 1 }, repo, byTestIp));
    app.get("/x", handler);

    await app.request(req("/x"));
    await app.request(req("/x"));
    expect(handler).toHaveBeenCalledTimes(1);
  });

  it("reset() clears every counter", async () => {
    const app = buildApp([], { max: 1 }, repo);
    await app.request(req("/x"));
    await repo.reset();
    expect((await app.request(req("/x"))).status).toBe(200);
  });
});

// ---------------------------------------------------------------------------
// apiRateLimitRules
// ---------------------------------------------------------------------------

describe("apiRateLimitRules", () => {
  const { rules, defaultLimit } = apiRateLimitRules({ perMinute: 100, keyIssuePerHour: 10, tokenPerMinute: 30 });

  it("limits key issuance per hour", () => {
    const rule = rules.find((r) => r.scope === "auth:issue");
    expect(rule).toMatchObject({ method: "POST", pathPrefix: "/auth/keys" });
    expect(rule?.config.max).toBe(10);
    expect(rule?.config.windowMs).toBe(3_600_000);
  });

  it("limits token exchange per minute", () => {
    const rule = rules.find((r) => r.scope === "auth:token");
    expect(rule).toMatchObject({ method: "POST", pathPrefix: "/auth/token" });
    expect(rule?.config.max).toBe(30);
    expect(rule?.config.windowMs).toBeUndefined();
  });

  it("uses the general per-minute limit elsewhere", () => {
    expect(defaultLimit).toEqual({ max: 100 });
  });

  it("leaves listing keys (GET /auth/keys) on the default limit", async () => {
    const repo = new InMemoryRateLimitRepository();
    const app = buildApp(rules, defaultLimit, repo);

    await app.request(req("/auth/keys"));
    expect(await repo.get("127.0.0.1", "auth:issue")).toBeNull();
    expect((await repo.get("127.0.0.1", "default"))?.count).toBe(1);
  });
});
