/**
 * Rate-limiting middleware for Hono.
 *
 * Uses a fixed-window counter keyed by client IP and scope. Each window is
 * `windowMs` milliseconds wide. When a client exceeds `max` requests in a
 * window the middleware throws RateLimitedError (429) after setting a
 * `Retry-After` header with the seconds remaining in the current window.
 *
 * Admission control only: it throttles abuse, it does not stop credential
 * stuffing from many addresses.
 */

import type { Context, MiddlewareHandler, Next } from "hono";
import type { Config } from "../../config/index.js";
import { RateLimitedError } from "../errors.js";
import type { IRateLimitRepository } from "../rate-limit-repository.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RateLimitConfig {
  /** Maximum number of requests per window. */
  max: number;
  /** Window size in milliseconds (default: 60 000 = 1 minute). */
  windowMs?: number;
  /** Custom message returned in the 429 body (default provided). */
  message?: string;
}

export interface RateLimitRule {
  /** HTTP method to match, or "*" for any. */
  method: string;
  /** Path prefix to match (matched with `startsWith`). */
  pathPrefix: string;
  /** Rate-limit configuration for matching requests. */
  config: RateLimitConfig;
  /** Scope override (defaults to pathPrefix). */
  scope?: string;
}

export type KeyGenerator = (c: Context) => string;

const DEFAULT_WINDOW_MS = 60_000; // 1 minute
const HOUR_MS = 60 * 60 * 1000;

// ---------------------------------------------------------------------------
// Multi-route rate limiter (global middleware with per-route overrides)
// ---------------------------------------------------------------------------

/**
 * Create a global rate-limiting middleware that applies different limits based
 * on the request path and method.
 *
 * Rules are evaluated top-to-bottom; the **first** matching rule wins. If no
 * rule matches, the `defaultConfig` is used under scope "default".
 *
 * ```ts
 * app.use("*", rateLimitByRoute(rules, { max: 60 }, repo, (c) => getClientIpFromContext(c, trusted)));
 * ```
 */
export function rateLimitByRoute(
  rules: RateLimitRule[],
  defaultConfig: RateLimitConfig,
  repo: IRateLimitRepository,
  keyGenerator: KeyGenerator,
): MiddlewareHandler {
  return async (c: Context, next: Next) => {
    const method = c.req.method.toUpperCase();
    const path = c.req.path;

    let cfg = defaultConfig;
    let scope = "default";
    for (const rule of rules) {
      const methodMatch = rule.method === "*" || rule.method.toUpperCase() === method;
      if (methodMatch && path.startsWith(rule.pathPrefix)) {
        cfg = rule.config;
        scope = rule.scope ?? rule.pathPrefix;
        break;
      }
    }

    const windowMs = cfg.windowMs ?? DEFAULT_WINDOW_MS;
    const now = Date.now();
    const entry = await repo.increment(keyGenerator(c), scope, windowMs);
    const resetAt = entry.windowStart + windowMs;

    c.header("X-RateLimit-Limit", String(cfg.max));
    c.header("X-RateLimit-Reset", String(Math.ceil(resetAt / 1000)));

    if (entry.count > cfg.max) {
      const retryAfterSec = Math.max(1, Math.ceil((resetAt - now) / 1000));
      c.header("X-RateLimit-Remaining", "0");
      c.header("Retry-After", String(retryAfterSec));
      throw new RateLimitedError(retryAfterSec, cfg.message);
    }

    c.header("X-RateLimit-Remaining", String(Math.max(0, cfg.max - entry.count)));
    await next();
  };
}

// ---------------------------------------------------------------------------
// Route rules for this API
// ---------------------------------------------------------------------------

/**
 * Key issuance and token exchange are the high-value abuse targets and get
 * tighter limits than general traffic.
 */
export function apiRateLimitRules(limits: Config["rateLimit"]): {
  rules: RateLimitRule[];
  defaultLimit: RateLimitConfig;
} {
  return {
    rules: [
      {
        method: "POST",
        pathPrefix: "/auth/keys",
        config: {
          max: limits.keyIssuePerHour,
          windowMs: HOUR_MS,
          message: "Too many API key requests. Please try again later.",
        },
        scope: "auth:issue",
      },
      {
        method: "POST",
        pathPrefix: "/auth/token",
        config: { max: limits.tokenPerMinute, message: "Too many token requests. Please try again later." },
        scope: "auth:token",
      },
    ],
    defaultLimit: { max: limits.perMinute },
  };
}
