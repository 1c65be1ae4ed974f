import { randomUUID } from "node:crypto";
import type { Context, Next } from "hono";
import { logger } from "../../config/logger.js";

export const CORRELATION_HEADER = "X-Correlation-ID";

export interface CorrelationEnv {
  Variables: {
    correlationId: string;
  };
}

/**
 * Assign a fresh correlation id to every request, expose it as a response
 * header, and log the request once it completes. Client-supplied ids are
 * never reused.
 */
export function correlationId() {
  return async (c: Context<CorrelationEnv>, next: Next) => {
    const id = randomUUID();
    const started = performance.now();
    c.set("correlationId", id);
    c.header(CORRELATION_HEADER, id);

    await next();

    const durationMs = Math.round((performance.now() - started) * 100) / 100;
    c.header("X-Response-Time", `${durationMs}ms`);
    logger.info("Request completed", {
      correlationId: id,
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs,
    });
  };
}
