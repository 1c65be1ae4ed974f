import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import { ZodError } from "zod";
import { logger } from "../config/logger.js";
import { AppError, AuthenticationError, RateLimitedError, ValidationError } from "./errors.js";
import type { CorrelationEnv } from "./middleware/correlation-id.js";

/**
 * Global Hono error handler: renders every failure as
 * `{ error, code, correlation_id }` (+ `details` for validation errors).
 * Server-side failures are logged in full but never leak their message.
 */
export function errorHandler(err: Error, c: Context<CorrelationEnv>) {
  const correlationId = c.get("correlationId");
  const meta = { correlationId, method: c.req.method, path: c.req.path };

  if (err instanceof HTTPException) {
    logger.warn("Request rejected", { ...meta, status: err.status });
    return err.getResponse();
  }

  if (err instanceof ZodError) {
    logger.warn("Request validation failed", meta);
    return c.json(
      { error: "Validation failed", code: "VALIDATION_FAILED", correlation_id: correlationId, details: err.issues },
      422,
    );
  }

  if (!(err instanceof AppError)) {
    logger.error("Unhandled error in request", { ...meta, error: err.message, stack: err.stack });
    return c.json({ error: "Internal server error", code: "INTERNAL_ERROR", correlation_id: correlationId }, 500);
  }

  if (err instanceof AuthenticationError) c.header("WWW-Authenticate", "Bearer");
  if (err instanceof RateLimitedError) c.header("Retry-After", String(err.retryAfterSec));

  if (!err.exposeMessage) {
    logger.error("Request failed", { ...meta, code: err.code, error: err.message, stack: err.stack });
    const message = err.code === "INTERNAL_ERROR" ? "Internal server error" : err.message;
    return c.json({ error: message, code: err.code, correlation_id: correlationId }, err.status);
  }

  logger.warn("Request rejected", { ...meta, code: err.code, status: err.status });
  const body: Record<string, unknown> = { error: err.message, code: err.code, correlation_id: correlationId };
  if (err instanceof ValidationError && err.details !== undefined) body.details = err.details;
  return c.json(body, err.status);
}
