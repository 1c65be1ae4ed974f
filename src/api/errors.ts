/**
 * Application error taxonomy.
 *
 * Every error that should reach a client as something other than a bare 500
 * extends AppError, which carries the HTTP status and a stable machine code.
 * The global error handler in app.ts renders these as
 * `{ error, code, correlation_id }`.
 */

/** HTTP statuses an AppError may carry. */
export type ErrorStatus = 401 | 403 | 404 | 422 | 429 | 500;

export class AppError extends Error {
  readonly status: ErrorStatus;
  readonly code: string;

  constructor(status: ErrorStatus, code: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "AppError";
    this.status = status;
    this.code = code;
  }

  /** Whether the message may be shown to the caller verbatim. */
  get exposeMessage(): boolean {
    return this.status < 500;
  }
}

/** Malformed input, rejected before it reaches the core. */
export class ValidationError extends AppError {
  readonly details: unknown;

  constructor(message = "Validation failed", details?: unknown) {
    super(422, "VALIDATION_FAILED", message);
    this.name = "ValidationError";
    this.details = details;
  }
}

/**
 * Bad, expired or revoked credentials. The message is deliberately generic:
 * callers must not learn whether the token was malformed, expired, or whether
 * the key behind it still exists.
 */
export class AuthenticationError extends AppError {
  constructor(message = "Could not validate credentials") {
    super(401, "AUTHENTICATION_FAILED", message);
    this.name = "AuthenticationError";
  }
}

/** Authenticated caller acting on a resource it does not own. */
export class AuthorizationError extends AppError {
  constructor(message = "Not authorized to access this resource") {
    super(403, "FORBIDDEN", message);
    this.name = "AuthorizationError";
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Resource not found") {
    super(404, "NOT_FOUND", message);
    this.name = "NotFoundError";
  }
}

export class RateLimitedError extends AppError {
  readonly retryAfterSec: number;

  constructor(retryAfterSec: number, message = "Too many requests, please try again later") {
    super(429, "RATE_LIMITED", message);
    this.name = "RateLimitedError";
    this.retryAfterSec = retryAfterSec;
  }
}

/**
 * Unrecoverable condition: misconfiguration or a broken invariant. Aborts
 * startup or the current operation; never degraded around.
 */
export class FatalError extends AppError {
  constructor(message: string, options?: ErrorOptions) {
    super(500, "INTERNAL_ERROR", message, options);
    this.name = "FatalError";
  }
}

/** Two issued secrets hashed to the same value. Indicates a generator bug. */
export class CredentialCollisionError extends FatalError {
  constructor() {
    super("Secret hash collision on API key issuance");
    this.name = "CredentialCollisionError";
  }
}

/** The session-token signing secret is missing or too weak. */
export class SigningKeyError extends FatalError {
  constructor(message: string) {
    super(message);
    this.name = "SigningKeyError";
  }
}

/** The regression model artifact is missing or does not match the feature encoder. */
export class ModelLoadError extends FatalError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ModelLoadError";
  }
}

export class PredictionError extends AppError {
  constructor(message = "Prediction failed") {
    super(500, "PREDICTION_FAILED", message);
    this.name = "PredictionError";
  }
}
