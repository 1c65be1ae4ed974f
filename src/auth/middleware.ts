/**
 * Request gate for protected routes.
 *
 * Session tokens stay cryptographically valid after their key is revoked, so
 * the credential is re-fetched and its state re-checked on every request.
 * Every rejection is the same AuthenticationError; the reason is logged only.
 */

import type { Context, Next } from "hono";
import { AuthenticationError } from "../api/errors.js";
import { logger } from "../config/logger.js";
import type { CredentialRepository } from "../domain/repositories/credential-repository.js";
import { type AuthEnv, extractBearerToken } from "./index.js";
import type { TokenService } from "./token-service.js";

export interface RequireAuthOptions {
  tokens: TokenService;
  credentials: CredentialRepository;
}

function reject(c: Context, reason: string): never {
  logger.warn("Authentication rejected", { reason, method: c.req.method, path: c.req.path });
  throw new AuthenticationError();
}

/**
 * Create a `requireAuth` middleware.
 *
 * On success, sets `c.set("identity", { id, name })`.
 */
export function requireAuth({ tokens, credentials }: RequireAuthOptions) {
  return async (c: Context<AuthEnv>, next: Next) => {
    const token = extractBearerToken(c.req.header("Authorization"));
    if (!token) reject(c, "missing_token");

    const claims = await tokens.verify(token);
    if (!claims) reject(c, "invalid_token");

    const id = Number(claims.sub);
    if (!Number.isSafeInteger(id)) reject(c, "invalid_subject");

    const credential = await credentials.findById(id);
    if (!credential) reject(c, "unknown_key");
    if (!credential.isUsable()) reject(c, `key_${credential.state}`);

    c.set("identity", credential.identity());
    await next();
  };
}
