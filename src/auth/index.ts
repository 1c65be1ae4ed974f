/**
 * Auth: API-key issuance and validation, session tokens, request gate.
 *
 * Provides:
 * - `KeyIssuer` / `KeyValidator` over a CredentialRepository
 * - `TokenService` for minting and verifying session tokens
 * - `AuthService` orchestrating the above for the HTTP layer
 * - `requireAuth` middleware for Hono routes
 */

import type { Identity } from "../domain/entities/credential.js";

export type { Identity } from "../domain/entities/credential.js";
export { KeyIssuer } from "./key-issuer.js";
export type { IssuedKey } from "./key-issuer.js";
export { KeyValidator } from "./key-validator.js";
export { TokenService } from "./token-service.js";
export type { MintedToken, SessionClaims, TokenAlgorithm } from "./token-service.js";
export { AuthService } from "./service.js";
export type { TokenGrant } from "./service.js";
export { requireAuth } from "./middleware.js";

/**
 * Extract the bearer token from an Authorization header value.
 * Returns `null` if the header is missing, empty, or not a Bearer scheme.
 */
export function extractBearerToken(header: string | undefined): string | null {
  if (!header) return null;
  const trimmed = header.trim();
  if (!trimmed.toLowerCase().startsWith("bearer ")) return null;
  const token = trimmed.slice(7).trim();
  return token || null;
}

export interface AuthEnv {
  Variables: {
    identity: Identity;
  };
}
