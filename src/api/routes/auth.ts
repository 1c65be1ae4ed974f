/**
 * Auth Routes: API-key issuance, key-for-token exchange, key management.
 *
 * - POST   /auth/keys      Issue a key (plaintext returned once)
 * - POST   /auth/token     Exchange a key for a session token
 * - GET    /auth/keys      List key metadata (bearer)
 * - DELETE /auth/keys/:id  Deactivate a key (bearer)
 */

import { Hono, type MiddlewareHandler } from "hono";
import { z } from "zod";
import type { AuthEnv } from "../../auth/index.js";
import type { AuthService } from "../../auth/service.js";
import { logger } from "../../config/logger.js";
import { AuthenticationError, NotFoundError } from "../errors.js";
import { parseIdParam, parseJsonBody, parsePagination } from "../validation.js";

// ---------------------------------------------------------------------------
// Request schemas
// ---------------------------------------------------------------------------

const createKeySchema = z.object({
  name: z.string().min(1, "Name is required").max(100),
  description: z.string().max(500).nullish(),
});

const tokenRequestSchema = z.object({
  api_key: z.string().min(1, "API key is required"),
});

// ---------------------------------------------------------------------------
// Route setup
// ---------------------------------------------------------------------------

export interface AuthRouteDeps {
  auth: AuthService;
  requireAuth: MiddlewareHandler<AuthEnv>;
}

export function createAuthRoutes({ auth, requireAuth }: AuthRouteDeps) {
  const routes = new Hono<AuthEnv>();

  routes.post("/keys", async (c) => {
    const body = await parseJsonBody(c, createKeySchema);
    const { credential, plaintext } = await auth.createApiKey(body.name, body.description ?? null);
    return c.json(
      {
        id: credential.id,
        name: credential.name,
        key: plaintext,
        created_at: credential.createdAt.toISOString(),
        is_active: credential.active,
      },
      201,
    );
  });

  routes.post("/token", async (c) => {
    const body = await parseJsonBody(c, tokenRequestSchema);
    const grant = await auth.exchangeKey(body.api_key);
    if (!grant) {
      logger.warn("Invalid API key used for token request");
      throw new AuthenticationError("Invalid API key");
    }
    return c.json({ access_token: grant.accessToken, token_type: grant.tokenType, expires_in: grant.expiresIn });
  });

  routes.get("/keys", requireAuth, async (c) => {
    const { skip, limit } = parsePagination(c);
    const keys = await auth.listKeys({ skip, limit });
    return c.json(keys.map((k) => k.toInfo()));
  });

  routes.delete("/keys/:id", requireAuth, async (c) => {
    const id = parseIdParam(c);
    if (!(await auth.deactivateKey(id))) throw new NotFoundError("API key not found");
    return c.json({ message: "API key deactivated successfully" });
  });

  return routes;
}
