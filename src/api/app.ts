import { Hono } from "hono";
import { cors } from "hono/cors";
import { secureHeaders } from "hono/secure-headers";
import { requireAuth } from "../auth/middleware.js";
import type { AuthService } from "../auth/service.js";
import type { TokenService } from "../auth/token-service.js";
import type { Config } from "../config/index.js";
import type { CredentialRepository } from "../domain/repositories/credential-repository.js";
import type { PredictionLogRepository } from "../domain/repositories/prediction-log-repository.js";
import type { PredictionService } from "../inference/prediction-service.js";
import { errorHandler } from "./error-handler.js";
import { type CorrelationEnv, correlationId } from "./middleware/correlation-id.js";
import { getClientIpFromContext, parseTrustedProxies } from "./middleware/get-client-ip.js";
import { apiRateLimitRules, rateLimitByRoute } from "./middleware/rate-limit.js";
import type { IRateLimitRepository } from "./rate-limit-repository.js";
import { createAuthRoutes } from "./routes/auth.js";
import { type ComponentCheck, createHealthRoutes } from "./routes/health.js";
import { createLogRoutes } from "./routes/logs.js";
import { createPredictionRoutes } from "./routes/predictions.js";

/** Everything the HTTP layer needs, constructed once at startup. */
export interface AppDeps {
  config: Pick<Config, "projectName" | "version" | "nodeEnv" | "corsAllowedOrigins" | "trustedProxyIps" | "rateLimit">;
  auth: AuthService;
  tokens: TokenService;
  credentials: CredentialRepository;
  predictions: PredictionService;
  logs: PredictionLogRepository;
  rateLimits: IRateLimitRepository;
  healthChecks: Record<string, ComponentCheck>;
}

export function createApp(deps: AppDeps) {
  const { config } = deps;
  const app = new Hono<CorrelationEnv>();

  // Correlation id first, so every response (errors and 429s included) carries one.
  app.use("*", correlationId());

  const wildcard = config.corsAllowedOrigins.includes("*");
  app.use(
    "*",
    cors({
      origin: wildcard ? "*" : config.corsAllowedOrigins,
      credentials: !wildcard,
      allowMethods: ["GET", "POST", "DELETE"],
      allowHeaders: ["Content-Type", "Authorization"],
      exposeHeaders: ["X-Correlation-ID", "X-Response-Time", "Retry-After"],
    }),
  );
  app.use("*", secureHeaders());

  const trustedProxies = parseTrustedProxies(config.trustedProxyIps);
  const { rules, defaultLimit } = apiRateLimitRules(config.rateLimit);
  app.use(
    "*",
    rateLimitByRoute(rules, defaultLimit, deps.rateLimits, (c) => getClientIpFromContext(c, trustedProxies)),
  );

  const gate = requireAuth({ tokens: deps.tokens, credentials: deps.credentials });

  app.route(
    "/health",
    createHealthRoutes({ version: config.version, environment: config.nodeEnv, checks: deps.healthChecks }),
  );
  app.route("/auth", createAuthRoutes({ auth: deps.auth, requireAuth: gate }));
  app.route("/predict", createPredictionRoutes({ predictions: deps.predictions, requireAuth: gate }));
  app.route("/logs", createLogRoutes({ logs: deps.logs, requireAuth: gate }));

  app.get("/", (c) =>
    c.json({
      message: `Welcome to ${config.projectName}`,
      version: config.version,
      health: "/health",
    }),
  );

  app.notFound((c) =>
    c.json({ error: "Not found", code: "NOT_FOUND", correlation_id: c.get("correlationId") }, 404),
  );
  app.onError(errorHandler);

  return app;
}

export type App = ReturnType<typeof createApp>;
