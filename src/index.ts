import { serve } from "@hono/node-server";
import { sql } from "drizzle-orm";
import pg from "pg";
import { createApp } from "./api/app.js";
import { DrizzleRateLimitRepository } from "./api/drizzle-rate-limit-repository.js";
import { KeyIssuer } from "./auth/key-issuer.js";
import { KeyValidator } from "./auth/key-validator.js";
import { AuthService } from "./auth/service.js";
import { TokenService } from "./auth/token-service.js";
import { config } from "./config/index.js";
import { logger } from "./config/logger.js";
import { createDb } from "./db/index.js";
import { runMigrations } from "./db/migrate.js";
import { LinearRegressionModel } from "./inference/model.js";
import { PredictionService } from "./inference/prediction-service.js";
import { DrizzleCredentialRepository } from "./infrastructure/persistence/drizzle-credential-repository.js";
import { DrizzlePredictionLogRepository } from "./infrastructure/persistence/drizzle-prediction-log-repository.js";
import { ScryptSecretHasher } from "./security/secret-hasher.js";
import { validateRequiredEnvVars } from "./validate-env.js";

/** Longest rate-limit window in use (key issuance, one hour). */
const RATE_LIMIT_RETENTION_MS = 60 * 60 * 1000;
const RATE_LIMIT_PURGE_INTERVAL_MS = 5 * 60 * 1000;

export const unhandledRejectionHandler = (reason: unknown) => {
  logger.error("Unhandled promise rejection", {
    reason: reason instanceof Error ? reason.message : String(reason),
    stack: reason instanceof Error ? reason.stack : undefined,
  });
};

export const uncaughtExceptionHandler = (err: Error, origin: string) => {
  logger.error("Uncaught exception", { error: err.message, stack: err.stack, origin });
  // The process is in an undefined state; the Console transport has already flushed.
  process.exit(1);
};

async function main(): Promise<void> {
  validateRequiredEnvVars();

  const pool = new pg.Pool({ connectionString: config.databaseUrl });
  const db = createDb(pool);
  const applied = await runMigrations(db);
  if (applied.length > 0) logger.info("Migrations applied", { files: applied });

  const model = await LinearRegressionModel.load(config.modelPath);
  const hasher = new ScryptSecretHasher(config.hashing.scryptCost);
  const tokens = new TokenService({
    secret: config.auth.secretKey,
    algorithm: config.auth.algorithm,
    ttlSeconds: config.auth.accessTokenExpireMinutes * 60,
  });

  const credentials = new DrizzleCredentialRepository(db);
  const logs = new DrizzlePredictionLogRepository(db);
  const rateLimits = new DrizzleRateLimitRepository(db);

  const app = createApp({
    config,
    auth: new AuthService({
      credentials,
      issuer: new KeyIssuer(credentials, hasher),
      validator: new KeyValidator(credentials, hasher),
      tokens,
    }),
    tokens,
    credentials,
    predictions: new PredictionService(model, logs),
    logs,
    rateLimits,
    healthChecks: {
      database: async () => {
        await db.execute(sql`select 1`);
      },
      model: async () => {
        const probe = model.predict(model.features.map(() => 0));
        if (!Number.isFinite(probe)) throw new Error("Model produced a non-finite prediction");
      },
    },
  });

  const purgeTimer = setInterval(() => {
    rateLimits.purgeStale(RATE_LIMIT_RETENTION_MS).then(
      (removed) => {
        if (removed > 0) logger.debug("Purged stale rate-limit windows", { removed });
      },
      (err: unknown) => {
        logger.warn("Rate-limit purge failed", { error: err instanceof Error ? err.message : String(err) });
      },
    );
  }, RATE_LIMIT_PURGE_INTERVAL_MS);
  purgeTimer.unref();

  const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
    logger.info(`${config.projectName} listening on http://0.0.0.0:${info.port}`, {
      version: config.version,
      environment: config.nodeEnv,
    });
  });

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("Shutting down", { signal });
    clearInterval(purgeTimer);
    server.close((closeErr) => {
      if (closeErr) logger.error("HTTP server close failed", { error: closeErr.message });
      pool.end().then(
        () => process.exit(closeErr ? 1 : 0),
        (err: unknown) => {
          logger.error("Database pool close failed", { error: err instanceof Error ? err.message : String(err) });
          process.exit(1);
        },
      );
    });
  };
  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

// Only start the server if not imported by tests
if (process.env.NODE_ENV !== "test") {
  process.on("unhandledRejection", unhandledRejectionHandler);
  process.on("uncaughtException", uncaughtExceptionHandler);

  logger.info(`${config.projectName} starting on port ${config.port}`);
  main().catch((err: unknown) => {
    logger.error("Startup failed", {
      error: err instanceof Error ? err.message : String(err),
      stack: err instanceof Error ? err.stack : undefined,
    });
    process.exit(1);
  });
}
