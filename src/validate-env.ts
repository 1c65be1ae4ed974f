import { DEV_SECRET_KEY } from "./config/index.js";
import { MIN_SECRET_LENGTH } from "./auth/token-service.js";

/**
 * Startup environment variable validation.
 *
 * Throws on missing or unsafe critical vars. Warns on risky defaults.
 * Only enforced in production; development runs on the built-in defaults.
 */
export function validateRequiredEnvVars(env: NodeJS.ProcessEnv = process.env): void {
  if (env.NODE_ENV !== "production") return;

  const errors: string[] = [];
  const warnings: string[] = [];

  // --- Critical (tokens would be forgeable or the server cannot start) ---

  const secretKey = env.SECRET_KEY;
  if (!secretKey) {
    errors.push("SECRET_KEY is required but not set");
  } else if (secretKey === DEV_SECRET_KEY) {
    errors.push("SECRET_KEY must not be the development default");
  } else if (secretKey.length < MIN_SECRET_LENGTH) {
    errors.push(`SECRET_KEY must be at least ${MIN_SECRET_LENGTH} characters`);
  }

  if (!env.DATABASE_URL) {
    errors.push("DATABASE_URL is required but not set");
  }

  // --- Recommended ---

  const origins = env.CORS_ALLOWED_ORIGINS;
  if (!origins || origins.split(",").some((o) => o.trim() === "*")) {
    warnings.push("CORS_ALLOWED_ORIGINS allows any origin. Set it to the client origins in production.");
  }

  // --- Emit ---

  for (const w of warnings) {
    console.warn(`[env] WARNING: ${w}`);
  }

  if (errors.length > 0) {
    throw new Error(`Environment validation failed:\n${errors.map((e) => `  - ${e}`).join("\n")}`);
  }
}
