import { z } from "zod";

/** Signing secret used when SECRET_KEY is unset. Rejected in production by validate-env. */
export const DEV_SECRET_KEY = "dev-secret-key-change-in-production";

/** Parse a comma-separated env value into trimmed, non-empty entries. */
function parseList(raw: string | undefined): string[] | undefined {
  if (raw === undefined) return undefined;
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

const configSchema = z.object({
  port: z.coerce.number().int().min(1).max(65535).default(8000),
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
  logLevel: z.enum(["error", "warn", "info", "debug"]).default("info"),
  projectName: z.string().min(1).default("Housing Price Prediction API"),
  version: z.string().min(1).default("1.0.0"),

  databaseUrl: z.string().default("postgres://localhost:5432/housing"),

  /** Session-token signing. */
  auth: z
    .object({
      secretKey: z.string().min(32, "SECRET_KEY must be at least 32 characters").default(DEV_SECRET_KEY),
      algorithm: z.enum(["HS256", "HS384", "HS512"]).default("HS256"),
      accessTokenExpireMinutes: z.coerce.number().int().min(1).default(30),
    })
    .default({}),

  /** scrypt work factor for API-key hashing. Must be a power of two. */
  hashing: z
    .object({
      scryptCost: z.coerce
        .number()
        .int()
        .min(1024)
        .refine((n) => (n & (n - 1)) === 0, "SCRYPT_COST must be a power of two")
        .default(16384),
    })
    .default({}),

  rateLimit: z
    .object({
      perMinute: z.coerce.number().int().min(1).default(100),
      keyIssuePerHour: z.coerce.number().int().min(1).default(10),
      tokenPerMinute: z.coerce.number().int().min(1).default(30),
    })
    .default({}),

  modelPath: z.string().min(1).default("./models/model.json"),
  corsAllowedOrigins: z.array(z.string()).default(["*"]),
  trustedProxyIps: z.array(z.string()).default([]),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Build the typed configuration from an environment map.
 * Throws a ZodError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return configSchema.parse({
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL?.toLowerCase().replace(/^warning$/, "warn"),
    projectName: env.PROJECT_NAME,
    version: env.VERSION,
    databaseUrl: env.DATABASE_URL,
    auth: {
      secretKey: env.SECRET_KEY,
      algorithm: env.ALGORITHM,
      accessTokenExpireMinutes: env.ACCESS_TOKEN_EXPIRE_MINUTES,
    },
    hashing: {
      scryptCost: env.SCRYPT_COST,
    },
    rateLimit: {
      perMinute: env.RATE_LIMIT_PER_MINUTE,
      keyIssuePerHour: env.KEY_ISSUE_LIMIT_PER_HOUR,
      tokenPerMinute: env.TOKEN_LIMIT_PER_MINUTE,
    },
    modelPath: env.MODEL_PATH,
    corsAllowedOrigins: parseList(env.CORS_ALLOWED_ORIGINS),
    trustedProxyIps: parseList(env.TRUSTED_PROXY_IPS),
  });
}

export const config = loadConfig();
