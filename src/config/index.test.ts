import { describe, expect, it } from "vitest";
import { DEV_SECRET_KEY, loadConfig } from "./index.js";

describe("loadConfig", () => {
  it("uses defaults when no env vars are set", () => {
    const cfg = loadConfig({});
    expect(cfg.port).toBe(8000);
    expect(cfg.nodeEnv).toBe("development");
    expect(cfg.auth).toEqual({ secretKey: DEV_SECRET_KEY, algorithm: "HS256", accessTokenExpireMinutes: 30 });
    expect(cfg.hashing.scryptCost).toBe(16384);
    expect(cfg.rateLimit).toEqual({ perMinute: 100, keyIssuePerHour: 10, tokenPerMinute: 30 });
    expect(cfg.modelPath).toBe("./models/model.json");
    expect(cfg.corsAllowedOrigins).toEqual(["*"]);
    expect(cfg.trustedProxyIps).toEqual([]);
  });

  it("coerces numeric env values", () => {
    const cfg = loadConfig({
      PORT: "9000",
      ACCESS_TOKEN_EXPIRE_MINUTES: "15",
      RATE_LIMIT_PER_MINUTE: "20",
      SCRYPT_COST: "1024",
    });
    expect(cfg.port).toBe(9000);
    expect(cfg.auth.accessTokenExpireMinutes).toBe(15);
    expect(cfg.rateLimit.perMinute).toBe(20);
    expect(cfg.hashing.scryptCost).toBe(1024);
  });

  it("normalizes upper-case log levels", () => {
    expect(loadConfig({ LOG_LEVEL: "DEBUG" }).logLevel).toBe("debug");
    expect(loadConfig({ LOG_LEVEL: "WARNING" }).logLevel).toBe("warn");
  });

  it("splits comma-separated lists", () => {
    const cfg = loadConfig({
      CORS_ALLOWED_ORIGINS: "https://a.example, https://b.example",
      TRUSTED_PROXY_IPS: "10.0.0.1,,10.0.0.2",
    });
    expect(cfg.corsAllowedOrigins).toEqual(["https://a.example", "https://b.example"]);
    expect(cfg.trustedProxyIps).toEqual(["10.0.0.1", "10.0.0.2"]);
  });

  it("rejects a short signing secret", () => {
    expect(() => loadConfig({ SECRET_KEY: "too-short" })).toThrow(/SECRET_KEY must be at least 32 characters/);
  });

  it("rejects an unsupported signing algorithm", () => {
    expect(() => loadConfig({ ALGORITHM: "none" })).toThrow();
  });

  it("rejects a scrypt cost that is not a power of two", () => {
    expect(() => loadConfig({ SCRYPT_COST: "3000" })).toThrow(/power of two/);
  });
});
