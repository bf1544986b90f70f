import { describe, expect, it } from "vitest";
import { DEV_JWT_SECRET, loadConfig } from "./index.js";

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    const cfg = loadConfig({});
    expect(cfg.port).toBe(2000);
    expect(cfg.nodeEnv).toBe("development");
    expect(cfg.redisUrl).toBeUndefined();
    expect(cfg.auth).toEqual({
      jwtSecret: DEV_JWT_SECRET,
      jwtAlgorithm: "HS256",
      accessTokenExpireMinutes: 30,
      refreshTokenExpireDays: 7,
      passwordHasher: "bcrypt",
      bcryptRounds: 12,
    });
    expect(cfg.lockout).toEqual({ maxFailedAttempts: 5, lockoutPeriodSeconds: 900 });
    expect(cfg.rateLimit.prefix).toBe("rate-limit");
    expect(cfg.rateLimit.table.login).toEqual({ limit: 15, period: "minute" });
    expect(cfg.rateLimit.trustedProxyIps).toEqual([]);
    expect(cfg.corsOrigins).toEqual(["http://localhost:3000"]);
  });

  it("reads values from the environment", () => {
    const cfg = loadConfig({
      PORT: "8080",
      NODE_ENV: "production",
      REDIS_URL: "redis://cache:6379/0",
      JWT_SECRET_KEY: "test-secret",
      JWT_ALGORITHM: "HS512",
      ACCESS_TOKEN_EXPIRE_MINUTES: "15",
      REFRESH_TOKEN_EXPIRE_DAYS: "14",
      PASSWORD_HASHER: "pbkdf2",
      BCRYPT_ROUNDS: "10",
      MAX_FAILED_ATTEMPTS: "3",
      LOCKOUT_PERIOD: "600",
      RATE_LIMITS: "login=5/minute",
      TRUSTED_PROXY_IPS: "10.0.0.1, 10.0.0.2",
      CORS_ORIGINS: "https://app.example.com, https://admin.example.com",
    });
    expect(cfg.port).toBe(8080);
    expect(cfg.nodeEnv).toBe("production");
    expect(cfg.redisUrl).toBe("redis://cache:6379/0");
    expect(cfg.auth.jwtSecret).toBe("test-secret");
    expect(cfg.auth.jwtAlgorithm).toBe("HS512");
    expect(cfg.auth.accessTokenExpireMinutes).toBe(15);
    expect(cfg.auth.refreshTokenExpireDays).toBe(14);
    expect(cfg.auth.passwordHasher).toBe("pbkdf2");
    expect(cfg.auth.bcryptRounds).toBe(10);
    expect(cfg.lockout).toEqual({ maxFailedAttempts: 3, lockoutPeriodSeconds: 600 });
    expect(cfg.rateLimit.table.login).toEqual({ limit: 5, period: "minute" });
    expect(cfg.rateLimit.trustedProxyIps).toEqual(["10.0.0.1", "10.0.0.2"]);
    expect(cfg.corsOrigins).toEqual(["https://app.example.com", "https://admin.example.com"]);
  });

  it("rejects a CORS origin that is not a URL", () => {
    expect(() => loadConfig({ CORS_ORIGINS: "not a url" })).toThrow();
  });

  it("treats an empty REDIS_URL as unset", () => {
    expect(loadConfig({ REDIS_URL: "" }).redisUrl).toBeUndefined();
  });

  it("rejects an unsupported signing algorithm", () => {
    expect(() => loadConfig({ JWT_ALGORITHM: "none" })).toThrow();
  });

  it("rejects a non-numeric lockout period", () => {
    expect(() => loadConfig({ LOCKOUT_PERIOD: "soon" })).toThrow();
  });
});
