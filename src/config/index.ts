import { z } from "zod";
import { parseRateLimitTable } from "./rate-limits.js";

/** Signing secret used when JWT_SECRET_KEY is unset. Rejected at startup in production. */
export const DEV_JWT_SECRET = "dev-only-jwt-secret-change-me-before-deploying";

const rateLimitSchema = z.object({
  limit: z.number().int().positive(),
  period: z.enum(["second", "minute", "hour", "day"]),
});

const configSchema = z.object({
  port: z.coerce.number().int().min(1).max(65535).default(2000),
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
  logLevel: z.enum(["error", "warn", "info", "debug"]).default("info"),
  databaseUrl: z.string().optional(),
  /** Shared key-value store. When absent an in-process store is used (single instance only). */
  redisUrl: z.string().optional(),
  /** Browser origins allowed to call the API with credentials. */
  corsOrigins: z.array(z.string().url()).min(1).default(["http://localhost:3000"]),

  /** Token signing and password hashing. */
  auth: z.object({
    jwtSecret: z.string().min(1).default(DEV_JWT_SECRET),
    jwtAlgorithm: z.enum(["HS256", "HS384", "HS512"]).default("HS256"),
    accessTokenExpireMinutes: z.coerce.number().int().positive().default(30),
    refreshTokenExpireDays: z.coerce.number().int().positive().default(7),
    passwordHasher: z.enum(["bcrypt", "pbkdf2"]).default("bcrypt"),
    bcryptRounds: z.coerce.number().int().min(4).max(31).default(12),
  }),

  /** Failed-login lockout. */
  lockout: z.object({
    maxFailedAttempts: z.coerce.number().int().positive().default(5),
    lockoutPeriodSeconds: z.coerce.number().int().positive().default(900),
  }),

  /** Per-IP request limits keyed by route key. */
  rateLimit: z.object({
    prefix: z.string().min(1).default("rate-limit"),
    table: z.record(z.string(), rateLimitSchema),
    /** Proxies whose X-Forwarded-For is believed when resolving the client IP. */
    trustedProxyIps: z.array(z.string()).default([]),
  }),
});

export type Config = z.infer<typeof configSchema>;

/** Parse configuration from an environment map. Throws on invalid values. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const corsOrigins = splitList(env.CORS_ORIGINS);
  return configSchema.parse({
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    databaseUrl: env.DATABASE_URL,
    redisUrl: env.REDIS_URL || undefined,
    corsOrigins: corsOrigins.length > 0 ? corsOrigins : undefined,
    auth: {
      jwtSecret: env.JWT_SECRET_KEY || undefined,
      jwtAlgorithm: env.JWT_ALGORITHM,
      accessTokenExpireMinutes: env.ACCESS_TOKEN_EXPIRE_MINUTES,
      refreshTokenExpireDays: env.REFRESH_TOKEN_EXPIRE_DAYS,
      passwordHasher: env.PASSWORD_HASHER,
      bcryptRounds: env.BCRYPT_ROUNDS,
    },
    lockout: {
      maxFailedAttempts: env.MAX_FAILED_ATTEMPTS,
      lockoutPeriodSeconds: env.LOCKOUT_PERIOD,
    },
    rateLimit: {
      prefix: env.RATE_LIMIT_PREFIX,
      table: parseRateLimitTable(env.RATE_LIMITS),
      trustedProxyIps: splitList(env.TRUSTED_PROXY_IPS),
    },
  });
}

function splitList(raw: string | undefined): string[] {
  return (raw ?? "")
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

export const config = loadConfig();
