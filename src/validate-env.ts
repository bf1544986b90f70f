import { DEV_JWT_SECRET } from "./config/index.js";
import { logger } from "./config/logger.js";

/**
 * Startup environment variable validation.
 *
 * Throws on missing critical vars. Warns on missing recommended vars.
 * Skipped in test environment.
 */
export function validateRequiredEnvVars(): void {
  if (process.env.NODE_ENV === "test") return;

  const errors: string[] = [];
  const warnings: string[] = [];
  const production = process.env.NODE_ENV === "production";

  // --- Critical (server won't function without these) ---

  const jwtSecret = process.env.JWT_SECRET_KEY;
  if (!jwtSecret) {
    if (production) errors.push("JWT_SECRET_KEY is required but not set");
    else warnings.push("JWT_SECRET_KEY is not set; using the development signing secret");
  } else if (jwtSecret === DEV_JWT_SECRET) {
    if (production) errors.push("JWT_SECRET_KEY must not be the development signing secret");
  } else if (jwtSecret.length < 32) {
    if (production) errors.push("JWT_SECRET_KEY must be at least 32 characters");
    else warnings.push("JWT_SECRET_KEY is shorter than 32 characters");
  }

  if (!process.env.DATABASE_URL) {
    errors.push("DATABASE_URL is required but not set");
  }

  // --- Recommended (lockout and rate limits are per-process without these) ---

  if (!process.env.REDIS_URL) {
    warnings.push(
      "REDIS_URL is not set. Login lockout and rate-limit counters are kept in process memory " +
        "and are not shared between instances.",
    );
  }

  // --- Emit ---

  for (const w of warnings) {
    logger.warn(`[env] ${w}`);
  }

  if (errors.length > 0) {
    throw new Error(`Environment validation failed:\n${errors.map((e) => `  - ${e}`).join("\n")}`);
  }
}
