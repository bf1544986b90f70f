import { serve } from "@hono/node-server";
import { Pool } from "pg";
import { DrizzleAccountRepository } from "./accounts/index.js";
import { createApp } from "./api/app.js";
import { parseTrustedProxies } from "./api/middleware/get-client-ip.js";
import { DrizzleAuditLogRepository } from "./audit/index.js";
import { createAuthenticationFlow } from "./auth/index.js";
import { config } from "./config/index.js";
import { logger } from "./config/logger.js";
import { createDb, initSchema } from "./db/index.js";
import { createKeyValueStore } from "./store/index.js";
import { validateRequiredEnvVars } from "./validate-env.js";

const port = config.port;

// Handle unhandled promise rejections (async errors that weren't caught)
export const unhandledRejectionHandler = (reason: unknown, promise: Promise<unknown>) => {
  logger.error("Unhandled promise rejection", {
    reason: reason instanceof Error ? reason.message : String(reason),
    stack: reason instanceof Error ? reason.stack : undefined,
    promise: String(promise),
  });
};

// Handle uncaught exceptions (synchronous errors that weren't caught)
export const uncaughtExceptionHandler = (err: Error, origin: string) => {
  logger.error("Uncaught exception", {
    error: err.message,
    stack: err.stack,
    origin,
  });
  // The process state is undefined after an uncaught exception. The Console transport writes synchronously.
  process.exit(1);
};

process.on("unhandledRejection", unhandledRejectionHandler);
process.on("uncaughtException", uncaughtExceptionHandler);

// Only start the server if not imported by tests
if (process.env.NODE_ENV !== "test") {
  validateRequiredEnvVars();

  const databaseUrl = config.databaseUrl;
  if (!databaseUrl) throw new Error("DATABASE_URL is required");

  logger.info(`medscribe-api starting on port ${port}`);

  const pool = new Pool({ connectionString: databaseUrl });
  const db = createDb(pool);
  await initSchema(db);

  const kv = createKeyValueStore(config.redisUrl);
  const flow = createAuthenticationFlow(config, {
    accounts: new DrizzleAccountRepository(db),
    auditRepo: new DrizzleAuditLogRepository(db),
    store: kv.store,
  });

  const app = createApp(flow, {
    trustedProxies: parseTrustedProxies(config.rateLimit.trustedProxyIps),
    corsOrigins: config.corsOrigins,
  });

  const server = serve({ fetch: app.fetch, port }, () => {
    logger.info(`medscribe-api listening on http://0.0.0.0:${port}`);
  });

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}; shutting down`);
    server.close(() => {
      Promise.all([pool.end(), kv.close()])
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error("Error during shutdown", { error: err instanceof Error ? err.message : String(err) });
          process.exit(1);
        });
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}
