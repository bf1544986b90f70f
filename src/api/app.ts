import { Hono } from "hono";
import { cors } from "hono/cors";
import { secureHeaders } from "hono/secure-headers";
import type { AuthenticationFlow } from "../auth/authentication-flow.js";
import type { AuthEnv } from "../auth/middleware.js";
import { type ErrorBody, errorHandler } from "./error-handler.js";
import { authRoutes } from "./routes/auth.js";

export interface AppOptions {
  /** Proxies whose X-Forwarded-For is trusted when resolving client IPs. */
  trustedProxies?: ReadonlySet<string>;
  /** Browser origins allowed to call `/api/*` with credentials. None means no cross-origin access. */
  corsOrigins?: readonly string[];
}

/** Build the HTTP app around an already-wired authentication flow. */
export function createApp(flow: AuthenticationFlow, opts: AppOptions = {}): Hono<AuthEnv> {
  const app = new Hono<AuthEnv>();

  app.use(
    "/api/*",
    cors({
      origin: [...(opts.corsOrigins ?? [])],
      credentials: true,
      allowMethods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
      allowHeaders: ["Content-Type", "Authorization", "Accept"],
      maxAge: 600,
    }),
  );
  app.use("/*", secureHeaders());
  app.route("/api", authRoutes(flow, opts));

  app.notFound((c) => {
    const body: ErrorBody = { message: "Not found", error_code: "NOT_FOUND" };
    return c.json(body, 404);
  });
  app.onError(errorHandler);

  return app;
}
