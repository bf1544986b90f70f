/**
 * Per-IP rate limiting for Hono routes.
 *
 * Each route is guarded under a route key (`login`, `register`, ...) whose
 * limit comes from the configured rate-limit table. The counter itself lives
 * in the shared key-value store behind `AuthenticationFlow.checkRequestRate`.
 * Over the limit the request is answered 429 with a `Retry-After` header
 * giving the seconds left in the current window.
 */

import type { MiddlewareHandler } from "hono";
import type { AuthenticationFlow } from "../../auth/authentication-flow.js";
import { RateLimitExceededError } from "../../auth/errors.js";
import type { AuthEnv } from "../../auth/middleware.js";
import { renderAuthError } from "../error-handler.js";
import { getClientIpFromContext } from "./get-client-ip.js";

export interface RateLimitOptions {
  /** Proxies whose X-Forwarded-For is trusted. Default: none. */
  trustedProxies?: ReadonlySet<string>;
}

/**
 * ```ts
 * routes.post("/token", rateLimit("login", flow, { trustedProxies }), handler);
 * ```
 */
export function rateLimit(
  routeKey: string,
  flow: Pick<AuthenticationFlow, "checkRequestRate">,
  opts: RateLimitOptions = {},
): MiddlewareHandler<AuthEnv> {
  const trusted = opts.trustedProxies ?? new Set<string>();

  return async (c, next) => {
    const clientIp = getClientIpFromContext(c, trusted);
    try {
      await flow.checkRequestRate(clientIp, routeKey);
    } catch (err) {
      if (err instanceof RateLimitExceededError) return renderAuthError(c, err);
      throw err;
    }
    return next();
  };
}
