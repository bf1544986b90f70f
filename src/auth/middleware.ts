import type { HttpBindings } from "@hono/node-server";
import type { MiddlewareHandler } from "hono";
import type { Account } from "../accounts/types.js";
import type { AuthenticationFlow } from "./authentication-flow.js";
import { InvalidTokenError } from "./errors.js";

/** Hono environment for the service's routes. */
export interface AuthEnv {
  Bindings: HttpBindings;
  Variables: {
    /** Set by {@link requireAuth}; routes receive the caller from here and pass it on explicitly. */
    account: Account;
  };
}

/** Pull the token out of an `Authorization: Bearer <token>` header. */
export function extractBearerToken(header: string | undefined): string | null {
  if (!header) return null;
  const trimmed = header.trim();
  if (!trimmed.toLowerCase().startsWith("bearer ")) return null;
  const token = trimmed.slice(7).trim();
  return token || null;
}

/**
 * Require a valid access token. On success sets `c.get("account")`;
 * otherwise throws an `AuthError` for the error handler to render as 401.
 */
export function requireAuth(flow: Pick<AuthenticationFlow, "authenticate">): MiddlewareHandler<AuthEnv> {
  return async (c, next) => {
    const token = extractBearerToken(c.req.header("Authorization"));
    if (!token) throw new InvalidTokenError("Missing bearer token");

    c.set("account", await flow.authenticate(token));
    return next();
  };
}
