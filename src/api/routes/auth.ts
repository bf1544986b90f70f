/**
 * Auth routes: registration, token issue and refresh, and the caller's own
 * account.
 *
 * - POST /register          : create an account (rate key `register`)
 * - POST /token             : log in; JSON or form body (rate key `login`)
 * - POST /refresh-token     : new access token for a refresh token (rate key `token-refresh`)
 * - GET  /users/me          : the authenticated account's profile
 * - PUT  /users/me/password : change password (rate key `password-change`)
 * - GET  /ping              : liveness
 *
 * Errors from the flow are thrown through to the global error handler.
 */

import { type Context, Hono } from "hono";
import { z } from "zod";
import {
  type AccessTokenResponse,
  type AccountProfile,
  type AuthenticationFlow,
  accountProfile,
  type RequestContext,
  type TokenPair,
} from "../../auth/authentication-flow.js";
import { type AuthEnv, requireAuth } from "../../auth/middleware.js";
import type { ErrorBody } from "../error-handler.js";
import { getClientIpFromContext } from "../middleware/get-client-ip.js";
import { rateLimit } from "../middleware/rate-limit.js";

const registerSchema = z.object({
  username: z.string().trim().min(3).max(50),
  email: z.string().trim().email(),
  password: z.string().min(1),
});

/** `username` carries the email, as OAuth2 password-grant clients send it. */
const tokenSchema = z.object({
  username: z.string().trim().min(1),
  password: z.string().min(1),
});

const refreshSchema = z.object({
  refresh_token: z.string().min(1),
});

const changePasswordSchema = z.object({
  current_password: z.string().min(1),
  new_password: z.string().min(1),
});

export interface AuthRoutesOptions {
  trustedProxies?: ReadonlySet<string>;
}

export function authRoutes(flow: AuthenticationFlow, opts: AuthRoutesOptions = {}): Hono<AuthEnv> {
  const trusted = opts.trustedProxies ?? new Set<string>();
  const routes = new Hono<AuthEnv>();
  const auth = requireAuth(flow);

  const requestContext = (c: Context<AuthEnv>): RequestContext => ({
    ipAddress: getClientIpFromContext(c, trusted),
    userAgent: c.req.header("User-Agent") ?? null,
  });

  routes.post("/register", rateLimit("register", flow, opts), async (c) => {
    const body = await readJson(c);
    if (body === INVALID_JSON) return c.json(invalidJson(), 400);

    const parsed = registerSchema.safeParse(body);
    if (!parsed.success) return c.json(validationFailed(parsed.error), 400);

    const { username, email, password } = parsed.data;
    const account = await flow.register(username, email, password, requestContext(c));
    return c.json(profileBody(accountProfile(account)), 201);
  });

  routes.post("/token", rateLimit("login", flow, opts), async (c) => {
    const contentType = c.req.header("Content-Type") ?? "";
    let body: unknown;
    if (contentType.includes("application/json")) {
      body = await readJson(c);
      if (body === INVALID_JSON) return c.json(invalidJson(), 400);
    } else {
      body = await c.req.parseBody();
    }

    const parsed = tokenSchema.safeParse(body);
    if (!parsed.success) {
      const missing: ErrorBody = { message: "Missing email or password", error_code: "VALIDATION_ERROR" };
      return c.json(missing, 400);
    }

    const tokens = await flow.login(parsed.data.username, parsed.data.password, requestContext(c));
    return c.json(tokenBody(tokens));
  });

  routes.post("/refresh-token", rateLimit("token-refresh", flow, opts), async (c) => {
    const body = await readJson(c);
    if (body === INVALID_JSON) return c.json(invalidJson(), 400);

    const parsed = refreshSchema.safeParse(body);
    if (!parsed.success) return c.json(validationFailed(parsed.error), 400);

    const token = await flow.refresh(parsed.data.refresh_token, requestContext(c));
    return c.json(accessTokenBody(token));
  });

  routes.get("/users/me", auth, async (c) => {
    const profile = await flow.profile(c.get("account"), requestContext(c));
    return c.json(profileBody(profile));
  });

  routes.put("/users/me/password", rateLimit("password-change", flow, opts), auth, async (c) => {
    const body = await readJson(c);
    if (body === INVALID_JSON) return c.json(invalidJson(), 400);

    const parsed = changePasswordSchema.safeParse(body);
    if (!parsed.success) return c.json(validationFailed(parsed.error), 400);

    await flow.changePassword(
      c.get("account").id,
      parsed.data.current_password,
      parsed.data.new_password,
      requestContext(c),
    );
    return c.json({ message: "Password changed successfully" });
  });

  routes.get("/ping", (c) => c.json({ status: "ok", message: "Authentication service is running" }));

  return routes;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const INVALID_JSON = Symbol("invalid-json");

async function readJson(c: Context<AuthEnv>): Promise<unknown> {
  try {
    return await c.req.json();
  } catch {
    return INVALID_JSON;
  }
}

function invalidJson(): ErrorBody {
  return { message: "Invalid JSON body", error_code: "VALIDATION_ERROR" };
}

function validationFailed(error: z.ZodError): ErrorBody {
  return { message: "Validation failed", error_code: "VALIDATION_ERROR", details: { ...error.flatten() } };
}

function tokenBody(tokens: TokenPair) {
  return {
    access_token: tokens.accessToken,
    refresh_token: tokens.refreshToken,
    token_type: tokens.tokenType,
    expires_in: tokens.expiresIn,
  };
}

function accessTokenBody(token: AccessTokenResponse) {
  return {
    access_token: token.accessToken,
    token_type: token.tokenType,
    expires_in: token.expiresIn,
  };
}

function profileBody(profile: AccountProfile) {
  return {
    id: profile.id,
    username: profile.username,
    email: profile.email,
    is_active: profile.isActive,
    created_at: profile.createdAt,
    last_login_at: profile.lastLoginAt,
    password_changed_at: profile.passwordChangedAt,
  };
}
