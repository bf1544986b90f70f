import type { Context, ErrorHandler } from "hono";
import { HTTPException } from "hono/http-exception";
import { AccountLockedError, AuthError, RateLimitExceededError } from "../auth/errors.js";
import { logger } from "../config/logger.js";

/** JSON body of every error response. */
export interface ErrorBody {
  message: string;
  error_code: string;
  details?: Record<string, unknown>;
}

/** Render an {@link AuthError} with its status and any Retry-After / WWW-Authenticate header. */
export function renderAuthError(c: Context, err: AuthError): Response {
  if (err instanceof RateLimitExceededError) {
    c.header("Retry-After", String(err.retryAfter));
    c.header("X-RateLimit-Limit", String(err.limit));
    c.header("X-RateLimit-Remaining", "0");
  } else if (err instanceof AccountLockedError) {
    c.header("Retry-After", String(err.remainingSeconds));
  } else if (err.status === 401) {
    c.header("WWW-Authenticate", "Bearer");
  }

  const body: ErrorBody = { message: err.message, error_code: err.code };
  if (err.details) body.details = err.details;
  return c.json(body, err.status);
}

/**
 * Global error handler. Known authentication errors map to their status;
 * anything else is logged and answered with a generic 500.
 */
export const errorHandler: ErrorHandler = (err, c) => {
  if (err instanceof AuthError) return renderAuthError(c, err);
  if (err instanceof HTTPException) return err.getResponse();

  logger.error("Unhandled error in request", {
    error: err.message,
    stack: err.stack,
    path: c.req.path,
    method: c.req.method,
  });

  const body: ErrorBody = {
    message: "An unexpected error occurred while processing your request",
    error_code: "INTERNAL_ERROR",
  };
  return c.json(body, 500);
};
