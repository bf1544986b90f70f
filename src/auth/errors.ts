/**
 * Error taxonomy for the authentication core.
 *
 * Every error a caller can see extends {@link AuthError}, which carries a
 * stable machine code and the HTTP status the route layer should answer with.
 * {@link StoreUnavailableError} is internal: the lockout tracker and the rate
 * limiter convert it to fail-open behavior and never let it escape.
 */

export type AuthErrorCode =
  | "WEAK_PASSWORD"
  | "ACCOUNT_EXISTS"
  | "INVALID_CREDENTIALS"
  | "ACCOUNT_LOCKED"
  | "TOKEN_EXPIRED"
  | "INVALID_TOKEN"
  | "RATE_LIMIT_EXCEEDED";

export abstract class AuthError extends Error {
  abstract readonly code: AuthErrorCode;
  abstract readonly status: 400 | 401 | 409 | 429;

  /** Extra fields safe to return to the caller. */
  get details(): Record<string, unknown> | undefined {
    return undefined;
  }
}

export class WeakPasswordError extends AuthError {
  readonly code = "WEAK_PASSWORD";
  readonly status = 400;
  override readonly name = "WeakPasswordError";
}

export class AccountExistsError extends AuthError {
  readonly code = "ACCOUNT_EXISTS";
  readonly status = 409;
  override readonly name = "AccountExistsError";

  constructor(readonly field: "email" | "username") {
    super(field === "email" ? "Email already registered" : "Username already taken");
  }
}

/** Same message whether the identity is unknown or the password is wrong. */
export class InvalidCredentialsError extends AuthError {
  readonly code = "INVALID_CREDENTIALS";
  readonly status = 401;
  override readonly name = "InvalidCredentialsError";

  constructor() {
    super("Invalid email or password");
  }
}

export class AccountLockedError extends AuthError {
  readonly code = "ACCOUNT_LOCKED";
  readonly status = 429;
  override readonly name = "AccountLockedError";

  constructor(readonly remainingSeconds: number) {
    super(
      `Account is temporarily locked due to too many failed attempts. Try again in ${remainingSeconds} seconds.`,
    );
  }

  override get details(): Record<string, unknown> {
    return { lockout_seconds: this.remainingSeconds };
  }
}

export class ExpiredTokenError extends AuthError {
  readonly code = "TOKEN_EXPIRED";
  readonly status = 401;
  override readonly name = "ExpiredTokenError";

  constructor() {
    super("Token has expired");
  }
}

export class InvalidTokenError extends AuthError {
  readonly code = "INVALID_TOKEN";
  readonly status = 401;
  override readonly name = "InvalidTokenError";

  constructor(readonly reason = "Invalid token") {
    super("Invalid token");
  }
}

export class RateLimitExceededError extends AuthError {
  readonly code = "RATE_LIMIT_EXCEEDED";
  readonly status = 429;
  override readonly name = "RateLimitExceededError";

  constructor(
    readonly retryAfter: number,
    readonly limit: number,
    readonly period: string,
  ) {
    super(`Rate limit exceeded. Try again in ${retryAfter} seconds.`);
  }

  override get details(): Record<string, unknown> {
    return { retry_after: this.retryAfter, limit: this.limit, period: this.period };
  }
}

/** The shared key-value store could not be reached or answered with an error. */
export class StoreUnavailableError extends Error {
  override readonly name = "StoreUnavailableError";

  constructor(
    readonly operation: string,
    options?: { cause?: unknown },
  ) {
    super(`Key-value store unavailable during ${operation}`, options);
  }
}
