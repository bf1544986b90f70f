import { randomBytes } from "node:crypto";
import type { IAccountRepository } from "../accounts/account-repository.js";
import type { Account } from "../accounts/types.js";
import type { AuditLogger } from "../audit/logger.js";
import type { AuditAction } from "../audit/schema.js";
import { logger } from "../config/logger.js";
import { DEFAULT_RATE_LIMIT_KEY, type RateLimitTable } from "../config/rate-limits.js";
import { AccountExistsError, AccountLockedError, InvalidCredentialsError, InvalidTokenError } from "./errors.js";
import type { Credential } from "./hashers.js";
import type { IpRateLimiter } from "./ip-rate-limiter.js";
import type { LoginAttemptTracker } from "./login-attempt-tracker.js";
import type { PasswordCredential } from "./password-credential.js";
import type { TokenIssuer } from "./token-issuer.js";

/** Where a request came from, for the audit trail. */
export interface RequestContext {
  ipAddress?: string | null;
  userAgent?: string | null;
}

export interface AccessTokenResponse {
  accessToken: string;
  tokenType: "bearer";
  /** Seconds until the access token expires. */
  expiresIn: number;
}

export interface TokenPair extends AccessTokenResponse {
  refreshToken: string;
}

/** Account fields safe to return to their owner. Timestamps are ISO-8601. */
export interface AccountProfile {
  id: string;
  username: string;
  email: string;
  isActive: boolean;
  createdAt: string;
  lastLoginAt: string | null;
  passwordChangedAt: string | null;
}

export interface AuthenticationFlowDeps {
  accounts: IAccountRepository;
  credentials: PasswordCredential;
  /** Must be built with `lookupSubject`: refresh relies on it to refuse missing or inactive accounts. */
  tokens: TokenIssuer;
  attempts: LoginAttemptTracker;
  rateLimiter: IpRateLimiter;
  rateLimits: RateLimitTable;
  audit: AuditLogger;
}

/**
 * The composed authentication operations.
 *
 * Nothing here reads an ambient "current user": operations that act on an
 * account take it (or its id) as an argument, resolved by {@link authenticate}.
 */
export class AuthenticationFlow {
  private readonly accounts: IAccountRepository;
  private readonly credentials: PasswordCredential;
  private readonly tokens: TokenIssuer;
  private readonly attempts: LoginAttemptTracker;
  private readonly rateLimiter: IpRateLimiter;
  private readonly rateLimits: RateLimitTable;
  private readonly audit: AuditLogger;
  private dummyCredential: Promise<Credential> | null = null;

  constructor(deps: AuthenticationFlowDeps) {
    this.accounts = deps.accounts;
    this.credentials = deps.credentials;
    this.tokens = deps.tokens;
    this.attempts = deps.attempts;
    this.rateLimiter = deps.rateLimiter;
    this.rateLimits = deps.rateLimits;
    this.audit = deps.audit;
  }

  /**
   * Create an account. Throws `WeakPasswordError` for a password that fails
   * the policy and `AccountExistsError` for a taken email or username.
   */
  async register(username: string, email: string, password: string, context: RequestContext = {}): Promise<Account> {
    if (await this.accounts.findByEmail(email)) throw new AccountExistsError("email");
    if (await this.accounts.findByUsername(username)) throw new AccountExistsError("username");

    const credential = await this.credentials.set(password);
    const account = await this.accounts.create({ username, email, credential });

    logger.info("Account registered", { accountId: account.id });
    await this.record(account.id, "create", `Self-registration for username ${username}`, context);
    return account;
  }

  /**
   * Exchange an identity and password for a token pair.
   *
   * An unknown identity and a wrong password fail identically, and both count
   * toward the identity's lockout. A locked identity is refused before the
   * password is looked at.
   */
  async login(identity: string, secret: string, context: RequestContext = {}): Promise<TokenPair> {
    const lockout = await this.attempts.checkLockout(identity);
    if (lockout.locked) {
      logger.warn("Login refused for locked identity", { remainingSeconds: lockout.remainingSeconds });
      throw new AccountLockedError(lockout.remainingSeconds);
    }

    const account = await this.accounts.findByEmail(identity);
    if (!account) {
      await this.credentials.verify(secret, await this.getDummyCredential());
      await this.attempts.recordFailure(identity);
      throw new InvalidCredentialsError();
    }

    if (!(await this.credentials.verify(secret, account.credential))) {
      await this.attempts.recordFailure(identity);
      throw new InvalidCredentialsError();
    }

    if (!account.isActive) {
      logger.warn("Login refused for inactive account", { accountId: account.id });
      throw new InvalidCredentialsError();
    }

    await this.attempts.recordSuccess(identity);
    await this.accounts.recordLogin(account.id);

    const accessToken = await this.tokens.issueAccess(account.id);
    const refreshToken = await this.tokens.issueRefresh(account.id);
    await this.record(account.id, "login", "User login", context);

    return { accessToken, refreshToken, tokenType: "bearer", expiresIn: this.tokens.accessTtlSeconds };
  }

  /** Issue a new access token for a valid refresh token. The refresh token itself is not rotated. */
  async refresh(refreshToken: string, context: RequestContext = {}): Promise<AccessTokenResponse> {
    // The issuer's subject lookup has already refused missing and inactive accounts.
    const claims = await this.tokens.verify(refreshToken, "refresh");

    const accessToken = await this.tokens.issueAccess(claims.sub);
    await this.record(claims.sub, "token_refresh", "Token refresh", context);

    return { accessToken, tokenType: "bearer", expiresIn: this.tokens.accessTtlSeconds };
  }

  /** Resolve an access token to its account. */
  async authenticate(accessToken: string): Promise<Account> {
    const claims = await this.tokens.verify(accessToken, "access");
    return this.activeAccount(claims.sub);
  }

  /**
   * Replace an authenticated account's password.
   *
   * Shares the login lockout: a locked identity is refused, and a wrong
   * current password counts as a failed login.
   */
  async changePassword(
    accountId: string,
    currentSecret: string,
    newSecret: string,
    context: RequestContext = {},
  ): Promise<void> {
    const account = await this.activeAccount(accountId);

    const lockout = await this.attempts.checkLockout(account.email);
    if (lockout.locked) throw new AccountLockedError(lockout.remainingSeconds);

    if (!(await this.credentials.verify(currentSecret, account.credential))) {
      await this.attempts.recordFailure(account.email);
      logger.warn("Password change refused: wrong current password", { accountId: account.id });
      throw new InvalidCredentialsError();
    }
    await this.attempts.recordSuccess(account.email);

    const credential = await this.credentials.set(newSecret);
    if (!(await this.accounts.setCredential(account.id, credential))) {
      throw new InvalidTokenError("Subject disappeared during password change");
    }

    logger.info("Password changed", { accountId: account.id });
    await this.record(account.id, "password_change", "User changed their password", context);
  }

  /** The account's own view of itself. Audited as a profile read. */
  async profile(account: Account, context: RequestContext = {}): Promise<AccountProfile> {
    await this.record(account.id, "view", "User viewed their profile", context);
    return accountProfile(account);
  }

  /**
   * Count a request from `clientIp` against the limit for `routeKey`.
   * Routes without their own entry share the `default` one; with neither,
   * the request is allowed. Throws `RateLimitExceededError` over the limit.
   */
  async checkRequestRate(clientIp: string, routeKey: string): Promise<true> {
    const rate = this.rateLimits[routeKey] ?? this.rateLimits[DEFAULT_RATE_LIMIT_KEY];
    if (!rate) return true;
    return this.rateLimiter.allowRate(clientIp, routeKey, rate);
  }

  private async activeAccount(accountId: string): Promise<Account> {
    const account = await this.accounts.findById(accountId);
    if (!account?.isActive) throw new InvalidTokenError("Subject is missing or inactive");
    return account;
  }

  /** A credential no password matches, verified for unknown identities to match the cost of a real check. */
  private getDummyCredential(): Promise<Credential> {
    this.dummyCredential ??= this.credentials.set(`${randomBytes(24).toString("base64url")}Aa1!`);
    return this.dummyCredential;
  }

  private async record(
    accountId: string,
    action: AuditAction,
    description: string,
    context: RequestContext,
  ): Promise<void> {
    await this.audit.log({
      userId: accountId,
      action,
      resourceType: "user",
      resourceId: accountId,
      description,
      ipAddress: context.ipAddress,
      userAgent: context.userAgent,
    });
  }
}

/** Strip an account down to the fields its owner may see. */
export function accountProfile(account: Account): AccountProfile {
  return {
    id: account.id,
    username: account.username,
    email: account.email,
    isActive: account.isActive,
    createdAt: new Date(account.createdAt).toISOString(),
    lastLoginAt: toIso(account.lastLoginAt),
    passwordChangedAt: toIso(account.passwordChangedAt),
  };
}

function toIso(epochMs: number | null): string | null {
  return epochMs === null ? null : new Date(epochMs).toISOString();
}
