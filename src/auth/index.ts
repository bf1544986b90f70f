import type { IAccountRepository } from "../accounts/index.js";
import { AuditLogger, type IAuditLogRepository } from "../audit/index.js";
import type { Config } from "../config/index.js";
import type { IKeyValueStore } from "../store/key-value-store.js";
import { AuthenticationFlow } from "./authentication-flow.js";
import { IpRateLimiter } from "./ip-rate-limiter.js";
import { LoginAttemptTracker } from "./login-attempt-tracker.js";
import { createPasswordCredential } from "./password-credential.js";
import { TokenIssuer } from "./token-issuer.js";

export type {
  AccessTokenResponse,
  AccountProfile,
  AuthenticationFlowDeps,
  RequestContext,
  TokenPair,
} from "./authentication-flow.js";
export { AuthenticationFlow, accountProfile } from "./authentication-flow.js";
export * from "./errors.js";
export type { Credential, CredentialHasher, HashAlgorithm, StoredCredential } from "./hashers.js";
export { BcryptHasher, MalformedCredentialError, Pbkdf2Hasher } from "./hashers.js";
export { IpRateLimiter } from "./ip-rate-limiter.js";
export type { LockoutStatus, LoginAttemptTrackerOptions } from "./login-attempt-tracker.js";
export { LoginAttemptTracker, normalizeIdentity } from "./login-attempt-tracker.js";
export type { AuthEnv } from "./middleware.js";
export { extractBearerToken, requireAuth } from "./middleware.js";
export { createPasswordCredential, PasswordCredential } from "./password-credential.js";
export { MIN_PASSWORD_LENGTH, passwordPolicyViolation } from "./password-policy.js";
export type { SubjectLookup, TokenAlgorithm, TokenClaims, TokenKind } from "./token-issuer.js";
export { TokenIssuer } from "./token-issuer.js";

export interface AuthenticationFlowStorage {
  accounts: IAccountRepository;
  auditRepo: IAuditLogRepository;
  store: IKeyValueStore;
}

/** Compose an {@link AuthenticationFlow} from configuration and its storage backends. */
export function createAuthenticationFlow(config: Config, storage: AuthenticationFlowStorage): AuthenticationFlow {
  const { accounts, auditRepo, store } = storage;
  return new AuthenticationFlow({
    accounts,
    credentials: createPasswordCredential({
      hasher: config.auth.passwordHasher,
      bcryptRounds: config.auth.bcryptRounds,
    }),
    tokens: new TokenIssuer({
      secret: config.auth.jwtSecret,
      algorithm: config.auth.jwtAlgorithm,
      accessTtlSeconds: config.auth.accessTokenExpireMinutes * 60,
      refreshTtlDays: config.auth.refreshTokenExpireDays,
      lookupSubject: (id) => accounts.findById(id),
    }),
    attempts: new LoginAttemptTracker(store, {
      maxFailedAttempts: config.lockout.maxFailedAttempts,
      lockoutPeriodSeconds: config.lockout.lockoutPeriodSeconds,
    }),
    rateLimiter: new IpRateLimiter(store, config.rateLimit.prefix),
    rateLimits: config.rateLimit.table,
    audit: new AuditLogger(auditRepo),
  });
}
