import { sign, verify } from "hono/jwt";
import { JwtTokenExpired } from "hono/utils/jwt/types";
import { z } from "zod";
import { logger } from "../config/logger.js";
import { ExpiredTokenError, InvalidTokenError } from "./errors.js";

export type TokenKind = "access" | "refresh";
export type TokenAlgorithm = "HS256" | "HS384" | "HS512";

const SECONDS_PER_DAY = 86_400;

const claimsSchema = z.object({
  sub: z.string().min(1),
  iat: z.number().int(),
  exp: z.number().int(),
  type: z.enum(["access", "refresh"]),
});

export type TokenClaims = z.infer<typeof claimsSchema>;

/** Resolves a token subject to the account it names, or null if there is none. */
export type SubjectLookup = (subject: string) => Promise<{ isActive: boolean } | null>;

export interface TokenIssuerOptions {
  secret: string;
  algorithm: TokenAlgorithm;
  accessTtlSeconds: number;
  refreshTtlDays: number;
  /** Consulted when verifying refresh tokens. */
  lookupSubject?: SubjectLookup;
}

/**
 * Signs and verifies the service's bearer tokens.
 *
 * Access and refresh tokens share a key but carry a `type` claim, and neither
 * kind is accepted where the other is expected. The key and algorithm are
 * fixed for the life of the process.
 */
export class TokenIssuer {
  constructor(private readonly opts: TokenIssuerOptions) {
    assertPositive(opts.accessTtlSeconds, "accessTtlSeconds");
    assertPositive(opts.refreshTtlDays, "refreshTtlDays");
  }

  get accessTtlSeconds(): number {
    return this.opts.accessTtlSeconds;
  }

  async issueAccess(subject: string, ttlSeconds = this.opts.accessTtlSeconds): Promise<string> {
    assertPositive(ttlSeconds, "ttlSeconds");
    return this.issue(subject, "access", ttlSeconds);
  }

  async issueRefresh(subject: string, ttlDays = this.opts.refreshTtlDays): Promise<string> {
    assertPositive(ttlDays, "ttlDays");
    return this.issue(subject, "refresh", ttlDays * SECONDS_PER_DAY);
  }

  /**
   * Verify signature, expiry and kind.
   * Throws {@link ExpiredTokenError} once `exp` has passed and
   * {@link InvalidTokenError} for anything else wrong with the token.
   */
  async verify(token: string, expectedKind: TokenKind): Promise<TokenClaims> {
    let payload: unknown;
    try {
      payload = await verify(token, this.opts.secret, this.opts.algorithm);
    } catch (err) {
      if (err instanceof JwtTokenExpired) throw new ExpiredTokenError();
      throw new InvalidTokenError(err instanceof Error ? err.message : "Token verification failed");
    }

    const parsed = claimsSchema.safeParse(payload);
    if (!parsed.success) throw new InvalidTokenError("Malformed token claims");
    const claims = parsed.data;

    if (claims.type !== expectedKind) {
      logger.warn("Token presented for the wrong purpose", { expected: expectedKind, actual: claims.type });
      throw new InvalidTokenError(`Expected ${expectedKind} token`);
    }

    if (expectedKind === "refresh" && this.opts.lookupSubject) {
      const account = await this.opts.lookupSubject(claims.sub);
      if (!account?.isActive) throw new InvalidTokenError("Subject is missing or inactive");
    }

    return claims;
  }

  private async issue(subject: string, type: TokenKind, ttlSeconds: number): Promise<string> {
    const iat = Math.floor(Date.now() / 1000);
    const claims: TokenClaims = { sub: subject, iat, exp: iat + Math.ceil(ttlSeconds), type };
    return sign(claims, this.opts.secret, this.opts.algorithm);
  }
}

function assertPositive(value: number, name: string): void {
  if (!(value > 0)) throw new RangeError(`${name} must be positive, got ${value}`);
}
