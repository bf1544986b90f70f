import { type RateLimit, periodToSeconds } from "../config/rate-limits.js";
import { logger } from "../config/logger.js";
import type { IKeyValueStore } from "../store/key-value-store.js";
import { RateLimitExceededError, StoreUnavailableError } from "./errors.js";

export { parseRate } from "../config/rate-limits.js";

export const DEFAULT_RATE_LIMIT_PREFIX = "rate-limit";

/**
 * Fixed-window request counter per client IP and route.
 *
 * The first request in a window creates the counter and arms its expiry; the
 * window resets when the key expires. A store outage lets the request through.
 */
export class IpRateLimiter {
  constructor(
    private readonly store: IKeyValueStore,
    private readonly prefix = DEFAULT_RATE_LIMIT_PREFIX,
  ) {}

  /**
   * Count one request against `clientIp` on `routeKey`.
   * Resolves true while within `limit`; throws {@link RateLimitExceededError}
   * with the seconds left in the window once over it.
   */
  async allow(clientIp: string, routeKey: string, limit: number, period: string): Promise<true> {
    const windowSeconds = periodToSeconds(period);
    const key = `${this.prefix}:${clientIp}:${routeKey}`;

    let count: number;
    try {
      count = await this.store.incr(key);
      if (count === 1) await this.store.expire(key, windowSeconds);
      if (count <= limit) return true;
    } catch (err) {
      return this.failOpen(err, routeKey);
    }

    const retryAfter = await this.retryAfter(key, windowSeconds, routeKey);
    logger.warn("Rate limit exceeded", { clientIp, routeKey, count, limit, period, retryAfter });
    throw new RateLimitExceededError(retryAfter, limit, period);
  }

  /** Convenience overload taking a parsed {@link RateLimit}. */
  async allowRate(clientIp: string, routeKey: string, rate: RateLimit): Promise<true> {
    return this.allow(clientIp, routeKey, rate.limit, rate.period);
  }

  private async retryAfter(key: string, windowSeconds: number, routeKey: string): Promise<number> {
    try {
      const ttl = await this.store.ttl(key);
      if (ttl > 0) return ttl;
      // Counter lost its expiry (or expired mid-request): re-arm a full window.
      await this.store.expire(key, windowSeconds);
    } catch (err) {
      if (!(err instanceof StoreUnavailableError)) throw err;
      logger.warn("Rate limit store unavailable while reading window", { routeKey, error: err.message });
    }
    return windowSeconds;
  }

  private failOpen(err: unknown, routeKey: string): true {
    if (!(err instanceof StoreUnavailableError)) throw err;
    logger.warn("Rate limit store unavailable; allowing request", { routeKey, error: err.message });
    return true;
  }
}
