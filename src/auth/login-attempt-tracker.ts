import { logger } from "../config/logger.js";
import type { IKeyValueStore } from "../store/key-value-store.js";
import { StoreUnavailableError } from "./errors.js";

export const DEFAULT_MAX_FAILED_ATTEMPTS = 5;
export const DEFAULT_LOCKOUT_PERIOD_SECONDS = 900;

const KEY_PREFIX = "login:failed:";

export interface LockoutStatus {
  locked: boolean;
  /** Whole seconds until the lock lifts; 0 when unlocked. */
  remainingSeconds: number;
}

export interface LoginAttemptTrackerOptions {
  maxFailedAttempts?: number;
  lockoutPeriodSeconds?: number;
  /** Epoch milliseconds. */
  now?: () => number;
}

const UNLOCKED: LockoutStatus = { locked: false, remainingSeconds: 0 };

/**
 * Counts failed logins per identity in the shared store and reports a
 * temporary lockout once the count reaches the limit.
 *
 * The lock lasts `lockoutPeriodSeconds` from the most recent failure. Records
 * expire from the store after twice that, so abandoned counters clean up.
 *
 * When the store is unreachable the tracker fails open: checks report
 * unlocked and failures go unrecorded.
 */
export class LoginAttemptTracker {
  private readonly maxFailedAttempts: number;
  private readonly lockoutPeriodSeconds: number;
  private readonly now: () => number;

  constructor(
    private readonly store: IKeyValueStore,
    opts: LoginAttemptTrackerOptions = {},
  ) {
    this.maxFailedAttempts = opts.maxFailedAttempts ?? DEFAULT_MAX_FAILED_ATTEMPTS;
    this.lockoutPeriodSeconds = opts.lockoutPeriodSeconds ?? DEFAULT_LOCKOUT_PERIOD_SECONDS;
    this.now = opts.now ?? Date.now;
  }

  async recordFailure(identity: string): Promise<void> {
    const { countKey, timestampKey } = keysFor(identity);
    const ttl = this.lockoutPeriodSeconds * 2;

    await this.failOpen("recordFailure", undefined, async () => {
      const attempts = await this.store.incr(countKey);
      await this.store.set(timestampKey, String(this.now()), ttl);
      await this.store.expire(countKey, ttl);

      logger.warn("Failed login attempt", { attempts, max: this.maxFailedAttempts });
      if (attempts >= this.maxFailedAttempts) {
        logger.warn("Account locked after repeated failed logins", {
          attempts,
          lockoutSeconds: this.lockoutPeriodSeconds,
        });
      }
    });
  }

  async recordSuccess(identity: string): Promise<void> {
    const { countKey, timestampKey } = keysFor(identity);
    await this.failOpen("recordSuccess", undefined, async () => {
      await this.store.delete(countKey, timestampKey);
    });
  }

  async checkLockout(identity: string): Promise<LockoutStatus> {
    const { countKey, timestampKey } = keysFor(identity);

    return this.failOpen("checkLockout", UNLOCKED, async () => {
      const rawCount = await this.store.get(countKey);
      const attempts = rawCount === null ? 0 : Number.parseInt(rawCount, 10);
      if (!(attempts >= this.maxFailedAttempts)) return UNLOCKED;

      const rawTimestamp = await this.store.get(timestampKey);
      if (rawTimestamp === null) return UNLOCKED;
      const lastFailure = Number(rawTimestamp);
      if (!Number.isFinite(lastFailure)) return UNLOCKED;

      const elapsedSeconds = (this.now() - lastFailure) / 1000;
      if (elapsedSeconds >= this.lockoutPeriodSeconds) {
        await this.store.delete(countKey, timestampKey);
        return UNLOCKED;
      }

      return { locked: true, remainingSeconds: Math.ceil(this.lockoutPeriodSeconds - elapsedSeconds) };
    });
  }

  private async failOpen<T>(operation: string, fallback: T, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (!(err instanceof StoreUnavailableError)) throw err;
      logger.warn("Login attempt store unavailable; lockout not enforced", {
        operation,
        error: err.message,
      });
      return fallback;
    }
  }
}

/** Identities compare case-insensitively and ignore surrounding whitespace. */
export function normalizeIdentity(identity: string): string {
  return identity.trim().toLowerCase();
}

function keysFor(identity: string): { countKey: string; timestampKey: string } {
  const countKey = `${KEY_PREFIX}${normalizeIdentity(identity)}`;
  return { countKey, timestampKey: `${countKey}:timestamp` };
}
