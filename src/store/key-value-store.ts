/**
 * Shared key-value store capability used for login-attempt and rate-limit
 * counters. Implementations must make `incr` atomic per key; callers rely on
 * that so concurrent failures against one identity are never under-counted.
 *
 * Implementations throw `StoreUnavailableError` when the backing store cannot
 * be reached.
 */
export interface IKeyValueStore {
  /** Increment the integer at `key` (missing counts as 0). Returns the new value. */
  incr(key: string): Promise<number>;

  /** Set the key's time-to-live. Returns false when the key does not exist. */
  expire(key: string, seconds: number): Promise<boolean>;

  /** Read a value. Returns null if absent or expired. */
  get(key: string): Promise<string | null>;

  /** Write a value, optionally with a time-to-live in seconds. */
  set(key: string, value: string, ttlSeconds?: number): Promise<void>;

  /** Delete keys. Returns how many existed. */
  delete(...keys: string[]): Promise<number>;

  /**
   * Remaining time-to-live in whole seconds.
   * `-2` when the key does not exist, `-1` when it has no expiry.
   */
  ttl(key: string): Promise<number>;
}
