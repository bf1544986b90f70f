import type { IKeyValueStore } from "./key-value-store.js";

interface Entry {
  value: string;
  /** Epoch ms, or null for no expiry. */
  expiresAt: number | null;
}

/**
 * Process-local store with Redis-compatible semantics.
 *
 * State is not shared between processes, so this is only suitable for
 * single-instance development and for tests.
 */
export class InMemoryKeyValueStore implements IKeyValueStore {
  private readonly entries = new Map<string, Entry>();

  constructor(private readonly now: () => number = Date.now) {}

  private live(key: string): Entry | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt !== null && entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }

  async incr(key: string): Promise<number> {
    const entry = this.live(key);
    const current = entry ? Number.parseInt(entry.value, 10) : 0;
    if (Number.isNaN(current)) {
      throw new Error(`Value at ${key} is not an integer`);
    }
    const next = current + 1;
    this.entries.set(key, { value: String(next), expiresAt: entry?.expiresAt ?? null });
    return next;
  }

  async expire(key: string, seconds: number): Promise<boolean> {
    const entry = this.live(key);
    if (!entry) return false;
    entry.expiresAt = this.now() + seconds * 1000;
    return true;
  }

  async get(key: string): Promise<string | null> {
    return this.live(key)?.value ?? null;
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    this.entries.set(key, {
      value,
      expiresAt: ttlSeconds !== undefined ? this.now() + ttlSeconds * 1000 : null,
    });
  }

  async delete(...keys: string[]): Promise<number> {
    let removed = 0;
    for (const key of keys) {
      if (this.live(key)) removed++;
      this.entries.delete(key);
    }
    return removed;
  }

  async ttl(key: string): Promise<number> {
    const entry = this.live(key);
    if (!entry) return -2;
    if (entry.expiresAt === null) return -1;
    return Math.ceil((entry.expiresAt - this.now()) / 1000);
  }

  /** Number of live keys. */
  get size(): number {
    let count = 0;
    for (const key of this.entries.keys()) {
      if (this.live(key)) count++;
    }
    return count;
  }
}
