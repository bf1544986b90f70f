import { Redis } from "ioredis";
import { StoreUnavailableError } from "../auth/errors.js";
import { logger } from "../config/logger.js";
import type { IKeyValueStore } from "./key-value-store.js";

/** Round-trip bound for a single store command. */
export const STORE_COMMAND_TIMEOUT_MS = 5_000;

/** The subset of Redis commands the store needs. */
export interface RedisCommands {
  incr(key: string): Promise<number>;
  expire(key: string, seconds: number): Promise<number>;
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds?: number): Promise<unknown>;
  del(...keys: string[]): Promise<number>;
  ttl(key: string): Promise<number>;
}

/** Adapt an ioredis client to {@link RedisCommands}. */
export function ioredisCommands(redis: Redis): RedisCommands {
  return {
    incr: (key) => redis.incr(key),
    expire: (key, seconds) => redis.expire(key, seconds),
    get: (key) => redis.get(key),
    set: (key, value, ttlSeconds) =>
      ttlSeconds === undefined ? redis.set(key, value) : redis.set(key, value, "EX", ttlSeconds),
    del: (...keys) => redis.del(...keys),
    ttl: (key) => redis.ttl(key),
  };
}

/**
 * Connect to Redis with short timeouts and no offline queue, so that an
 * unreachable server fails commands quickly instead of stalling requests.
 */
export function createRedisClient(url: string): Redis {
  const redis = new Redis(url, {
    commandTimeout: STORE_COMMAND_TIMEOUT_MS,
    connectTimeout: STORE_COMMAND_TIMEOUT_MS,
    maxRetriesPerRequest: 1,
    enableOfflineQueue: false,
  });
  redis.on("error", (err: Error) => {
    logger.warn("Redis connection error", { error: err.message });
  });
  redis.on("ready", () => {
    logger.info("Redis client connected");
  });
  return redis;
}

/** Redis-backed store. Every client failure surfaces as {@link StoreUnavailableError}. */
export class RedisKeyValueStore implements IKeyValueStore {
  constructor(private readonly client: RedisCommands) {}

  private async run<T>(operation: string, command: () => Promise<T>): Promise<T> {
    try {
      return await command();
    } catch (err) {
      throw new StoreUnavailableError(operation, { cause: err });
    }
  }

  incr(key: string): Promise<number> {
    return this.run("incr", () => this.client.incr(key));
  }

  async expire(key: string, seconds: number): Promise<boolean> {
    const result = await this.run("expire", () => this.client.expire(key, seconds));
    return result === 1;
  }

  get(key: string): Promise<string | null> {
    return this.run("get", () => this.client.get(key));
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    await this.run("set", () => this.client.set(key, value, ttlSeconds));
  }

  delete(...keys: string[]): Promise<number> {
    if (keys.length === 0) return Promise.resolve(0);
    return this.run("delete", () => this.client.del(...keys));
  }

  ttl(key: string): Promise<number> {
    return this.run("ttl", () => this.client.ttl(key));
  }
}
