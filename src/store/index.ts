import { logger } from "../config/logger.js";
import { InMemoryKeyValueStore } from "./in-memory-key-value-store.js";
import type { IKeyValueStore } from "./key-value-store.js";
import { createRedisClient, ioredisCommands, RedisKeyValueStore } from "./redis-key-value-store.js";

export type { IKeyValueStore } from "./key-value-store.js";
export { InMemoryKeyValueStore } from "./in-memory-key-value-store.js";
export type { RedisCommands } from "./redis-key-value-store.js";
export { createRedisClient, ioredisCommands, RedisKeyValueStore } from "./redis-key-value-store.js";

export interface KeyValueStoreHandle {
  store: IKeyValueStore;
  /** Release the underlying connection, if any. */
  close(): Promise<void>;
}

/**
 * Pick the store implementation once, at startup: Redis when a URL is
 * configured, otherwise a process-local store.
 */
export function createKeyValueStore(redisUrl: string | undefined): KeyValueStoreHandle {
  if (redisUrl) {
    const redis = createRedisClient(redisUrl);
    return {
      store: new RedisKeyValueStore(ioredisCommands(redis)),
      close: async () => {
        await redis.quit();
      },
    };
  }
  logger.warn("No REDIS_URL configured; using in-process key-value store (state is not shared between instances)");
  return { store: new InMemoryKeyValueStore(), close: async () => {} };
}
