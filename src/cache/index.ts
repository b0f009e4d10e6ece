import type { Logger } from "pino";

import type { AppConfig } from "../config.js";
import { FallbackCache } from "./fallback-cache.js";
import { MemoryStore } from "./memory-store.js";
import { createRedisClient, RedisStore } from "./redis-store.js";

export type { CacheBackend, KeyValueCache, KeyValueStore } from "./key-value-store.js";
export { FallbackCache } from "./fallback-cache.js";
export { MemoryStore } from "./memory-store.js";
export { RedisStore } from "./redis-store.js";

export function createCache(config: AppConfig, logger: Logger): FallbackCache {
  if (config.cache.driver === "memory") {
    logger.warn("Using in-memory cache only. Use CACHE_DRIVER=redis for multi-instance deployments.");
    return new FallbackCache(null, new MemoryStore(), logger);
  }

  const client = createRedisClient(config.cache, logger);
  return new FallbackCache(new RedisStore(client), new MemoryStore(), logger);
}
