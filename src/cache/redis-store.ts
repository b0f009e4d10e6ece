import { Redis } from "ioredis";
import type { Logger } from "pino";

import type { AppConfig } from "../config.js";
import type { KeyValueStore } from "./key-value-store.js";

/** The slice of the ioredis client this store talks to. */
export interface RedisCommands {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  set(key: string, value: string, mode: "EX", seconds: number): Promise<unknown>;
  del(key: string): Promise<number>;
  ping(): Promise<string>;
  quit(): Promise<string>;
}

export function createRedisClient(options: AppConfig["cache"], logger: Logger): Redis {
  const client = new Redis({
    host: options.host,
    port: options.port,
    db: options.db,
    commandTimeout: options.commandTimeoutMs,
    connectTimeout: options.commandTimeoutMs * 5,
    maxRetriesPerRequest: 1,
    retryStrategy: (times) => Math.min(times * 200, 5000)
  });

  client.on("error", (error: Error) => {
    logger.debug({ err: error }, "Redis client error");
  });
  client.on("ready", () => {
    logger.info({ host: options.host, port: options.port }, "Redis client ready");
  });

  return client;
}

export class RedisStore implements KeyValueStore {
  constructor(private readonly redis: RedisCommands) {}

  async put(key: string, value: string, ttlSeconds?: number): Promise<void> {
    if (ttlSeconds !== undefined && ttlSeconds > 0) {
      await this.redis.set(key, value, "EX", ttlSeconds);
      return;
    }
    await this.redis.set(key, value);
  }

  async get(key: string): Promise<string | undefined> {
    const payload = await this.redis.get(key);
    return payload ?? undefined;
  }

  async delete(key: string): Promise<void> {
    await this.redis.del(key);
  }

  async healthcheck(): Promise<void> {
    await this.redis.ping();
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}
