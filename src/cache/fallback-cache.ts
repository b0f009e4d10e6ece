import type { Logger } from "pino";

import type { CacheBackend, KeyValueCache, KeyValueStore } from "./key-value-store.js";
import type { MemoryStore } from "./memory-store.js";

type StoreResult<T> = { ok: true; value: T } | { ok: false; error: unknown };

type Operation = "put" | "get" | "delete";

/**
 * Tries the external store on every call and serves the call from the
 * in-process store when that attempt fails. There is no circuit breaker, so a
 * recovered external store is picked up on the next call.
 *
 * The in-process store only holds a key when the last external put for it
 * failed, so a live entry there is always newer than the external one.
 */
export class FallbackCache implements KeyValueCache {
  private degraded = false;

  constructor(
    private readonly primary: KeyValueStore | null,
    private readonly fallback: MemoryStore,
    private readonly logger: Logger
  ) {}

  async put(key: string, value: string, ttlSeconds?: number): Promise<void> {
    const result = await this.attempt("put", key, (store) => store.put(key, value, ttlSeconds));
    if (result?.ok) {
      // Drop any copy written during an outage so it cannot shadow this value later.
      await this.fallback.delete(key);
      return;
    }
    await this.fallback.put(key, value, ttlSeconds);
  }

  async get(key: string): Promise<string | undefined> {
    const result = await this.attempt("get", key, (store) => store.get(key));
    const local = await this.fallback.get(key);
    if (local !== undefined) {
      return local;
    }
    return result?.ok ? result.value : undefined;
  }

  async delete(key: string): Promise<void> {
    await this.attempt("delete", key, (store) => store.delete(key));
    await this.fallback.delete(key);
  }

  async healthcheck(): Promise<CacheBackend> {
    if (!this.primary) {
      return "memory";
    }
    try {
      await this.primary.healthcheck();
      return "redis";
    } catch (error) {
      this.logger.warn({ err: error }, "External cache healthcheck failed");
      return "memory";
    }
  }

  async close(): Promise<void> {
    try {
      await this.primary?.close();
    } finally {
      await this.fallback.close();
    }
  }

  /** Resolves to undefined when no external store is configured. */
  private async attempt<T>(
    operation: Operation,
    key: string,
    run: (store: KeyValueStore) => Promise<T>
  ): Promise<StoreResult<T> | undefined> {
    if (!this.primary) {
      return undefined;
    }

    const result = await run(this.primary).then(
      (value): StoreResult<T> => ({ ok: true, value }),
      (error: unknown): StoreResult<T> => ({ ok: false, error })
    );
    this.track(operation, key, result);
    return result;
  }

  private track(operation: Operation, key: string, result: StoreResult<unknown>): void {
    if (result.ok) {
      if (this.degraded) {
        this.degraded = false;
        this.logger.info({ operation, key }, "External cache reachable again");
      }
      return;
    }

    if (!this.degraded) {
      this.degraded = true;
      this.logger.warn({ err: result.error, operation, key }, "External cache unavailable, using in-memory fallback");
    } else {
      this.logger.debug({ err: result.error, operation, key }, "External cache still unavailable");
    }
  }
}
