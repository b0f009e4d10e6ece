/**
 * Raw key-value backend. Implementations may reject on transport failure;
 * callers that need a non-failing surface go through {@link KeyValueCache}.
 */
export interface KeyValueStore {
  put(key: string, value: string, ttlSeconds?: number): Promise<void>;
  get(key: string): Promise<string | undefined>;
  delete(key: string): Promise<void>;
  healthcheck(): Promise<void>;
  close(): Promise<void>;
}

export type CacheBackend = "redis" | "memory";

/**
 * Short-lived secret storage used by the OAuth flow. Never rejects on
 * put/get/delete: backend failures are absorbed.
 */
export interface KeyValueCache {
  put(key: string, value: string, ttlSeconds?: number): Promise<void>;
  get(key: string): Promise<string | undefined>;
  delete(key: string): Promise<void>;
  /** Backend that is currently answering. */
  healthcheck(): Promise<CacheBackend>;
  close(): Promise<void>;
}
