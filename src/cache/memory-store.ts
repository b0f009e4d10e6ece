import { KeyedMutex } from "./keyed-mutex.js";
import type { KeyValueStore } from "./key-value-store.js";

interface CacheEntry {
  value: string;
  expiresAt?: number;
}

export class MemoryStore implements KeyValueStore {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly mutex = new KeyedMutex();

  async put(key: string, value: string, ttlSeconds?: number): Promise<void> {
    await this.mutex.runExclusive(key, () => {
      this.entries.set(
        key,
        ttlSeconds !== undefined && ttlSeconds > 0
          ? { value, expiresAt: Date.now() + ttlSeconds * 1000 }
          : { value }
      );
    });
  }

  async get(key: string): Promise<string | undefined> {
    return this.mutex.runExclusive(key, () => {
      const entry = this.entries.get(key);
      if (!entry) {
        return undefined;
      }
      // Expired entries are removed on read; there is no background sweep.
      if (entry.expiresAt !== undefined && Date.now() > entry.expiresAt) {
        this.entries.delete(key);
        return undefined;
      }
      return entry.value;
    });
  }

  async delete(key: string): Promise<void> {
    await this.mutex.runExclusive(key, () => {
      this.entries.delete(key);
    });
  }

  async healthcheck(): Promise<void> {}

  async close(): Promise<void> {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
