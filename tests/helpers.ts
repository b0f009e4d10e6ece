import pino from "pino";
import { vi } from "vitest";

import { FallbackCache } from "../src/cache/fallback-cache.js";
import type { KeyValueStore } from "../src/cache/key-value-store.js";
import { MemoryStore } from "../src/cache/memory-store.js";
import type { AppConfig } from "../src/config.js";
import type { HubspotClient } from "../src/provider/hubspot-client.js";
import type { HubspotObjectType } from "../src/types/hubspot.js";

export function baseConfig(): AppConfig {
  return {
    nodeEnv: "test",
    port: 8000,
    logLevel: "silent",
    trustProxy: false,
    hubspot: {
      clientId: "test-client-id",
      clientSecret: "test-secret",
      redirectUri: "https://app.example.com/integrations/hubspot/oauth2callback",
      scopes: ["crm.objects.contacts.read", "oauth"],
      authorizeUrl: "https://app.hubspot.com/oauth/authorize",
      tokenUrl: "https://api.hubapi.com/oauth/v1/token",
      apiBaseUrl: "https://api.hubapi.com",
      timeoutMs: 1000
    },
    cache: {
      driver: "memory",
      host: "localhost",
      port: 6379,
      db: 0,
      commandTimeoutMs: 1000
    },
    ttl: {
      stateSeconds: 600,
      credentialsSeconds: 600
    }
  };
}

export function silentLogger() {
  return pino({ enabled: false });
}

export function memoryCache(): FallbackCache {
  return new FallbackCache(null, new MemoryStore(), silentLogger());
}

export function createHubspotMock(overrides?: Partial<HubspotClient>) {
  return {
    exchangeCode: vi.fn(async (_code: string) => ({
      access_token: "test-access-token",
      token_type: "bearer",
      expires_in: 1800
    })),
    listObjects: vi.fn(
      async (
        _accessToken: string,
        _objectType: HubspotObjectType,
        _options: { limit: number; properties: readonly string[] }
      ): Promise<unknown[]> => []
    ),
    ...overrides
  };
}

/** External store stand-in that can be switched off to simulate an outage. */
export class FlakyStore implements KeyValueStore {
  available = true;
  attempts = 0;
  private readonly backing = new MemoryStore();

  async put(key: string, value: string, ttlSeconds?: number): Promise<void> {
    this.check();
    await this.backing.put(key, value, ttlSeconds);
  }

  async get(key: string): Promise<string | undefined> {
    this.check();
    return this.backing.get(key);
  }

  async delete(key: string): Promise<void> {
    this.check();
    await this.backing.delete(key);
  }

  async healthcheck(): Promise<void> {
    this.check();
  }

  async close(): Promise<void> {
    await this.backing.close();
  }

  private check(): void {
    this.attempts += 1;
    if (!this.available) {
      throw new Error("connect ECONNREFUSED 127.0.0.1:6379");
    }
  }
}
