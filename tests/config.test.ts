import { describe, expect, it } from "vitest";

import { loadConfig } from "../src/config.js";

const requiredEnv = {
  CLIENT_ID: "test-client-id",
  CLIENT_SECRET: "test-secret",
  REDIRECT_URI: "http://localhost:8000/integrations/hubspot/oauth2callback"
};

describe("loadConfig", () => {
  it("fills defaults around the required provider settings", () => {
    const config = loadConfig(requiredEnv);

    expect(config.port).toBe(8000);
    expect(config.hubspot).toEqual({
      clientId: "test-client-id",
      clientSecret: "test-secret",
      redirectUri: "http://localhost:8000/integrations/hubspot/oauth2callback",
      scopes: [
        "crm.objects.contacts.read",
        "crm.schemas.contacts.read",
        "crm.objects.companies.read",
        "crm.schemas.companies.read",
        "oauth"
      ],
      authorizeUrl: "https://app.hubspot.com/oauth/authorize",
      tokenUrl: "https://api.hubapi.com/oauth/v1/token",
      apiBaseUrl: "https://api.hubapi.com",
      timeoutMs: 10_000
    });
    expect(config.cache).toEqual({ driver: "redis", host: "localhost", port: 6379, db: 0, commandTimeoutMs: 1000 });
    expect(config.ttl).toEqual({ stateSeconds: 600, credentialsSeconds: 600 });
  });

  it("reads cache and ttl overrides", () => {
    const config = loadConfig({
      ...requiredEnv,
      CACHE_DRIVER: "memory",
      CACHE_HOST: "cache.internal",
      CACHE_PORT: "6380",
      STATE_TTL_SECONDS: "300",
      CREDENTIALS_TTL_SECONDS: "900",
      HUBSPOT_API_BASE_URL: "https://api.hubapi.com/",
      TRUST_PROXY: "yes"
    });

    expect(config.cache.driver).toBe("memory");
    expect(config.cache.host).toBe("cache.internal");
    expect(config.cache.port).toBe(6380);
    expect(config.ttl).toEqual({ stateSeconds: 300, credentialsSeconds: 900 });
    expect(config.hubspot.apiBaseUrl).toBe("https://api.hubapi.com");
    expect(config.trustProxy).toBe(true);
  });

  it("rejects missing credentials and out-of-range values", () => {
    expect(() => loadConfig({ CLIENT_ID: "test-client-id" })).toThrow();
    expect(() => loadConfig({ ...requiredEnv, REDIRECT_URI: "not a url" })).toThrow();
    expect(() => loadConfig({ ...requiredEnv, STATE_TTL_SECONDS: "30" })).toThrow();
    expect(() => loadConfig({ ...requiredEnv, CACHE_DRIVER: "memcached" })).toThrow();
  });
});
