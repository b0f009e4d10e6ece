import { afterEach, describe, expect, it, vi } from "vitest";

import { CredentialsNotFoundError } from "../src/errors.js";
import { CredentialExchangeService } from "../src/oauth/credential-exchange.js";
import { createHubspotMock, memoryCache, silentLogger } from "./helpers.js";

function setup(hubspot = createHubspotMock()) {
  const cache = memoryCache();
  const service = new CredentialExchangeService(hubspot, cache, 600, silentLogger());
  return { service, cache, hubspot };
}

describe("CredentialExchangeService", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("stores the token response for the user and org", async () => {
    const { service, cache } = setup();

    const blob = await service.exchange("abc", { userId: "u1", orgId: "o1" });

    expect(blob).toEqual({ access_token: "test-access-token", token_type: "bearer", expires_in: 1800 });
    expect(JSON.parse((await cache.get("credentials:o1:u1")) ?? "null")).toEqual(blob);
  });

  it("hands credentials out once", async () => {
    const { service } = setup();
    await service.exchange("abc", { userId: "u1", orgId: "o1" });

    await expect(service.consumeCredentials("u1", "o1")).resolves.toMatchObject({
      access_token: "test-access-token"
    });
    await expect(service.consumeCredentials("u1", "o1")).rejects.toThrow(CredentialsNotFoundError);
  });

  it("keeps only the latest completion for a user and org", async () => {
    const exchangeCode = vi
      .fn(async (_code: string) => ({ access_token: "first-token" }))
      .mockResolvedValueOnce({ access_token: "first-token" })
      .mockResolvedValueOnce({ access_token: "second-token" });
    const { service } = setup(createHubspotMock({ exchangeCode }));

    await service.exchange("code-1", { userId: "u1", orgId: "o1" });
    await service.exchange("code-2", { userId: "u1", orgId: "o1" });

    expect(await service.consumeCredentials("u1", "o1")).toEqual({ access_token: "second-token" });
  });

  it("keeps pairs apart", async () => {
    const { service } = setup();
    await service.exchange("abc", { userId: "u1", orgId: "o1" });

    await expect(service.consumeCredentials("u1", "o2")).rejects.toThrow(CredentialsNotFoundError);
    await expect(service.consumeCredentials("u2", "o1")).rejects.toThrow(CredentialsNotFoundError);
    await expect(service.consumeCredentials("u1", "o1")).resolves.toBeDefined();
  });

  it("forgets credentials nobody picked up within the ttl", async () => {
    vi.useFakeTimers();
    const { service } = setup();
    await service.exchange("abc", { userId: "u1", orgId: "o1" });

    vi.advanceTimersByTime(600_001);

    await expect(service.consumeCredentials("u1", "o1")).rejects.toThrow(CredentialsNotFoundError);
  });

  it("discards unreadable cached credentials", async () => {
    const { service, cache } = setup();
    await cache.put("credentials:o1:u1", "not json", 600);

    await expect(service.consumeCredentials("u1", "o1")).rejects.toThrow(CredentialsNotFoundError);
    expect(await cache.get("credentials:o1:u1")).toBeUndefined();
  });
});
