import type { Logger } from "pino";

import type { KeyValueCache } from "../cache/index.js";
import { CredentialsNotFoundError } from "../errors.js";
import type { HubspotClient } from "../provider/hubspot-client.js";
import { credentialBlobSchema, type CredentialBlob } from "../types/hubspot.js";
import { CacheKeys } from "./cache-keys.js";

export interface CredentialOwner {
  userId: string;
  orgId: string;
}

function parseStoredCredentials(raw: string): CredentialBlob | undefined {
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch {
    return undefined;
  }
  const parsed = credentialBlobSchema.safeParse(payload);
  return parsed.success ? parsed.data : undefined;
}

/**
 * Exchanges authorization codes and hands the resulting token response to
 * whoever asks for it next, exactly once per completed flow.
 */
export class CredentialExchangeService {
  constructor(
    private readonly hubspot: HubspotClient,
    private readonly cache: KeyValueCache,
    private readonly ttlSeconds: number,
    private readonly logger: Logger
  ) {}

  async exchange(code: string, owner: CredentialOwner): Promise<CredentialBlob> {
    const credentials = await this.hubspot.exchangeCode(code);

    // A second completion before pickup replaces the first.
    await this.cache.put(
      CacheKeys.credentials(owner.orgId, owner.userId),
      JSON.stringify(credentials),
      this.ttlSeconds
    );
    this.logger.info({ orgId: owner.orgId, userId: owner.userId }, "Stored HubSpot credentials");
    return credentials;
  }

  async consumeCredentials(userId: string, orgId: string): Promise<CredentialBlob> {
    const key = CacheKeys.credentials(orgId, userId);
    const raw = await this.cache.get(key);
    if (!raw) {
      throw new CredentialsNotFoundError();
    }

    await this.cache.delete(key);

    const credentials = parseStoredCredentials(raw);
    if (!credentials) {
      this.logger.warn({ orgId, userId }, "Discarded unreadable cached credentials");
      throw new CredentialsNotFoundError();
    }
    return credentials;
  }
}
