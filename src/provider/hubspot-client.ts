import type { Logger } from "pino";

import type { AppConfig } from "../config.js";
import { TokenExchangeFailedError } from "../errors.js";
import {
  credentialBlobSchema,
  hubspotListResponseSchema,
  type CredentialBlob,
  type HubspotObjectType
} from "../types/hubspot.js";

interface ListObjectsOptions {
  limit: number;
  properties: readonly string[];
}

export interface HubspotClient {
  exchangeCode(code: string): Promise<CredentialBlob>;
  listObjects(accessToken: string, objectType: HubspotObjectType, options: ListObjectsOptions): Promise<unknown[]>;
}

interface RawResponse {
  status: number;
  ok: boolean;
  text: string;
}

function parseJson(text: string): unknown {
  try {
    return text ? (JSON.parse(text) as unknown) : undefined;
  } catch {
    return undefined;
  }
}

export class HttpHubspotClient implements HubspotClient {
  private readonly basicAuthorizationHeader: string;

  constructor(
    private readonly options: AppConfig["hubspot"],
    private readonly logger: Logger
  ) {
    const encoded = Buffer.from(`${options.clientId}:${options.clientSecret}`, "utf-8").toString("base64");
    this.basicAuthorizationHeader = `Basic ${encoded}`;
  }

  /**
   * Swaps an authorization code for tokens. Never retried: codes are single
   * use, so a second attempt would fail the same way.
   */
  async exchangeCode(code: string): Promise<CredentialBlob> {
    const body = new URLSearchParams({
      grant_type: "authorization_code",
      code,
      redirect_uri: this.options.redirectUri,
      client_id: this.options.clientId,
      client_secret: this.options.clientSecret
    });

    let response: RawResponse;
    try {
      response = await this.request(this.options.tokenUrl, {
        method: "POST",
        headers: {
          "content-type": "application/x-www-form-urlencoded",
          authorization: this.basicAuthorizationHeader
        },
        body: body.toString()
      });
    } catch (error) {
      this.logger.warn({ err: error }, "HubSpot token request did not complete");
      throw new TokenExchangeFailedError(0, error instanceof Error ? error.message : String(error));
    }

    if (!response.ok) {
      throw new TokenExchangeFailedError(response.status, response.text);
    }

    const parsed = credentialBlobSchema.safeParse(parseJson(response.text));
    if (!parsed.success) {
      throw new TokenExchangeFailedError(response.status, response.text);
    }
    return parsed.data;
  }

  async listObjects(
    accessToken: string,
    objectType: HubspotObjectType,
    { limit, properties }: ListObjectsOptions
  ): Promise<unknown[]> {
    const url = new URL(`${this.options.apiBaseUrl}/crm/v3/objects/${objectType}`);
    url.searchParams.set("limit", String(limit));
    url.searchParams.set("properties", properties.join(","));

    const response = await this.request(url.toString(), {
      method: "GET",
      headers: { authorization: `Bearer ${accessToken}` }
    });

    if (response.status !== 200) {
      throw new Error(`HubSpot ${objectType} request failed with status ${response.status}`);
    }

    const parsed = hubspotListResponseSchema.safeParse(parseJson(response.text));
    if (!parsed.success) {
      throw new Error(`HubSpot ${objectType} response was not a list`);
    }
    return parsed.data.results;
  }

  private async request(
    url: string,
    init: { method: string; headers: Record<string, string>; body?: string }
  ): Promise<RawResponse> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      const response = await fetch(url, {
        method: init.method,
        headers: init.headers,
        ...(init.body != null ? { body: init.body } : {}),
        signal: controller.signal
      });
      return { status: response.status, ok: response.ok, text: await response.text() };
    } finally {
      clearTimeout(timeout);
    }
  }
}
