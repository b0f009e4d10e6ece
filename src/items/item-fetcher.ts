import type { Logger } from "pino";

import { MissingAccessTokenError } from "../errors.js";
import type { HubspotClient } from "../provider/hubspot-client.js";
import { credentialBlobSchema, hubspotObjectSchema, type HubspotObject, type HubspotObjectType } from "../types/hubspot.js";
import { maybeString } from "../utils.js";
import { companyToItem, contactToItem, type IntegrationItem } from "./integration-item.js";

const PAGE_SIZE = 20;

interface ObjectSource {
  objectType: HubspotObjectType;
  properties: readonly string[];
  toItem(record: HubspotObject): IntegrationItem;
}

const OBJECT_SOURCES: readonly ObjectSource[] = [
  { objectType: "contacts", properties: ["firstname", "lastname", "email"], toItem: contactToItem },
  { objectType: "companies", properties: ["name", "domain"], toItem: companyToItem }
];

function readAccessToken(credentials: unknown): string {
  let payload = credentials;
  if (typeof credentials === "string") {
    try {
      payload = JSON.parse(credentials) as unknown;
    } catch {
      throw new MissingAccessTokenError();
    }
  }

  const parsed = credentialBlobSchema.safeParse(payload);
  const accessToken = parsed.success ? maybeString(parsed.data.access_token) : undefined;
  if (!accessToken) {
    throw new MissingAccessTokenError();
  }
  return accessToken;
}

export class ItemFetcher {
  constructor(
    private readonly hubspot: HubspotClient,
    private readonly logger: Logger
  ) {}

  /**
   * Lists a first page of each supported object type. A page that fails is
   * logged and left out of the result rather than failing the whole call.
   */
  async fetchItems(credentials: unknown): Promise<IntegrationItem[]> {
    const accessToken = readAccessToken(credentials);
    const pages = await Promise.all(OBJECT_SOURCES.map((source) => this.fetchSource(accessToken, source)));
    const items = pages.flat();
    this.logger.info({ count: items.length }, "Loaded HubSpot integration items");
    return items;
  }

  private async fetchSource(accessToken: string, source: ObjectSource): Promise<IntegrationItem[]> {
    let records: unknown[];
    try {
      records = await this.hubspot.listObjects(accessToken, source.objectType, {
        limit: PAGE_SIZE,
        properties: source.properties
      });
    } catch (error) {
      // TODO: surface skipped pages to the caller once consumers can render partial results.
      this.logger.warn({ err: error, objectType: source.objectType }, "Skipping HubSpot object page");
      return [];
    }

    const items: IntegrationItem[] = [];
    for (const record of records) {
      const parsed = hubspotObjectSchema.safeParse(record);
      if (!parsed.success) {
        this.logger.debug({ objectType: source.objectType }, "Skipping unreadable HubSpot record");
        continue;
      }
      items.push(source.toItem(parsed.data));
    }
    return items;
  }
}
