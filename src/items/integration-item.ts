import type { HubspotObject } from "../types/hubspot.js";
import { maybeString } from "../utils.js";

export type IntegrationItemType = "contact" | "company";

export interface IntegrationItem {
  id: string;
  type: IntegrationItemType;
  name: string;
  url?: string;
}

function readProperty(record: HubspotObject, name: string): string | undefined {
  return maybeString(record.properties?.[name]);
}

/** Name order: "first last", then email, then the HubSpot id. */
export function contactToItem(record: HubspotObject): IntegrationItem {
  const fullName = [readProperty(record, "firstname"), readProperty(record, "lastname")]
    .filter((part): part is string => part !== undefined)
    .join(" ");

  return {
    id: `${record.id}_contact`,
    type: "contact",
    name: maybeString(fullName) ?? readProperty(record, "email") ?? record.id
  };
}

/** Name order: company name, then domain, then the HubSpot id. */
export function companyToItem(record: HubspotObject): IntegrationItem {
  return {
    id: `${record.id}_company`,
    type: "company",
    name: readProperty(record, "name") ?? readProperty(record, "domain") ?? record.id
  };
}
