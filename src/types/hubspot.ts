import { z } from "zod";

export const credentialBlobSchema = z
  .object({
    access_token: z.string().optional(),
    token_type: z.string().optional(),
    refresh_token: z.string().optional(),
    expires_in: z.union([z.number(), z.string()]).optional()
  })
  .passthrough();

/** Raw token response from the token endpoint. Unknown fields are kept. */
export type CredentialBlob = z.infer<typeof credentialBlobSchema>;

export const hubspotObjectSchema = z
  .object({
    id: z.union([z.string().min(1), z.number()]).transform(String),
    properties: z.record(z.unknown()).nullish()
  })
  .passthrough();

export type HubspotObject = z.infer<typeof hubspotObjectSchema>;

export const hubspotListResponseSchema = z
  .object({
    results: z.array(z.unknown()).default([])
  })
  .passthrough();

export type HubspotObjectType = "contacts" | "companies";
