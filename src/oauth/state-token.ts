import { randomBytes } from "node:crypto";

import { z } from "zod";

import { MalformedStateError } from "../errors.js";
import { safeStringEquals } from "../utils.js";
import { ownerIdSchema } from "./cache-keys.js";

const NONCE_BYTES = 32;

export const stateTokenSchema = z.object({
  nonce: z.string().min(1),
  user_id: ownerIdSchema,
  org_id: ownerIdSchema
});

export type StateToken = z.infer<typeof stateTokenSchema>;

export function createStateToken(userId: string, orgId: string): StateToken {
  return {
    nonce: randomBytes(NONCE_BYTES).toString("base64url"),
    user_id: userId,
    org_id: orgId
  };
}

export function encodeState(token: StateToken): string {
  return Buffer.from(JSON.stringify(token), "utf-8").toString("base64url");
}

function parseStateJson(json: string): StateToken | undefined {
  let payload: unknown;
  try {
    payload = JSON.parse(json);
  } catch {
    return undefined;
  }

  const parsed = stateTokenSchema.safeParse(payload);
  return parsed.success ? parsed.data : undefined;
}

/**
 * Decodes the `state` query parameter sent back by the provider.
 * Throws {@link MalformedStateError} when it is absent or not a state token.
 */
export function decodeState(encoded: string | undefined): StateToken {
  if (!encoded) {
    throw new MalformedStateError();
  }

  const token = parseStateJson(Buffer.from(encoded, "base64url").toString("utf-8"));
  if (!token) {
    throw new MalformedStateError();
  }
  return token;
}

export function serializeStoredState(token: StateToken): string {
  return JSON.stringify(token);
}

export function parseStoredState(raw: string): StateToken | undefined {
  return parseStateJson(raw);
}

export function noncesMatch(received: StateToken, saved: StateToken): boolean {
  return safeStringEquals(received.nonce, saved.nonce);
}
