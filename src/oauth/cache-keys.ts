import { z } from "zod";

const KEY_SEPARATOR = ":";

/** User and org ids are joined with ':' into cache keys, so they may not contain it. */
export const ownerIdSchema = z
  .string()
  .trim()
  .min(1)
  .refine((value) => !value.includes(KEY_SEPARATOR), "ids may not contain ':'");

export const CacheKeys = {
  state: (orgId: string, userId: string) => ["state", orgId, userId].join(KEY_SEPARATOR),
  credentials: (orgId: string, userId: string) => ["credentials", orgId, userId].join(KEY_SEPARATOR)
} as const;
