import type { Logger } from "pino";

import type { KeyValueCache } from "../cache/index.js";
import type { AppConfig } from "../config.js";
import {
  InvalidRequestError,
  MissingAuthorizationCodeError,
  ProviderDeniedError,
  StateExpiredError,
  StateMismatchError
} from "../errors.js";
import { maybeString } from "../utils.js";
import { CacheKeys, ownerIdSchema } from "./cache-keys.js";
import type { CredentialExchangeService } from "./credential-exchange.js";
import {
  createStateToken,
  decodeState,
  encodeState,
  noncesMatch,
  parseStoredState,
  serializeStoredState
} from "./state-token.js";

export interface AuthorizationFlowOptions {
  hubspot: Pick<AppConfig["hubspot"], "authorizeUrl" | "clientId" | "redirectUri" | "scopes">;
  stateTtlSeconds: number;
}

export interface CallbackOutcome {
  status: "connected";
  userId: string;
  orgId: string;
}

/** Express hands over `req.query`, where a repeated parameter becomes an array. */
export type CallbackQuery = Record<string, unknown>;

function readParam(query: CallbackQuery, name: string): string | undefined {
  const value = query[name];
  if (Array.isArray(value)) {
    return maybeString(value[0]);
  }
  return maybeString(value);
}

function buildQueryString(params: Record<string, string>): string {
  return Object.entries(params)
    .map(([key, value]) => `${encodeURIComponent(key)}=${encodeURIComponent(value)}`)
    .join("&");
}

export class AuthorizationFlowController {
  constructor(
    private readonly options: AuthorizationFlowOptions,
    private readonly cache: KeyValueCache,
    private readonly credentials: CredentialExchangeService,
    private readonly logger: Logger
  ) {}

  async beginAuthorization(userId: string, orgId: string): Promise<string> {
    const user = ownerIdSchema.safeParse(userId);
    const org = ownerIdSchema.safeParse(orgId);
    if (!user.success || !org.success) {
      throw new InvalidRequestError("user_id and org_id are required and may not contain ':'");
    }

    const token = createStateToken(user.data, org.data);
    await this.cache.put(CacheKeys.state(org.data, user.data), serializeStoredState(token), this.options.stateTtlSeconds);

    const { authorizeUrl, clientId, redirectUri, scopes } = this.options.hubspot;
    const query = buildQueryString({
      client_id: clientId,
      redirect_uri: redirectUri,
      response_type: "code",
      scope: scopes.join(" "),
      state: encodeState(token)
    });

    this.logger.debug({ orgId: org.data, userId: user.data }, "Issued HubSpot authorization state");
    return `${authorizeUrl}${authorizeUrl.includes("?") ? "&" : "?"}${query}`;
  }

  async handleCallback(query: CallbackQuery): Promise<CallbackOutcome> {
    const providerError = readParam(query, "error");
    if (providerError) {
      this.logger.info({ providerError }, "HubSpot reported an authorization error");
      throw new ProviderDeniedError(providerError, readParam(query, "error_description"));
    }

    const received = decodeState(readParam(query, "state"));
    const key = CacheKeys.state(received.org_id, received.user_id);

    const raw = await this.cache.get(key);
    if (!raw) {
      throw new StateExpiredError();
    }

    // Single use: the saved state goes away whether or not it matches.
    await this.cache.delete(key);

    const saved = parseStoredState(raw);
    if (!saved) {
      throw new StateExpiredError();
    }
    if (!noncesMatch(received, saved)) {
      this.logger.warn({ orgId: received.org_id, userId: received.user_id }, "OAuth state nonce mismatch");
      throw new StateMismatchError();
    }

    const code = readParam(query, "code");
    if (!code) {
      throw new MissingAuthorizationCodeError();
    }

    await this.credentials.exchange(code, { userId: received.user_id, orgId: received.org_id });
    return { status: "connected", userId: received.user_id, orgId: received.org_id };
  }
}
