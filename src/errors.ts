export type IntegrationErrorCode =
  | "PROVIDER_DENIED"
  | "MALFORMED_STATE"
  | "STATE_EXPIRED"
  | "STATE_MISMATCH"
  | "MISSING_AUTHORIZATION_CODE"
  | "TOKEN_EXCHANGE_FAILED"
  | "CREDENTIALS_NOT_FOUND"
  | "MISSING_ACCESS_TOKEN"
  | "INVALID_REQUEST";

/**
 * Failure of the connect flow that the caller can act on, usually by starting
 * the Connect flow again. Rendered as a 400-class response.
 */
export class IntegrationError extends Error {
  constructor(
    message: string,
    readonly code: IntegrationErrorCode,
    readonly statusCode = 400
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ProviderDeniedError extends IntegrationError {
  constructor(readonly providerError: string, description?: string) {
    super(description ?? providerError, "PROVIDER_DENIED");
  }
}

export class MalformedStateError extends IntegrationError {
  constructor(message = "State parameter is missing or malformed. Please retry Connect.") {
    super(message, "MALFORMED_STATE");
  }
}

export class StateExpiredError extends IntegrationError {
  constructor() {
    super("State not found (expired). Please retry Connect.", "STATE_EXPIRED");
  }
}

export class StateMismatchError extends IntegrationError {
  constructor() {
    super(
      "State mismatch. Please retry Connect and complete in the most recent popup.",
      "STATE_MISMATCH"
    );
  }
}

export class MissingAuthorizationCodeError extends IntegrationError {
  constructor() {
    super("Authorization code missing from callback. Please retry Connect.", "MISSING_AUTHORIZATION_CODE");
  }
}

export class TokenExchangeFailedError extends IntegrationError {
  constructor(
    readonly upstreamStatus: number,
    readonly upstreamBody: string
  ) {
    super(`HubSpot token exchange failed: ${upstreamBody}`, "TOKEN_EXCHANGE_FAILED");
  }
}

export class CredentialsNotFoundError extends IntegrationError {
  constructor() {
    super("No credentials found.", "CREDENTIALS_NOT_FOUND");
  }
}

export class MissingAccessTokenError extends IntegrationError {
  constructor() {
    super("Missing access token.", "MISSING_ACCESS_TOKEN");
  }
}

export class InvalidRequestError extends IntegrationError {
  constructor(message = "Invalid request payload") {
    super(message, "INVALID_REQUEST");
  }
}
