import express, { type ErrorRequestHandler, type RequestHandler } from "express";
import helmet from "helmet";
import type { Logger } from "pino";
import { z } from "zod";

import type { KeyValueCache } from "./cache/index.js";
import type { AppConfig } from "./config.js";
import { IntegrationError, InvalidRequestError } from "./errors.js";
import { ItemFetcher } from "./items/item-fetcher.js";
import { AuthorizationFlowController } from "./oauth/authorization-flow.js";
import { ownerIdSchema } from "./oauth/cache-keys.js";
import { CredentialExchangeService } from "./oauth/credential-exchange.js";
import type { HubspotClient } from "./provider/hubspot-client.js";
import { getClientIp, renderCloseWindowPage } from "./utils.js";

const CLOSE_WINDOW_CSP = "default-src 'none'; script-src 'unsafe-inline'";

const ownerSchema = z.object({
  user_id: ownerIdSchema,
  org_id: ownerIdSchema
});

const loadItemsSchema = z.object({
  credentials: z.union([z.string().min(1), z.record(z.unknown())])
});

interface AppDependencies {
  config: AppConfig;
  logger: Logger;
  cache: KeyValueCache;
  hubspot: HubspotClient;
}

type AsyncHandler = (...args: Parameters<RequestHandler>) => Promise<void>;

function asyncRoute(handler: AsyncHandler): RequestHandler {
  return (request, response, next) => {
    handler(request, response, next).catch(next);
  };
}

function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.infer<S> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new InvalidRequestError();
  }
  return parsed.data;
}

export function createApp({ config, logger, cache, hubspot }: AppDependencies): express.Express {
  const app = express();
  const credentials = new CredentialExchangeService(hubspot, cache, config.ttl.credentialsSeconds, logger);
  const authorization = new AuthorizationFlowController(
    { hubspot: config.hubspot, stateTtlSeconds: config.ttl.stateSeconds },
    cache,
    credentials,
    logger
  );
  const items = new ItemFetcher(hubspot, logger);

  app.disable("x-powered-by");
  if (config.trustProxy) {
    app.set("trust proxy", true);
  }

  app.use((request, response, next) => {
    const startedAt = Date.now();
    response.on("finish", () => {
      const durationMs = Date.now() - startedAt;
      const statusCode = response.statusCode;
      const level = statusCode >= 500 ? "error" : statusCode >= 400 ? "warn" : "info";
      logger[level](
        {
          method: request.method,
          path: request.path,
          ip: getClientIp(request),
          statusCode,
          durationMs
        },
        "HTTP request"
      );
    });
    next();
  });
  app.use(helmet());
  app.use(express.json({ limit: "100kb" }));
  app.use(express.urlencoded({ extended: false, limit: "100kb" }));

  app.get("/healthz", (_request, response) => {
    response.status(200).json({ status: "ok" });
  });

  app.get("/readyz", asyncRoute(async (_request, response) => {
    const backend = await cache.healthcheck();
    response.status(200).json({ status: "ok", cache: backend });
  }));

  app.post("/integrations/hubspot/authorize", asyncRoute(async (request, response) => {
    const owner = parseBody(ownerSchema, request.body);
    const authorizationUrl = await authorization.beginAuthorization(owner.user_id, owner.org_id);
    response.status(200).json({ authorization_url: authorizationUrl });
  }));

  app.get("/integrations/hubspot/oauth2callback", asyncRoute(async (request, response) => {
    await authorization.handleCallback(request.query);
    response
      .status(200)
      .set("content-security-policy", CLOSE_WINDOW_CSP)
      .type("html")
      .send(renderCloseWindowPage("HubSpot connected", "You can close this window."));
  }));

  app.post("/integrations/hubspot/credentials", asyncRoute(async (request, response) => {
    const owner = parseBody(ownerSchema, request.body);
    response.status(200).json(await credentials.consumeCredentials(owner.user_id, owner.org_id));
  }));

  app.post("/integrations/hubspot/load", asyncRoute(async (request, response) => {
    const body = parseBody(loadItemsSchema, request.body);
    response.status(200).json(await items.fetchItems(body.credentials));
  }));

  app.use((_request, response) => {
    response.status(404).json({ error: "not_found" });
  });

  const handleError: ErrorRequestHandler = (error: unknown, request, response, _next) => {
    if (error instanceof IntegrationError) {
      logger.warn({ code: error.code, path: request.path, reason: error.message }, "Integration request rejected");
      response.status(error.statusCode).json({ error: { code: error.code, message: error.message } });
      return;
    }
    if (error instanceof SyntaxError) {
      response.status(400).json({ error: { code: "INVALID_REQUEST", message: "Invalid request payload" } });
      return;
    }

    logger.error({ err: error, path: request.path }, "Failed to process request");
    response.status(500).json({ error: { code: "INTERNAL_ERROR", message: "An unexpected error occurred" } });
  };
  app.use(handleError);

  return app;
}
