import "dotenv/config";

import { createServer } from "node:http";

import { createApp } from "./app.js";
import { createCache } from "./cache/index.js";
import { loadConfig } from "./config.js";
import { buildLogger } from "./logger.js";
import { HttpHubspotClient } from "./provider/hubspot-client.js";

const config = loadConfig();
const logger = buildLogger(config);
const cache = createCache(config, logger);
const hubspot = new HttpHubspotClient(config.hubspot, logger);
const app = createApp({
  config,
  logger,
  cache,
  hubspot
});

const server = createServer(app);

server.listen(config.port, () => {
  logger.info({ port: config.port, cacheDriver: config.cache.driver }, "HubSpot connector listening");
});

async function shutdown(signal: string): Promise<void> {
  logger.info({ signal }, "Shutting down");

  await new Promise<void>((resolve, reject) => {
    server.close((error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });

  await cache.close();
  logger.info("Shutdown complete");
  process.exit(0);
}

for (const signal of ["SIGTERM", "SIGINT"] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      logger.error({ err: error }, "Shutdown failed");
      process.exit(1);
    });
  });
}
