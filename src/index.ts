#!/usr/bin/env node
import "dotenv/config";
import type { Server } from "node:http";
import { GoogleOAuthProvider } from "./auth/google-provider.js";
import { type Config, loadConfig } from "./config.js";
import { createApp } from "./server.js";
import { RedisStore } from "./storage/redis-store.js";
import { createLogger } from "./utils/logger.js";

const logger = createLogger("main");

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

async function main() {
  let config: Config;
  try {
    config = loadConfig();
  } catch (error) {
    logger.error({ error }, "Failed to load config");
    process.exit(1);
  }

  // Shared storage for OAuth state, so several instances can serve the same users.
  const store = new RedisStore(config.redis);
  await store.connect();

  const provider = new GoogleOAuthProvider(config, store);
  const { app, closeSessions } = createApp({ config, provider });

  const { host, port } = config.server;
  logger.info(`Starting Google Calendar MCP Server on ${host}:${port}...`);
  const httpServer = app.listen(port, host, () => {
    logger.info({ url: config.server.url }, "Google Calendar MCP Server started");
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, "Shutting down");
    closeSessions()
      .then(() => closeServer(httpServer))
      .then(() => store.close())
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error({ error }, "Error during shutdown");
        process.exit(1);
      });
  };

  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((error) => {
  logger.error({ error }, "Fatal error starting server");
  process.exit(1);
});
