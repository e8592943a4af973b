/**
 * @cardflow/node: Entry point.
 *
 * Bootstraps the Hono app, loads config, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig, parseApiKeys } from "./config.js";
import { createApp } from "./app.js";
import { buildAuthConfig, createService, openStore } from "./runtime.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const store = openStore(config);
  const service = createService(config, store, logger.child({ component: "service" }));
  logger.info(
    { dataFile: config.DATA_FILE ?? null, zone: service.zone.label, stateHash: store.stateHash() },
    "Ledger store opened",
  );
  if (config.DATA_FILE === undefined) {
    logger.warn("DATA_FILE not set; state is kept in memory only");
  }

  const auth = buildAuthConfig(config, service);
  if (auth !== undefined) {
    logger.info(
      { apiKeyCount: parseApiKeys(config.API_KEYS).length, operators: store.listOperators().length },
      "Auth configured",
    );
  } else {
    logger.warn("No API keys or operators configured; running in unsecured mode");
  }

  const { app } = createApp({
    service,
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
    onUnexpectedError: (err, c) => {
      logger.error({ err, requestId: c.get("requestId") }, "Unhandled error");
    },
    auth,
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info({ port: config.PORT, host: config.HOST }, "Cardflow node started");

  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close(() => {
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
