/**
 * @levyield/node — Entry point.
 *
 * Bootstraps the Hono app, loads config, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig, loadVaultConfig } from "./config.js";
import { createApp } from "./app.js";
import { logVaultEvent } from "./services/event-logger.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const vaults = loadVaultConfig(config.VAULT_CONFIG_PATH);

  const { app, devnet } = createApp({
    devnet: {
      owner: config.OWNER_ADDRESS,
      keeper: config.KEEPER_ADDRESS,
      treasury: config.TREASURY_ADDRESS,
      vaults,
    },
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
  });

  const subscription = devnet.subscribe((stored) => logVaultEvent(logger, stored));

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    {
      port: config.PORT,
      host: config.HOST,
      vaults: devnet.vaults().map((v) => v.id),
    },
    "Levyield devnet started",
  );

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    subscription.unsubscribe();
    devnet.stop();
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
