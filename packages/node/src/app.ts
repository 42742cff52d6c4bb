/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts so tests can create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { Devnet } from "./services/devnet.js";
import type { DevnetConfig } from "./services/devnet.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { createHealthRoutes } from "./routes/health.js";
import { createVaultRoutes } from "./routes/vaults.js";
import { createVenueRoutes } from "./routes/venue.js";
import { createMarketRoutes } from "./routes/market.js";
import { createEventRoutes } from "./routes/events.js";
import { createMetricsRoute } from "./routes/metrics.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly devnet: DevnetConfig;
  readonly logFn?: (entry: RequestLogEntry) => void;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly devnet: Devnet;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const devnet = new Devnet(options.devnet);
  devnet.initialize();

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(handleError);

  // ─── Probes and scraping ────────────────────────────────────────
  app.route("/", createHealthRoutes(devnet));
  app.route("/", createMetricsRoute(devnet));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", async (c, next) => {
    c.set("devnet", devnet);
    await next();
  });

  app.route("/api/v1/vaults", createVaultRoutes());
  app.route("/api/v1/venue", createVenueRoutes());
  app.route("/api/v1/market", createMarketRoutes());
  app.route("/api/v1/events", createEventRoutes());

  return { app, devnet };
}
