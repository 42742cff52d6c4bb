/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (event hash chain verifies)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { Devnet } from "../services/devnet.js";

export function createHealthRoutes(devnet: Devnet): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const integrity = devnet.checkEventStore();
    const ready = devnet.isReady() && integrity.valid;

    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        eventStore: {
          status: integrity.valid ? "ok" : "down",
          lastVerifiedPosition: integrity.lastVerifiedPosition,
          errors: integrity.errors.length,
        },
        vaults: devnet.vaults().map((v) => ({ id: v.id, status: v.status })),
        timestamp: new Date().toISOString(),
      },
      ready ? 200 : 503,
    );
  });

  return routes;
}
