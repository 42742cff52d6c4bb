/**
 * Venue settlement routes (devnet).
 *
 * GET  /api/v1/venue/pool                  — Reserves and LP supply
 * GET  /api/v1/venue/requests              — Pending liquidity requests
 * POST /api/v1/venue/requests/:key/execute — Settle; fires the owner's execution callback
 * POST /api/v1/venue/requests/:key/cancel  — Refund; fires the owner's cancellation callback
 *
 * The response carries the callback outcome, so a rejected callback is
 * visible to the caller.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ExecuteRequestSchema } from "../types/dto.js";
import { parseBody } from "../middleware/validate.js";
import { toJson } from "../types/json.js";

export function createVenueRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/pool", async (c) => {
    const { venue } = c.get("devnet").market;
    return c.json({ data: toJson(await venue.poolState()) });
  });

  routes.get("/requests", (c) => {
    const { venue } = c.get("devnet").market;
    return c.json({ data: toJson(venue.pendingRequests()) });
  });

  routes.post("/requests/:key/execute", async (c) => {
    const { venue } = c.get("devnet").market;
    const body = await parseBody(c, ExecuteRequestSchema);
    const settlement = await venue.execute(c.req.param("key"), { haircutBps: body.haircutBps });
    return c.json({ data: toJson(settlement) });
  });

  routes.post("/requests/:key/cancel", async (c) => {
    const { venue } = c.get("devnet").market;
    return c.json({ data: toJson(await venue.cancel(c.req.param("key"))) });
  });

  return routes;
}
