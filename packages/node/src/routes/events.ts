/**
 * Event query routes.
 *
 * GET /api/v1/events            — All vault events in global order
 * GET /api/v1/events/:streamId  — Events of one vault (streamId = vault id)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ListEventsQuerySchema } from "../types/dto.js";
import { parseQuery } from "../middleware/validate.js";
import { toJson } from "../types/json.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // GET /api/v1/events — All events
  routes.get("/", (c) => {
    const { eventStore } = c.get("devnet");
    const query = parseQuery(c, ListEventsQuerySchema);

    const events = eventStore.readAll({
      fromPosition: (query.after ?? 0) + 1,
      maxCount: query.limit,
    });

    return c.json({ data: toJson(events), position: eventStore.globalPosition() });
  });

  // GET /api/v1/events/:streamId
  routes.get("/:streamId", (c) => {
    const { eventStore } = c.get("devnet");
    const streamId = c.req.param("streamId");
    const query = parseQuery(c, ListEventsQuerySchema);

    const events = eventStore.read(streamId, {
      fromVersion: (query.after ?? 0) + 1,
      maxCount: query.limit,
    });

    return c.json({ data: toJson(events), version: eventStore.streamVersion(streamId) });
  });

  return routes;
}
