/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createVaultRoutes } from "./vaults.js";
export { createVenueRoutes } from "./venue.js";
export { createMarketRoutes } from "./market.js";
export { createEventRoutes } from "./events.js";
export { createMetricsRoute, renderVaultMetrics } from "./metrics.js";
