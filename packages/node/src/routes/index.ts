/**
 * Route barrel.
 */

export { createHealthRoutes } from "./health.js";
export { createPairRoutes } from "./pairs.js";
export { createAccountRoutes } from "./accounts.js";
export { createStablecoinRoutes } from "./stablecoin.js";
export { createAdminRoutes } from "./admin.js";
export { createEventRoutes } from "./events.js";
export { createInvariantRoutes } from "./invariants.js";
