/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createNetworkRoutes } from "./network.js";
export type { NetworkRouteOptions } from "./network.js";
export { createWalletRoutes } from "./wallets.js";
