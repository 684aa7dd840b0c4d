/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createClaimRoutes } from "./claims.js";
export { createRebateRoutes } from "./rebates.js";
export { createGroupRoutes, receiptToWire } from "./groups.js";
export { createEscrowRoutes } from "./escrow.js";
export { createAccountRoutes } from "./accounts.js";
export type { AccountRouteOptions } from "./accounts.js";
export { createAuditRoutes } from "./audit.js";
