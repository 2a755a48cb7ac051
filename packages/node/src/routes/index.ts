/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createVaultRoutes } from "./vault.js";
export { createLendingRoutes } from "./lending.js";
export { createBalanceRoutes } from "./balances.js";
