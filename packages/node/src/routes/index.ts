/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createVaultRoutes } from "./vaults.js";
export { createTransactionRoutes } from "./transactions.js";
export { toAmount, serializeVaultView } from "./serialize.js";
export type { CapabilityJson } from "./serialize.js";
