/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createTokenRoutes } from "./token.js";
export { createVaultRoutes } from "./vault.js";
export { createTransferRoutes } from "./transfers.js";
export { createPermitRoutes } from "./permit.js";
export { createAdminRoutes } from "./admin.js";
export { createAssetRoutes } from "./asset.js";
export { createEventRoutes } from "./events.js";
