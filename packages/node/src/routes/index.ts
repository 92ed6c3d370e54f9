/**
 * Route barrel.
 */

export { createHealthRoutes } from "./health.js";
export { createBankRoutes } from "./bank.js";
export { createDepositRoutes, createWithdrawalRoutes } from "./transfers.js";
export { createAccountRoutes } from "./accounts.js";
export { createPriceRoutes } from "./price.js";
export { createAdminRoutes } from "./admin.js";
export { createEventRoutes } from "./events.js";
