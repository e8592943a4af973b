/**
 * Route barrel: re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createCardRoutes } from "./cards.js";
export { createClientRoutes } from "./clients.js";
export { createGroupRoutes } from "./groups.js";
export { createBankRoutes } from "./banks.js";
export { createTransactionRoutes } from "./transactions.js";
export { createWithdrawalRoutes } from "./withdrawals.js";
export { createReportRoutes } from "./reports.js";
