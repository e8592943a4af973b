/**
 * @cardflow/node: HTTP service for the card cash-flow ledger.
 *
 * Package public API. The server entry point is main.ts.
 */

export { CashflowService } from "./services/cashflow-service.js";
export type {
  CashflowServiceConfig,
  RangeQuery,
  CardListQuery,
  TimelineQuery,
  SheetQuery,
  TransactionListQuery,
  CardView,
  TransactionView,
  BankView,
  ReadinessReport,
} from "./services/cashflow-service.js";
export { loadConfig, parseApiKeys, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedApiKey } from "./config.js";
export { openStore, createService, buildAuthConfig } from "./runtime.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./types/index.js";
