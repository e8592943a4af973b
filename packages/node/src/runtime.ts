/**
 * @cardflow/node: Runtime wiring shared by the server and the CLI.
 *
 * Turns a validated AppConfig into a store, a service and an auth config.
 */

import type { Logger } from "pino";
import { parseUtcOffset } from "@cardflow/ledger";
import type { LedgerStore } from "@cardflow/store";
import { FileLedgerStore, InMemoryLedgerStore } from "@cardflow/store";
import type { AppConfig } from "./config.js";
import { parseApiKeys } from "./config.js";
import { CashflowService } from "./services/cashflow-service.js";
import type { AuthConfig } from "./middleware/auth.js";
import type { ApiKeyRecord } from "./types/auth.js";

/**
 * File store when DATA_FILE is set, otherwise an in-memory store that
 * forgets everything on exit.
 */
export function openStore(config: AppConfig): LedgerStore {
  if (config.DATA_FILE !== undefined) {
    return new FileLedgerStore({ path: config.DATA_FILE });
  }
  return new InMemoryLedgerStore();
}

export function createService(
  config: AppConfig,
  store: LedgerStore,
  logger?: Logger,
): CashflowService {
  return new CashflowService({
    store,
    zone: parseUtcOffset(config.REFERENCE_UTC_OFFSET),
    pageSize: config.PAGE_SIZE,
    primaryCurrency: config.PRIMARY_CURRENCY,
    secondaryCurrency: config.SECONDARY_CURRENCY,
    logger,
  });
}

/**
 * Auth is on when API_KEYS names any key or an operator has been
 * provisioned. Returns undefined for unsecured mode.
 */
export function buildAuthConfig(
  config: AppConfig,
  service: CashflowService,
): AuthConfig | undefined {
  const parsedKeys = parseApiKeys(config.API_KEYS);
  if (parsedKeys.length === 0 && !service.hasOperators()) {
    return undefined;
  }

  const apiKeys = new Map<string, ApiKeyRecord>();
  for (const k of parsedKeys) {
    apiKeys.set(k.key, k);
  }
  return {
    apiKeys,
    findOperator: (keyHash) => service.store.findOperatorByKeyHash(keyHash),
  };
}
