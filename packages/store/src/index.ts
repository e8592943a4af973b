/**
 * @cardflow/store: Ledger store for cards, clients and cash movements.
 *
 * Two implementations of one synchronous LedgerStore contract:
 * - InMemoryLedgerStore for tests and ephemeral runs
 * - FileLedgerStore, a JSON state file with a SHA-256 integrity hash
 *
 * Every mutation is atomic; transaction() groups several into one unit.
 */

export { InMemoryLedgerStore } from "./in-memory-store.js";
export type { InMemoryLedgerStoreOptions } from "./in-memory-store.js";

export { FileLedgerStore, readStateFile } from "./file-store.js";
export type { FileLedgerStoreOptions } from "./file-store.js";

export { emptyState, computeStateHash, decodeState, hashApiKey } from "./state.js";

export type {
  CardInput,
  ClientInput,
  OperatorInput,
  Ensured,
  IdCounters,
  StoreState,
  LedgerStore,
  StoreErrorCode,
} from "./types.js";

export { StoreError, DEFAULT_BANK_COLOR } from "./types.js";
