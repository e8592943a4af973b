/**
 * @cardflow/store: State hashing and decoding.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import {
  isBankColor,
  isCard,
  isCardGroup,
  isClient,
  isOperator,
  isTransaction,
  isWithdrawal,
} from "@cardflow/types";
import type { IdCounters, StoreState } from "./types.js";
import { StoreError } from "./types.js";

export function emptyState(): StoreState {
  return {
    version: 1,
    nextIds: { card: 1, client: 1, group: 1, transaction: 1, withdrawal: 1, operator: 1 },
    cards: [],
    clients: [],
    groups: [],
    bankColors: [],
    transactions: [],
    withdrawals: [],
    operators: [],
  };
}

/**
 * SHA-256 of the canonical JSON form of a state.
 * Key order and whitespace do not affect the result.
 */
export function computeStateHash(state: StoreState): string {
  return createHash("sha256").update(canonicalize(state)).digest("hex");
}

/** SHA-256 hex of an API key. Only this form is ever stored. */
export function hashApiKey(key: string): string {
  return createHash("sha256").update(key).digest("hex");
}

// ─── Decoding ────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function decodeList<T>(
  source: Record<string, unknown>,
  key: string,
  guard: (value: unknown) => value is T,
): T[] {
  const list = source[key];
  if (!Array.isArray(list)) {
    throw new StoreError("CORRUPT_STATE", `State field "${key}" is not a list`);
  }
  const out: T[] = [];
  list.forEach((item: unknown, index) => {
    if (!guard(item)) {
      throw new StoreError("CORRUPT_STATE", `Invalid record at ${key}[${String(index)}]`);
    }
    out.push(item);
  });
  return out;
}

function decodeCounter(source: Record<string, unknown>, key: keyof IdCounters): number {
  const value = source[key];
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
    throw new StoreError("CORRUPT_STATE", `Invalid id counter "${key}"`);
  }
  return value;
}

/**
 * Decode untrusted JSON into a StoreState.
 *
 * Every record passes its runtime guard and every counter is ahead of
 * the ids already in use; otherwise CORRUPT_STATE.
 */
export function decodeState(value: unknown): StoreState {
  if (!isRecord(value) || value["version"] !== 1) {
    throw new StoreError("CORRUPT_STATE", "Unsupported state format");
  }
  const ids = value["nextIds"];
  if (!isRecord(ids)) {
    throw new StoreError("CORRUPT_STATE", "State field \"nextIds\" is missing");
  }

  const state: StoreState = {
    version: 1,
    nextIds: {
      card: decodeCounter(ids, "card"),
      client: decodeCounter(ids, "client"),
      group: decodeCounter(ids, "group"),
      transaction: decodeCounter(ids, "transaction"),
      withdrawal: decodeCounter(ids, "withdrawal"),
      operator: decodeCounter(ids, "operator"),
    },
    cards: decodeList(value, "cards", isCard),
    clients: decodeList(value, "clients", isClient),
    groups: decodeList(value, "groups", isCardGroup),
    bankColors: decodeList(value, "bankColors", isBankColor),
    transactions: decodeList(value, "transactions", isTransaction),
    withdrawals: decodeList(value, "withdrawals", isWithdrawal),
    operators: decodeList(value, "operators", isOperator),
  };

  const checks: [keyof IdCounters, readonly { readonly id: number }[]][] = [
    ["card", state.cards],
    ["client", state.clients],
    ["group", state.groups],
    ["transaction", state.transactions],
    ["withdrawal", state.withdrawals],
    ["operator", state.operators],
  ];
  for (const [kind, records] of checks) {
    for (const record of records) {
      if (record.id >= state.nextIds[kind]) {
        throw new StoreError("CORRUPT_STATE", `Id counter "${kind}" is behind record ${String(record.id)}`);
      }
    }
  }

  return state;
}
