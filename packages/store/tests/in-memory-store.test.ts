/**
 * Tests for InMemoryLedgerStore.
 *
 * Verifies:
 * - Card, client and group rules (identity, get-or-create, referential deletes)
 * - Bank names and colors
 * - Transaction rate derivation
 * - Withdrawal upsert keyed on (card, date)
 * - Operators
 * - Atomic mutations and state hashing
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { WithdrawalUpsert } from "@cardflow/ledger";
import { InMemoryLedgerStore } from "../src/in-memory-store.js";
import { emptyState, hashApiKey } from "../src/state.js";
import { StoreError } from "../src/types.js";
import type { StoreErrorCode } from "../src/types.js";

const NOW = new Date("2026-01-06T08:00:00.000Z");

function expectStoreError(fn: () => unknown, code: StoreErrorCode): void {
  let caught: unknown;
  try {
    fn();
  } catch (err) {
    caught = err;
  }
  expect(caught).toBeInstanceOf(StoreError);
  expect(caught instanceof StoreError ? caught.code : undefined).toBe(code);
}

function upsert(fields: Partial<WithdrawalUpsert> = {}): WithdrawalUpsert {
  return {
    cardId: 1,
    date: "2026-01-06",
    fullyWithdrawn: false,
    withdrawnAmount: null,
    commission: "0.00",
    timestamp: undefined,
    note: undefined,
    ...fields,
  };
}

let store: InMemoryLedgerStore;

beforeEach(() => {
  store = new InMemoryLedgerStore({ now: () => NOW });
});

// =============================================================================
// Cards
// =============================================================================

describe("cards", () => {
  it("creates a card with trimmed fields and a new group", () => {
    const card = store.createCard({
      name: " Card A ",
      bank: " Alfa ",
      cardNumber: "4276 1234",
      groupName: "Office",
    });

    expect(card).toEqual({
      id: 1,
      name: "Card A",
      bank: "Alfa",
      cardNumber: "4276 1234",
      pin: "",
      status: "active",
      groupId: 1,
      notes: "",
    });
    expect(store.listGroups()).toEqual([{ id: 1, name: "Office" }]);
  });

  it("reuses a group regardless of case", () => {
    store.createCard({ name: "Card A", groupName: "Office" });
    const second = store.createCard({ name: "Card B", groupName: "office" });
    expect(second.groupId).toBe(1);
    expect(store.listGroups()).toHaveLength(1);
  });

  it("rejects a duplicate identity triple and keeps ids dense", () => {
    store.createCard({ name: "Card A", bank: "Alfa", cardNumber: "1234" });
    expectStoreError(
      () => store.createCard({ name: "Card A", bank: " Alfa", cardNumber: "1234 " }),
      "DUPLICATE_CARD",
    );
    expect(store.createCard({ name: "Card B" }).id).toBe(2);
  });

  it("allows the same name at another bank", () => {
    store.createCard({ name: "Card A", bank: "Alfa" });
    expect(store.createCard({ name: "Card A", bank: "Tinkoff" }).id).toBe(2);
  });

  it("returns an existing card from getOrCreateCard", () => {
    const card = store.createCard({ name: "Card A", bank: "Alfa" });
    expect(store.getOrCreateCard({ name: "Card A", bank: "Alfa" })).toEqual({
      record: card,
      created: false,
    });
    expect(store.getOrCreateCard({ name: "Card B" }).created).toBe(true);
  });

  it("updates only the given fields and clears the group on a blank name", () => {
    store.createCard({ name: "Card A", pin: "1111", groupName: "Office" });
    const updated = store.updateCard(1, { status: "hold", groupName: "  " });
    expect(updated).toMatchObject({ name: "Card A", pin: "1111", status: "hold", groupId: null });
  });

  it("rejects an update that collides with another card", () => {
    store.createCard({ name: "Card A" });
    store.createCard({ name: "Card B" });
    expectStoreError(() => store.updateCard(2, { name: "Card A" }), "DUPLICATE_CARD");
    expect(store.requireCard(2).name).toBe("Card B");
  });

  it("lists cards by name", () => {
    store.createCard({ name: "Zeta" });
    store.createCard({ name: "Alpha" });
    expect(store.listCards().map((c) => c.name)).toEqual(["Alpha", "Zeta"]);
  });

  it("requires a name", () => {
    expectStoreError(() => store.createCard({ name: "  " }), "INVALID_RECORD");
  });

  it("throws CARD_NOT_FOUND for unknown ids", () => {
    expectStoreError(() => store.requireCard(99), "CARD_NOT_FOUND");
    expect(store.getCard(99)).toBeUndefined();
  });
});

describe("deleteCard", () => {
  beforeEach(() => {
    store.createCard({ name: "Card A" });
    store.createClient({ name: "Client A" });
  });

  it("refuses while transactions reference the card", () => {
    store.createTransaction({
      cardId: 1,
      clientId: 1,
      amount: "10.00",
      secondaryAmount: "0.00",
      timestamp: "2026-01-06T07:00:00.000Z",
      notes: "",
    });
    expectStoreError(() => store.deleteCard(1), "CARD_HAS_TRANSACTIONS");
    expect(store.getCard(1)).toBeDefined();
  });

  it("removes the card's withdrawals with it", () => {
    store.upsertWithdrawal(upsert({ date: "2026-01-06" }));
    store.upsertWithdrawal(upsert({ date: "2026-01-07" }));
    expect(store.deleteCard(1)).toBe(2);
    expect(store.getCard(1)).toBeUndefined();
    expect(store.listWithdrawals({})).toEqual([]);
  });
});

// =============================================================================
// Clients
// =============================================================================

describe("clients", () => {
  it("creates with defaults", () => {
    expect(store.createClient({ name: " Anna " })).toEqual({
      id: 1,
      name: "Anna",
      status: "active",
      notes: "",
    });
  });

  it("rejects duplicate names", () => {
    store.createClient({ name: "Anna" });
    expectStoreError(() => store.createClient({ name: "Anna" }), "DUPLICATE_CLIENT");
  });

  it("searches case-insensitively by substring", () => {
    store.createClient({ name: "Diana" });
    store.createClient({ name: "Bob" });
    store.createClient({ name: "Anna" });
    expect(store.searchClients("AN").map((c) => c.name)).toEqual(["Anna", "Diana"]);
    expect(store.searchClients("")).toHaveLength(3);
  });

  it("gets or creates by exact name", () => {
    const anna = store.createClient({ name: "Anna" });
    expect(store.getOrCreateClient(" Anna ")).toEqual({ record: anna, created: false });
    expect(store.getOrCreateClient("Bob").record.id).toBe(2);
  });

  it("refuses to delete a client with transactions", () => {
    store.createCard({ name: "Card A" });
    store.createClient({ name: "Anna" });
    store.createTransaction({
      cardId: 1,
      clientId: 1,
      amount: "10.00",
      secondaryAmount: "0.00",
      timestamp: "2026-01-06T07:00:00.000Z",
      notes: "",
    });
    expectStoreError(() => store.deleteClient(1), "CLIENT_HAS_TRANSACTIONS");
  });

  it("deletes an unreferenced client", () => {
    store.createClient({ name: "Anna" });
    store.deleteClient(1);
    expect(store.listClients()).toEqual([]);
  });
});

// =============================================================================
// Groups
// =============================================================================

describe("groups", () => {
  it("renames, allowing a change of case", () => {
    store.getOrCreateGroup("office");
    expect(store.renameGroup(1, "Office")).toEqual({ id: 1, name: "Office" });
  });

  it("refuses a rename onto another group's name", () => {
    store.getOrCreateGroup("Office");
    store.getOrCreateGroup("Home");
    expectStoreError(() => store.renameGroup(2, "office"), "DUPLICATE_GROUP");
  });

  it("unlinks member cards on delete", () => {
    store.createCard({ name: "Card A", groupName: "Office" });
    expect(store.deleteGroup(1)).toBe(1);
    expect(store.requireCard(1).groupId).toBeNull();
    expect(store.getGroup(1)).toBeUndefined();
  });

  it("throws GROUP_NOT_FOUND", () => {
    expectStoreError(() => store.deleteGroup(5), "GROUP_NOT_FOUND");
  });
});

// =============================================================================
// Banks
// =============================================================================

describe("banks", () => {
  it("lists distinct non-empty bank names", () => {
    store.createCard({ name: "A", bank: "Tinkoff" });
    store.createCard({ name: "B", bank: "Alfa" });
    store.createCard({ name: "C", bank: "Alfa" });
    store.createCard({ name: "D" });
    expect(store.listBankNames()).toEqual(["Alfa", "Tinkoff"]);
  });

  it("defaults to black and stores lowercase hex", () => {
    expect(store.bankColor("Alfa")).toBe("#000000");
    expect(store.setBankColor("Alfa", "#FF0000")).toEqual({ bank: "Alfa", color: "#ff0000" });
    expect(store.bankColor(" Alfa ")).toBe("#ff0000");
  });

  it("rejects malformed colors", () => {
    expectStoreError(() => store.setBankColor("Alfa", "red"), "INVALID_RECORD");
  });
});

// =============================================================================
// Transactions
// =============================================================================

describe("transactions", () => {
  beforeEach(() => {
    store.createCard({ name: "Card A" });
    store.createClient({ name: "Anna" });
  });

  it("derives the rate and stamps createdAt", () => {
    const tx = store.createTransaction({
      cardId: 1,
      clientId: 1,
      amount: "1000",
      secondaryAmount: "12.5",
      timestamp: "2026-01-06T07:00:00Z",
      notes: "",
    });
    expect(tx).toEqual({
      id: 1,
      createdAt: "2026-01-06T08:00:00.000Z",
      timestamp: "2026-01-06T07:00:00.000Z",
      cardId: 1,
      clientId: 1,
      amount: "1000.00",
      secondaryAmount: "12.50",
      rate: "80.000000",
      notes: "",
    });
  });

  it("leaves the rate null for a zero secondary amount", () => {
    const tx = store.createTransaction({
      cardId: 1,
      clientId: 1,
      amount: "1000.00",
      secondaryAmount: "0",
      timestamp: "2026-01-06T07:00:00.000Z",
      notes: "",
    });
    expect(tx.rate).toBeNull();
  });

  it("recomputes the rate on update and keeps createdAt", () => {
    store.createTransaction({
      cardId: 1,
      clientId: 1,
      amount: "1000.00",
      secondaryAmount: "12.50",
      timestamp: "2026-01-06T07:00:00.000Z",
      notes: "",
    });
    const updated = store.updateTransaction(1, {
      cardId: 1,
      clientId: 1,
      amount: "900.00",
      secondaryAmount: "10.00",
      timestamp: "2026-01-06T07:00:00.000Z",
      notes: "fixed",
    });
    expect(updated.rate).toBe("90.000000");
    expect(updated.createdAt).toBe("2026-01-06T08:00:00.000Z");
  });

  it("rejects unknown clients without consuming an id", () => {
    expectStoreError(
      () =>
        store.createTransaction({
          cardId: 1,
          clientId: 9,
          amount: "1.00",
          secondaryAmount: "0.00",
          timestamp: "2026-01-06T07:00:00.000Z",
          notes: "",
        }),
      "CLIENT_NOT_FOUND",
    );
    expect(store.snapshot().nextIds.transaction).toBe(1);
  });

  it("filters by half-open window and orders by timestamp", () => {
    for (const [timestamp, amount] of [
      ["2026-01-06T09:00:00.000Z", "2.00"],
      ["2026-01-05T21:00:00.000Z", "1.00"],
      ["2026-01-06T21:00:00.000Z", "4.00"],
    ] as const) {
      store.createTransaction({ cardId: 1, clientId: 1, amount, secondaryAmount: "0.00", timestamp, notes: "" });
    }

    const window = { from: "2026-01-05T21:00:00.000Z", to: "2026-01-06T21:00:00.000Z" };
    expect(store.listTransactions(window).map((t) => t.amount)).toEqual(["1.00", "2.00"]);
    expect(store.listTransactions({ order: "desc" }).map((t) => t.amount)).toEqual([
      "4.00",
      "2.00",
      "1.00",
    ]);
    expect(store.sumTransactionAmounts({ cardId: 1, ...window })).toBe("3.00");
  });

  it("throws TRANSACTION_NOT_FOUND on delete", () => {
    expectStoreError(() => store.deleteTransaction(3), "TRANSACTION_NOT_FOUND");
  });
});

// =============================================================================
// Withdrawals
// =============================================================================

describe("upsertWithdrawal", () => {
  beforeEach(() => {
    store.createCard({ name: "Card A" });
  });

  it("creates the row for a new key", () => {
    expect(
      store.upsertWithdrawal(upsert({ withdrawnAmount: "200", commission: "50" })),
    ).toEqual({
      id: 1,
      date: "2026-01-06",
      timestamp: null,
      cardId: 1,
      fullyWithdrawn: false,
      withdrawnAmount: "200.00",
      commission: "50.00",
      note: "",
    });
  });

  it("updates the same row and clears the amount when full", () => {
    store.upsertWithdrawal(upsert({ withdrawnAmount: "200.00", note: "first" }));
    const second = store.upsertWithdrawal(
      upsert({ fullyWithdrawn: true, withdrawnAmount: "999.00" }),
    );
    expect(second).toMatchObject({ id: 1, fullyWithdrawn: true, withdrawnAmount: null, note: "first" });
    expect(store.listWithdrawals({})).toHaveLength(1);
  });

  it("keeps the stored timestamp unless a new one is given", () => {
    store.upsertWithdrawal(upsert({ timestamp: "2026-01-06T10:00:00Z" }));
    expect(store.upsertWithdrawal(upsert()).timestamp).toBe("2026-01-06T10:00:00.000Z");
    expect(
      store.upsertWithdrawal(upsert({ timestamp: "2026-01-06T12:00:00.000Z" })).timestamp,
    ).toBe("2026-01-06T12:00:00.000Z");
  });

  it("collapses duplicate rows onto the latest", () => {
    const state = emptyState();
    const seeded = new InMemoryLedgerStore({
      initialState: {
        ...state,
        nextIds: { ...state.nextIds, card: 2, withdrawal: 3 },
        cards: [
          {
            id: 1,
            name: "Card A",
            bank: "",
            cardNumber: "",
            pin: "",
            status: "active",
            groupId: null,
            notes: "",
          },
        ],
        withdrawals: [
          {
            id: 1,
            date: "2026-01-06",
            timestamp: "2026-01-06T15:00:00.000Z",
            cardId: 1,
            fullyWithdrawn: false,
            withdrawnAmount: "100.00",
            commission: "0.00",
            note: "late",
          },
          {
            id: 2,
            date: "2026-01-06",
            timestamp: "2026-01-06T09:00:00.000Z",
            cardId: 1,
            fullyWithdrawn: false,
            withdrawnAmount: "300.00",
            commission: "0.00",
            note: "early",
          },
        ],
      },
    });

    const saved = seeded.upsertWithdrawal(upsert({ withdrawnAmount: "150.00" }));
    expect(saved).toMatchObject({ id: 1, withdrawnAmount: "150.00", note: "late" });
    expect(seeded.listWithdrawals({}).map((w) => w.id)).toEqual([1]);
  });

  it("rejects an unknown card", () => {
    expectStoreError(() => store.upsertWithdrawal(upsert({ cardId: 5 })), "CARD_NOT_FOUND");
  });

  it("rejects a negative commission", () => {
    expectStoreError(() => store.upsertWithdrawal(upsert({ commission: "-1.00" })), "INVALID_RECORD");
    expect(store.listWithdrawals({})).toEqual([]);
  });

  it("filters by card and half-open day range", () => {
    store.createCard({ name: "Card B" });
    store.upsertWithdrawal(upsert({ date: "2026-01-05" }));
    store.upsertWithdrawal(upsert({ date: "2026-01-06" }));
    store.upsertWithdrawal(upsert({ cardId: 2, date: "2026-01-06" }));
    expect(
      store.listWithdrawals({ cardId: 1, from: "2026-01-06", to: "2026-01-07" }).map((w) => w.date),
    ).toEqual(["2026-01-06"]);
    expect(store.listWithdrawals({ to: "2026-01-06" })).toHaveLength(1);
  });
});

// =============================================================================
// Operators
// =============================================================================

describe("operators", () => {
  it("creates and finds by key hash", () => {
    const keyHash = hashApiKey("test-secret");
    const operator = store.createOperator({ name: "admin", role: "admin", keyHash });
    expect(operator).toEqual({
      id: 1,
      name: "admin",
      role: "admin",
      keyHash,
      createdAt: "2026-01-06T08:00:00.000Z",
    });
    expect(store.findOperatorByKeyHash(keyHash)).toEqual(operator);
    expect(store.findOperatorByName("admin")).toEqual(operator);
  });

  it("rejects duplicates and raw keys", () => {
    store.createOperator({ name: "admin", role: "admin", keyHash: hashApiKey("test-secret") });
    expectStoreError(
      () => store.createOperator({ name: "admin", role: "viewer", keyHash: hashApiKey("other") }),
      "DUPLICATE_OPERATOR",
    );
    expectStoreError(
      () => store.createOperator({ name: "ops", role: "viewer", keyHash: "test-secret" }),
      "INVALID_RECORD",
    );
  });
});

// =============================================================================
// Unit of work
// =============================================================================

describe("transaction", () => {
  it("rolls back every change when the unit throws", () => {
    expect(() =>
      store.transaction(() => {
        store.createClient({ name: "Anna" });
        store.createCard({ name: "Card A" });
        throw new Error("boom");
      }),
    ).toThrow("boom");

    expect(store.listClients()).toEqual([]);
    expect(store.listCards()).toEqual([]);
    expect(store.snapshot().nextIds).toEqual(emptyState().nextIds);
  });

  it("returns the unit's result", () => {
    const result = store.transaction(() => store.createClient({ name: "Anna" }).id);
    expect(result).toBe(1);
  });
});

describe("stateHash", () => {
  it("is equal for equal contents and changes with them", () => {
    const other = new InMemoryLedgerStore({ now: () => NOW });
    store.createClient({ name: "Anna" });
    other.createClient({ name: "Anna" });
    expect(store.stateHash()).toBe(other.stateHash());

    other.createClient({ name: "Bob" });
    expect(store.stateHash()).not.toBe(other.stateHash());
  });

  it("matches a 64-char hex digest", () => {
    expect(store.stateHash()).toMatch(/^[0-9a-f]{64}$/);
    expect(store.verify()).toBe(true);
  });
});
