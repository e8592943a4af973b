/**
 * Tests for buildDailySheet.
 *
 * Verifies:
 * - Only active cards with a positive should-have appear
 * - Withdrawn, commission and remaining per row
 * - Viewing a sheet writes nothing
 * - Bank, text and page filters; totals follow the visible page
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { InMemoryLedgerStore } from "@cardflow/store";
import { buildDailySheet } from "../src/daily-sheet.js";
import { at10, createStore, receive, reportOptions, withdraw } from "./fixtures.js";

const DAY = "2026-01-06";

let store: InMemoryLedgerStore;

beforeEach(() => {
  store = createStore();
  store.createClient({ name: "Anna" });
});

describe("rows", () => {
  it("shows a card with receipts and no withdrawal row, without saving one", () => {
    store.createCard({ name: "Card A", bank: "Alfa", cardNumber: "4276 1600 1234 5678" });
    receive(store, 1, 1, at10(DAY), "500.00");
    const hashBefore = store.stateHash();

    const sheet = buildDailySheet(reportOptions(store), DAY);

    expect(sheet.rows).toEqual([
      {
        cardId: 1,
        label: "Alfa Card A *5678",
        bank: "Alfa",
        bankColor: "#000000",
        pin: "",
        shouldHave: "500.00",
        withdrawal: null,
        withdrawn: "0.00",
        commission: "0.00",
        remaining: "500.00",
      },
    ]);
    expect(sheet.totals).toEqual({
      shouldHave: "500.00",
      withdrawn: "0.00",
      commission: "0.00",
      remaining: "500.00",
    });
    expect(sheet.banks).toEqual(["Alfa"]);
    expect(sheet.selectedBank).toBeNull();
    expect(sheet.page).toEqual({ page: 1, pageSize: 50, totalItems: 1, totalPages: 1 });

    expect(store.listWithdrawals({})).toEqual([]);
    expect(store.stateHash()).toBe(hashBefore);
  });

  it("omits inactive cards and cards with nothing to withdraw", () => {
    store.createCard({ name: "Card A" });
    store.createCard({ name: "Card B", status: "hold" });
    store.createCard({ name: "Card C" });
    receive(store, 1, 1, at10(DAY), "100.00");
    receive(store, 2, 1, at10(DAY), "100.00");

    const sheet = buildDailySheet(reportOptions(store), DAY);
    expect(sheet.rows.map((r) => r.cardId)).toEqual([1]);
  });

  it("subtracts a partial withdrawal and its commission", () => {
    store.createCard({ name: "Card A" });
    receive(store, 1, 1, at10(DAY), "1000.00");
    withdraw(store, { cardId: 1, date: DAY, withdrawnAmount: "200.00", commission: "50.00" });

    const [row] = buildDailySheet(reportOptions(store), DAY).rows;
    expect(row).toMatchObject({
      shouldHave: "1000.00",
      withdrawn: "200.00",
      commission: "50.00",
      remaining: "750.00",
    });
    expect(row?.withdrawal?.id).toBe(1);
  });

  it("drains the whole should-have on a full withdrawal", () => {
    store.createCard({ name: "Card A" });
    receive(store, 1, 1, at10(DAY), "1000.00");
    withdraw(store, { cardId: 1, date: DAY, fullyWithdrawn: true, withdrawnAmount: "5.00" });

    const [row] = buildDailySheet(reportOptions(store), DAY).rows;
    expect(row).toMatchObject({ withdrawn: "1000.00", commission: "0.00", remaining: "0.00" });
  });

  it("clamps the remainder at zero", () => {
    store.createCard({ name: "Card A" });
    receive(store, 1, 1, at10(DAY), "1000.00");
    withdraw(store, { cardId: 1, date: DAY, withdrawnAmount: "900.00", commission: "200.00" });

    const [row] = buildDailySheet(reportOptions(store), DAY).rows;
    expect(row?.remaining).toBe("0.00");
  });

  it("carries a partial remainder into the next day", () => {
    store.createCard({ name: "Card A" });
    receive(store, 1, 1, at10(DAY), "1000.00");
    withdraw(store, { cardId: 1, date: DAY, withdrawnAmount: "200.00", commission: "50.00" });

    const [row] = buildDailySheet(reportOptions(store), "2026-01-07").rows;
    expect(row).toMatchObject({ shouldHave: "750.00", withdrawal: null, remaining: "750.00" });
  });

  it("drops the card the day after a full withdrawal", () => {
    store.createCard({ name: "Card A" });
    receive(store, 1, 1, at10(DAY), "1000.00");
    withdraw(store, { cardId: 1, date: DAY, fullyWithdrawn: true });

    expect(buildDailySheet(reportOptions(store), "2026-01-07").rows).toEqual([]);
  });

  it("uses the bank's color", () => {
    store.createCard({ name: "Card A", bank: "Alfa" });
    store.setBankColor("Alfa", "#FF0000");
    receive(store, 1, 1, at10(DAY), "100.00");

    expect(buildDailySheet(reportOptions(store), DAY).rows[0]?.bankColor).toBe("#ff0000");
  });
});

describe("filters", () => {
  beforeEach(() => {
    store.createCard({ name: "Card A", bank: "Alfa" });
    store.createCard({ name: "Card B", bank: "Alfa Business" });
    store.createCard({ name: "Card C", bank: "Tinkoff", pin: "7777" });
    receive(store, 1, 1, at10(DAY), "100.00");
    receive(store, 2, 1, at10(DAY), "200.00");
    receive(store, 3, 1, at10(DAY), "300.00");
  });

  it("orders rows by label and lists every bank", () => {
    const sheet = buildDailySheet(reportOptions(store), DAY);
    expect(sheet.rows.map((r) => r.label)).toEqual([
      "Alfa Business Card B",
      "Alfa Card A",
      "Tinkoff Card C",
    ]);
    expect(sheet.banks).toEqual(["Alfa", "Alfa Business", "Tinkoff"]);
  });

  it("prefers an exact bank match", () => {
    const sheet = buildDailySheet(reportOptions(store), DAY, { bank: "ALFA" });
    expect(sheet.rows.map((r) => r.cardId)).toEqual([1]);
    expect(sheet.selectedBank).toBe("Alfa");
    expect(sheet.totals.shouldHave).toBe("100.00");
    expect(sheet.banks).toEqual(["Alfa", "Alfa Business", "Tinkoff"]);
  });

  it("falls back to a substring match", () => {
    const sheet = buildDailySheet(reportOptions(store), DAY, { bank: "lf" });
    expect(sheet.rows.map((r) => r.cardId)).toEqual([2, 1]);
    expect(sheet.selectedBank).toBe("Alfa Business");
    expect(sheet.totals.shouldHave).toBe("300.00");
  });

  it("keeps the typed bank when nothing matches", () => {
    const sheet = buildDailySheet(reportOptions(store), DAY, { bank: "Sber" });
    expect(sheet.rows).toEqual([]);
    expect(sheet.selectedBank).toBe("Sber");
    expect(sheet.totals).toEqual({
      shouldHave: "0.00",
      withdrawn: "0.00",
      commission: "0.00",
      remaining: "0.00",
    });
  });

  it("matches free text against the PIN", () => {
    const sheet = buildDailySheet(reportOptions(store), DAY, { query: "777" });
    expect(sheet.rows.map((r) => r.cardId)).toEqual([3]);
  });

  it("totals only the visible page", () => {
    const second = buildDailySheet(reportOptions(store), DAY, { page: 2, pageSize: 2 });
    expect(second.rows.map((r) => r.cardId)).toEqual([3]);
    expect(second.totals.shouldHave).toBe("300.00");
    expect(second.page).toEqual({ page: 2, pageSize: 2, totalItems: 3, totalPages: 2 });

    const first = buildDailySheet(reportOptions(store), DAY, { page: 1, pageSize: 2 });
    expect(first.totals.remaining).toBe("300.00");
  });

  it("clamps a page past the end", () => {
    const sheet = buildDailySheet(reportOptions(store), DAY, { page: 9, pageSize: 2 });
    expect(sheet.page.page).toBe(2);
  });
});
