/**
 * Tests for CashflowService beyond what the routes cover:
 * admin provisioning, mutation logging and date handling.
 */

import { describe, it, expect } from "vitest";
import pino from "pino";
import { InMemoryLedgerStore, hashApiKey } from "@cardflow/store";
import { InputValidationError } from "@cardflow/ledger";
import { CashflowService } from "../../src/services/cashflow-service.js";
import { TEST_NOW, TEST_ZONE, createTestService } from "../setup.js";

function serviceWithLog(): { service: CashflowService; lines: Record<string, unknown>[] } {
  const lines: Record<string, unknown>[] = [];
  const logger = pino({ level: "info", base: null, timestamp: false }, {
    write: (line: string) => {
      lines.push(JSON.parse(line) as Record<string, unknown>);
    },
  });
  const service = new CashflowService({
    store: new InMemoryLedgerStore({ now: () => TEST_NOW }),
    zone: TEST_ZONE,
    logger,
    now: () => TEST_NOW,
  });
  return { service, lines };
}

describe("provisionAdmin", () => {
  it("creates an admin operator holding only the key hash", () => {
    const service = createTestService();

    const { record, created } = service.provisionAdmin("root", "test-secret");

    expect(created).toBe(true);
    expect(record).toEqual({
      id: 1,
      name: "root",
      role: "admin",
      keyHash: hashApiKey("test-secret"),
      createdAt: "2026-01-10T09:00:00.000Z",
    });
    expect(service.findOperatorByKey("test-secret")?.name).toBe("root");
    expect(service.hasOperators()).toBe(true);
  });

  it("changes nothing when run again", () => {
    const service = createTestService();
    service.provisionAdmin("root", "test-secret");
    const before = service.store.stateHash();

    const again = service.provisionAdmin("root", "other-secret");

    expect(again.created).toBe(false);
    expect(again.record.keyHash).toBe(hashApiKey("test-secret"));
    expect(service.store.stateHash()).toBe(before);
  });

  it("requires a key", () => {
    const service = createTestService();

    expect(() => service.provisionAdmin("root", "  ")).toThrow(InputValidationError);
    expect(service.hasOperators()).toBe(false);
  });
});

describe("mutation logging", () => {
  it("logs withdrawal saves with their key fields", () => {
    const { service, lines } = serviceWithLog();
    service.createCard({ name: "Card A" });

    service.saveWithdrawal({ cardId: 1, date: "06/01/2026", fullyWithdrawn: true });

    expect(lines.map((line) => line["msg"])).toEqual(["Card created", "Withdrawal saved"]);
    expect(lines[1]).toMatchObject({
      level: 30,
      withdrawalId: 1,
      cardId: 1,
      date: "2026-01-06",
      fullyWithdrawn: true,
    });
  });

  it("logs nothing for a rejected write", () => {
    const { service, lines } = serviceWithLog();

    expect(() => service.saveWithdrawal({ cardId: 1, date: "" })).toThrow(InputValidationError);
    expect(lines).toEqual([]);
  });
});

describe("dates", () => {
  it("uses the reference zone for today", () => {
    // 2026-01-10T22:30Z is already the 11th at +03:00
    const service = new CashflowService({
      store: new InMemoryLedgerStore(),
      zone: TEST_ZONE,
      now: () => new Date("2026-01-10T22:30:00.000Z"),
    });
    service.createCard({ name: "Card A" });

    expect(service.cardBalance(1).day).toBe("2026-01-11");
  });

  it("collects errors for both range bounds", () => {
    const service = createTestService();

    try {
      service.paymentsSummary({ start: "x", end: "y" });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InputValidationError);
      if (err instanceof InputValidationError) {
        expect(err.fieldErrors).toEqual([
          { field: "start", message: 'Enter a valid date: "x"' },
          { field: "end", message: 'Enter a valid date: "y"' },
        ]);
      }
    }
  });

  it("treats blank range bounds as open", () => {
    const service = createTestService();

    expect(service.paymentsSummary({ start: "", end: " " })).toEqual([]);
  });
});
