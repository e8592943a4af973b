/**
 * Tests for error handler middleware.
 *
 * Verifies domain errors are mapped to correct HTTP status codes
 * and the error envelope format.
 */

import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import { InputValidationError, LedgerError } from "@cardflow/ledger";
import { StoreError } from "@cardflow/store";
import type { AppEnv } from "../../src/types/api-contract.js";
import { ApiError } from "../../src/types/error.js";
import { createErrorHandler } from "../../src/middleware/error-handler.js";

function appThrowing(err: Error, seen: Error[] = []) {
  const app = new Hono<AppEnv>();
  app.onError(createErrorHandler((e) => seen.push(e)));
  app.get("/boom", () => {
    throw err;
  });
  return app;
}

async function envelope(res: Response) {
  return (await res.json()) as {
    error: { code: string; message: string; details?: Record<string, unknown> };
  };
}

describe("error handler", () => {
  it("maps not-found store errors to 404", async () => {
    const res = await appThrowing(new StoreError("CARD_NOT_FOUND", "Card 9 not found")).request("/boom");

    expect(res.status).toBe(404);
    expect(await envelope(res)).toEqual({
      error: { code: "CARD_NOT_FOUND", message: "Card 9 not found" },
    });
  });

  it("maps conflicts to 409", async () => {
    const res = await appThrowing(
      new StoreError("CARD_HAS_TRANSACTIONS", "Cannot delete card"),
    ).request("/boom");

    expect(res.status).toBe(409);
  });

  it("answers a write refused over a changed state file with 409", async () => {
    const res = await appThrowing(
      new StoreError("STALE_STATE", "State file was changed by another writer; retry the change"),
    ).request("/boom");

    expect(res.status).toBe(409);
    expect(await envelope(res)).toEqual({
      error: {
        code: "STALE_STATE",
        message: "State file was changed by another writer; retry the change",
      },
    });
  });

  it("maps ledger input errors to 400", async () => {
    const res = await appThrowing(new LedgerError("INVALID_AMOUNT", 'Enter a number: "x"')).request("/boom");

    expect(res.status).toBe(400);
    expect((await envelope(res)).error.code).toBe("INVALID_AMOUNT");
  });

  it("lists field errors for validation failures", async () => {
    const err = new InputValidationError([
      { field: "date", message: "Date is required" },
      { field: "cardId", message: "Card is required" },
    ]);
    const res = await appThrowing(err).request("/boom");

    expect(res.status).toBe(400);
    expect(await envelope(res)).toEqual({
      error: {
        code: "VALIDATION_FAILED",
        message: "date: Date is required; cardId: Card is required",
        details: {
          fields: [
            { field: "date", message: "Date is required" },
            { field: "cardId", message: "Card is required" },
          ],
        },
      },
    });
  });

  it("passes ApiError status and details through", async () => {
    const res = await appThrowing(
      new ApiError("VALIDATION_ERROR", 400, "Invalid id: \"abc\"", { param: "id" }),
    ).request("/boom");

    expect(res.status).toBe(400);
    expect(await envelope(res)).toEqual({
      error: { code: "VALIDATION_ERROR", message: 'Invalid id: "abc"', details: { param: "id" } },
    });
  });

  it("hides unexpected errors behind a 500", async () => {
    const seen: Error[] = [];
    const res = await appThrowing(new Error("disk on fire"), seen).request("/boom");

    expect(res.status).toBe(500);
    expect(await envelope(res)).toEqual({
      error: { code: "INTERNAL_ERROR", message: "Internal server error" },
    });
    expect(seen.map((e) => e.message)).toEqual(["disk on fire"]);
  });

  it("treats a corrupt state file as a 500", async () => {
    const res = await appThrowing(new StoreError("CORRUPT_STATE", "hash mismatch")).request("/boom");

    expect(res.status).toBe(500);
    expect(await envelope(res)).toEqual({
      error: { code: "CORRUPT_STATE", message: "Internal server error" },
    });
  });
});
