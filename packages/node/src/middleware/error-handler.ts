/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps known domain errors (StoreError, LedgerError, ApiError)
 * to HTTP status codes; anything else is a 500.
 */

import type { Context } from "hono";
import { InputValidationError } from "@cardflow/ledger";
import type { ErrorStatus } from "../types/error.js";
import { ApiError, createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Readonly<Record<string, ErrorStatus>> = {
  // Ledger errors
  INVALID_AMOUNT: 400,
  INVALID_DATE: 400,
  INVALID_TIMESTAMP: 400,
  INVALID_OFFSET: 400,
  VALIDATION_FAILED: 400,

  // Store errors
  INVALID_RECORD: 400,
  CARD_NOT_FOUND: 404,
  CLIENT_NOT_FOUND: 404,
  GROUP_NOT_FOUND: 404,
  TRANSACTION_NOT_FOUND: 404,
  DUPLICATE_CARD: 409,
  DUPLICATE_CLIENT: 409,
  DUPLICATE_GROUP: 409,
  DUPLICATE_OPERATOR: 409,
  CARD_HAS_TRANSACTIONS: 409,
  CLIENT_HAS_TRANSACTIONS: 409,
  STALE_STATE: 409,
  CORRUPT_STATE: 500,
};

function errorCode(err: Error): string | undefined {
  if ("code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Build the onError handler. `onUnexpected` sees every error answered
 * with a 500, before the details are hidden from the client.
 */
export function createErrorHandler(
  onUnexpected?: (err: Error, c: Context) => void,
): (err: Error, c: Context) => Response {
  return (err, c) => {
    if (err instanceof ApiError) {
      return c.json(createErrorEnvelope(err.code, err.message, err.details), err.status);
    }

    const code = errorCode(err);
    const status = (code !== undefined ? STATUS_MAP[code] : undefined) ?? 500;

    if (status === 500) {
      onUnexpected?.(err, c);
      return c.json(createErrorEnvelope(code ?? "INTERNAL_ERROR", "Internal server error"), 500);
    }

    const details =
      err instanceof InputValidationError ? { fields: err.fieldErrors } : undefined;
    return c.json(createErrorEnvelope(code ?? "INTERNAL_ERROR", err.message, details), status);
  };
}

/**
 * Global error handler without an unexpected-error hook.
 */
export const handleError = createErrorHandler();
