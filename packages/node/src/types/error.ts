/**
 * Error envelope types for API responses.
 *
 * All error responses follow the shape:
 * { error: { code: string, message: string, details?: Record<string, unknown> } }
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Codes raised by the HTTP layer itself. Domain codes (StoreError,
 * LedgerError) pass through unchanged.
 */
export type ApiErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "UNAUTHORIZED"
  | "FORBIDDEN"
  | "INTERNAL_ERROR";

/** Statuses the API answers errors with. */
export type ErrorStatus = 400 | 401 | 403 | 404 | 409 | 500;

// =============================================================================
// Error Response
// =============================================================================

export interface ErrorDetail {
  readonly code: ApiErrorCode | string;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

// =============================================================================
// Factory
// =============================================================================

export function createErrorEnvelope(
  code: ApiErrorCode | string,
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope {
  const error: ErrorDetail = { code, message };
  if (details !== undefined) {
    return { error: { ...error, details } };
  }
  return { error };
}

/**
 * Error raised by route plumbing (bad ids, malformed bodies and queries).
 */
export class ApiError extends Error {
  public readonly code: ApiErrorCode;
  public readonly status: ErrorStatus;
  public readonly details: Record<string, unknown> | undefined;

  constructor(
    code: ApiErrorCode,
    status: ErrorStatus,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "ApiError";
    this.code = code;
    this.status = status;
    this.details = details;
  }
}
