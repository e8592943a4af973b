/**
 * Authentication middleware.
 *
 * One header, two key sources:
 * 1. X-Api-Key matched against the static keys from API_KEYS
 * 2. X-Api-Key hashed and matched against provisioned operators
 *
 * On success, sets `c.set("auth", authContext)`.
 * On failure, returns 401 or 403.
 */

import type { MiddlewareHandler } from "hono";
import type { Operator } from "@cardflow/types";
import { hashApiKey } from "@cardflow/store";
import type { AppEnv } from "../types/api-contract.js";
import type { AuthContext, Permission, ApiKeyRecord } from "../types/auth.js";
import { hasPermission } from "../types/auth.js";
import { createErrorEnvelope } from "../types/error.js";

export const API_KEY_HEADER = "X-Api-Key";

// =============================================================================
// Auth Middleware
// =============================================================================

export interface AuthConfig {
  /** Map of API key → record */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
  /** Operator lookup by SHA-256 key hash */
  readonly findOperator?: ((keyHash: string) => Operator | undefined) | undefined;
}

function resolveKey(config: AuthConfig, apiKey: string): AuthContext | undefined {
  const record = config.apiKeys.get(apiKey);
  if (record !== undefined) {
    return { type: "api-key", identity: `${record.key.slice(0, 4)}…`, role: record.role };
  }
  const operator = config.findOperator?.(hashApiKey(apiKey));
  if (operator !== undefined) {
    return { type: "operator", identity: operator.name, role: operator.role };
  }
  return undefined;
}

/**
 * Create authentication middleware. Returns 401 when the key is
 * missing or unknown.
 */
export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const apiKey = c.req.header(API_KEY_HEADER);
    if (apiKey === undefined || apiKey === "") {
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Authentication required"), 401);
    }

    const auth = resolveKey(config, apiKey);
    if (auth === undefined) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Invalid API key"), 401);
    }

    c.set("auth", auth);
    return next();
  };
}

// =============================================================================
// Permission Guards
// =============================================================================

function forbidden(auth: AuthContext, permission: Permission): Response {
  return Response.json(
    createErrorEnvelope("FORBIDDEN", `Role '${auth.role}' lacks '${permission}' permission`),
    { status: 403 },
  );
}

/**
 * Create a permission guard middleware.
 *
 * Runs after authMiddleware; passes everything when auth is off.
 */
export function requirePermission(permission: Permission): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const auth = c.get("auth");
    if (auth !== undefined && !hasPermission(auth.role, permission)) {
      return forbidden(auth, permission);
    }
    return next();
  };
}

/**
 * Guard keyed on the HTTP method: reads need `read`, anything else
 * needs `write`.
 */
export function methodPermission(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const auth = c.get("auth");
    if (auth === undefined) {
      return next();
    }
    const method = c.req.method;
    const permission: Permission = method === "GET" || method === "HEAD" ? "read" : "write";
    if (!hasPermission(auth.role, permission)) {
      return forbidden(auth, permission);
    }
    return next();
  };
}
