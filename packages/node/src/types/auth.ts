/**
 * Authentication and authorization types.
 *
 * Two key sources, both sent in the X-Api-Key header:
 * 1. Static keys from the API_KEYS env var
 * 2. Provisioned operators, matched by SHA-256 of the key
 *
 * Role hierarchy: admin > operator > viewer
 */

import type { OperatorRole } from "@cardflow/types";

// =============================================================================
// Roles & Permissions
// =============================================================================

export type Role = OperatorRole;

/** Permission levels for role-based access control */
export type Permission = "read" | "write" | "admin";

/** Which permissions each role grants */
export const ROLE_PERMISSIONS: Record<Role, readonly Permission[]> = {
  viewer: ["read"],
  operator: ["read", "write"],
  admin: ["read", "write", "admin"],
};

/**
 * Check whether a role has a specific permission.
 */
export function hasPermission(role: Role, permission: Permission): boolean {
  return ROLE_PERMISSIONS[role].includes(permission);
}

// =============================================================================
// Auth Context
// =============================================================================

/**
 * Resolved authentication context, set by the auth middleware.
 */
export interface AuthContext {
  readonly type: "api-key" | "operator";
  /** Key prefix for static keys, operator name for operators */
  readonly identity: string;
  readonly role: Role;
}

// =============================================================================
// API Key Record
// =============================================================================

export interface ApiKeyRecord {
  readonly key: string;
  readonly role: Role;
}
