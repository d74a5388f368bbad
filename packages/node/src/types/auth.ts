/**
 * Authentication and authorization types.
 *
 * Secured mode authenticates every /api request by its X-Api-Key
 * header. A key may be bound to one depositor, in which case it can
 * only deposit, withdraw and manage delegates for that depositor.
 *
 * Role hierarchy: admin > operator > viewer
 */

import type { Address } from "@keelway/types";

// =============================================================================
// Roles & Permissions
// =============================================================================

export type Role = "admin" | "operator" | "viewer";

/** Permission levels for role-based access control */
export type Permission = "read" | "write" | "admin";

/** Which permissions each role grants */
export const ROLE_PERMISSIONS: Record<Role, readonly Permission[]> = {
  viewer: ["read"],
  operator: ["read", "write"],
  admin: ["read", "write", "admin"],
};

export const ROLES: readonly Role[] = ["admin", "operator", "viewer"];

export function isRole(value: string): value is Role {
  return ROLES.some((role) => role === value);
}

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
  readonly type: "api-key";
  readonly identity: string;
  readonly role: Role;
  /** The only depositor this caller may act for, when bound. */
  readonly depositor?: Address | undefined;
}

// =============================================================================
// API Key Record
// =============================================================================

export interface ApiKeyRecord {
  readonly key: string;
  readonly role: Role;
  readonly depositor?: Address | undefined;
}
