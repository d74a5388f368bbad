/**
 * Authentication middleware.
 *
 * Looks the X-Api-Key header up in the configured key registry.
 * On success, sets `c.set("auth", authContext)`.
 * On failure, returns 401 or 403.
 */

import type { MiddlewareHandler } from "hono";
import type { Address } from "@keelway/types";
import type { AppEnv } from "../types/api-contract.js";
import type { ApiKeyRecord, AuthContext, Permission } from "../types/auth.js";
import { hasPermission } from "../types/auth.js";
import { ApiError, createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Auth Middleware
// =============================================================================

export interface AuthConfig {
  /** Map of API key → record */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
}

/**
 * Create authentication middleware.
 *
 * Returns 401 when the key is missing or unknown.
 */
export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const apiKey = c.req.header("X-Api-Key");
    if (apiKey === undefined) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Authentication required"), 401);
    }

    const record = config.apiKeys.get(apiKey);
    if (record === undefined) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Invalid API key"), 401);
    }

    c.set("auth", {
      type: "api-key",
      identity: record.key,
      role: record.role,
      depositor: record.depositor,
    });
    return next();
  };
}

// =============================================================================
// Guards
// =============================================================================

/**
 * Create a permission guard middleware.
 *
 * Must run AFTER authMiddleware. Returns 403 if the authenticated
 * role lacks the required permission.
 */
export function requirePermission(
  permission: Permission,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const auth = c.get("auth");
    if (auth === undefined) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Authentication required"), 401);
    }
    if (!hasPermission(auth.role, permission)) {
      return c.json(
        createErrorEnvelope(
          "FORBIDDEN",
          `Role '${auth.role}' lacks '${permission}' permission`,
        ),
        403,
      );
    }
    return next();
  };
}

/**
 * Refuse a request made for another depositor than the key is bound to.
 *
 * Passes when the app runs open (`auth` unset) or the key is unbound.
 * Both addresses are checksummed by the time they reach here.
 *
 * @throws {ApiError} 403 FORBIDDEN
 */
export function assertActsFor(auth: AuthContext | undefined, depositor: Address): void {
  if (auth?.depositor === undefined || auth.depositor === depositor) return;
  throw new ApiError(
    403,
    "FORBIDDEN",
    `API key is bound to ${auth.depositor} and cannot act for ${depositor}`,
    { boundDepositor: auth.depositor, depositor },
  );
}
