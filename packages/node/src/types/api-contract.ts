/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 */

import type { GatewayService } from "../services/gateway-service.js";
import type { AuthContext } from "./auth.js";

/**
 * Hono environment type for the Keelway app.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The gateway deployment this app serves */
    service: GatewayService;

    /** Authenticated caller (set by auth middleware in secured mode) */
    auth?: AuthContext;
  };
}

/** Environment contributed by `validateBody` to the handler after it. */
export interface ValidatedEnv<T> {
  Variables: {
    validatedBody: T;
  };
}
