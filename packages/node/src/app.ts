/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts so tests can create the app without
 * starting the HTTP server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import {
  GatewayService,
  type GatewayServiceConfig,
  type SettlementLogger,
} from "./services/gateway-service.js";
import { handleError, handleNotFound } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import { authMiddleware, requirePermission } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import {
  createChainRoutes,
  createCodecRoutes,
  createEventRoutes,
  createHealthRoutes,
  createMinterRoutes,
  createWalletRoutes,
} from "./routes/index.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: GatewayServiceConfig;
  readonly logFn?: (entry: RequestLogEntry) => void;
  /** Receives burn, shortfall and mint events. */
  readonly settlementLogger?: SettlementLogger;
  /** Auth configuration. When provided, auth middleware is enabled. */
  readonly auth?: AuthConfig;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: GatewayService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const service = new GatewayService(options.serviceConfig, options.settlementLogger);
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handlers ─────────────────────────────────────────────
  app.onError(handleError);
  app.notFound(handleNotFound);

  // ─── Health Routes ──────────────────────────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  if (options.auth !== undefined) {
    // Secured mode: every key reads; state changes need write, the chain needs admin
    app.use("/api/*", authMiddleware(options.auth));
    app.post("/api/v1/wallet/*", requirePermission("write"));
    app.post("/api/v1/minter/*", requirePermission("write"));
    app.post("/api/v1/chain/*", requirePermission("admin"));
  }

  app.route("/api/v1/codec", createCodecRoutes());
  app.route("/api/v1/wallet", createWalletRoutes());
  app.route("/api/v1/minter", createMinterRoutes());
  app.route("/api/v1/chain", createChainRoutes());
  app.route("/api/v1/events", createEventRoutes());

  return { app, service };
}
