/**
 * Health check routes.
 *
 * GET /health — Liveness check (always 200 if server is running)
 * GET /ready  — Readiness check (settlement event chain intact)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { GatewayService } from "../services/gateway-service.js";

export function createHealthRoutes(service: GatewayService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const integrity = service.verifyIntegrity();
    const body = {
      status: integrity.valid ? "ready" : "not_ready",
      localDomain: service.localDomain,
      currentBlock: service.currentBlock().toString(),
      eventStore: {
        valid: integrity.valid,
        lastVerifiedPosition: integrity.lastVerifiedPosition,
        errors: integrity.errors.length,
        subscriberFailures: service.subscriberFailures(),
      },
      timestamp: new Date().toISOString(),
    };

    return integrity.valid ? c.json(body, 200) : c.json(body, 503);
  });

  return routes;
}
