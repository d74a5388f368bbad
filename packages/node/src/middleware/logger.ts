/**
 * Request logging middleware.
 *
 * Reports one entry per request through an injected log function; the
 * entry point hands in a pino logger. Server errors log at `error`,
 * client errors at `warn`.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export type RequestLogLevel = "info" | "warn" | "error";

export interface RequestLogEntry {
  readonly level: RequestLogLevel;
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
}

export function levelForStatus(status: number): RequestLogLevel {
  if (status >= 500) return "error";
  if (status >= 400) return "warn";
  return "info";
}

export function loggerMiddleware(
  log: (entry: RequestLogEntry) => void,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = Date.now();

    await next();

    const status = c.res.status;
    log({
      level: levelForStatus(status),
      method: c.req.method,
      path: c.req.path,
      status,
      durationMs: Date.now() - start,
      requestId: c.get("requestId"),
    });
  };
}
