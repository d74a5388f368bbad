/**
 * Request ID middleware.
 *
 * Generates or propagates an X-Request-Id header for request tracing.
 * An incoming id is kept only when it is a short token of printable
 * characters; anything else is replaced with a new UUID.
 */

import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export const REQUEST_ID_HEADER = "X-Request-Id";

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._:-]{1,128}$/;

export function requestIdMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const existing = c.req.header(REQUEST_ID_HEADER);
    const requestId =
      existing !== undefined && REQUEST_ID_PATTERN.test(existing) ? existing : randomUUID();

    c.set("requestId", requestId);

    await next();

    c.header(REQUEST_ID_HEADER, requestId);
  };
}
