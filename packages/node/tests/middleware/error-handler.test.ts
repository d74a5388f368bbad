/**
 * Tests for error handler middleware.
 *
 * Verifies domain errors are mapped to correct HTTP status codes
 * and the error envelope format.
 */

import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import { CodecError } from "@keelway/codec";
import { EventStoreError } from "@keelway/event-store";
import { GatewayError } from "@keelway/gateway";
import { LedgerError } from "@keelway/ledger";
import type { AppEnv } from "../../src/types/api-contract.js";
import { ApiError } from "../../src/types/error.js";
import { handleError, handleNotFound } from "../../src/middleware/error-handler.js";
import { createTestApp, type ErrorBody } from "../setup.js";

function appThrowing(err: Error): Hono<AppEnv> {
  const app = new Hono<AppEnv>();
  app.onError(handleError);
  app.notFound(handleNotFound);
  app.get("/boom", () => {
    throw err;
  });
  return app;
}

async function failWith(err: Error): Promise<{ status: number; body: ErrorBody }> {
  const res = await appThrowing(err).request("/boom");
  return { status: res.status, body: (await res.json()) as ErrorBody };
}

describe("error handler", () => {
  it("uses the status an ApiError carries", async () => {
    const { status, body } = await failWith(
      new ApiError(404, "NOT_FOUND", "Stream 'x' has no events"),
    );

    expect(status).toBe(404);
    expect(body).toEqual({ error: { code: "NOT_FOUND", message: "Stream 'x' has no events" } });
  });

  it("maps every codec error to 400 with its details", async () => {
    const { status, body } = await failWith(
      new CodecError("HOOK_DATA_TOO_LARGE", "hook data too large", { actual: 5 }),
    );

    expect(status).toBe(400);
    expect(body.error).toEqual({
      code: "HOOK_DATA_TOO_LARGE",
      message: "hook data too large",
      details: { actual: 5 },
    });
  });

  it.each([
    ["INVALID_BURN_SIGNER", 403],
    ["TRANSFER_SPEC_HASH_USED_AT_INDEX", 409],
    ["EMPTY_BURN_BATCH", 400],
    ["INSUFFICIENT_TOKEN_BALANCE", 422],
    ["INVALID_EVENT_PAYLOAD", 500],
  ] as const)("maps gateway error %s to %i", async (code, expected) => {
    const { status, body } = await failWith(new GatewayError(code, "refused"));

    expect(status).toBe(expected);
    expect(body.error.code).toBe(code);
  });

  it.each([
    ["INVALID_AMOUNT", 400],
    ["NO_WITHDRAWING_BALANCE", 422],
  ] as const)("maps ledger error %s to %i", async (code, expected) => {
    const { status } = await failWith(new LedgerError(code, "refused"));

    expect(status).toBe(expected);
  });

  it("maps an event store error to 400", async () => {
    const { status, body } = await failWith(
      new EventStoreError("INVALID_VERSION", "fromVersion must be >= 1, got 0", "wallet:a"),
    );

    expect(status).toBe(400);
    expect(body.error).toEqual({
      code: "INVALID_VERSION",
      message: "fromVersion must be >= 1, got 0",
    });
  });

  it("maps a RangeError to a validation error", async () => {
    const { status, body } = await failWith(new RangeError("value out of range"));

    expect(status).toBe(400);
    expect(body.error).toEqual({ code: "VALIDATION_ERROR", message: "value out of range" });
  });

  it("hides the message of an unexpected failure", async () => {
    const { status, body } = await failWith(new Error("db password in message"));

    expect(status).toBe(500);
    expect(body).toEqual({ error: { code: "INTERNAL_ERROR", message: "Internal server error" } });
  });
});

describe("not found handler", () => {
  it("names the method and path", async () => {
    const { app } = createTestApp();
    const res = await app.request("/api/v1/nowhere", { method: "DELETE" });

    expect(res.status).toBe(404);
    expect(((await res.json()) as ErrorBody).error).toEqual({
      code: "NOT_FOUND",
      message: "No route for DELETE /api/v1/nowhere",
    });
  });
});
