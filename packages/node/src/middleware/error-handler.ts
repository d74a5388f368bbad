/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps domain errors to HTTP status codes:
 * - malformed input (any CodecError, shape errors) → 400
 * - a signer or caller that may not act → 403
 * - a replayed transfer spec or a version conflict → 409
 * - any other policy or accounting refusal → 422
 */

import type { Context } from "hono";
import { CodecError } from "@keelway/codec";
import { EventStoreError } from "@keelway/event-store";
import { GatewayError, type GatewayErrorCode } from "@keelway/gateway";
import { LedgerError, type LedgerErrorCode } from "@keelway/ledger";
import type { AppEnv } from "../types/api-contract.js";
import { ApiError, createErrorEnvelope, type ErrorStatus } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const GATEWAY_STATUS: Partial<Record<GatewayErrorCode, ErrorStatus>> = {
  // Malformed batches
  EMPTY_BURN_BATCH: 400,
  MISMATCHED_BURN: 400,
  INVALID_ADDRESS: 400,
  VALUE_MUST_BE_POSITIVE: 400,

  // Signers and callers
  INVALID_BURN_SIGNER: 403,
  INVALID_SOURCE_SIGNER_AT_INDEX: 403,
  UNAUTHORIZED_SIGNER_AT_INDEX: 403,
  INVALID_ATTESTATION_SIGNER: 403,
  INVALID_DESTINATION_CALLER_AT_INDEX: 403,

  // Replays
  TRANSFER_SPEC_HASH_USED_AT_INDEX: 409,
  ATTESTATION_HASH_USED_AT_INDEX: 409,

  // The service built an event the catalog rejects
  INVALID_EVENT_PAYLOAD: 500,
};

const LEDGER_STATUS: Partial<Record<LedgerErrorCode, ErrorStatus>> = {
  INVALID_AMOUNT: 400,
  INVALID_WITHDRAWAL_DELAY: 400,
};

interface MappedError {
  readonly status: ErrorStatus;
  readonly code: string;
  readonly details?: Readonly<Record<string, unknown>>;
}

function mapError(err: Error): MappedError | undefined {
  if (err instanceof ApiError) {
    return { status: err.status, code: err.code, details: err.details };
  }
  if (err instanceof CodecError) {
    return { status: 400, code: err.code, details: err.details };
  }
  if (err instanceof GatewayError) {
    return { status: GATEWAY_STATUS[err.code] ?? 422, code: err.code, details: err.details };
  }
  if (err instanceof LedgerError) {
    return { status: LEDGER_STATUS[err.code] ?? 422, code: err.code, details: err.details };
  }
  if (err instanceof EventStoreError) {
    return { status: 400, code: err.code };
  }
  if (err instanceof RangeError) {
    return { status: 400, code: "VALIDATION_ERROR" };
  }
  return undefined;
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 *
 * Unknown failures answer 500 without their message.
 */
export function handleError(err: Error, c: Context<AppEnv>): Response {
  const mapped = mapError(err);
  if (mapped === undefined) {
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  }
  return c.json(createErrorEnvelope(mapped.code, err.message, mapped.details), mapped.status);
}

/** Registered as Hono's notFound handler. */
export function handleNotFound(c: Context<AppEnv>): Response {
  return c.json(
    createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`),
    404,
  );
}
