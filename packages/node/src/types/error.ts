/**
 * Error envelope types for API responses.
 *
 * All error responses follow the shape:
 * { error: { code: string, message: string, details?: Record<string, unknown> } }
 *
 * Domain failures keep their own code (e.g. `INTENT_EXPIRED_AT_INDEX`);
 * the codes below cover failures the HTTP layer raises itself.
 */

// =============================================================================
// Error Codes
// =============================================================================

export type ApiErrorCode =
  | "VALIDATION_ERROR"
  | "UNAUTHORIZED"
  | "FORBIDDEN"
  | "NOT_FOUND"
  | "INTERNAL_ERROR";

/** Statuses the service answers failures with. */
export type ErrorStatus = 400 | 401 | 403 | 404 | 409 | 422 | 500;

// =============================================================================
// Error Response
// =============================================================================

export interface ErrorDetail {
  readonly code: ApiErrorCode | string;
  readonly message: string;
  readonly details?: Readonly<Record<string, unknown>>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

// =============================================================================
// Factory
// =============================================================================

export function createErrorEnvelope(
  code: ApiErrorCode | string,
  message: string,
  details?: Readonly<Record<string, unknown>>,
): ErrorEnvelope {
  const error: ErrorDetail = { code, message };
  if (details !== undefined && Object.keys(details).length > 0) {
    return { error: { ...error, details } };
  }
  return { error };
}

// =============================================================================
// Errors raised by the HTTP layer
// =============================================================================

export class ApiError extends Error {
  public readonly status: ErrorStatus;
  public readonly code: ApiErrorCode;
  public readonly details: Readonly<Record<string, unknown>>;

  constructor(
    status: ErrorStatus,
    code: ApiErrorCode,
    message: string,
    details: Readonly<Record<string, unknown>> = {},
  ) {
    super(message);
    this.name = "ApiError";
    this.status = status;
    this.code = code;
    this.details = details;
  }
}
