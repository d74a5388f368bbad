/**
 * @keelway/codec — Codec errors.
 *
 * Every malformed-input failure is fatal and carries a discriminating
 * code plus structured details (offending index, expected and actual
 * values) so off-chain tooling can branch on the exact cause.
 */

/** Error codes for codec operations. */
export type CodecErrorCode =
  | "DATA_TOO_SHORT"
  | "INVALID_MAGIC"
  | "HEADER_TOO_SHORT"
  | "INVALID_VERSION"
  | "OVERALL_LENGTH_MISMATCH"
  | "TRANSFER_PAYLOAD_OVERALL_LENGTH_MISMATCH"
  | "HOOK_DATA_TOO_LARGE"
  | "ELEMENT_HEADER_TOO_SHORT"
  | "ELEMENT_TOO_SHORT"
  | "INVALID_ELEMENT_MAGIC"
  | "TOO_MANY_ELEMENTS"
  | "CURSOR_OUT_OF_BOUNDS"
  | "BYTES_OUT_OF_BOUNDS"
  | "FIELD_OUT_OF_RANGE"
  | "MALFORMED_BURN_BATCH";

/** Structured context attached to a codec error. */
export type CodecErrorDetails = Readonly<Record<string, string | number>>;

/**
 * Structured error from the codec.
 * Always thrown — never returns error codes silently.
 */
export class CodecError extends Error {
  public readonly code: CodecErrorCode;
  public readonly details: CodecErrorDetails;

  constructor(code: CodecErrorCode, message: string, details: CodecErrorDetails = {}) {
    super(message);
    this.name = "CodecError";
    this.code = code;
    this.details = details;
  }
}

/** Narrow an unknown failure to a CodecError with the given code. */
export function isCodecError(
  err: unknown,
  code?: CodecErrorCode,
): err is CodecError {
  return err instanceof CodecError && (code === undefined || err.code === code);
}
