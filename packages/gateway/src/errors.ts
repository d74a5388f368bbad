/**
 * @keelway/gateway — Error types.
 *
 * Every policy failure in the wallet or minter is a thrown GatewayError.
 * Errors raised while walking a burn batch or an attestation payload
 * carry the position of the offending element:
 *
 * - `batchIndex`: which (payload, signature, fees) triple
 * - `intentIndex`: which element inside that payload
 */

export type GatewayErrorCode =
  // Burn batch
  | "EMPTY_BURN_BATCH"
  | "MISMATCHED_BURN"
  | "INVALID_BURN_SIGNER"
  | "INTENT_VALUE_MUST_BE_POSITIVE_AT_INDEX"
  | "INVALID_SOURCE_CONTRACT_AT_INDEX"
  | "UNSUPPORTED_TOKEN_AT_INDEX"
  | "INVALID_SOURCE_SIGNER_AT_INDEX"
  | "UNAUTHORIZED_SIGNER_AT_INDEX"
  | "INTENT_EXPIRED_AT_INDEX"
  | "BURN_FEE_TOO_HIGH_AT_INDEX"
  | "NOT_ALL_SAME_TOKEN"
  | "TRANSFER_SPEC_HASH_USED_AT_INDEX"
  | "NO_RELEVANT_BURN_INTENTS"
  // Mint
  | "INVALID_ATTESTATION_SIGNER"
  | "ATTESTATION_VALUE_MUST_BE_POSITIVE_AT_INDEX"
  | "INVALID_DESTINATION_DOMAIN_AT_INDEX"
  | "INVALID_DESTINATION_CONTRACT_AT_INDEX"
  | "INVALID_DESTINATION_CALLER_AT_INDEX"
  | "UNSUPPORTED_DESTINATION_TOKEN_AT_INDEX"
  | "INVALID_DESTINATION_RECIPIENT_AT_INDEX"
  | "ATTESTATION_HASH_USED_AT_INDEX"
  // Deposits, withdrawals, administration
  | "UNSUPPORTED_TOKEN"
  | "VALUE_MUST_BE_POSITIVE"
  | "INVALID_ADDRESS"
  | "INSUFFICIENT_TOKEN_BALANCE"
  | "WITHDRAWAL_NOT_YET_AVAILABLE"
  | "CANNOT_DELEGATE_TO_SELF"
  // Settlement events
  | "INVALID_EVENT_PAYLOAD";

export type GatewayErrorDetails = Readonly<Record<string, string | number>>;

export class GatewayError extends Error {
  public readonly code: GatewayErrorCode;
  public readonly details: GatewayErrorDetails;

  constructor(code: GatewayErrorCode, message: string, details: GatewayErrorDetails = {}) {
    super(message);
    this.name = "GatewayError";
    this.code = code;
    this.details = details;
  }
}

/** Position of an element within a batch. */
export interface ElementPosition {
  readonly batchIndex: number;
  readonly intentIndex: number;
}

/** Throw an error that names the element it was raised for. */
export function failAt(
  code: GatewayErrorCode,
  position: ElementPosition,
  message: string,
  extra: GatewayErrorDetails = {},
): never {
  throw new GatewayError(
    code,
    `${message} (batch ${position.batchIndex}, element ${position.intentIndex})`,
    { batchIndex: position.batchIndex, intentIndex: position.intentIndex, ...extra },
  );
}
