/**
 * @keelway/event-store — Settlement event definitions.
 *
 * The catalog of every event the gateway wallet and minter emit. These
 * are what off-chain indexers and operators consume.
 *
 * Naming convention: `<component>.<entity>.<action>`
 *
 * Payload rules:
 * - Amounts and block heights are decimal strings (they exceed 2^53)
 * - Addresses are 0x-prefixed 20-byte hex, words 32-byte hex
 */

import type { EventSchema } from "./catalog.js";
import { EventCatalog } from "./catalog.js";

// =============================================================================
// Wallet Events
// =============================================================================

export interface DepositedPayload {
  readonly token: string;
  readonly depositor: string;
  readonly sender: string;
  readonly value: string;
}

export interface WithdrawalInitiatedPayload {
  readonly token: string;
  readonly depositor: string;
  readonly value: string;
  readonly remainingAvailable: string;
  readonly totalWithdrawing: string;
  readonly withdrawableAtBlock: string;
}

export interface WithdrawalCompletedPayload {
  readonly token: string;
  readonly depositor: string;
  readonly recipient: string;
  readonly value: string;
}

export interface GatewayBurnedPayload {
  readonly token: string;
  readonly depositor: string;
  readonly transferSpecHash: string;
  readonly destinationDomain: number;
  readonly destinationRecipient: string;
  readonly signer: string;
  readonly value: string;
  readonly fee: string;
  readonly fromAvailable: string;
  readonly fromWithdrawing: string;
}

/**
 * A burn debited less than `value + fee`. Diagnostic: the burn still
 * went through with what was there.
 */
export interface InsufficientBalancePayload {
  readonly token: string;
  readonly depositor: string;
  readonly transferSpecHash: string;
  readonly requested: string;
  readonly debited: string;
}

export interface SignerChangedPayload {
  readonly signer: string;
}

export interface FeeRecipientChangedPayload {
  readonly previousFeeRecipient: string;
  readonly feeRecipient: string;
}

export interface DelegateChangedPayload {
  readonly token: string;
  readonly depositor: string;
  readonly delegate: string;
}

export interface TokenSupportedPayload {
  readonly token: string;
}

export interface WithdrawalDelayChangedPayload {
  readonly previousDelay: string;
  readonly delay: string;
}

// =============================================================================
// Minter Events
// =============================================================================

export interface AttestationUsedPayload {
  readonly token: string;
  readonly recipient: string;
  readonly transferSpecHash: string;
  readonly sourceDomain: number;
  readonly sourceDepositor: string;
  readonly sourceSigner: string;
  readonly value: string;
}

// =============================================================================
// Event Type Constants
// =============================================================================

export const SETTLEMENT_EVENTS = {
  // Wallet
  DEPOSITED: "wallet.deposit.received",
  WITHDRAWAL_INITIATED: "wallet.withdrawal.initiated",
  WITHDRAWAL_COMPLETED: "wallet.withdrawal.completed",
  GATEWAY_BURNED: "wallet.burn.executed",
  INSUFFICIENT_BALANCE: "wallet.burn.insufficient-balance",
  BURN_SIGNER_ADDED: "wallet.burn-signer.added",
  BURN_SIGNER_REMOVED: "wallet.burn-signer.removed",
  FEE_RECIPIENT_CHANGED: "wallet.fee-recipient.changed",
  DELEGATE_ADDED: "wallet.delegate.added",
  DELEGATE_REMOVED: "wallet.delegate.removed",
  WALLET_TOKEN_SUPPORTED: "wallet.token.supported",
  WITHDRAWAL_DELAY_CHANGED: "wallet.withdrawal-delay.changed",

  // Minter
  ATTESTATION_USED: "minter.attestation.used",
  ATTESTATION_SIGNER_ADDED: "minter.attestation-signer.added",
  ATTESTATION_SIGNER_REMOVED: "minter.attestation-signer.removed",
  MINTER_TOKEN_SUPPORTED: "minter.token.supported",
} as const;

export type SettlementEventType = (typeof SETTLEMENT_EVENTS)[keyof typeof SETTLEMENT_EVENTS];

/** Payload shape of each settlement event type. */
export interface SettlementEventPayloads {
  readonly "wallet.deposit.received": DepositedPayload;
  readonly "wallet.withdrawal.initiated": WithdrawalInitiatedPayload;
  readonly "wallet.withdrawal.completed": WithdrawalCompletedPayload;
  readonly "wallet.burn.executed": GatewayBurnedPayload;
  readonly "wallet.burn.insufficient-balance": InsufficientBalancePayload;
  readonly "wallet.burn-signer.added": SignerChangedPayload;
  readonly "wallet.burn-signer.removed": SignerChangedPayload;
  readonly "wallet.fee-recipient.changed": FeeRecipientChangedPayload;
  readonly "wallet.delegate.added": DelegateChangedPayload;
  readonly "wallet.delegate.removed": DelegateChangedPayload;
  readonly "wallet.token.supported": TokenSupportedPayload;
  readonly "wallet.withdrawal-delay.changed": WithdrawalDelayChangedPayload;
  readonly "minter.attestation.used": AttestationUsedPayload;
  readonly "minter.attestation-signer.added": SignerChangedPayload;
  readonly "minter.attestation-signer.removed": SignerChangedPayload;
  readonly "minter.token.supported": TokenSupportedPayload;
}

// =============================================================================
// Schema Definitions
// =============================================================================

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

const DECIMAL = /^(0|[1-9][0-9]*)$/;
const HEX = /^0x[0-9a-fA-F]*$/;

function hasDecimal(obj: Record<string, unknown>, key: string): boolean {
  const v = obj[key];
  return typeof v === "string" && DECIMAL.test(v);
}

function hasHex(obj: Record<string, unknown>, key: string): boolean {
  const v = obj[key];
  return typeof v === "string" && HEX.test(v);
}

function hasNumber(obj: Record<string, unknown>, key: string): boolean {
  return typeof obj[key] === "number";
}

/** Payload validator requiring hex fields, decimal fields and numeric fields. */
function shape(
  hex: readonly string[],
  decimal: readonly string[] = [],
  numeric: readonly string[] = [],
): (p: unknown) => boolean {
  return (p) =>
    isObject(p) &&
    hex.every((k) => hasHex(p, k)) &&
    decimal.every((k) => hasDecimal(p, k)) &&
    numeric.every((k) => hasNumber(p, k));
}

const WALLET_SCHEMAS: readonly EventSchema[] = [
  {
    type: SETTLEMENT_EVENTS.DEPOSITED,
    version: 1,
    description: "Tokens were deposited and credited to a depositor's available balance",
    source: "wallet",
    validate: shape(["token", "depositor", "sender"], ["value"]),
  },
  {
    type: SETTLEMENT_EVENTS.WITHDRAWAL_INITIATED,
    version: 1,
    description: "Available balance was moved to withdrawing and the delay started",
    source: "wallet",
    validate: shape(
      ["token", "depositor"],
      ["value", "remainingAvailable", "totalWithdrawing", "withdrawableAtBlock"],
    ),
  },
  {
    type: SETTLEMENT_EVENTS.WITHDRAWAL_COMPLETED,
    version: 1,
    description: "A withdrawing balance was paid out after its delay",
    source: "wallet",
    validate: shape(["token", "depositor", "recipient"], ["value"]),
  },
  {
    type: SETTLEMENT_EVENTS.GATEWAY_BURNED,
    version: 1,
    description: "A burn intent was executed against a depositor's balance",
    source: "wallet",
    validate: shape(
      ["token", "depositor", "transferSpecHash", "destinationRecipient", "signer"],
      ["value", "fee", "fromAvailable", "fromWithdrawing"],
      ["destinationDomain"],
    ),
  },
  {
    type: SETTLEMENT_EVENTS.INSUFFICIENT_BALANCE,
    version: 1,
    description: "A burn debited less than its value plus fee",
    source: "wallet",
    validate: shape(["token", "depositor", "transferSpecHash"], ["requested", "debited"]),
  },
  {
    type: SETTLEMENT_EVENTS.BURN_SIGNER_ADDED,
    version: 1,
    description: "An address may now sign burn batches",
    source: "wallet",
    validate: shape(["signer"]),
  },
  {
    type: SETTLEMENT_EVENTS.BURN_SIGNER_REMOVED,
    version: 1,
    description: "An address may no longer sign burn batches",
    source: "wallet",
    validate: shape(["signer"]),
  },
  {
    type: SETTLEMENT_EVENTS.FEE_RECIPIENT_CHANGED,
    version: 1,
    description: "Burn fees now go to a different address",
    source: "wallet",
    validate: shape(["previousFeeRecipient", "feeRecipient"]),
  },
  {
    type: SETTLEMENT_EVENTS.DELEGATE_ADDED,
    version: 1,
    description: "A depositor authorized a delegate to sign burn intents",
    source: "wallet",
    validate: shape(["token", "depositor", "delegate"]),
  },
  {
    type: SETTLEMENT_EVENTS.DELEGATE_REMOVED,
    version: 1,
    description: "A depositor revoked a delegate",
    source: "wallet",
    validate: shape(["token", "depositor", "delegate"]),
  },
  {
    type: SETTLEMENT_EVENTS.WALLET_TOKEN_SUPPORTED,
    version: 1,
    description: "The wallet accepts deposits of a token",
    source: "wallet",
    validate: shape(["token"]),
  },
  {
    type: SETTLEMENT_EVENTS.WITHDRAWAL_DELAY_CHANGED,
    version: 1,
    description: "The number of blocks a withdrawal waits changed",
    source: "wallet",
    validate: shape([], ["previousDelay", "delay"]),
  },
];

const MINTER_SCHEMAS: readonly EventSchema[] = [
  {
    type: SETTLEMENT_EVENTS.ATTESTATION_USED,
    version: 1,
    description: "An attestation was redeemed and its value minted",
    source: "minter",
    validate: shape(
      ["token", "recipient", "transferSpecHash", "sourceDepositor", "sourceSigner"],
      ["value"],
      ["sourceDomain"],
    ),
  },
  {
    type: SETTLEMENT_EVENTS.ATTESTATION_SIGNER_ADDED,
    version: 1,
    description: "An address may now sign attestations",
    source: "minter",
    validate: shape(["signer"]),
  },
  {
    type: SETTLEMENT_EVENTS.ATTESTATION_SIGNER_REMOVED,
    version: 1,
    description: "An address may no longer sign attestations",
    source: "minter",
    validate: shape(["signer"]),
  },
  {
    type: SETTLEMENT_EVENTS.MINTER_TOKEN_SUPPORTED,
    version: 1,
    description: "The minter may mint a token",
    source: "minter",
    validate: shape(["token"]),
  },
];

/**
 * All settlement event schemas.
 */
export const SETTLEMENT_EVENT_SCHEMAS: readonly EventSchema[] = [
  ...WALLET_SCHEMAS,
  ...MINTER_SCHEMAS,
];

/**
 * Create a catalog with every settlement event registered.
 */
export function createSettlementCatalog(): EventCatalog {
  const catalog = new EventCatalog();
  for (const schema of SETTLEMENT_EVENT_SCHEMAS) {
    catalog.register(schema);
  }
  return catalog;
}
