/**
 * @keelway/gateway — Gateway wallet and minter.
 *
 * The wallet holds deposits, runs delayed withdrawals and executes burn
 * batches; the minter verifies attestations and mints on the
 * destination domain.
 *
 * Design rules:
 * - Signatures are recovered before any state is touched
 * - A failing call changes nothing and emits nothing
 * - Every burn and mint marks its TransferSpec hash exactly once
 * - A burn short of balance burns what is there, fee first
 */

// Aggregates
export { GatewayWallet } from "./wallet.js";
export { GatewayMinter } from "./minter.js";

// Collaborators
export type { SignerRegistry } from "./signers.js";
export { InMemorySignerRegistry } from "./signers.js";
export type { Delegation, DelegationState } from "./delegation.js";
export { InMemoryDelegation } from "./delegation.js";
export type { TokenRegistry, TokenBank } from "./tokens.js";
export { InMemoryTokenRegistry, InMemoryTokenBank, PendingMoves } from "./tokens.js";
export { UsedHashSet } from "./used-hashes.js";
export { EventRecorder, PendingEvents } from "./events.js";
export { recoverSigner, sameAddress } from "./signatures.js";

// Types
export type {
  GatewayWalletOptions,
  GatewayMinterOptions,
  WithdrawalReceipt,
  BurnRecord,
  BurnReceipt,
  MintRecord,
  MintReceipt,
} from "./types.js";

// Errors
export type { GatewayErrorCode, GatewayErrorDetails, ElementPosition } from "./errors.js";
export { GatewayError } from "./errors.js";
