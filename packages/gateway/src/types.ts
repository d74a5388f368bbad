/**
 * @keelway/gateway — Configuration and result types.
 */

import type { Hex } from "viem";
import type { Address, Bytes32, DomainId } from "@keelway/types";
import type { EventStore } from "@keelway/event-store";
import type { BlockClock } from "@keelway/ledger";
import type { Delegation } from "./delegation.js";
import type { SignerRegistry } from "./signers.js";
import type { TokenBank, TokenRegistry } from "./tokens.js";

// =============================================================================
// Configuration
// =============================================================================

export interface GatewayWalletOptions {
  /** The wallet's own address; intents must name it as `sourceContract`. */
  readonly address: Address;
  readonly localDomain: DomainId;
  readonly feeRecipient: Address;
  /** Blocks between initiating and completing a withdrawal. */
  readonly withdrawalDelay: bigint;
  readonly clock: BlockClock;
  readonly bank: TokenBank;
  readonly eventStore: EventStore;
  readonly burnSigners?: SignerRegistry;
  readonly tokens?: TokenRegistry;
  readonly delegation?: Delegation;
}

export interface GatewayMinterOptions {
  /** The minter's own address; attestations must name it as `destinationContract`. */
  readonly address: Address;
  readonly localDomain: DomainId;
  readonly clock: BlockClock;
  readonly bank: TokenBank;
  readonly eventStore: EventStore;
  readonly attestationSigners?: SignerRegistry;
  readonly tokens?: TokenRegistry;
}

// =============================================================================
// Results
// =============================================================================

export interface WithdrawalReceipt {
  readonly token: Address;
  readonly depositor: Address;
  readonly value: bigint;
  readonly withdrawableAtBlock: bigint;
}

/** One executed burn intent. */
export interface BurnRecord {
  readonly batchIndex: number;
  readonly intentIndex: number;
  readonly depositor: Address;
  readonly signer: Address;
  readonly transferSpecHash: Hex;
  readonly destinationDomain: DomainId;
  readonly value: bigint;
  readonly fee: bigint;
  readonly fromAvailable: bigint;
  readonly fromWithdrawing: bigint;
  /** Debit fell short of `value + requested fee`. */
  readonly insufficient: boolean;
}

export interface BurnReceipt {
  readonly correlationId: string;
  readonly burnSigner: Address;
  readonly token: Address;
  /** Value destroyed (everything debited minus fees). */
  readonly burned: bigint;
  /** Fees paid to the fee recipient. */
  readonly fee: bigint;
  readonly burns: readonly BurnRecord[];
}

/** One executed attestation. */
export interface MintRecord {
  readonly intentIndex: number;
  readonly token: Address;
  readonly recipient: Address;
  readonly transferSpecHash: Hex;
  readonly sourceDomain: DomainId;
  readonly sourceDepositor: Bytes32;
  readonly value: bigint;
}

export interface MintReceipt {
  readonly correlationId: string;
  readonly attestationSigner: Address;
  readonly mints: readonly MintRecord[];
}
