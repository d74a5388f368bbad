/**
 * @keelway/codec — Decoded payload shapes.
 *
 * Plain readonly records produced by `decode*` and consumed by
 * `encode*`. On the wire each of these is a packed binary layout
 * (see constants.ts); in memory they are ordinary values.
 */

import type { Bytes32, Hex } from "@keelway/types";

/**
 * One transfer: who burns what on the source domain, and who receives
 * what on the destination domain.
 */
export interface TransferSpec {
  readonly version: number;
  readonly sourceDomain: number;
  readonly destinationDomain: number;
  readonly sourceContract: Bytes32;
  readonly destinationContract: Bytes32;
  readonly sourceToken: Bytes32;
  readonly destinationToken: Bytes32;
  readonly sourceDepositor: Bytes32;
  readonly destinationRecipient: Bytes32;
  readonly sourceSigner: Bytes32;
  /** Zero word means anyone may submit the mint. */
  readonly destinationCaller: Bytes32;
  readonly value: bigint;
  readonly salt: Bytes32;
  /** Opaque application payload, uninterpreted by the settlement core. */
  readonly hookData: Hex;
}

/** A depositor's signed request to burn a source balance. */
export interface BurnIntent {
  readonly version: number;
  readonly maxBlockHeight: bigint;
  readonly maxFee: bigint;
  readonly spec: TransferSpec;
}

/** An operator's signed permission to mint on the destination domain. */
export interface Attestation {
  readonly version: number;
  readonly spec: TransferSpec;
}
