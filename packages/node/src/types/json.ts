/**
 * JSON views of domain values.
 *
 * Domain results carry bigint amounts, which JSON cannot hold; these
 * views render every uint256 as a base-10 string and leave the rest
 * as it is.
 */

import type { Attestation, BurnIntent, TransferSpec } from "@keelway/codec";
import type { BalanceEntry } from "@keelway/ledger";
import type {
  BurnReceipt,
  BurnRecord,
  MintReceipt,
  MintRecord,
  WithdrawalReceipt,
} from "@keelway/gateway";

/** Replace every bigint field of `T` with its string form. */
export type JsonView<T> = {
  readonly [K in keyof T]: T[K] extends bigint ? string : T[K];
};

export type TransferSpecJson = JsonView<TransferSpec>;

export interface BurnIntentJson extends Omit<JsonView<BurnIntent>, "spec"> {
  readonly spec: TransferSpecJson;
}

export interface AttestationJson {
  readonly version: number;
  readonly spec: TransferSpecJson;
}

export interface BurnReceiptJson extends Omit<JsonView<BurnReceipt>, "burns"> {
  readonly burns: readonly JsonView<BurnRecord>[];
}

export interface MintReceiptJson extends Omit<MintReceipt, "mints"> {
  readonly mints: readonly JsonView<MintRecord>[];
}

export function transferSpecToJson(spec: TransferSpec): TransferSpecJson {
  return { ...spec, value: spec.value.toString() };
}

export function burnIntentToJson(intent: BurnIntent): BurnIntentJson {
  return {
    version: intent.version,
    maxBlockHeight: intent.maxBlockHeight.toString(),
    maxFee: intent.maxFee.toString(),
    spec: transferSpecToJson(intent.spec),
  };
}

export function attestationToJson(attestation: Attestation): AttestationJson {
  return { version: attestation.version, spec: transferSpecToJson(attestation.spec) };
}

export function balanceEntryToJson(entry: BalanceEntry): JsonView<BalanceEntry> {
  return {
    token: entry.token,
    depositor: entry.depositor,
    available: entry.available.toString(),
    withdrawing: entry.withdrawing.toString(),
    withdrawableAtBlock: entry.withdrawableAtBlock.toString(),
  };
}

export function withdrawalReceiptToJson(receipt: WithdrawalReceipt): JsonView<WithdrawalReceipt> {
  return {
    token: receipt.token,
    depositor: receipt.depositor,
    value: receipt.value.toString(),
    withdrawableAtBlock: receipt.withdrawableAtBlock.toString(),
  };
}

function burnRecordToJson(record: BurnRecord): JsonView<BurnRecord> {
  return {
    ...record,
    value: record.value.toString(),
    fee: record.fee.toString(),
    fromAvailable: record.fromAvailable.toString(),
    fromWithdrawing: record.fromWithdrawing.toString(),
  };
}

export function burnReceiptToJson(receipt: BurnReceipt): BurnReceiptJson {
  return {
    correlationId: receipt.correlationId,
    burnSigner: receipt.burnSigner,
    token: receipt.token,
    burned: receipt.burned.toString(),
    fee: receipt.fee.toString(),
    burns: receipt.burns.map(burnRecordToJson),
  };
}

export function mintReceiptToJson(receipt: MintReceipt): MintReceiptJson {
  return {
    correlationId: receipt.correlationId,
    attestationSigner: receipt.attestationSigner,
    mints: receipt.mints.map((mint) => ({ ...mint, value: mint.value.toString() })),
  };
}
