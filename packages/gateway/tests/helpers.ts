/**
 * Shared fixtures for gateway tests: accounts, specs, signed payloads.
 */

import { bytesToHex, keccak256, type Hex } from "viem";
import { privateKeyToAccount, type PrivateKeyAccount } from "viem/accounts";
import type { Address, DomainEvent } from "@keelway/types";
import { ZERO_BYTES32 } from "@keelway/types";
import {
  addressToBytes32,
  attestationSetTypedData,
  attestationTypedData,
  burnIntentSetTypedData,
  burnIntentTypedData,
  encodeAttestation,
  encodeAttestationSet,
  encodeBurnBatch,
  encodeBurnIntent,
  encodeBurnIntentSet,
  CodecError,
  type Attestation,
  type BurnIntent,
  type TransferSpec,
} from "@keelway/codec";
import { InMemoryEventStore, type AppendResult } from "@keelway/event-store";
import { LedgerError, ManualBlockClock } from "@keelway/ledger";
import { GatewayError } from "../src/errors.js";
import { GatewayMinter } from "../src/minter.js";
import { InMemorySignerRegistry } from "../src/signers.js";
import { InMemoryTokenBank, InMemoryTokenRegistry } from "../src/tokens.js";
import { GatewayWallet } from "../src/wallet.js";

// ─── Addresses and accounts ──────────────────────────────────────────────

export const LOCAL_DOMAIN = 1;
export const REMOTE_DOMAIN = 7;

export const TOKEN: Address = "0x00000000000000000000000000000000000000C1";
export const OTHER_TOKEN: Address = "0x00000000000000000000000000000000000000C2";
export const UNLISTED_TOKEN: Address = "0x00000000000000000000000000000000000000C9";
export const WALLET: Address = "0x00000000000000000000000000000000000000E1";
export const MINTER: Address = "0x00000000000000000000000000000000000000E2";
export const FEE_RECIPIENT: Address = "0x00000000000000000000000000000000000000F1";
export const RECIPIENT: Address = "0x00000000000000000000000000000000000000B3";

export const depositor = privateKeyToAccount(`0x${"11".repeat(32)}`);
export const delegate = privateKeyToAccount(`0x${"22".repeat(32)}`);
export const burnSigner = privateKeyToAccount(`0x${"33".repeat(32)}`);
export const attester = privateKeyToAccount(`0x${"44".repeat(32)}`);
export const stranger = privateKeyToAccount(`0x${"55".repeat(32)}`);

export const START_BLOCK = 100n;
export const WITHDRAWAL_DELAY = 10n;

// ─── Values ──────────────────────────────────────────────────────────────

let saltCounter = 0;

export function makeSpec(overrides: Partial<TransferSpec> = {}): TransferSpec {
  saltCounter++;
  return {
    version: 1,
    sourceDomain: LOCAL_DOMAIN,
    destinationDomain: REMOTE_DOMAIN,
    sourceContract: addressToBytes32(WALLET),
    destinationContract: addressToBytes32(MINTER),
    sourceToken: addressToBytes32(TOKEN),
    destinationToken: addressToBytes32(TOKEN),
    sourceDepositor: addressToBytes32(depositor.address),
    destinationRecipient: addressToBytes32(RECIPIENT),
    sourceSigner: addressToBytes32(depositor.address),
    destinationCaller: ZERO_BYTES32,
    value: 100n,
    salt: `0x${saltCounter.toString(16).padStart(64, "0")}`,
    hookData: "0x",
    ...overrides,
  };
}

export function makeIntent(
  specOverrides: Partial<TransferSpec> = {},
  limits: { maxBlockHeight?: bigint; maxFee?: bigint } = {},
): BurnIntent {
  return {
    version: 1,
    maxBlockHeight: limits.maxBlockHeight ?? 1_000n,
    maxFee: limits.maxFee ?? 50n,
    spec: makeSpec(specOverrides),
  };
}

// ─── Signing ─────────────────────────────────────────────────────────────

export interface SignedPayload {
  readonly payload: Hex;
  readonly signature: Hex;
}

/** Encode one intent, or a set when given several, and sign it. */
export async function signIntents(
  account: PrivateKeyAccount,
  intents: readonly BurnIntent[],
): Promise<SignedPayload> {
  const [only] = intents;
  if (intents.length === 1 && only !== undefined) {
    return {
      payload: bytesToHex(encodeBurnIntent(only)),
      signature: await account.signTypedData(burnIntentTypedData(only)),
    };
  }
  return {
    payload: bytesToHex(encodeBurnIntentSet(intents)),
    signature: await account.signTypedData(burnIntentSetTypedData(intents)),
  };
}

export async function signAttestations(
  account: PrivateKeyAccount,
  attestations: readonly Attestation[],
): Promise<SignedPayload> {
  const [only] = attestations;
  if (attestations.length === 1 && only !== undefined) {
    return {
      payload: bytesToHex(encodeAttestation(only)),
      signature: await account.signTypedData(attestationTypedData(only)),
    };
  }
  return {
    payload: bytesToHex(encodeAttestationSet(attestations)),
    signature: await account.signTypedData(attestationSetTypedData(attestations)),
  };
}

export interface BurnEntry extends SignedPayload {
  readonly fees: readonly bigint[];
}

export interface EncodedBurn {
  readonly batch: Hex;
  readonly signature: Hex;
}

/** ABI-encode a batch and sign its keccak256 with `signer`. */
export async function encodeBurn(
  entries: readonly BurnEntry[],
  signer: PrivateKeyAccount = burnSigner,
): Promise<EncodedBurn> {
  const batch = encodeBurnBatch({
    intents: entries.map((e) => e.payload),
    signatures: entries.map((e) => e.signature),
    fees: entries.map((e) => e.fees),
  });
  return { batch, signature: await signer.sign({ hash: keccak256(batch) }) };
}

// ─── Aggregates ──────────────────────────────────────────────────────────

/** Event store that refuses any append carrying an event of `refusedType`. */
export class RefusingEventStore extends InMemoryEventStore {
  refusedType: string | undefined;

  override append(streamId: string, events: readonly DomainEvent[]): AppendResult {
    if (events.some((e) => e.type === this.refusedType)) {
      throw new Error("event log unavailable");
    }
    return super.append(streamId, events);
  }
}

export function setupWallet(store: InMemoryEventStore = new InMemoryEventStore()) {
  const clock = new ManualBlockClock(START_BLOCK);
  const bank = new InMemoryTokenBank();
  const wallet = new GatewayWallet({
    address: WALLET,
    localDomain: LOCAL_DOMAIN,
    feeRecipient: FEE_RECIPIENT,
    withdrawalDelay: WITHDRAWAL_DELAY,
    clock,
    bank,
    eventStore: store,
    burnSigners: new InMemorySignerRegistry([burnSigner.address]),
    tokens: new InMemoryTokenRegistry([TOKEN, OTHER_TOKEN]),
  });

  /** Give `holder` tokens and deposit them. */
  function fund(holder: Address, value: bigint, token: Address = TOKEN): void {
    bank.credit(token, holder, value);
    wallet.deposit(token, holder, value);
  }

  return { clock, bank, store, wallet, fund };
}

export function setupMinter(store: InMemoryEventStore = new InMemoryEventStore()) {
  const clock = new ManualBlockClock(START_BLOCK);
  const bank = new InMemoryTokenBank();
  const minter = new GatewayMinter({
    address: MINTER,
    localDomain: REMOTE_DOMAIN,
    clock,
    bank,
    eventStore: store,
    attestationSigners: new InMemorySignerRegistry([attester.address]),
    tokens: new InMemoryTokenRegistry([TOKEN]),
  });
  return { clock, bank, store, minter };
}

// ─── Error inspection ────────────────────────────────────────────────────

export interface Failure {
  readonly code: string;
  readonly details: Readonly<Record<string, unknown>>;
}

function toFailure(err: unknown): Failure {
  if (err instanceof GatewayError || err instanceof LedgerError || err instanceof CodecError) {
    return { code: err.code, details: err.details };
  }
  throw err;
}

export function failureOf(fn: () => unknown): Failure {
  try {
    fn();
  } catch (err) {
    return toFailure(err);
  }
  return { code: "NO_ERROR", details: {} };
}

export async function asyncFailureOf(promise: Promise<unknown>): Promise<Failure> {
  try {
    await promise;
  } catch (err) {
    return toFailure(err);
  }
  return { code: "NO_ERROR", details: {} };
}
