/**
 * Shared test values for codec tests.
 */

import type { Hex } from "viem";
import type { Attestation, BurnIntent, TransferSpec } from "../src/types.js";

/** Left-pad a short hex tag into a lowercase 32-byte word. */
export function word(tag: string): Hex {
  return `0x${tag.padStart(64, "0")}`;
}

export function makeSpec(overrides: Partial<TransferSpec> = {}): TransferSpec {
  return {
    version: 1,
    sourceDomain: 1,
    destinationDomain: 7,
    sourceContract: word("a1"),
    destinationContract: word("b1"),
    sourceToken: word("a2"),
    destinationToken: word("b2"),
    sourceDepositor: word("a3"),
    destinationRecipient: word("b3"),
    sourceSigner: word("a4"),
    destinationCaller: word("00"),
    value: 1_000_000n,
    salt: word("5a17"),
    hookData: "0x",
    ...overrides,
  };
}

export function makeIntent(overrides: Partial<BurnIntent> = {}): BurnIntent {
  return {
    version: 1,
    maxBlockHeight: 500n,
    maxFee: 2_000n,
    spec: makeSpec(),
    ...overrides,
  };
}

export function makeAttestation(spec: TransferSpec = makeSpec()): Attestation {
  return { version: 1, spec };
}

/** Copy `bytes` with a big-endian uint32 written at `offset`. */
export function withUint32(bytes: Uint8Array, offset: number, value: number): Uint8Array {
  const copy = bytes.slice();
  new DataView(copy.buffer).setUint32(offset, value, false);
  return copy;
}

/** Copy `bytes` with one extra trailing byte. */
export function withTrailingByte(bytes: Uint8Array): Uint8Array {
  const copy = new Uint8Array(bytes.length + 1);
  copy.set(bytes);
  return copy;
}
