/**
 * @keelway/codec — EIP-712 structured-data hashing.
 *
 * The wallet verifies burn intents and the minter verifies attestations
 * against EIP-712 digests. Struct hashes are computed straight from the
 * packed wire bytes (see the views); this module holds the type strings,
 * their hashes, the domain separators, and viem typed-data definitions
 * that off-chain signers feed to `signTypedData` to produce exactly the
 * digest the contracts recover against.
 */

import {
  concat,
  keccak256,
  toBytes,
  type Hex,
  type TypedDataDefinition,
} from "viem";
import type { Attestation, BurnIntent, TransferSpec } from "./types.js";

// =============================================================================
// Type strings
// =============================================================================

export const TRANSFER_SPEC_TYPE =
  "TransferSpec(uint32 version,uint32 sourceDomain,uint32 destinationDomain," +
  "bytes32 sourceContract,bytes32 destinationContract,bytes32 sourceToken," +
  "bytes32 destinationToken,bytes32 sourceDepositor,bytes32 destinationRecipient," +
  "bytes32 sourceSigner,bytes32 destinationCaller,uint256 value,bytes32 salt," +
  "bytes hookData)";

export const BURN_INTENT_TYPE =
  "BurnIntent(uint256 maxBlockHeight,uint256 maxFee,TransferSpec spec)" +
  TRANSFER_SPEC_TYPE;

export const BURN_INTENT_SET_TYPE =
  "BurnIntentSet(BurnIntent[] intents)" + BURN_INTENT_TYPE;

export const ATTESTATION_TYPE = "Attestation(TransferSpec spec)" + TRANSFER_SPEC_TYPE;

export const ATTESTATION_SET_TYPE =
  "AttestationSet(Attestation[] attestations)" + ATTESTATION_TYPE;

export const EIP712_DOMAIN_TYPE = "EIP712Domain(string name,string version)";

// =============================================================================
// Type hashes (computed once at load)
// =============================================================================

export const TRANSFER_SPEC_TYPEHASH: Hex = keccak256(toBytes(TRANSFER_SPEC_TYPE));
export const BURN_INTENT_TYPEHASH: Hex = keccak256(toBytes(BURN_INTENT_TYPE));
export const BURN_INTENT_SET_TYPEHASH: Hex = keccak256(toBytes(BURN_INTENT_SET_TYPE));
export const ATTESTATION_TYPEHASH: Hex = keccak256(toBytes(ATTESTATION_TYPE));
export const ATTESTATION_SET_TYPEHASH: Hex = keccak256(toBytes(ATTESTATION_SET_TYPE));
export const EIP712_DOMAIN_TYPEHASH: Hex = keccak256(toBytes(EIP712_DOMAIN_TYPE));

// =============================================================================
// Domains
// =============================================================================

export interface Eip712Domain {
  readonly name: string;
  readonly version: string;
}

export const WALLET_DOMAIN: Eip712Domain = Object.freeze({
  name: "GatewayWallet",
  version: "1",
});

export const MINTER_DOMAIN: Eip712Domain = Object.freeze({
  name: "GatewayMinter",
  version: "1",
});

export function domainSeparator(domain: Eip712Domain): Hex {
  return keccak256(
    concat([
      EIP712_DOMAIN_TYPEHASH,
      keccak256(toBytes(domain.name)),
      keccak256(toBytes(domain.version)),
    ]),
  );
}

/**
 * The digest a signer actually signs: `keccak256(0x1901 ‖ domainSeparator ‖ structHash)`.
 */
export function typedDataDigest(domain: Eip712Domain, structHash: Hex): Hex {
  return keccak256(concat(["0x1901", domainSeparator(domain), structHash]));
}

/**
 * EIP-712 hash of an array of structs: keccak256 of the concatenated
 * element struct hashes.
 */
export function hashStructArray(structHashes: readonly Hex[]): Hex {
  return keccak256(structHashes.length === 0 ? "0x" : concat([...structHashes]));
}

// =============================================================================
// viem typed-data definitions (for off-chain signers)
// =============================================================================

export const TYPED_DATA_TYPES = {
  TransferSpec: [
    { name: "version", type: "uint32" },
    { name: "sourceDomain", type: "uint32" },
    { name: "destinationDomain", type: "uint32" },
    { name: "sourceContract", type: "bytes32" },
    { name: "destinationContract", type: "bytes32" },
    { name: "sourceToken", type: "bytes32" },
    { name: "destinationToken", type: "bytes32" },
    { name: "sourceDepositor", type: "bytes32" },
    { name: "destinationRecipient", type: "bytes32" },
    { name: "sourceSigner", type: "bytes32" },
    { name: "destinationCaller", type: "bytes32" },
    { name: "value", type: "uint256" },
    { name: "salt", type: "bytes32" },
    { name: "hookData", type: "bytes" },
  ],
  BurnIntent: [
    { name: "maxBlockHeight", type: "uint256" },
    { name: "maxFee", type: "uint256" },
    { name: "spec", type: "TransferSpec" },
  ],
  BurnIntentSet: [{ name: "intents", type: "BurnIntent[]" }],
  Attestation: [{ name: "spec", type: "TransferSpec" }],
  AttestationSet: [{ name: "attestations", type: "Attestation[]" }],
} as const;

export type KeelwayTypedData = typeof TYPED_DATA_TYPES;

function specMessage(spec: TransferSpec) {
  return {
    version: spec.version,
    sourceDomain: spec.sourceDomain,
    destinationDomain: spec.destinationDomain,
    sourceContract: spec.sourceContract,
    destinationContract: spec.destinationContract,
    sourceToken: spec.sourceToken,
    destinationToken: spec.destinationToken,
    sourceDepositor: spec.sourceDepositor,
    destinationRecipient: spec.destinationRecipient,
    sourceSigner: spec.sourceSigner,
    destinationCaller: spec.destinationCaller,
    value: spec.value,
    salt: spec.salt,
    hookData: spec.hookData,
  };
}

function burnIntentMessage(intent: BurnIntent) {
  return {
    maxBlockHeight: intent.maxBlockHeight,
    maxFee: intent.maxFee,
    spec: specMessage(intent.spec),
  };
}

export function burnIntentTypedData(
  intent: BurnIntent,
): TypedDataDefinition<KeelwayTypedData, "BurnIntent"> {
  return {
    domain: { ...WALLET_DOMAIN },
    types: TYPED_DATA_TYPES,
    primaryType: "BurnIntent",
    message: burnIntentMessage(intent),
  };
}

export function burnIntentSetTypedData(
  intents: readonly BurnIntent[],
): TypedDataDefinition<KeelwayTypedData, "BurnIntentSet"> {
  return {
    domain: { ...WALLET_DOMAIN },
    types: TYPED_DATA_TYPES,
    primaryType: "BurnIntentSet",
    message: { intents: intents.map(burnIntentMessage) },
  };
}

export function attestationTypedData(
  attestation: Attestation,
): TypedDataDefinition<KeelwayTypedData, "Attestation"> {
  return {
    domain: { ...MINTER_DOMAIN },
    types: TYPED_DATA_TYPES,
    primaryType: "Attestation",
    message: { spec: specMessage(attestation.spec) },
  };
}

export function attestationSetTypedData(
  attestations: readonly Attestation[],
): TypedDataDefinition<KeelwayTypedData, "AttestationSet"> {
  return {
    domain: { ...MINTER_DOMAIN },
    types: TYPED_DATA_TYPES,
    primaryType: "AttestationSet",
    message: {
      attestations: attestations.map((a) => ({ spec: specMessage(a.spec) })),
    },
  };
}
