/**
 * @keelway/codec — TransferSpec codec.
 *
 * A TransferSpec is a 340-byte fixed header followed by
 * `hookDataLength` bytes of opaque hook data. The same bytes are hashed
 * for replay protection, hashed again (EIP-712) for signing, and decoded
 * independently by the wallet and the minter.
 *
 * Usage:
 * - `TransferSpecView.cast(bytes)` — magic check only, zero-copy
 * - `view.validate()` — header length, version, overall length
 * - accessors — offset reads against the caller's buffer
 * - `encodeTransferSpec` / `decodeTransferSpec` — value round trip
 */

import { bytesToHex, concat, hexToBytes, keccak256, type Hex } from "viem";
import type { Bytes32 } from "@keelway/types";
import {
  MAX_UINT32_VALUE,
  MIN_CAST_LENGTH,
  TRANSFER_SPEC,
  formatMagic,
} from "./constants.js";
import { CodecError } from "./errors.js";
import {
  readBytes32,
  readSlice,
  readUint256,
  readUint32,
  writeBytes,
  writeBytes32,
  writeUint256,
  writeUint32,
} from "./bytes.js";
import {
  assertBytes32Field,
  assertHexField,
  assertUint256Field,
  assertUint32Field,
} from "./fields.js";
import { TRANSFER_SPEC_TYPEHASH } from "./typed-data.js";
import type { TransferSpec } from "./types.js";

const T = TRANSFER_SPEC;

/** Byte span holding the ten 32-byte fields hashed verbatim into the struct hash. */
const WORD_FIELDS_START = T.SOURCE_CONTRACT_OFFSET;
const WORD_FIELDS_END = T.HOOK_DATA_LENGTH_OFFSET;

/**
 * Check length and magic of a payload. Shared by every cast.
 */
export function assertCastable(
  bytes: Uint8Array,
  expectedMagic: number,
  kind: string,
): void {
  if (bytes.length < MIN_CAST_LENGTH) {
    throw new CodecError(
      "DATA_TOO_SHORT",
      `${kind} needs at least ${MIN_CAST_LENGTH} bytes, got ${bytes.length}`,
      { kind, expected: MIN_CAST_LENGTH, actual: bytes.length },
    );
  }
  const magic = readUint32(bytes, 0);
  if (magic !== expectedMagic) {
    throw new CodecError(
      "INVALID_MAGIC",
      `${kind} magic mismatch: expected ${formatMagic(expectedMagic)}, got ${formatMagic(magic)}`,
      { kind, expected: formatMagic(expectedMagic), actual: formatMagic(magic) },
    );
  }
}

/**
 * Check a payload's own version field.
 */
export function assertVersion(
  bytes: Uint8Array,
  offset: number,
  expected: number,
  kind: string,
): void {
  const version = readUint32(bytes, offset);
  if (version !== expected) {
    throw new CodecError(
      "INVALID_VERSION",
      `${kind} version mismatch: expected ${expected}, got ${version}`,
      { kind, expected, actual: version },
    );
  }
}

/**
 * Check that a buffer holds at least a full fixed header.
 */
export function assertHeader(bytes: Uint8Array, headerLength: number, kind: string): void {
  if (bytes.length < headerLength) {
    throw new CodecError(
      "HEADER_TOO_SHORT",
      `${kind} header needs ${headerLength} bytes, got ${bytes.length}`,
      { kind, expected: headerLength, actual: bytes.length },
    );
  }
}

// =============================================================================
// View
// =============================================================================

/**
 * Typed, zero-copy view over an encoded TransferSpec.
 *
 * Accessors assume `validate()` has passed. Called earlier they still
 * never read out of bounds: a short buffer throws BYTES_OUT_OF_BOUNDS.
 */
export class TransferSpecView {
  readonly bytes: Uint8Array;

  private constructor(bytes: Uint8Array) {
    this.bytes = bytes;
  }

  /**
   * Wrap `bytes` after checking its length and magic.
   * @throws {CodecError} DATA_TOO_SHORT, INVALID_MAGIC
   */
  static cast(bytes: Uint8Array): TransferSpecView {
    assertCastable(bytes, T.MAGIC, "TransferSpec");
    return new TransferSpecView(bytes);
  }

  /**
   * Cast the TransferSpec at the start of `bytes`, bounded by the length
   * it declares for itself. Anything after it is left to the caller.
   * @throws {CodecError} DATA_TOO_SHORT, INVALID_MAGIC
   */
  static castPrefix(bytes: Uint8Array): TransferSpecView {
    const view = TransferSpecView.cast(bytes);
    if (bytes.length < T.HEADER_LENGTH) return view;
    return new TransferSpecView(bytes.subarray(0, T.HEADER_LENGTH + view.hookDataLength));
  }

  /**
   * Structural validation.
   * @throws {CodecError} HEADER_TOO_SHORT, INVALID_VERSION, OVERALL_LENGTH_MISMATCH
   */
  validate(): this {
    assertHeader(this.bytes, T.HEADER_LENGTH, "TransferSpec");
    assertVersion(this.bytes, T.VERSION_OFFSET, T.VERSION, "TransferSpec");

    const expected = T.HEADER_LENGTH + this.hookDataLength;
    if (expected !== this.bytes.length) {
      throw new CodecError(
        "OVERALL_LENGTH_MISMATCH",
        `TransferSpec declares ${expected} bytes but buffer holds ${this.bytes.length}`,
        { kind: "TransferSpec", expected, actual: this.bytes.length },
      );
    }
    return this;
  }

  /** Total encoded length (header plus hook data). */
  get length(): number {
    return this.bytes.length;
  }

  get version(): number {
    return readUint32(this.bytes, T.VERSION_OFFSET);
  }

  get sourceDomain(): number {
    return readUint32(this.bytes, T.SOURCE_DOMAIN_OFFSET);
  }

  get destinationDomain(): number {
    return readUint32(this.bytes, T.DESTINATION_DOMAIN_OFFSET);
  }

  get sourceContract(): Bytes32 {
    return readBytes32(this.bytes, T.SOURCE_CONTRACT_OFFSET);
  }

  get destinationContract(): Bytes32 {
    return readBytes32(this.bytes, T.DESTINATION_CONTRACT_OFFSET);
  }

  get sourceToken(): Bytes32 {
    return readBytes32(this.bytes, T.SOURCE_TOKEN_OFFSET);
  }

  get destinationToken(): Bytes32 {
    return readBytes32(this.bytes, T.DESTINATION_TOKEN_OFFSET);
  }

  get sourceDepositor(): Bytes32 {
    return readBytes32(this.bytes, T.SOURCE_DEPOSITOR_OFFSET);
  }

  get destinationRecipient(): Bytes32 {
    return readBytes32(this.bytes, T.DESTINATION_RECIPIENT_OFFSET);
  }

  get sourceSigner(): Bytes32 {
    return readBytes32(this.bytes, T.SOURCE_SIGNER_OFFSET);
  }

  get destinationCaller(): Bytes32 {
    return readBytes32(this.bytes, T.DESTINATION_CALLER_OFFSET);
  }

  get value(): bigint {
    return readUint256(this.bytes, T.VALUE_OFFSET);
  }

  get salt(): Bytes32 {
    return readBytes32(this.bytes, T.SALT_OFFSET);
  }

  get hookDataLength(): number {
    return readUint32(this.bytes, T.HOOK_DATA_LENGTH_OFFSET);
  }

  /** Zero-copy view of the hook data; empty when the length is zero. */
  getHookData(): Uint8Array {
    return readSlice(this.bytes, T.HOOK_DATA_OFFSET, this.hookDataLength);
  }

  /** keccak256 of the complete encoded bytes: the replay-protection key. */
  getHash(): Hex {
    return keccak256(this.bytes);
  }

  /** EIP-712 struct hash of the TransferSpec type. */
  getTypedDataHash(): Hex {
    const words = readSlice(this.bytes, WORD_FIELDS_START, WORD_FIELDS_END - WORD_FIELDS_START);
    return keccak256(
      concat([
        hexToBytes(TRANSFER_SPEC_TYPEHASH),
        uint32Word(this.version),
        uint32Word(this.sourceDomain),
        uint32Word(this.destinationDomain),
        words,
        hexToBytes(keccak256(this.getHookData())),
      ]),
    );
  }

  /** Copy every field out into a plain value. */
  toTransferSpec(): TransferSpec {
    return {
      version: this.version,
      sourceDomain: this.sourceDomain,
      destinationDomain: this.destinationDomain,
      sourceContract: this.sourceContract,
      destinationContract: this.destinationContract,
      sourceToken: this.sourceToken,
      destinationToken: this.destinationToken,
      sourceDepositor: this.sourceDepositor,
      destinationRecipient: this.destinationRecipient,
      sourceSigner: this.sourceSigner,
      destinationCaller: this.destinationCaller,
      value: this.value,
      salt: this.salt,
      hookData: bytesToHex(this.getHookData()),
    };
  }
}

function uint32Word(value: number): Uint8Array {
  const word = new Uint8Array(32);
  writeUint32(word, 28, value);
  return word;
}

// =============================================================================
// Encode / decode
// =============================================================================

/**
 * Serialize a TransferSpec into its wire layout.
 *
 * @throws {CodecError} HOOK_DATA_TOO_LARGE, FIELD_OUT_OF_RANGE
 */
export function encodeTransferSpec(spec: TransferSpec): Uint8Array {
  assertHexField("hookData", spec.hookData);
  const hookData = hexToBytes(spec.hookData);
  if (hookData.length > MAX_UINT32_VALUE) {
    throw new CodecError(
      "HOOK_DATA_TOO_LARGE",
      `Hook data of ${hookData.length} bytes exceeds ${MAX_UINT32_VALUE}`,
      { actual: hookData.length, max: MAX_UINT32_VALUE },
    );
  }

  assertUint32Field("version", spec.version);
  assertUint32Field("sourceDomain", spec.sourceDomain);
  assertUint32Field("destinationDomain", spec.destinationDomain);
  assertUint256Field("value", spec.value);

  const words: readonly (readonly [string, Bytes32, number])[] = [
    ["sourceContract", spec.sourceContract, T.SOURCE_CONTRACT_OFFSET],
    ["destinationContract", spec.destinationContract, T.DESTINATION_CONTRACT_OFFSET],
    ["sourceToken", spec.sourceToken, T.SOURCE_TOKEN_OFFSET],
    ["destinationToken", spec.destinationToken, T.DESTINATION_TOKEN_OFFSET],
    ["sourceDepositor", spec.sourceDepositor, T.SOURCE_DEPOSITOR_OFFSET],
    ["destinationRecipient", spec.destinationRecipient, T.DESTINATION_RECIPIENT_OFFSET],
    ["sourceSigner", spec.sourceSigner, T.SOURCE_SIGNER_OFFSET],
    ["destinationCaller", spec.destinationCaller, T.DESTINATION_CALLER_OFFSET],
    ["salt", spec.salt, T.SALT_OFFSET],
  ];
  for (const [field, word] of words) {
    assertBytes32Field(field, word);
  }

  const out = new Uint8Array(T.HEADER_LENGTH + hookData.length);
  writeUint32(out, T.MAGIC_OFFSET, T.MAGIC);
  writeUint32(out, T.VERSION_OFFSET, spec.version);
  writeUint32(out, T.SOURCE_DOMAIN_OFFSET, spec.sourceDomain);
  writeUint32(out, T.DESTINATION_DOMAIN_OFFSET, spec.destinationDomain);
  for (const [, word, offset] of words) {
    writeBytes32(out, offset, word);
  }
  writeUint256(out, T.VALUE_OFFSET, spec.value);
  writeUint32(out, T.HOOK_DATA_LENGTH_OFFSET, hookData.length);
  writeBytes(out, T.HOOK_DATA_OFFSET, hookData);
  return out;
}

/**
 * Cast, validate and read a TransferSpec.
 */
export function decodeTransferSpec(bytes: Uint8Array): TransferSpec {
  return TransferSpecView.cast(bytes).validate().toTransferSpec();
}

/**
 * Replay-protection key of a TransferSpec value.
 */
export function transferSpecHash(spec: TransferSpec): Hex {
  return keccak256(encodeTransferSpec(spec));
}
