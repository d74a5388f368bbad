/**
 * @keelway/codec — Shared validation for payloads that wrap one TransferSpec.
 *
 * BurnIntent and Attestation share a shape: magic, version, a few
 * payload-specific fields, a declared `transferSpecLength`, and the
 * embedded TransferSpec. Their validation pipeline is identical apart
 * from the layout constants.
 */

import type { Hex } from "viem";
import { CodecError } from "./errors.js";
import { readUint32 } from "./bytes.js";
import { TransferSpecView, assertHeader, assertVersion } from "./transfer-spec.js";

/** Layout constants a wrapping payload must provide. */
export interface TransferPayloadLayout {
  readonly kind: "BurnIntent" | "Attestation";
  readonly MAGIC: number;
  readonly VERSION: number;
  readonly VERSION_OFFSET: number;
  readonly TRANSFER_SPEC_LENGTH_OFFSET: number;
  readonly TRANSFER_SPEC_OFFSET: number;
  readonly HEADER_LENGTH: number;
}

/**
 * Zero-copy view over a payload that wraps exactly one TransferSpec.
 *
 * Produced by a subclass's `cast`; `validate()` checks the payload and
 * its embedded spec. Accessors assume validation passed.
 */
export abstract class TransferPayloadView {
  readonly bytes: Uint8Array;
  private readonly _layout: TransferPayloadLayout;
  private _spec: TransferSpecView | undefined;

  protected constructor(bytes: Uint8Array, layout: TransferPayloadLayout) {
    this.bytes = bytes;
    this._layout = layout;
  }

  validate(): this {
    this._spec = validateTransferPayload(this.bytes, this._layout);
    return this;
  }

  /** The embedded TransferSpec (validated once `validate()` has run). */
  get spec(): TransferSpecView {
    return (
      this._spec ??
      TransferSpecView.cast(this.bytes.subarray(this._layout.TRANSFER_SPEC_OFFSET))
    );
  }

  get length(): number {
    return this.bytes.length;
  }

  /** EIP-712 struct hash of this payload type. */
  abstract getTypedDataHash(): Hex;
}

/**
 * Declared total length of the payload starting at `bytes[0]`: its own
 * header plus the TransferSpec length it declares.
 */
export function declaredPayloadLength(
  bytes: Uint8Array,
  layout: TransferPayloadLayout,
): number {
  return layout.HEADER_LENGTH + readUint32(bytes, layout.TRANSFER_SPEC_LENGTH_OFFSET);
}

/**
 * Validate a cast payload and return its embedded, validated TransferSpec.
 *
 * Order: own header length → own version → cast the embedded spec at
 * its offset, measured by its own hook data length → spec structure →
 * declared spec length and total length against the spec's own length.
 *
 * @throws {CodecError} HEADER_TOO_SHORT, INVALID_VERSION, DATA_TOO_SHORT,
 *   INVALID_MAGIC, OVERALL_LENGTH_MISMATCH,
 *   TRANSFER_PAYLOAD_OVERALL_LENGTH_MISMATCH
 */
export function validateTransferPayload(
  bytes: Uint8Array,
  layout: TransferPayloadLayout,
): TransferSpecView {
  assertHeader(bytes, layout.HEADER_LENGTH, layout.kind);
  assertVersion(bytes, layout.VERSION_OFFSET, layout.VERSION, layout.kind);

  const spec = TransferSpecView.castPrefix(bytes.subarray(layout.TRANSFER_SPEC_OFFSET)).validate();

  const declaredSpecLength = readUint32(bytes, layout.TRANSFER_SPEC_LENGTH_OFFSET);
  const expected = layout.HEADER_LENGTH + declaredSpecLength;
  if (declaredSpecLength !== spec.length || expected !== bytes.length) {
    throw new CodecError(
      "TRANSFER_PAYLOAD_OVERALL_LENGTH_MISMATCH",
      `${layout.kind} declares ${expected} bytes (spec ${declaredSpecLength}) but buffer holds ${bytes.length} (spec ${spec.length})`,
      {
        kind: layout.kind,
        expected,
        actual: bytes.length,
        declaredSpecLength,
        actualSpecLength: spec.length,
      },
    );
  }
  return spec;
}
