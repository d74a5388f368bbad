/**
 * @keelway/codec — BurnIntentSet / AttestationSet.
 *
 * Layout: magic ‖ version ‖ numElements ‖ element₀ ‖ element₁ ‖ …
 *
 * Elements are self-length-describing, so a set is validated by walking
 * element headers only. Full per-element validation is deferred to the
 * cursor that visits them.
 */

import { concat, hexToBytes, keccak256, type Hex } from "viem";
import { ATTESTATION_SET, BURN_INTENT_SET, MAX_UINT32_VALUE, formatMagic } from "./constants.js";
import { CodecError } from "./errors.js";
import { readUint32, writeBytes, writeUint32 } from "./bytes.js";
import { assertCastable, assertHeader, assertVersion } from "./transfer-spec.js";
import { declaredPayloadLength, type TransferPayloadLayout } from "./transfer-payload.js";
import { BURN_INTENT_LAYOUT, encodeBurnIntent } from "./burn-intent.js";
import { ATTESTATION_LAYOUT, encodeAttestation } from "./attestation.js";
import {
  ATTESTATION_SET_TYPEHASH,
  BURN_INTENT_SET_TYPEHASH,
  hashStructArray,
} from "./typed-data.js";
import type { Attestation, BurnIntent } from "./types.js";

/** Layout of a set plus the layout of its elements. */
export interface PayloadSetLayout {
  readonly kind: "BurnIntentSet" | "AttestationSet";
  readonly MAGIC: number;
  readonly VERSION: number;
  readonly VERSION_OFFSET: number;
  readonly NUM_ELEMENTS_OFFSET: number;
  readonly ELEMENTS_OFFSET: number;
  readonly HEADER_LENGTH: number;
  readonly TYPEHASH: Hex;
  readonly element: TransferPayloadLayout;
}

export const BURN_INTENT_SET_LAYOUT: PayloadSetLayout = Object.freeze({
  kind: "BurnIntentSet",
  ...BURN_INTENT_SET,
  TYPEHASH: BURN_INTENT_SET_TYPEHASH,
  element: BURN_INTENT_LAYOUT,
});

export const ATTESTATION_SET_LAYOUT: PayloadSetLayout = Object.freeze({
  kind: "AttestationSet",
  ...ATTESTATION_SET,
  TYPEHASH: ATTESTATION_SET_TYPEHASH,
  element: ATTESTATION_LAYOUT,
});

/** Byte range of one element inside a set buffer. */
export interface ElementSpan {
  readonly offset: number;
  readonly length: number;
}

// =============================================================================
// Validation
// =============================================================================

/** Check a set buffer's length and magic. */
export function castPayloadSet(bytes: Uint8Array, layout: PayloadSetLayout): void {
  assertCastable(bytes, layout.MAGIC, layout.kind);
}

/**
 * Walk every element header and return the element spans.
 *
 * Order: header length → version → per element (header room, declared
 * length room, element magic) → final offset equals buffer length.
 *
 * @throws {CodecError} HEADER_TOO_SHORT, INVALID_VERSION,
 *   ELEMENT_HEADER_TOO_SHORT, ELEMENT_TOO_SHORT, INVALID_ELEMENT_MAGIC,
 *   OVERALL_LENGTH_MISMATCH
 */
export function validatePayloadSet(
  bytes: Uint8Array,
  layout: PayloadSetLayout,
): readonly ElementSpan[] {
  assertHeader(bytes, layout.HEADER_LENGTH, layout.kind);
  assertVersion(bytes, layout.VERSION_OFFSET, layout.VERSION, layout.kind);

  const numElements = readUint32(bytes, layout.NUM_ELEMENTS_OFFSET);
  const element = layout.element;
  const spans: ElementSpan[] = [];
  let offset = layout.ELEMENTS_OFFSET;

  for (let index = 0; index < numElements; index++) {
    const remaining = bytes.length - offset;
    if (remaining < element.HEADER_LENGTH) {
      throw new CodecError(
        "ELEMENT_HEADER_TOO_SHORT",
        `${layout.kind} element ${index} needs a ${element.HEADER_LENGTH}-byte header, ${remaining} bytes remain`,
        { kind: layout.kind, index, expected: element.HEADER_LENGTH, actual: remaining },
      );
    }

    const elementBytes = bytes.subarray(offset);
    const length = declaredPayloadLength(elementBytes, element);
    if (remaining < length) {
      throw new CodecError(
        "ELEMENT_TOO_SHORT",
        `${layout.kind} element ${index} declares ${length} bytes, ${remaining} bytes remain`,
        { kind: layout.kind, index, expected: length, actual: remaining },
      );
    }

    const magic = readUint32(elementBytes, 0);
    if (magic !== element.MAGIC) {
      throw new CodecError(
        "INVALID_ELEMENT_MAGIC",
        `${layout.kind} element ${index} magic mismatch: expected ${formatMagic(element.MAGIC)}, got ${formatMagic(magic)}`,
        {
          kind: layout.kind,
          index,
          expected: formatMagic(element.MAGIC),
          actual: formatMagic(magic),
        },
      );
    }

    spans.push({ offset, length });
    offset += length;
  }

  if (offset !== bytes.length) {
    throw new CodecError(
      "OVERALL_LENGTH_MISMATCH",
      `${layout.kind} elements end at ${offset} but buffer holds ${bytes.length}`,
      { kind: layout.kind, expected: offset, actual: bytes.length },
    );
  }
  return spans;
}

/**
 * Typed-data hash of a set from its elements' struct hashes:
 * `keccak256(SET_TYPEHASH ‖ keccak256(concat(elementHashes)))`.
 */
export function payloadSetTypedDataHash(
  layout: PayloadSetLayout,
  elementHashes: readonly Hex[],
): Hex {
  return keccak256(
    concat([hexToBytes(layout.TYPEHASH), hexToBytes(hashStructArray(elementHashes))]),
  );
}

// =============================================================================
// Encoding
// =============================================================================

function encodePayloadSet(layout: PayloadSetLayout, elements: readonly Uint8Array[]): Uint8Array {
  if (elements.length > MAX_UINT32_VALUE) {
    throw new CodecError(
      "TOO_MANY_ELEMENTS",
      `${layout.kind} cannot hold ${elements.length} elements (max ${MAX_UINT32_VALUE})`,
      { kind: layout.kind, actual: elements.length, max: MAX_UINT32_VALUE },
    );
  }

  const bodyLength = elements.reduce((sum, e) => sum + e.length, 0);
  const out = new Uint8Array(layout.HEADER_LENGTH + bodyLength);
  writeUint32(out, 0, layout.MAGIC);
  writeUint32(out, layout.VERSION_OFFSET, layout.VERSION);
  writeUint32(out, layout.NUM_ELEMENTS_OFFSET, elements.length);

  let offset = layout.ELEMENTS_OFFSET;
  for (const element of elements) {
    writeBytes(out, offset, element);
    offset += element.length;
  }
  return out;
}

/**
 * @throws {CodecError} TOO_MANY_ELEMENTS, FIELD_OUT_OF_RANGE, HOOK_DATA_TOO_LARGE
 */
export function encodeBurnIntentSet(intents: readonly BurnIntent[]): Uint8Array {
  return encodePayloadSet(BURN_INTENT_SET_LAYOUT, intents.map(encodeBurnIntent));
}

/**
 * @throws {CodecError} TOO_MANY_ELEMENTS, FIELD_OUT_OF_RANGE, HOOK_DATA_TOO_LARGE
 */
export function encodeAttestationSet(attestations: readonly Attestation[]): Uint8Array {
  return encodePayloadSet(ATTESTATION_SET_LAYOUT, attestations.map(encodeAttestation));
}
