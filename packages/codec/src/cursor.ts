/**
 * @keelway/codec — Forward-only cursor over payload elements.
 *
 * Opening a cursor validates the set header and walks the element
 * headers. Each element is cast and fully validated only when `next()`
 * reaches it, so a consumer can stop early without paying for the rest.
 *
 * A cursor can also be opened over a single BurnIntent or Attestation;
 * it then yields exactly one element.
 */

import type { Hex } from "viem";
import { ATTESTATION_SET, BURN_INTENT_SET, MIN_CAST_LENGTH } from "./constants.js";
import { CodecError } from "./errors.js";
import { readSlice, readUint32 } from "./bytes.js";
import { BurnIntentView } from "./burn-intent.js";
import { AttestationView } from "./attestation.js";
import type { TransferPayloadView } from "./transfer-payload.js";
import {
  ATTESTATION_SET_LAYOUT,
  BURN_INTENT_SET_LAYOUT,
  castPayloadSet,
  payloadSetTypedDataHash,
  validatePayloadSet,
  type ElementSpan,
  type PayloadSetLayout,
} from "./payload-set.js";
import type { Attestation, BurnIntent } from "./types.js";

export class PayloadCursor<V extends TransferPayloadView> {
  private readonly _bytes: Uint8Array;
  private readonly _spans: readonly ElementSpan[];
  private readonly _castElement: (bytes: Uint8Array) => V;
  private readonly _setLayout: PayloadSetLayout | undefined;
  private _index = 0;
  private _currentOffset: number;

  private constructor(
    bytes: Uint8Array,
    spans: readonly ElementSpan[],
    castElement: (bytes: Uint8Array) => V,
    setLayout: PayloadSetLayout | undefined,
  ) {
    this._bytes = bytes;
    this._spans = spans;
    this._castElement = castElement;
    this._setLayout = setLayout;
    this._currentOffset = spans[0]?.offset ?? bytes.length;
  }

  /** Cursor over a set; validates the set header and element headers. */
  static overSet<V extends TransferPayloadView>(
    bytes: Uint8Array,
    layout: PayloadSetLayout,
    castElement: (bytes: Uint8Array) => V,
  ): PayloadCursor<V> {
    castPayloadSet(bytes, layout);
    const spans = validatePayloadSet(bytes, layout);
    return new PayloadCursor(bytes, spans, castElement, layout);
  }

  /** Cursor over one payload. The element is validated on `next()`. */
  static overSingle<V extends TransferPayloadView>(
    bytes: Uint8Array,
    castElement: (bytes: Uint8Array) => V,
  ): PayloadCursor<V> {
    castElement(bytes);
    return new PayloadCursor(bytes, [{ offset: 0, length: bytes.length }], castElement, undefined);
  }

  get numElements(): number {
    return this._spans.length;
  }

  /** Number of elements already returned. */
  get index(): number {
    return this._index;
  }

  get currentOffset(): number {
    return this._currentOffset;
  }

  get done(): boolean {
    return this._index === this._spans.length;
  }

  /** True when the cursor walks a BurnIntentSet or AttestationSet. */
  get isSet(): boolean {
    return this._setLayout !== undefined;
  }

  /**
   * Cast, validate and return the next element.
   *
   * @throws {CodecError} CURSOR_OUT_OF_BOUNDS once every element was returned,
   *   or any element validation error
   */
  next(): V {
    const span = this._spans[this._index];
    if (span === undefined) {
      throw new CodecError(
        "CURSOR_OUT_OF_BOUNDS",
        `Cursor exhausted after ${this._spans.length} elements`,
        { index: this._index, numElements: this._spans.length },
      );
    }
    const element = this._castElement(readSlice(this._bytes, span.offset, span.length)).validate();
    this._currentOffset = span.offset + span.length;
    this._index++;
    return element;
  }

  /** Return every element not yet visited. */
  rest(): V[] {
    const out: V[] = [];
    while (!this.done) {
      out.push(this.next());
    }
    return out;
  }

  /**
   * EIP-712 struct hash of the whole payload: the element's own hash
   * for a single payload, the array-of-structs hash for a set.
   * Consumes the cursor.
   */
  typedDataHash(): Hex {
    const hashes = this.rest().map((view) => view.getTypedDataHash());
    if (this._setLayout === undefined) {
      const [single] = hashes;
      if (single === undefined) {
        throw new CodecError("CURSOR_OUT_OF_BOUNDS", "Cursor already consumed", {
          index: this._index,
          numElements: this._spans.length,
        });
      }
      return single;
    }
    return payloadSetTypedDataHash(this._setLayout, hashes);
  }
}

function hasMagic(bytes: Uint8Array, magic: number): boolean {
  return bytes.length >= MIN_CAST_LENGTH && readUint32(bytes, 0) === magic;
}

// =============================================================================
// Openers
// =============================================================================

/** Open a cursor over either a BurnIntent or a BurnIntentSet. */
export function openBurnIntentCursor(bytes: Uint8Array): PayloadCursor<BurnIntentView> {
  return hasMagic(bytes, BURN_INTENT_SET.MAGIC)
    ? PayloadCursor.overSet(bytes, BURN_INTENT_SET_LAYOUT, BurnIntentView.cast)
    : PayloadCursor.overSingle(bytes, BurnIntentView.cast);
}

/** Open a cursor over either an Attestation or an AttestationSet. */
export function openAttestationCursor(bytes: Uint8Array): PayloadCursor<AttestationView> {
  return hasMagic(bytes, ATTESTATION_SET.MAGIC)
    ? PayloadCursor.overSet(bytes, ATTESTATION_SET_LAYOUT, AttestationView.cast)
    : PayloadCursor.overSingle(bytes, AttestationView.cast);
}

export function decodeBurnIntentSet(bytes: Uint8Array): BurnIntent[] {
  return PayloadCursor.overSet(bytes, BURN_INTENT_SET_LAYOUT, BurnIntentView.cast)
    .rest()
    .map((view) => view.toBurnIntent());
}

export function decodeAttestationSet(bytes: Uint8Array): Attestation[] {
  return PayloadCursor.overSet(bytes, ATTESTATION_SET_LAYOUT, AttestationView.cast)
    .rest()
    .map((view) => view.toAttestation());
}
