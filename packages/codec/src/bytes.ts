/**
 * @keelway/codec — Bound-checked big-endian readers and writers.
 *
 * Views never copy: every reader works against the caller's buffer and
 * refuses to read past its end. Writers target a freshly allocated
 * output buffer of known size.
 */

import { bytesToHex, hexToBytes, type Hex } from "viem";
import { CodecError } from "./errors.js";

// =============================================================================
// Bounds
// =============================================================================

function assertReadable(bytes: Uint8Array, offset: number, length: number): void {
  if (offset < 0 || length < 0 || offset + length > bytes.length) {
    throw new CodecError(
      "BYTES_OUT_OF_BOUNDS",
      `Read of ${length} bytes at offset ${offset} exceeds buffer of ${bytes.length} bytes`,
      { offset, length, available: bytes.length },
    );
  }
}

function view(bytes: Uint8Array): DataView {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

// =============================================================================
// Readers
// =============================================================================

export function readUint32(bytes: Uint8Array, offset: number): number {
  assertReadable(bytes, offset, 4);
  return view(bytes).getUint32(offset, false);
}

export function readUint256(bytes: Uint8Array, offset: number): bigint {
  assertReadable(bytes, offset, 32);
  const dv = view(bytes);
  let result = 0n;
  for (let i = 0; i < 4; i++) {
    result = (result << 64n) | dv.getBigUint64(offset + i * 8, false);
  }
  return result;
}

export function readBytes32(bytes: Uint8Array, offset: number): Hex {
  return bytesToHex(readSlice(bytes, offset, 32));
}

/**
 * Zero-copy slice: the result shares memory with `bytes`.
 */
export function readSlice(bytes: Uint8Array, offset: number, length: number): Uint8Array {
  assertReadable(bytes, offset, length);
  return bytes.subarray(offset, offset + length);
}

// =============================================================================
// Writers
// =============================================================================

export function writeUint32(out: Uint8Array, offset: number, value: number): void {
  assertReadable(out, offset, 4);
  view(out).setUint32(offset, value, false);
}

export function writeUint256(out: Uint8Array, offset: number, value: bigint): void {
  assertReadable(out, offset, 32);
  const dv = view(out);
  const mask = (1n << 64n) - 1n;
  for (let i = 3; i >= 0; i--) {
    dv.setBigUint64(offset + i * 8, value & mask, false);
    value >>= 64n;
  }
}

export function writeBytes(out: Uint8Array, offset: number, data: Uint8Array): void {
  assertReadable(out, offset, data.length);
  out.set(data, offset);
}

export function writeBytes32(out: Uint8Array, offset: number, word: Hex): void {
  writeBytes(out, offset, hexToBytes(word));
}
