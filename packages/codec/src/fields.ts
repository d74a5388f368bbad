/**
 * @keelway/codec — Encode-time field checks.
 *
 * Encoders refuse values that cannot be represented in their fixed-width
 * slot instead of truncating them.
 */

import type { Hex } from "viem";
import { isBytes32, isHex, isUint256, isUint32 } from "@keelway/types";
import { CodecError } from "./errors.js";

export function assertUint32Field(field: string, value: number): void {
  if (!isUint32(value)) {
    throw new CodecError("FIELD_OUT_OF_RANGE", `${field} must be a uint32, got ${value}`, {
      field,
    });
  }
}

export function assertUint256Field(field: string, value: bigint): void {
  if (!isUint256(value)) {
    throw new CodecError(
      "FIELD_OUT_OF_RANGE",
      `${field} must be a uint256, got ${value}`,
      { field },
    );
  }
}

export function assertBytes32Field(field: string, value: Hex): void {
  if (!isBytes32(value)) {
    throw new CodecError("FIELD_OUT_OF_RANGE", `${field} must be a 32-byte hex word`, {
      field,
    });
  }
}

export function assertHexField(field: string, value: Hex): void {
  if (!isHex(value)) {
    throw new CodecError("FIELD_OUT_OF_RANGE", `${field} must be even-length hex`, {
      field,
    });
  }
}
