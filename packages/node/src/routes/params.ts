/**
 * Path parameter parsing shared by the routes.
 */

import { getAddress } from "viem";
import { isAddress, isBytes32, type Address, type Bytes32 } from "@keelway/types";
import { ApiError } from "../types/error.js";

/** @throws {ApiError} VALIDATION_ERROR when `value` is not an address */
export function parseAddressParam(name: string, value: string): Address {
  if (!isAddress(value)) {
    throw new ApiError(400, "VALIDATION_ERROR", `Path parameter '${name}' must be an address`, {
      [name]: value,
    });
  }
  return getAddress(value);
}

/** @throws {ApiError} VALIDATION_ERROR when `value` is not a 32-byte word */
export function parseBytes32Param(name: string, value: string): Bytes32 {
  if (!isBytes32(value)) {
    throw new ApiError(400, "VALIDATION_ERROR", `Path parameter '${name}' must be a 32-byte word`, {
      [name]: value,
    });
  }
  return value;
}
