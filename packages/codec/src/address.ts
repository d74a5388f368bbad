/**
 * @keelway/codec — Address ↔ 32-byte word conversion.
 *
 * EVM addresses travel left-padded to 32 bytes. Comparisons happen on
 * the padded, lowercased word.
 */

import { getAddress, hexToBigInt, isAddress, numberToHex, sliceHex, type Address } from "viem";
import type { Bytes32 } from "@keelway/types";
import { CodecError } from "./errors.js";

export function addressToBytes32(address: Address): Bytes32 {
  if (!isAddress(address, { strict: false })) {
    throw new CodecError("FIELD_OUT_OF_RANGE", `Not an address: ${address}`, {
      field: "address",
    });
  }
  return numberToHex(hexToBigInt(address), { size: 32 });
}

/**
 * Recover the address held in the low 20 bytes of a word.
 * Fails when the high 12 bytes are not zero.
 */
export function bytes32ToAddress(word: Bytes32): Address {
  const address = tryBytes32ToAddress(word);
  if (address === undefined) {
    throw new CodecError("FIELD_OUT_OF_RANGE", `Word does not hold an address: ${word}`, {
      field: "address",
    });
  }
  return address;
}

/** Like `bytes32ToAddress`, but `undefined` for a word that holds no address. */
export function tryBytes32ToAddress(word: Bytes32): Address | undefined {
  if (hexToBigInt(sliceHex(word, 0, 12)) !== 0n) return undefined;
  return getAddress(sliceHex(word, 12, 32));
}

/** Case-insensitive equality of two 32-byte words. */
export function sameBytes32(a: Bytes32, b: Bytes32): boolean {
  return a.toLowerCase() === b.toLowerCase();
}
