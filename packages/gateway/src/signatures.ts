/**
 * @keelway/gateway — Signature recovery.
 */

import { recoverAddress, type Hex } from "viem";
import type { Address } from "@keelway/types";

/**
 * Recover the address that signed `digest`.
 *
 * @returns undefined when `signature` is not a recoverable ECDSA
 *   signature; callers report that as the signer check failing
 */
export async function recoverSigner(digest: Hex, signature: Hex): Promise<Address | undefined> {
  try {
    return await recoverAddress({ hash: digest, signature });
  } catch {
    return undefined;
  }
}

export function sameAddress(a: Address, b: Address): boolean {
  return a.toLowerCase() === b.toLowerCase();
}
