/**
 * @keelway/gateway — Signer registries.
 *
 * The wallet keeps a registry of burn signers (who may authorize a burn
 * batch) and the minter one of attestation signers (who may authorize a
 * mint). Both are plain address sets.
 */

import { getAddress } from "viem";
import type { Address } from "@keelway/types";

export interface SignerRegistry {
  isSigner(address: Address): boolean;
  /** @returns false when `address` was already registered */
  add(address: Address): boolean;
  /** @returns false when `address` was not registered */
  remove(address: Address): boolean;
  list(): readonly Address[];
}

export class InMemorySignerRegistry implements SignerRegistry {
  private readonly _signers = new Map<string, Address>();

  constructor(initial: readonly Address[] = []) {
    for (const signer of initial) {
      this.add(signer);
    }
  }

  isSigner(address: Address): boolean {
    return this._signers.has(address.toLowerCase());
  }

  add(address: Address): boolean {
    const key = address.toLowerCase();
    if (this._signers.has(key)) return false;
    this._signers.set(key, getAddress(address));
    return true;
  }

  remove(address: Address): boolean {
    return this._signers.delete(address.toLowerCase());
  }

  list(): readonly Address[] {
    return [...this._signers.values()];
  }
}
