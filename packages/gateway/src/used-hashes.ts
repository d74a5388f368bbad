/**
 * @keelway/gateway — Replay guard.
 *
 * Records the keccak256 of every TransferSpec a wallet has burned or a
 * minter has minted. A hash is marked at most once.
 */

import type { Hex } from "viem";

export class UsedHashSet {
  private _hashes = new Set<string>();

  isUsed(hash: Hex): boolean {
    return this._hashes.has(hash.toLowerCase());
  }

  /** @returns false when `hash` was already marked */
  markUsed(hash: Hex): boolean {
    const key = hash.toLowerCase();
    if (this._hashes.has(key)) return false;
    this._hashes.add(key);
    return true;
  }

  get size(): number {
    return this._hashes.size;
  }

  snapshot(): readonly string[] {
    return [...this._hashes];
  }

  restore(snapshot: readonly string[]): void {
    this._hashes = new Set(snapshot);
  }
}
