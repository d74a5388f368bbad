/**
 * @keelway/gateway — Token registry and token bank.
 *
 * The registry decides which tokens a wallet or minter accepts. The
 * bank is the token contract as seen from the gateway: it moves real
 * tokens in and out of the gateway's custody, destroys burned value
 * and creates minted value. Balances inside the wallet are tracked by
 * the ledger; the bank only ever sees aggregate movements.
 *
 * A call queues its movements on PendingMoves and they reach the bank
 * only after the call's events are committed.
 */

import { getAddress } from "viem";
import type { Address } from "@keelway/types";
import { GatewayError } from "./errors.js";

// =============================================================================
// Registry
// =============================================================================

export interface TokenRegistry {
  isTokenSupported(token: Address): boolean;
  /** @returns false when the token was already supported */
  addSupportedToken(token: Address): boolean;
  listSupportedTokens(): readonly Address[];
}

export class InMemoryTokenRegistry implements TokenRegistry {
  private readonly _tokens = new Map<string, Address>();

  constructor(initial: readonly Address[] = []) {
    for (const token of initial) {
      this.addSupportedToken(token);
    }
  }

  isTokenSupported(token: Address): boolean {
    return this._tokens.has(token.toLowerCase());
  }

  addSupportedToken(token: Address): boolean {
    const key = token.toLowerCase();
    if (this._tokens.has(key)) return false;
    this._tokens.set(key, getAddress(token));
    return true;
  }

  listSupportedTokens(): readonly Address[] {
    return [...this._tokens.values()];
  }
}

// =============================================================================
// Bank
// =============================================================================

export interface TokenBank {
  /** Move `value` from `from` into the gateway's custody. */
  pull(token: Address, from: Address, value: bigint): void;
  /** Move `value` out of custody to `to`. */
  pay(token: Address, to: Address, value: bigint): void;
  /** Destroy `value` held in custody. */
  burn(token: Address, value: bigint): void;
  /** Create `value` new tokens for `to`. */
  mint(token: Address, to: Address, value: bigint): void;
  balanceOf(token: Address, holder: Address): bigint;
}

/**
 * Token movements of one call, held back until the call commits.
 *
 * `pull` checks the holder's balance when it is queued, so a deposit
 * the sender cannot fund fails before anything is committed.
 */
export class PendingMoves {
  private readonly _moves: ((bank: TokenBank) => void)[] = [];

  constructor(private readonly _bank: TokenBank) {}

  pull(token: Address, from: Address, value: bigint): void {
    const held = this._bank.balanceOf(token, from);
    if (held < value) throw insufficientHolder(token, from, held, value);
    this._moves.push((bank) => bank.pull(token, from, value));
  }

  pay(token: Address, to: Address, value: bigint): void {
    this._moves.push((bank) => bank.pay(token, to, value));
  }

  burn(token: Address, value: bigint): void {
    this._moves.push((bank) => bank.burn(token, value));
  }

  mint(token: Address, to: Address, value: bigint): void {
    this._moves.push((bank) => bank.mint(token, to, value));
  }

  apply(): void {
    for (const move of this._moves) {
      move(this._bank);
    }
  }
}

/**
 * Token bank that keeps holder balances, custody and burned/minted
 * totals in memory. `credit` funds a holder directly.
 */
export class InMemoryTokenBank implements TokenBank {
  private readonly _holders = new Map<string, bigint>();
  private readonly _custody = new Map<string, bigint>();
  private readonly _burned = new Map<string, bigint>();
  private readonly _minted = new Map<string, bigint>();

  credit(token: Address, holder: Address, value: bigint): void {
    add(this._holders, holderKey(token, holder), value);
  }

  pull(token: Address, from: Address, value: bigint): void {
    const key = holderKey(token, from);
    const held = this._holders.get(key) ?? 0n;
    if (held < value) throw insufficientHolder(token, from, held, value);
    this._holders.set(key, held - value);
    add(this._custody, token.toLowerCase(), value);
  }

  pay(token: Address, to: Address, value: bigint): void {
    this._takeFromCustody(token, value);
    add(this._holders, holderKey(token, to), value);
  }

  burn(token: Address, value: bigint): void {
    this._takeFromCustody(token, value);
    add(this._burned, token.toLowerCase(), value);
  }

  mint(token: Address, to: Address, value: bigint): void {
    add(this._holders, holderKey(token, to), value);
    add(this._minted, token.toLowerCase(), value);
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  balanceOf(token: Address, holder: Address): bigint {
    return this._holders.get(holderKey(token, holder)) ?? 0n;
  }

  custodyOf(token: Address): bigint {
    return this._custody.get(token.toLowerCase()) ?? 0n;
  }

  burnedOf(token: Address): bigint {
    return this._burned.get(token.toLowerCase()) ?? 0n;
  }

  mintedOf(token: Address): bigint {
    return this._minted.get(token.toLowerCase()) ?? 0n;
  }

  private _takeFromCustody(token: Address, value: bigint): void {
    const key = token.toLowerCase();
    const held = this._custody.get(key) ?? 0n;
    if (held < value) {
      throw new GatewayError(
        "INSUFFICIENT_TOKEN_BALANCE",
        `Custody holds ${held.toString()} of ${token}, cannot release ${value.toString()}`,
        { token, held: held.toString(), value: value.toString() },
      );
    }
    this._custody.set(key, held - value);
  }
}

function insufficientHolder(
  token: Address,
  holder: Address,
  held: bigint,
  value: bigint,
): GatewayError {
  return new GatewayError(
    "INSUFFICIENT_TOKEN_BALANCE",
    `${holder} holds ${held.toString()} of ${token}, cannot transfer ${value.toString()}`,
    { token, holder, held: held.toString(), value: value.toString() },
  );
}

function holderKey(token: Address, holder: Address): string {
  return `${token}:${holder}`.toLowerCase();
}

function add(map: Map<string, bigint>, key: string, value: bigint): void {
  map.set(key, (map.get(key) ?? 0n) + value);
}
