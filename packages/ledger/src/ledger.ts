/**
 * @keelway/ledger — Balance ledger.
 *
 * Tracks, per (token, depositor), an `available` and a `withdrawing`
 * balance. Funds move `available → withdrawing → (withdrawn | burned)`.
 *
 * API surface:
 * - increaseAvailable() — credit a deposit
 * - moveToWithdrawing() — start a delayed withdrawal
 * - emptyWithdrawing() — complete a withdrawal
 * - reduceBalance() — debit for a burn, available first, never fails short
 * - totalBalance() / availableBalance() / withdrawingBalance() /
 *   withdrawableBalance() / withdrawalBlock() — queries
 * - snapshot() / restore() — roll a failed multi-step call back
 *
 * Addresses are compared case-insensitively.
 */

import { MAX_UINT256, type Address } from "@keelway/types";
import type { BlockClock } from "./block-clock.js";
import type { WithdrawalDelay } from "./withdrawal-delay.js";
import type { BalanceDebit, BalanceEntry, LedgerSnapshot } from "./types.js";
import { LedgerError } from "./types.js";

interface MutableEntry {
  token: Address;
  depositor: Address;
  available: bigint;
  withdrawing: bigint;
  withdrawableAtBlock: bigint;
}

function keyOf(token: Address, depositor: Address): string {
  return `${token.toLowerCase()}:${depositor.toLowerCase()}`;
}

function assertAmount(amount: bigint, operation: string): void {
  if (amount < 0n) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `${operation} amount cannot be negative: ${amount.toString()}`,
      { operation, amount: amount.toString() },
    );
  }
}

export class BalanceLedger {
  private _entries: Map<string, MutableEntry> = new Map();
  private readonly _delay: WithdrawalDelay;
  private readonly _clock: BlockClock;

  constructor(clock: BlockClock, delay: WithdrawalDelay) {
    this._clock = clock;
    this._delay = delay;
  }

  // ─── Mutations ───────────────────────────────────────────────────────

  /**
   * Credit `amount` to the available balance.
   * @throws {LedgerError} BALANCE_OVERFLOW past 2^256 − 1
   */
  increaseAvailable(token: Address, depositor: Address, amount: bigint): void {
    assertAmount(amount, "increaseAvailable");
    const entry = this._entry(token, depositor);
    const next = entry.available + amount;
    if (next > MAX_UINT256) {
      throw new LedgerError(
        "BALANCE_OVERFLOW",
        `Available balance of ${depositor} in ${token} would exceed 2^256 - 1`,
        { token, depositor, amount: amount.toString() },
      );
    }
    entry.available = next;
  }

  /**
   * Move `amount` from available to withdrawing and restart the delay.
   * @returns the block at which the withdrawing balance becomes claimable
   * @throws {LedgerError} INSUFFICIENT_AVAILABLE_BALANCE
   */
  moveToWithdrawing(token: Address, depositor: Address, amount: bigint): bigint {
    assertAmount(amount, "moveToWithdrawing");
    const entry = this._entry(token, depositor);
    if (entry.available < amount) {
      throw new LedgerError(
        "INSUFFICIENT_AVAILABLE_BALANCE",
        `Cannot move ${amount.toString()} to withdrawing: only ${entry.available.toString()} available`,
        {
          token,
          depositor,
          requested: amount.toString(),
          available: entry.available.toString(),
        },
      );
    }
    entry.available -= amount;
    entry.withdrawing += amount;
    entry.withdrawableAtBlock = this._delay.withdrawableAtFromNow();
    return entry.withdrawableAtBlock;
  }

  /**
   * Zero the withdrawing balance and return what it held. The caller
   * checks that the delay has elapsed.
   * @throws {LedgerError} NO_WITHDRAWING_BALANCE
   */
  emptyWithdrawing(token: Address, depositor: Address): bigint {
    const entry = this._entries.get(keyOf(token, depositor));
    if (entry === undefined || entry.withdrawing === 0n) {
      throw new LedgerError(
        "NO_WITHDRAWING_BALANCE",
        `${depositor} has no withdrawing balance in ${token}`,
        { token, depositor },
      );
    }
    const amount = entry.withdrawing;
    entry.withdrawing = 0n;
    entry.withdrawableAtBlock = 0n;
    return amount;
  }

  /**
   * Debit up to `amount`: available first, then withdrawing. A shortfall
   * is not an error; the returned split shows what was actually removed.
   */
  reduceBalance(token: Address, depositor: Address, amount: bigint): BalanceDebit {
    assertAmount(amount, "reduceBalance");
    const entry = this._entries.get(keyOf(token, depositor));
    if (entry === undefined) {
      return { fromAvailable: 0n, fromWithdrawing: 0n };
    }

    const fromAvailable = amount < entry.available ? amount : entry.available;
    entry.available -= fromAvailable;

    const remaining = amount - fromAvailable;
    const fromWithdrawing = remaining < entry.withdrawing ? remaining : entry.withdrawing;
    entry.withdrawing -= fromWithdrawing;
    if (entry.withdrawing === 0n) {
      entry.withdrawableAtBlock = 0n;
    }

    return { fromAvailable, fromWithdrawing };
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  totalBalance(token: Address, depositor: Address): bigint {
    const entry = this._entries.get(keyOf(token, depositor));
    return entry === undefined ? 0n : entry.available + entry.withdrawing;
  }

  availableBalance(token: Address, depositor: Address): bigint {
    return this._entries.get(keyOf(token, depositor))?.available ?? 0n;
  }

  withdrawingBalance(token: Address, depositor: Address): bigint {
    return this._entries.get(keyOf(token, depositor))?.withdrawing ?? 0n;
  }

  /** The withdrawing balance once its delay has elapsed, else 0. */
  withdrawableBalance(token: Address, depositor: Address): bigint {
    const entry = this._entries.get(keyOf(token, depositor));
    if (entry === undefined || entry.withdrawing === 0n) return 0n;
    return this._delay.hasElapsed(entry.withdrawableAtBlock) ? entry.withdrawing : 0n;
  }

  /** Block at which the pending withdrawal becomes claimable; 0 when none. */
  withdrawalBlock(token: Address, depositor: Address): bigint {
    return this._entries.get(keyOf(token, depositor))?.withdrawableAtBlock ?? 0n;
  }

  /** Current height of the clock the ledger stamps withdrawals against. */
  currentBlock(): bigint {
    return this._clock.currentBlock();
  }

  /**
   * Every non-empty entry, optionally filtered to one depositor.
   */
  getBalances(depositor?: Address): readonly BalanceEntry[] {
    const wanted = depositor?.toLowerCase();
    const out: BalanceEntry[] = [];
    for (const entry of this._entries.values()) {
      if (entry.available === 0n && entry.withdrawing === 0n) continue;
      if (wanted !== undefined && entry.depositor.toLowerCase() !== wanted) continue;
      out.push({ ...entry });
    }
    return out;
  }

  // ─── Snapshot ────────────────────────────────────────────────────────

  snapshot(): LedgerSnapshot {
    return { entries: [...this._entries.values()].map((entry) => ({ ...entry })) };
  }

  /** Replace the entire state with `snapshot`. */
  restore(snapshot: LedgerSnapshot): void {
    const entries = new Map<string, MutableEntry>();
    for (const entry of snapshot.entries) {
      entries.set(keyOf(entry.token, entry.depositor), { ...entry });
    }
    this._entries = entries;
  }

  private _entry(token: Address, depositor: Address): MutableEntry {
    const key = keyOf(token, depositor);
    let entry = this._entries.get(key);
    if (entry === undefined) {
      entry = {
        token,
        depositor,
        available: 0n,
        withdrawing: 0n,
        withdrawableAtBlock: 0n,
      };
      this._entries.set(key, entry);
    }
    return entry;
  }
}
