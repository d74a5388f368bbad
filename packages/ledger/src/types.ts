/**
 * @keelway/ledger — Type definitions.
 *
 * Balances are tracked per (token, depositor) in two buckets:
 * `available` (spendable, burnable) and `withdrawing` (on its way out,
 * still burnable until the withdrawal completes).
 */

import type { Address } from "@keelway/types";

// ─── Balance Entry ───────────────────────────────────────────────────────

/**
 * One (token, depositor) balance.
 *
 * Invariants:
 * - `available` and `withdrawing` are never negative
 * - neither exceeds 2^256 − 1
 * - `withdrawableAtBlock` is 0 whenever `withdrawing` is 0
 */
export interface BalanceEntry {
  readonly token: Address;
  readonly depositor: Address;
  readonly available: bigint;
  readonly withdrawing: bigint;
  /** First block at which `withdrawing` may be withdrawn; 0 when none. */
  readonly withdrawableAtBlock: bigint;
}

/**
 * How much `reduceBalance` actually removed from each bucket.
 * Their sum may fall short of the requested amount.
 */
export interface BalanceDebit {
  readonly fromAvailable: bigint;
  readonly fromWithdrawing: bigint;
}

// ─── Snapshot ────────────────────────────────────────────────────────────

/**
 * Full ledger state, for rolling a failed multi-step call back as a unit.
 */
export interface LedgerSnapshot {
  readonly entries: readonly BalanceEntry[];
}

// ─── Errors ──────────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "INVALID_AMOUNT"
  | "BALANCE_OVERFLOW"
  | "INSUFFICIENT_AVAILABLE_BALANCE"
  | "NO_WITHDRAWING_BALANCE"
  | "INVALID_WITHDRAWAL_DELAY";

/**
 * Structured error from the ledger.
 * Always thrown — never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;
  public readonly details: Readonly<Record<string, string>>;

  constructor(
    code: LedgerErrorCode,
    message: string,
    details: Readonly<Record<string, string>> = {},
  ) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
    this.details = details;
  }
}
