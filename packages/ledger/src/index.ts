/**
 * @keelway/ledger — Per-token, per-depositor balance ledger.
 *
 * Design rules:
 * - All amounts are bigint, bounded by uint256
 * - Burns drain `available` before `withdrawing`
 * - A debit shortfall is reported, never thrown
 * - Delays are block heights, read from a BlockClock
 * - Invalid operations throw LedgerError, never silently succeed
 */

// Core ledger
export { BalanceLedger } from "./ledger.js";

// Collaborators
export type { BlockClock } from "./block-clock.js";
export { ManualBlockClock } from "./block-clock.js";
export { WithdrawalDelay } from "./withdrawal-delay.js";

// Types
export type {
  BalanceEntry,
  BalanceDebit,
  LedgerSnapshot,
  LedgerErrorCode,
} from "./types.js";

export { LedgerError } from "./types.js";
