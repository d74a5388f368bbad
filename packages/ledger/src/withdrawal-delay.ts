/**
 * @keelway/ledger — Withdrawal delay policy.
 *
 * A withdrawal becomes claimable `delay` blocks after it was initiated.
 * Changing the delay does not move stamps already written.
 */

import type { BlockClock } from "./block-clock.js";
import { LedgerError } from "./types.js";

export class WithdrawalDelay {
  private _delay: bigint;

  constructor(
    private readonly _clock: BlockClock,
    delay: bigint,
  ) {
    this._delay = WithdrawalDelay._checked(delay);
  }

  get delay(): bigint {
    return this._delay;
  }

  setDelay(delay: bigint): void {
    this._delay = WithdrawalDelay._checked(delay);
  }

  /** Block at which a withdrawal initiated now becomes claimable. */
  withdrawableAtFromNow(): bigint {
    return this._clock.currentBlock() + this._delay;
  }

  /** True once the clock has reached `withdrawableAtBlock`. */
  hasElapsed(withdrawableAtBlock: bigint): boolean {
    return this._clock.currentBlock() >= withdrawableAtBlock;
  }

  private static _checked(delay: bigint): bigint {
    if (delay < 0n) {
      throw new LedgerError(
        "INVALID_WITHDRAWAL_DELAY",
        `Withdrawal delay cannot be negative: ${delay.toString()}`,
        { delay: delay.toString() },
      );
    }
    return delay;
  }
}
