/**
 * @keelway/ledger — Block clock.
 *
 * Withdrawal delays and intent expiry compare block heights, never wall
 * time. The clock is the single source of the current height.
 */

export interface BlockClock {
  currentBlock(): bigint;
}

/**
 * Clock advanced explicitly by its owner: the HTTP service's chain
 * endpoint, or a test.
 */
export class ManualBlockClock implements BlockClock {
  private _block: bigint;

  constructor(startBlock: bigint = 0n) {
    if (startBlock < 0n) {
      throw new RangeError(`Block height cannot be negative: ${startBlock.toString()}`);
    }
    this._block = startBlock;
  }

  currentBlock(): bigint {
    return this._block;
  }

  /** Move forward by `blocks` and return the new height. */
  advance(blocks: bigint = 1n): bigint {
    if (blocks < 0n) {
      throw new RangeError(`Cannot move the clock backwards by ${blocks.toString()}`);
    }
    this._block += blocks;
    return this._block;
  }

  /** Jump to `block`, which must not be behind the current height. */
  setBlock(block: bigint): void {
    if (block < this._block) {
      throw new RangeError(
        `Cannot move the clock from ${this._block.toString()} back to ${block.toString()}`,
      );
    }
    this._block = block;
  }
}
