/**
 * @keelway/gateway — Gateway wallet.
 *
 * The source-side half of a transfer. Depositors lock tokens here; a
 * registered burn signer later submits batches of signed burn intents
 * that retire locked balances so an equivalent amount can be minted on
 * the destination domain.
 *
 * Composes:
 * - BalanceLedger (available / withdrawing per token and depositor)
 * - WithdrawalDelay and BlockClock (delayed withdrawals, intent expiry)
 * - SignerRegistry (burn signers), TokenRegistry, Delegation
 * - TokenBank (custody, fee payout, burning)
 * - UsedHashSet (replay protection)
 * - EventRecorder (settlement events on `wallet:<address>`)
 *
 * Every mutating call is transactional: signature recovery runs first,
 * then the state change runs against snapshots and is rolled back as a
 * unit if any step throws. Events are appended only on success, and
 * token movements reach the bank only after the events are appended.
 */

import { getAddress, hexToBytes, keccak256, zeroAddress, type Hex } from "viem";
import type { Address } from "@keelway/types";
import {
  WALLET_DOMAIN,
  addressToBytes32,
  decodeBurnBatch,
  openBurnIntentCursor,
  sameBytes32,
  tryBytes32ToAddress,
  typedDataDigest,
  type BurnBatch,
} from "@keelway/codec";
import {
  BalanceLedger,
  WithdrawalDelay,
  type BalanceEntry,
  type BlockClock,
} from "@keelway/ledger";
import { SETTLEMENT_EVENTS } from "@keelway/event-store";
import { InMemoryDelegation, type Delegation, type DelegationState } from "./delegation.js";
import { GatewayError, failAt, type ElementPosition } from "./errors.js";
import { EventRecorder, type PendingEvents } from "./events.js";
import { recoverSigner, sameAddress } from "./signatures.js";
import { InMemorySignerRegistry, type SignerRegistry } from "./signers.js";
import {
  InMemoryTokenRegistry,
  PendingMoves,
  type TokenBank,
  type TokenRegistry,
} from "./tokens.js";
import { UsedHashSet } from "./used-hashes.js";
import type {
  BurnReceipt,
  BurnRecord,
  GatewayWalletOptions,
  WithdrawalReceipt,
} from "./types.js";

/** A batch entry whose signature has been checked. */
interface RecoveredEntry {
  readonly bytes: Uint8Array;
  readonly signer: Address | undefined;
  readonly fees: readonly bigint[];
}

export class GatewayWallet {
  readonly address: Address;
  readonly localDomain: number;
  private _feeRecipient: Address;
  private readonly _clock: BlockClock;
  private readonly _delay: WithdrawalDelay;
  private readonly _ledger: BalanceLedger;
  private readonly _bank: TokenBank;
  private readonly _burnSigners: SignerRegistry;
  private readonly _tokens: TokenRegistry;
  private readonly _delegation: Delegation;
  private readonly _usedHashes = new UsedHashSet();
  private readonly _events: EventRecorder;

  constructor(options: GatewayWalletOptions) {
    this.address = getAddress(options.address);
    this.localDomain = options.localDomain;
    this._feeRecipient = assertNonZero(options.feeRecipient, "feeRecipient");
    this._clock = options.clock;
    this._delay = new WithdrawalDelay(options.clock, options.withdrawalDelay);
    this._ledger = new BalanceLedger(options.clock, this._delay);
    this._bank = options.bank;
    this._burnSigners = options.burnSigners ?? new InMemorySignerRegistry();
    this._tokens = options.tokens ?? new InMemoryTokenRegistry();
    this._delegation = options.delegation ?? new InMemoryDelegation();
    this._events = new EventRecorder(
      options.eventStore,
      `wallet:${this.address.toLowerCase()}`,
      "wallet",
      options.clock,
    );
  }

  get streamId(): string {
    return this._events.streamId;
  }

  get feeRecipient(): Address {
    return this._feeRecipient;
  }

  get withdrawalDelay(): bigint {
    return this._delay.delay;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Deposits
  // ───────────────────────────────────────────────────────────────────────

  /** Deposit `value` of the depositor's own tokens. */
  deposit(token: Address, depositor: Address, value: bigint): void {
    this.depositFor(token, depositor, depositor, value);
  }

  /**
   * Pull `value` from `sender` and credit it to `depositor`.
   * @throws {GatewayError} UNSUPPORTED_TOKEN, VALUE_MUST_BE_POSITIVE,
   *   INVALID_ADDRESS, INSUFFICIENT_TOKEN_BALANCE
   */
  depositFor(token: Address, sender: Address, depositor: Address, value: bigint): void {
    this._assertSupported(token);
    assertPositive(value);
    assertNonZero(depositor, "depositor");

    this._transact(sender, (events, moves) => {
      this._ledger.increaseAvailable(token, depositor, value);
      moves.pull(token, sender, value);
      events.record(SETTLEMENT_EVENTS.DEPOSITED, {
        token,
        depositor,
        sender,
        value: value.toString(),
      });
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Withdrawals
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Move `value` from available to withdrawing and restart the delay
   * for the whole withdrawing balance.
   * @throws {LedgerError} INSUFFICIENT_AVAILABLE_BALANCE
   */
  initiateWithdrawal(token: Address, depositor: Address, value: bigint): WithdrawalReceipt {
    assertPositive(value);
    return this._transact(depositor, (events) => {
      const withdrawableAtBlock = this._ledger.moveToWithdrawing(token, depositor, value);
      events.record(SETTLEMENT_EVENTS.WITHDRAWAL_INITIATED, {
        token,
        depositor,
        value: value.toString(),
        remainingAvailable: this._ledger.availableBalance(token, depositor).toString(),
        totalWithdrawing: this._ledger.withdrawingBalance(token, depositor).toString(),
        withdrawableAtBlock: withdrawableAtBlock.toString(),
      });
      return { token, depositor, value, withdrawableAtBlock };
    });
  }

  /**
   * Pay out the whole withdrawing balance once its delay has elapsed.
   * @returns the amount paid to the depositor
   * @throws {GatewayError} WITHDRAWAL_NOT_YET_AVAILABLE
   * @throws {LedgerError} NO_WITHDRAWING_BALANCE
   */
  withdraw(token: Address, depositor: Address): bigint {
    const withdrawableAtBlock = this._ledger.withdrawalBlock(token, depositor);
    if (
      this._ledger.withdrawingBalance(token, depositor) > 0n &&
      !this._delay.hasElapsed(withdrawableAtBlock)
    ) {
      throw new GatewayError(
        "WITHDRAWAL_NOT_YET_AVAILABLE",
        `Withdrawal for ${depositor} becomes available at block ${withdrawableAtBlock.toString()}`,
        {
          withdrawableAtBlock: withdrawableAtBlock.toString(),
          currentBlock: this._clock.currentBlock().toString(),
        },
      );
    }

    return this._transact(depositor, (events, moves) => {
      const value = this._ledger.emptyWithdrawing(token, depositor);
      moves.pay(token, depositor, value);
      events.record(SETTLEMENT_EVENTS.WITHDRAWAL_COMPLETED, {
        token,
        depositor,
        recipient: depositor,
        value: value.toString(),
      });
      return value;
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Delegation
  // ───────────────────────────────────────────────────────────────────────

  addDelegate(token: Address, depositor: Address, delegate: Address): void {
    this._assertSupported(token);
    assertNonZero(delegate, "delegate");
    if (sameAddress(delegate, depositor)) {
      throw new GatewayError("CANNOT_DELEGATE_TO_SELF", `${depositor} cannot delegate to itself`, {
        depositor,
      });
    }
    this._transact(depositor, (events) => {
      events.record(SETTLEMENT_EVENTS.DELEGATE_ADDED, { token, depositor, delegate });
      this._delegation.authorize(token, depositor, delegate);
    });
  }

  /**
   * Revoke a delegate. Intents it signed while authorized stay burnable.
   * Does nothing unless `delegate` is currently an authorized delegate;
   * a depositor is never its own delegate.
   */
  removeDelegate(token: Address, depositor: Address, delegate: Address): void {
    if (this._delegation.stateOf(token, depositor, delegate) !== "authorized") return;
    this._transact(depositor, (events) => {
      events.record(SETTLEMENT_EVENTS.DELEGATE_REMOVED, { token, depositor, delegate });
      this._delegation.revoke(token, depositor, delegate);
    });
  }

  delegationState(token: Address, depositor: Address, delegate: Address): DelegationState {
    return this._delegation.stateOf(token, depositor, delegate);
  }

  isAuthorizedForBalance(token: Address, depositor: Address, signer: Address): boolean {
    return this._delegation.isAuthorized(token, depositor, signer);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Administration
  // ───────────────────────────────────────────────────────────────────────

  addBurnSigner(signer: Address): void {
    assertNonZero(signer, "signer");
    if (this._burnSigners.isSigner(signer)) return;
    this._transact("system", (events) => {
      events.record(SETTLEMENT_EVENTS.BURN_SIGNER_ADDED, { signer });
      this._burnSigners.add(signer);
    });
  }

  removeBurnSigner(signer: Address): void {
    if (!this._burnSigners.isSigner(signer)) return;
    this._transact("system", (events) => {
      events.record(SETTLEMENT_EVENTS.BURN_SIGNER_REMOVED, { signer });
      this._burnSigners.remove(signer);
    });
  }

  isBurnSigner(signer: Address): boolean {
    return this._burnSigners.isSigner(signer);
  }

  burnSigners(): readonly Address[] {
    return this._burnSigners.list();
  }

  updateFeeRecipient(feeRecipient: Address): void {
    assertNonZero(feeRecipient, "feeRecipient");
    this._transact("system", (events) => {
      events.record(SETTLEMENT_EVENTS.FEE_RECIPIENT_CHANGED, {
        previousFeeRecipient: this._feeRecipient,
        feeRecipient,
      });
      this._feeRecipient = feeRecipient;
    });
  }

  addSupportedToken(token: Address): void {
    assertNonZero(token, "token");
    if (this._tokens.isTokenSupported(token)) return;
    this._transact("system", (events) => {
      events.record(SETTLEMENT_EVENTS.WALLET_TOKEN_SUPPORTED, { token });
      this._tokens.addSupportedToken(token);
    });
  }

  isTokenSupported(token: Address): boolean {
    return this._tokens.isTokenSupported(token);
  }

  supportedTokens(): readonly Address[] {
    return this._tokens.listSupportedTokens();
  }

  /** Change the delay for future withdrawals; pending ones keep their block. */
  updateWithdrawalDelay(delay: bigint): void {
    this._transact("system", (events) => {
      const previousDelay = this._delay.delay;
      this._delay.setDelay(delay);
      events.record(SETTLEMENT_EVENTS.WITHDRAWAL_DELAY_CHANGED, {
        previousDelay: previousDelay.toString(),
        delay: delay.toString(),
      });
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Balances
  // ───────────────────────────────────────────────────────────────────────

  totalBalance(token: Address, depositor: Address): bigint {
    return this._ledger.totalBalance(token, depositor);
  }

  availableBalance(token: Address, depositor: Address): bigint {
    return this._ledger.availableBalance(token, depositor);
  }

  withdrawingBalance(token: Address, depositor: Address): bigint {
    return this._ledger.withdrawingBalance(token, depositor);
  }

  withdrawableBalance(token: Address, depositor: Address): bigint {
    return this._ledger.withdrawableBalance(token, depositor);
  }

  withdrawalBlock(token: Address, depositor: Address): bigint {
    return this._ledger.withdrawalBlock(token, depositor);
  }

  getBalances(depositor?: Address): readonly BalanceEntry[] {
    return this._ledger.getBalances(depositor);
  }

  isTransferSpecHashUsed(hash: Hex): boolean {
    return this._usedHashes.isUsed(hash);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Burns
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Execute an ABI-encoded burn batch authorized by `burnSignature`.
   *
   * Intents for other source domains are skipped after their value is
   * checked. A depositor short of `value + fee` is burned for what it
   * has: the fee is cut first, and an insufficient-balance event is
   * recorded alongside the burn.
   *
   * @throws {CodecError} for a malformed batch or payload
   * @throws {GatewayError} for any signer, policy or replay failure
   */
  async gatewayBurn(encodedBatch: Hex, burnSignature: Hex): Promise<BurnReceipt> {
    const batch = decodeBurnBatch(encodedBatch);
    const burnSigner = await recoverSigner(keccak256(encodedBatch), burnSignature);
    if (burnSigner === undefined || !this._burnSigners.isSigner(burnSigner)) {
      throw new GatewayError("INVALID_BURN_SIGNER", "Burn batch was not signed by a burn signer", {
        signer: burnSigner ?? "unrecoverable",
      });
    }

    const entries = await this._recoverEntries(batch);
    return this._transact(burnSigner, (events, moves) =>
      this._executeBurn(burnSigner, entries, events, moves),
    );
  }

  private async _recoverEntries(batch: BurnBatch): Promise<RecoveredEntry[]> {
    const count = batch.intents.length;
    if (count === 0) {
      throw new GatewayError("EMPTY_BURN_BATCH", "Burn batch holds no intents");
    }
    if (batch.signatures.length !== count || batch.fees.length !== count) {
      throw new GatewayError(
        "MISMATCHED_BURN",
        `Burn batch arrays differ in length: ${count} intents, ${batch.signatures.length} signatures, ${batch.fees.length} fee lists`,
        {
          intents: count,
          signatures: batch.signatures.length,
          fees: batch.fees.length,
        },
      );
    }

    const entries: RecoveredEntry[] = [];
    for (const [batchIndex, intent] of batch.intents.entries()) {
      const bytes = hexToBytes(intent);
      const cursor = openBurnIntentCursor(bytes);
      const fees = batch.fees[batchIndex] ?? [];
      if (fees.length !== cursor.numElements) {
        throw new GatewayError(
          "MISMATCHED_BURN",
          `Batch entry ${batchIndex} carries ${cursor.numElements} intents but ${fees.length} fees`,
          { batchIndex, intents: cursor.numElements, fees: fees.length },
        );
      }
      const digest = typedDataDigest(WALLET_DOMAIN, cursor.typedDataHash());
      const signature = batch.signatures[batchIndex] ?? "0x";
      entries.push({ bytes, signer: await recoverSigner(digest, signature), fees });
    }
    return entries;
  }

  private _executeBurn(
    burnSigner: Address,
    entries: readonly RecoveredEntry[],
    events: PendingEvents,
    moves: PendingMoves,
  ): BurnReceipt {
    const walletWord = addressToBytes32(this.address);
    const currentBlock = this._clock.currentBlock();
    const burns: BurnRecord[] = [];
    let batchToken: Address | undefined;
    let totalFee = 0n;
    let totalBurned = 0n;

    for (const [batchIndex, entry] of entries.entries()) {
      const cursor = openBurnIntentCursor(entry.bytes);
      while (!cursor.done) {
        const position: ElementPosition = { batchIndex, intentIndex: cursor.index };
        const intent = cursor.next();
        const spec = intent.spec;

        if (spec.value === 0n) {
          failAt("INTENT_VALUE_MUST_BE_POSITIVE_AT_INDEX", position, "Burn intent value must be positive");
        }
        if (spec.sourceDomain !== this.localDomain) continue;

        if (!sameBytes32(spec.sourceContract, walletWord)) {
          failAt("INVALID_SOURCE_CONTRACT_AT_INDEX", position, "Intent names another source contract", {
            sourceContract: spec.sourceContract,
          });
        }
        const token = tryBytes32ToAddress(spec.sourceToken);
        if (token === undefined || !this._tokens.isTokenSupported(token)) {
          failAt("UNSUPPORTED_TOKEN_AT_INDEX", position, "Intent names an unsupported token", {
            sourceToken: spec.sourceToken,
          });
        }
        const signer = entry.signer;
        if (signer === undefined || !sameBytes32(spec.sourceSigner, addressToBytes32(signer))) {
          failAt("INVALID_SOURCE_SIGNER_AT_INDEX", position, "Intent was not signed by its sourceSigner", {
            sourceSigner: spec.sourceSigner,
          });
        }
        const depositor = tryBytes32ToAddress(spec.sourceDepositor);
        if (depositor === undefined || !this._delegation.wasEverAuthorized(token, depositor, signer)) {
          failAt("UNAUTHORIZED_SIGNER_AT_INDEX", position, `${signer} may not spend this balance`, {
            signer,
            sourceDepositor: spec.sourceDepositor,
          });
        }
        if (intent.maxBlockHeight < currentBlock) {
          failAt(
            "INTENT_EXPIRED_AT_INDEX",
            position,
            `Intent expired at block ${intent.maxBlockHeight.toString()}, now ${currentBlock.toString()}`,
            {
              maxBlockHeight: intent.maxBlockHeight.toString(),
              currentBlock: currentBlock.toString(),
            },
          );
        }
        const requestedFee = entry.fees[position.intentIndex] ?? 0n;
        if (requestedFee > intent.maxFee) {
          failAt("BURN_FEE_TOO_HIGH_AT_INDEX", position, "Fee exceeds the intent's maxFee", {
            fee: requestedFee.toString(),
            maxFee: intent.maxFee.toString(),
          });
        }

        if (batchToken === undefined) {
          batchToken = token;
        } else if (!sameAddress(batchToken, token)) {
          failAt("NOT_ALL_SAME_TOKEN", position, "Every intent in a burn must use one token", {
            expected: batchToken,
            actual: token,
          });
        }

        const transferSpecHash = spec.getHash();
        if (!this._usedHashes.markUsed(transferSpecHash)) {
          failAt("TRANSFER_SPEC_HASH_USED_AT_INDEX", position, "TransferSpec was already burned", {
            transferSpecHash,
          });
        }

        const requested = spec.value + requestedFee;
        const debit = this._ledger.reduceBalance(token, depositor, requested);
        const debited = debit.fromAvailable + debit.fromWithdrawing;
        const insufficient = debited < requested;
        let fee = requestedFee;
        if (insufficient) {
          events.record(SETTLEMENT_EVENTS.INSUFFICIENT_BALANCE, {
            token,
            depositor,
            transferSpecHash,
            requested: requested.toString(),
            debited: debited.toString(),
          });
          fee = debited > spec.value ? debited - spec.value : 0n;
        }

        totalFee += fee;
        totalBurned += debited - fee;
        events.record(SETTLEMENT_EVENTS.GATEWAY_BURNED, {
          token,
          depositor,
          transferSpecHash,
          destinationDomain: spec.destinationDomain,
          destinationRecipient: spec.destinationRecipient,
          signer,
          value: spec.value.toString(),
          fee: fee.toString(),
          fromAvailable: debit.fromAvailable.toString(),
          fromWithdrawing: debit.fromWithdrawing.toString(),
        });
        burns.push({
          ...position,
          depositor,
          signer,
          transferSpecHash,
          destinationDomain: spec.destinationDomain,
          value: spec.value,
          fee,
          fromAvailable: debit.fromAvailable,
          fromWithdrawing: debit.fromWithdrawing,
          insufficient,
        });
      }
    }

    if (batchToken === undefined) {
      throw new GatewayError(
        "NO_RELEVANT_BURN_INTENTS",
        `No intent in the batch targets source domain ${this.localDomain}`,
        { localDomain: this.localDomain },
      );
    }

    if (totalBurned > 0n) moves.burn(batchToken, totalBurned);
    if (totalFee > 0n) moves.pay(batchToken, this._feeRecipient, totalFee);

    return {
      correlationId: events.correlationId,
      burnSigner,
      token: batchToken,
      burned: totalBurned,
      fee: totalFee,
      burns,
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Transactions
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Run `fn` against snapshots of the ledger, the used hashes, the fee
   * recipient and the delay. Its events are committed first; its token
   * movements are applied only once the commit has gone through.
   */
  private _transact<T>(
    actor: string,
    fn: (events: PendingEvents, moves: PendingMoves) => T,
  ): T {
    const ledger = this._ledger.snapshot();
    const usedHashes = this._usedHashes.snapshot();
    const feeRecipient = this._feeRecipient;
    const delay = this._delay.delay;
    const events = this._events.begin(actor);
    const moves = new PendingMoves(this._bank);
    let result: T;
    try {
      result = fn(events, moves);
      this._events.commit(events);
    } catch (err) {
      this._ledger.restore(ledger);
      this._usedHashes.restore(usedHashes);
      this._feeRecipient = feeRecipient;
      this._delay.setDelay(delay);
      throw err;
    }
    moves.apply();
    return result;
  }

  private _assertSupported(token: Address): void {
    if (!this._tokens.isTokenSupported(token)) {
      throw new GatewayError("UNSUPPORTED_TOKEN", `Token ${token} is not supported`, { token });
    }
  }
}

function assertPositive(value: bigint): void {
  if (value <= 0n) {
    throw new GatewayError("VALUE_MUST_BE_POSITIVE", `Value must be positive, got ${value.toString()}`, {
      value: value.toString(),
    });
  }
}

function assertNonZero(address: Address, field: string): Address {
  if (address.toLowerCase() === zeroAddress) {
    throw new GatewayError("INVALID_ADDRESS", `${field} cannot be the zero address`, { field });
  }
  return address;
}
