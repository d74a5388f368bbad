/**
 * GatewayService — Composition root for one gateway deployment.
 *
 * Route handlers delegate to this service; they never build domain
 * objects themselves. The service wires a wallet and a minter for the
 * same local domain onto one token bank, one block clock and one
 * settlement event store, and logs the settlement events an operator
 * has to watch. A subscriber that throws is logged at error level and
 * never fails the call whose events it was handed.
 */

import type { Hex } from "viem";
import type { Address, DomainId } from "@keelway/types";
import {
  GatewayMinter,
  GatewayWallet,
  InMemorySignerRegistry,
  InMemoryTokenBank,
  InMemoryTokenRegistry,
  type BurnReceipt,
  type MintReceipt,
} from "@keelway/gateway";
import {
  InMemoryEventStore,
  SETTLEMENT_EVENTS,
  type EventStoreIntegrityResult,
  type ReadAllOptions,
  type ReadOptions,
  type StoredEvent,
  type Subscription,
} from "@keelway/event-store";
import { ManualBlockClock } from "@keelway/ledger";

// =============================================================================
// Configuration
// =============================================================================

export interface GatewayServiceConfig {
  readonly localDomain: DomainId;
  readonly walletAddress: Address;
  readonly minterAddress: Address;
  readonly feeRecipient: Address;
  readonly withdrawalDelay: bigint;
  readonly startBlock: bigint;
  readonly burnSigners: readonly Address[];
  readonly attestationSigners: readonly Address[];
  readonly supportedTokens: readonly Address[];
}

/** The slice of a pino logger the service writes settlement events to. */
export interface SettlementLogger {
  info(obj: object, msg: string): void;
  warn(obj: object, msg: string): void;
  error(obj: object, msg: string): void;
}

// =============================================================================
// Service
// =============================================================================

export class GatewayService {
  readonly localDomain: DomainId;
  readonly clock: ManualBlockClock;
  readonly eventStore: InMemoryEventStore;
  readonly bank: InMemoryTokenBank;
  readonly wallet: GatewayWallet;
  readonly minter: GatewayMinter;

  private readonly _subscription: Subscription | undefined;

  constructor(config: GatewayServiceConfig, logger?: SettlementLogger) {
    this.localDomain = config.localDomain;
    this.clock = new ManualBlockClock(config.startBlock);
    this.eventStore = new InMemoryEventStore(
      logger !== undefined
        ? {
            onSubscriberError: (err, event) =>
              logger.error(
                {
                  err,
                  eventType: event.event.type,
                  streamId: event.streamId,
                  globalPosition: event.globalPosition,
                },
                "Settlement event subscriber failed",
              ),
          }
        : {},
    );
    this.bank = new InMemoryTokenBank();

    this.wallet = new GatewayWallet({
      address: config.walletAddress,
      localDomain: config.localDomain,
      feeRecipient: config.feeRecipient,
      withdrawalDelay: config.withdrawalDelay,
      clock: this.clock,
      bank: this.bank,
      eventStore: this.eventStore,
      burnSigners: new InMemorySignerRegistry(config.burnSigners),
      tokens: new InMemoryTokenRegistry(config.supportedTokens),
    });

    this.minter = new GatewayMinter({
      address: config.minterAddress,
      localDomain: config.localDomain,
      clock: this.clock,
      bank: this.bank,
      eventStore: this.eventStore,
      attestationSigners: new InMemorySignerRegistry(config.attestationSigners),
      tokens: new InMemoryTokenRegistry(config.supportedTokens),
    });

    this._subscription =
      logger !== undefined
        ? this.eventStore.subscribeAll((event) => logSettlementEvent(logger, event))
        : undefined;
  }

  // ─── Settlement ────────────────────────────────────────────────────

  burn(batch: Hex, signature: Hex): Promise<BurnReceipt> {
    return this.wallet.gatewayBurn(batch, signature);
  }

  mint(payload: Hex, signature: Hex, caller: Address): Promise<MintReceipt> {
    return this.minter.gatewayMint(payload, signature, caller);
  }

  // ─── Block Clock ───────────────────────────────────────────────────

  currentBlock(): bigint {
    return this.clock.currentBlock();
  }

  advanceBlocks(blocks: bigint): bigint {
    return this.clock.advance(blocks);
  }

  // ─── Event Queries ─────────────────────────────────────────────────

  readAllEvents(options?: ReadAllOptions): readonly StoredEvent[] {
    return this.eventStore.readAll(options);
  }

  readStreamEvents(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    return this.eventStore.read(streamId, options);
  }

  streamExists(streamId: string): boolean {
    return this.eventStore.streamExists(streamId);
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return this.eventStore.verifyIntegrity();
  }

  subscriberFailures(): number {
    return this.eventStore.subscriberFailures;
  }

  // ─── Lifecycle ─────────────────────────────────────────────────────

  stop(): void {
    this._subscription?.unsubscribe();
  }
}

// =============================================================================
// Event Logging
// =============================================================================

function logSettlementEvent(logger: SettlementLogger, stored: StoredEvent): void {
  const { type, payload, metadata } = stored.event;
  const context = {
    eventType: type,
    streamId: stored.streamId,
    globalPosition: stored.globalPosition,
    correlationId: metadata.correlationId,
    ...payload,
  };

  switch (type) {
    case SETTLEMENT_EVENTS.GATEWAY_BURNED:
      logger.info(context, "Burn executed");
      break;
    case SETTLEMENT_EVENTS.INSUFFICIENT_BALANCE:
      logger.warn(context, "Burn debited less than requested");
      break;
    case SETTLEMENT_EVENTS.ATTESTATION_USED:
      logger.info(context, "Attestation minted");
      break;
  }
}
