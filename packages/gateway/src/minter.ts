/**
 * @keelway/gateway — Gateway minter.
 *
 * The destination-side half of a transfer. An attestation signer vouches
 * that a TransferSpec was burned on its source domain; the minter checks
 * that each attested spec is addressed to this domain and this minter,
 * that the caller may relay it, and that it was never minted before,
 * then creates the value for `destinationRecipient`.
 *
 * The minter never talks to a wallet: it trusts only the attestation
 * signature and its own replay guard.
 */

import { getAddress, hexToBytes, type Hex } from "viem";
import type { Address } from "@keelway/types";
import { ZERO_BYTES32 } from "@keelway/types";
import {
  MINTER_DOMAIN,
  addressToBytes32,
  openAttestationCursor,
  sameBytes32,
  tryBytes32ToAddress,
  typedDataDigest,
} from "@keelway/codec";
import { SETTLEMENT_EVENTS } from "@keelway/event-store";
import { GatewayError, failAt, type ElementPosition } from "./errors.js";
import { EventRecorder, type PendingEvents } from "./events.js";
import { recoverSigner } from "./signatures.js";
import { InMemorySignerRegistry, type SignerRegistry } from "./signers.js";
import {
  InMemoryTokenRegistry,
  PendingMoves,
  type TokenBank,
  type TokenRegistry,
} from "./tokens.js";
import { UsedHashSet } from "./used-hashes.js";
import type { GatewayMinterOptions, MintReceipt, MintRecord } from "./types.js";

export class GatewayMinter {
  readonly address: Address;
  readonly localDomain: number;
  private readonly _bank: TokenBank;
  private readonly _attestationSigners: SignerRegistry;
  private readonly _tokens: TokenRegistry;
  private readonly _usedHashes = new UsedHashSet();
  private readonly _events: EventRecorder;

  constructor(options: GatewayMinterOptions) {
    this.address = getAddress(options.address);
    this.localDomain = options.localDomain;
    this._bank = options.bank;
    this._attestationSigners = options.attestationSigners ?? new InMemorySignerRegistry();
    this._tokens = options.tokens ?? new InMemoryTokenRegistry();
    this._events = new EventRecorder(
      options.eventStore,
      `minter:${this.address.toLowerCase()}`,
      "minter",
      options.clock,
    );
  }

  get streamId(): string {
    return this._events.streamId;
  }

  // ─── Mint ─────────────────────────────────────────────────────────────

  /**
   * Mint every element of an Attestation or AttestationSet.
   *
   * @param caller - the relayer submitting the attestation; must match a
   *   non-zero `destinationCaller`
   * @throws {CodecError} for a malformed payload
   * @throws {GatewayError} for a bad signer, a misaddressed or replayed
   *   attestation, or an unsupported token
   */
  async gatewayMint(payload: Hex, signature: Hex, caller: Address): Promise<MintReceipt> {
    const bytes = hexToBytes(payload);
    const digest = typedDataDigest(MINTER_DOMAIN, openAttestationCursor(bytes).typedDataHash());
    const attestationSigner = await recoverSigner(digest, signature);
    if (
      attestationSigner === undefined ||
      !this._attestationSigners.isSigner(attestationSigner)
    ) {
      throw new GatewayError(
        "INVALID_ATTESTATION_SIGNER",
        "Attestation was not signed by an attestation signer",
        { signer: attestationSigner ?? "unrecoverable" },
      );
    }

    return this._transact(caller, (events, moves) =>
      this._executeMint(bytes, attestationSigner, caller, events, moves),
    );
  }

  private _executeMint(
    bytes: Uint8Array,
    attestationSigner: Address,
    caller: Address,
    events: PendingEvents,
    moves: PendingMoves,
  ): MintReceipt {
    const minterWord = addressToBytes32(this.address);
    const callerWord = addressToBytes32(caller);
    const mints: MintRecord[] = [];

    const cursor = openAttestationCursor(bytes);
    while (!cursor.done) {
      const position: ElementPosition = { batchIndex: 0, intentIndex: cursor.index };
      const spec = cursor.next().spec;

      if (spec.value === 0n) {
        failAt(
          "ATTESTATION_VALUE_MUST_BE_POSITIVE_AT_INDEX",
          position,
          "Attested value must be positive",
        );
      }
      if (spec.destinationDomain !== this.localDomain) {
        failAt("INVALID_DESTINATION_DOMAIN_AT_INDEX", position, "Attestation targets another domain", {
          destinationDomain: spec.destinationDomain,
          localDomain: this.localDomain,
        });
      }
      if (!sameBytes32(spec.destinationContract, minterWord)) {
        failAt(
          "INVALID_DESTINATION_CONTRACT_AT_INDEX",
          position,
          "Attestation names another destination contract",
          { destinationContract: spec.destinationContract },
        );
      }
      const destinationCaller = spec.destinationCaller;
      if (
        !sameBytes32(destinationCaller, ZERO_BYTES32) &&
        !sameBytes32(destinationCaller, callerWord)
      ) {
        failAt("INVALID_DESTINATION_CALLER_AT_INDEX", position, `${caller} may not relay this attestation`, {
          destinationCaller,
          caller,
        });
      }
      const token = tryBytes32ToAddress(spec.destinationToken);
      if (token === undefined || !this._tokens.isTokenSupported(token)) {
        failAt(
          "UNSUPPORTED_DESTINATION_TOKEN_AT_INDEX",
          position,
          "Attestation names an unsupported token",
          { destinationToken: spec.destinationToken },
        );
      }
      const recipient = tryBytes32ToAddress(spec.destinationRecipient);
      if (recipient === undefined) {
        failAt(
          "INVALID_DESTINATION_RECIPIENT_AT_INDEX",
          position,
          "destinationRecipient does not hold an address",
          { destinationRecipient: spec.destinationRecipient },
        );
      }

      const transferSpecHash = spec.getHash();
      if (!this._usedHashes.markUsed(transferSpecHash)) {
        failAt("ATTESTATION_HASH_USED_AT_INDEX", position, "TransferSpec was already minted", {
          transferSpecHash,
        });
      }

      events.record(SETTLEMENT_EVENTS.ATTESTATION_USED, {
        token,
        recipient,
        transferSpecHash,
        sourceDomain: spec.sourceDomain,
        sourceDepositor: spec.sourceDepositor,
        sourceSigner: spec.sourceSigner,
        value: spec.value.toString(),
      });
      mints.push({
        intentIndex: position.intentIndex,
        token,
        recipient,
        transferSpecHash,
        sourceDomain: spec.sourceDomain,
        sourceDepositor: spec.sourceDepositor,
        value: spec.value,
      });
    }

    for (const mint of mints) {
      moves.mint(mint.token, mint.recipient, mint.value);
    }

    return { correlationId: events.correlationId, attestationSigner, mints };
  }

  // ─── Administration ───────────────────────────────────────────────────

  addAttestationSigner(signer: Address): void {
    if (this._attestationSigners.isSigner(signer)) return;
    this._transact("system", (events) => {
      events.record(SETTLEMENT_EVENTS.ATTESTATION_SIGNER_ADDED, { signer });
      this._attestationSigners.add(signer);
    });
  }

  removeAttestationSigner(signer: Address): void {
    if (!this._attestationSigners.isSigner(signer)) return;
    this._transact("system", (events) => {
      events.record(SETTLEMENT_EVENTS.ATTESTATION_SIGNER_REMOVED, { signer });
      this._attestationSigners.remove(signer);
    });
  }

  isAttestationSigner(signer: Address): boolean {
    return this._attestationSigners.isSigner(signer);
  }

  attestationSigners(): readonly Address[] {
    return this._attestationSigners.list();
  }

  addSupportedToken(token: Address): void {
    if (this._tokens.isTokenSupported(token)) return;
    this._transact("system", (events) => {
      events.record(SETTLEMENT_EVENTS.MINTER_TOKEN_SUPPORTED, { token });
      this._tokens.addSupportedToken(token);
    });
  }

  isTokenSupported(token: Address): boolean {
    return this._tokens.isTokenSupported(token);
  }

  supportedTokens(): readonly Address[] {
    return this._tokens.listSupportedTokens();
  }

  isTransferSpecHashUsed(hash: Hex): boolean {
    return this._usedHashes.isUsed(hash);
  }

  /** Mints reach the bank only after the call's events are committed. */
  private _transact<T>(
    actor: string,
    fn: (events: PendingEvents, moves: PendingMoves) => T,
  ): T {
    const usedHashes = this._usedHashes.snapshot();
    const events = this._events.begin(actor);
    const moves = new PendingMoves(this._bank);
    let result: T;
    try {
      result = fn(events, moves);
      this._events.commit(events);
    } catch (err) {
      this._usedHashes.restore(usedHashes);
      throw err;
    }
    moves.apply();
    return result;
  }
}
