/**
 * @keelway/gateway — Delegation.
 *
 * A depositor may let another address sign burn intents for one token.
 * Revoking a delegate stops new authorizations but does not void
 * intents it already signed: a burn checks whether the signer was
 * *ever* authorized.
 */

import type { Address } from "@keelway/types";

export type DelegationState = "none" | "authorized" | "revoked";

export interface Delegation {
  stateOf(token: Address, depositor: Address, delegate: Address): DelegationState;
  /** Currently authorized; the depositor always is for its own balance. */
  isAuthorized(token: Address, depositor: Address, signer: Address): boolean;
  /** Authorized now or at some point in the past. */
  wasEverAuthorized(token: Address, depositor: Address, signer: Address): boolean;
  authorize(token: Address, depositor: Address, delegate: Address): void;
  revoke(token: Address, depositor: Address, delegate: Address): void;
}

function keyOf(token: Address, depositor: Address, delegate: Address): string {
  return `${token}:${depositor}:${delegate}`.toLowerCase();
}

function isSelf(depositor: Address, signer: Address): boolean {
  return depositor.toLowerCase() === signer.toLowerCase();
}

export class InMemoryDelegation implements Delegation {
  private readonly _states = new Map<string, DelegationState>();

  stateOf(token: Address, depositor: Address, delegate: Address): DelegationState {
    return this._states.get(keyOf(token, depositor, delegate)) ?? "none";
  }

  isAuthorized(token: Address, depositor: Address, signer: Address): boolean {
    return (
      isSelf(depositor, signer) || this.stateOf(token, depositor, signer) === "authorized"
    );
  }

  wasEverAuthorized(token: Address, depositor: Address, signer: Address): boolean {
    return isSelf(depositor, signer) || this.stateOf(token, depositor, signer) !== "none";
  }

  authorize(token: Address, depositor: Address, delegate: Address): void {
    this._states.set(keyOf(token, depositor, delegate), "authorized");
  }

  /** Revoking a delegate that was never authorized leaves it at "none". */
  revoke(token: Address, depositor: Address, delegate: Address): void {
    if (this.stateOf(token, depositor, delegate) === "authorized") {
      this._states.set(keyOf(token, depositor, delegate), "revoked");
    }
  }
}
