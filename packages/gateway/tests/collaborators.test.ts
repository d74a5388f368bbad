/**
 * Tests for the in-memory collaborators behind the wallet and minter.
 */

import { describe, it, expect } from "vitest";
import { keccak256, toHex } from "viem";
import { InMemoryDelegation } from "../src/delegation.js";
import { InMemorySignerRegistry } from "../src/signers.js";
import { InMemoryTokenBank, InMemoryTokenRegistry, PendingMoves } from "../src/tokens.js";
import { UsedHashSet } from "../src/used-hashes.js";
import { recoverSigner } from "../src/signatures.js";
import { OTHER_TOKEN, TOKEN, delegate, depositor, failureOf, stranger } from "./helpers.js";

describe("InMemoryDelegation", () => {
  it("counts the depositor as authorized for itself", () => {
    const delegation = new InMemoryDelegation();
    expect(delegation.isAuthorized(TOKEN, depositor.address, depositor.address)).toBe(true);
    expect(delegation.wasEverAuthorized(TOKEN, depositor.address, depositor.address)).toBe(true);
  });

  it("remembers a revoked delegate", () => {
    const delegation = new InMemoryDelegation();
    delegation.authorize(TOKEN, depositor.address, delegate.address);
    delegation.revoke(TOKEN, depositor.address, delegate.address);

    expect(delegation.stateOf(TOKEN, depositor.address, delegate.address)).toBe("revoked");
    expect(delegation.isAuthorized(TOKEN, depositor.address, delegate.address)).toBe(false);
    expect(delegation.wasEverAuthorized(TOKEN, depositor.address, delegate.address)).toBe(true);
  });

  it("ignores revoking a stranger", () => {
    const delegation = new InMemoryDelegation();
    delegation.revoke(TOKEN, depositor.address, stranger.address);
    expect(delegation.wasEverAuthorized(TOKEN, depositor.address, stranger.address)).toBe(false);
  });

  it("matches addresses case-insensitively", () => {
    const delegation = new InMemoryDelegation();
    delegation.authorize(TOKEN, depositor.address, delegate.address);
    const lower = delegate.address.toLowerCase();
    expect(
      delegation.isAuthorized(TOKEN, depositor.address, `0x${lower.slice(2)}`),
    ).toBe(true);
  });
});

describe("InMemorySignerRegistry", () => {
  it("adds each signer once", () => {
    const registry = new InMemorySignerRegistry([depositor.address]);
    expect(registry.add(depositor.address)).toBe(false);
    expect(registry.add(stranger.address)).toBe(true);
    expect(registry.remove(stranger.address)).toBe(true);
    expect(registry.remove(stranger.address)).toBe(false);
    expect(registry.list()).toEqual([depositor.address]);
  });
});

describe("InMemoryTokenRegistry", () => {
  it("lists supported tokens", () => {
    const registry = new InMemoryTokenRegistry([TOKEN]);
    expect(registry.isTokenSupported(OTHER_TOKEN)).toBe(false);
    expect(registry.addSupportedToken(OTHER_TOKEN)).toBe(true);
    expect(registry.addSupportedToken(OTHER_TOKEN)).toBe(false);
    expect(registry.listSupportedTokens()).toHaveLength(2);
  });
});

describe("InMemoryTokenBank", () => {
  it("moves tokens through custody", () => {
    const bank = new InMemoryTokenBank();
    bank.credit(TOKEN, depositor.address, 100n);

    bank.pull(TOKEN, depositor.address, 70n);
    bank.pay(TOKEN, stranger.address, 20n);
    bank.burn(TOKEN, 30n);

    expect(bank.balanceOf(TOKEN, depositor.address)).toBe(30n);
    expect(bank.balanceOf(TOKEN, stranger.address)).toBe(20n);
    expect(bank.custodyOf(TOKEN)).toBe(20n);
    expect(bank.burnedOf(TOKEN)).toBe(30n);
  });

  it("refuses to release more than it holds", () => {
    const bank = new InMemoryTokenBank();
    expect(failureOf(() => bank.pull(TOKEN, depositor.address, 1n)).code).toBe(
      "INSUFFICIENT_TOKEN_BALANCE",
    );
    expect(failureOf(() => bank.burn(TOKEN, 1n)).code).toBe("INSUFFICIENT_TOKEN_BALANCE");
  });

  it("mints new supply", () => {
    const bank = new InMemoryTokenBank();
    bank.mint(TOKEN, stranger.address, 5n);
    expect(bank.balanceOf(TOKEN, stranger.address)).toBe(5n);
    expect(bank.mintedOf(TOKEN)).toBe(5n);
    expect(bank.custodyOf(TOKEN)).toBe(0n);
  });
});

describe("PendingMoves", () => {
  it("moves nothing until applied", () => {
    const bank = new InMemoryTokenBank();
    bank.credit(TOKEN, depositor.address, 100n);
    const moves = new PendingMoves(bank);

    moves.pull(TOKEN, depositor.address, 100n);
    moves.burn(TOKEN, 60n);
    moves.pay(TOKEN, stranger.address, 40n);
    expect(bank.balanceOf(TOKEN, depositor.address)).toBe(100n);
    expect(bank.custodyOf(TOKEN)).toBe(0n);

    moves.apply();
    expect(bank.balanceOf(TOKEN, depositor.address)).toBe(0n);
    expect(bank.balanceOf(TOKEN, stranger.address)).toBe(40n);
    expect(bank.burnedOf(TOKEN)).toBe(60n);
    expect(bank.custodyOf(TOKEN)).toBe(0n);
  });

  it("refuses an unfunded pull when it is queued", () => {
    const bank = new InMemoryTokenBank();
    bank.credit(TOKEN, depositor.address, 10n);
    const moves = new PendingMoves(bank);

    const failure = failureOf(() => moves.pull(TOKEN, depositor.address, 11n));

    expect(failure.code).toBe("INSUFFICIENT_TOKEN_BALANCE");
    expect(failure.details).toEqual({
      token: TOKEN,
      holder: depositor.address,
      held: "10",
      value: "11",
    });
  });
});

describe("UsedHashSet", () => {
  it("marks a hash once and restores snapshots", () => {
    const used = new UsedHashSet();
    const hash = keccak256(toHex("first"));
    const snapshot = used.snapshot();

    expect(used.markUsed(hash)).toBe(true);
    expect(used.markUsed(hash)).toBe(false);
    expect(used.isUsed(hash)).toBe(true);

    used.restore(snapshot);
    expect(used.isUsed(hash)).toBe(false);
    expect(used.size).toBe(0);
  });
});

describe("recoverSigner", () => {
  it("recovers the signing account", async () => {
    const hash = keccak256(toHex("payload"));
    const signature = await depositor.sign({ hash });
    expect(await recoverSigner(hash, signature)).toBe(depositor.address);
  });

  it("returns undefined for a malformed signature", async () => {
    expect(await recoverSigner(keccak256(toHex("payload")), "0x1234")).toBeUndefined();
  });
});
