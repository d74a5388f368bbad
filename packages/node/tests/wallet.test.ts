/**
 * Tests for wallet routes: balances, deposits, withdrawals, delegation.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { getAddress } from "viem";
import type { AppInstance } from "../src/app.js";
import {
  FEE_RECIPIENT,
  LOCAL_DOMAIN,
  TOKEN,
  WALLET,
  burnSigner,
  createTestApp,
  depositor,
  jsonRequest,
  stranger,
  type ErrorBody,
} from "./setup.js";

let instance: AppInstance;

beforeEach(() => {
  instance = createTestApp();
});

async function credit(account: string, value: string): Promise<void> {
  const res = await instance.app.request(
    jsonRequest("/api/v1/chain/credit", "POST", { token: TOKEN, account, value }),
  );
  expect(res.status).toBe(201);
}

async function deposit(value: string): Promise<Response> {
  return instance.app.request(
    jsonRequest("/api/v1/wallet/deposits", "POST", {
      token: TOKEN,
      depositor: depositor.address,
      value,
    }),
  );
}

describe("GET /api/v1/wallet", () => {
  it("describes the deployment", async () => {
    const res = await instance.app.request("/api/v1/wallet");
    expect(res.status).toBe(200);

    const body = (await res.json()) as { data: Record<string, unknown> };
    expect(body.data).toEqual({
      address: WALLET,
      localDomain: LOCAL_DOMAIN,
      feeRecipient: FEE_RECIPIENT,
      withdrawalDelay: "10",
      burnSigners: [burnSigner.address],
      supportedTokens: [TOKEN],
    });
  });
});

describe("POST /api/v1/wallet/deposits", () => {
  it("credits the available balance", async () => {
    await credit(depositor.address, "500");

    const res = await deposit("200");
    expect(res.status).toBe(201);

    const body = (await res.json()) as { data: Record<string, unknown> };
    expect(body.data).toEqual({
      token: TOKEN,
      depositor: depositor.address,
      value: "200",
      available: "200",
    });
    expect(instance.service.bank.balanceOf(TOKEN, depositor.address)).toBe(300n);
  });

  it("accepts lowercase addresses and answers with checksummed ones", async () => {
    await credit(depositor.address, "5");

    const res = await instance.app.request(
      jsonRequest("/api/v1/wallet/deposits", "POST", {
        token: TOKEN.toLowerCase(),
        depositor: depositor.address.toLowerCase(),
        value: "5",
      }),
    );

    const body = (await res.json()) as { data: { token: string; depositor: string } };
    expect(body.data.token).toBe(TOKEN);
    expect(body.data.depositor).toBe(depositor.address);
  });

  it("deposits on behalf of another depositor", async () => {
    await credit(stranger.address, "40");

    const res = await instance.app.request(
      jsonRequest("/api/v1/wallet/deposits", "POST", {
        token: TOKEN,
        depositor: depositor.address,
        sender: stranger.address,
        value: "40",
      }),
    );

    expect(res.status).toBe(201);
    expect(instance.service.wallet.availableBalance(TOKEN, depositor.address)).toBe(40n);
    expect(instance.service.bank.balanceOf(TOKEN, stranger.address)).toBe(0n);
  });

  it("returns 422 when the depositor holds too few tokens", async () => {
    await credit(depositor.address, "10");

    const res = await deposit("11");
    expect(res.status).toBe(422);

    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("INSUFFICIENT_TOKEN_BALANCE");
    expect(instance.service.wallet.availableBalance(TOKEN, depositor.address)).toBe(0n);
  });

  it("returns 422 for an unsupported token", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/wallet/deposits", "POST", {
        token: getAddress("0x00000000000000000000000000000000000000c9"),
        depositor: depositor.address,
        value: "1",
      }),
    );

    expect(res.status).toBe(422);
    expect(((await res.json()) as ErrorBody).error.code).toBe("UNSUPPORTED_TOKEN");
  });

  it("returns 400 for a zero value", async () => {
    const res = await deposit("0");

    expect(res.status).toBe(400);
    expect(((await res.json()) as ErrorBody).error.code).toBe("VALUE_MUST_BE_POSITIVE");
  });

  it("rejects a malformed body with the offending paths", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/wallet/deposits", "POST", {
        token: TOKEN,
        depositor: "0x12",
        value: "-5",
      }),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("VALIDATION_ERROR");
    const issues = body.error.details?.["issues"] as { path: string }[];
    expect(issues.map((i) => i.path).sort()).toEqual(["depositor", "value"]);
  });

  it("rejects a body that is not JSON", async () => {
    const res = await instance.app.request("/api/v1/wallet/deposits", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: "{not json",
    });

    expect(res.status).toBe(400);
    expect(((await res.json()) as ErrorBody).error.message).toBe("Invalid JSON in request body");
  });
});

describe("withdrawals", () => {
  beforeEach(async () => {
    await credit(depositor.address, "500");
    await deposit("200");
  });

  it("starts a withdrawal that matures after the delay", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/wallet/withdrawals", "POST", {
        token: TOKEN,
        depositor: depositor.address,
        value: "50",
      }),
    );

    expect(res.status).toBe(201);
    const body = (await res.json()) as { data: Record<string, unknown> };
    expect(body.data).toEqual({
      token: TOKEN,
      depositor: depositor.address,
      value: "50",
      withdrawableAtBlock: "110",
    });
  });

  it("refuses to pay out early, then pays at the withdrawable block", async () => {
    const { app } = instance;
    await app.request(
      jsonRequest("/api/v1/wallet/withdrawals", "POST", {
        token: TOKEN,
        depositor: depositor.address,
        value: "50",
      }),
    );
    const complete = (): Request =>
      jsonRequest("/api/v1/wallet/withdrawals/complete", "POST", {
        token: TOKEN,
        depositor: depositor.address,
      });

    const early = await app.request(complete());
    expect(early.status).toBe(422);
    expect(((await early.json()) as ErrorBody).error).toEqual({
      code: "WITHDRAWAL_NOT_YET_AVAILABLE",
      message: `Withdrawal for ${depositor.address} becomes available at block 110`,
      details: { withdrawableAtBlock: "110", currentBlock: "100" },
    });

    const advanced = await app.request(
      jsonRequest("/api/v1/chain/advance", "POST", { blocks: 10 }),
    );
    expect(((await advanced.json()) as { data: { block: string } }).data.block).toBe("110");

    const paid = await app.request(complete());
    expect(paid.status).toBe(200);
    expect(((await paid.json()) as { data: { value: string } }).data.value).toBe("50");
    expect(instance.service.bank.balanceOf(TOKEN, depositor.address)).toBe(350n);
  });

  it("reports the balance split", async () => {
    await instance.app.request(
      jsonRequest("/api/v1/wallet/withdrawals", "POST", {
        token: TOKEN,
        depositor: depositor.address,
        value: "50",
      }),
    );

    const res = await instance.app.request(
      `/api/v1/wallet/balances/${depositor.address}/${TOKEN}`,
    );
    const body = (await res.json()) as { data: Record<string, unknown> };
    expect(body.data).toEqual({
      token: TOKEN,
      depositor: depositor.address,
      total: "200",
      available: "150",
      withdrawing: "50",
      withdrawable: "0",
      withdrawableAtBlock: "110",
    });
  });

  it("returns 422 when withdrawing more than is available", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/wallet/withdrawals", "POST", {
        token: TOKEN,
        depositor: depositor.address,
        value: "201",
      }),
    );

    expect(res.status).toBe(422);
    expect(((await res.json()) as ErrorBody).error.code).toBe("INSUFFICIENT_AVAILABLE_BALANCE");
  });
});

describe("GET /api/v1/wallet/balances/:depositor", () => {
  it("lists every token balance of the depositor", async () => {
    await credit(depositor.address, "30");
    await deposit("30");

    const res = await instance.app.request(`/api/v1/wallet/balances/${depositor.address}`);
    const body = (await res.json()) as { data: unknown[] };
    expect(body.data).toEqual([
      {
        token: TOKEN,
        depositor: depositor.address,
        available: "30",
        withdrawing: "0",
        withdrawableAtBlock: "0",
      },
    ]);
  });

  it("returns 400 for a path parameter that is not an address", async () => {
    const res = await instance.app.request("/api/v1/wallet/balances/not-an-address");

    expect(res.status).toBe(400);
    expect(((await res.json()) as ErrorBody).error).toEqual({
      code: "VALIDATION_ERROR",
      message: "Path parameter 'depositor' must be an address",
      details: { depositor: "not-an-address" },
    });
  });
});

describe("delegates", () => {
  it("authorizes and revokes a delegate", async () => {
    const { app } = instance;
    const body = { token: TOKEN, depositor: depositor.address, delegate: stranger.address };

    const added = await app.request(jsonRequest("/api/v1/wallet/delegates", "POST", body));
    expect(added.status).toBe(201);
    expect(((await added.json()) as { data: { state: string } }).data.state).toBe("authorized");

    const revoked = await app.request(
      jsonRequest("/api/v1/wallet/delegates/revoke", "POST", body),
    );
    expect(revoked.status).toBe(200);
    expect(((await revoked.json()) as { data: { state: string } }).data.state).toBe("revoked");
  });

  it("returns 422 for self-delegation", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/wallet/delegates", "POST", {
        token: TOKEN,
        depositor: depositor.address,
        delegate: depositor.address,
      }),
    );

    expect(res.status).toBe(422);
    expect(((await res.json()) as ErrorBody).error.code).toBe("CANNOT_DELEGATE_TO_SELF");
  });
});
