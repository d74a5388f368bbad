/**
 * Gateway wallet routes.
 *
 * GET  /api/v1/wallet                              — Deployment and policy
 * GET  /api/v1/wallet/balances/:depositor          — Every token balance of a depositor
 * GET  /api/v1/wallet/balances/:depositor/:token   — One balance, with what is withdrawable now
 * POST /api/v1/wallet/deposits                     — Deposit (optionally on a depositor's behalf)
 * POST /api/v1/wallet/withdrawals                  — Start a delayed withdrawal
 * POST /api/v1/wallet/withdrawals/complete         — Pay out a matured withdrawal
 * POST /api/v1/wallet/delegates                    — Authorize a delegate signer
 * POST /api/v1/wallet/delegates/revoke             — Revoke a delegate signer
 * POST /api/v1/wallet/burns                        — Execute a signed burn batch
 * GET  /api/v1/wallet/transfer-specs/:hash         — Whether a spec hash was burned
 *
 * A key bound to a depositor only deposits from, withdraws for and
 * manages the delegates of that depositor.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  BurnSchema,
  CompleteWithdrawalSchema,
  DelegateSchema,
  DepositSchema,
  InitiateWithdrawalSchema,
} from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { assertActsFor } from "../middleware/auth.js";
import { parseAddressParam, parseBytes32Param } from "./params.js";
import {
  balanceEntryToJson,
  burnReceiptToJson,
  withdrawalReceiptToJson,
} from "../types/json.js";

export function createWalletRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // GET /api/v1/wallet
  routes.get("/", (c) => {
    const { wallet } = c.get("service");
    return c.json({
      data: {
        address: wallet.address,
        localDomain: wallet.localDomain,
        feeRecipient: wallet.feeRecipient,
        withdrawalDelay: wallet.withdrawalDelay.toString(),
        burnSigners: wallet.burnSigners(),
        supportedTokens: wallet.supportedTokens(),
      },
    });
  });

  // ─── Balances ──────────────────────────────────────────────────

  routes.get("/balances/:depositor", (c) => {
    const { wallet } = c.get("service");
    const depositor = parseAddressParam("depositor", c.req.param("depositor"));
    return c.json({ data: wallet.getBalances(depositor).map(balanceEntryToJson) });
  });

  routes.get("/balances/:depositor/:token", (c) => {
    const { wallet } = c.get("service");
    const depositor = parseAddressParam("depositor", c.req.param("depositor"));
    const token = parseAddressParam("token", c.req.param("token"));

    return c.json({
      data: {
        token,
        depositor,
        total: wallet.totalBalance(token, depositor).toString(),
        available: wallet.availableBalance(token, depositor).toString(),
        withdrawing: wallet.withdrawingBalance(token, depositor).toString(),
        withdrawable: wallet.withdrawableBalance(token, depositor).toString(),
        withdrawableAtBlock: wallet.withdrawalBlock(token, depositor).toString(),
      },
    });
  });

  // ─── Deposits and withdrawals ──────────────────────────────────

  routes.post("/deposits", validateBody(DepositSchema), (c) => {
    const { wallet } = c.get("service");
    const body = c.get("validatedBody");
    assertActsFor(c.get("auth"), body.sender ?? body.depositor);

    if (body.sender === undefined) {
      wallet.deposit(body.token, body.depositor, body.value);
    } else {
      wallet.depositFor(body.token, body.sender, body.depositor, body.value);
    }

    return c.json(
      {
        data: {
          token: body.token,
          depositor: body.depositor,
          value: body.value.toString(),
          available: wallet.availableBalance(body.token, body.depositor).toString(),
        },
      },
      201,
    );
  });

  routes.post("/withdrawals", validateBody(InitiateWithdrawalSchema), (c) => {
    const { wallet } = c.get("service");
    const body = c.get("validatedBody");
    assertActsFor(c.get("auth"), body.depositor);

    const receipt = wallet.initiateWithdrawal(body.token, body.depositor, body.value);

    return c.json({ data: withdrawalReceiptToJson(receipt) }, 201);
  });

  routes.post("/withdrawals/complete", validateBody(CompleteWithdrawalSchema), (c) => {
    const { wallet } = c.get("service");
    const body = c.get("validatedBody");
    assertActsFor(c.get("auth"), body.depositor);

    const value = wallet.withdraw(body.token, body.depositor);

    return c.json({
      data: { token: body.token, depositor: body.depositor, value: value.toString() },
    });
  });

  // ─── Delegation ────────────────────────────────────────────────

  routes.post("/delegates", validateBody(DelegateSchema), (c) => {
    const { wallet } = c.get("service");
    const { token, depositor, delegate } = c.get("validatedBody");
    assertActsFor(c.get("auth"), depositor);

    wallet.addDelegate(token, depositor, delegate);

    return c.json(
      { data: { token, depositor, delegate, state: wallet.delegationState(token, depositor, delegate) } },
      201,
    );
  });

  routes.post("/delegates/revoke", validateBody(DelegateSchema), (c) => {
    const { wallet } = c.get("service");
    const { token, depositor, delegate } = c.get("validatedBody");
    assertActsFor(c.get("auth"), depositor);

    wallet.removeDelegate(token, depositor, delegate);

    return c.json({
      data: { token, depositor, delegate, state: wallet.delegationState(token, depositor, delegate) },
    });
  });

  // ─── Burns ─────────────────────────────────────────────────────

  routes.post("/burns", validateBody(BurnSchema), async (c) => {
    const service = c.get("service");
    const { batch, signature } = c.get("validatedBody");

    const receipt = await service.burn(batch, signature);

    return c.json({ data: burnReceiptToJson(receipt) }, 201);
  });

  routes.get("/transfer-specs/:hash", (c) => {
    const { wallet } = c.get("service");
    const hash = parseBytes32Param("hash", c.req.param("hash"));
    return c.json({ data: { transferSpecHash: hash, used: wallet.isTransferSpecHashUsed(hash) } });
  });

  return routes;
}
