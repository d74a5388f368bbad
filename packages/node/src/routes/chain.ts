/**
 * Local chain routes: the block clock and the token bank.
 *
 * GET  /api/v1/chain/block                    — Current block height
 * POST /api/v1/chain/advance                  — Mine `blocks` empty blocks
 * GET  /api/v1/chain/tokens/:token/:account   — Token balance held outside the wallet
 * POST /api/v1/chain/credit                   — Fund an account with tokens
 *
 * The service runs its own in-memory chain; these routes stand in for
 * block production and for token balances minted elsewhere.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AdvanceBlocksSchema, CreditSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { parseAddressParam } from "./params.js";

export function createChainRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/block", (c) => {
    const service = c.get("service");
    return c.json({ data: { block: service.currentBlock().toString() } });
  });

  routes.post("/advance", validateBody(AdvanceBlocksSchema), (c) => {
    const service = c.get("service");
    const { blocks } = c.get("validatedBody");

    const block = service.advanceBlocks(BigInt(blocks));

    return c.json({ data: { block: block.toString() } });
  });

  routes.get("/tokens/:token/:account", (c) => {
    const { bank } = c.get("service");
    const token = parseAddressParam("token", c.req.param("token"));
    const account = parseAddressParam("account", c.req.param("account"));
    return c.json({
      data: { token, account, balance: bank.balanceOf(token, account).toString() },
    });
  });

  routes.post("/credit", validateBody(CreditSchema), (c) => {
    const { bank } = c.get("service");
    const { token, account, value } = c.get("validatedBody");

    bank.credit(token, account, value);

    return c.json(
      { data: { token, account, balance: bank.balanceOf(token, account).toString() } },
      201,
    );
  });

  return routes;
}
