/**
 * Gateway minter routes.
 *
 * GET  /api/v1/minter                        — Deployment and trusted signers
 * POST /api/v1/minter/mints                  — Mint a signed Attestation or AttestationSet
 * GET  /api/v1/minter/transfer-specs/:hash   — Whether a spec hash was minted
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { MintSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { mintReceiptToJson } from "../types/json.js";
import { parseBytes32Param } from "./params.js";

export function createMinterRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const { minter } = c.get("service");
    return c.json({
      data: {
        address: minter.address,
        localDomain: minter.localDomain,
        attestationSigners: minter.attestationSigners(),
        supportedTokens: minter.supportedTokens(),
      },
    });
  });

  routes.post("/mints", validateBody(MintSchema), async (c) => {
    const service = c.get("service");
    const { payload, signature, caller } = c.get("validatedBody");

    const receipt = await service.mint(payload, signature, caller);

    return c.json({ data: mintReceiptToJson(receipt) }, 201);
  });

  routes.get("/transfer-specs/:hash", (c) => {
    const { minter } = c.get("service");
    const hash = parseBytes32Param("hash", c.req.param("hash"));
    return c.json({ data: { transferSpecHash: hash, used: minter.isTransferSpecHashUsed(hash) } });
  });

  return routes;
}
