/**
 * Codec routes — stateless encoding, decoding and hashing.
 *
 * POST /api/v1/codec/transfer-spec/encode  — TransferSpec → bytes + hash
 * POST /api/v1/codec/transfer-spec/decode  — bytes → TransferSpec + hash
 * POST /api/v1/codec/transfer-spec/hash    — TransferSpec → keccak256 of its encoding
 * POST /api/v1/codec/burn-intents/encode   — BurnIntent(s) → bytes + signing digest
 * POST /api/v1/codec/burn-intents/decode   — BurnIntent or BurnIntentSet → intents
 * POST /api/v1/codec/attestations/encode   — Attestation(s) → bytes + signing digest
 * POST /api/v1/codec/attestations/decode   — Attestation or AttestationSet → attestations
 * POST /api/v1/codec/burn-batch/encode     — burn entries → batch + burn-signer digest
 *
 * Digests are what a signer signs: the EIP-712 digest under the wallet
 * domain for burn intents, under the minter domain for attestations.
 */

import { Hono } from "hono";
import { bytesToHex, hexToBytes } from "viem";
import {
  MINTER_DOMAIN,
  WALLET_DOMAIN,
  burnBatchDigest,
  decodeTransferSpec,
  encodeAttestation,
  encodeAttestationSet,
  encodeBurnBatch,
  encodeBurnIntent,
  encodeBurnIntentSet,
  encodeTransferSpec,
  openAttestationCursor,
  openBurnIntentCursor,
  transferSpecHash,
  typedDataDigest,
} from "@keelway/codec";
import type { AppEnv } from "../types/api-contract.js";
import {
  DecodePayloadSchema,
  EncodeAttestationsSchema,
  EncodeBurnBatchSchema,
  EncodeBurnIntentsSchema,
  EncodeTransferSpecSchema,
} from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { attestationToJson, burnIntentToJson, transferSpecToJson } from "../types/json.js";

export function createCodecRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // ─── TransferSpec ──────────────────────────────────────────────

  routes.post("/transfer-spec/encode", validateBody(EncodeTransferSpecSchema), (c) => {
    const { spec } = c.get("validatedBody");
    const encoded = encodeTransferSpec(spec);

    return c.json({
      data: {
        encoded: bytesToHex(encoded),
        length: encoded.length,
        hash: transferSpecHash(spec),
      },
    });
  });

  routes.post("/transfer-spec/decode", validateBody(DecodePayloadSchema), (c) => {
    const { encoded } = c.get("validatedBody");
    const spec = decodeTransferSpec(hexToBytes(encoded));

    return c.json({ data: { spec: transferSpecToJson(spec), hash: transferSpecHash(spec) } });
  });

  routes.post("/transfer-spec/hash", validateBody(EncodeTransferSpecSchema), (c) => {
    const { spec } = c.get("validatedBody");
    return c.json({ data: { hash: transferSpecHash(spec) } });
  });

  // ─── Burn intents ──────────────────────────────────────────────

  routes.post("/burn-intents/encode", validateBody(EncodeBurnIntentsSchema), (c) => {
    const { intents, asSet } = c.get("validatedBody");
    const [first] = intents;
    const bytes =
      first !== undefined && intents.length === 1 && !asSet
        ? encodeBurnIntent(first)
        : encodeBurnIntentSet(intents);
    const typedDataHash = openBurnIntentCursor(bytes).typedDataHash();

    return c.json({
      data: {
        encoded: bytesToHex(bytes),
        isSet: intents.length > 1 || asSet,
        typedDataHash,
        digest: typedDataDigest(WALLET_DOMAIN, typedDataHash),
        transferSpecHashes: intents.map((intent) => transferSpecHash(intent.spec)),
      },
    });
  });

  routes.post("/burn-intents/decode", validateBody(DecodePayloadSchema), (c) => {
    const bytes = hexToBytes(c.get("validatedBody").encoded);
    const cursor = openBurnIntentCursor(bytes);
    const isSet = cursor.isSet;
    const intents = cursor.rest().map((view) => view.toBurnIntent());
    const typedDataHash = openBurnIntentCursor(bytes).typedDataHash();

    return c.json({
      data: {
        isSet,
        intents: intents.map(burnIntentToJson),
        typedDataHash,
        digest: typedDataDigest(WALLET_DOMAIN, typedDataHash),
      },
    });
  });

  // ─── Attestations ──────────────────────────────────────────────

  routes.post("/attestations/encode", validateBody(EncodeAttestationsSchema), (c) => {
    const { attestations, asSet } = c.get("validatedBody");
    const [first] = attestations;
    const bytes =
      first !== undefined && attestations.length === 1 && !asSet
        ? encodeAttestation(first)
        : encodeAttestationSet(attestations);
    const typedDataHash = openAttestationCursor(bytes).typedDataHash();

    return c.json({
      data: {
        encoded: bytesToHex(bytes),
        isSet: attestations.length > 1 || asSet,
        typedDataHash,
        digest: typedDataDigest(MINTER_DOMAIN, typedDataHash),
        transferSpecHashes: attestations.map((attestation) => transferSpecHash(attestation.spec)),
      },
    });
  });

  routes.post("/attestations/decode", validateBody(DecodePayloadSchema), (c) => {
    const bytes = hexToBytes(c.get("validatedBody").encoded);
    const cursor = openAttestationCursor(bytes);
    const isSet = cursor.isSet;
    const attestations = cursor.rest().map((view) => view.toAttestation());
    const typedDataHash = openAttestationCursor(bytes).typedDataHash();

    return c.json({
      data: {
        isSet,
        attestations: attestations.map(attestationToJson),
        typedDataHash,
        digest: typedDataDigest(MINTER_DOMAIN, typedDataHash),
      },
    });
  });

  // ─── Burn batch ────────────────────────────────────────────────

  routes.post("/burn-batch/encode", validateBody(EncodeBurnBatchSchema), (c) => {
    const { entries } = c.get("validatedBody");
    const batch = {
      intents: entries.map((entry) => entry.intents),
      signatures: entries.map((entry) => entry.signature),
      fees: entries.map((entry) => entry.fees),
    };

    return c.json({ data: { batch: encodeBurnBatch(batch), digest: burnBatchDigest(batch) } });
  });

  return routes;
}
