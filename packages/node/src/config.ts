/**
 * @keelway/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 * Address lists are comma-separated; every entry must be a 20-byte hex
 * address and is stored in checksummed form.
 *
 * API_KEYS turns on secured mode: "key:role" or "key:role:depositor"
 * entries, comma-separated. Left empty, every /api route is open.
 */

import { z } from "zod";
import { getAddress } from "viem";
import { MAX_UINT32, isAddress, type Address } from "@keelway/types";
import { isRole, type ApiKeyRecord } from "./types/auth.js";

// =============================================================================
// Address Parsing
// =============================================================================

/**
 * Parse a comma-separated address list.
 *
 * Blank entries are skipped and duplicates collapse to one.
 *
 * @throws {Error} naming the first entry that is not an address
 */
export function parseAddressList(raw: string): readonly Address[] {
  const seen = new Set<string>();
  const addresses: Address[] = [];

  for (const entry of raw.split(",")) {
    const trimmed = entry.trim();
    if (trimmed === "") continue;
    if (!isAddress(trimmed)) {
      throw new Error(`Invalid address "${trimmed}": expected 0x followed by 40 hex digits`);
    }
    const address = getAddress(trimmed);
    if (seen.has(address)) continue;
    seen.add(address);
    addresses.push(address);
  }

  return addresses;
}

/**
 * Parse the API_KEYS env var into a key registry.
 *
 * Format: "key1:role1,key2:role2:0xDepositor"
 *
 * @throws {Error} naming the first malformed entry
 */
export function parseApiKeys(raw: string): ReadonlyMap<string, ApiKeyRecord> {
  const keys = new Map<string, ApiKeyRecord>();

  for (const entry of raw.split(",")) {
    const trimmed = entry.trim();
    if (trimmed === "") continue;

    const [key = "", role = "", depositor, ...rest] = trimmed.split(":");
    if (rest.length > 0 || role === "") {
      throw new Error(
        `Invalid API_KEYS entry "${trimmed}": expected key:role or key:role:depositor`,
      );
    }
    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (!isRole(role)) {
      throw new Error(`Invalid role "${role}" in API_KEYS. Must be: admin, operator, or viewer`);
    }
    if (depositor !== undefined && !isAddress(depositor)) {
      throw new Error(`Invalid depositor "${depositor}" for API key "${key}"`);
    }
    if (keys.has(key)) {
      throw new Error(`Duplicate API key "${key}"`);
    }

    keys.set(key, {
      key,
      role,
      ...(depositor !== undefined ? { depositor: getAddress(depositor) } : {}),
    });
  }

  return keys;
}

const AddressVar = z
  .string()
  .trim()
  .refine((v) => isAddress(v), "must be a 20-byte hex address")
  .transform((v) => getAddress(v));

const AddressListVar = z
  .string()
  .default("")
  .transform((raw, ctx) => {
    try {
      return parseAddressList(raw);
    } catch (err) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: err instanceof Error ? err.message : String(err),
      });
      return z.NEVER;
    }
  });

const ApiKeysVar = z
  .string()
  .default("")
  .transform((raw, ctx) => {
    try {
      return parseApiKeys(raw);
    } catch (err) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: err instanceof Error ? err.message : String(err),
      });
      return z.NEVER;
    }
  });

const BlockVar = z
  .string()
  .regex(/^(0|[1-9]\d*)$/, "must be a non-negative integer");

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Deployment
  LOCAL_DOMAIN: z.coerce.number().int().min(0).max(MAX_UINT32).default(0),
  WALLET_ADDRESS: AddressVar,
  MINTER_ADDRESS: AddressVar,
  FEE_RECIPIENT: AddressVar,

  // Withdrawals and the block clock
  WITHDRAWAL_DELAY_BLOCKS: BlockVar.default("100").transform((v) => BigInt(v)),
  START_BLOCK: BlockVar.default("0").transform((v) => BigInt(v)),

  // Auth
  API_KEYS: ApiKeysVar,

  // Trust
  BURN_SIGNERS: AddressListVar,
  ATTESTATION_SIGNERS: AddressListVar,
  SUPPORTED_TOKENS: AddressListVar,
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
