/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body/query validation.
 *
 * On the wire, uint256 amounts travel as base-10 strings, uint32 fields
 * as JSON numbers, and byte strings as `0x`-prefixed hex.
 */

import { z } from "zod";
import { getAddress } from "viem";
import {
  MAX_UINT256,
  MAX_UINT32,
  isAddress,
  isBytes32,
  isHex,
  type Bytes32,
  type Hex,
} from "@keelway/types";

// =============================================================================
// Shared Schemas
// =============================================================================

export const HexSchema = z
  .string()
  .refine((v): v is Hex => isHex(v), "must be 0x-prefixed hex with whole bytes");

export const Bytes32Schema = z
  .string()
  .refine((v): v is Bytes32 => isBytes32(v), "must be a 32-byte hex word");

/** Normalized to its checksummed form. */
export const AddressSchema = z
  .string()
  .refine((v) => isAddress(v), "must be a 20-byte hex address")
  .transform((v) => getAddress(v));

export const Uint32Schema = z.number().int().min(0).max(MAX_UINT32);

export const Uint256Schema = z
  .string()
  .regex(/^(0|[1-9]\d*)$/, "must be a base-10 unsigned integer")
  .transform((v) => BigInt(v))
  .refine((v) => v <= MAX_UINT256, "exceeds uint256");

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

// =============================================================================
// Codec DTOs
// =============================================================================

export const TransferSpecSchema = z.object({
  version: Uint32Schema.default(1),
  sourceDomain: Uint32Schema,
  destinationDomain: Uint32Schema,
  sourceContract: Bytes32Schema,
  destinationContract: Bytes32Schema,
  sourceToken: Bytes32Schema,
  destinationToken: Bytes32Schema,
  sourceDepositor: Bytes32Schema,
  destinationRecipient: Bytes32Schema,
  sourceSigner: Bytes32Schema,
  destinationCaller: Bytes32Schema,
  value: Uint256Schema,
  salt: Bytes32Schema,
  hookData: HexSchema.default("0x"),
});

export const BurnIntentSchema = z.object({
  version: Uint32Schema.default(1),
  maxBlockHeight: Uint256Schema,
  maxFee: Uint256Schema,
  spec: TransferSpecSchema,
});

export const AttestationSchema = z.object({
  version: Uint32Schema.default(1),
  spec: TransferSpecSchema,
});

export const EncodeTransferSpecSchema = z.object({
  spec: TransferSpecSchema,
});

export type EncodeTransferSpecDto = z.infer<typeof EncodeTransferSpecSchema>;

export const DecodePayloadSchema = z.object({
  encoded: HexSchema,
});

export type DecodePayloadDto = z.infer<typeof DecodePayloadSchema>;

export const EncodeBurnIntentsSchema = z.object({
  intents: z.array(BurnIntentSchema).min(1),
  /** Encode a single intent as a one-element set. */
  asSet: z.boolean().default(false),
});

export type EncodeBurnIntentsDto = z.infer<typeof EncodeBurnIntentsSchema>;

export const EncodeAttestationsSchema = z.object({
  attestations: z.array(AttestationSchema).min(1),
  asSet: z.boolean().default(false),
});

export type EncodeAttestationsDto = z.infer<typeof EncodeAttestationsSchema>;

export const EncodeBurnBatchSchema = z.object({
  entries: z
    .array(
      z.object({
        intents: HexSchema,
        signature: HexSchema,
        fees: z.array(Uint256Schema),
      }),
    )
    .min(1),
});

export type EncodeBurnBatchDto = z.infer<typeof EncodeBurnBatchSchema>;

// =============================================================================
// Wallet DTOs
// =============================================================================

export const DepositSchema = z.object({
  token: AddressSchema,
  depositor: AddressSchema,
  value: Uint256Schema,
  /** Pays on the depositor's behalf when set. */
  sender: AddressSchema.optional(),
});

export type DepositDto = z.infer<typeof DepositSchema>;

export const InitiateWithdrawalSchema = z.object({
  token: AddressSchema,
  depositor: AddressSchema,
  value: Uint256Schema,
});

export type InitiateWithdrawalDto = z.infer<typeof InitiateWithdrawalSchema>;

export const CompleteWithdrawalSchema = z.object({
  token: AddressSchema,
  depositor: AddressSchema,
});

export type CompleteWithdrawalDto = z.infer<typeof CompleteWithdrawalSchema>;

export const DelegateSchema = z.object({
  token: AddressSchema,
  depositor: AddressSchema,
  delegate: AddressSchema,
});

export type DelegateDto = z.infer<typeof DelegateSchema>;

export const BurnSchema = z.object({
  batch: HexSchema,
  signature: HexSchema,
});

export type BurnDto = z.infer<typeof BurnSchema>;

// =============================================================================
// Minter DTOs
// =============================================================================

export const MintSchema = z.object({
  payload: HexSchema,
  signature: HexSchema,
  caller: AddressSchema,
});

export type MintDto = z.infer<typeof MintSchema>;

// =============================================================================
// Chain and bank DTOs
// =============================================================================

export const AdvanceBlocksSchema = z.object({
  blocks: z.number().int().min(1).max(1_000_000).default(1),
});

export type AdvanceBlocksDto = z.infer<typeof AdvanceBlocksSchema>;

export const CreditSchema = z.object({
  token: AddressSchema,
  account: AddressSchema,
  value: Uint256Schema,
});

export type CreditDto = z.infer<typeof CreditSchema>;

// =============================================================================
// Event DTOs
// =============================================================================

export const ListEventsQuerySchema = PaginationQuerySchema.extend({
  afterPosition: z.coerce.number().int().min(0).optional(),
  /** Comma-separated event types. */
  types: z.string().optional(),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;

export const ListStreamEventsQuerySchema = PaginationQuerySchema.extend({
  afterVersion: z.coerce.number().int().min(0).optional(),
});

export type ListStreamEventsQuery = z.infer<typeof ListStreamEventsQuerySchema>;
