/**
 * Type barrel — re-exports all public types from @keelway/node.
 */

// DTOs
export {
  HexSchema,
  Bytes32Schema,
  AddressSchema,
  Uint32Schema,
  Uint256Schema,
  PaginationQuerySchema,
  TransferSpecSchema,
  BurnIntentSchema,
  AttestationSchema,
  EncodeTransferSpecSchema,
  DecodePayloadSchema,
  EncodeBurnIntentsSchema,
  EncodeAttestationsSchema,
  EncodeBurnBatchSchema,
  DepositSchema,
  InitiateWithdrawalSchema,
  CompleteWithdrawalSchema,
  DelegateSchema,
  BurnSchema,
  MintSchema,
  AdvanceBlocksSchema,
  CreditSchema,
  ListEventsQuerySchema,
  ListStreamEventsQuerySchema,
} from "./dto.js";
export type {
  EncodeTransferSpecDto,
  DecodePayloadDto,
  EncodeBurnIntentsDto,
  EncodeAttestationsDto,
  EncodeBurnBatchDto,
  DepositDto,
  InitiateWithdrawalDto,
  CompleteWithdrawalDto,
  DelegateDto,
  BurnDto,
  MintDto,
  AdvanceBlocksDto,
  CreditDto,
  ListEventsQuery,
  ListStreamEventsQuery,
} from "./dto.js";

// JSON views
export {
  transferSpecToJson,
  burnIntentToJson,
  attestationToJson,
  balanceEntryToJson,
  withdrawalReceiptToJson,
  burnReceiptToJson,
  mintReceiptToJson,
} from "./json.js";
export type {
  JsonView,
  TransferSpecJson,
  BurnIntentJson,
  AttestationJson,
  BurnReceiptJson,
  MintReceiptJson,
} from "./json.js";

// Error
export { ApiError, createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorStatus, ErrorDetail, ErrorEnvelope } from "./error.js";

// Auth
export { ROLE_PERMISSIONS, ROLES, isRole, hasPermission } from "./auth.js";
export type { Role, Permission, AuthContext, ApiKeyRecord } from "./auth.js";

// Pagination
export { encodeCursor, decodeCursor, paginate } from "./pagination.js";
export type {
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
  DecodedCursor,
} from "./pagination.js";

// App env
export type { AppEnv, ValidatedEnv } from "./api-contract.js";
