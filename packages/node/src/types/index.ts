/**
 * Type barrel — re-exports all public types from @pairmint/node.
 */

// DTOs
export {
  AmountSchema,
  AddressFieldSchema,
  MintPairSchema,
  TransferPairSchema,
  ListPairsQuerySchema,
  ApproveSchema,
  StablecoinMintSchema,
  EmergencyWithdrawSchema,
  RoleChangeSchema,
  ListEventsQuerySchema,
  ListStreamEventsQuerySchema,
} from "./dto.js";
export type {
  MintPairDto,
  TransferPairDto,
  ListPairsQuery,
  ApproveDto,
  StablecoinMintDto,
  EmergencyWithdrawDto,
  RoleChangeDto,
  ListEventsQuery,
  ListStreamEventsQuery,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// App env
export type { AppEnv } from "./api-contract.js";
