/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body/query validation.
 *
 * Addresses and metadata pointers are only checked for shape here; the
 * engine applies its own rules so its error codes reach the client.
 */

import { z } from "zod";

// =============================================================================
// Shared Schemas
// =============================================================================

/** Decimal amount at 6 places ("1", "2.5", "0.000001"). */
export const AmountSchema = z
  .string()
  .regex(/^\d+(\.\d{1,6})?$/, { message: "must be a decimal amount with at most 6 places" });

export const AddressFieldSchema = z.string().min(1).max(64);

// =============================================================================
// Pair DTOs
// =============================================================================

export const MintPairSchema = z.object({
  metadataPointer: z.string(),
});

export type MintPairDto = z.infer<typeof MintPairSchema>;

export const TransferPairSchema = z.object({
  to: AddressFieldSchema,
});

export type TransferPairDto = z.infer<typeof TransferPairSchema>;

export const ListPairsQuerySchema = z.object({
  owner: z.string().optional(),
});

export type ListPairsQuery = z.infer<typeof ListPairsQuerySchema>;

// =============================================================================
// Stablecoin DTOs
// =============================================================================

export const ApproveSchema = z.object({
  amount: AmountSchema,
});

export type ApproveDto = z.infer<typeof ApproveSchema>;

export const StablecoinMintSchema = z.object({
  to: AddressFieldSchema,
  amount: AmountSchema,
});

export type StablecoinMintDto = z.infer<typeof StablecoinMintSchema>;

// =============================================================================
// Admin DTOs
// =============================================================================

export const EmergencyWithdrawSchema = z.object({
  amount: AmountSchema,
});

export type EmergencyWithdrawDto = z.infer<typeof EmergencyWithdrawSchema>;

export const RoleChangeSchema = z.object({
  role: z.enum(["admin", "pauser", "minter"]),
  account: AddressFieldSchema,
});

export type RoleChangeDto = z.infer<typeof RoleChangeSchema>;

// =============================================================================
// Event DTOs
// =============================================================================

export const ListEventsQuerySchema = z.object({
  fromPosition: z.coerce.number().int().min(1).optional(),
  maxCount: z.coerce.number().int().min(1).max(1000).default(100),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;

export const ListStreamEventsQuerySchema = z.object({
  fromVersion: z.coerce.number().int().min(1).optional(),
  maxCount: z.coerce.number().int().min(1).max(1000).default(100),
});

export type ListStreamEventsQuery = z.infer<typeof ListStreamEventsQuerySchema>;
