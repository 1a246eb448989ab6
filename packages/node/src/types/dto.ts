/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Amounts travel as decimal strings of base units; addresses are
 * checksummed on parse.
 */

import { getAddress } from "viem";
import { z } from "zod";
import { isHex, isHolderAddress, isUint256String, isVaultEventType } from "@wtoken/types";

// =============================================================================
// Shared Schemas
// =============================================================================

export const AddressSchema = z
  .string()
  .refine(isHolderAddress, { message: "Expected a 20-byte hex address" })
  .transform((value) => getAddress(value));

export const AmountSchema = z
  .string()
  .refine(isUint256String, { message: "Expected a base-10 uint256 string" })
  .transform((value) => BigInt(value));

export const HexSchema = z.string().refine(isHex, { message: "Expected 0x-prefixed hex" });

export const SignatureSchema = z.union([
  HexSchema,
  z.object({
    v: z.number().int().min(0).max(255),
    r: HexSchema,
    s: HexSchema,
  }),
]);

// =============================================================================
// Vault DTOs
// =============================================================================

export const DepositSchema = z.object({
  assets: AmountSchema,
  receiver: AddressSchema.optional(),
});

export type DepositDto = z.infer<typeof DepositSchema>;

export const MintSchema = z.object({
  shares: AmountSchema,
  receiver: AddressSchema.optional(),
});

export type MintDto = z.infer<typeof MintSchema>;

export const WithdrawSchema = z.object({
  assets: AmountSchema,
  owner: AddressSchema.optional(),
  receiver: AddressSchema.optional(),
});

export type WithdrawDto = z.infer<typeof WithdrawSchema>;

export const RedeemSchema = z.object({
  shares: AmountSchema,
  owner: AddressSchema.optional(),
  receiver: AddressSchema.optional(),
});

export type RedeemDto = z.infer<typeof RedeemSchema>;

// =============================================================================
// Share DTOs
// =============================================================================

/** `from` set and different from the caller means transferFrom. */
export const TransferSchema = z.object({
  to: AddressSchema,
  amount: AmountSchema,
  from: AddressSchema.optional(),
});

export type TransferDto = z.infer<typeof TransferSchema>;

export const ApproveSchema = z.object({
  spender: AddressSchema,
  amount: AmountSchema,
});

export type ApproveDto = z.infer<typeof ApproveSchema>;

export const PermitSchema = z.object({
  owner: AddressSchema,
  spender: AddressSchema,
  value: AmountSchema,
  deadline: AmountSchema,
  signature: SignatureSchema,
});

export type PermitDto = z.infer<typeof PermitSchema>;

// =============================================================================
// Devnet asset DTOs
// =============================================================================

export const AssetMintSchema = z.object({
  to: AddressSchema,
  amount: AmountSchema,
});

export type AssetMintDto = z.infer<typeof AssetMintSchema>;

export const AssetApproveSchema = z.object({
  spender: AddressSchema,
  amount: AmountSchema,
});

export type AssetApproveDto = z.infer<typeof AssetApproveSchema>;

export const MultiplierSchema = z.object({
  multiplier: AmountSchema,
});

export type MultiplierDto = z.infer<typeof MultiplierSchema>;

export const BanSchema = z.object({
  accounts: z.array(AddressSchema).min(1),
});

export type BanDto = z.infer<typeof BanSchema>;

// =============================================================================
// Query DTOs
// =============================================================================

export const QuoteKindSchema = z.enum([
  "deposit",
  "mint",
  "withdraw",
  "redeem",
  "shares",
  "assets",
]);

export type QuoteKind = z.infer<typeof QuoteKindSchema>;

export const QuoteQuerySchema = z.object({
  amount: AmountSchema,
});

export const ListEventsQuerySchema = z.object({
  afterSequence: z.coerce.number().int().min(0).optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
  type: z.string().refine(isVaultEventType, "Unknown event type").optional(),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;
