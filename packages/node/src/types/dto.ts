/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Amounts travel as base-unit integer strings and are parsed to
 * bigint here. Fee and rate ceilings are left to the ledgers so
 * their error codes reach the client.
 */

import { z } from "zod";

// =============================================================================
// Shared Schemas
// =============================================================================

export const AmountSchema = z
  .string()
  .regex(/^\d+$/, "Must be a base-unit integer string")
  .transform((value) => BigInt(value));

export const AccountSchema = z.string().trim().min(1).max(128);

export const BpsSchema = z.number().int().min(0);

// =============================================================================
// Vault DTOs
// =============================================================================

export const DepositSchema = z.object({
  assets: AmountSchema,
  receiver: AccountSchema.optional(),
});

export type DepositDto = z.infer<typeof DepositSchema>;

export const WithdrawSchema = z.object({
  assets: AmountSchema,
  receiver: AccountSchema.optional(),
  owner: AccountSchema.optional(),
});

export type WithdrawDto = z.infer<typeof WithdrawSchema>;

export const RedeemSchema = z.object({
  shares: AmountSchema,
  receiver: AccountSchema.optional(),
  owner: AccountSchema.optional(),
});

export type RedeemDto = z.infer<typeof RedeemSchema>;

export const ApproveSchema = z.object({
  spender: AccountSchema,
  shares: AmountSchema,
});

export const TransferSharesSchema = z.object({
  to: AccountSchema,
  shares: AmountSchema,
  /** Spend an allowance on `from`'s shares instead of the caller's own */
  from: AccountSchema.optional(),
});

export const SetFeeSchema = z.object({
  kind: z.enum(["deposit", "withdrawal", "performance"]),
  bps: BpsSchema,
});

export type SetFeeDto = z.infer<typeof SetFeeSchema>;

export const FeeRecipientSchema = z.object({
  recipient: z.string(),
});

export const ReserveSchema = z.object({
  amount: AmountSchema,
});

export const OwnershipSchema = z.object({
  newOwner: AccountSchema,
});

export const RouteFundsSchema = z.object({
  destinations: z.array(z.string()),
  payloads: z.array(z.string()),
  values: z.array(AmountSchema),
});

export type RouteFundsDto = z.infer<typeof RouteFundsSchema>;

export const RegisterStrategySchema = z.object({
  id: z.string().trim().min(1).max(64),
  destination: AccountSchema,
  description: z.string().max(256).optional(),
});

export const ExecuteStrategySchema = z.object({
  payload: z.string().default("0x"),
  value: AmountSchema,
});

export const AssetsQuerySchema = z.object({
  assets: AmountSchema,
});

export const SharesQuerySchema = z.object({
  shares: AmountSchema,
});

// =============================================================================
// Lending DTOs
// =============================================================================

export const PoolAmountSchema = z.object({
  amount: AmountSchema,
});

export const AccrueSchema = z.object({
  account: AccountSchema.optional(),
});

export const RateSchema = z.object({
  annualRateBps: BpsSchema,
});

export const ProjectionQuerySchema = z.object({
  at: z.coerce.number().int().min(0).optional(),
});

// =============================================================================
// Balance DTOs
// =============================================================================

export const CreditSchema = z.object({
  holder: AccountSchema,
  amount: AmountSchema,
  book: z.enum(["asset", "native"]).default("asset"),
});

export type CreditDto = z.infer<typeof CreditSchema>;
