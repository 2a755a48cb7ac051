/**
 * Type barrel — re-exports all public types from @keel/node.
 */

// DTOs
export {
  AmountSchema,
  AccountSchema,
  BpsSchema,
  DepositSchema,
  WithdrawSchema,
  RedeemSchema,
  ApproveSchema,
  TransferSharesSchema,
  SetFeeSchema,
  FeeRecipientSchema,
  ReserveSchema,
  OwnershipSchema,
  RouteFundsSchema,
  RegisterStrategySchema,
  ExecuteStrategySchema,
  AssetsQuerySchema,
  SharesQuerySchema,
  PoolAmountSchema,
  AccrueSchema,
  RateSchema,
  ProjectionQuerySchema,
  CreditSchema,
} from "./dto.js";
export type {
  DepositDto,
  WithdrawDto,
  RedeemDto,
  SetFeeDto,
  RouteFundsDto,
  CreditDto,
} from "./dto.js";

// Error
export { ApiError, createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Auth
export {
  ROLES,
  ROLE_PERMISSIONS,
  ROLE_CAPABILITIES,
  hasPermission,
  parseRole,
} from "./auth.js";
export type { Role, Permission, AuthContext, ApiKeyRecord } from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";
