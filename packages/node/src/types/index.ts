/**
 * Type barrel — re-exports all public types from @walletd/node.
 */

// DTOs
export {
  TransferRequestSchema,
  toCreateWalletResponse,
  toWalletDetailsResponse,
  toTransferResponse,
} from "./dto.js";
export type {
  TransferRequestDto,
  CreateWalletResponse,
  BalanceDto,
  WalletDetailsResponse,
  TransferResponse,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// App env
export type { AppEnv, ValidatedEnv } from "./api-contract.js";
