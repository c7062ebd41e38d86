/**
 * Request/Response DTOs.
 *
 * Request bodies carry a Zod schema and a derived TypeScript type.
 * Response bodies use snake_case field names and map 1:1 from the
 * WalletService results.
 */

import { z } from "zod";
import type {
  Balance,
  CreateWalletResult,
  TransferResult,
  WalletDetails,
} from "@walletd/wallet";

// =============================================================================
// Requests
// =============================================================================

/** Messages read as "<field> <problem>" once validateBody prefixes the field. */
const requiredString = () =>
  z
    .string({ required_error: "is required", invalid_type_error: "must be a string" })
    .min(1, "must not be empty");

/**
 * Transfer body. Only presence and type are checked here; key, address
 * and amount formats are the wallet core's to judge, so their errors
 * keep their specific codes.
 */
export const TransferRequestSchema = z.object(
  {
    from_secret_key: requiredString(),
    to_public_key: requiredString(),
    amount: requiredString(),
  },
  { required_error: "is required", invalid_type_error: "must be a JSON object" },
);

export type TransferRequestDto = z.infer<typeof TransferRequestSchema>;

// =============================================================================
// Responses
// =============================================================================

export interface CreateWalletResponse {
  readonly public_key: string;
  readonly secret_key: string;
  readonly message: string;
}

export interface BalanceDto {
  readonly asset_type: string;
  readonly asset_code?: string;
  readonly issuer?: string;
  readonly balance: string;
}

export interface WalletDetailsResponse {
  readonly public_key: string;
  readonly exists: boolean;
  readonly balances: readonly BalanceDto[];
  /** Decimal string: 64-bit sequence numbers exceed JSON number precision */
  readonly sequence_number: string;
}

export interface TransferResponse {
  readonly transaction_hash: string;
  readonly message: string;
}

// =============================================================================
// Mappers
// =============================================================================

export function toCreateWalletResponse(result: CreateWalletResult): CreateWalletResponse {
  return {
    public_key: result.publicKey,
    secret_key: result.secretKey,
    message: result.message,
  };
}

function toBalanceDto(balance: Balance): BalanceDto {
  return {
    asset_type: balance.assetType,
    ...(balance.assetCode !== undefined && { asset_code: balance.assetCode }),
    ...(balance.issuer !== undefined && { issuer: balance.issuer }),
    balance: balance.amount,
  };
}

export function toWalletDetailsResponse(details: WalletDetails): WalletDetailsResponse {
  return {
    public_key: details.publicKey,
    exists: details.exists,
    balances: details.balances.map(toBalanceDto),
    sequence_number: details.sequenceNumber,
  };
}

export function toTransferResponse(result: TransferResult): TransferResponse {
  return {
    transaction_hash: result.transactionHash,
    message: result.message,
  };
}
