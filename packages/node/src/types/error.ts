/**
 * Error envelope types for API responses.
 *
 * All error responses follow the shape:
 * { error: { code: string, message: string, details?: Record<string, unknown> } }
 */

import type { WalletErrorCode } from "@walletd/wallet";

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Known API error codes: every wallet error code plus the ones the
 * HTTP layer produces itself.
 */
export type ApiErrorCode =
  | WalletErrorCode
  | "VALIDATION_ERROR"
  | "ROUTE_NOT_FOUND"
  | "IDEMPOTENCY_KEY_REUSED";

// =============================================================================
// Error Response
// =============================================================================

export interface ErrorDetail {
  readonly code: ApiErrorCode;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

// =============================================================================
// Factory
// =============================================================================

export function createErrorEnvelope(
  code: ApiErrorCode,
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope {
  const error: ErrorDetail = { code, message };
  if (details !== undefined) {
    return { error: { ...error, details } };
  }
  return { error };
}
