/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps wallet error codes to HTTP status codes. A ledger rejection is
 * an upstream refusal (502) and carries the node's detail text and
 * result codes; anything unexpected is a 500 with a generic message.
 */

import type { Context } from "hono";
import { isWalletError } from "@walletd/wallet";
import type { WalletError, WalletErrorCode } from "@walletd/wallet";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Wallet Error → HTTP Status Mapping
// =============================================================================

type ErrorStatus = 400 | 404 | 500 | 502 | 503;

const STATUS_MAP: Readonly<Record<WalletErrorCode, ErrorStatus>> = {
  INVALID_KEY: 400,
  INVALID_ADDRESS: 400,
  INVALID_AMOUNT: 400,
  NOT_FOUND: 404,
  REJECTED: 502,
  UNAVAILABLE: 503,
  BUILD_ERROR: 500,
  INTERNAL_ERROR: 500,
};

export function statusForCode(code: WalletErrorCode): ErrorStatus {
  return STATUS_MAP[code];
}

function rejectionDetails(err: WalletError): Record<string, unknown> | undefined {
  if (err.code !== "REJECTED" || err.details === undefined) {
    return undefined;
  }
  const { detail, resultCodes } = err.details;
  const details: Record<string, unknown> = {};
  if (detail !== undefined) details["detail"] = detail;
  if (resultCodes !== undefined) details["result_codes"] = resultCodes;
  return Object.keys(details).length > 0 ? details : undefined;
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  if (!isWalletError(err)) {
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  }

  const status = statusForCode(err.code);

  // Don't leak internal details
  if (status === 500) {
    return c.json(createErrorEnvelope(err.code, "Internal server error"), status);
  }

  return c.json(createErrorEnvelope(err.code, err.message, rejectionDetails(err)), status);
}
