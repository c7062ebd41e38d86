/**
 * @walletd/wallet — Ledger amount arithmetic.
 *
 * Stellar amounts are signed 64-bit integers of stroops
 * (1 unit = 10^7 stroops) rendered as decimal strings.
 *
 * Rules:
 * - No floating-point operations
 * - At most 7 fractional digits
 * - Must fit in a signed 64-bit integer
 */

import { WalletError } from "./types.js";

export const AMOUNT_DECIMALS = 7;

/** Largest representable amount, in stroops (int64 max). */
export const MAX_STROOPS = 9_223_372_036_854_775_807n;

const AMOUNT_PATTERN = /^\d+(\.\d+)?$/;

/**
 * Parse a non-negative decimal string into stroops.
 * Returns undefined for anything that is not a valid ledger amount.
 *
 * "100" → 1000000000n
 * "0.0000001" → 1n
 */
export function tryParseAmount(amount: string): bigint | undefined {
  const trimmed = amount.trim();
  if (!AMOUNT_PATTERN.test(trimmed)) {
    return undefined;
  }

  const [intPart = "0", fracPart = ""] = trimmed.split(".");
  if (fracPart.length > AMOUNT_DECIMALS) {
    return undefined;
  }

  const stroops = BigInt(intPart + fracPart.padEnd(AMOUNT_DECIMALS, "0"));
  return stroops > MAX_STROOPS ? undefined : stroops;
}

/**
 * Parse a strictly positive amount into stroops.
 *
 * @throws {WalletError} INVALID_AMOUNT
 */
export function parsePositiveAmount(amount: string): bigint {
  const stroops = tryParseAmount(amount);
  if (stroops === undefined || stroops <= 0n) {
    throw new WalletError(
      "INVALID_AMOUNT",
      "Invalid amount: must be a positive number",
    );
  }
  return stroops;
}

/**
 * Render stroops the way the ledger node does.
 *
 * 1000000000n → "100.0000000"
 */
export function formatAmount(stroops: bigint): string {
  const negative = stroops < 0n;
  const abs = negative ? -stroops : stroops;
  const str = abs.toString().padStart(AMOUNT_DECIMALS + 1, "0");
  const intPart = str.slice(0, str.length - AMOUNT_DECIMALS);
  const fracPart = str.slice(str.length - AMOUNT_DECIMALS);
  return `${negative ? "-" : ""}${intPart}.${fracPart}`;
}
