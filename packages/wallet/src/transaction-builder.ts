/**
 * Transaction Builder
 *
 * Assembles an ordered operation list into an unsigned Stellar
 * transaction envelope.
 *
 * Contract:
 * - The envelope consumes exactly one sequence number (snapshot + 1),
 *   regardless of how many operations it carries
 * - The account snapshot passed in is never mutated
 * - Operation order is preserved
 * - Validity window: minTime 0, maxTime now + validityWindowSeconds
 * - Total fee = base fee × operation count
 *
 * Every malformed input surfaces as BUILD_ERROR before any XDR is produced.
 */

import {
  Account as StellarAccount,
  Asset,
  Operation as StellarOperation,
  StrKey,
  TransactionBuilder as StellarTransactionBuilder,
} from "@stellar/stellar-sdk";
import type { Transaction, xdr } from "@stellar/stellar-sdk";
import { formatAmount, tryParseAmount } from "./amount.js";
import type {
  Account,
  AssetIdentity,
  NetworkContext,
  Operation,
  UnsignedEnvelope,
} from "./types.js";
import { WalletError } from "./types.js";

/** Network minimum base fee per operation, in stroops. */
export const MIN_BASE_FEE = 100;

export const DEFAULT_VALIDITY_WINDOW_SECONDS = 300;

/** Protocol limit on operations per transaction. */
export const MAX_OPERATIONS = 100;

const ASSET_CODE_PATTERN = /^[a-zA-Z0-9]{1,12}$/;

export interface TransactionBuilderOptions {
  /** Clock in epoch milliseconds (injectable for tests) */
  readonly now?: (() => number) | undefined;
}

// =============================================================================
// Operation Translation
// =============================================================================

function buildError(message: string, cause?: unknown): WalletError {
  return new WalletError(
    "BUILD_ERROR",
    message,
    undefined,
    cause !== undefined ? { cause } : undefined,
  );
}

function requireAddress(address: string, field: string): string {
  if (!StrKey.isValidEd25519PublicKey(address)) {
    throw buildError(`Invalid ${field}: "${address}"`);
  }
  return address;
}

function requirePositiveAmount(amount: string, field: string): string {
  const stroops = tryParseAmount(amount);
  if (stroops === undefined || stroops <= 0n) {
    throw buildError(`Invalid ${field}: "${amount}" must be a positive amount`);
  }
  return formatAmount(stroops);
}

export function toStellarAsset(asset: AssetIdentity): Asset {
  if (asset.kind === "native") {
    return Asset.native();
  }
  if (!ASSET_CODE_PATTERN.test(asset.code)) {
    throw buildError(`Invalid asset code: "${asset.code}"`);
  }
  requireAddress(asset.issuer, "asset issuer");
  return new Asset(asset.code, asset.issuer);
}

function toStellarOperation(op: Operation): xdr.Operation {
  switch (op.kind) {
    case "createAccount":
      return StellarOperation.createAccount({
        destination: requireAddress(op.destination, "destination"),
        startingBalance: requirePositiveAmount(op.startingBalance, "starting balance"),
      });

    case "establishTrustline": {
      const asset = toStellarAsset(op.asset);
      return op.source !== undefined
        ? StellarOperation.changeTrust({
            asset,
            source: requireAddress(op.source, "trustline source"),
          })
        : StellarOperation.changeTrust({ asset });
    }

    case "payment":
      return StellarOperation.payment({
        destination: requireAddress(op.destination, "destination"),
        asset: toStellarAsset(op.asset),
        amount: requirePositiveAmount(op.amount, "payment amount"),
      });
  }
}

// =============================================================================
// Builder
// =============================================================================

export class TransactionBuilder {
  private readonly network: NetworkContext;
  private readonly now: () => number;

  constructor(network: NetworkContext, options: TransactionBuilderOptions = {}) {
    this.network = network;
    this.now = options.now ?? Date.now;
  }

  /**
   * Build an unsigned envelope from an account snapshot.
   *
   * @throws {WalletError} BUILD_ERROR on any invalid parameter
   */
  build(
    source: Account,
    operations: readonly Operation[],
    baseFeePerOp: number = MIN_BASE_FEE,
    validityWindowSeconds: number = DEFAULT_VALIDITY_WINDOW_SECONDS,
  ): UnsignedEnvelope {
    if (operations.length === 0) {
      throw buildError("Transaction requires at least one operation");
    }
    if (operations.length > MAX_OPERATIONS) {
      throw buildError(
        `Transaction has ${operations.length} operations, limit is ${MAX_OPERATIONS}`,
      );
    }
    if (!Number.isSafeInteger(baseFeePerOp) || baseFeePerOp <= 0) {
      throw buildError(`Invalid base fee: ${baseFeePerOp}`);
    }
    if (!Number.isSafeInteger(validityWindowSeconds) || validityWindowSeconds <= 0) {
      throw buildError(`Invalid validity window: ${validityWindowSeconds}s`);
    }
    requireAddress(source.address, "source account");
    if (!/^-?\d+$/.test(source.sequence)) {
      throw buildError(`Invalid sequence number: "${source.sequence}"`);
    }

    const stellarOps = operations.map(toStellarOperation);

    const maxTime = Math.floor(this.now() / 1000) + validityWindowSeconds;

    // A fresh Account per envelope: the SDK increments it in build(),
    // the caller's snapshot stays as fetched.
    const account = new StellarAccount(source.address, source.sequence);

    const tx = this.assemble(account, stellarOps, baseFeePerOp, maxTime);

    return {
      source: source.address,
      sequence: tx.sequence,
      operations: [...operations],
      baseFee: baseFeePerOp,
      fee: Number(tx.fee),
      timeBounds: { minTime: 0, maxTime },
      xdr: tx.toXDR(),
    };
  }

  private assemble(
    account: StellarAccount,
    ops: readonly xdr.Operation[],
    baseFeePerOp: number,
    maxTime: number,
  ): Transaction {
    try {
      const builder = new StellarTransactionBuilder(account, {
        fee: String(baseFeePerOp),
        networkPassphrase: this.network.passphrase,
        timebounds: { minTime: 0, maxTime },
      });
      for (const op of ops) {
        builder.addOperation(op);
      }
      return builder.build();
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      throw buildError(`Failed to build transaction: ${msg}`, err);
    }
  }
}
